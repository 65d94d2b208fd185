import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerPlayCommand } from "./commands/play.js";
import { registerConfigCommand } from "./commands/config.js";

program
  .name("dropfour")
  .description("dropfour - Connect Four for two players in one terminal")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerConfigCommand(program);

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
