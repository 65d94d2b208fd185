import type { Command } from "commander";
import React from "react";
import { render } from "ink";
import { resolveConfig, setCliOverride } from "../config/index.js";
import { createLogger, getLogPath } from "../logger.js";
import { toGameSettings } from "../settings.js";
import { GameSession } from "../services/GameSession.js";
import { App } from "../tui/App.js";

interface PlayOptions {
  rows?: string;
  columns?: string;
  p1?: string;
  p2?: string;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play", { isDefault: true })
    .description("Start a two-player game in this terminal")
    .option("-r, --rows <n>", "Number of rows (at least 4)")
    .option("-c, --columns <n>", "Number of columns (at least 4)")
    .option("--p1 <color>", "Checker color for player 1")
    .option("--p2 <color>", "Checker color for player 2")
    .action(async (opts: PlayOptions) => {
      if (opts.rows) setCliOverride("rows", opts.rows);
      if (opts.columns) setCliOverride("columns", opts.columns);
      if (opts.p1) setCliOverride("playerOneColor", opts.p1);
      if (opts.p2) setCliOverride("playerTwoColor", opts.p2);

      try {
        const config = await resolveConfig();
        const settings = toGameSettings(config);
        const log = await createLogger(config);
        const session = new GameSession(settings, log);

        const app = render(
          React.createElement(App, { session, logPath: getLogPath(config) })
        );
        await app.waitUntilExit();
        log.info("Player quit");
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}
