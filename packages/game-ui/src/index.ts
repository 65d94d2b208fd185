export { ConnectFourUI, CELL_CLASSES } from "./connectFour.js";

export type { GameUISpec } from "@dropfour/engine";
