export { Board } from "./Board.js";
export { GameEngine } from "./GameEngine.js";
export {
  findWinningLine,
  findHorizontalLine,
  findVerticalLine,
  findDiagonalDownRightLine,
  findDiagonalDownLeftLine,
} from "./winDetection.js";
export type { GameUISpec } from "./interfaces/IGameUI.js";
