export * from "./types/game.js";
export { GameError, isGameError } from "./errors.js";
export type { GameErrorCode } from "./errors.js";

// Validation
export {
  MIN_BOARD_SIZE,
  DEFAULT_SETTINGS,
  getSettingsErrors,
  resolveSettings,
} from "./validation.js";
