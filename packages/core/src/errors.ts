export type GameErrorCode =
  | "INVALID_COLUMN"
  | "COLUMN_FULL"
  | "CELL_OCCUPIED"
  | "GAME_OVER"
  | "INVALID_CONFIGURATION";

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameError";
    this.code = code;
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
