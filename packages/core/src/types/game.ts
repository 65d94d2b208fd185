/** The two players. "A" always moves first. */
export type Player = "A" | "B";

/** Cell values: a player's checker, or "" for empty */
export type Cell = Player | "";

export const EMPTY: Cell = "";

/**
 * A board position. Row 0 is the top row, column 0 the leftmost column.
 */
export interface Coordinate {
  row: number;
  column: number;
}

export type LineDirection =
  | "horizontal"
  | "vertical"
  | "diagonal_down_right"
  | "diagonal_down_left";

/** Four same-player cells in a row, ordered along the scan direction */
export interface WinningLine {
  direction: LineDirection;
  cells: Coordinate[];
}

export type GamePhase =
  | { status: "in_progress" }
  | { status: "won"; winner: Player; line: WinningLine }
  | { status: "tied" };

export type RejectReason = "invalid_column" | "column_full" | "game_over";

/** Result of GameEngine.applyMove, consumed by the presentation layer. */
export type MoveResult =
  | { kind: "continue"; nextPlayer: Player; row: number; column: number }
  | { kind: "win"; player: Player; line: WinningLine; row: number; column: number }
  | { kind: "tie"; row: number; column: number }
  | { kind: "rejected"; reason: RejectReason; message: string };

export interface GameSettings {
  rows: number;
  columns: number;
  /** Visual identifiers for players A and B (colors in the CLI). Opaque to the engine. */
  markers: [string, string];
}

/** Read-only projection of a game, safe to hand to rendering code */
export interface GameSnapshot {
  rows: number;
  columns: number;
  cells: Cell[][];
  currentPlayer: Player;
  phase: GamePhase;
  turnNumber: number;
  lastMove: Coordinate | null;
  openColumns: number[];
}

export function otherPlayer(player: Player): Player {
  return player === "A" ? "B" : "A";
}
