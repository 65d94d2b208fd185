import type { GameSnapshot, Player } from "@dropfour/core";

// ---------------------------------------------------------------------------
// Rendering and input contract for presentation shells
// ---------------------------------------------------------------------------

/**
 * Everything a shell needs to draw a game and turn user input into moves,
 * without reading engine internals. All methods work from a GameSnapshot.
 */
export interface GameUISpec {
  /** Player labels in turn order, e.g. ["Player 1", "Player 2"] */
  playerLabels: [string, string];

  /** Hint text shown to the current player (e.g. "Enter column 1-7") */
  inputHint(snapshot: GameSnapshot): string;

  /**
   * Render the board as text. Checkers are wrapped in
   * <span class="..."> tags that shells map to colors.
   */
  renderBoard(snapshot: GameSnapshot): string;

  /** One-line status: whose turn it is, who won, or a tie. */
  renderStatus(snapshot: GameSnapshot): string;

  /** Parse raw user input into a 0-based column, or null if invalid. */
  parseInput(raw: string, snapshot: GameSnapshot): number | null;

  /** Format a column as a human-readable move (e.g. "column 3"). */
  formatMove(column: number): string;

  getPlayerLabel(player: Player): string;
}
