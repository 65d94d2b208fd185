import { otherPlayer, resolveSettings } from "@dropfour/core";
import type {
  Cell,
  Coordinate,
  GamePhase,
  GameSettings,
  GameSnapshot,
  MoveResult,
  Player,
  RejectReason,
  WinningLine,
} from "@dropfour/core";
import { Board } from "./Board.js";
import { findWinningLine } from "./winDetection.js";

function copyLine(line: WinningLine): WinningLine {
  return { direction: line.direction, cells: line.cells.map((c) => ({ ...c })) };
}

function rejected(reason: RejectReason, message: string): MoveResult {
  return { kind: "rejected", reason, message };
}

/**
 * Runs a single game: owns turn order and phase, resolves drops against
 * the board, and reports the outcome of every move as a MoveResult.
 *
 * A rejected move leaves the game untouched; validation always happens
 * before the board is mutated.
 */
export class GameEngine {
  private readonly config: GameSettings;
  private readonly board: Board;
  private turn: Player = "A";
  private state: GamePhase = { status: "in_progress" };
  private turns = 0;
  private last: Coordinate | null = null;

  /** Throws GameError(INVALID_CONFIGURATION) for a board under 4x4 or equal markers. */
  constructor(settings: Partial<GameSettings> = {}) {
    this.config = resolveSettings(settings);
    this.board = new Board(this.config.rows, this.config.columns);
  }

  settings(): GameSettings {
    return { ...this.config, markers: [this.config.markers[0], this.config.markers[1]] };
  }

  get rows(): number {
    return this.board.rows;
  }

  get columns(): number {
    return this.board.columns;
  }

  currentPlayer(): Player {
    return this.turn;
  }

  phase(): GamePhase {
    return this.copyPhase();
  }

  isTerminal(): boolean {
    return this.state.status !== "in_progress";
  }

  /** Number of checkers dropped since the last reset */
  turnNumber(): number {
    return this.turns;
  }

  lastMove(): Coordinate | null {
    return this.last ? { ...this.last } : null;
  }

  occupantAt(row: number, column: number): Cell {
    return this.board.occupantAt(row, column);
  }

  isColumnFull(column: number): boolean {
    return this.board.isColumnFull(column);
  }

  /** Columns that can still take a checker, or none once the game is over. */
  openColumns(): number[] {
    return this.isTerminal() ? [] : this.board.openColumns();
  }

  /**
   * Drop the current player's checker into a column.
   * Never throws for a bad column or a finished game: those come back as
   * a "rejected" result.
   */
  applyMove(column: number): MoveResult {
    if (this.isTerminal()) {
      return rejected("game_over", "Game is already over");
    }
    if (!this.board.isColumnInRange(column)) {
      return rejected(
        "invalid_column",
        `Column ${column} is out of range 0-${this.board.columns - 1}`
      );
    }

    const row = this.board.dropColumn(column);
    if (row === null) {
      return rejected("column_full", `Column ${column} is full`);
    }

    const player = this.turn;
    this.board.place(row, column, player);
    this.turns++;
    this.last = { row, column };

    const line = findWinningLine(this.board.cells());
    if (line) {
      this.state = { status: "won", winner: player, line };
      return { kind: "win", player, line: copyLine(line), row, column };
    }

    if (this.board.isFull()) {
      this.state = { status: "tied" };
      return { kind: "tie", row, column };
    }

    this.turn = otherPlayer(player);
    return { kind: "continue", nextPlayer: this.turn, row, column };
  }

  /** Clear the board for another game. Player A moves first again. */
  reset(): void {
    this.board.reset();
    this.turn = "A";
    this.state = { status: "in_progress" };
    this.turns = 0;
    this.last = null;
  }

  private copyPhase(): GamePhase {
    if (this.state.status === "won") {
      return { status: "won", winner: this.state.winner, line: copyLine(this.state.line) };
    }
    return { ...this.state };
  }

  snapshot(): GameSnapshot {
    return {
      rows: this.board.rows,
      columns: this.board.columns,
      cells: this.board.cells(),
      currentPlayer: this.turn,
      phase: this.copyPhase(),
      turnNumber: this.turns,
      lastMove: this.lastMove(),
      openColumns: this.openColumns(),
    };
  }
}
