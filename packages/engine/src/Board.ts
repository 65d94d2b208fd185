import { EMPTY, GameError, MIN_BOARD_SIZE } from "@dropfour/core";
import type { Cell, Player } from "@dropfour/core";

/**
 * A rows x columns grid of cells.
 * Row 0 is the top row, row rows-1 the bottom row where checkers land first.
 * cells[row][column]
 */
export class Board {
  readonly rows: number;
  readonly columns: number;
  private grid: Cell[][];

  /** Throws GameError(INVALID_CONFIGURATION) unless both sides are integers of at least 4. */
  constructor(rows: number, columns: number) {
    for (const [name, size] of [["rows", rows], ["columns", columns]] as const) {
      if (!Number.isInteger(size) || size < MIN_BOARD_SIZE) {
        throw new GameError(
          "INVALID_CONFIGURATION",
          `Board ${name} must be an integer of at least ${MIN_BOARD_SIZE}, got ${size}`
        );
      }
    }
    this.rows = rows;
    this.columns = columns;
    this.grid = Board.emptyGrid(rows, columns);
  }

  private static emptyGrid(rows: number, columns: number): Cell[][] {
    const grid: Cell[][] = [];
    for (let r = 0; r < rows; r++) {
      grid.push(new Array<Cell>(columns).fill(EMPTY));
    }
    return grid;
  }

  isColumnInRange(column: number): boolean {
    return Number.isInteger(column) && column >= 0 && column < this.columns;
  }

  private assertInRange(row: number, column: number): void {
    if (!this.isColumnInRange(column)) {
      throw new GameError("INVALID_COLUMN", `Column ${column} is out of range 0-${this.columns - 1}`);
    }
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new GameError("INVALID_COLUMN", `Row ${row} is out of range 0-${this.rows - 1}`);
    }
  }

  /**
   * Find the lowest empty row in a column, scanning from the bottom row upward.
   * Returns the row index, or null if the column is full.
   */
  dropColumn(column: number): number | null {
    if (!this.isColumnInRange(column)) {
      throw new GameError("INVALID_COLUMN", `Column ${column} is out of range 0-${this.columns - 1}`);
    }
    for (let r = this.rows - 1; r >= 0; r--) {
      if (this.grid[r][column] === EMPTY) {
        return r;
      }
    }
    return null;
  }

  /** Put a checker in an empty cell. Callers resolve the row with dropColumn first. */
  place(row: number, column: number, player: Player): void {
    this.assertInRange(row, column);
    if (this.grid[row][column] !== EMPTY) {
      throw new GameError("CELL_OCCUPIED", `Cell (${row}, ${column}) is already occupied`);
    }
    this.grid[row][column] = player;
  }

  occupantAt(row: number, column: number): Cell {
    this.assertInRange(row, column);
    return this.grid[row][column];
  }

  isColumnFull(column: number): boolean {
    return this.occupantAt(0, column) !== EMPTY;
  }

  openColumns(): number[] {
    const open: number[] = [];
    for (let c = 0; c < this.columns; c++) {
      if (this.grid[0][c] === EMPTY) {
        open.push(c);
      }
    }
    return open;
  }

  /** The board is full when the top row has no empty cells. */
  isFull(): boolean {
    return this.grid[0].every((cell) => cell !== EMPTY);
  }

  reset(): void {
    this.grid = Board.emptyGrid(this.rows, this.columns);
  }

  /** Deep copy of the grid */
  cells(): Cell[][] {
    return this.grid.map((r) => [...r]);
  }
}
