import { EMPTY } from "@dropfour/core";
import type { Cell, Coordinate, LineDirection, WinningLine } from "@dropfour/core";

const LINE_LENGTH = 4;

function line(direction: LineDirection, cells: Coordinate[]): WinningLine {
  return { direction, cells };
}

/**
 * Scan each row left to right, counting how many times a cell repeats its
 * left neighbour. A count of 3 means four equal checkers.
 */
export function findHorizontalLine(cells: Cell[][]): WinningLine | null {
  for (let row = 0; row < cells.length; row++) {
    let run = 0;
    for (let column = 1; column < cells[row].length; column++) {
      const cell = cells[row][column];
      if (cell !== EMPTY && cell === cells[row][column - 1]) {
        run++;
      } else {
        run = 0;
      }
      if (run === LINE_LENGTH - 1) {
        const coords: Coordinate[] = [];
        for (let c = column - run; c <= column; c++) {
          coords.push({ row, column: c });
        }
        return line("horizontal", coords);
      }
    }
  }
  return null;
}

/** Same run counting as findHorizontalLine, down each column. */
export function findVerticalLine(cells: Cell[][]): WinningLine | null {
  const rows = cells.length;
  const columns = rows > 0 ? cells[0].length : 0;

  for (let column = 0; column < columns; column++) {
    let run = 0;
    for (let row = 1; row < rows; row++) {
      const cell = cells[row][column];
      if (cell !== EMPTY && cell === cells[row - 1][column]) {
        run++;
      } else {
        run = 0;
      }
      if (run === LINE_LENGTH - 1) {
        const coords: Coordinate[] = [];
        for (let r = row - run; r <= row; r++) {
          coords.push({ row: r, column });
        }
        return line("vertical", coords);
      }
    }
  }
  return null;
}

/**
 * Check every cell together with the three cells extending from it by
 * (dRow, dColumn). Cells are visited top to bottom, left to right.
 */
function findDiagonalLine(
  cells: Cell[][],
  direction: LineDirection,
  dRow: number,
  dColumn: number
): WinningLine | null {
  const rows = cells.length;
  const columns = rows > 0 ? cells[0].length : 0;

  for (let row = 0; row < rows; row++) {
    for (let column = 0; column < columns; column++) {
      const cell = cells[row][column];
      if (cell === EMPTY) continue;

      const coords: Coordinate[] = [{ row, column }];
      for (let step = 1; step < LINE_LENGTH; step++) {
        const r = row + dRow * step;
        const c = column + dColumn * step;
        if (r < 0 || r >= rows || c < 0 || c >= columns) break;
        if (cells[r][c] !== cell) break;
        coords.push({ row: r, column: c });
      }
      if (coords.length === LINE_LENGTH) {
        return line(direction, coords);
      }
    }
  }
  return null;
}

export function findDiagonalDownRightLine(cells: Cell[][]): WinningLine | null {
  return findDiagonalLine(cells, "diagonal_down_right", 1, 1);
}

export function findDiagonalDownLeftLine(cells: Cell[][]): WinningLine | null {
  return findDiagonalLine(cells, "diagonal_down_left", 1, -1);
}

/**
 * Look for any four in a row on the board.
 * Scans run in a fixed order (rows, columns, down-right diagonals,
 * down-left diagonals) and the first line found is returned.
 */
export function findWinningLine(cells: Cell[][]): WinningLine | null {
  return (
    findHorizontalLine(cells) ??
    findVerticalLine(cells) ??
    findDiagonalDownRightLine(cells) ??
    findDiagonalDownLeftLine(cells)
  );
}
