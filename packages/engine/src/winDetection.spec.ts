import { strict as assert } from "assert";
import type { Cell } from "@dropfour/core";
import {
  findWinningLine,
  findHorizontalLine,
  findVerticalLine,
  findDiagonalDownRightLine,
  findDiagonalDownLeftLine,
} from "./winDetection.js";

/** Build a grid from rows of "A", "B" and "." (empty), top row first. */
function grid(rows: string[]): Cell[][] {
  return rows.map((row) =>
    row.split("").map((ch): Cell => (ch === "A" || ch === "B" ? ch : ""))
  );
}

describe("win detection", () => {
  it("should find nothing on an empty board", () => {
    const cells = grid([".......", ".......", ".......", ".......", ".......", "......."]);
    assert.equal(findWinningLine(cells), null);
  });

  describe("horizontal", () => {
    it("should return four cells of the bottom row left to right", () => {
      const cells = grid([
        ".......",
        ".......",
        ".......",
        ".......",
        "BBB....",
        "AAAA...",
      ]);
      assert.deepEqual(findHorizontalLine(cells), {
        direction: "horizontal",
        cells: [
          { row: 5, column: 0 },
          { row: 5, column: 1 },
          { row: 5, column: 2 },
          { row: 5, column: 3 },
        ],
      });
    });

    it("should find a run that starts mid-row", () => {
      const cells = grid([".......", ".......", ".BBBB..", ".......", ".......", "......."]);
      assert.deepEqual(findHorizontalLine(cells)?.cells, [
        { row: 2, column: 1 },
        { row: 2, column: 2 },
        { row: 2, column: 3 },
        { row: 2, column: 4 },
      ]);
    });

    it("should reset the run when another player interrupts it", () => {
      const cells = grid([".......", ".......", ".......", ".......", ".......", "AAABAAA"]);
      assert.equal(findHorizontalLine(cells), null);
      assert.equal(findWinningLine(cells), null);
    });
  });

  describe("vertical", () => {
    it("should return four cells of one column top to bottom", () => {
      const cells = grid([
        ".......",
        ".......",
        "..B....",
        "..B....",
        "..B....",
        "A.BAA..",
      ]);
      assert.deepEqual(findVerticalLine(cells), {
        direction: "vertical",
        cells: [
          { row: 2, column: 2 },
          { row: 3, column: 2 },
          { row: 4, column: 2 },
          { row: 5, column: 2 },
        ],
      });
    });

    it("should not count three in a column", () => {
      const cells = grid(["....", "A...", "A...", "A..."]);
      assert.equal(findVerticalLine(cells), null);
    });
  });

  describe("diagonal", () => {
    it("should find a rising diagonal as a down-left line", () => {
      const cells = grid([
        ".......",
        ".......",
        "...A...",
        "..AA...",
        ".AAB...",
        "ABBB..B",
      ]);
      assert.equal(findDiagonalDownRightLine(cells), null);
      assert.deepEqual(findWinningLine(cells), {
        direction: "diagonal_down_left",
        cells: [
          { row: 2, column: 3 },
          { row: 3, column: 2 },
          { row: 4, column: 1 },
          { row: 5, column: 0 },
        ],
      });
    });

    it("should find a falling diagonal as a down-right line", () => {
      const cells = grid([
        ".......",
        ".B.....",
        ".AB....",
        ".ABB...",
        ".AABB..",
        "AABAA..",
      ]);
      assert.deepEqual(findDiagonalDownRightLine(cells), {
        direction: "diagonal_down_right",
        cells: [
          { row: 1, column: 1 },
          { row: 2, column: 2 },
          { row: 3, column: 3 },
          { row: 4, column: 4 },
        ],
      });
      assert.equal(findDiagonalDownLeftLine(cells), null);
    });

    it("should work on the smallest allowed board", () => {
      const cells = grid(["B...", "AB..", "AAB.", "AAAB"]);
      assert.deepEqual(findWinningLine(cells)?.direction, "diagonal_down_right");
    });
  });

  it("should report rows before columns when both exist", () => {
    const cells = grid(["....", "A...", "A...", "AAAA"]);
    assert.equal(findWinningLine(cells)?.direction, "horizontal");
  });
});
