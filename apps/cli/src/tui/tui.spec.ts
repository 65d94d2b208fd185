import { strict as assert } from "assert";
import { cursorOffset, nearestOpenColumn, stepCursor } from "./cursor.js";
import { gameOverAction, isQuitKey } from "./keys.js";
import { parseSegments } from "./segments.js";

describe("column cursor", () => {
  it("should move to the next open column in either direction", () => {
    assert.equal(stepCursor([0, 1, 2, 3], 1, 1), 2);
    assert.equal(stepCursor([0, 1, 2, 3], 1, -1), 0);
  });

  it("should skip full columns", () => {
    assert.equal(stepCursor([0, 3, 6], 0, 1), 3);
    assert.equal(stepCursor([0, 3, 6], 6, -1), 3);
  });

  it("should stay put at the edges", () => {
    assert.equal(stepCursor([0, 1, 2], 2, 1), 2);
    assert.equal(stepCursor([0, 1, 2], 0, -1), 0);
  });

  it("should find the nearest open column, left first on ties", () => {
    assert.equal(nearestOpenColumn([0, 1, 2, 3, 4, 5, 6], 3), 3);
    assert.equal(nearestOpenColumn([1, 5], 3), 1);
    assert.equal(nearestOpenColumn([0, 5], 4), 5);
    assert.equal(nearestOpenColumn([], 4), 4);
  });

  it("should line up with the centre of each board cell", () => {
    const cellLine = "│ a │ b │ c │";
    assert.equal(cellLine[cursorOffset(0)], "a");
    assert.equal(cellLine[cursorOffset(2)], "c");
  });
});

describe("parseSegments", () => {
  const styles = {
    "c4-a": { color: "red" },
    "c4-win": { backgroundColor: "cyan", bold: true },
  };

  it("should style text inside spans and leave the frame to the base style", () => {
    const segments = parseSegments('│ <span class="c4-a">●</span> │', styles, { color: "yellow" });
    assert.deepEqual(segments, [
      { color: "yellow", text: "│ " },
      { color: "red", text: "●" },
      { color: "yellow", text: " │" },
    ]);
  });

  it("should merge every class on a span", () => {
    const [segment] = parseSegments('<span class="c4-a c4-win">●</span>', styles);
    assert.deepEqual(segment, { color: "red", backgroundColor: "cyan", bold: true, text: "●" });
  });

  it("should pass plain lines through unchanged", () => {
    assert.deepEqual(parseSegments("  1   2 ", styles), [{ text: "  1   2 " }]);
  });
});

describe("key bindings", () => {
  it("should map r and q on the game over screen in either case", () => {
    assert.equal(gameOverAction("r"), "play_again");
    assert.equal(gameOverAction("R"), "play_again");
    assert.equal(gameOverAction("q"), "quit");
    assert.equal(gameOverAction("Q"), "quit");
    assert.equal(gameOverAction("x"), null);
    assert.equal(gameOverAction(""), null);
  });

  it("should quit a running game on q or Q only", () => {
    assert.equal(isQuitKey("Q"), true);
    assert.equal(isQuitKey("q"), true);
    assert.equal(isQuitKey("1"), false);
  });
});
