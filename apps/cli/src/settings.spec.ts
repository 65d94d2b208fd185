import { strict as assert } from "assert";
import { GameError } from "@dropfour/core";
import { DEFAULTS, type ConfigData } from "./config/index.js";
import { isReservedColor, toGameSettings, toHexColor, validateConfig } from "./settings.js";
import { parseLogLevel } from "./logger.js";

function config(overrides: Partial<ConfigData>): ConfigData {
  return { ...DEFAULTS, ...overrides };
}

describe("toGameSettings", () => {
  it("should map the defaults to a 6x7 red/black game", () => {
    assert.deepEqual(toGameSettings(DEFAULTS), {
      rows: 6,
      columns: 7,
      markers: ["red", "black"],
    });
  });

  it("should accept padded numbers and colors", () => {
    const settings = toGameSettings(config({ rows: " 8 ", playerTwoColor: " #00ffff " }));
    assert.equal(settings.rows, 8);
    assert.deepEqual(settings.markers, ["red", "#00ffff"]);
  });

  it("should reject dimensions that are not whole numbers", () => {
    assert.throws(
      () => toGameSettings(config({ columns: "seven" })),
      (err: unknown) =>
        err instanceof GameError &&
        err.code === "INVALID_CONFIGURATION" &&
        err.message === 'columns must be a whole number, got "seven"'
    );
  });

  it("should reject boards smaller than 4", () => {
    assert.throws(() => toGameSettings(config({ rows: "3" })), /rows must be at least 4, got 3/);
  });

  it("should reject the board and empty-cell colors", () => {
    assert.throws(
      () => toGameSettings(config({ playerOneColor: "Yellow" })),
      /Player color "Yellow" is reserved/
    );
    assert.throws(() => toGameSettings(config({ playerTwoColor: "gray" })), /is reserved/);
  });

  it("should reject two players with the same color", () => {
    assert.throws(
      () => toGameSettings(config({ playerOneColor: "blue", playerTwoColor: "Blue" })),
      /player markers must differ/
    );
  });
});

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    assert.doesNotThrow(() => validateConfig(DEFAULTS));
  });

  it("should reject an unknown log level", () => {
    assert.throws(() => validateConfig(config({ logLevel: "verbose" })), {
      message: 'Invalid log level "verbose". Valid levels: trace, debug, info, warn, error, fatal',
    });
  });

  it("should reject a board that is too small", () => {
    assert.throws(() => validateConfig(config({ rows: "3" })), GameError);
  });
});

describe("parseLogLevel", () => {
  it("should normalise case and padding", () => {
    assert.equal(parseLogLevel(" DEBUG "), "debug");
  });
});

describe("reserved colors", () => {
  it("should catch the board color in any spelling ink draws", () => {
    assert.equal(isReservedColor("yellowBright"), true);
    assert.equal(isReservedColor("#FF0"), true);
    assert.equal(isReservedColor("#ffff00"), true);
    assert.equal(isReservedColor("rgb(255, 255, 0)"), true);
    assert.equal(isReservedColor("blackBright"), true);
    assert.equal(isReservedColor("#808080"), true);
  });

  it("should leave other colors alone", () => {
    assert.equal(isReservedColor("red"), false);
    assert.equal(isReservedColor("#ffff01"), false);
    assert.equal(isReservedColor("black"), false);
  });

  it("should refuse a hex yellow for a player", () => {
    assert.throws(
      () => toGameSettings(config({ playerTwoColor: "#FFFF00" })),
      /Player color "#FFFF00" is reserved/
    );
  });

  it("should normalise hex and rgb notations", () => {
    assert.equal(toHexColor(" #AbC "), "#aabbcc");
    assert.equal(toHexColor("rgb(0,128,255)"), "#0080ff");
    assert.equal(toHexColor("rgb(256,0,0)"), null);
    assert.equal(toHexColor("yellow"), null);
  });
});
