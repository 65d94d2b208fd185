import { GameError, resolveSettings, type GameSettings } from "@dropfour/core";
import type { ConfigData } from "./config/index.js";
import { parseLogLevel } from "./logger.js";

/** Board background and empty-hole colors; players may not use either. */
export const BOARD_COLOR = "yellow";
export const EMPTY_COLOR = "gray";

// Every ink/chalk spelling that draws as the board or an empty hole
const RESERVED_NAMES = [
  BOARD_COLOR,
  "yellowbright",
  EMPTY_COLOR,
  "grey",
  "blackbright",
];
const RESERVED_HEX = ["#ffff00", "#808080"];

/** "#ff0", "#FFFF00" and "rgb(255, 255, 0)" all become "#ffff00"; anything else null. */
export function toHexColor(color: string): string | null {
  const value = color.trim().toLowerCase();

  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(value);
  if (short) {
    return `#${short[1]}${short[1]}${short[2]}${short[2]}${short[3]}${short[3]}`;
  }
  if (/^#[0-9a-f]{6}$/.test(value)) {
    return value;
  }

  const rgb = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/.exec(value);
  if (rgb) {
    const channels = [rgb[1], rgb[2], rgb[3]].map((c) => parseInt(c, 10));
    if (channels.some((c) => c > 255)) return null;
    return "#" + channels.map((c) => c.toString(16).padStart(2, "0")).join("");
  }
  return null;
}

export function isReservedColor(color: string): boolean {
  const name = color.trim().toLowerCase();
  if (RESERVED_NAMES.includes(name)) return true;
  const hex = toHexColor(name);
  return hex !== null && RESERVED_HEX.includes(hex);
}

function parseDimension(key: "rows" | "columns", raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new GameError(
      "INVALID_CONFIGURATION",
      `${key} must be a whole number, got "${raw}"`
    );
  }
  return parseInt(trimmed, 10);
}

/**
 * Turn resolved CLI configuration into validated game settings.
 * Throws GameError(INVALID_CONFIGURATION) on the first problem found.
 */
export function toGameSettings(config: ConfigData): GameSettings {
  const rows = parseDimension("rows", config.rows);
  const columns = parseDimension("columns", config.columns);
  const markers: [string, string] = [config.playerOneColor.trim(), config.playerTwoColor.trim()];

  for (const color of markers) {
    if (isReservedColor(color)) {
      throw new GameError(
        "INVALID_CONFIGURATION",
        `Player color "${color}" is reserved for the board (${BOARD_COLOR}) or empty cells (${EMPTY_COLOR})`
      );
    }
  }

  return resolveSettings({ rows, columns, markers });
}

/** Reject a configuration the play command would refuse to start with. */
export function validateConfig(config: ConfigData): void {
  toGameSettings(config);
  parseLogLevel(config.logLevel);
}
