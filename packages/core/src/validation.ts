import { GameError } from "./errors.js";
import type { GameSettings } from "./types/game.js";

/** Smallest board edge on which four in a row is possible. */
export const MIN_BOARD_SIZE = 4;

export const DEFAULT_SETTINGS: GameSettings = {
  rows: 6,
  columns: 7,
  markers: ["red", "black"],
};

function normalizeMarker(marker: string): string {
  return marker.trim().toLowerCase();
}

/**
 * Returns a list of problems with the given settings, empty if they are valid.
 */
export function getSettingsErrors(settings: GameSettings): string[] {
  const errors: string[] = [];

  for (const key of ["rows", "columns"] as const) {
    const value = settings[key];
    if (!Number.isInteger(value)) {
      errors.push(`${key} must be an integer, got ${value}`);
    } else if (value < MIN_BOARD_SIZE) {
      errors.push(`${key} must be at least ${MIN_BOARD_SIZE}, got ${value}`);
    }
  }

  const [a, b] = settings.markers;
  if (normalizeMarker(a) === "" || normalizeMarker(b) === "") {
    errors.push("player markers must not be empty");
  } else if (normalizeMarker(a) === normalizeMarker(b)) {
    errors.push(`player markers must differ, both are "${a}"`);
  }

  return errors;
}

/**
 * Merge partial settings over the defaults and validate them.
 * Throws GameError(INVALID_CONFIGURATION) listing every problem found.
 */
export function resolveSettings(partial: Partial<GameSettings> = {}): GameSettings {
  const settings: GameSettings = {
    rows: partial.rows ?? DEFAULT_SETTINGS.rows,
    columns: partial.columns ?? DEFAULT_SETTINGS.columns,
    markers: partial.markers
      ? [partial.markers[0], partial.markers[1]]
      : [DEFAULT_SETTINGS.markers[0], DEFAULT_SETTINGS.markers[1]],
  };

  const errors = getSettingsErrors(settings);
  if (errors.length > 0) {
    throw new GameError(
      "INVALID_CONFIGURATION",
      `Invalid game settings: ${errors.join("; ")}`
    );
  }
  return settings;
}
