export interface ConfigData {
  rows: string;
  columns: string;
  /** Checker color for player 1 (any Ink color name or #hex) */
  playerOneColor: string;
  playerTwoColor: string;
  logLevel: string;
  /** Log file path; empty means dropfour.log in the config directory */
  logFile: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "rows",
  "columns",
  "playerOneColor",
  "playerTwoColor",
  "logLevel",
  "logFile",
];

export const DEFAULTS: ConfigData = {
  rows: "6",
  columns: "7",
  playerOneColor: "red",
  playerTwoColor: "black",
  logLevel: "info",
  logFile: "",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  rows: "DROPFOUR_ROWS",
  columns: "DROPFOUR_COLUMNS",
  playerOneColor: "DROPFOUR_P1_COLOR",
  playerTwoColor: "DROPFOUR_P2_COLOR",
  logLevel: "LOG_LEVEL",
  logFile: "DROPFOUR_LOG_FILE",
};
