import { BOARD_COLOR, EMPTY_COLOR } from "../settings.js";

export const colors = {
  primary: "#00ff41",      // Matrix green
  secondary: "#ffb000",    // Amber
  dimmed: "#666666",
  error: "#ff3333",
  border: "#333333",
  board: BOARD_COLOR,
  empty: EMPTY_COLOR,
  highlight: "cyan",
};

export const symbols = {
  checker: "●",
  turn: "◀",
  rule: "═",
};
