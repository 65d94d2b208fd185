import type { Coordinate, GameSnapshot, LineDirection, Player } from "@dropfour/core";
import type { GameUISpec } from "@dropfour/engine";

/** CSS-style classes emitted by renderBoard, mapped to colors by each shell */
export const CELL_CLASSES = {
  A: "c4-a",
  B: "c4-b",
  win: "c4-win",
  empty: "c4-empty",
} as const;

const CHECKER = "●";
const CELL_RULE = "───";

const DIRECTION_LABELS: Record<LineDirection, string> = {
  horizontal: "horizontal",
  vertical: "vertical",
  diagonal_down_right: "diagonal",
  diagonal_down_left: "diagonal",
};

const PLAYER_LABELS: [string, string] = ["Player 1", "Player 2"];

function playerLabel(player: Player): string {
  return player === "A" ? PLAYER_LABELS[0] : PLAYER_LABELS[1];
}

function winningCells(snapshot: GameSnapshot): Coordinate[] {
  return snapshot.phase.status === "won" ? snapshot.phase.line.cells : [];
}

function renderCell(snapshot: GameSnapshot, row: number, column: number, winners: Coordinate[]): string {
  const cell = snapshot.cells[row][column];
  if (cell === "") {
    // Dim column number as a hint; wide boards fall back to a dot
    const hint = column < 9 ? String(column + 1) : "·";
    return ` <span class="${CELL_CLASSES.empty}">${hint}</span> `;
  }
  const isWinner = winners.some((c) => c.row === row && c.column === column);
  const classes = isWinner ? `${CELL_CLASSES[cell]} ${CELL_CLASSES.win}` : CELL_CLASSES[cell];
  return ` <span class="${classes}">${CHECKER}</span> `;
}

function rule(columns: number, left: string, middle: string, right: string): string {
  return left + new Array(columns).fill(CELL_RULE).join(middle) + right;
}

export const ConnectFourUI: GameUISpec = {
  playerLabels: PLAYER_LABELS,

  inputHint(snapshot: GameSnapshot): string {
    return `Enter column 1-${snapshot.columns} to drop a checker`;
  },

  renderBoard(snapshot: GameSnapshot): string {
    const winners = winningCells(snapshot);
    const lines: string[] = [];

    // Column headers, centred over each cell
    const header = new Array(snapshot.columns)
      .fill(0)
      .map((_, i) => String(i + 1).padStart(2).padEnd(3))
      .join(" ");
    lines.push(" " + header);

    lines.push(rule(snapshot.columns, "┌", "┬", "┐"));

    // Row 0 is the top of the board
    for (let r = 0; r < snapshot.rows; r++) {
      const cells: string[] = [];
      for (let c = 0; c < snapshot.columns; c++) {
        cells.push(renderCell(snapshot, r, c, winners));
      }
      lines.push("│" + cells.join("│") + "│");

      if (r < snapshot.rows - 1) {
        lines.push(rule(snapshot.columns, "├", "┼", "┤"));
      }
    }

    lines.push(rule(snapshot.columns, "└", "┴", "┘"));

    return lines.join("\n");
  },

  renderStatus(snapshot: GameSnapshot): string {
    const phase = snapshot.phase;
    if (phase.status === "won") {
      return `${playerLabel(phase.winner)} wins! (${DIRECTION_LABELS[phase.line.direction]})`;
    }
    if (phase.status === "tied") {
      return "It's a tie!";
    }
    return `${playerLabel(snapshot.currentPlayer)}'s turn...`;
  },

  parseInput(raw: string, snapshot: GameSnapshot): number | null {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) return null;
    const num = parseInt(trimmed, 10);
    if (num >= 1 && num <= snapshot.columns) {
      return num - 1;
    }
    return null;
  },

  formatMove(column: number): string {
    return `column ${column + 1}`;
  },

  getPlayerLabel(player: Player): string {
    return playerLabel(player);
  },
};
