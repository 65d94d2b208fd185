import React, { useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { GameSnapshot } from "@dropfour/core";
import { ConnectFourUI } from "@dropfour/game-ui";
import { colors } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { ColumnCursor } from "../components/ColumnCursor.js";
import { PlayerInfo } from "../components/PlayerInfo.js";
import { nearestOpenColumn, stepCursor } from "../cursor.js";
import { isQuitKey } from "../keys.js";

interface GameBoardProps {
  snapshot: GameSnapshot;
  markers: [string, string];
  /** Message from the last rejected move, or "" */
  notice: string;
  onDrop: (column: number) => void;
  onQuit: () => void;
}

export function GameBoard({ snapshot, markers, notice, onDrop, onQuit }: GameBoardProps) {
  const [cursor, setCursor] = useState(() =>
    nearestOpenColumn(snapshot.openColumns, Math.floor(snapshot.columns / 2))
  );

  // Slide off a column as soon as it fills up
  useEffect(() => {
    if (!snapshot.openColumns.includes(cursor)) {
      setCursor(nearestOpenColumn(snapshot.openColumns, cursor));
    }
  }, [snapshot, cursor]);

  useInput((input, key) => {
    if (isQuitKey(input)) {
      onQuit();
      return;
    }
    if (key.leftArrow) {
      setCursor((prev) => stepCursor(snapshot.openColumns, prev, -1));
      return;
    }
    if (key.rightArrow) {
      setCursor((prev) => stepCursor(snapshot.openColumns, prev, 1));
      return;
    }
    if (key.return) {
      onDrop(cursor);
      return;
    }

    const column = ConnectFourUI.parseInput(input, snapshot);
    if (column !== null) {
      setCursor(column);
      onDrop(column);
    }
  });

  const turnColor = snapshot.currentPlayer === "A" ? markers[0] : markers[1];

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <PlayerInfo
        label={ConnectFourUI.playerLabels[0]}
        color={markers[0]}
        isCurrentTurn={snapshot.currentPlayer === "A"}
      />
      <PlayerInfo
        label={ConnectFourUI.playerLabels[1]}
        color={markers[1]}
        isCurrentTurn={snapshot.currentPlayer === "B"}
      />

      <Text>{""}</Text>

      <ColumnCursor column={cursor} color={turnColor} />
      <ColoredBoard html={ConnectFourUI.renderBoard(snapshot)} markers={markers} />

      <Text>{""}</Text>

      <Text color={turnColor} bold>
        {ConnectFourUI.renderStatus(snapshot)}
      </Text>
      {notice && <Text color={colors.error}>{notice}</Text>}
      <Text color={colors.dimmed}>{ConnectFourUI.inputHint(snapshot)}</Text>
      <Text color={colors.dimmed}>[←/→] move  [enter] drop  [q] quit</Text>
    </Box>
  );
}
