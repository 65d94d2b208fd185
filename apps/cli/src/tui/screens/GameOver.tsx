import React from "react";
import { Box, Text, useInput } from "ink";
import type { GameSnapshot } from "@dropfour/core";
import { ConnectFourUI } from "@dropfour/game-ui";
import { colors, symbols } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { gameOverAction } from "../keys.js";

interface GameOverProps {
  snapshot: GameSnapshot;
  markers: [string, string];
  onPlayAgain: () => void;
  onQuit: () => void;
}

export function GameOver({ snapshot, markers, onPlayAgain, onQuit }: GameOverProps) {
  const phase = snapshot.phase;
  const resultColor =
    phase.status === "won"
      ? phase.winner === "A" ? markers[0] : markers[1]
      : colors.secondary;

  useInput((input) => {
    const action = gameOverAction(input);
    if (action === "play_again") onPlayAgain();
    if (action === "quit") onQuit();
  });

  const banner = symbols.rule.repeat(19);

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color={colors.primary} bold>{banner}</Text>
      <Text color={colors.primary} bold>{"     GAME OVER     "}</Text>
      <Text color={colors.primary} bold>{banner}</Text>

      <Text>{""}</Text>

      <Text color={resultColor} bold>
        {ConnectFourUI.renderStatus(snapshot)}
      </Text>

      <Text>{""}</Text>

      <ColoredBoard html={ConnectFourUI.renderBoard(snapshot)} markers={markers} />

      <Text>{""}</Text>
      <Text color={colors.dimmed}>Moves: {snapshot.turnNumber}</Text>
      <Text color={colors.dimmed}>[r] play again  [q] quit</Text>
    </Box>
  );
}
