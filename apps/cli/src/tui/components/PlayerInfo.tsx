import React from "react";
import { Box, Text } from "ink";
import { colors, symbols } from "../theme.js";

interface PlayerInfoProps {
  label: string;
  color: string;
  isCurrentTurn: boolean;
}

export function PlayerInfo({ label, color, isCurrentTurn }: PlayerInfoProps) {
  return (
    <Box flexDirection="row" gap={1}>
      <Text color={color} bold>
        {symbols.checker}
      </Text>
      <Text color={isCurrentTurn ? colors.primary : colors.dimmed}>
        {label} ({color})
        {isCurrentTurn ? ` ${symbols.turn}` : ""}
      </Text>
    </Box>
  );
}
