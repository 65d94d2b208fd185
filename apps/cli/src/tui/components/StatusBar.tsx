import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  rows: number;
  columns: number;
  logPath: string;
}

export function StatusBar({ rows, columns, logPath }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        DROPFOUR v0.1.0
      </Text>
      <Text color={colors.dimmed}>
        {rows}x{columns} | log: {logPath}
      </Text>
    </Box>
  );
}
