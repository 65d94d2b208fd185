import React from "react";
import { Box, Text } from "ink";
import { CELL_CLASSES } from "@dropfour/game-ui";
import { colors } from "../theme.js";
import { parseSegments, type SegmentStyle } from "../segments.js";

/**
 * Maps the classes in ConnectFourUI.renderBoard() output to terminal
 * styles. Checker colors come from the players' configured markers.
 */
export function boardStyles(markers: [string, string]): Record<string, SegmentStyle> {
  return {
    [CELL_CLASSES.A]: { color: markers[0] },
    [CELL_CLASSES.B]: { color: markers[1] },
    [CELL_CLASSES.win]: { backgroundColor: colors.highlight, bold: true },
    [CELL_CLASSES.empty]: { color: colors.empty, dimColor: true },
  };
}

/**
 * Renders board markup (with <span class="..."> tags) as colored Ink text.
 * The grid lines are drawn in the board color.
 */
export function ColoredBoard({ html, markers }: { html: string; markers: [string, string] }) {
  const styles = boardStyles(markers);
  const lines = html.split("\n");

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => {
        // The first line is the column header, not part of the grid
        const base: SegmentStyle = i === 0 ? { color: colors.dimmed } : { color: colors.board };
        const segments = parseSegments(line, styles, base);
        return (
          <Text key={i}>
            {segments.map((seg, j) => (
              <Text
                key={j}
                color={seg.color}
                backgroundColor={seg.backgroundColor}
                bold={seg.bold}
                dimColor={seg.dimColor}
              >
                {seg.text}
              </Text>
            ))}
          </Text>
        );
      })}
    </Box>
  );
}
