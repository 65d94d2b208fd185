import React from "react";
import { Text } from "ink";
import { symbols } from "../theme.js";
import { cursorOffset } from "../cursor.js";

/** A checker in the current player's color hovering over the selected column. */
export function ColumnCursor({ column, color }: { column: number; color: string }) {
  return (
    <Text>
      {" ".repeat(cursorOffset(column))}
      <Text color={color} bold>
        {symbols.checker}
      </Text>
    </Text>
  );
}
