/**
 * Column cursor movement. Full columns are skipped; the cursor stops at
 * the board edges instead of wrapping.
 */
export function stepCursor(openColumns: number[], from: number, step: 1 | -1): number {
  const candidates = step > 0
    ? openColumns.filter((c) => c > from)
    : openColumns.filter((c) => c < from).reverse();
  return candidates.length > 0 ? candidates[0] : from;
}

/** The open column closest to `column`, preferring the left one on ties. */
export function nearestOpenColumn(openColumns: number[], column: number): number {
  let best = column;
  let bestDistance = Infinity;
  for (const open of openColumns) {
    const distance = Math.abs(open - column);
    if (distance < bestDistance) {
      best = open;
      bestDistance = distance;
    }
  }
  return best;
}

/** Character offset of a column's centre in a rendered board line. */
export function cursorOffset(column: number): number {
  return column * 4 + 2;
}
