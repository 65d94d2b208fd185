export interface SegmentStyle {
  color?: string;
  backgroundColor?: string;
  bold?: boolean;
  dimColor?: boolean;
}

export interface Segment extends SegmentStyle {
  text: string;
}

/**
 * Split a line of renderBoard() output into styled segments.
 * Text outside <span class="..."> tags gets `baseStyle`; classes inside a
 * tag are looked up in `classStyles` and merged left to right.
 */
export function parseSegments(
  line: string,
  classStyles: Record<string, SegmentStyle>,
  baseStyle: SegmentStyle = {}
): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ ...baseStyle, text: line.slice(lastIndex, match.index) });
    }

    let style: SegmentStyle = {};
    for (const cls of match[1].split(/\s+/)) {
      const clsStyle = classStyles[cls];
      if (clsStyle) {
        style = { ...style, ...clsStyle };
      }
    }

    segments.push({ ...style, text: match[2] });
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ ...baseStyle, text: line.slice(lastIndex) });
  }

  return segments;
}
