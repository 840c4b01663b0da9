/** Offsets of every line start in `text`; `\r\n`, `\r` and `\n` all end a line. */
export function getLineOffsets(text: string): number[] {
  const lineOffsets: number[] = [0];
  for (let index = 0; index < text.length; index++) {
    const ch = text.charAt(index);
    if (ch === '\r' && text.charAt(index + 1) === '\n') {
      index++;
    }
    if (ch === '\r' || ch === '\n') {
      lineOffsets.push(index + 1);
    }
  }
  return lineOffsets;
}

/** Resolve an absolute offset to 1-based line and column by binary search. */
export function positionAt(lineOffsets: readonly number[], offset: number): { line: number; column: number } {
  let low = 0;
  let high = lineOffsets.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    if ((lineOffsets[mid] ?? 0) > offset) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  // `low` is the first line starting after `offset`.
  const line = Math.max(0, low - 1);
  return {
    line: line + 1,
    column: offset - (lineOffsets[line] ?? 0) + 1
  };
}
