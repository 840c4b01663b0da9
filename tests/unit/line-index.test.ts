import { describe, expect, it } from 'vitest';

import { getLineOffsets, positionAt } from '../../src/parser/line-index.js';

describe('line index', () => {
  it('records a line start after every LF, CRLF and lone CR', () => {
    expect(getLineOffsets('a\nbc\r\nd\re')).toEqual([0, 2, 6, 8]);
    expect(getLineOffsets('')).toEqual([0]);
  });

  it('resolves offsets to 1-based line and column', () => {
    const offsets = getLineOffsets('a\nbc\r\nd\re');

    expect(positionAt(offsets, 0)).toEqual({ line: 1, column: 1 });
    expect(positionAt(offsets, 3)).toEqual({ line: 2, column: 2 });
    expect(positionAt(offsets, 6)).toEqual({ line: 3, column: 1 });
    expect(positionAt(offsets, 9)).toEqual({ line: 4, column: 2 });
  });
});
