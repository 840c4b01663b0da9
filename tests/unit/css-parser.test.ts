import { describe, expect, it } from 'vitest';

import { parseDeclaration, parseInlineStyle, parseStylesheet, splitTopLevel } from '../../src/css/css-parser.js';

describe('css parsing helpers', () => {
  it('splits only on top-level separators', () => {
    expect(splitTopLevel('a;b(c;d);"e;f"', ';')).toEqual(['a', 'b(c;d)', '"e;f"']);
    expect(splitTopLevel('a(b', ';')).toBeUndefined();
    expect(splitTopLevel('a)b', ';')).toBeUndefined();
    expect(splitTopLevel('"open', ';')).toBeUndefined();
  });

  it('normalizes declarations and strips !important', () => {
    expect(parseDeclaration('  Color : Red !important')).toEqual({ property: 'color', value: 'Red', important: true });
    expect(parseDeclaration('--Brand-Color: #fff')).toEqual({ property: '--Brand-Color', value: '#fff', important: false });
    expect(parseDeclaration('--empty:')).toEqual({ property: '--empty', value: '', important: false });
    expect(parseDeclaration('color:')).toBeUndefined();
    expect(parseDeclaration('&:hover')).toBeUndefined();
  });

  it('parses inline styles and fails the whole attribute on a bad declaration', () => {
    const parsed = parseInlineStyle('position: absolute; top: 0;');
    expect(parsed).toEqual({
      ok: true,
      value: [
        { property: 'position', value: 'absolute', important: false },
        { property: 'top', value: '0', important: false }
      ]
    });

    expect(parseInlineStyle('color: (red')).toEqual({ ok: false, reason: 'unbalanced parentheses or quotes' });
    expect(parseInlineStyle('color red; top: 0')).toEqual({ ok: false, reason: 'invalid declaration "color red"' });
  });

  it('flattens grouping at-rules and skips the others', () => {
    const sheet = [
      '/* tokens */',
      ':root { --brand: #0af; }',
      '@media (prefers-color-scheme: dark) { [data-theme="dark"] { --brand: #fff; } }',
      '@font-face { font-family: X; }',
      '.a, .b >  .c { position: absolute; bad; }'
    ].join('\n');

    const parsed = parseStylesheet(sheet);

    expect(parsed).toEqual({
      ok: true,
      value: [
        { selectors: [':root'], declarations: [{ property: '--brand', value: '#0af', important: false }] },
        {
          selectors: ['.a', '.b > .c'],
          declarations: [{ property: 'position', value: 'absolute', important: false }]
        },
        {
          selectors: ['[data-theme="dark"]'],
          declarations: [{ property: '--brand', value: '#fff', important: false }]
        }
      ]
    });
  });

  it('drops nested blocks but keeps the surrounding declarations', () => {
    const parsed = parseStylesheet('.card { color: red; &:hover { color: blue; } padding: 0 }');

    expect(parsed).toEqual({
      ok: true,
      value: [
        {
          selectors: ['.card'],
          declarations: [
            { property: 'color', value: 'red', important: false },
            { property: 'padding', value: '0', important: false }
          ]
        }
      ]
    });
  });

  it('fails sheets with unbalanced structure', () => {
    expect(parseStylesheet('.a { color: red;')).toEqual({ ok: false, reason: 'unclosed "{" block' });
    expect(parseStylesheet('.a {} }')).toEqual({ ok: false, reason: 'unexpected "}"' });
    expect(parseStylesheet('.a { color: red } /* open')).toEqual({ ok: false, reason: 'unterminated comment' });
    expect(parseStylesheet('.a[title="x] {}')).toEqual({ ok: false, reason: 'unterminated string' });
  });
});
