const LITERAL_PATTERN = /#(?:[0-9a-f]{8}|[0-9a-f]{6}|[0-9a-f]{3,4})(?![\w-])|\b(?:rgba?|hsla?)\(/gi;
const MASKED_FUNCTION_PATTERN = /\b(?:var|url)\(/gi;

/**
 * Return raw color literals (`#hex`, `rgb()`, `rgba()`, `hsl()`, `hsla()`) found
 * in a CSS value, in order of appearance. Anything inside `var(...)` or
 * `url(...)` is ignored, so token fallbacks and fragment references never count.
 */
export function findColorLiterals(value: string): string[] {
  const masked = maskFunctions(value);
  const literals: string[] = [];

  for (const match of masked.matchAll(LITERAL_PATTERN)) {
    const text = match[0];
    const start = match.index ?? 0;
    if (text.startsWith('#')) {
      literals.push(text);
      continue;
    }

    const close = findClosingParen(masked, start + text.length - 1);
    literals.push(masked.slice(start, close + 1).replace(/\s+/g, ' '));
  }

  return literals;
}

/** True when the value carries at least one color literal. */
export function hasColorLiteral(value: string): boolean {
  return findColorLiterals(value).length > 0;
}

/** Blank out `var(...)` and `url(...)` calls, keeping string offsets intact. */
function maskFunctions(value: string): string {
  let masked = value;
  for (const match of value.matchAll(MASKED_FUNCTION_PATTERN)) {
    const start = match.index ?? 0;
    if (masked.charAt(start) === ' ') {
      continue;
    }
    const close = findClosingParen(masked, start + match[0].length - 1);
    masked = masked.slice(0, start) + ' '.repeat(close + 1 - start) + masked.slice(close + 1);
  }
  return masked;
}

/** Index of the `)` closing the `(` at `open`; the last index when unbalanced. */
function findClosingParen(text: string, open: number): number {
  let depth = 0;
  for (let index = open; index < text.length; index++) {
    const ch = text.charAt(index);
    if (ch === '(') depth++;
    if (ch === ')') {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }
  return text.length - 1;
}
