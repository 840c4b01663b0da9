// Small CSS parsing helpers used by the rules. They are not a general CSS
// parser: enough structure to read declarations and plain selectors.

/** One `property: value` pair. Custom property names keep their case. */
export interface CssDeclaration {
  property: string;
  value: string;
  important: boolean;
}

/** A style rule with its comma-separated selector list already split. */
export interface CssStyleRule {
  selectors: string[];
  declarations: CssDeclaration[];
}

/** Parse result that never throws; rules turn failures into soft skips. */
export type CssParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

/** At-rules whose blocks contain ordinary style rules. */
const GROUPING_AT_RULES = new Set(['media', 'supports', 'layer', 'container', 'document', 'scope']);

const PROPERTY_NAME = /^(?:--[\w-]+|-?[a-z][a-z0-9-]*)$/i;
const IMPORTANT_SUFFIX = /!\s*important\s*$/i;

/**
 * Split `text` on `separator`, ignoring separators nested in parentheses or
 * quotes. Returns `undefined` when parentheses or quotes are unbalanced.
 */
export function splitTopLevel(text: string, separator: string): string[] | undefined {
  const out: string[] = [];
  let current = '';
  let depth = 0;
  let quote: string | undefined;

  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === '(') depth++;
    if (ch === ')') {
      depth--;
      if (depth < 0) return undefined;
    }
    if (ch === separator && depth === 0) {
      out.push(current);
      current = '';
      continue;
    }
    current += ch;
  }

  if (quote || depth !== 0) {
    return undefined;
  }
  out.push(current);
  return out;
}

/** Parse one declaration segment; `undefined` when it is not a declaration. */
export function parseDeclaration(segment: string): CssDeclaration | undefined {
  const colon = segment.indexOf(':');
  if (colon === -1) {
    return undefined;
  }

  const rawProperty = segment.slice(0, colon).trim();
  if (!PROPERTY_NAME.test(rawProperty)) {
    return undefined;
  }

  const isCustom = rawProperty.startsWith('--');
  let value = segment.slice(colon + 1).trim();
  const important = IMPORTANT_SUFFIX.test(value);
  if (important) {
    value = value.replace(IMPORTANT_SUFFIX, '').trim();
  }
  if (!isCustom && value.length === 0) {
    return undefined;
  }

  return {
    property: isCustom ? rawProperty : rawProperty.toLowerCase(),
    value,
    important
  };
}

/** Parse a `style` attribute. Any malformed declaration fails the whole attribute. */
export function parseInlineStyle(text: string): CssParseResult<CssDeclaration[]> {
  const segments = splitTopLevel(text, ';');
  if (!segments) {
    return { ok: false, reason: 'unbalanced parentheses or quotes' };
  }

  const declarations: CssDeclaration[] = [];
  for (const segment of segments) {
    if (segment.trim().length === 0) {
      continue;
    }
    const declaration = parseDeclaration(segment);
    if (!declaration) {
      return { ok: false, reason: `invalid declaration "${segment.trim()}"` };
    }
    declarations.push(declaration);
  }

  return { ok: true, value: declarations };
}

/**
 * Parse stylesheet text into a flat list of style rules. Grouping at-rules are
 * flattened into their children; other at-rules are skipped. Invalid
 * declarations inside a rule are dropped, unbalanced braces fail the sheet.
 */
export function parseStylesheet(text: string): CssParseResult<CssStyleRule[]> {
  const stripped = stripComments(text);
  if (stripped === undefined) {
    return { ok: false, reason: 'unterminated comment' };
  }

  const rules: CssStyleRule[] = [];
  const pending: string[] = [stripped];
  while (pending.length > 0) {
    const body = pending.shift();
    if (body === undefined) {
      break;
    }
    const failure = readRuleList(body, rules, pending);
    if (failure) {
      return { ok: false, reason: failure };
    }
  }

  return { ok: true, value: rules };
}

/** Read one level of rules; grouping blocks are queued for a later pass. */
function readRuleList(text: string, rules: CssStyleRule[], pending: string[]): string | undefined {
  let prelude = '';
  let index = 0;

  while (index < text.length) {
    const ch = text.charAt(index);

    if (ch === '"' || ch === "'") {
      const end = text.indexOf(ch, index + 1);
      if (end === -1) {
        return 'unterminated string';
      }
      prelude += text.slice(index, end + 1);
      index = end + 1;
      continue;
    }

    if (ch === '}') {
      return 'unexpected "}"';
    }

    if (ch === ';') {
      prelude = '';
      index++;
      continue;
    }

    if (ch === '{') {
      const close = findBlockEnd(text, index);
      if (close === -1) {
        return 'unclosed "{" block';
      }
      handleBlock(prelude.trim(), text.slice(index + 1, close), rules, pending);
      prelude = '';
      index = close + 1;
      continue;
    }

    prelude += ch;
    index++;
  }

  return undefined;
}

function handleBlock(prelude: string, body: string, rules: CssStyleRule[], pending: string[]): void {
  if (prelude.startsWith('@')) {
    const name = /^@([\w-]+)/.exec(prelude)?.[1]?.toLowerCase();
    if (name && GROUPING_AT_RULES.has(name)) {
      pending.push(body);
    }
    return;
  }

  const selectors = (splitTopLevel(prelude, ',') ?? [prelude])
    .map((selector) => selector.trim().replace(/\s+/g, ' '))
    .filter((selector) => selector.length > 0);
  if (selectors.length === 0) {
    return;
  }

  const declarations = (splitTopLevel(removeNestedBlocks(body), ';') ?? [])
    .map(parseDeclaration)
    .filter((declaration): declaration is CssDeclaration => declaration !== undefined);
  rules.push({ selectors, declarations });
}

/** Index of the `}` matching the `{` at `open`, or -1. */
function findBlockEnd(text: string, open: number): number {
  let depth = 0;
  let quote: string | undefined;
  for (let index = open; index < text.length; index++) {
    const ch = text.charAt(index);
    if (quote) {
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return index;
      }
    }
  }
  return -1;
}

/** Drop nested `{...}` blocks (CSS nesting) from a rule body. */
function removeNestedBlocks(body: string): string {
  let out = '';
  let depth = 0;
  for (const ch of body) {
    if (ch === '{') {
      depth++;
      out += ';';
      continue;
    }
    if (ch === '}') {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth === 0) {
      out += ch;
    }
  }
  return out;
}

/** Remove `/* ... *\/` comments; `undefined` when one is left open. */
function stripComments(text: string): string | undefined {
  let out = '';
  let index = 0;
  while (index < text.length) {
    const start = text.indexOf('/*', index);
    if (start === -1) {
      out += text.slice(index);
      break;
    }
    const end = text.indexOf('*/', start + 2);
    if (end === -1) {
      return undefined;
    }
    out += `${text.slice(index, start)} `;
    index = end + 2;
  }
  return out;
}
