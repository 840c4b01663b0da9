import { Parser } from 'htmlparser2';

import {
  DOCUMENT_NODE_NAME,
  type HtmlDocument,
  type HtmlElementNode,
  type HtmlLocation,
  type HtmlNode
} from '../core/document.js';
import { getLineOffsets, positionAt } from './line-index.js';

/** Default nesting bound; deeper markup is rejected rather than traversed. */
export const DEFAULT_MAX_DEPTH = 512;

/** Elements the tokenizer closes on its own; they never take children. */
const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'basefont',
  'br',
  'col',
  'command',
  'embed',
  'frame',
  'hr',
  'image',
  'img',
  'input',
  'isindex',
  'keygen',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr'
]);

/** Positive whole depth bound; anything else falls back to {@link DEFAULT_MAX_DEPTH}. */
export function normalizeMaxDepth(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return DEFAULT_MAX_DEPTH;
  }
  return Math.floor(value);
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class ParseError extends Error {
  readonly source?: { name?: string; line: number; column: number };

  constructor(message: string, source?: { name?: string; line: number; column: number }) {
    super(message);
    this.name = 'ParseError';
    this.source = source;
  }
}

/** Options accepted by {@link parseHtmlToAst}. */
export interface HtmlParseOptions {
  sourceName?: string;
  maxDepth?: number;
}

/** Mutable node used while SAX callbacks are still building the tree. */
interface OpenElement {
  node: HtmlElementNode;
  /** Where children go: `children`, or `content` for `<template>`. */
  target: HtmlNode[];
  childNameCount: Map<string, number>;
}

/**
 * Parse HTML into a lightweight tree with locations and stable XPath-like paths.
 *
 * Every non-void element must be closed explicitly or self-closed; anything the
 * tokenizer has to close implicitly (mismatched end tags, unterminated elements,
 * inferred optional end tags) is reported as a {@link ParseError}.
 */
export function parseHtmlToAst(source: string, options: HtmlParseOptions = {}): HtmlDocument {
  const maxDepth = normalizeMaxDepth(options.maxDepth);
  const lineOffsets = getLineOffsets(source);
  const parents = new WeakMap<HtmlElementNode, HtmlElementNode>();

  const root: HtmlElementNode = {
    kind: 'element',
    name: DOCUMENT_NODE_NAME,
    attributes: {},
    children: [],
    location: { line: 1, column: 1, offset: 0 },
    path: '/',
    order: -1,
    selfClosing: false
  };
  const stack: OpenElement[] = [{ node: root, target: root.children, childNameCount: new Map() }];

  let elementCount = 0;
  let parseError: ParseError | undefined;
  let pendingText: { value: string; location: HtmlLocation } | undefined;
  // Set while the tokenizer replays a stray `</p>` or `</br>` as an element.
  let strayEndTag = false;

  const locate = (offset: number): HtmlLocation => ({ ...positionAt(lineOffsets, offset), offset });

  const fail = (message: string, location: HtmlLocation): void => {
    if (!parseError) {
      parseError = new ParseError(message, {
        name: options.sourceName,
        line: location.line,
        column: location.column
      });
    }
  };

  const flushText = (): void => {
    const current = stack.at(-1);
    if (pendingText && current && pendingText.value.trim().length > 0) {
      current.target.push({ kind: 'text', value: pendingText.value, location: pendingText.location });
    }
    pendingText = undefined;
  };

  const parser: Parser = new Parser(
    {
      onopentag(rawName, attribs, isImplied) {
        flushText();
        if (isImplied && source.startsWith('</', parser.startIndex)) {
          strayEndTag = true;
          return;
        }

        const parent = stack.at(-1);
        if (!parent) {
          return;
        }

        const name = rawName.toLowerCase();
        const openTag = source.slice(parser.startIndex, parser.endIndex + 1);
        const location = locate(parser.startIndex);
        const node: HtmlElementNode = {
          kind: 'element',
          name,
          attributes: toAttributeMap(attribs),
          children: [],
          location,
          path: buildPath(parent, name),
          order: elementCount,
          selfClosing: /\/\s*>$/.test(openTag)
        };
        if (name === 'template') {
          node.content = [];
        }
        elementCount += 1;

        parent.target.push(node);
        parents.set(node, parent.node);
        stack.push({ node, target: node.content ?? node.children, childNameCount: new Map() });

        if (stack.length - 1 > maxDepth) {
          fail(`Element nesting exceeds the maximum depth of ${maxDepth}.`, location);
        }
      },

      ontext(data) {
        if (pendingText) {
          pendingText.value += data;
          return;
        }
        pendingText = { value: data, location: locate(parser.startIndex) };
      },

      onclosetag(rawName, isImplied) {
        flushText();
        if (strayEndTag) {
          strayEndTag = false;
          return;
        }
        if (stack.length <= 1) {
          return;
        }

        const closed = stack.pop();
        if (!closed) {
          return;
        }

        const { node } = closed;
        if (isImplied && !node.selfClosing && !VOID_ELEMENTS.has(node.name)) {
          const { line, column } = node.location;
          fail(`Element <${rawName.toLowerCase()}> opened at ${line}:${column} is not closed.`, node.location);
        }
      }
    },
    {
      decodeEntities: true,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
      recognizeSelfClosing: true
    }
  );

  parser.write(source);
  parser.end();
  flushText();

  if (parseError) {
    throw parseError;
  }

  return {
    root,
    sourceName: options.sourceName,
    elementCount,
    parents
  };
}

/** Normalize SAX attributes: lowercase keys, verbatim values, first occurrence wins. */
function toAttributeMap(attribs: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(attribs)) {
    const normalized = key.toLowerCase();
    if (!(normalized in out)) {
      out[normalized] = value;
    }
  }
  return out;
}

/** Build deterministic node paths with per-name sibling indexes. */
function buildPath(parent: OpenElement, name: string): string {
  const next = (parent.childNameCount.get(name) ?? 0) + 1;
  parent.childNameCount.set(name, next);
  const prefix = parent.node.path === '/' ? '' : parent.node.path;
  return `${prefix}/${name}[${next}]`;
}
