import type { HtmlDocument, HtmlElementNode, HtmlNode } from '../core/document.js';

/** Type guard for element nodes. */
export function isElement(node: HtmlNode | undefined): node is HtmlElementNode {
  return node?.kind === 'element';
}

/** Return element children in order, dropping text. */
export function childElements(node: HtmlElementNode | undefined): HtmlElementNode[] {
  if (!node) {
    return [];
  }

  return node.children.filter(isElement);
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: HtmlElementNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** True when the attribute is present, even with an empty value. */
export function hasAttribute(node: HtmlElementNode | undefined, name: string): boolean {
  return node !== undefined && Object.prototype.hasOwnProperty.call(node.attributes, name);
}

/** Return concatenated text of direct text children, or `undefined` when empty. */
export function textOf(node: HtmlElementNode | undefined): string | undefined {
  if (!node) {
    return undefined;
  }

  const text = node.children
    .map((child) => (child.kind === 'text' ? child.value : ''))
    .join('');
  return text.length > 0 ? text : undefined;
}

/**
 * Split the `class` attribute into tokens, keeping bracketed utility values
 * such as `bg-[rgb(0, 0, 0)]` whole.
 */
export function classList(node: HtmlElementNode | undefined): string[] {
  const raw = attribute(node, 'class');
  const tokens: string[] = [];
  if (!raw) {
    return tokens;
  }

  let current = '';
  let depth = 0;
  for (const ch of raw) {
    if (ch === '[') depth++;
    if (ch === ']') depth = Math.max(0, depth - 1);
    if (/\s/.test(ch) && depth === 0) {
      if (current) tokens.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (current) tokens.push(current);
  return tokens;
}

/**
 * Visit every live element below `root` in document order.
 * Uses an explicit stack; `<template>` content is not visited.
 */
export function walkElements(root: HtmlElementNode, visit: (element: HtmlElementNode) => void): void {
  const stack: HtmlElementNode[] = [...childElements(root)].reverse();
  while (stack.length > 0) {
    const element = stack.pop();
    if (!element) {
      break;
    }

    visit(element);
    const children = childElements(element);
    for (let index = children.length - 1; index >= 0; index--) {
      const child = children[index];
      if (child) {
        stack.push(child);
      }
    }
  }
}

/** Collect live elements in document order. */
export function collectElements(document: HtmlDocument): HtmlElementNode[] {
  const out: HtmlElementNode[] = [];
  walkElements(document.root, (element) => out.push(element));
  return out;
}

/** Short human label for an element, e.g. `button.btn.active`. */
export function describeElement(element: HtmlElementNode): string {
  const classes = classList(element);
  return classes.length > 0 ? `${element.name}.${classes.join('.')}` : element.name;
}

/**
 * Elements that have an ancestor named in `names`, from a document-order list.
 * One pass: parents always precede their children in `elements`.
 */
export function elementsWithin(
  document: HtmlDocument,
  elements: readonly HtmlElementNode[],
  names: ReadonlySet<string>
): Set<HtmlElementNode> {
  const inside = new Set<HtmlElementNode>();
  for (const element of elements) {
    const parent = document.parents.get(element);
    if (parent && (names.has(parent.name) || inside.has(parent))) {
      inside.add(element);
    }
  }
  return inside;
}
