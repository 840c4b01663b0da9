import type { HtmlElementNode, HtmlNode } from '../core/document.js';
import { childElements, elementsWithin } from '../parser/html-utils.js';
import type { LintRule, RuleFinding } from './rule-types.js';

const SVG_CONTAINERS = new Set(['svg', 'symbol']);

/** Repeated inline SVG artwork that should be a shared `<symbol>` + `<use>`. */
export const duplicateInlineSvgRule: LintRule = {
  id: 'duplicate-inline-svg',
  defaultSeverity: 'warning',
  description: 'Identical inline <svg> markup repeated instead of a shared <symbol> referenced with <use>.',
  check(ctx) {
    const nested = elementsWithin(ctx.document, ctx.elements, SVG_CONTAINERS);
    const groups = new Map<string, HtmlElementNode[]>();
    for (const element of ctx.elements) {
      if (element.name !== 'svg' || nested.has(element) || !isInlineArtwork(element)) {
        continue;
      }

      const key = canonicalMarkup(element.children);
      const group = groups.get(key);
      if (group) {
        group.push(element);
      } else {
        groups.set(key, [element]);
      }
    }

    const findings: RuleFinding[] = [];
    for (const group of groups.values()) {
      const [first] = group;
      if (!first || group.length < 2) {
        continue;
      }
      findings.push({
        node: first,
        message: `Inline <svg> markup is repeated ${group.length} times (${group
          .map((element) => element.path)
          .join(', ')}); define it once as a <symbol> and reference it with <use>.`
      });
    }
    return findings;
  }
};

/**
 * `<svg>` that draws something itself: not a sprite sheet holding symbols,
 * not a bare `<use>` reference. Callers exclude svgs nested in another svg.
 */
function isInlineArtwork(svg: HtmlElementNode): boolean {
  const children = childElements(svg);
  if (children.length === 0 || children.every((child) => child.name === 'use')) {
    return false;
  }

  return !containsElement(svg, 'symbol');
}

function containsElement(root: HtmlElementNode, name: string): boolean {
  const stack = childElements(root);
  while (stack.length > 0) {
    const element = stack.pop();
    if (!element) {
      break;
    }
    if (element.name === name) {
      return true;
    }
    stack.push(...childElements(element));
  }
  return false;
}

type MarkupStep = { kind: 'node'; node: HtmlNode } | { kind: 'close'; name: string };

/** Attribute-order-insensitive serialization used as the structural identity key. */
function canonicalMarkup(nodes: readonly HtmlNode[]): string {
  const parts: string[] = [];
  const steps: MarkupStep[] = [...nodes].reverse().map((node): MarkupStep => ({ kind: 'node', node }));

  while (steps.length > 0) {
    const step = steps.pop();
    if (!step) {
      break;
    }
    if (step.kind === 'close') {
      parts.push(`</${step.name}>`);
      continue;
    }

    const { node } = step;
    if (node.kind === 'text') {
      parts.push(node.value.trim().replace(/\s+/g, ' '));
      continue;
    }

    const attributes = Object.keys(node.attributes)
      .sort()
      .map((key) => ` ${key}="${node.attributes[key] ?? ''}"`)
      .join('');
    parts.push(`<${node.name}${attributes}>`);
    steps.push({ kind: 'close', name: node.name });
    for (let index = node.children.length - 1; index >= 0; index--) {
      const child = node.children[index];
      if (child) {
        steps.push({ kind: 'node', node: child });
      }
    }
  }
  return parts.join('');
}
