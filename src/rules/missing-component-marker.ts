import type { HtmlElementNode } from '../core/document.js';
import { childElements, classList, describeElement, elementsWithin, hasAttribute } from '../parser/html-utils.js';
import type { LintRule, RuleFinding } from './rule-types.js';

const SVG = new Set(['svg']);

/** Repeated sibling structures that are not marked as component instances. */
export const missingComponentMarkerRule: LintRule = {
  id: 'missing-component-marker',
  defaultSeverity: 'warning',
  description: 'Structurally identical sibling elements repeated without a data-component marker.',
  check(ctx) {
    const insideSvg = elementsWithin(ctx.document, ctx.elements, SVG);
    const shapes = computeShapeIds(ctx.elements);
    const findings: RuleFinding[] = [];

    for (const container of [ctx.document.root, ...ctx.elements]) {
      if (container.name === 'svg' || insideSvg.has(container)) {
        continue;
      }

      const groups = new Map<number, HtmlElementNode[]>();
      for (const child of childElements(container)) {
        const shape = shapes.get(child);
        if (shape === undefined || classList(child).length === 0) {
          continue;
        }
        const group = groups.get(shape);
        if (group) {
          group.push(child);
        } else {
          groups.set(shape, [child]);
        }
      }

      for (const group of groups.values()) {
        const [first] = group;
        if (!first || group.length < 2 || group.some((child) => hasAttribute(child, 'data-component'))) {
          continue;
        }
        findings.push({
          node: container,
          message: `${group.length} sibling <${describeElement(first)}> elements share the same structure but none carries data-component; mark them as instances of one component.`
        });
      }
    }
    return findings;
  }
};

/**
 * Give every element a shape id: equal ids mean equal tag, sorted class tokens
 * and child shapes. Text and other attributes are ignored.
 *
 * `elements` must be in document order; walking it backwards visits children
 * before their parents, so no recursion is needed at any depth.
 */
export function computeShapeIds(elements: readonly HtmlElementNode[]): Map<HtmlElementNode, number> {
  const interned = new Map<string, number>();
  const ids = new Map<HtmlElementNode, number>();

  for (let index = elements.length - 1; index >= 0; index--) {
    const element = elements[index];
    if (!element) {
      continue;
    }

    const head = [element.name, ...[...classList(element)].sort()].join('.');
    const children = childElements(element).map((child) => ids.get(child) ?? -1);
    const key = JSON.stringify([head, children]);

    let id = interned.get(key);
    if (id === undefined) {
      id = interned.size;
      interned.set(key, id);
    }
    ids.set(element, id);
  }
  return ids;
}
