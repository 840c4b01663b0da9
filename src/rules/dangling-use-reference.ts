import { attribute } from '../parser/html-utils.js';
import type { LintRule, RuleFinding } from './rule-types.js';

/** `<use>` pointing at a fragment id that the document never defines. */
export const danglingUseReferenceRule: LintRule = {
  id: 'dangling-use-reference',
  defaultSeverity: 'warning',
  description: '<use href="#id"> referencing an id that does not exist in the document.',
  check(ctx) {
    const ids = new Set<string>();
    for (const element of ctx.elements) {
      const id = attribute(element, 'id');
      if (id) {
        ids.add(id);
      }
    }

    const findings: RuleFinding[] = [];
    for (const element of ctx.elements) {
      if (element.name !== 'use') {
        continue;
      }
      const href = attribute(element, 'href') ?? attribute(element, 'xlink:href');
      if (!href?.startsWith('#')) {
        continue;
      }

      const id = href.slice(1);
      if (!ids.has(id)) {
        findings.push({
          node: element,
          message: `<use> references "${href}" but no element with id "${id}" exists in the document.`
        });
      }
    }
    return findings;
  }
};
