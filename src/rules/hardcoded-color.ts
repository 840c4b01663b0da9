import { findColorLiterals } from '../css/color.js';
import { describeElement } from '../parser/html-utils.js';
import type { LintRule, RuleFinding } from './rule-types.js';
import { readInlineStyle } from './style-helpers.js';

/** Raw color literals in inline styles instead of design-token references. */
export const hardcodedColorRule: LintRule = {
  id: 'hardcoded-color',
  defaultSeverity: 'info',
  description: 'Inline style with a raw color literal (#hex, rgb(), hsl()) instead of var(--token).',
  check(ctx) {
    const findings: RuleFinding[] = [];
    for (const element of ctx.elements) {
      const inline = readInlineStyle(element);
      if (inline.status === 'skipped') {
        findings.push(inline.finding);
        continue;
      }
      if (inline.status === 'absent') {
        continue;
      }

      const offending = inline.declarations.flatMap((declaration) => {
        const literals = findColorLiterals(declaration.value);
        return literals.length > 0 ? [`${declaration.property}: ${literals.join(' ')}`] : [];
      });
      if (offending.length === 0) {
        continue;
      }

      findings.push({
        node: element,
        message: `Inline style on <${describeElement(element)}> hardcodes color literals (${offending.join(
          '; '
        )}); reference a design token with var(--...) instead.`
      });
    }
    return findings;
  }
};
