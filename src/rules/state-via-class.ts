import { classList, describeElement, hasAttribute } from '../parser/html-utils.js';
import type { LintRule, RuleFinding } from './rule-types.js';

/** State encoded as a class token instead of a `data-state` attribute. */
export const stateViaClassRule: LintRule = {
  id: 'state-via-class',
  defaultSeverity: 'warning',
  description: 'State expressed through class tokens (active, disabled, ...) instead of data-state.',
  check(ctx) {
    const findings: RuleFinding[] = [];
    for (const element of ctx.elements) {
      if (hasAttribute(element, 'data-state')) {
        continue;
      }

      const matches = classList(element).flatMap((token) => {
        const state = matchState(token, ctx.options.stateLexicon);
        return state ? [{ token, state }] : [];
      });
      const [first] = matches;
      if (!first) {
        continue;
      }

      findings.push({
        node: element,
        message: `Class ${matches.map((match) => `"${match.token}"`).join(', ')} encodes state on <${describeElement(
          element
        )}>; use data-state="${first.state}" instead.`
      });
    }
    return findings;
  }
};

/** State word carried by `token`: exact match, `is-<state>`, or BEM `--<state>` modifier. */
export function matchState(token: string, lexicon: ReadonlySet<string>): string | undefined {
  const lower = token.toLowerCase();
  for (const state of lexicon) {
    if (lower === state || lower === `is-${state}` || lower.endsWith(`--${state}`)) {
      return state;
    }
  }
  return undefined;
}
