import { absolutePositioningRule } from './absolute-positioning.js';
import { danglingUseReferenceRule } from './dangling-use-reference.js';
import { duplicateInlineSvgRule } from './duplicate-inline-svg.js';
import { hardcodedColorRule } from './hardcoded-color.js';
import { missingComponentMarkerRule } from './missing-component-marker.js';
import { missingThemeSelectorRule } from './missing-theme-selector.js';
import type { RuleContext } from './rule-context.js';
import type { LintRule, RuleFinding, RuleId } from './rule-types.js';
import { stateViaClassRule } from './state-via-class.js';

/** Registered rules; this order is the report's primary sort key. */
export const RULES: readonly LintRule[] = [
  duplicateInlineSvgRule,
  missingComponentMarkerRule,
  stateViaClassRule,
  absolutePositioningRule,
  hardcodedColorRule,
  missingThemeSelectorRule,
  danglingUseReferenceRule
];

/** Findings of one rule, kept together for report grouping. */
export interface RuleEvaluation {
  rule: LintRule;
  findings: RuleFinding[];
}

/** Look up a registered rule. */
export function getRule(id: RuleId): LintRule | undefined {
  return RULES.find((rule) => rule.id === id);
}

/** Evaluate every enabled rule, in registration order, without short-circuiting. */
export function runRules(ctx: RuleContext, rules: readonly LintRule[] = RULES): RuleEvaluation[] {
  return rules
    .filter((rule) => !ctx.options.disabledRules.has(rule.id))
    .map((rule) => ({ rule, findings: rule.check(ctx) }));
}
