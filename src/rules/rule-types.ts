import type { HtmlElementNode } from '../core/document.js';
import type { FindingKind, FindingSeverity } from '../core/findings.js';
import type { RuleContext } from './rule-context.js';

/** Stable rule identifiers, in registration order. */
export const RULE_IDS = [
  'duplicate-inline-svg',
  'missing-component-marker',
  'state-via-class',
  'absolute-positioning',
  'hardcoded-color',
  'missing-theme-selector',
  'dangling-use-reference'
] as const;
/** Enum-like union for rule identifiers. */
export type RuleId = (typeof RULE_IDS)[number];

/** Raw rule output before severity resolution and ordering. */
export interface RuleFinding {
  node: HtmlElementNode;
  message: string;
  /** Defaults to `violation`. */
  kind?: FindingKind;
}

/**
 * A convention check. `check` must be pure: no shared state, no throwing.
 * Nodes a rule cannot evaluate are reported as `skip` findings instead.
 */
export interface LintRule {
  readonly id: RuleId;
  readonly defaultSeverity: FindingSeverity;
  readonly description: string;
  check(ctx: RuleContext): RuleFinding[];
}

/** Narrow arbitrary input to a registered rule id. */
export function isRuleId(value: unknown): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}
