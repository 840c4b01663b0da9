import type { FindingSeverity } from './findings.js';
import { normalizeMaxDepth } from '../parser/html-ast.js';
import type { RuleId } from '../rules/rule-types.js';

/** Class tokens treated as state when no lexicon is configured. */
export const DEFAULT_STATE_LEXICON: readonly string[] = ['active', 'disabled', 'hover', 'focus', 'error'];

/** `data-component` values that mark an intentional overlay container. */
export const DEFAULT_OVERLAY_COMPONENTS: readonly string[] = [
  'modal',
  'overlay',
  'dialog',
  'popover',
  'tooltip',
  'dropdown',
  'toast'
];

/** Caller-facing analysis options; every field is optional. */
export interface AnalyzeOptions {
  sourceName?: string;
  stateLexicon?: Iterable<string>;
  disabledRules?: Iterable<string>;
  treatWarningsAsErrors?: boolean;
  severityOverrides?: Partial<Record<RuleId, FindingSeverity>>;
  overlayComponents?: Iterable<string>;
  maxDepth?: number;
}

/** Options with defaults applied and lexicons lowercased. */
export interface ResolvedAnalyzeOptions {
  sourceName?: string;
  stateLexicon: ReadonlySet<string>;
  disabledRules: ReadonlySet<string>;
  treatWarningsAsErrors: boolean;
  severityOverrides: Partial<Record<RuleId, FindingSeverity>>;
  overlayComponents: ReadonlySet<string>;
  maxDepth: number;
}

/** Apply defaults to caller options. */
export function resolveAnalyzeOptions(options: AnalyzeOptions = {}): ResolvedAnalyzeOptions {
  return {
    sourceName: options.sourceName,
    stateLexicon: toLowerSet(options.stateLexicon ?? DEFAULT_STATE_LEXICON),
    disabledRules: new Set(options.disabledRules ?? []),
    treatWarningsAsErrors: options.treatWarningsAsErrors ?? false,
    severityOverrides: { ...options.severityOverrides },
    overlayComponents: toLowerSet(options.overlayComponents ?? DEFAULT_OVERLAY_COMPONENTS),
    maxDepth: normalizeMaxDepth(options.maxDepth)
  };
}

function toLowerSet(values: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized.length > 0) {
      out.add(normalized);
    }
  }
  return out;
}
