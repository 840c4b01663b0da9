import { runWithConcurrency } from '../core/execution-loop.js';
import type { FindingSeverity } from '../core/findings.js';
import { resolveAnalyzeOptions, type AnalyzeOptions } from '../core/options.js';
import { parseHtmlToAst, ParseError } from '../parser/html-ast.js';
import { RULES, runRules } from '../rules/registry.js';
import { createRuleContext } from '../rules/rule-context.js';
import type { RuleId } from '../rules/rule-types.js';
import { buildReport, type Report } from '../report/report-builder.js';

export type { AnalyzeOptions } from '../core/options.js';
export type { Finding, FindingKind, FindingSeverity, FindingSource } from '../core/findings.js';
export type { Report, ReportSummary } from '../report/report-builder.js';
export type { RuleId } from '../rules/rule-types.js';
export { ParseError } from '../parser/html-ast.js';
export { DEFAULT_OVERLAY_COMPONENTS, DEFAULT_STATE_LEXICON } from '../core/options.js';
export { RULE_IDS, isRuleId } from '../rules/rule-types.js';
export {
  buildRuleHistogram,
  formatReportJson,
  formatReportMarkdown,
  formatReportText
} from '../report/report-format.js';

/** One document submitted to {@link analyzeBatch}. */
export interface BatchAnalysisInput {
  source: string;
  sourceName?: string;
}

/** Batch options: analysis options shared by every entry plus pool size. */
export interface BatchAnalyzeOptions extends Omit<AnalyzeOptions, 'sourceName'> {
  concurrency?: number;
}

/** Per-entry batch outcome; exactly one of `report` and `parseError` is set. */
export interface BatchAnalysisResult {
  sourceName?: string;
  report?: Report;
  parseError?: ParseError;
}

/** Public description of a registered rule. */
export interface RuleDescriptor {
  id: RuleId;
  defaultSeverity: FindingSeverity;
  description: string;
}

/** Default worker count for batch analysis. */
export const DEFAULT_BATCH_CONCURRENCY = 4;

/**
 * Parse `htmlSource`, run every enabled rule and build the report.
 * Throws only {@link ParseError}; the tree is discarded when this returns.
 */
export function analyze(htmlSource: string, options: AnalyzeOptions = {}): Report {
  const resolved = resolveAnalyzeOptions(options);
  const document = parseHtmlToAst(htmlSource, { sourceName: resolved.sourceName, maxDepth: resolved.maxDepth });
  const ctx = createRuleContext(document, resolved);
  return buildReport(runRules(ctx), resolved);
}

/**
 * Analyze independent documents with bounded concurrency. Result order equals
 * input order; parse failures are captured per entry instead of rejecting.
 */
export async function analyzeBatch(
  inputs: readonly BatchAnalysisInput[],
  options: BatchAnalyzeOptions = {}
): Promise<BatchAnalysisResult[]> {
  const { concurrency = DEFAULT_BATCH_CONCURRENCY, ...analyzeOptions } = options;

  return runWithConcurrency(inputs, concurrency, async (input): Promise<BatchAnalysisResult> => {
    try {
      return {
        sourceName: input.sourceName,
        report: analyze(input.source, { ...analyzeOptions, sourceName: input.sourceName })
      };
    } catch (error) {
      if (error instanceof ParseError) {
        return { sourceName: input.sourceName, parseError: error };
      }
      throw error;
    }
  });
}

/** Registered rules in report order. */
export function listRules(): RuleDescriptor[] {
  return RULES.map((rule) => ({
    id: rule.id,
    defaultSeverity: rule.defaultSeverity,
    description: rule.description
  }));
}
