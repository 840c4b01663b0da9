import type { Finding, FindingSeverity } from '../core/findings.js';
import type { ResolvedAnalyzeOptions } from '../core/options.js';
import type { RuleEvaluation } from '../rules/registry.js';
import type { LintRule, RuleFinding } from '../rules/rule-types.js';

/** Per-severity counts for one report. */
export interface ReportSummary {
  errorCount: number;
  warningCount: number;
  infoCount: number;
  total: number;
}

/** Deterministic analysis result for one document. */
export interface Report {
  sourceName?: string;
  findings: Finding[];
  summary: ReportSummary;
  /** True iff there are no `error` findings. */
  passed: boolean;
}

/**
 * Aggregate rule evaluations into a report. Findings keep rule registration
 * order, then document order within a rule; ties keep emission order.
 */
export function buildReport(evaluations: readonly RuleEvaluation[], options: ResolvedAnalyzeOptions): Report {
  const findings: Finding[] = [];

  for (const { rule, findings: raw } of evaluations) {
    const ordered = raw
      .map((finding, index) => ({ finding, index }))
      .sort((left, right) => left.finding.node.order - right.finding.node.order || left.index - right.index);

    for (const { finding } of ordered) {
      findings.push(toFinding(rule, finding, options));
    }
  }

  const summary = summarizeFindings(findings);
  return {
    sourceName: options.sourceName,
    findings,
    summary,
    passed: summary.errorCount === 0
  };
}

/** Count findings per severity. */
export function summarizeFindings(findings: readonly Finding[]): ReportSummary {
  const summary: ReportSummary = { errorCount: 0, warningCount: 0, infoCount: 0, total: findings.length };
  for (const finding of findings) {
    if (finding.severity === 'error') {
      summary.errorCount += 1;
    } else if (finding.severity === 'warning') {
      summary.warningCount += 1;
    } else {
      summary.infoCount += 1;
    }
  }
  return summary;
}

/**
 * Skips always stay `info`. Violations take the configured override or the
 * rule default, and warnings escalate to errors under `treatWarningsAsErrors`.
 */
export function resolveSeverity(
  rule: LintRule,
  finding: RuleFinding,
  options: ResolvedAnalyzeOptions
): FindingSeverity {
  if (finding.kind === 'skip') {
    return 'info';
  }

  const severity = options.severityOverrides[rule.id] ?? rule.defaultSeverity;
  if (options.treatWarningsAsErrors && severity === 'warning') {
    return 'error';
  }
  return severity;
}

function toFinding(rule: LintRule, finding: RuleFinding, options: ResolvedAnalyzeOptions): Finding {
  const { node } = finding;
  return {
    ruleId: rule.id,
    severity: resolveSeverity(rule, finding, options),
    kind: finding.kind ?? 'violation',
    message: finding.message,
    path: node.path,
    source: {
      name: options.sourceName,
      line: node.location.line,
      column: node.location.column
    }
  };
}
