import type { Finding } from '../core/findings.js';
import { appendHistogramTable, buildRuleHistogram, escapeMarkdownTable } from '../report/report-format.js';
import type {
  ConformanceCategoryRollup,
  ConformanceExecutionReport,
  ConformanceFixtureExecutionResult,
  ConformanceHistogram
} from './conformance-types.js';

/** Format a compact markdown summary useful for quick run triage. */
export function formatConformanceReportMarkdown(report: ConformanceExecutionReport): string {
  const lines: string[] = [
    '# Conformance Execution Report',
    '',
    `Generated at: ${report.generatedAt}`,
    `Fixtures executed: ${report.fixtureCount}`,
    `Passed: ${report.passCount}`,
    `Failed: ${report.failCount}`,
    `Skipped: ${report.skippedFixtureIds.length}`,
    '',
    '| Fixture | Category | Expected | Observed | Match | Notes |',
    '|---|---|---|---|---|---|'
  ];

  for (const result of report.results) {
    const notes = result.failureReasons.length > 0 ? result.failureReasons.join('; ') : (result.parseError ?? 'ok');
    lines.push(
      `| ${result.fixtureId} | ${result.category} | ${result.expected} | ${result.observed} | ${
        result.success ? 'yes' : 'no'
      } | ${escapeMarkdownTable(notes)} |`
    );
  }

  lines.push('');
  lines.push('## Finding Histograms');
  lines.push('');
  appendHistogramSection(lines, 'Rules', report.ruleHistogram);
  lines.push('');
  appendHistogramSection(lines, 'Severities', report.severityHistogram);
  lines.push('');
  lines.push('## Category Rollups');
  lines.push('');
  appendCategoryRollupSection(lines, report.categoryRollups);

  return `${lines.join('\n')}\n`;
}

/** Serialize report content to deterministic JSON text for artifacts. */
export function formatConformanceReportJson(report: ConformanceExecutionReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Build a severity histogram from a list of findings. */
export function buildSeverityHistogram(findings: readonly Finding[]): ConformanceHistogram {
  const histogram: ConformanceHistogram = {};
  for (const finding of findings) {
    histogram[finding.severity] = (histogram[finding.severity] ?? 0) + 1;
  }
  return histogram;
}

/** Build per-category pass/fail and rule histogram aggregates. */
export function buildCategoryRollups(
  results: readonly ConformanceFixtureExecutionResult[]
): Record<string, ConformanceCategoryRollup> {
  const rollups: Record<string, ConformanceCategoryRollup> = {};

  for (const result of results) {
    const rollup = (rollups[result.category] ??= {
      fixtureCount: 0,
      passCount: 0,
      failCount: 0,
      ruleHistogram: {}
    });

    rollup.fixtureCount += 1;
    if (result.success) {
      rollup.passCount += 1;
    } else {
      rollup.failCount += 1;
    }

    mergeHistogram(rollup.ruleHistogram, buildRuleHistogram(result.findings));
  }

  return rollups;
}

function appendHistogramSection(lines: string[], title: string, histogram: ConformanceHistogram): void {
  lines.push(`### ${title}`);
  lines.push('');
  appendHistogramTable(lines, histogram, 'Key');
}

/** Merge histogram counts from `source` into `target`. */
function mergeHistogram(target: ConformanceHistogram, source: ConformanceHistogram): void {
  for (const [key, count] of Object.entries(source)) {
    target[key] = (target[key] ?? 0) + count;
  }
}

/** Append markdown rollup rows sorted by category key. */
function appendCategoryRollupSection(
  lines: string[],
  categoryRollups: Record<string, ConformanceCategoryRollup>
): void {
  const entries = Object.entries(categoryRollups).sort((left, right) => left[0].localeCompare(right[0]));

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push('| Category | Fixtures | Passed | Failed |');
  lines.push('|---|---|---|---|');
  for (const [category, rollup] of entries) {
    lines.push(`| ${escapeMarkdownTable(category)} | ${rollup.fixtureCount} | ${rollup.passCount} | ${rollup.failCount} |`);
  }
}
