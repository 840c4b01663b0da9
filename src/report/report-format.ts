import type { Finding } from '../core/findings.js';
import type { Report } from './report-builder.js';

/** String-keyed histogram helper used by report summaries. */
export type FindingHistogram = Record<string, number>;

const UNNAMED_SOURCE = '<input>';

/** Build a rule-id histogram from a list of findings. */
export function buildRuleHistogram(findings: readonly Finding[]): FindingHistogram {
  const histogram: FindingHistogram = {};
  for (const finding of findings) {
    histogram[finding.ruleId] = (histogram[finding.ruleId] ?? 0) + 1;
  }
  return histogram;
}

/** One line per finding plus a verdict line, compiler-style. */
export function formatReportText(report: Report): string {
  const name = report.sourceName ?? UNNAMED_SOURCE;
  const lines = report.findings.map((finding) => {
    const line = finding.source?.line ?? 1;
    const column = finding.source?.column ?? 1;
    return `${name}:${line}:${column} ${finding.severity.padEnd(7)} ${finding.message} [${finding.ruleId}]`;
  });

  const { errorCount, warningCount, infoCount } = report.summary;
  lines.push(
    `${name}: ${report.passed ? 'passed' : 'failed'} (${errorCount} ${plural(errorCount, 'error')}, ${warningCount} ${plural(
      warningCount,
      'warning'
    )}, ${infoCount} info)`
  );
  return `${lines.join('\n')}\n`;
}

/** Serialize report content to deterministic JSON text. */
export function formatReportJson(report: Report | readonly Report[]): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Markdown summary across one or more reports. */
export function formatReportMarkdown(reports: readonly Report[]): string {
  const lines: string[] = [
    '# Markup Convention Report',
    '',
    `Documents analyzed: ${reports.length}`,
    `Passed: ${reports.filter((report) => report.passed).length}`,
    `Failed: ${reports.filter((report) => !report.passed).length}`,
    ''
  ];

  for (const report of reports) {
    lines.push(`## ${escapeMarkdownTable(report.sourceName ?? UNNAMED_SOURCE)}`);
    lines.push('');
    if (report.findings.length === 0) {
      lines.push('- no findings');
      lines.push('');
      continue;
    }

    lines.push('| Rule | Severity | Path | Line | Message |');
    lines.push('|---|---|---|---|---|');
    for (const finding of report.findings) {
      lines.push(
        `| ${finding.ruleId} | ${finding.severity} | ${escapeMarkdownTable(finding.path)} | ${
          finding.source?.line ?? 1
        } | ${escapeMarkdownTable(finding.message)} |`
      );
    }
    lines.push('');
  }

  lines.push('## Rule Histogram');
  lines.push('');
  appendHistogramTable(lines, buildRuleHistogram(reports.flatMap((report) => report.findings)), 'Rule');

  return `${lines.join('\n')}\n`;
}

/** Escape markdown table delimiters in free-form text. */
export function escapeMarkdownTable(value: string): string {
  return value.replaceAll('|', '\\|');
}

/** Append histogram rows sorted by descending count then key name; `- none` when empty. */
export function appendHistogramTable(lines: string[], histogram: Readonly<FindingHistogram>, keyLabel: string): void {
  const entries = Object.entries(histogram).sort((left, right) => {
    if (right[1] !== left[1]) {
      return right[1] - left[1];
    }
    return left[0].localeCompare(right[0]);
  });

  if (entries.length === 0) {
    lines.push('- none');
    return;
  }

  lines.push(`| ${keyLabel} | Count |`);
  lines.push('|---|---|');
  for (const [key, count] of entries) {
    lines.push(`| ${escapeMarkdownTable(key)} | ${count} |`);
  }
}

function plural(count: number, word: string): string {
  return count === 1 ? word : `${word}s`;
}
