import { describe, expect, it } from 'vitest';

import type { HtmlElementNode } from '../../src/core/document.js';
import type { Finding } from '../../src/core/findings.js';
import { resolveAnalyzeOptions } from '../../src/core/options.js';
import { buildReport, resolveSeverity, summarizeFindings, type Report } from '../../src/report/report-builder.js';
import {
  appendHistogramTable,
  buildRuleHistogram,
  escapeMarkdownTable,
  formatReportJson,
  formatReportMarkdown,
  formatReportText
} from '../../src/report/report-format.js';
import { danglingUseReferenceRule } from '../../src/rules/dangling-use-reference.js';
import { hardcodedColorRule } from '../../src/rules/hardcoded-color.js';
import { stateViaClassRule } from '../../src/rules/state-via-class.js';

function element(order: number, line = 1): HtmlElementNode {
  return {
    kind: 'element',
    name: 'div',
    attributes: {},
    children: [],
    location: { line, column: 1, offset: 0 },
    path: `/div[${order + 1}]`,
    order,
    selfClosing: false
  };
}

const warningReport: Report = {
  sourceName: 'page.html',
  findings: [
    {
      ruleId: 'state-via-class',
      severity: 'warning',
      kind: 'violation',
      message: 'Use data-state.',
      path: '/button[1]',
      source: { name: 'page.html', line: 3, column: 5 }
    }
  ],
  summary: { errorCount: 0, warningCount: 1, infoCount: 0, total: 1 },
  passed: true
};

const emptyReport: Report = {
  findings: [],
  summary: { errorCount: 0, warningCount: 0, infoCount: 0, total: 0 },
  passed: true
};

describe('report builder', () => {
  it('orders by rule registration, then document order, then emission order', () => {
    const report = buildReport(
      [
        {
          rule: stateViaClassRule,
          findings: [
            { node: element(5), message: 'b' },
            { node: element(2), message: 'a' },
            { node: element(5), message: 'c' }
          ]
        },
        { rule: danglingUseReferenceRule, findings: [{ node: element(1, 4), message: 'd' }] }
      ],
      resolveAnalyzeOptions({ sourceName: 'x.html', severityOverrides: { 'dangling-use-reference': 'error' } })
    );

    expect(report.findings.map((finding) => finding.message)).toEqual(['a', 'b', 'c', 'd']);
    expect(report.findings[3]).toEqual({
      ruleId: 'dangling-use-reference',
      severity: 'error',
      kind: 'violation',
      message: 'd',
      path: '/div[2]',
      source: { name: 'x.html', line: 4, column: 1 }
    });
    expect(report.summary).toEqual({ errorCount: 1, warningCount: 3, infoCount: 0, total: 4 });
    expect(report.passed).toBe(false);
    expect(report.sourceName).toBe('x.html');
  });

  it('resolves severities from overrides and the warnings-as-errors switch', () => {
    const violation = { node: element(0), message: 'm' };
    const skip = { node: element(0), message: 's', kind: 'skip' as const };

    expect(resolveSeverity(stateViaClassRule, violation, resolveAnalyzeOptions())).toBe('warning');
    expect(resolveSeverity(stateViaClassRule, violation, resolveAnalyzeOptions({ treatWarningsAsErrors: true }))).toBe(
      'error'
    );
    expect(
      resolveSeverity(
        hardcodedColorRule,
        violation,
        resolveAnalyzeOptions({ severityOverrides: { 'hardcoded-color': 'warning' }, treatWarningsAsErrors: true })
      )
    ).toBe('error');
    expect(
      resolveSeverity(hardcodedColorRule, violation, resolveAnalyzeOptions({ treatWarningsAsErrors: true }))
    ).toBe('info');
    expect(
      resolveSeverity(danglingUseReferenceRule, skip, resolveAnalyzeOptions({ treatWarningsAsErrors: true }))
    ).toBe('info');
  });

  it('counts findings per severity', () => {
    const findings: Finding[] = [
      { ruleId: 'dangling-use-reference', severity: 'error', kind: 'violation', message: 'x', path: '/use[1]' },
      { ruleId: 'hardcoded-color', severity: 'info', kind: 'skip', message: 'y', path: '/p[1]' }
    ];

    expect(summarizeFindings(findings)).toEqual({ errorCount: 1, warningCount: 0, infoCount: 1, total: 2 });
  });
});

describe('report formatting', () => {
  it('renders compiler-style text lines with a verdict', () => {
    expect(formatReportText(warningReport)).toBe(
      'page.html:3:5 warning Use data-state. [state-via-class]\npage.html: passed (0 errors, 1 warning, 0 info)\n'
    );
    expect(formatReportText(emptyReport)).toBe('<input>: passed (0 errors, 0 warnings, 0 info)\n');
  });

  it('serializes reports as stable JSON', () => {
    const json = formatReportJson(warningReport);

    expect(json.endsWith('}\n')).toBe(true);
    expect(JSON.parse(json)).toEqual(warningReport);
    expect(formatReportJson([warningReport])).toBe(formatReportJson([warningReport]));
  });

  it('renders a markdown summary with a rule histogram', () => {
    expect(formatReportMarkdown([warningReport, emptyReport])).toBe(
      [
        '# Markup Convention Report',
        '',
        'Documents analyzed: 2',
        'Passed: 2',
        'Failed: 0',
        '',
        '## page.html',
        '',
        '| Rule | Severity | Path | Line | Message |',
        '|---|---|---|---|---|',
        '| state-via-class | warning | /button[1] | 3 | Use data-state. |',
        '',
        '## <input>',
        '',
        '- no findings',
        '',
        '## Rule Histogram',
        '',
        '| Rule | Count |',
        '|---|---|',
        '| state-via-class | 1 |',
        ''
      ].join('\n')
    );
  });

  it('builds rule histograms', () => {
    expect(buildRuleHistogram([...warningReport.findings, ...warningReport.findings])).toEqual({ 'state-via-class': 2 });
  });

  it('renders histogram tables by descending count, then key', () => {
    const lines: string[] = [];
    appendHistogramTable(lines, { b: 1, 'a|b': 1, c: 3 }, 'Key');

    expect(lines).toEqual(['| Key | Count |', '|---|---|', '| c | 3 |', '| a\\|b | 1 |', '| b | 1 |']);

    const empty: string[] = [];
    appendHistogramTable(empty, {}, 'Rule');
    expect(empty).toEqual(['- none']);
    expect(escapeMarkdownTable('x | y')).toBe('x \\| y');
  });
});
