import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadConformanceFixtures } from '../../src/testkit/conformance.js';
import {
  executeConformanceFixture,
  executeConformanceFixtures,
  writeConformanceReportArtifacts
} from '../../src/testkit/conformance-execution.js';
import { formatConformanceReportMarkdown } from '../../src/testkit/conformance-report.js';

const FIXED_NOW = () => new Date('2026-03-01T12:00:00.000Z');

describe('conformance execution baseline', () => {
  it('runs every active fixture and matches its expectations', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const report = await executeConformanceFixtures(fixtures, { concurrency: 3, now: FIXED_NOW });

    const failures = report.results.filter((result) => !result.success);
    expect(failures.map((result) => `${result.fixtureId}: ${result.failureReasons.join('; ')}`)).toEqual([]);

    expect(report.generatedAt).toBe('2026-03-01T12:00:00.000Z');
    expect(report.fixtureCount).toBe(10);
    expect(report.passCount).toBe(10);
    expect(report.skippedFixtureIds).toEqual(['experimental-named-colors']);
    expect(report.ruleHistogram).toEqual({
      'absolute-positioning': 3,
      'dangling-use-reference': 1,
      'duplicate-inline-svg': 1,
      'hardcoded-color': 2,
      'missing-component-marker': 1,
      'missing-theme-selector': 1,
      'state-via-class': 2
    });
    expect(report.severityHistogram).toEqual({ error: 3, warning: 2, info: 6 });
    expect(report.categoryRollups.parser).toEqual({ fixtureCount: 2, passCount: 2, failCount: 0, ruleHistogram: {} });
    expect(report.categoryRollups.components?.fixtureCount).toBe(2);
    expect(report.categoryRollups.experimental).toBeUndefined();

    const mismatched = report.results.find((result) => result.fixtureId === 'parser-mismatched-close');
    expect(mismatched?.observed).toBe('parse-error');
    expect(mismatched?.parseError).toBe('Element <span> opened at 1:22 is not closed.');
  });

  it('explains verdict and count mismatches', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const repeated = fixtures.find((fixture) => fixture.meta.id === 'components-repeated-cards');
    expect(repeated).toBeDefined();
    if (!repeated) {
      return;
    }

    const result = await executeConformanceFixture({
      ...repeated,
      meta: { ...repeated.meta, expected: 'fail', expected_findings: { 'state-via-class': 1 } }
    });

    expect(result.success).toBe(false);
    expect(result.failureReasons).toEqual([
      "expected 'fail' but observed 'pass'",
      'missing-component-marker: expected 0 finding(s) but observed 1',
      'state-via-class: expected 1 finding(s) but observed 0'
    ]);
  });

  it('writes JSON and markdown artifacts', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const report = await executeConformanceFixtures(
      fixtures.filter((fixture) => fixture.meta.category === 'parser'),
      { now: FIXED_NOW }
    );
    const outDir = await mkdtemp(path.join(os.tmpdir(), 'markup-lint-report-'));

    const paths = await writeConformanceReportArtifacts(report, outDir);
    const markdown = await readFile(paths.markdownPath, 'utf8');

    expect(JSON.parse(await readFile(paths.jsonPath, 'utf8'))).toEqual(report);
    expect(markdown).toBe(formatConformanceReportMarkdown(report));
    expect(markdown).toContain('| parser-unclosed-section | parser | parse-error | parse-error | yes |');
    expect(markdown).toContain('### Rules\n\n- none');
    expect(markdown).toContain('| parser | 2 | 2 | 0 |');
  });
});
