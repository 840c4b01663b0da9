import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { toAnalyzeOptions } from '../config/config-file.js';
import { runWithConcurrency } from '../core/execution-loop.js';
import { analyze, ParseError, type Report } from '../public/api.js';
import { buildRuleHistogram } from '../report/report-format.js';
import {
  buildCategoryRollups,
  buildSeverityHistogram,
  formatConformanceReportJson,
  formatConformanceReportMarkdown
} from './conformance-report.js';
import type {
  ConformanceExecutionArtifactPaths,
  ConformanceExecutionReport,
  ConformanceFixtureExecutionResult,
  ConformanceFixtureRecord,
  FixtureExpectation
} from './conformance-types.js';

/** Knobs for a fixture run; `now` keeps `generatedAt` reproducible in tests. */
export interface ConformanceExecutionOptions {
  concurrency?: number;
  now?: () => Date;
}

/** Execute one fixture and compare verdict and per-rule counts with its metadata. */
export async function executeConformanceFixture(
  fixture: ConformanceFixtureRecord
): Promise<ConformanceFixtureExecutionResult> {
  const source = await readFile(fixture.documentPath, 'utf8');
  const sourceName = path.basename(fixture.documentPath);

  let report: Report | undefined;
  let parseError: string | undefined;
  try {
    report = analyze(source, {
      ...toAnalyzeOptions(fixture.meta.options ?? {}),
      sourceName
    });
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    parseError = error.message;
  }

  const findings = report?.findings ?? [];
  const ruleHistogram = buildRuleHistogram(findings);
  const observed: FixtureExpectation = report ? (report.passed ? 'pass' : 'fail') : 'parse-error';

  const failureReasons: string[] = [];
  if (fixture.meta.expected !== observed) {
    failureReasons.push(`expected '${fixture.meta.expected}' but observed '${observed}'`);
  }

  const expectedFindings = fixture.meta.expected_findings;
  if (expectedFindings && report) {
    const ruleIds = new Set([...Object.keys(expectedFindings), ...Object.keys(ruleHistogram)]);
    for (const ruleId of [...ruleIds].sort()) {
      const want = expectedFindings[ruleId] ?? 0;
      const got = ruleHistogram[ruleId] ?? 0;
      if (want !== got) {
        failureReasons.push(`${ruleId}: expected ${want} finding(s) but observed ${got}`);
      }
    }
  }

  const result: ConformanceFixtureExecutionResult = {
    fixtureId: fixture.meta.id,
    metaPath: fixture.metaPath,
    documentPath: fixture.documentPath,
    category: fixture.meta.category,
    expected: fixture.meta.expected,
    observed,
    findings,
    ruleHistogram,
    success: failureReasons.length === 0,
    failureReasons
  };
  if (parseError !== undefined) {
    result.parseError = parseError;
  }
  return result;
}

/** Execute all active fixtures and collect a timestamped aggregate report. */
export async function executeConformanceFixtures(
  fixtures: ConformanceFixtureRecord[],
  options: ConformanceExecutionOptions = {}
): Promise<ConformanceExecutionReport> {
  const active = fixtures.filter((fixture) => fixture.meta.status === 'active');
  const results = await runWithConcurrency(active, options.concurrency ?? 4, (fixture) =>
    executeConformanceFixture(fixture)
  );

  const passCount = results.filter((result) => result.success).length;
  const allFindings = results.flatMap((result) => result.findings);

  return {
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    fixtureCount: results.length,
    passCount,
    failCount: results.length - passCount,
    skippedFixtureIds: fixtures.filter((fixture) => fixture.meta.status !== 'active').map((fixture) => fixture.meta.id),
    ruleHistogram: buildRuleHistogram(allFindings),
    severityHistogram: buildSeverityHistogram(allFindings),
    categoryRollups: buildCategoryRollups(results),
    results
  };
}

/** Write JSON and Markdown report artifacts to `outDir`. */
export async function writeConformanceReportArtifacts(
  report: ConformanceExecutionReport,
  outDir: string
): Promise<ConformanceExecutionArtifactPaths> {
  await mkdir(outDir, { recursive: true });

  const jsonPath = path.join(outDir, 'conformance-report.json');
  const markdownPath = path.join(outDir, 'conformance-report.md');

  await writeFile(jsonPath, formatConformanceReportJson(report), 'utf8');
  await writeFile(markdownPath, formatConformanceReportMarkdown(report), 'utf8');

  return { jsonPath, markdownPath };
}
