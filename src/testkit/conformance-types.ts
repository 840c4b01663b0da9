import type { Finding } from '../core/findings.js';
import type { LinterConfig } from '../config/config-file.js';

/** String-keyed histogram helper used by conformance aggregate summaries. */
export type ConformanceHistogram = Record<string, number>;

/** Expected fixture outcome: report verdict, or a parse failure. */
export type FixtureExpectation = 'pass' | 'fail' | 'parse-error';
/** Fixture activation status in the conformance suite. */
export type FixtureStatus = 'active' | 'skip';

/** Metadata contract for one conformance fixture sidecar file. */
export interface ConformanceFixtureMeta {
  id: string;
  source: string;
  category: string;
  expected: FixtureExpectation;
  status: FixtureStatus;
  notes?: string;
  /** Analysis options, spelled like the configuration file. */
  options?: LinterConfig;
  /** Exact finding count per rule id; rules not listed must not fire. */
  expected_findings?: Record<string, number>;
}

/** Resolved fixture record including metadata and document paths. */
export interface ConformanceFixtureRecord {
  metaPath: string;
  documentPath: string;
  meta: ConformanceFixtureMeta;
}

/** One fixture execution result captured for triage and artifact reporting. */
export interface ConformanceFixtureExecutionResult {
  fixtureId: string;
  metaPath: string;
  documentPath: string;
  category: string;
  expected: FixtureExpectation;
  observed: FixtureExpectation;
  findings: Finding[];
  ruleHistogram: ConformanceHistogram;
  parseError?: string;
  success: boolean;
  failureReasons: string[];
}

/** Category-level aggregate for conformance triage slicing. */
export interface ConformanceCategoryRollup {
  fixtureCount: number;
  passCount: number;
  failCount: number;
  ruleHistogram: ConformanceHistogram;
}

/** Aggregated execution report for all processed fixtures. */
export interface ConformanceExecutionReport {
  generatedAt: string;
  fixtureCount: number;
  passCount: number;
  failCount: number;
  skippedFixtureIds: string[];
  ruleHistogram: ConformanceHistogram;
  severityHistogram: ConformanceHistogram;
  categoryRollups: Record<string, ConformanceCategoryRollup>;
  results: ConformanceFixtureExecutionResult[];
}

/** Output paths produced when writing report artifacts to disk. */
export interface ConformanceExecutionArtifactPaths {
  jsonPath: string;
  markdownPath: string;
}
