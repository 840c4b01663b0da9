/** Severity classes attached to every lint finding. */
export type FindingSeverity = 'error' | 'warning' | 'info';

/** Severities in descending order of weight. */
export const FINDING_SEVERITIES: readonly FindingSeverity[] = ['error', 'warning', 'info'];

/**
 * `violation` marks a convention breach; `skip` records a node a rule could not
 * evaluate (for example an unparseable `style` attribute).
 */
export type FindingKind = 'violation' | 'skip';

/** Source coordinates of the element a finding points at. */
export interface FindingSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical finding object carried by reports. */
export interface Finding {
  ruleId: string;
  severity: FindingSeverity;
  kind: FindingKind;
  message: string;
  path: string;
  source?: FindingSource;
}

/** Narrow arbitrary input to a known severity. */
export function isFindingSeverity(value: unknown): value is FindingSeverity {
  return FINDING_SEVERITIES.some((severity) => severity === value);
}
