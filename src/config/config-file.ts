import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { isFindingSeverity, type FindingSeverity } from '../core/findings.js';
import type { AnalyzeOptions } from '../core/options.js';
import { isRuleId, type RuleId } from '../rules/rule-types.js';

/** File the CLI picks up from the working directory when `--config` is absent. */
export const DEFAULT_CONFIG_FILE = 'markup-lint.config.yaml';

/** Configuration file contract; keys mirror the YAML spelling. */
export interface LinterConfig {
  state_lexicon?: string[];
  disabled_rules?: RuleId[];
  treat_warnings_as_errors?: boolean;
  overlay_components?: string[];
  severity?: Partial<Record<RuleId, FindingSeverity>>;
  max_depth?: number;
}

/** Validation error for malformed configuration. */
export class ConfigError extends Error {
  readonly filePath: string;
  readonly detail: string;

  constructor(filePath: string, detail: string) {
    super(`Config error in ${filePath}: ${detail}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
    this.detail = detail;
  }
}

/** Read, parse and validate a YAML configuration file. */
export async function loadLinterConfig(filePath: string): Promise<LinterConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'unreadable file');
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(filePath, error instanceof Error ? error.message : 'invalid YAML');
  }

  // An empty file is an empty config.
  return parseLinterConfig(filePath, parsed ?? {});
}

/** Validate an already-parsed YAML value into a {@link LinterConfig}. */
export function parseLinterConfig(filePath: string, input: unknown): LinterConfig {
  if (!isRecord(input)) {
    throw new ConfigError(filePath, 'configuration must be a YAML object');
  }

  const known = new Set([
    'state_lexicon',
    'disabled_rules',
    'treat_warnings_as_errors',
    'overlay_components',
    'severity',
    'max_depth'
  ]);
  for (const key of Object.keys(input)) {
    if (!known.has(key)) {
      throw new ConfigError(filePath, `unknown key '${key}'`);
    }
  }

  const config: LinterConfig = {};

  const stateLexicon = readOptionalStringArray(filePath, input, 'state_lexicon');
  if (stateLexicon !== undefined) {
    config.state_lexicon = stateLexicon;
  }

  const disabledRules = readOptionalStringArray(filePath, input, 'disabled_rules');
  if (disabledRules !== undefined) {
    config.disabled_rules = disabledRules.map((id) => {
      if (!isRuleId(id)) {
        throw new ConfigError(filePath, `'disabled_rules' names unknown rule '${id}'`);
      }
      return id;
    });
  }

  const warningsAsErrors = input.treat_warnings_as_errors;
  if (warningsAsErrors !== undefined && warningsAsErrors !== null) {
    if (typeof warningsAsErrors !== 'boolean') {
      throw new ConfigError(filePath, "'treat_warnings_as_errors' must be a boolean");
    }
    config.treat_warnings_as_errors = warningsAsErrors;
  }

  const overlayComponents = readOptionalStringArray(filePath, input, 'overlay_components');
  if (overlayComponents !== undefined) {
    config.overlay_components = overlayComponents;
  }

  const severity = readOptionalSeverityMap(filePath, input, 'severity');
  if (severity !== undefined) {
    config.severity = severity;
  }

  const maxDepth = input.max_depth;
  if (maxDepth !== undefined && maxDepth !== null) {
    if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth <= 0) {
      throw new ConfigError(filePath, "'max_depth' must be a positive integer");
    }
    config.max_depth = maxDepth;
  }

  return config;
}

/** Map configuration keys onto analysis options. */
export function toAnalyzeOptions(config: LinterConfig): AnalyzeOptions {
  return {
    stateLexicon: config.state_lexicon,
    disabledRules: config.disabled_rules,
    treatWarningsAsErrors: config.treat_warnings_as_errors,
    overlayComponents: config.overlay_components,
    severityOverrides: config.severity,
    maxDepth: config.max_depth
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read an optional string-array field. */
function readOptionalStringArray(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(filePath, `'${key}' must be an array of strings`);
  }

  return value;
}

/** Read an optional `rule-id: severity` map. */
function readOptionalSeverityMap(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Partial<Record<RuleId, FindingSeverity>> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isRecord(value)) {
    throw new ConfigError(filePath, `'${key}' must be an object`);
  }

  const out: Partial<Record<RuleId, FindingSeverity>> = {};
  for (const [ruleId, severity] of Object.entries(value)) {
    if (!isRuleId(ruleId)) {
      throw new ConfigError(filePath, `'${key}' names unknown rule '${ruleId}'`);
    }
    if (!isFindingSeverity(severity)) {
      throw new ConfigError(filePath, `'${key}.${ruleId}' must be 'error', 'warning' or 'info'`);
    }
    out[ruleId] = severity;
  }
  return out;
}
