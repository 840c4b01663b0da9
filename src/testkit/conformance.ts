import { access, readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { ConfigError, parseLinterConfig, type LinterConfig } from '../config/config-file.js';
import { isRuleId } from '../rules/rule-types.js';
import type { ConformanceFixtureMeta, ConformanceFixtureRecord, FixtureExpectation } from './conformance-types.js';

/** Validation error for malformed conformance metadata. */
export class ConformanceMetadataError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Metadata error in ${filePath}: ${message}`);
    this.name = 'ConformanceMetadataError';
    this.filePath = filePath;
  }
}

/** Accepted metadata filename suffixes. */
const META_SUFFIXES = ['.meta.yaml', '.meta.yml'];
/** Document extensions probed when resolving a fixture payload from metadata. */
const DOCUMENT_EXTENSIONS = ['.html', '.htm'];
const EXPECTATIONS: readonly FixtureExpectation[] = ['pass', 'fail', 'parse-error'];

/** Load and validate all conformance fixture records under `rootDir`. */
export async function loadConformanceFixtures(rootDir: string): Promise<ConformanceFixtureRecord[]> {
  const metaFiles = await findMetadataFiles(rootDir);
  const records: ConformanceFixtureRecord[] = [];

  for (const metaPath of metaFiles) {
    const raw = await readFile(metaPath, 'utf8');
    const parsed: unknown = parseYaml(raw);
    const meta = parseAndValidateMeta(metaPath, parsed);
    const documentPath = await resolveDocumentPath(metaPath);
    records.push({ metaPath, documentPath, meta });
  }

  records.sort((left, right) => left.meta.id.localeCompare(right.meta.id));
  return records;
}

/** Recursively discover metadata files from the conformance root. */
async function findMetadataFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (META_SUFFIXES.some((suffix) => entry.name.endsWith(suffix))) {
        matches.push(fullPath);
      }
    }
  }

  await walk(rootDir);
  return matches;
}

/** Parse YAML metadata into a validated `ConformanceFixtureMeta` object. */
export function parseAndValidateMeta(filePath: string, input: unknown): ConformanceFixtureMeta {
  if (!isRecord(input)) {
    throw new ConformanceMetadataError(filePath, 'metadata must be a YAML object');
  }

  const id = readRequiredString(filePath, input, 'id');
  const source = readRequiredString(filePath, input, 'source');
  const category = readRequiredString(filePath, input, 'category');

  const expectedRaw = readRequiredString(filePath, input, 'expected');
  const expected = EXPECTATIONS.find((value) => value === expectedRaw);
  if (!expected) {
    throw new ConformanceMetadataError(filePath, "'expected' must be 'pass', 'fail' or 'parse-error'");
  }

  const statusRaw = readRequiredString(filePath, input, 'status');
  if (statusRaw !== 'active' && statusRaw !== 'skip') {
    throw new ConformanceMetadataError(filePath, "'status' must be 'active' or 'skip'");
  }

  const meta: ConformanceFixtureMeta = {
    id,
    source,
    category,
    expected,
    status: statusRaw
  };

  const notes = readOptionalString(filePath, input, 'notes');
  if (notes !== undefined) {
    meta.notes = notes;
  }

  const options = readOptionalOptions(filePath, input, 'options');
  if (options !== undefined) {
    meta.options = options;
  }

  const expectedFindings = readOptionalFindingCounts(filePath, input, 'expected_findings');
  if (expectedFindings !== undefined) {
    meta.expected_findings = expectedFindings;
  }

  return meta;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a required non-empty string metadata field. */
function readRequiredString(filePath: string, obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConformanceMetadataError(filePath, `missing or invalid '${key}'`);
  }
  return value;
}

/** Read an optional string metadata field. */
function readOptionalString(filePath: string, obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new ConformanceMetadataError(filePath, `'${key}' must be a string`);
  }

  return value;
}

/** Validate fixture options with the configuration-file rules. */
function readOptionalOptions(filePath: string, obj: Record<string, unknown>, key: string): LinterConfig | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  try {
    return parseLinterConfig(filePath, value);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConformanceMetadataError(filePath, `'${key}': ${error.detail}`);
    }
    throw error;
  }
}

/** Read `rule-id: count` expectations. */
function readOptionalFindingCounts(
  filePath: string,
  obj: Record<string, unknown>,
  key: string
): Record<string, number> | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!isRecord(value)) {
    throw new ConformanceMetadataError(filePath, `'${key}' must be an object`);
  }

  const out: Record<string, number> = {};
  for (const [ruleId, count] of Object.entries(value)) {
    if (!isRuleId(ruleId)) {
      throw new ConformanceMetadataError(filePath, `'${key}' names unknown rule '${ruleId}'`);
    }
    if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
      throw new ConformanceMetadataError(filePath, `'${key}.${ruleId}' must be a non-negative integer`);
    }
    out[ruleId] = count;
  }
  return out;
}

/** Resolve the HTML document that belongs to one metadata file. */
async function resolveDocumentPath(metaPath: string): Promise<string> {
  const base = stripMetaSuffix(metaPath);

  for (const extension of DOCUMENT_EXTENSIONS) {
    const candidate = `${base}${extension}`;
    if (await exists(candidate)) {
      return candidate;
    }
  }

  throw new ConformanceMetadataError(metaPath, 'no matching HTML document found for metadata');
}

/** Remove `.meta.yaml`/`.meta.yml` from a metadata file path. */
function stripMetaSuffix(filePath: string): string {
  for (const suffix of META_SUFFIXES) {
    if (filePath.endsWith(suffix)) {
      return filePath.slice(0, -suffix.length);
    }
  }

  return filePath;
}

/** Promise-based existence check used by fixture resolution. */
async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}
