import { mkdtemp, mkdir, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  ConformanceMetadataError,
  loadConformanceFixtures,
  parseAndValidateMeta
} from '../../src/testkit/conformance.js';

async function fixtureDir(meta: string[], documentName = 'case.html'): Promise<string> {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'markup-lint-conformance-'));
  const dir = path.join(tempDir, 'case');
  await mkdir(dir, { recursive: true });
  await writeFile(path.join(dir, 'case.meta.yaml'), meta.join('\n'), 'utf8');
  await writeFile(path.join(dir, documentName), '<p>x</p>', 'utf8');
  return tempDir;
}

describe('conformance fixture loader', () => {
  it('loads repository conformance fixtures sorted by id', async () => {
    const fixtures = await loadConformanceFixtures(path.resolve('fixtures/conformance'));
    const ids = fixtures.map((fixture) => fixture.meta.id);

    expect(fixtures).toHaveLength(11);
    expect(ids).toEqual([...ids].sort((left, right) => left.localeCompare(right)));

    const strict = fixtures.find((fixture) => fixture.meta.id === 'components-state-classes-strict');
    expect(strict?.documentPath.endsWith(path.join('components', 'state-classes.html'))).toBe(true);
    expect(strict?.meta.options).toEqual({ treat_warnings_as_errors: true });
    expect(strict?.meta.expected_findings).toEqual({ 'state-via-class': 2 });

    const skipped = fixtures.find((fixture) => fixture.meta.id === 'experimental-named-colors');
    expect(skipped?.meta.status).toBe('skip');
  });

  it('resolves .htm documents', async () => {
    const root = await fixtureDir(
      ['id: legacy', 'source: test', 'category: smoke', 'expected: pass', 'status: active'],
      'case.htm'
    );

    const [fixture] = await loadConformanceFixtures(root);
    expect(fixture?.documentPath.endsWith('case.htm')).toBe(true);
  });

  it('fails on invalid metadata shape', async () => {
    const root = await fixtureDir(['id: bad', 'source: test', 'category: smoke', 'expected: maybe', 'status: active']);

    await expect(loadConformanceFixtures(root)).rejects.toBeInstanceOf(ConformanceMetadataError);
  });

  it('fails when the metadata has no document beside it', async () => {
    const root = await fixtureDir(
      ['id: orphan', 'source: test', 'category: smoke', 'expected: pass', 'status: active'],
      'case.txt'
    );

    await expect(loadConformanceFixtures(root)).rejects.toThrow('no matching HTML document found for metadata');
  });

  it('validates fixture options and expected finding counts', () => {
    const base = { id: 'x', source: 'test', category: 'smoke', expected: 'pass', status: 'active' };

    expect(() => parseAndValidateMeta('x.meta.yaml', { ...base, options: { colours: true } })).toThrow(
      "Metadata error in x.meta.yaml: 'options': unknown key 'colours'"
    );
    expect(() => parseAndValidateMeta('x.meta.yaml', { ...base, expected_findings: { 'no-rule': 1 } })).toThrow(
      "'expected_findings' names unknown rule 'no-rule'"
    );
    expect(() =>
      parseAndValidateMeta('x.meta.yaml', { ...base, expected_findings: { 'hardcoded-color': -1 } })
    ).toThrow("'expected_findings.hardcoded-color' must be a non-negative integer");
    expect(parseAndValidateMeta('x.meta.yaml', { ...base, expected: 'parse-error', notes: 'n' })).toEqual({
      ...base,
      expected: 'parse-error',
      notes: 'n'
    });
  });
});
