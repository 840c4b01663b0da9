import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  loadLinterConfig,
  parseLinterConfig,
  toAnalyzeOptions
} from '../../src/config/config-file.js';

async function writeConfig(contents: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'markup-lint-config-'));
  const filePath = path.join(dir, 'markup-lint.config.yaml');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
}

describe('linter configuration', () => {
  it('loads every supported key', async () => {
    const filePath = await writeConfig(
      [
        'state_lexicon: [selected, open]',
        'disabled_rules: [hardcoded-color]',
        'treat_warnings_as_errors: true',
        'overlay_components: [sheet]',
        'severity:',
        '  absolute-positioning: warning',
        'max_depth: 64'
      ].join('\n')
    );

    await expect(loadLinterConfig(filePath)).resolves.toEqual({
      state_lexicon: ['selected', 'open'],
      disabled_rules: ['hardcoded-color'],
      treat_warnings_as_errors: true,
      overlay_components: ['sheet'],
      severity: { 'absolute-positioning': 'warning' },
      max_depth: 64
    });
  });

  it('treats an empty file as an empty config', async () => {
    const filePath = await writeConfig('');

    await expect(loadLinterConfig(filePath)).resolves.toEqual({});
  });

  it('rejects unknown keys with the file path in the message', async () => {
    const filePath = await writeConfig('colours: true\n');

    await expect(loadLinterConfig(filePath)).rejects.toThrow(`Config error in ${filePath}: unknown key 'colours'`);
  });

  it('rejects files that cannot be read', async () => {
    await expect(loadLinterConfig(path.join(os.tmpdir(), 'markup-lint-missing', 'none.yaml'))).rejects.toBeInstanceOf(
      ConfigError
    );
  });

  it('validates rule ids, severities and types', () => {
    expect(() => parseLinterConfig('inline', { disabled_rules: ['no-such-rule'] })).toThrow(
      "Config error in inline: 'disabled_rules' names unknown rule 'no-such-rule'"
    );
    expect(() => parseLinterConfig('inline', { severity: { 'state-via-class': 'fatal' } })).toThrow(
      "'severity.state-via-class' must be 'error', 'warning' or 'info'"
    );
    expect(() => parseLinterConfig('inline', { state_lexicon: 'active' })).toThrow(
      "'state_lexicon' must be an array of strings"
    );
    expect(() => parseLinterConfig('inline', { max_depth: 0 })).toThrow("'max_depth' must be a positive integer");
    expect(() => parseLinterConfig('inline', ['a'])).toThrow('configuration must be a YAML object');
  });

  it('maps file keys onto analysis options', () => {
    expect(
      toAnalyzeOptions({
        state_lexicon: ['open'],
        treat_warnings_as_errors: true,
        severity: { 'hardcoded-color': 'error' }
      })
    ).toEqual({
      stateLexicon: ['open'],
      disabledRules: undefined,
      treatWarningsAsErrors: true,
      overlayComponents: undefined,
      severityOverrides: { 'hardcoded-color': 'error' },
      maxDepth: undefined
    });
  });
});
