#!/usr/bin/env node

import { access, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  ConfigError,
  DEFAULT_CONFIG_FILE,
  loadLinterConfig,
  toAnalyzeOptions,
  type LinterConfig
} from '../config/config-file.js';
import { parseCsvArgument } from '../core/execution-loop.js';
import { createLogger, LOG_LEVEL_ENV, resolveLogLevel, type Logger } from '../core/logger.js';
import {
  analyzeBatch,
  DEFAULT_BATCH_CONCURRENCY,
  formatReportJson,
  formatReportMarkdown,
  formatReportText,
  isRuleId,
  listRules,
  type BatchAnalysisInput,
  type BatchAnalyzeOptions,
  type Report
} from '../public/api.js';

/** Process exit codes. */
export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

type OutputFormat = 'text' | 'json' | 'markdown';

/** Host surface the CLI talks to; tests pass in-memory stand-ins. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  cwd: string;
  env: Record<string, string | undefined>;
}

interface CliArguments {
  files: string[];
  format: OutputFormat;
  configPath?: string;
  disable?: string[];
  stateLexicon?: string[];
  warningsAsErrors: boolean;
  concurrency: number;
  listRules: boolean;
  help: boolean;
}

const usage = [
  'markup-lint [options] <file...>     ("-" reads stdin)',
  '  --format text|json|markdown',
  '  --config <path>                   (default ./markup-lint.config.yaml when present)',
  '  --disable <rule,rule>',
  '  --state-lexicon <state,state>',
  '  --warnings-as-errors',
  '  --concurrency <n>',
  '  --list-rules',
  '  --help'
].join('\n');

/** Bad command line; reported with the usage text. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Run the CLI and resolve to its exit code; never rejects for expected failures. */
export async function runLintCli(argv: string[], io: CliIo = processIo()): Promise<number> {
  const logger = createLogger({
    level: resolveLogLevel(io.env[LOG_LEVEL_ENV]),
    sink: (line) => io.stderr(`${line}\n`)
  });

  let args: CliArguments;
  try {
    args = parseArguments(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      io.stderr(`${error.message}\n${usage}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    io.stdout(`${usage}\n`);
    return EXIT_PASSED;
  }
  if (args.listRules) {
    for (const rule of listRules()) {
      io.stdout(`${rule.id.padEnd(26)} ${rule.defaultSeverity.padEnd(7)} ${rule.description}\n`);
    }
    return EXIT_PASSED;
  }
  if (args.files.length === 0) {
    io.stderr(`No input files.\n${usage}\n`);
    return EXIT_USAGE;
  }

  let options: BatchAnalyzeOptions;
  let inputs: BatchAnalysisInput[];
  try {
    options = buildOptions(args, await loadConfig(args, io, logger));
    inputs = await readInputs(args.files, io);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof CliUsageError) {
      io.stderr(`${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const results = await analyzeBatch(inputs, options);
  const reports: Report[] = [];
  let parseFailed = false;

  for (const result of results) {
    if (result.parseError) {
      parseFailed = true;
      const source = result.parseError.source;
      const where = `${result.sourceName ?? '<stdin>'}:${source?.line ?? 1}:${source?.column ?? 1}`;
      io.stderr(`${where}: ${result.parseError.message}\n`);
      logger.error('parse failed', { source: result.sourceName });
      continue;
    }
    if (result.report) {
      reports.push(result.report);
      logger.debug('analyzed', { source: result.sourceName, ...result.report.summary });
    }
  }

  io.stdout(renderReports(reports, args.format));

  if (parseFailed) {
    return EXIT_USAGE;
  }
  return reports.every((report) => report.passed) ? EXIT_PASSED : EXIT_FAILED;
}

function renderReports(reports: readonly Report[], format: OutputFormat): string {
  if (format === 'json') {
    return formatReportJson(reports);
  }
  if (format === 'markdown') {
    return formatReportMarkdown(reports);
  }
  return reports.map(formatReportText).join('');
}

function parseArguments(argv: string[]): CliArguments {
  const args: CliArguments = {
    files: [],
    format: 'text',
    warningsAsErrors: false,
    concurrency: DEFAULT_BATCH_CONCURRENCY,
    listRules: false,
    help: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';
    const readValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`Missing value for ${token}`);
      }
      i += 1;
      return value;
    };

    switch (token) {
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--list-rules':
        args.listRules = true;
        break;
      case '--warnings-as-errors':
        args.warningsAsErrors = true;
        break;
      case '--format': {
        const format = readValue();
        if (format !== 'text' && format !== 'json' && format !== 'markdown') {
          throw new CliUsageError(`Unknown format: ${format}`);
        }
        args.format = format;
        break;
      }
      case '--config':
        args.configPath = readValue();
        break;
      case '--disable': {
        const ids = parseCsvArgument(readValue()) ?? [];
        const unknown = ids.find((id) => !isRuleId(id));
        if (unknown !== undefined) {
          throw new CliUsageError(`Unknown rule: ${unknown}`);
        }
        args.disable = ids;
        break;
      }
      case '--state-lexicon':
        args.stateLexicon = parseCsvArgument(readValue());
        break;
      case '--concurrency': {
        const value = Number.parseInt(readValue(), 10);
        if (!Number.isInteger(value) || value <= 0) {
          throw new CliUsageError('--concurrency must be a positive integer');
        }
        args.concurrency = value;
        break;
      }
      default:
        if (token.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${token}`);
        }
        args.files.push(token);
    }
  }

  return args;
}

async function loadConfig(args: CliArguments, io: CliIo, logger: Logger): Promise<LinterConfig> {
  if (args.configPath) {
    return loadLinterConfig(path.resolve(io.cwd, args.configPath));
  }

  const defaultPath = path.join(io.cwd, DEFAULT_CONFIG_FILE);
  try {
    await access(defaultPath);
  } catch {
    logger.debug('no config file', { path: defaultPath });
    return {};
  }
  return loadLinterConfig(defaultPath);
}

/** Command-line flags win over file values; `--disable` adds to the file's list. */
function buildOptions(args: CliArguments, config: LinterConfig): BatchAnalyzeOptions {
  const fromConfig = toAnalyzeOptions(config);
  return {
    ...fromConfig,
    stateLexicon: args.stateLexicon ?? fromConfig.stateLexicon,
    disabledRules: [...(config.disabled_rules ?? []), ...(args.disable ?? [])],
    treatWarningsAsErrors: args.warningsAsErrors || (fromConfig.treatWarningsAsErrors ?? false),
    concurrency: args.concurrency
  };
}

async function readInputs(files: readonly string[], io: CliIo): Promise<BatchAnalysisInput[]> {
  const inputs: BatchAnalysisInput[] = [];
  for (const file of files) {
    if (file === '-') {
      inputs.push({ source: await io.readStdin(), sourceName: '<stdin>' });
      continue;
    }
    try {
      inputs.push({ source: await readFile(path.resolve(io.cwd, file), 'utf8'), sourceName: file });
    } catch (error) {
      throw new CliUsageError(`Cannot read ${file}: ${error instanceof Error ? error.message : 'unknown error'}`);
    }
  }
  return inputs;
}

function processIo(): CliIo {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readStdin: async () => {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString('utf8');
    },
    cwd: process.cwd(),
    env: process.env
  };
}

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : '';

if (entryPath && currentPath === entryPath) {
  runLintCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unknown CLI crash.';
      process.stderr.write(`${message}\n`);
      process.exitCode = EXIT_USAGE;
    });
}
