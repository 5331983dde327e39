#!/usr/bin/env node
import { existsSync } from 'node:fs';
import type { Logger } from 'pino';
import { ResultAnalyzer, exportCsv, formatSummaryTables } from './analyzer.js';
import { DEFAULT_CONFIG_PATH, getDefaultConfig, loadConfig } from './config.js';
import { createEngine, createMemoryProbe } from './engines/index.js';
import { ConfigError, EngineAccessError, describeError } from './errors.js';
import { getLogger, initLogging, shutdownLogging } from './logger.js';
import { isPhaseSelector } from './phases.js';
import { PromptGenerator } from './prompt-generator.js';
import { BenchmarkRunner } from './runner.js';
import type { BenchConfig, LogLevelName } from './schemas.js';
import type { InferenceEngine, MemoryProbe, PhaseReport, RunOptions } from './types.js';

const VERSION = '0.1.0';
const DEFAULT_PROMPTS_PATH = 'data/rag_prompts.jsonl';

const HELP = `
prefill-bench v${VERSION} - Prefill/decode latency benchmark for RAG workloads

Usage:
  prefill-bench generate [options]          Generate synthetic RAG prompts
  prefill-bench run [options]               Run benchmark phases
  prefill-bench analyze <results.jsonl>     Summarize a results file

generate:
  --context-lengths <n...>  Context lengths in tokens (default: 2048 4096 8192 16384)
  --num-samples <n>         Samples per context length (default: 10)
  --output <path>           Output file (default: ${DEFAULT_PROMPTS_PATH})
  --seed <n>                Seed for reproducible prompts
  --tolerance <f>           Allowed context length deviation (default: 0.1)

run:
  --config <path>           Configuration file (default: ${DEFAULT_CONFIG_PATH})
  --prompts <path>          Prompts file, generated if missing (default: ${DEFAULT_PROMPTS_PATH})
  --output <path>           Results file (overrides output.results_dir/filename)
  --phase <1|2|all>         1=baseline inference, 2=result analysis (default: 1)
  --skip-prompt-generation  Fail instead of generating a missing prompts file

analyze:
  --output <path>           Export the summary as CSV
  --quiet                   Do not print the summary tables

Common:
  --log-level <level>       DEBUG, INFO, WARNING or ERROR (generate/analyze)
  -h, --help                Show this help
  --version                 Show the version
`;

// --- Argument helpers ---

function parseIntArg(value: string | undefined, flag: string): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new ConfigError(`expected an integer, got "${value ?? ''}"`, flag);
  }
  return Number.parseInt(value, 10);
}

function parseFloatArg(value: string | undefined, flag: string): number {
  const parsed = value === undefined ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`expected a number, got "${value ?? ''}"`, flag);
  }
  return parsed;
}

function requireValue(value: string | undefined, flag: string): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError('missing value', flag);
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogLevelName {
  switch (value) {
    case 'DEBUG':
    case 'INFO':
    case 'WARNING':
    case 'ERROR':
      return value;
    default:
      throw new ConfigError(`expected DEBUG, INFO, WARNING or ERROR, got "${value ?? ''}"`, '--log-level');
  }
}

function consoleLogging(level: LogLevelName): Logger {
  const defaults = getDefaultConfig().logging;
  return initLogging({ logDir: defaults.log_dir, level, console: true, file: false, name: 'prefill-bench' });
}

// --- generate ---

export interface GenerateOptions {
  contextLengths: number[];
  numSamples: number;
  output: string;
  seed?: number;
  tolerance?: number;
}

export function parseGenerateArgs(args: string[]): GenerateOptions & { logLevel: LogLevelName } {
  const defaults = getDefaultConfig().workload;
  const opts: GenerateOptions & { logLevel: LogLevelName } = {
    contextLengths: defaults.context_lengths,
    numSamples: defaults.num_samples,
    output: DEFAULT_PROMPTS_PATH,
    tolerance: defaults.tolerance,
    logLevel: 'INFO',
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--context-lengths': {
        const lengths: number[] = [];
        while (i + 1 < args.length && !args[i + 1].startsWith('--')) {
          lengths.push(parseIntArg(args[++i], '--context-lengths'));
        }
        if (lengths.length === 0) {
          throw new ConfigError('missing value', '--context-lengths');
        }
        opts.contextLengths = lengths;
        break;
      }
      case '--num-samples':
        opts.numSamples = parseIntArg(args[++i], '--num-samples');
        break;
      case '--output':
        opts.output = requireValue(args[++i], '--output');
        break;
      case '--seed':
        opts.seed = parseIntArg(args[++i], '--seed');
        break;
      case '--tolerance':
        opts.tolerance = parseFloatArg(args[++i], '--tolerance');
        break;
      case '--log-level':
        opts.logLevel = parseLogLevel(args[++i]);
        break;
      default:
        throw new ConfigError(`unknown option "${args[i]}"`, 'generate');
    }
  }
  return opts;
}

export async function generate(opts: GenerateOptions, logger?: Logger): Promise<number> {
  const generator = new PromptGenerator({
    contextLengths: opts.contextLengths,
    numSamples: opts.numSamples,
    seed: opts.seed,
    tolerance: opts.tolerance,
    logger,
  });
  const records = await generator.writePrompts(opts.output);
  console.log(`Generated ${records.length} prompts saved to ${opts.output}`);
  console.log(`Context lengths: ${[...new Set(opts.contextLengths)].sort((a, b) => a - b).join(', ')}`);
  console.log(`Samples per length: ${opts.numSamples}`);
  return records.length;
}

// --- run ---

export function parseRunArgs(args: string[]): RunOptions {
  const opts: RunOptions = { phase: '1' };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--config':
        opts.configPath = requireValue(args[++i], '--config');
        break;
      case '--prompts':
        opts.promptsPath = requireValue(args[++i], '--prompts');
        break;
      case '--output':
        opts.outputPath = requireValue(args[++i], '--output');
        break;
      case '--phase': {
        const phase = requireValue(args[++i], '--phase');
        if (!isPhaseSelector(phase)) {
          throw new ConfigError(`expected 1, 2 or all, got "${phase}"`, '--phase');
        }
        opts.phase = phase;
        break;
      }
      case '--skip-prompt-generation':
        opts.skipPromptGeneration = true;
        break;
      default:
        throw new ConfigError(`unknown option "${args[i]}"`, 'run');
    }
  }
  return opts;
}

export async function resolveConfig(configPath?: string): Promise<BenchConfig> {
  if (configPath) return loadConfig(configPath);
  if (existsSync(DEFAULT_CONFIG_PATH)) return loadConfig(DEFAULT_CONFIG_PATH);
  return getDefaultConfig();
}

export interface RunDependencies {
  engine?: InferenceEngine;
  memoryProbe?: MemoryProbe;
  signal?: AbortSignal;
}

/** Runs the selected phases with an already-initialized logger. */
export async function run(config: BenchConfig, opts: RunOptions, logger: Logger, deps: RunDependencies = {}): Promise<PhaseReport[]> {
  const engine = deps.engine ?? createEngine(config, logger.child({ component: 'engine' }));
  const memoryProbe = deps.memoryProbe ?? createMemoryProbe(config, logger.child({ component: 'memory' }));

  const runner = new BenchmarkRunner({
    config,
    engine,
    memoryProbe,
    promptsPath: opts.promptsPath ?? DEFAULT_PROMPTS_PATH,
    resultsPath: opts.outputPath,
    skipPromptGeneration: opts.skipPromptGeneration,
    logger,
  });
  return runner.runPhases(opts.phase ?? '1', deps.signal);
}

async function runCommand(args: string[]): Promise<number> {
  const opts = parseRunArgs(args);
  const config = await resolveConfig(opts.configPath);

  initLogging({
    logDir: config.logging.log_dir,
    level: config.logging.level,
    console: config.logging.console,
    file: config.logging.file,
    name: 'benchmark',
  });
  const logger = getLogger('runner');

  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    logger.warn({ signal: sig }, 'Interrupt received; finishing the current record and stopping');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const reports = await run(config, opts, logger, { signal: controller.signal });
    for (const report of reports) {
      console.log(`Phase ${report.id} (${report.name}): ${report.status} | completed ${report.completed} | failed ${report.failed}`);
    }
    if (reports.length === 0) {
      logger.warn({ phase: opts.phase }, 'No phases matched the selector');
    }
    return reports.every((r) => r.status === 'completed') ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

// --- analyze ---

export interface AnalyzeOptions {
  resultsPath: string;
  output?: string;
  quiet: boolean;
  logLevel: LogLevelName;
}

export function parseAnalyzeArgs(args: string[]): AnalyzeOptions {
  let resultsPath: string | undefined;
  const opts: Omit<AnalyzeOptions, 'resultsPath'> = { quiet: false, logLevel: 'INFO' };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--output':
        opts.output = requireValue(args[++i], '--output');
        break;
      case '--quiet':
        opts.quiet = true;
        break;
      case '--log-level':
        opts.logLevel = parseLogLevel(args[++i]);
        break;
      default:
        if (arg.startsWith('--') || resultsPath !== undefined) {
          throw new ConfigError(`unexpected argument "${arg}"`, 'analyze');
        }
        resultsPath = arg;
    }
  }

  if (resultsPath === undefined) {
    throw new ConfigError('a results file path is required', 'analyze');
  }
  return { resultsPath, ...opts };
}

async function analyzeCommand(args: string[]): Promise<number> {
  const opts = parseAnalyzeArgs(args);
  consoleLogging(opts.logLevel);
  const logger = getLogger('analyzer');

  if (!existsSync(opts.resultsPath)) {
    logger.error({ path: opts.resultsPath }, `Results file not found: ${opts.resultsPath}`);
    return 1;
  }

  const analyzer = new ResultAnalyzer({ logger });
  const report = await analyzer.analyzeFile(opts.resultsPath);
  if (report.summaries.length === 0) {
    logger.warn({ path: opts.resultsPath }, 'No valid results found in file');
  }

  if (!opts.quiet) {
    console.log('Benchmark Results Summary');
    for (const line of formatSummaryTables(report.summaries)) {
      console.log(line);
    }
  }
  if (opts.output) {
    await exportCsv(report.summaries, opts.output);
    logger.info({ path: opts.output }, `Results exported to CSV: ${opts.output}`);
  }
  return 0;
}

// --- Entry point ---

async function main(args: string[]): Promise<number> {
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    console.log(HELP);
    return 0;
  }
  if (command === '--version') {
    console.log(VERSION);
    return 0;
  }

  try {
    switch (command) {
      case 'generate': {
        const opts = parseGenerateArgs(args.slice(1));
        consoleLogging(opts.logLevel);
        await generate(opts, getLogger('generator'));
        return 0;
      }
      case 'run':
        return await runCommand(args.slice(1));
      case 'analyze':
        return await analyzeCommand(args.slice(1));
      default:
        console.error(`Error: unknown command "${command}". Run prefill-bench --help for usage.`);
        return 2;
    }
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      return 2;
    }
    if (err instanceof EngineAccessError) {
      console.error(`Error: ${err.message}\n${err.hint}`);
      return 1;
    }
    console.error(`Error: ${describeError(err)}`);
    return 1;
  } finally {
    shutdownLogging();
  }
}

const isMainModule = process.argv[1] && (
  process.argv[1].endsWith('/cli.ts') ||
  process.argv[1].endsWith('/cli.js') ||
  process.argv[1].endsWith('/prefill-bench')
);

if (isMainModule) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}

export { main, VERSION };
