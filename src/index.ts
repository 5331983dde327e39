// prefill-bench - Prefill/decode latency benchmark for RAG workloads
// Public API

export { PromptGenerator, validateGeneratorOptions, formatRagPrompt, estimateTokens, isWithinTolerance } from './prompt-generator.js';
export { BenchmarkRunner, toResultRecord } from './runner.js';
export type { BenchmarkRunnerOptions } from './runner.js';
export { PHASES, resolvePhases, isPhaseSelector } from './phases.js';
export type { Phase, PhaseContext } from './phases.js';
export {
  ResultAnalyzer,
  parseResultLines,
  loadResults,
  flattenSummaries,
  summaryColumns,
  toCsv,
  exportCsv,
  formatSummaryTables,
} from './analyzer.js';
export { describe as describeValues, mean, median, stdev } from './stats.js';
export { loadConfig, parseConfig, parseConfigText, getDefaultConfig, DEFAULT_CONFIG_PATH } from './config.js';
export { initLogging, getLogger, shutdownLogging, silentLogger } from './logger.js';
export type { LoggingOptions } from './logger.js';
export { RecordWriter, writeRecords, readRecords, parseRecordLines } from './record-stream.js';
export { PromptRecordSchema, ResultRecordSchema, BenchConfigSchema, RESULT_METRICS } from './schemas.js';
export * from './errors.js';
export { run, main, generate, VERSION } from './cli.js';

// Engine exports
export {
  OpenAICompatibleEngine,
  AnthropicEngine,
  VllmServer,
  NvidiaSmiProbe,
  NullMemoryProbe,
  createEngine,
  createMemoryProbe,
} from './engines/index.js';

// Re-export all types
export type {
  PromptRecord,
  ResultRecord,
  ResultMetric,
  BenchConfig,
  LoggingConfig,
  WorkloadConfig,
  LogLevelName,
  TokenCounter,
  GeneratorOptions,
  IPromptGenerator,
  GenerationRequest,
  GenerationResult,
  InferenceEngine,
  MemorySession,
  MemoryProbe,
  PhaseSelector,
  PhaseStatus,
  PhaseReport,
  SampleFailure,
  BaselineOutcome,
  MetricStats,
  SummaryRecord,
  SkippedRecord,
  ParsedResults,
  AnalysisReport,
  SummaryRow,
  IResultAnalyzer,
  RunOptions,
} from './types.js';
