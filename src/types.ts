// ============================================================
// prefill-bench - Type Definitions
// ============================================================

import type { Logger } from 'pino';
import type { PromptRecord, ResultMetric, ResultRecord } from './schemas.js';

export type { PromptRecord, ResultRecord, ResultMetric } from './schemas.js';
export type { BenchConfig, LoggingConfig, WorkloadConfig, LogLevelName } from './schemas.js';

// --- Prompt Generator ---

/** Counts tokens in a piece of text. The default is a 4-chars-per-token estimate. */
export type TokenCounter = (text: string) => number;

export interface GeneratorOptions {
  contextLengths: number[];
  numSamples: number;
  /** Omit for an unseeded run (a random run seed is drawn once). */
  seed?: number;
  /** Allowed relative deviation of the realized context length, e.g. 0.1 for ±10%. */
  tolerance?: number;
  charsPerToken?: number;
  tokenCounter?: TokenCounter;
  logger?: Logger;
}

export interface IPromptGenerator {
  generate(): PromptRecord[];
  generateSample(contextLength: number, sampleId: number): PromptRecord;
  writePrompts(path: string): Promise<PromptRecord[]>;
}

// --- Inference Engine ---

export interface GenerationRequest {
  prompt: string;
  maxTokens: number;
}

/**
 * Timestamps are milliseconds on the monotonic clock (`performance.now()`).
 * `firstTokenAt` is absent when nothing was decoded.
 */
export interface GenerationResult {
  promptTokens: number;
  outputTokens: number;
  submittedAt: number;
  firstTokenAt?: number;
  completedAt: number;
  /** Engine-side peak memory reading for the call, when the engine has one. */
  peakMemoryGb?: number;
  text?: string;
}

export interface InferenceEngine {
  readonly name: string;
  /** Aborting `signal` abandons a start that has not finished yet. */
  start?(signal?: AbortSignal): Promise<void>;
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
  stop?(): Promise<void>;
}

// --- Memory Probe ---

export interface MemorySession {
  /** Ends sampling and resolves to the peak reading in GiB. */
  stop(): Promise<number>;
}

export interface MemoryProbe {
  begin(): MemorySession;
}

// --- Benchmark Runner ---

export type PhaseSelector = '1' | '2' | 'all';
export type PhaseStatus = 'completed' | 'failed' | 'aborted' | 'skipped';

export interface PhaseReport {
  id: number;
  name: string;
  status: PhaseStatus;
  completed: number;
  failed: number;
  skipped: number;
  outputPath?: string;
  error?: string;
}

export interface SampleFailure {
  contextLength: number;
  sampleId: number;
  kind: string;
  message: string;
}

export interface BaselineOutcome {
  results: ResultRecord[];
  failures: SampleFailure[];
  aborted: boolean;
}

// --- Result Analyzer ---

export interface MetricStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  median: number;
  stdev: number;
}

export interface SummaryRecord {
  context_length: number;
  sample_count: number;
  metrics: Record<ResultMetric, MetricStats>;
}

export interface SkippedRecord {
  line: number;
  reason: string;
}

export interface ParsedResults {
  records: ResultRecord[];
  skipped: SkippedRecord[];
}

export interface AnalysisReport {
  summaries: SummaryRecord[];
  skipped: SkippedRecord[];
  total: number;
}

export type SummaryRow = Record<string, number>;

export interface IResultAnalyzer {
  analyze(records: ResultRecord[]): SummaryRecord[];
  analyzeFile(path: string): Promise<AnalysisReport>;
}

// --- CLI ---

export interface RunOptions {
  configPath?: string;
  promptsPath?: string;
  outputPath?: string;
  phase?: PhaseSelector;
  skipPromptGeneration?: boolean;
}
