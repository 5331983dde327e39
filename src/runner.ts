import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import {
  AbortedError,
  BenchError,
  EngineAccessError,
  EngineRequestError,
  EngineTimeoutError,
  describeError,
  isSampleFailure,
} from './errors.js';
import { NullMemoryProbe } from './engines/memory-probe.js';
import { logHeader, silentLogger } from './logger.js';
import { resolvePhases } from './phases.js';
import { PromptGenerator } from './prompt-generator.js';
import { RecordWriter, readRecords } from './record-stream.js';
import { PromptRecordSchema } from './schemas.js';
import type { BenchConfig, PromptRecord, ResultRecord } from './schemas.js';
import type {
  BaselineOutcome,
  GenerationResult,
  InferenceEngine,
  MemoryProbe,
  MemorySession,
  PhaseReport,
  PhaseSelector,
  SampleFailure,
} from './types.js';

export interface BenchmarkRunnerOptions {
  config: BenchConfig;
  engine: InferenceEngine;
  memoryProbe?: MemoryProbe;
  promptsPath: string;
  /** Overrides `output.results_dir` / `output.filename`. */
  resultsPath?: string;
  skipPromptGeneration?: boolean;
  logger?: Logger;
}

/**
 * Turns one engine call into a ResultRecord. Times are converted from
 * milliseconds to seconds; a call that decoded nothing gets
 * `ttft = total_latency`.
 */
export function toResultRecord(prompt: PromptRecord, generation: GenerationResult, probePeakGb: number): ResultRecord {
  const totalLatency = Math.max(0, (generation.completedAt - generation.submittedAt) / 1000);
  const ttft = generation.firstTokenAt === undefined
    ? totalLatency
    : Math.min(totalLatency, Math.max(0, (generation.firstTokenAt - generation.submittedAt) / 1000));
  const decodeWindow = totalLatency - ttft;
  const decodeThroughput = generation.outputTokens > 1 && decodeWindow > 0
    ? (generation.outputTokens - 1) / decodeWindow
    : 0;

  return {
    context_length: prompt.context_length,
    sample_id: prompt.sample_id,
    prompt_tokens: generation.promptTokens,
    output_tokens: generation.outputTokens,
    ttft,
    total_latency: totalLatency,
    decode_throughput: decodeThroughput,
    peak_gpu_memory_gb: generation.peakMemoryGb ?? probePeakGb,
    timestamp: Date.now() / 1000,
  };
}

export class BenchmarkRunner {
  readonly config: BenchConfig;
  readonly promptsPath: string;
  readonly resultsPath: string;
  readonly summaryPath: string;
  readonly logger: Logger;
  private engine: InferenceEngine;
  private memoryProbe: MemoryProbe;
  private skipPromptGeneration: boolean;

  constructor(opts: BenchmarkRunnerOptions) {
    this.config = opts.config;
    this.engine = opts.engine;
    this.memoryProbe = opts.memoryProbe ?? new NullMemoryProbe();
    this.promptsPath = opts.promptsPath;
    this.resultsPath = opts.resultsPath ?? join(opts.config.output.results_dir, opts.config.output.filename);
    this.summaryPath = join(opts.config.output.results_dir, opts.config.output.summary_filename);
    this.skipPromptGeneration = opts.skipPromptGeneration ?? false;
    this.logger = opts.logger ?? silentLogger();
  }

  // --- Prompts ---

  async ensurePrompts(): Promise<PromptRecord[]> {
    if (existsSync(this.promptsPath)) {
      this.logger.info({ path: this.promptsPath }, `Using existing prompts: ${this.promptsPath}`);
      const { records, skipped } = await readRecords(this.promptsPath, PromptRecordSchema);
      for (const skip of skipped) {
        this.logger.warn({ path: this.promptsPath, line: skip.line, reason: skip.reason }, 'Skipping malformed prompt record');
      }
      return records;
    }

    if (this.skipPromptGeneration) {
      throw new Error(`Prompts file not found: ${this.promptsPath}`);
    }

    const { workload } = this.config;
    const generator = new PromptGenerator({
      contextLengths: workload.context_lengths,
      numSamples: workload.num_samples,
      seed: workload.seed,
      tolerance: workload.tolerance,
      logger: this.logger,
    });
    this.logger.info({ path: this.promptsPath }, 'Generating RAG prompts');
    return generator.writePrompts(this.promptsPath);
  }

  // --- Engine lifecycle ---

  async startEngine(signal?: AbortSignal): Promise<void> {
    this.logger.info({ engine: this.engine.name, model: this.config.model.name }, `Initializing ${this.engine.name} engine with model: ${this.config.model.name}`);
    await this.engine.start?.(signal);
  }

  async stopEngine(): Promise<void> {
    await this.engine.stop?.();
  }

  // --- Samples ---

  /**
   * Runs one prompt to completion. Resolves only after the engine call has
   * finished or been given up on, so callers never overlap samples.
   */
  async runSample(prompt: PromptRecord, signal?: AbortSignal): Promise<ResultRecord> {
    if (signal?.aborted) {
      throw new AbortedError('Run aborted before the sample was submitted');
    }

    const timeoutMs = this.config.engine.timeout_ms;
    const controller = new AbortController();
    let onAbort: (() => void) | undefined;
    let timer: NodeJS.Timeout | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new EngineTimeoutError(`Sample timed out after ${timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
      onAbort = () => {
        const err = new AbortedError('Run aborted while the sample was in flight');
        controller.abort(err);
        reject(err);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    let session: MemorySession | undefined;
    let generation: GenerationResult;
    let peak = 0;
    try {
      session = this.memoryProbe.begin();
      // Wrapped so an engine that throws synchronously still goes through the race.
      const pending = Promise.resolve().then(() => this.engine.generate(
        { prompt: prompt.prompt, maxTokens: this.config.workload.decode_length },
        controller.signal,
      ));
      // A call abandoned by the timeout may still settle later.
      pending.catch((err: unknown) => {
        if (controller.signal.aborted) {
          this.logger.debug({ contextLength: prompt.context_length, sampleId: prompt.sample_id, err: describeError(err) }, 'Abandoned engine call settled');
        }
      });
      generation = await Promise.race([pending, interrupted]);
    } finally {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener('abort', onAbort);
      if (session) peak = await session.stop();
    }

    return toResultRecord(prompt, generation, peak);
  }

  async runBaseline(prompts: PromptRecord[], resultsPath = this.resultsPath, signal?: AbortSignal): Promise<BaselineOutcome> {
    const outcome: BaselineOutcome = { results: [], failures: [], aborted: false };
    const writer = await RecordWriter.open<ResultRecord>(resultsPath, { truncate: true });

    logHeader(this.logger, 'RAG Prefill-Decode Asymmetry Baseline Benchmark');
    this.logger.info({ prompts: prompts.length, resultsPath }, `Running inference on ${prompts.length} prompts...`);

    try {
      for (let i = 0; i < prompts.length; i++) {
        const prompt = prompts[i];
        if (signal?.aborted) {
          outcome.aborted = true;
          break;
        }

        let record: ResultRecord;
        try {
          record = await this.runSample(prompt, signal);
        } catch (err: unknown) {
          if (err instanceof AbortedError || signal?.aborted) {
            outcome.aborted = true;
            this.logger.warn(
              { contextLength: prompt.context_length, sampleId: prompt.sample_id },
              'Run aborted; discarding in-flight sample',
            );
            break;
          }
          if (err instanceof EngineAccessError) {
            throw err;
          }
          const failure = this.recordFailure(prompt, err);
          outcome.failures.push(failure);
          continue;
        }

        await writer.append(record);
        outcome.results.push(record);
        this.logger.info(
          {
            contextLength: record.context_length,
            sampleId: record.sample_id,
            promptTokens: record.prompt_tokens,
            outputTokens: record.output_tokens,
          },
          `[${i + 1}/${prompts.length}] Context length: ${record.context_length} tokens `
          + `(actual: ${record.prompt_tokens} tokens), Sample: ${record.sample_id} | `
          + `TTFT: ${record.ttft.toFixed(3)}s | Total: ${record.total_latency.toFixed(3)}s | `
          + `Throughput: ${record.decode_throughput.toFixed(2)} tokens/s | Memory: ${record.peak_gpu_memory_gb.toFixed(2)} GB`,
        );
      }
    } finally {
      await writer.close();
    }

    if (outcome.failures.length > 0) {
      this.logger.warn(
        { failed: outcome.failures.length, completed: outcome.results.length },
        `${outcome.failures.length} of ${prompts.length} samples failed`,
      );
    }
    logHeader(this.logger, `Benchmark complete! ${outcome.results.length} results saved to ${resultsPath}`);
    return outcome;
  }

  private recordFailure(prompt: PromptRecord, err: unknown): SampleFailure {
    const error: BenchError = isSampleFailure(err)
      ? err
      : new EngineRequestError(`Unexpected engine failure: ${describeError(err)}`, undefined, { cause: err });
    const failure: SampleFailure = {
      contextLength: prompt.context_length,
      sampleId: prompt.sample_id,
      kind: error.kind,
      message: error.message,
    };
    this.logger.error(
      { contextLength: failure.contextLength, sampleId: failure.sampleId, kind: failure.kind },
      `Sample failed (context_length=${failure.contextLength}, sample_id=${failure.sampleId}): ${failure.message}`,
    );
    if (error.kind === 'resource') {
      this.logger.warn('Device memory exhausted; consider lowering inference.gpu_memory_utilization and re-running');
    }
    return failure;
  }

  /** Per-context averages logged at the end of the baseline phase. */
  logContextAverages(results: ResultRecord[]): void {
    this.logger.info('Summary Statistics:');
    const lengths = [...new Set([...this.config.workload.context_lengths, ...results.map((r) => r.context_length)])]
      .sort((a, b) => a - b);
    for (const contextLength of lengths) {
      const group = results.filter((r) => r.context_length === contextLength);
      if (group.length === 0) continue;
      const avg = (pick: (r: ResultRecord) => number) => group.reduce((sum, r) => sum + pick(r), 0) / group.length;
      this.logger.info(
        { contextLength, samples: group.length },
        `Context ${contextLength} tokens: TTFT=${avg((r) => r.ttft).toFixed(3)}s, `
        + `Throughput=${avg((r) => r.decode_throughput).toFixed(2)} tok/s, `
        + `Latency=${avg((r) => r.total_latency).toFixed(3)}s`,
      );
    }
  }

  // --- Phases ---

  async runPhases(selector: PhaseSelector, signal?: AbortSignal): Promise<PhaseReport[]> {
    const reports: PhaseReport[] = [];

    for (const phase of resolvePhases(selector)) {
      if (signal?.aborted) break;
      const dependency = phase.dependsOn === undefined
        ? undefined
        : reports.find((r) => r.id === phase.dependsOn);
      if (dependency && dependency.status !== 'completed') {
        const reason = `phase ${dependency.id} (${dependency.name}) did not complete`;
        this.logger.warn({ phase: phase.name }, `Skipping phase ${phase.id} (${phase.name}): ${reason}`);
        reports.push({ id: phase.id, name: phase.name, status: 'skipped', completed: 0, failed: 0, skipped: 0, error: reason });
        continue;
      }
      logHeader(this.logger, `Phase ${phase.id}: ${phase.description}`);

      let report: PhaseReport;
      try {
        report = await phase.run({ runner: this, signal });
      } catch (err: unknown) {
        const message = describeError(err);
        if (err instanceof EngineAccessError) {
          this.logger.error({ phase: phase.name, hint: err.hint }, `Phase ${phase.id} (${phase.name}) failed: ${message}. ${err.hint}`);
        } else {
          this.logger.error({ phase: phase.name }, `Phase ${phase.id} (${phase.name}) failed: ${message}`);
        }
        report = { id: phase.id, name: phase.name, status: 'failed', completed: 0, failed: 0, skipped: 0, error: message };
      }

      reports.push(report);
      this.logger.info(
        { phase: report.name, status: report.status, completed: report.completed, failed: report.failed, skipped: report.skipped },
        `Phase ${report.id} (${report.name}) ${report.status}: ${report.completed} completed, ${report.failed} failed`,
      );
      if (report.status === 'aborted') break;
    }

    return reports;
  }
}
