import { describe, it, expect, afterEach } from 'vitest';
import { resolve, join } from 'node:path';
import { existsSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { BenchmarkRunner, toResultRecord } from '../src/runner.js';
import { parseConfig } from '../src/config.js';
import { AbortedError, EngineAccessError, EngineRequestError, ResourceExhaustedError } from '../src/errors.js';
import { readRecords, writeRecords } from '../src/record-stream.js';
import { PromptRecordSchema, ResultRecordSchema } from '../src/schemas.js';
import type { BenchConfig, GenerationResult, InferenceEngine, MemoryProbe, PromptRecord } from '../src/types.js';
import { ERROR, FakeEngine, WARN, captureLogger, fixedGeneration, fixedProbe } from './helpers.js';

const TEST_DIR = resolve('.bench-test-data-runner');
const PROMPTS_PATH = join(TEST_DIR, 'prompts.jsonl');

function testConfig(overrides: Record<string, unknown> = {}): BenchConfig {
  return parseConfig({
    workload: { context_lengths: [2048], num_samples: 10, decode_length: 16, seed: 1 },
    engine: { timeout_ms: 1000 },
    output: { results_dir: join(TEST_DIR, 'results') },
    logging: { console: false, file: false },
    ...overrides,
  });
}

function prompts(count: number, contextLength = 2048): PromptRecord[] {
  return Array.from({ length: count }, (_, i) => ({ context_length: contextLength, sample_id: i, prompt: `prompt ${i}` }));
}

const PROMPT = { context_length: 2048, sample_id: 0, prompt: 'p' };

describe('toResultRecord', () => {
  it('should convert engine timings to seconds', () => {
    const record = toResultRecord(PROMPT, fixedGeneration(), 12.5);
    expect(record).toMatchObject({
      context_length: 2048,
      sample_id: 0,
      prompt_tokens: 100,
      output_tokens: 5,
      ttft: 1,
      total_latency: 2,
      decode_throughput: 4,
      peak_gpu_memory_gb: 12.5,
    });
    expect(typeof record.timestamp).toBe('number');
  });

  it('should use total latency as ttft when nothing was decoded', () => {
    const record = toResultRecord(PROMPT, fixedGeneration({ firstTokenAt: undefined, outputTokens: 0 }), 0);
    expect(record.ttft).toBe(2);
    expect(record.decode_throughput).toBe(0);
  });

  it('should report zero throughput for a single output token', () => {
    expect(toResultRecord(PROMPT, fixedGeneration({ outputTokens: 1 }), 0).decode_throughput).toBe(0);
  });

  it('should clamp a first token reported after completion', () => {
    const record = toResultRecord(PROMPT, fixedGeneration({ firstTokenAt: 5000 }), 0);
    expect(record.ttft).toBe(2);
    expect(record.total_latency).toBe(2);
  });

  it('should prefer the engine memory reading over the probe', () => {
    expect(toResultRecord(PROMPT, fixedGeneration({ peakMemoryGb: 3 }), 9).peak_gpu_memory_gb).toBe(3);
  });
});

describe('BenchmarkRunner', () => {
  afterEach(async () => {
    await rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('runBaseline', () => {
    it('should record every sample except the failed one', async () => {
      const engine = new FakeEngine((_, index) => (index === 3 ? new ResourceExhaustedError('CUDA out of memory') : fixedGeneration()));
      const { logger, entries } = captureLogger();
      const runner = new BenchmarkRunner({ config: testConfig(), engine, memoryProbe: fixedProbe(12.5), promptsPath: PROMPTS_PATH, logger });

      const outcome = await runner.runBaseline(prompts(10));

      expect(outcome.results).toHaveLength(9);
      expect(outcome.failures).toEqual([
        { contextLength: 2048, sampleId: 3, kind: 'resource', message: 'CUDA out of memory' },
      ]);
      expect(outcome.aborted).toBe(false);

      const { records } = await readRecords(runner.resultsPath, ResultRecordSchema);
      expect(records.map((r) => r.sample_id)).toEqual([0, 1, 2, 4, 5, 6, 7, 8, 9]);
      expect(records).toEqual(outcome.results);
      for (const record of records) {
        expect(record.ttft).toBeGreaterThanOrEqual(0);
        expect(record.total_latency).toBeGreaterThanOrEqual(record.ttft);
        expect(record.peak_gpu_memory_gb).toBe(12.5);
      }

      const errors = entries.filter((e) => e.level === ERROR);
      expect(errors).toHaveLength(1);
      expect(errors[0].msg).toBe('Sample failed (context_length=2048, sample_id=3): CUDA out of memory');
      expect(entries.some((e) => e.level === WARN && String(e.msg).includes('gpu_memory_utilization'))).toBe(true);
    });

    it('should pass the decode length to the engine', async () => {
      const engine = new FakeEngine(() => fixedGeneration());
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });
      await runner.runBaseline(prompts(1));
      expect(engine.calls).toEqual([{ prompt: 'prompt 0', maxTokens: 16 }]);
    });

    it('should wrap unexpected engine errors as sample failures', async () => {
      const engine = new FakeEngine(() => new TypeError('socket hang up'));
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });
      const outcome = await runner.runBaseline(prompts(2));
      expect(outcome.results).toEqual([]);
      expect(outcome.failures.map((f) => f.kind)).toEqual(['engine', 'engine']);
      expect(outcome.failures[0].message).toBe('Unexpected engine failure: socket hang up');
    });

    it('should time out a hung sample and continue', async () => {
      const engine = new FakeEngine((_, index) => (index === 0 ? new Promise<GenerationResult>(() => {}) : fixedGeneration()));
      const runner = new BenchmarkRunner({
        config: testConfig({ engine: { timeout_ms: 20 } }),
        engine,
        promptsPath: PROMPTS_PATH,
      });

      const outcome = await runner.runBaseline(prompts(2));
      expect(outcome.failures).toEqual([
        { contextLength: 2048, sampleId: 0, kind: 'timeout', message: 'Sample timed out after 20ms' },
      ]);
      expect(outcome.results.map((r) => r.sample_id)).toEqual([1]);
    });

    it('should abort the timed sample signal on timeout', async () => {
      const seen: { signal?: AbortSignal } = {};
      const engine = new FakeEngine((_, __, signal) => {
        seen.signal = signal;
        return new Promise<GenerationResult>(() => {});
      });
      const runner = new BenchmarkRunner({ config: testConfig({ engine: { timeout_ms: 10 } }), engine, promptsPath: PROMPTS_PATH });
      await runner.runBaseline(prompts(1));
      expect(seen.signal?.aborted).toBe(true);
    });

    it('should stop on abort and keep the records already written', async () => {
      const controller = new AbortController();
      const engine = new FakeEngine((_, index) => {
        if (index === 2) controller.abort();
        return fixedGeneration();
      });
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });

      const outcome = await runner.runBaseline(prompts(5), runner.resultsPath, controller.signal);

      expect(outcome.aborted).toBe(true);
      expect(outcome.results).toHaveLength(2);
      expect(engine.calls).toHaveLength(3);
      const content = await readFile(runner.resultsPath, 'utf-8');
      expect(content.trimEnd().split('\n')).toHaveLength(2);
    });

    it('should clean up after an engine that throws synchronously', async () => {
      const unhandled: unknown[] = [];
      const onUnhandled = (reason: unknown) => {
        unhandled.push(reason);
      };
      process.on('unhandledRejection', onUnhandled);

      let sessionsStopped = 0;
      const memoryProbe: MemoryProbe = {
        begin: () => ({
          stop: async () => {
            sessionsStopped++;
            return 1;
          },
        }),
      };
      const engine: InferenceEngine = {
        name: 'sync-throw',
        generate: () => {
          throw new EngineRequestError('rejected before sending');
        },
      };
      const runner = new BenchmarkRunner({
        config: testConfig({ engine: { timeout_ms: 30 } }),
        engine,
        memoryProbe,
        promptsPath: PROMPTS_PATH,
      });

      try {
        const outcome = await runner.runBaseline(prompts(2));
        await new Promise((resolve) => setTimeout(resolve, 80));

        expect(outcome.failures).toEqual([
          { contextLength: 2048, sampleId: 0, kind: 'engine', message: 'rejected before sending' },
          { contextLength: 2048, sampleId: 1, kind: 'engine', message: 'rejected before sending' },
        ]);
        expect(sessionsStopped).toBe(2);
        expect(unhandled).toEqual([]);
      } finally {
        process.off('unhandledRejection', onUnhandled);
      }
    });

    it('should rethrow access errors', async () => {
      const engine = new FakeEngine(() => new EngineAccessError('denied', 'export a token'));
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });
      await expect(runner.runBaseline(prompts(3))).rejects.toThrow(EngineAccessError);
      expect(engine.calls).toHaveLength(1);
    });
  });

  describe('ensurePrompts', () => {
    it('should reuse an existing prompts file', async () => {
      await writeRecords(PROMPTS_PATH, prompts(3));
      const runner = new BenchmarkRunner({ config: testConfig(), engine: new FakeEngine(() => fixedGeneration()), promptsPath: PROMPTS_PATH });
      expect(await runner.ensurePrompts()).toEqual(prompts(3));
    });

    it('should generate prompts from the workload when missing', async () => {
      const config = testConfig({ workload: { context_lengths: [64], num_samples: 2, seed: 4 } });
      const runner = new BenchmarkRunner({ config, engine: new FakeEngine(() => fixedGeneration()), promptsPath: PROMPTS_PATH });

      const records = await runner.ensurePrompts();
      expect(records.map((r) => [r.context_length, r.sample_id])).toEqual([[64, 0], [64, 1]]);
      const { records: onDisk } = await readRecords(PROMPTS_PATH, PromptRecordSchema);
      expect(onDisk).toEqual(records);
    });

    it('should refuse to generate when generation is skipped', async () => {
      const runner = new BenchmarkRunner({
        config: testConfig(),
        engine: new FakeEngine(() => fixedGeneration()),
        promptsPath: PROMPTS_PATH,
        skipPromptGeneration: true,
      });
      await expect(runner.ensurePrompts()).rejects.toThrow(`Prompts file not found: ${PROMPTS_PATH}`);
    });
  });

  describe('runPhases', () => {
    it('should run baseline and analysis for "all"', async () => {
      await writeRecords(PROMPTS_PATH, [...prompts(2, 2048), ...prompts(1, 4096)]);
      const engine = new FakeEngine(() => fixedGeneration());
      const runner = new BenchmarkRunner({ config: testConfig(), engine, memoryProbe: fixedProbe(1), promptsPath: PROMPTS_PATH });

      const reports = await runner.runPhases('all');

      expect(reports.map((r) => [r.id, r.status, r.completed])).toEqual([[1, 'completed', 3], [2, 'completed', 3]]);
      expect(engine.started).toBe(1);
      expect(engine.stopped).toBe(1);
      const csv = (await readFile(runner.summaryPath, 'utf-8')).trimEnd().split('\n');
      expect(csv).toHaveLength(3);
      expect(csv[1].startsWith('2048,2,')).toBe(true);
      expect(csv[2].startsWith('4096,1,')).toBe(true);
    });

    it('should mark the phase failed on an access error and stop the engine', async () => {
      await writeRecords(PROMPTS_PATH, prompts(2));
      const engine = new FakeEngine(() => new EngineAccessError('Engine denied access (401): bad key', 'export a token'));
      const { logger, entries } = captureLogger();
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH, logger });

      const [report] = await runner.runPhases('1');

      expect(report.status).toBe('failed');
      expect(report.error).toBe('Engine denied access (401): bad key');
      expect(engine.stopped).toBe(1);
      const failure = entries.find((e) => e.level === ERROR && e.phase === 'baseline');
      expect(failure?.hint).toBe('export a token');
    });

    it('should fail analysis when there are no results', async () => {
      const runner = new BenchmarkRunner({ config: testConfig(), engine: new FakeEngine(() => fixedGeneration()), promptsPath: PROMPTS_PATH });
      const [report] = await runner.runPhases('2');
      expect(report.status).toBe('failed');
      expect(report.error).toMatch(/^Results file not found/);
      expect(existsSync(runner.summaryPath)).toBe(false);
    });

    it('should skip analysis when the baseline did not complete', async () => {
      await writeRecords(join(TEST_DIR, 'results', 'baseline_results.jsonl'), [{
        context_length: 2048, sample_id: 0, prompt_tokens: 2048, output_tokens: 8,
        ttft: 0.2, total_latency: 0.9, decode_throughput: 10, peak_gpu_memory_gb: 4,
      }]);
      const runner = new BenchmarkRunner({
        config: testConfig(),
        engine: new FakeEngine(() => fixedGeneration()),
        promptsPath: PROMPTS_PATH,
        skipPromptGeneration: true,
      });

      const reports = await runner.runPhases('all');

      expect(reports.map((r) => [r.id, r.status])).toEqual([[1, 'failed'], [2, 'skipped']]);
      expect(reports[1].error).toBe('phase 1 (baseline) did not complete');
      expect(existsSync(runner.summaryPath)).toBe(false);
    });

    it('should abort while the engine is starting', async () => {
      await writeRecords(PROMPTS_PATH, prompts(3));
      const controller = new AbortController();
      const engine = new FakeEngine(() => fixedGeneration());
      engine.onStart = (signal) => new Promise<void>((_, reject) => {
        signal?.addEventListener('abort', () => reject(new AbortedError('stopped during startup')), { once: true });
      });
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });

      setTimeout(() => controller.abort(), 10);
      const reports = await runner.runPhases('all', controller.signal);

      expect(reports).toEqual([{ id: 1, name: 'baseline', status: 'aborted', completed: 0, failed: 0, skipped: 3 }]);
      expect(engine.calls).toHaveLength(0);
    });

    it('should not start later phases after an abort', async () => {
      await writeRecords(PROMPTS_PATH, prompts(3));
      const controller = new AbortController();
      const engine = new FakeEngine((_, index) => {
        if (index === 0) controller.abort();
        return fixedGeneration();
      });
      const runner = new BenchmarkRunner({ config: testConfig(), engine, promptsPath: PROMPTS_PATH });

      const reports = await runner.runPhases('all', controller.signal);
      expect(reports).toHaveLength(1);
      expect(reports[0].status).toBe('aborted');
      expect(reports[0].skipped).toBe(3);
    });
  });
});
