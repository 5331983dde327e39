import { pino } from 'pino';
import type { Logger } from 'pino';
import type { GenerationRequest, GenerationResult, InferenceEngine, MemoryProbe } from '../src/types.js';

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger that keeps every JSON line it writes. */
export function captureLogger(level = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino({ level, base: undefined }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export const WARN = 40;
export const ERROR = 50;

/**
 * Scripted engine. Each call consults `behavior` with the prompt and the
 * call index; returning an Error rejects the call.
 */
export class FakeEngine implements InferenceEngine {
  readonly name = 'fake';
  calls: GenerationRequest[] = [];
  started = 0;
  stopped = 0;
  onStart?: (signal?: AbortSignal) => Promise<void>;

  constructor(
    private behavior: (request: GenerationRequest, index: number, signal?: AbortSignal) => GenerationResult | Error | Promise<GenerationResult>,
  ) {}

  async start(signal?: AbortSignal): Promise<void> {
    this.started++;
    await this.onStart?.(signal);
  }

  async stop(): Promise<void> {
    this.stopped++;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const index = this.calls.length;
    this.calls.push(request);
    const outcome = await this.behavior(request, index, signal);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

/** 1s to first token, 2s total, 5 tokens decoded. */
export function fixedGeneration(overrides: Partial<GenerationResult> = {}): GenerationResult {
  return {
    promptTokens: 100,
    outputTokens: 5,
    submittedAt: 1000,
    firstTokenAt: 2000,
    completedAt: 3000,
    ...overrides,
  };
}

export function fixedProbe(peakGb: number): MemoryProbe {
  return {
    begin: () => ({ stop: async () => peakGb }),
  };
}
