import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { Logger } from 'pino';
import { ACCESS_HINT, AbortedError, EngineAccessError, EngineRequestError, ResourceExhaustedError, isOutOfMemoryMessage } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { ManagedServer } from './openai-compatible.js';

export interface VllmServerOptions {
  model: string;
  dtype: 'fp16' | 'bf16';
  maxModelLen: number;
  gpuMemoryUtilization: number;
  tensorParallelSize: number;
  maxNumSeqs: number;
  enablePrefixCaching: boolean;
  /** Server root the engine will talk to; host and port are taken from it. */
  baseUrl: string;
  binary?: string;
  startupTimeoutMs?: number;
  pollIntervalMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

const DTYPES = { fp16: 'float16', bf16: 'bfloat16' } as const;
const GATED_PATTERN = /gated repo|401 client error|403 client error|access to model .* is restricted|cannot access gated/i;
const STDERR_TAIL = 4000;

/**
 * Runs `vllm serve` for the duration of a phase and waits until its
 * `/health` endpoint answers.
 */
export class VllmServer implements ManagedServer {
  private opts: VllmServerOptions;
  private binary: string;
  private startupTimeoutMs: number;
  private pollIntervalMs: number;
  private fetchImpl: typeof fetch;
  private logger: Logger;
  private proc: ChildProcess | null = null;
  private stderrTail = '';
  private exitCode: number | null = null;
  private spawnFailure: Error | null = null;

  constructor(opts: VllmServerOptions) {
    this.opts = opts;
    this.binary = opts.binary ?? 'vllm';
    this.startupTimeoutMs = opts.startupTimeoutMs ?? 600_000;
    this.pollIntervalMs = opts.pollIntervalMs ?? 1_000;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = opts.logger ?? silentLogger();
  }

  buildArgs(): string[] {
    const url = new URL(this.opts.baseUrl);
    const args = [
      'serve', this.opts.model,
      '--host', url.hostname,
      '--port', url.port || '8000',
      '--dtype', DTYPES[this.opts.dtype],
      '--max-model-len', String(this.opts.maxModelLen),
      '--gpu-memory-utilization', String(this.opts.gpuMemoryUtilization),
      '--tensor-parallel-size', String(this.opts.tensorParallelSize),
      '--max-num-seqs', String(this.opts.maxNumSeqs),
    ];
    args.push(this.opts.enablePrefixCaching ? '--enable-prefix-caching' : '--no-enable-prefix-caching');
    return args;
  }

  async start(signal?: AbortSignal): Promise<void> {
    if (this.proc) return;
    if (signal?.aborted) {
      throw new AbortedError('Run aborted before the inference server was started');
    }

    const args = this.buildArgs();
    this.logger.info({ binary: this.binary, args }, `Starting inference server for ${this.opts.model}`);
    this.stderrTail = '';
    this.exitCode = null;
    this.spawnFailure = null;

    const proc = spawn(this.binary, args, {
      stdio: ['ignore', 'ignore', 'pipe'],
      env: { ...process.env },
    });
    this.proc = proc;

    proc.stderr?.on('data', (data: Buffer) => {
      this.stderrTail = (this.stderrTail + data.toString()).slice(-STDERR_TAIL);
    });
    proc.on('close', (code) => {
      this.exitCode = code ?? -1;
      this.proc = null;
    });

    proc.on('error', (err) => {
      this.spawnFailure = new EngineRequestError(`Failed to spawn ${this.binary}: ${err.message}`, undefined, { cause: err });
      this.proc = null;
    });

    await this.waitUntilHealthy(signal);
    this.logger.info({ baseUrl: this.opts.baseUrl }, 'Inference server is ready');
  }

  async stop(): Promise<void> {
    const proc = this.proc;
    if (!proc) return;

    this.logger.info('Stopping inference server');
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
      }, 30_000);
      proc.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      proc.kill('SIGTERM');
    });
    this.proc = null;
  }

  private async waitUntilHealthy(signal?: AbortSignal): Promise<void> {
    const healthUrl = `${this.opts.baseUrl.replace(/\/+$/, '')}/health`;
    const start = Date.now();

    while (Date.now() - start < this.startupTimeoutMs) {
      if (signal?.aborted) {
        await this.stop();
        throw new AbortedError('Run aborted while waiting for the inference server');
      }
      if (this.spawnFailure) {
        throw this.spawnFailure;
      }
      if (this.exitCode !== null) {
        throw this.startupFailure(this.exitCode);
      }
      try {
        const res = await this.fetchImpl(healthUrl, { signal: AbortSignal.timeout(5_000) });
        if (res.ok) return;
      } catch (err: unknown) {
        this.logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Inference server not reachable yet');
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }

    await this.stop();
    throw new EngineRequestError(`Inference server did not become healthy within ${this.startupTimeoutMs}ms`);
  }

  private startupFailure(code: number): Error {
    const tail = this.stderrTail.trim().split('\n').slice(-10).join('\n');
    if (GATED_PATTERN.test(this.stderrTail)) {
      return new EngineAccessError(`Model ${this.opts.model} could not be downloaded: access denied\n${tail}`, ACCESS_HINT);
    }
    if (isOutOfMemoryMessage(this.stderrTail)) {
      return new ResourceExhaustedError(
        `Inference server ran out of device memory while loading (exit ${code}); `
        + `lower inference.gpu_memory_utilization or model.max_model_len\n${tail}`,
      );
    }
    return new EngineRequestError(`Inference server exited with code ${code} before becoming healthy\n${tail}`);
  }
}
