import { execFile } from 'node:child_process';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import type { MemoryProbe, MemorySession } from '../types.js';

/** Reads current device memory in GiB. */
export type MemorySampler = () => Promise<number>;

/** Sums the `memory.used` column (MiB) over all listed devices. */
export function parseNvidiaSmiOutput(stdout: string): number {
  let totalMiB = 0;
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const value = Number.parseFloat(trimmed);
    if (Number.isNaN(value)) {
      throw new Error(`Unexpected nvidia-smi output: ${trimmed}`);
    }
    totalMiB += value;
  }
  return totalMiB / 1024;
}

export function queryNvidiaSmi(binary = 'nvidia-smi'): Promise<number> {
  return new Promise((resolve, reject) => {
    execFile(
      binary,
      ['--query-gpu=memory.used', '--format=csv,noheader,nounits'],
      { timeout: 5_000 },
      (err, stdout) => {
        if (err) {
          reject(new Error(`nvidia-smi failed: ${err.message}`));
          return;
        }
        try {
          resolve(parseNvidiaSmiOutput(stdout));
        } catch (parseErr: unknown) {
          reject(parseErr);
        }
      },
    );
  });
}

export interface SamplingProbeOptions {
  sampler?: MemorySampler;
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Polls device memory while a session is open and reports the highest
 * reading. Defaults to `nvidia-smi`; a failing sampler is reported once
 * and contributes 0.
 */
export class NvidiaSmiProbe implements MemoryProbe {
  private sampler: MemorySampler;
  private intervalMs: number;
  private logger: Logger;
  private warned = false;

  constructor(opts: SamplingProbeOptions = {}) {
    this.sampler = opts.sampler ?? (() => queryNvidiaSmi());
    this.intervalMs = opts.intervalMs ?? 100;
    this.logger = opts.logger ?? silentLogger();
  }

  begin(): MemorySession {
    let peak = 0;
    let inFlight: Promise<void> | null = null;

    const sample = (): Promise<void> => {
      if (inFlight) return inFlight;
      inFlight = this.sampler()
        .then((gb) => {
          peak = Math.max(peak, gb);
        })
        .catch((err: unknown) => {
          if (!this.warned) {
            this.warned = true;
            this.logger.warn(
              { err: err instanceof Error ? err.message : String(err) },
              'GPU memory sampling failed; peak_gpu_memory_gb will read 0',
            );
          }
        })
        .finally(() => {
          inFlight = null;
        });
      return inFlight;
    };

    void sample();
    const timer = setInterval(() => {
      void sample();
    }, this.intervalMs);

    return {
      stop: async () => {
        clearInterval(timer);
        if (inFlight) await inFlight;
        await sample();
        return peak;
      },
    };
  }
}

export class NullMemoryProbe implements MemoryProbe {
  begin(): MemorySession {
    return { stop: async () => 0 };
  }
}
