import { describe, it, expect, vi } from 'vitest';
import { NullMemoryProbe, NvidiaSmiProbe, parseNvidiaSmiOutput } from '../src/engines/memory-probe.js';
import { WARN, captureLogger } from './helpers.js';

describe('parseNvidiaSmiOutput', () => {
  it('should sum MiB over devices and convert to GiB', () => {
    expect(parseNvidiaSmiOutput('1024\n2048\n')).toBe(3);
  });

  it('should reject unexpected output', () => {
    expect(() => parseNvidiaSmiOutput('N/A\n')).toThrow('Unexpected nvidia-smi output: N/A');
  });
});

describe('NvidiaSmiProbe', () => {
  it('should report the highest reading of the session', async () => {
    const sampler = vi.fn<() => Promise<number>>()
      .mockResolvedValueOnce(4)
      .mockResolvedValueOnce(9.5)
      .mockResolvedValue(6);
    const probe = new NvidiaSmiProbe({ sampler, intervalMs: 60_000 });

    const peak = await probe.begin().stop();

    expect(peak).toBe(9.5);
    expect(sampler).toHaveBeenCalledTimes(2);
  });

  it('should read 0 and warn once when sampling fails', async () => {
    const { logger, entries } = captureLogger();
    const probe = new NvidiaSmiProbe({ sampler: async () => { throw new Error('nvidia-smi not found'); }, intervalMs: 60_000, logger });

    expect(await probe.begin().stop()).toBe(0);
    expect(await probe.begin().stop()).toBe(0);
    expect(entries.filter((e) => e.level === WARN)).toHaveLength(1);
  });
});

describe('NullMemoryProbe', () => {
  it('should always read 0', async () => {
    expect(await new NullMemoryProbe().begin().stop()).toBe(0);
  });
});
