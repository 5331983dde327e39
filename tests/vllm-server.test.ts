import { describe, it, expect } from 'vitest';
import { VllmServer } from '../src/engines/vllm-server.js';
import { AbortedError } from '../src/errors.js';
import type { VllmServerOptions } from '../src/engines/vllm-server.js';

const BASE: VllmServerOptions = {
  model: 'test-org/test-model',
  dtype: 'bf16',
  maxModelLen: 32768,
  gpuMemoryUtilization: 0.85,
  tensorParallelSize: 2,
  maxNumSeqs: 1,
  enablePrefixCaching: false,
  baseUrl: 'http://0.0.0.0:8100',
};

describe('VllmServer', () => {
  it('should translate options to serve arguments', () => {
    expect(new VllmServer(BASE).buildArgs()).toEqual([
      'serve', 'test-org/test-model',
      '--host', '0.0.0.0',
      '--port', '8100',
      '--dtype', 'bfloat16',
      '--max-model-len', '32768',
      '--gpu-memory-utilization', '0.85',
      '--tensor-parallel-size', '2',
      '--max-num-seqs', '1',
      '--no-enable-prefix-caching',
    ]);
  });

  it('should default the port and enable prefix caching on request', () => {
    const args = new VllmServer({ ...BASE, baseUrl: 'http://localhost', enablePrefixCaching: true }).buildArgs();
    expect(args.slice(4, 6)).toEqual(['--port', '8000']);
    expect(args[args.length - 1]).toBe('--enable-prefix-caching');
  });

  it('should not launch the server once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new VllmServer({ ...BASE, binary: 'vllm-not-installed' }).start(controller.signal))
      .rejects.toThrow(AbortedError);
  });

  it('should treat stop before start as a no-op', async () => {
    await expect(new VllmServer(BASE).stop()).resolves.toBeUndefined();
  });
});
