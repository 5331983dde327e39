import type { Logger } from 'pino';
import { ConfigError } from '../errors.js';
import type { BenchConfig } from '../schemas.js';
import type { InferenceEngine, MemoryProbe } from '../types.js';
import { AnthropicEngine } from './anthropic-engine.js';
import { NullMemoryProbe, NvidiaSmiProbe } from './memory-probe.js';
import { OpenAICompatibleEngine } from './openai-compatible.js';
import { VllmServer } from './vllm-server.js';

export { AnthropicEngine, classifyAnthropicError } from './anthropic-engine.js';
export type { AnthropicEngineOptions } from './anthropic-engine.js';
export { OpenAICompatibleEngine } from './openai-compatible.js';
export type { OpenAICompatibleEngineOptions, ManagedServer } from './openai-compatible.js';
export { VllmServer } from './vllm-server.js';
export type { VllmServerOptions } from './vllm-server.js';
export { NvidiaSmiProbe, NullMemoryProbe, parseNvidiaSmiOutput, queryNvidiaSmi } from './memory-probe.js';
export type { MemorySampler, SamplingProbeOptions } from './memory-probe.js';

function readApiKey(envName: string | undefined): string | undefined {
  if (!envName) return undefined;
  const value = process.env[envName];
  if (!value) {
    throw new ConfigError(`environment variable ${envName} is not set`, 'engine.api_key_env');
  }
  return value;
}

export function createEngine(config: BenchConfig, logger: Logger): InferenceEngine {
  const apiKey = readApiKey(config.engine.api_key_env);

  if (config.engine.type === 'anthropic') {
    return new AnthropicEngine({ model: config.model.name, apiKey });
  }

  const server = config.engine.manage_server
    ? new VllmServer({
        model: config.model.name,
        dtype: config.model.dtype,
        maxModelLen: config.model.max_model_len,
        gpuMemoryUtilization: config.inference.gpu_memory_utilization,
        tensorParallelSize: config.inference.tensor_parallel_size,
        maxNumSeqs: config.inference.max_num_seqs,
        enablePrefixCaching: config.inference.enable_prefix_caching,
        baseUrl: config.engine.base_url,
        startupTimeoutMs: config.engine.startup_timeout_ms,
        logger: logger.child({ component: 'vllm-server' }),
      })
    : undefined;

  return new OpenAICompatibleEngine({
    baseUrl: config.engine.base_url,
    model: config.model.name,
    apiKey,
    server,
    logger,
  });
}

export function createMemoryProbe(config: BenchConfig, logger: Logger): MemoryProbe {
  if (config.memory.probe === 'none') {
    return new NullMemoryProbe();
  }
  return new NvidiaSmiProbe({ intervalMs: config.memory.interval_ms, logger });
}
