import { z } from 'zod';

// ============================================================
// Record stream schemas
// One JSON object per line; field names are the wire format.
// ============================================================

export const PromptRecordSchema = z.object({
  context_length: z.number().int().positive(),
  sample_id: z.number().int().nonnegative(),
  prompt: z.string(),
  query: z.string().optional(),
});

export const ResultRecordSchema = z.object({
  context_length: z.number().int().positive(),
  sample_id: z.number().int().nonnegative(),
  prompt_tokens: z.number().int().nonnegative(),
  output_tokens: z.number().int().nonnegative(),
  ttft: z.number().nonnegative(),
  total_latency: z.number().nonnegative(),
  decode_throughput: z.number().nonnegative(),
  peak_gpu_memory_gb: z.number().nonnegative(),
  timestamp: z.number().optional(),
});

export type PromptRecord = z.infer<typeof PromptRecordSchema>;
export type ResultRecord = z.infer<typeof ResultRecordSchema>;

/** Numeric ResultRecord fields that are aggregated by the analyzer. */
export const RESULT_METRICS = [
  'prompt_tokens',
  'output_tokens',
  'ttft',
  'total_latency',
  'decode_throughput',
  'peak_gpu_memory_gb',
] as const;

export type ResultMetric = (typeof RESULT_METRICS)[number];

// ============================================================
// Configuration document
// ============================================================

const LogLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR']);

export const ModelConfigSchema = z.object({
  name: z.string().min(1).default('meta-llama/Llama-3.1-8B-Instruct'),
  dtype: z.enum(['fp16', 'bf16']).default('fp16'),
  max_model_len: z.number().int().positive().default(32768),
}).strict();

export const InferenceConfigSchema = z.object({
  gpu_memory_utilization: z.number().gt(0).lte(1).default(0.9),
  tensor_parallel_size: z.number().int().positive().default(1),
  max_num_seqs: z.number().int().positive().default(1),
  enable_prefix_caching: z.boolean().default(false),
}).strict();

export const WorkloadConfigSchema = z.object({
  context_lengths: z.array(z.number().int().positive()).min(1).default([2048, 4096, 8192, 16384]),
  num_samples: z.number().int().positive().default(10),
  decode_length: z.number().int().positive().default(128),
  seed: z.number().int().optional(),
  tolerance: z.number().gt(0).lt(1).default(0.1),
}).strict();

export const EngineConfigSchema = z.object({
  type: z.enum(['openai', 'anthropic']).default('openai'),
  base_url: z.string().url().default('http://127.0.0.1:8000'),
  api_key_env: z.string().min(1).optional(),
  manage_server: z.boolean().default(false),
  startup_timeout_ms: z.number().int().positive().default(600_000),
  timeout_ms: z.number().int().positive().default(300_000),
}).strict();

export const MemoryConfigSchema = z.object({
  probe: z.enum(['nvidia-smi', 'none']).default('nvidia-smi'),
  interval_ms: z.number().int().positive().default(100),
}).strict();

export const OutputConfigSchema = z.object({
  results_dir: z.string().min(1).default('results'),
  filename: z.string().min(1).default('baseline_results.jsonl'),
  summary_filename: z.string().min(1).default('baseline_summary.csv'),
}).strict();

export const LoggingConfigSchema = z.object({
  log_dir: z.string().min(1).default('logs'),
  level: LogLevelSchema.default('INFO'),
  console: z.boolean().default(true),
  file: z.boolean().default(true),
}).strict();

export const BenchConfigSchema = z.object({
  model: ModelConfigSchema.default({}),
  inference: InferenceConfigSchema.default({}),
  workload: WorkloadConfigSchema.default({}),
  engine: EngineConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
}).strict();

export type LogLevelName = z.infer<typeof LogLevelSchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type WorkloadConfig = z.infer<typeof WorkloadConfigSchema>;
