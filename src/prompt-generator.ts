import { randomInt } from 'node:crypto';
import type { Logger } from 'pino';
import { ConfigError, GenerationError } from './errors.js';
import { silentLogger } from './logger.js';
import { writeRecords } from './record-stream.js';
import type { PromptRecord } from './schemas.js';
import type { GeneratorOptions, IPromptGenerator, TokenCounter } from './types.js';

export const DEFAULT_TOLERANCE = 0.1;
export const DEFAULT_CHARS_PER_TOKEN = 4;
const MAX_CALIBRATION_ATTEMPTS = 8;

const TOPICS = [
  'machine learning',
  'neural networks',
  'transformer architecture',
  'attention mechanisms',
  'language models',
  'retrieval augmented generation',
  'vector databases',
  'embedding models',
  'semantic search',
  'knowledge graphs',
  'information retrieval',
  'natural language processing',
];

const PARAGRAPHS: Array<(topic: string) => string> = [
  (topic) =>
    `The field of ${topic} has seen significant advances in recent years. `
    + 'Researchers have developed novel approaches that combine multiple techniques '
    + 'to achieve state-of-the-art performance. These methods leverage large-scale '
    + 'datasets and computational resources to train models that can understand '
    + 'and generate human-like text. The key innovation lies in the ability to '
    + 'process and reason over vast amounts of information efficiently.',
  (topic) =>
    `Practical deployments of ${topic} depend on careful evaluation. `
    + 'Teams measure latency, accuracy and cost under realistic workloads, and '
    + 'they revisit earlier design decisions when the data distribution shifts. '
    + 'Small changes to preprocessing or indexing often matter as much as the '
    + 'choice of model, which makes reproducible benchmarks essential.',
  (topic) =>
    `A recurring theme in ${topic} is the trade-off between quality and efficiency. `
    + 'Larger systems capture more nuance but require more memory and time per '
    + 'request. Caching, batching and approximate methods reduce that overhead, '
    + 'while distillation transfers capability into smaller components that are '
    + 'cheaper to operate at scale.',
];

const QUERIES = [
  'What are the main findings?',
  'Summarize the key points.',
  'What is the conclusion?',
  'Explain the main idea.',
  'What are the important details?',
  'Give me a brief overview.',
  'What does this tell us?',
  'What is the summary?',
];

/** Rough token estimate: 4 characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / DEFAULT_CHARS_PER_TOKEN);
}

export function isWithinTolerance(actual: number, target: number, tolerance: number): boolean {
  return Math.abs(actual - target) <= target * tolerance;
}

export function formatRagPrompt(context: string, query: string): string {
  return `Context:\n${context}\n\nQuestion: ${query}\n\nAnswer:`;
}

// --- Seeded randomness ---

/** mulberry32 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** FNV-1a over the parts, used to derive a per-sample seed. */
export function mixSeed(...parts: number[]): number {
  let hash = 0x811c9dc5;
  for (const part of parts) {
    const text = String(part);
    for (let i = 0; i < text.length; i++) {
      hash ^= text.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    hash ^= 0x2c;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

function pick<T>(items: readonly T[], rng: () => number): T {
  return items[Math.floor(rng() * items.length) % items.length];
}

export function validateGeneratorOptions(opts: Pick<GeneratorOptions, 'contextLengths' | 'numSamples' | 'tolerance' | 'charsPerToken'>): void {
  if (opts.contextLengths.length === 0) {
    throw new ConfigError('at least one context length is required', 'context_lengths');
  }
  for (const length of opts.contextLengths) {
    if (!Number.isInteger(length) || length <= 0) {
      throw new ConfigError(`context length must be a positive integer (received ${length})`, 'context_lengths');
    }
  }
  if (!Number.isInteger(opts.numSamples) || opts.numSamples <= 0) {
    throw new ConfigError(`must be a positive integer (received ${opts.numSamples})`, 'num_samples');
  }
  if (opts.tolerance !== undefined && !(opts.tolerance > 0 && opts.tolerance < 1)) {
    throw new ConfigError(`must be between 0 and 1 (received ${opts.tolerance})`, 'tolerance');
  }
  if (opts.charsPerToken !== undefined && !(opts.charsPerToken > 0)) {
    throw new ConfigError(`must be positive (received ${opts.charsPerToken})`, 'chars_per_token');
  }
}

export class PromptGenerator implements IPromptGenerator {
  private contextLengths: number[];
  private numSamples: number;
  private seed: number;
  private tolerance: number;
  private charsPerToken: number;
  private countTokens: TokenCounter;
  private logger: Logger;

  constructor(opts: GeneratorOptions) {
    validateGeneratorOptions(opts);
    this.contextLengths = [...new Set(opts.contextLengths)].sort((a, b) => a - b);
    this.numSamples = opts.numSamples;
    this.seed = opts.seed ?? randomInt(0, 2 ** 31);
    this.tolerance = opts.tolerance ?? DEFAULT_TOLERANCE;
    this.charsPerToken = opts.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
    this.countTokens = opts.tokenCounter ?? estimateTokens;
    this.logger = opts.logger ?? silentLogger();
  }

  getSeed(): number {
    return this.seed;
  }

  generate(): PromptRecord[] {
    const records: PromptRecord[] = [];
    for (const contextLength of this.contextLengths) {
      for (let sampleId = 0; sampleId < this.numSamples; sampleId++) {
        records.push(this.generateSample(contextLength, sampleId));
      }
    }
    return records;
  }

  generateSample(contextLength: number, sampleId: number): PromptRecord {
    const context = this.buildContext(contextLength, sampleId);
    const rng = createRng(mixSeed(this.seed, contextLength, sampleId, 1));
    const query = pick(QUERIES, rng);
    return {
      context_length: contextLength,
      sample_id: sampleId,
      prompt: formatRagPrompt(context, query),
      query,
    };
  }

  async writePrompts(path: string): Promise<PromptRecord[]> {
    const records = this.generate();
    const count = await writeRecords(path, records);
    this.logger.info(
      { path, count, contextLengths: this.contextLengths, numSamples: this.numSamples, seed: this.seed },
      `Generated ${count} prompts`,
    );
    return records;
  }

  /**
   * Builds a context whose measured token count lands inside the tolerance
   * band around `contextLength`, rescaling the character budget when the
   * token counter disagrees with the chars-per-token estimate.
   */
  buildContext(contextLength: number, sampleId: number): string {
    const nominal = Math.max(1, Math.round(contextLength * this.charsPerToken));
    const maxBudget = nominal * 16;
    let budget = nominal;
    let measured = 0;

    for (let attempt = 0; attempt < MAX_CALIBRATION_ATTEMPTS; attempt++) {
      const context = this.fillText(budget, mixSeed(this.seed, contextLength, sampleId, 0));
      measured = this.countTokens(context);
      if (isWithinTolerance(measured, contextLength, this.tolerance)) {
        return context;
      }
      this.logger.debug({ contextLength, sampleId, budget, measured }, 'Context outside tolerance band, rescaling');
      const next = Math.max(1, Math.round(budget * (contextLength / Math.max(measured, 1))));
      budget = Math.max(1, Math.min(maxBudget, next === budget ? budget + Math.sign(contextLength - measured) : next));
    }

    throw new GenerationError(
      `Could not realize context length ${contextLength} within ±${this.tolerance * 100}% `
      + `(last measured ${measured} tokens, sample ${sampleId})`,
    );
  }

  private fillText(chars: number, seed: number): string {
    const rng = createRng(seed);
    const parts: string[] = [];
    let length = 0;
    while (length < chars) {
      const paragraph = pick(PARAGRAPHS, rng)(pick(TOPICS, rng));
      length += (parts.length > 0 ? 1 : 0) + paragraph.length;
      parts.push(paragraph);
    }
    return parts.join('\n').slice(0, chars);
  }
}
