import Anthropic from '@anthropic-ai/sdk';
import {
  BenchError,
  EngineRequestError,
  EngineTimeoutError,
  classifyHttpFailure,
  describeError,
} from '../errors.js';
import type { GenerationRequest, GenerationResult, InferenceEngine } from '../types.js';

export interface AnthropicEngineOptions {
  model: string;
  apiKey?: string;
  client?: Anthropic;
  clock?: () => number;
}

/** Maps SDK failures onto the benchmark error taxonomy. */
export function classifyAnthropicError(err: unknown): BenchError {
  if (err instanceof BenchError) return err;
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new EngineTimeoutError(`Anthropic request timed out: ${err.message}`, { cause: err });
  }
  if (err instanceof Anthropic.APIError && err.status !== undefined) {
    return classifyHttpFailure(err.status, err.message);
  }
  return new EngineRequestError(`Anthropic request failed: ${describeError(err)}`, undefined, { cause: err });
}

/**
 * Streams the Messages API. `message_start` carries the prompt token count,
 * the first `text_delta` marks the first token and `message_delta` the
 * final output token count.
 */
export class AnthropicEngine implements InferenceEngine {
  readonly name = 'anthropic';
  private client: Anthropic;
  private model: string;
  private clock: () => number;

  constructor(opts: AnthropicEngineOptions) {
    this.client = opts.client ?? new Anthropic({ apiKey: opts.apiKey ?? process.env.ANTHROPIC_API_KEY });
    this.model = opts.model;
    this.clock = opts.clock ?? (() => performance.now());
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const submittedAt = this.clock();
    let promptTokens = 0;
    let outputTokens = 0;
    let firstTokenAt: number | undefined;
    let text = '';

    try {
      const stream = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens,
          temperature: 0,
          messages: [{ role: 'user', content: request.prompt }],
          stream: true,
        },
        { signal },
      );

      for await (const event of stream) {
        if (event.type === 'message_start') {
          promptTokens = event.message.usage.input_tokens;
        } else if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          if (firstTokenAt === undefined && event.delta.text.length > 0) {
            firstTokenAt = this.clock();
          }
          text += event.delta.text;
        } else if (event.type === 'message_delta') {
          outputTokens = event.usage.output_tokens;
        }
      }
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      throw classifyAnthropicError(err);
    }

    return {
      promptTokens,
      outputTokens,
      submittedAt,
      firstTokenAt,
      completedAt: this.clock(),
      text,
    };
  }
}
