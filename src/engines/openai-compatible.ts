import type { Logger } from 'pino';
import { z } from 'zod';
import {
  EngineRequestError,
  MalformedResponseError,
  ResourceExhaustedError,
  classifyHttpFailure,
  describeError,
  isOutOfMemoryMessage,
} from '../errors.js';
import { silentLogger } from '../logger.js';
import type { GenerationRequest, GenerationResult, InferenceEngine } from '../types.js';

/** Lifecycle of a server process the engine talks to (see `VllmServer`). */
export interface ManagedServer {
  start(signal?: AbortSignal): Promise<void>;
  stop(): Promise<void>;
}

export interface OpenAICompatibleEngineOptions {
  /** Server root, e.g. http://127.0.0.1:8000 */
  baseUrl: string;
  model: string;
  apiKey?: string;
  server?: ManagedServer;
  fetchImpl?: typeof fetch;
  clock?: () => number;
  logger?: Logger;
}

const CompletionChunkSchema = z.object({
  choices: z.array(z.object({ text: z.string().nullish() })).default([]),
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    completion_tokens: z.number().int().nonnegative(),
  }).nullish(),
});

const StreamErrorSchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

interface StreamState {
  firstTokenAt?: number;
  textChunks: number;
  text: string;
  promptTokens?: number;
  outputTokens?: number;
  done: boolean;
}

/**
 * Streams `POST /v1/completions` from a vLLM (or any OpenAI-compatible)
 * server. The first chunk carrying text marks the end of prefill.
 */
export class OpenAICompatibleEngine implements InferenceEngine {
  readonly name = 'openai-compatible';
  private baseUrl: string;
  private model: string;
  private apiKey?: string;
  private server?: ManagedServer;
  private fetchImpl: typeof fetch;
  private clock: () => number;
  private logger: Logger;
  private warnedMissingUsage = false;

  constructor(opts: OpenAICompatibleEngineOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.model = opts.model;
    this.apiKey = opts.apiKey;
    this.server = opts.server;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = opts.clock ?? (() => performance.now());
    this.logger = opts.logger ?? silentLogger();
  }

  async start(signal?: AbortSignal): Promise<void> {
    await this.server?.start(signal);
  }

  async stop(): Promise<void> {
    await this.server?.stop();
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const submittedAt = this.clock();
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.model,
          prompt: request.prompt,
          max_tokens: request.maxTokens,
          temperature: 0,
          stream: true,
          stream_options: { include_usage: true },
        }),
        signal,
      });
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      throw new EngineRequestError(`Cannot reach engine at ${this.baseUrl}: ${describeError(err)}`, undefined, { cause: err });
    }

    if (!response.ok) {
      throw classifyHttpFailure(response.status, await response.text());
    }
    if (!response.body) {
      throw new MalformedResponseError('Engine returned an empty streaming body');
    }

    const state: StreamState = { textChunks: 0, text: '', done: false };
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (!state.done) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          this.handleLine(buffer.slice(0, newline), state);
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf('\n');
        }
      }
      buffer += decoder.decode();
      if (buffer.trim()) {
        this.handleLine(buffer, state);
      }
    } catch (err: unknown) {
      // Closing the stream ends the request server-side before the next sample.
      await reader.cancel(err).catch((cancelErr: unknown) => {
        this.logger.debug({ err: describeError(cancelErr) }, 'Cancelling the response stream failed');
      });
      throw err;
    } finally {
      reader.releaseLock();
    }

    const completedAt = this.clock();

    if (state.promptTokens === undefined || state.outputTokens === undefined) {
      if (!this.warnedMissingUsage) {
        this.warnedMissingUsage = true;
        this.logger.warn('Engine stream carried no usage block; counting output chunks and reporting 0 prompt tokens');
      }
    }

    return {
      promptTokens: state.promptTokens ?? 0,
      outputTokens: state.outputTokens ?? state.textChunks,
      submittedAt,
      firstTokenAt: state.firstTokenAt,
      completedAt,
      text: state.text,
    };
  }

  private handleLine(rawLine: string, state: StreamState): void {
    const line = rawLine.trim();
    if (!line.startsWith('data:')) return;
    const payload = line.slice(5).trim();
    if (payload === '[DONE]') {
      state.done = true;
      return;
    }

    let value: unknown;
    try {
      value = JSON.parse(payload);
    } catch {
      throw new MalformedResponseError(`Engine sent a non-JSON stream event: ${payload.slice(0, 200)}`);
    }

    const failure = StreamErrorSchema.safeParse(value);
    if (failure.success) {
      const message = typeof failure.data.error === 'string' ? failure.data.error : failure.data.error.message;
      if (isOutOfMemoryMessage(message)) {
        throw new ResourceExhaustedError(`Engine ran out of device memory: ${message}`);
      }
      throw new EngineRequestError(`Engine reported an error mid-stream: ${message}`);
    }

    const chunk = CompletionChunkSchema.safeParse(value);
    if (!chunk.success) {
      throw new MalformedResponseError(`Unexpected stream event shape: ${payload.slice(0, 200)}`);
    }

    for (const choice of chunk.data.choices) {
      if (choice.text) {
        if (state.firstTokenAt === undefined) {
          state.firstTokenAt = this.clock();
        }
        state.textChunks++;
        state.text += choice.text;
      }
    }
    if (chunk.data.usage) {
      state.promptTokens = chunk.data.usage.prompt_tokens;
      state.outputTokens = chunk.data.usage.completion_tokens;
    }
  }
}
