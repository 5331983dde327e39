// ============================================================
// Error taxonomy
// Sample-level kinds are skipped by the runner; the rest end the
// phase (access) or the whole invocation (config, generation).
// ============================================================

export type BenchErrorKind =
  | 'config'
  | 'access'
  | 'resource'
  | 'timeout'
  | 'malformed'
  | 'engine'
  | 'generation'
  | 'aborted';

export abstract class BenchError extends Error {
  abstract readonly kind: BenchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends BenchError {
  readonly kind = 'config';

  /** Dotted path of the offending option, e.g. `workload.num_samples`. */
  readonly field?: string;

  constructor(message: string, field?: string, options?: { cause?: unknown }) {
    super(field ? `${field}: ${message}` : message, options);
    this.field = field;
  }
}

export class EngineAccessError extends BenchError {
  readonly kind = 'access';
  readonly hint: string;

  constructor(message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.hint = hint;
  }
}

export class ResourceExhaustedError extends BenchError {
  readonly kind = 'resource';
}

export class EngineTimeoutError extends BenchError {
  readonly kind = 'timeout';
}

export class MalformedResponseError extends BenchError {
  readonly kind = 'malformed';
}

export class EngineRequestError extends BenchError {
  readonly kind = 'engine';
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class GenerationError extends BenchError {
  readonly kind = 'generation';
}

/** Operator interrupt; the in-flight sample is discarded. */
export class AbortedError extends BenchError {
  readonly kind = 'aborted';
}

export const ACCESS_HINT =
  'Check the engine credentials and that the account has been granted access to the model '
  + '(gated models need the license accepted and a token exported before the server starts).';

const SAMPLE_FAILURE_KINDS: ReadonlySet<BenchErrorKind> = new Set(['resource', 'timeout', 'malformed', 'engine']);

/** True for failures that skip a single sample and let the phase continue. */
export function isSampleFailure(err: unknown): err is BenchError {
  return err instanceof BenchError && SAMPLE_FAILURE_KINDS.has(err.kind);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

const OOM_PATTERN = /out of memory|\boom\b|cuda error: out|insufficient memory/i;

/**
 * Maps a non-2xx engine response to the taxonomy.
 * 401/403/404 are access problems (bad key, gated or unknown model).
 */
export function classifyHttpFailure(status: number, body: string): BenchError {
  const detail = body.trim().slice(0, 500);
  if (status === 401 || status === 403) {
    return new EngineAccessError(`Engine denied access (${status}): ${detail}`, ACCESS_HINT);
  }
  if (status === 404) {
    return new EngineAccessError(`Model not found on engine (404): ${detail}`, ACCESS_HINT);
  }
  if (OOM_PATTERN.test(body)) {
    return new ResourceExhaustedError(`Engine ran out of device memory (${status}): ${detail}`);
  }
  if (status === 408 || status === 504) {
    return new EngineTimeoutError(`Engine timed out (${status}): ${detail}`);
  }
  return new EngineRequestError(`Engine error ${status}: ${detail}`, status);
}

export function isOutOfMemoryMessage(message: string): boolean {
  return OOM_PATTERN.test(message);
}
