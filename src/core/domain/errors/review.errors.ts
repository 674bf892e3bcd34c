/**
 * The review could not be scheduled (no reviewable files, no agents, unknown agent).
 */
export class ReviewRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewRejectedError';
  }
}

export class ReviewConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewConflictError';
  }
}

export class ReviewNotFoundError extends Error {
  constructor(public readonly reviewId: string) {
    super(`Review ${reviewId} not found`);
    this.name = 'ReviewNotFoundError';
  }
}

/**
 * Abort reason of a cancelled review. Tasks of the review unwind with it.
 */
export class ReviewCancelledError extends Error {
  constructor(
    public readonly reviewId: string,
    public readonly reason: string,
  ) {
    super(`Review ${reviewId} cancelled: ${reason}`);
    this.name = 'ReviewCancelledError';
  }
}

export class AgentTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`model call timed out after ${timeoutMs}ms`);
    this.name = 'AgentTimeoutError';
  }
}

export class MalformedAgentOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedAgentOutputError';
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'ERR_NETWORK',
]);

/**
 * Failure of the transport that carries a model call.
 * `status` is the HTTP status when the backend answered, `code` the network error code otherwise.
 */
export class ModelTransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'ModelTransportError';
  }

  get retryable(): boolean {
    if (this.status !== undefined) {
      return this.status === 429 || this.status >= 500;
    }
    return this.code !== undefined && TRANSIENT_NETWORK_CODES.has(this.code);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Whether a failed model call is worth another attempt.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof AgentTimeoutError || error instanceof MalformedAgentOutputError) {
    return true;
  }
  if (error instanceof ModelTransportError) {
    return error.retryable;
  }

  const message = describeError(error);
  return (
    /\b(ECONNRESET|ETIMEDOUT|EAI_AGAIN|ENOTFOUND)\b/i.test(message) ||
    /\b(429|500|502|503|504)\b/.test(message) ||
    /rate limit/i.test(message) ||
    /timeout/i.test(message)
  );
}
