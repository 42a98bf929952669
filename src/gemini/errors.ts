export class GeminiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = 'GeminiError';
  }
}

export class GeminiAuthenticationError extends GeminiError {
  constructor(message = 'Authentication failed', status = 401) {
    super(message, status);
    this.name = 'GeminiAuthenticationError';
  }
}

export class GeminiRateLimitError extends GeminiError {
  constructor(
    public readonly retryAfterMs?: number,
    message: string = 'Rate limit exceeded',
  ) {
    super(message, 429);
    this.name = 'GeminiRateLimitError';
  }
}

/** The model answered but produced no text (blocked, truncated, or empty). */
export class GeminiEmptyResponseError extends GeminiError {
  constructor(
    public readonly model: string,
    public readonly finishReason?: string,
  ) {
    super(`Model ${model} returned an empty response${finishReason ? ` (finish reason: ${finishReason})` : ''}`, 200);
    this.name = 'GeminiEmptyResponseError';
  }
}

/** Rate limits, server errors and network failures. */
export function isTransient(error: unknown): boolean {
  if (error instanceof GeminiRateLimitError) return true;
  if (!(error instanceof GeminiError) || error instanceof GeminiEmptyResponseError) return false;
  return error.status === 0 || (error.status !== undefined && error.status >= 500);
}
