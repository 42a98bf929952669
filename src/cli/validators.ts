import crypto from 'crypto';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const THREAD_ID_PATTERN = /^[\w.:-]{1,128}$/;

/**
 * Validate a thread id given on the command line.
 * @throws {ValidationError} for ids with characters outside [A-Za-z0-9_.:-] or longer than 128
 */
export function parseThreadId(input: string): string {
  const trimmed = input.trim();
  if (!THREAD_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid thread id: "${input}". Use letters, digits, '_', '-', '.', ':' (max 128)`);
  }
  return trimmed;
}

export function newThreadId(): string {
  return crypto.randomUUID();
}

export function parseQuery(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError('Query must not be empty');
  }
  return trimmed;
}

export function parseLimit(input: string | undefined, fallback: number): number {
  if (input === undefined) return fallback;
  const n = Number.parseInt(input, 10);
  if (!Number.isFinite(n) || n < 1 || String(n) !== input.trim()) {
    throw new ValidationError(`--limit must be a positive integer, received "${input}"`);
  }
  return n;
}
