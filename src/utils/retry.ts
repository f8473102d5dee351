import { PipelineError } from '../types/index.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('retry');

const JITTER_FACTOR = 0.2; // ±20%
const MAX_DELAY_MS = 30_000;

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

const NETWORK_ERROR_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'socket hang up',
  'timeout',
  'network',
  'fetch failed',
];

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** Label used in log lines */
  operation?: string;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Retryable: request timeouts, rate limits, 5xx and network failures.
 * Typed pipeline errors are classified by the error they wrap.
 */
export function isRetryableError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  if (error instanceof PipelineError) {
    return error.details !== undefined && isRetryableError(error.details);
  }

  const status = readStatus(error);
  if (status !== undefined) {
    return RETRYABLE_STATUSES.has(status);
  }

  const message = [
    'message' in error && typeof error.message === 'string' ? error.message : '',
    'code' in error && typeof error.code === 'string' ? error.code : '',
  ]
    .join(' ')
    .toLowerCase();

  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Exponential backoff for the given zero-based attempt, with ±20% jitter
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  random: () => number = Math.random
): number {
  const base = Math.min(baseDelayMs * 2 ** attempt, MAX_DELAY_MS);
  const jitter = base * JITTER_FACTOR * (random() * 2 - 1);
  return Math.max(0, Math.round(base + jitter));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying retryable failures up to `maxRetries` times
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.random);
      logger.warn(
        { operation: options.operation, attempt: attempt + 1, delayMs, error },
        'Retrying after failure'
      );
      await sleep(delayMs);
    }
  }
}
