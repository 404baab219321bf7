/**
 * Utility functions for data ingestion services
 */

/**
 * Options for retry logic
 */
export interface RetryOptions {
  maxRetries: number; // attempts per logical call
  baseDelay: number; // milliseconds
  maxDelay: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 2000, // 2 seconds
  maxDelay: 5000, // 5 seconds
};

export type SleepFn = (ms: number) => Promise<void>;
export type ClockFn = () => number;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));

export const systemClock: ClockFn = () => Date.now();

/**
 * Exponential backoff used for rate limits and gateway errors:
 * `min(baseDelay * 2^attempt, maxDelay)`
 */
export function exponentialBackoff(options: RetryOptions, attempt: number): number {
  return Math.min(options.baseDelay * Math.pow(2, attempt), options.maxDelay);
}

/**
 * Linear backoff used for transport failures: `baseDelay * (attempt + 1)`
 */
export function linearBackoff(options: RetryOptions, attempt: number): number {
  return options.baseDelay * (attempt + 1);
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
