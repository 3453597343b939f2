import type { RetryConfig } from '../config/coding.config.js';

export interface RetryPolicyOptions extends RetryConfig {
  /** Injected for tests; defaults to a timer-based sleep */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retry with exponential backoff, no jitter.
 * Waits initialBackoff * factor^(attempt-1) seconds after each failed attempt
 * and rethrows the last failure once maxRetries attempts are used up.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly initialBackoffSeconds: number;
  readonly backoffFactor: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
      throw new RangeError(`maxRetries must be an integer >= 1, got ${options.maxRetries}`);
    }
    if (options.initialBackoffSeconds < 0) {
      throw new RangeError(`initialBackoffSeconds must be >= 0, got ${options.initialBackoffSeconds}`);
    }
    if (options.backoffFactor < 1) {
      throw new RangeError(`backoffFactor must be >= 1, got ${options.backoffFactor}`);
    }

    this.maxRetries = options.maxRetries;
    this.initialBackoffSeconds = options.initialBackoffSeconds;
    this.backoffFactor = options.backoffFactor;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Backoff in seconds after the given failed attempt (1-based)
   */
  backoffFor(attempt: number): number {
    return this.initialBackoffSeconds * Math.pow(this.backoffFactor, attempt - 1);
  }

  async execute<T>(operation: () => Promise<T>, label: string = 'operation'): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        console.log(`🔄 ${label}: attempt ${attempt}/${this.maxRetries}`);
        return await operation();
      } catch (error) {
        lastError = error;
        console.warn(`⚠️ ${label} failed (attempt ${attempt}/${this.maxRetries}): ${describeError(error)}`);

        if (attempt < this.maxRetries) {
          const waitSeconds = this.backoffFor(attempt);
          console.log(`⏳ Waiting ${waitSeconds}s before retrying ${label}...`);
          await this.sleep(waitSeconds * 1000);
        }
      }
    }

    console.error(`❌ ${label} still failing after ${this.maxRetries} attempts`);
    throw lastError;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
