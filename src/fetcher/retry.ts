import { DownloadError } from '../errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('downloader');

/**
 * Configuration for the RetryPolicy.
 */
export interface RetryPolicyConfig {
  /** Total attempts, including the first. */
  attempts: number;
  /** Delay before the second attempt in milliseconds. */
  baseDelayMs: number;
  /** Upper bound for any single delay in milliseconds. */
  maxDelayMs: number;
  /** Override for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Whether a failed attempt is worth repeating.
 *
 * Network failures and timeouts (no status), 5xx and 429 are retried.
 * Other 4xx responses and non-download errors are not.
 */
export function isRetryable(error: unknown): boolean {
  if (!(error instanceof DownloadError)) {
    return false;
  }
  const { statusCode } = error;
  if (statusCode === undefined) {
    return true;
  }
  return statusCode === 429 || (statusCode >= 500 && statusCode < 600);
}

/**
 * Retry wrapper with capped exponential backoff.
 *
 * The delay after failed attempt `n` (1-based) is
 * `min(maxDelayMs, baseDelayMs * 2^(n-1))`.
 */
export class RetryPolicy {
  private readonly attempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RetryPolicyConfig) {
    this.attempts = Math.max(1, config.attempts);
    this.baseDelayMs = config.baseDelayMs;
    this.maxDelayMs = config.maxDelayMs;
    this.sleep = config.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Backoff delay after the given failed attempt (1-based).
   */
  delayFor(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt - 1));
  }

  /**
   * Run `fn`, retrying retryable failures until the attempts run out.
   * The last error is rethrown.
   *
   * @param fn - Receives the 1-based attempt number
   * @param label - Identifies the operation in log lines
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, label?: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.attempts || !isRetryable(error)) {
          throw error;
        }
        const delay = this.delayFor(attempt);
        log.warn(
          { label, attempt, nextDelayMs: delay, err: error },
          'Attempt failed, retrying',
        );
        await this.sleep(delay);
      }
    }
  }
}
