import { moduleLogger } from './logger.js';
import { TransientFetchError, type FetchError } from './errors.js';
import { err, type Result } from './result.js';

const log = moduleLogger('rate-limit');

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface PacerOptions {
  requestsPerMinute: number;
  burst?: number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Token bucket in front of every API call. Failures drain the bucket and
 * stretch the wait; successes relax it again.
 */
export class RequestPacer {
  private tokens: number;
  private lastRefill: number;
  private backoffMultiplier = 1;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per second
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: PacerOptions) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.refillRate = Math.max(options.requestsPerMinute, 1) / 60;
    this.maxTokens = options.burst ?? Math.max(1, Math.ceil(options.requestsPerMinute / 6));
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }

  async acquire(): Promise<void> {
    this.refill();

    if (this.tokens < 1) {
      const tokensNeeded = 1 - this.tokens;
      const waitTime = Math.ceil((tokensNeeded / this.refillRate) * 1000 * this.backoffMultiplier);
      log.debug(`Pacing: waiting ${waitTime}ms`);
      await this.sleep(waitTime);
      this.refill();
    }

    this.tokens = Math.max(0, this.tokens - 1);
  }

  reportSuccess(): void {
    this.backoffMultiplier = Math.max(1, this.backoffMultiplier * 0.9);
  }

  reportFailure(): void {
    this.backoffMultiplier = Math.min(10, this.backoffMultiplier * 2);
    this.tokens = 0;
    log.warn(`Pacing backoff raised to ${this.backoffMultiplier.toFixed(1)}x`);
  }

  state(): { tokensAvailable: number; backoff: number } {
    this.refill();
    return { tokensAvailable: Math.floor(this.tokens), backoff: this.backoffMultiplier };
  }

  private refill(): void {
    const current = this.now();
    const elapsed = Math.max(0, current - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = current;
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  label?: string;
  sleep?: Sleep;
  random?: () => number;
}

export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>, random: () => number): number {
  const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
  return Math.round(delay * (0.5 + random() * 0.5));
}

/**
 * The one retry loop for every fetch call site. Only transient failures are
 * retried; quota, permanent and schema errors return on first sight.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<Result<T, FetchError>>,
  options: RetryOptions,
): Promise<Result<T, FetchError>> {
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, options.maxAttempts);
  const label = options.label ?? 'request';

  for (let attempt = 1; ; attempt++) {
    const result = await fn(attempt);
    if (result.ok || !(result.error instanceof TransientFetchError)) {
      return result;
    }

    if (attempt >= maxAttempts) {
      log.warn(`${label}: giving up after ${attempt} attempts: ${result.error.message}`);
      return err(new TransientFetchError(
        `${result.error.message} (after ${attempt} attempts)`,
        result.error.status,
        { ...result.error.context, attempts: attempt },
        { cause: result.error },
      ));
    }

    const delay = backoffDelay(attempt, options, random);
    log.warn(`${label}: attempt ${attempt} failed, retrying in ${delay}ms: ${result.error.message}`);
    await sleep(delay);
  }
}
