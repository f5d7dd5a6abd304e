import type { z } from 'zod';
import { moduleLogger } from '../core/logger.js';
import { RequestPacer } from '../core/rateLimit.js';
import { err, ok, type Result } from '../core/result.js';
import {
  PermanentFetchError,
  QuotaExceededError,
  SchemaError,
  TransientFetchError,
  errorMessage,
  type FetchError,
} from '../core/errors.js';
import { apiErrorSchema } from './types.js';

const log = moduleLogger('youtube-client');

// 403 reasons that mean the project's daily budget is spent
const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
// Per-user or per-second throttling: wait and retry
const THROTTLE_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded', 'backendError']);

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface YouTubeClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchImpl;
  pacer?: RequestPacer;
}

interface ApiFailure {
  status: number;
  reason: string | null;
  message: string;
}

/** Maps an HTTP failure onto the fetch error taxonomy. */
export function classifyFailure(failure: ApiFailure, context: Record<string, unknown> = {}): FetchError {
  const { status, reason, message } = failure;
  const ctx = { ...context, reason };

  if ((status === 403 || status === 429) && reason !== null && QUOTA_REASONS.has(reason)) {
    return new QuotaExceededError(reason, ctx);
  }
  if (status === 408 || status === 429 || status >= 500 || (reason !== null && THROTTLE_REASONS.has(reason))) {
    return new TransientFetchError(`HTTP ${status}: ${message}`, status, ctx);
  }
  return new PermanentFetchError(`HTTP ${status}: ${message}`, status, ctx);
}

function parseFailureBody(status: number, body: string): ApiFailure {
  let json: unknown = null;
  try {
    json = JSON.parse(body);
  } catch {
    json = null; // non-JSON error pages (proxies, gateways)
  }

  const parsed = apiErrorSchema.safeParse(json);
  if (!parsed.success) {
    return { status, reason: null, message: body.slice(0, 200) || 'empty response' };
  }

  const apiError = parsed.data.error;
  const reason = apiError.errors?.find(e => e.reason)?.reason ?? apiError.status ?? null;
  return { status, reason, message: apiError.message ?? reason ?? 'unknown error' };
}

export class YouTubeClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly pacer: RequestPacer | null;

  constructor(options: YouTubeClientOptions) {
    if (!options.apiKey) {
      throw new Error('YouTube API key is required. Set YOUTUBE_API_KEY in .env');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.pacer = options.pacer ?? null;
  }

  /** One GET against the API, validated against `schema`. Never throws. */
  async get<S extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: S,
  ): Promise<Result<z.output<S>, FetchError>> {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    const url = `${this.baseUrl}/${endpoint}?${query.toString()}`;
    const context = { endpoint, params };

    if (this.pacer) {
      await this.pacer.acquire();
    }

    log.debug(`GET ${endpoint}`, { params });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.pacer?.reportFailure();
      return err(new TransientFetchError(`Network error: ${errorMessage(error)}`, null, context, { cause: error }));
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      this.pacer?.reportFailure();
      return err(new TransientFetchError(`Body read failed: ${errorMessage(error)}`, response.status, context, { cause: error }));
    }

    if (!response.ok) {
      const failure = classifyFailure(parseFailureBody(response.status, body), context);
      if (failure instanceof TransientFetchError) {
        this.pacer?.reportFailure();
      }
      return err(failure);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      return err(new SchemaError(`${endpoint}: response is not JSON`, context, { cause: error }));
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return err(new SchemaError(`${endpoint}: unexpected response shape: ${parsed.error.message}`, context));
    }

    this.pacer?.reportSuccess();
    return ok(parsed.data);
  }
}
