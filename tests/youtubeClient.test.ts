import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { YouTubeClient, classifyFailure, type FetchImpl } from '../src/youtube/client.js';
import { PermanentFetchError, QuotaExceededError, SchemaError, TransientFetchError } from '../src/core/errors.js';

const itemsSchema = z.object({ items: z.array(z.object({ id: z.string() })) });

function apiError(code: number, reason: string, message = 'denied') {
  return JSON.stringify({ error: { code, message, errors: [{ reason, message }] } });
}

function clientReturning(respond: FetchImpl, urls: string[] = []) {
  return new YouTubeClient({
    apiKey: 'test-key',
    baseUrl: 'https://api.test/youtube/v3/',
    timeoutMs: 1000,
    fetchImpl: async (input, init) => {
      urls.push(input);
      return respond(input, init);
    },
  });
}

describe('YouTubeClient', () => {
  it('returns the validated body and sends the key', async () => {
    const urls: string[] = [];
    const client = clientReturning(async () => new Response(JSON.stringify({ items: [{ id: 'v1' }], extra: true })), urls);

    const result = await client.get('videos', { id: 'v1', part: 'statistics' }, itemsSchema);

    expect(result).toEqual({ ok: true, value: { items: [{ id: 'v1' }] } });
    expect(urls).toEqual(['https://api.test/youtube/v3/videos?id=v1&part=statistics&key=test-key']);
  });

  it('classifies a spent daily quota', async () => {
    const client = clientReturning(async () => new Response(apiError(403, 'quotaExceeded'), { status: 403 }));
    const result = await client.get('videos', {}, itemsSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(QuotaExceededError);
      expect(result.error.message).toBe('API quota exceeded (quotaExceeded)');
    }
  });

  it.each([
    [500, 'backendError', TransientFetchError],
    [429, 'rateLimitExceeded', TransientFetchError],
    [403, 'rateLimitExceeded', TransientFetchError],
    [404, 'channelNotFound', PermanentFetchError],
    [400, 'invalidParameter', PermanentFetchError],
  ])('maps HTTP %i with reason %s', async (status, reason, expected) => {
    const client = clientReturning(async () => new Response(apiError(status, reason), { status }));
    const result = await client.get('channels', {}, itemsSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(expected);
  });

  it('treats a gateway page without a JSON body as transient', async () => {
    const client = clientReturning(async () => new Response('<html>Bad Gateway</html>', { status: 502 }));
    const result = await client.get('videos', {}, itemsSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientFetchError);
      expect(result.error.message).toBe('HTTP 502: <html>Bad Gateway</html>');
    }
  });

  it('treats network errors as transient', async () => {
    const client = clientReturning(async () => {
      throw new Error('socket hang up');
    });
    const result = await client.get('videos', {}, itemsSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransientFetchError);
      expect(result.error.message).toBe('Network error: socket hang up');
    }
  });

  it('reports a 200 that breaks the response contract as a schema error', async () => {
    const notJson = await clientReturning(async () => new Response('ok')).get('videos', {}, itemsSchema);
    const wrongShape = await clientReturning(async () => new Response(JSON.stringify({ items: 'nope' })))
      .get('videos', {}, itemsSchema);

    for (const result of [notJson, wrongShape]) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(SchemaError);
    }
  });

  it('refuses to start without an API key', () => {
    expect(() => new YouTubeClient({ apiKey: '', baseUrl: 'https://api.test', timeoutMs: 1000 }))
      .toThrow('YouTube API key is required');
  });
});

describe('classifyFailure', () => {
  it('only treats quota reasons as quota exhaustion', () => {
    expect(classifyFailure({ status: 403, reason: 'dailyLimitExceeded', message: 'x' })).toBeInstanceOf(QuotaExceededError);
    expect(classifyFailure({ status: 403, reason: 'forbidden', message: 'x' })).toBeInstanceOf(PermanentFetchError);
    expect(classifyFailure({ status: 408, reason: null, message: 'x' })).toBeInstanceOf(TransientFetchError);
    expect(classifyFailure({ status: 503, reason: null, message: 'x' })).toBeInstanceOf(TransientFetchError);
  });
});
