import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError, isNotFound, sleep } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, version: '9.9.9', email: 'test@example.com' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('request counting', () => {
        it('should start with zero request counts', () => {
            expect(client.getRequestCount('openalex')).toBe(0);
            expect(client.getAllRequestCounts()).toEqual({});
        });

        it('should track and reset counts per source', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ ok: true })));

            await client.get('https://api.example.com/a', { source: 'scite' });
            await client.get('https://api.example.com/b', { source: 'scite' });

            expect(client.getAllRequestCounts()).toEqual({ scite: 2 });
            client.resetCounts();
            expect(client.getAllRequestCounts()).toEqual({});
        });
    });

    describe('responses', () => {
        it('should parse JSON bodies and send a user agent', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ id: 'W1' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/works/1');

            expect(response.data).toEqual({ id: 'W1' });
            expect(response.status).toBe(200);
            const init = mockFetch.mock.calls[0]?.[1];
            expect(init?.headers).toEqual({ 'User-Agent': 'rolegraph/9.9.9 (mailto:test@example.com)' });
        });

        it('should send object bodies as JSON', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await client.post('https://api.example.com/chat', { a: 1 });

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init?.method).toBe('POST');
            expect(init?.body).toBe('{"a":1}');
            expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
        });

        it('should throw a non-retryable HttpError on 404 without retrying', async () => {
            const mockFetch = vi.fn(async () => jsonResponse({ error: 'not found' }, 404));
            vi.stubGlobal('fetch', mockFetch);

            const error = await client.get('https://api.example.com/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(isNotFound(error)).toBe(true);
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should retry a 503 honouring Retry-After', async () => {
            const mockFetch = vi
                .fn(async () => jsonResponse({ done: true }))
                .mockImplementationOnce(async () => jsonResponse({}, 503, { 'retry-after': '0' }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/flaky');

            expect(response.data).toEqual({ done: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should turn a broken JSON body into a non-retryable HttpError', async () => {
            const mockFetch = vi.fn(async () => new Response('{ truncated', {
                status: 200,
                headers: { 'content-type': 'application/json' },
            }));
            vi.stubGlobal('fetch', mockFetch);

            const error = await client.get('https://api.example.com/broken').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 200, retryable: false });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should wrap network failures in HttpError', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => {
                throw new TypeError('fetch failed');
            }));

            await expect(client.get('https://api.example.com/down')).rejects.toThrow('Network error: fetch failed');
        });
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
            expect(isNotFound(error)).toBe(false);
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ data: 'ok' })));
            const limited = new HttpClient({ rateLimits: { slow: { tokensPerSecond: 10, maxBurst: 1 } } });

            const start = Date.now();
            for (const n of [1, 2, 3]) {
                await limited.request(`https://api.example.com/${n}`, { source: 'slow' });
            }
            const elapsed = Date.now() - start;

            // One token up front, then one every 100 ms
            expect(elapsed).toBeGreaterThanOrEqual(150);
            expect(limited.getRequestCount('slow')).toBe(3);
        });
    });
});

describe('sleep', () => {
    it('should resolve at once for non-positive durations', async () => {
        const start = Date.now();
        await sleep(0);
        await sleep(-5);
        expect(Date.now() - start).toBeLessThan(50);
    });
});
