import { setTimeout as delay } from 'node:timers/promises';
import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Requests per second each upstream service tolerates. OpenAlex allows 10/s
 * in its polite pool (requests that carry a mailto).
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },
    scite: { tokensPerSecond: 5, maxBurst: 5 },
    openai: { tokensPerSecond: 5, maxBurst: 5 },
};

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Token bucket: `tokensPerSecond` refill with room for `capacity` at once.
 */
class TokenBucket {
    private tokens: number;
    private refilledAt = Date.now();

    constructor(
        private readonly tokensPerSecond: number,
        private readonly capacity: number
    ) {
        this.tokens = capacity;
    }

    async take(): Promise<void> {
        this.refill();
        if (this.tokens < 1) {
            await sleep(((1 - this.tokens) / this.tokensPerSecond) * 1000);
            this.refill();
        }
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        this.tokens = Math.min(this.capacity, this.tokens + ((now - this.refilledAt) / 1000) * this.tokensPerSecond);
        this.refilledAt = now;
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    /** Rate-limit bucket and request counter key */
    source?: string;
}

/**
 * `data` is parsed JSON when the server labels it so, otherwise raw text.
 * Callers validate it.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    /** Contact address put in the User-Agent */
    email?: string;
    maxRetries?: number;
    rateLimits?: Record<string, RateLimit>;
}

export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Shared client for OpenAlex, scite and the LLM endpoint. Built once per
 * pipeline invocation; each source gets its own bucket and counter.
 */
export class HttpClient {
    private readonly buckets = new Map<string, TokenBucket>();
    private readonly requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.rateLimits = { ...RATE_LIMITS, ...options.rateLimits };

        const product = `rolegraph/${options.version ?? '1.0.0'}`;
        this.userAgent = options.email ? `${product} (mailto:${options.email})` : product;
    }

    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', timeout = this.defaultTimeout, source = 'default' } = options;

        await this.bucketFor(source).take();
        this.requestCounts.set(source, this.getRequestCount(source) + 1);

        const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...options.headers };
        let body: string | undefined;
        if (typeof options.body === 'object') {
            body = JSON.stringify(options.body);
            headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
        } else if (options.body) {
            body = options.body;
        }

        for (let attempt = 0; ; attempt++) {
            const canRetry = attempt < this.maxRetries;
            let response: Response;
            try {
                response = await fetch(url, { method, headers, body, signal: AbortSignal.timeout(timeout) });
            } catch (error) {
                const code = errorCode(error);
                if (canRetry && code !== undefined && RETRYABLE_ERROR_CODES.has(code)) {
                    const backoffMs = backoff(attempt);
                    getLogger().warn({ errorCode: code, attempt: attempt + 1, backoffMs, url }, 'Retryable network error, backing off');
                    await sleep(backoffMs);
                    continue;
                }
                throw toTransportError(error, url, timeout);
            }

            let data: unknown;
            try {
                data = await readBody(response);
            } catch (error) {
                throw new HttpError(
                    `Unreadable response body from ${url}: ${error instanceof Error ? error.message : String(error)}`,
                    response.status,
                    false
                );
            }
            if (response.ok) {
                return { status: response.status, headers: headerMap(response.headers), data, ok: true };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && canRetry) {
                const backoffMs = parseRetryAfter(response.headers.get('retry-after')) ?? backoff(attempt);
                getLogger().warn({ status: response.status, attempt: attempt + 1, backoffMs, url }, 'Retryable HTTP error, backing off');
                await sleep(backoffMs);
                continue;
            }
            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
        }
    }

    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    async post(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts);
    }

    resetCounts(): void {
        this.requestCounts.clear();
    }

    private bucketFor(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const limit = this.rateLimits[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(limit.tokensPerSecond, limit.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

async function readBody(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    return contentType.includes('application/json') ? response.json() : response.text();
}

function headerMap(headers: Headers): Record<string, string> {
    const map: Record<string, string> = {};
    headers.forEach((value, key) => {
        map[key] = value;
    });
    return map;
}

function toTransportError(error: unknown, url: string, timeout: number): HttpError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }
    const code = errorCode(error);
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        code !== undefined && RETRYABLE_ERROR_CODES.has(code)
    );
}

/**
 * Retry-After as either delta-seconds or an HTTP date.
 */
function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    const date = new Date(header);
    return isNaN(date.getTime()) ? null : Math.max(0, date.getTime() - Date.now());
}

// Exponential with up to 50% jitter
function backoff(attempt: number): number {
    const exponential = INITIAL_BACKOFF_MS * 2 ** attempt;
    return Math.min(MAX_BACKOFF_MS, exponential + Math.random() * exponential * 0.5);
}

/**
 * `fetch` reports socket errors on `cause`; Node's own errors carry `code` directly.
 */
function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return errorCode(error.cause);
    return undefined;
}

export async function sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await delay(ms);
}

/**
 * True when the service says it has nothing for this key.
 */
export function isNotFound(error: unknown): boolean {
    return error instanceof HttpError && error.status === 404;
}
