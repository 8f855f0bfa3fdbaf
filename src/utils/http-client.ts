import { getModuleLogger } from './logger.js';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_NETWORK_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT',
]);
const MAX_BACKOFF_MS = 30000;

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Request budgets per model service. A hosted API is throttled; a local
 * Ollama daemon only queues, so its budget is effectively open.
 */
export const SERVICE_RATE_LIMITS: Readonly<Record<string, RateLimit>> = {
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },
};

const FALLBACK_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Token bucket: `tokensPerSecond` refill with a burst of `maxBurst`.
 */
class TokenBucket {
    private tokens: number;
    private refilledAt = Date.now();

    constructor(private readonly limit: RateLimit) {
        this.tokens = limit.maxBurst;
    }

    async take(): Promise<void> {
        this.refill();
        if (this.tokens < 1) {
            await sleep(((1 - this.tokens) / this.limit.tokensPerSecond) * 1000);
            this.refill();
        }
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const earned = ((now - this.refilledAt) / 1000) * this.limit.tokensPerSecond;
        this.tokens = Math.min(this.limit.maxBurst, this.tokens + earned);
        this.refilledAt = now;
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    /** Objects are sent as JSON */
    body?: string | object;
    timeout?: number;
    /** Service name; selects the rate limit and the request counter */
    source?: string;
}

/**
 * `data` is parsed JSON when the server says so, text otherwise; callers validate it.
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
    /** Retries on retryable statuses and network errors; 0 disables them */
    maxRetries?: number;
    initialBackoffMs?: number;
    /** Overrides for `SERVICE_RATE_LIMITS` */
    rateLimits?: Record<string, RateLimit>;
}

/**
 * Transport failure. `status` is 0 when no response arrived.
 */
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

function networkCodeOf(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    // undici puts the socket error in `cause`
    const source = 'cause' in error && typeof error.cause === 'object' && error.cause !== null ? error.cause : error;
    return 'code' in source && typeof source.code === 'string' ? source.code : undefined;
}

function isAbort(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

async function readBody(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    return contentType.includes('application/json') ? response.json() : response.text();
}

/**
 * Milliseconds asked for by a `Retry-After` header (seconds or HTTP date).
 */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
    if (!header) return null;

    const seconds = Number.parseInt(header, 10);
    if (!Number.isNaN(seconds)) return seconds * 1000;

    const at = Date.parse(header);
    return Number.isNaN(at) ? null : Math.max(0, at - now);
}

/**
 * Shared client for the model services: per-service rate limits, a
 * timeout per attempt and exponential backoff on transient failures.
 */
export class HttpClient {
    private readonly buckets = new Map<string, TokenBucket>();
    private readonly counts = new Map<string, number>();
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly timeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;

    constructor(options: HttpClientOptions = {}) {
        this.timeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoff = options.initialBackoffMs ?? 1000;
        this.userAgent = `Histograph/${options.version ?? '0.1.0'}`;
        this.rateLimits = { ...SERVICE_RATE_LIMITS, ...options.rateLimits };
    }

    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', headers = {}, body, timeout = this.timeout, source = 'default' } = options;
        const logger = getModuleLogger('http');

        await this.bucketFor(source).take();
        this.counts.set(source, (this.counts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = { 'User-Agent': this.userAgent, ...headers };
        let payload: string | undefined;
        if (typeof body === 'object') {
            payload = JSON.stringify(body);
            requestHeaders['Content-Type'] ??= 'application/json';
        } else if (body) {
            payload = body;
        }

        for (let attempt = 0; ; attempt++) {
            const canRetry = attempt < this.maxRetries;
            const controller = new AbortController();
            const timer = setTimeout(() => controller.abort(), timeout);

            let response: Response;
            let data: unknown;
            try {
                response = await fetch(url, { method, headers: requestHeaders, body: payload, signal: controller.signal });
                data = await readBody(response);
            } catch (error) {
                const code = networkCodeOf(error);
                const retryable = isAbort(error) || (code !== undefined && RETRYABLE_NETWORK_CODES.has(code));

                if (retryable && canRetry) {
                    const backoffMs = this.backoff(attempt);
                    logger.warn({ code, attempt: attempt + 1, backoffMs, url }, 'Network error, retrying');
                    await sleep(backoffMs);
                    continue;
                }
                if (isAbort(error)) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }
                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timer);
            }

            if (response.ok) {
                return { status: response.status, headers: Object.fromEntries(response.headers.entries()), data, ok: true };
            }

            const retryable = RETRYABLE_STATUS.has(response.status);
            if (!retryable || !canRetry) {
                throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
            }

            const backoffMs = parseRetryAfter(response.headers.get('retry-after')) ?? this.backoff(attempt);
            logger.warn({ status: response.status, attempt: attempt + 1, backoffMs, url }, 'Service busy, retrying');
            await sleep(backoffMs);
        }
    }

    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    async post(url: string, body: object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    getRequestCount(source: string): number {
        return this.counts.get(source) ?? 0;
    }

    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.counts);
    }

    resetCounts(): void {
        this.counts.clear();
    }

    private bucketFor(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            bucket = new TokenBucket(this.rateLimits[source] ?? FALLBACK_RATE_LIMIT);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    /** Exponential with up to 50% jitter, capped */
    private backoff(attempt: number): number {
        const base = this.initialBackoff * 2 ** attempt;
        return Math.min(MAX_BACKOFF_MS, base + Math.random() * base * 0.5);
    }
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
