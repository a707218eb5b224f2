import { getLogger } from './logger.js';

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limits. `null` disables throttling for that source.
 */
export type RateLimits = Record<string, RateLimit | null>;

/**
 * arXiv asks API clients to wait 3 seconds between calls.
 */
export const ARXIV_DELAY_SECONDS = 3;

const DEFAULT_RATE_LIMITS: RateLimits = {
    arxiv: { tokensPerSecond: 1 / ARXIV_DELAY_SECONDS, maxBurst: 1 },
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * Rate limit that keeps `delaySeconds` between consecutive requests.
 */
export function delayRateLimit(delaySeconds: number): RateLimit | null {
    if (delaySeconds <= 0) return null;
    return { tokensPerSecond: 1 / delaySeconds, maxBurst: 1 };
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper. The body is kept as text; callers parse it.
 */
export interface HttpResponse {
    status: number;
    body: string;
    ok: boolean;
}

/**
 * HTTP error carrying the response status (0 for network failures and timeouts).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    rateLimits?: RateLimits;
}

/**
 * Centralized HTTP client with per-source rate limiting.
 * Failed requests are not retried; the error goes straight to the caller.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket | null>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly rateLimits: RateLimits;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `arxiv-digest/${version}`;
        this.rateLimits = { ...DEFAULT_RATE_LIMITS, ...options?.rateLimits };
    }

    /**
     * GET a URL and return its body as text.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        // Acquire rate limit token
        const bucket = this.getBucket(source);
        if (bucket) {
            await bucket.acquire();
        }

        getLogger().debug({ url, source }, 'HTTP GET');

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        try {
            response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent },
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0);
            }
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0
            );
        } finally {
            clearTimeout(timeoutId);
        }

        const body = await response.text();

        if (!response.ok) {
            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText}`,
                response.status,
                body
            );
        }

        return { status: response.status, body, ok: true };
    }

    private getBucket(source: string): TokenBucket | null {
        const existing = this.buckets.get(source);
        if (existing !== undefined) return existing;

        const config = source in this.rateLimits
            ? this.rateLimits[source]
            : this.rateLimits['default'];
        const bucket = config ? new TokenBucket(config.tokensPerSecond, config.maxBurst) : null;
        this.buckets.set(source, bucket);
        return bucket;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
