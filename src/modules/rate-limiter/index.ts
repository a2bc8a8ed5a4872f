import { CancelledError } from '../../utils/errors';
import { sleep } from '../../utils/retry';

interface Bucket {
    tokens: number;
    lastRefill: number;
}

export interface DomainRateLimiterOptions {
    ratePerSecond: number; // 0 disables limiting
    burst?: number;
    now?: () => number;
    wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Token bucket per destination domain.
 *
 * A caller reserves its token synchronously, letting the balance go negative,
 * and then sleeps for its own share of the deficit. Reservations for a domain
 * are therefore served in call order and never exceed the configured rate,
 * however many workers are waiting.
 */
export class DomainRateLimiter {
    private buckets = new Map<string, Bucket>();
    private readonly rate: number;
    private readonly burst: number;
    private readonly now: () => number;
    private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(options: DomainRateLimiterOptions) {
        this.rate = options.ratePerSecond;
        this.burst = Math.max(1, options.burst || 1);
        this.now = options.now || Date.now;
        this.wait = options.wait || sleep;
    }

    get enabled(): boolean {
        return this.rate > 0 && Number.isFinite(this.rate);
    }

    private refill(domain: string): Bucket {
        const now = this.now();
        let bucket = this.buckets.get(domain);
        if (!bucket) {
            bucket = { tokens: this.burst, lastRefill: now };
            this.buckets.set(domain, bucket);
            return bucket;
        }
        const elapsedSeconds = (now - bucket.lastRefill) / 1000;
        bucket.tokens = Math.min(this.burst, bucket.tokens + elapsedSeconds * this.rate);
        bucket.lastRefill = now;
        return bucket;
    }

    /** Milliseconds the caller must wait; the token is already reserved on return. */
    reserve(domain: string): number {
        if (!this.enabled) return 0;
        const bucket = this.refill(domain.toLowerCase());
        bucket.tokens -= 1;
        if (bucket.tokens >= 0) return 0;
        return Math.ceil((-bucket.tokens / this.rate) * 1000);
    }

    /**
     * Waits for a token. A wait cut short by the signal has not earned one, so
     * it rejects with CancelledError instead of letting the caller through.
     */
    async acquire(domain: string, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) throw new CancelledError(`Rate limit wait for ${domain} cancelled`);
        const waitMs = this.reserve(domain);
        if (waitMs > 0) await this.wait(waitMs, signal);
        if (signal?.aborted) throw new CancelledError(`Rate limit wait for ${domain} cancelled`);
    }
}
