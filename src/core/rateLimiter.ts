import { createMutex, Limiter } from './limiter';

export type Clock = () => number;
export type Sleeper = (ms: number) => Promise<void>;

export interface RateLimiterOptions {
    now?: Clock;
    sleep?: Sleeper;
}

export interface RateLimiterSnapshot {
    rate: number;
    burst: number;
    tokens: number;
    lastUpdate: number;
}

export const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function monotonicNow(): number {
    return performance.now();
}

/**
 * Token bucket: `burst` capacity refilled continuously at `rate` tokens per second.
 * Starts full. Callers never get dropped, they wait for the next token.
 */
export class TokenBucketRateLimiter {
    readonly rate: number;
    readonly burst: number;
    private tokens: number;
    private lastUpdate: number;
    private readonly mutex: Limiter;
    private readonly waiters: Limiter;
    private readonly now: Clock;
    private readonly sleep: Sleeper;

    constructor(rate: number, burst: number, options: RateLimiterOptions = {}) {
        if (!Number.isFinite(rate) || rate <= 0) {
            throw new Error(`rate must be > 0 (got ${rate})`);
        }
        if (!Number.isFinite(burst) || burst < 1) {
            throw new Error(`burst must be >= 1 (got ${burst})`);
        }
        this.rate = rate;
        this.burst = burst;
        this.now = options.now ?? monotonicNow;
        this.sleep = options.sleep ?? defaultSleep;
        this.mutex = createMutex();
        this.waiters = createMutex();
        this.tokens = burst;
        this.lastUpdate = this.now();
    }

    /**
     * Callers are served in arrival order: a later caller never takes the
     * token an earlier one is sleeping for.
     */
    async acquire(): Promise<void> {
        await this.waiters(async () => {
            for (;;) {
                const waitMs = await this.mutex(async () => this.tryTake());
                if (waitMs === 0) {
                    return;
                }
                // bucket state is unlocked while sleeping
                await this.sleep(waitMs);
            }
        });
    }

    snapshot(): RateLimiterSnapshot {
        return {
            rate: this.rate,
            burst: this.burst,
            tokens: this.tokens,
            lastUpdate: this.lastUpdate,
        };
    }

    /** Returns 0 when a token was consumed, otherwise the exact wait in ms. */
    private tryTake(): number {
        const current = this.now();
        const elapsedSec = Math.max(0, current - this.lastUpdate) / 1000;
        this.tokens = Math.min(this.burst, this.tokens + elapsedSec * this.rate);
        this.lastUpdate = current;

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return 0;
        }
        return ((1 - this.tokens) / this.rate) * 1000;
    }
}

export interface ProviderRateLimit {
    requestsPerSecond: number;
    burst: number;
}

export interface RateLimiterRegistryOptions extends RateLimiterOptions {
    enabled?: boolean;
}

/**
 * One bucket per provider, shared by every client of that provider.
 * Owned by the process context and passed into client constructors.
 */
export class RateLimiterRegistry {
    private readonly limiters = new Map<string, TokenBucketRateLimiter>();
    private readonly settings: Record<string, ProviderRateLimit>;
    private readonly options: RateLimiterRegistryOptions;

    constructor(settings: Record<string, ProviderRateLimit>, options: RateLimiterRegistryOptions = {}) {
        this.settings = settings;
        this.options = options;
    }

    get enabled(): boolean {
        return this.options.enabled ?? true;
    }

    get(provider: string): TokenBucketRateLimiter | null {
        if (!this.enabled) {
            return null;
        }
        const key = provider.trim().toLowerCase();
        const existing = this.limiters.get(key);
        if (existing) {
            return existing;
        }
        const limits = this.settings[key];
        if (!limits) {
            return null;
        }
        const limiter = new TokenBucketRateLimiter(limits.requestsPerSecond, limits.burst, {
            now: this.options.now,
            sleep: this.options.sleep,
        });
        this.limiters.set(key, limiter);
        return limiter;
    }

    providers(): string[] {
        return Array.from(this.limiters.keys()).sort();
    }
}
