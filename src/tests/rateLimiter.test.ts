import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { RateLimiterRegistry, TokenBucketRateLimiter } from '../core/rateLimiter';
import { createFakeClock } from './helpers';

describe('TokenBucketRateLimiter', () => {
    test('rejects a non-positive rate or a burst below one', () => {
        assert.throws(() => new TokenBucketRateLimiter(0, 1), /rate must be > 0/);
        assert.throws(() => new TokenBucketRateLimiter(1, 0), /burst must be >= 1/);
    });

    test('serves the initial burst without waiting', async () => {
        const clock = createFakeClock();
        const limiter = new TokenBucketRateLimiter(2, 3, clock);
        await limiter.acquire();
        await limiter.acquire();
        await limiter.acquire();
        assert.deepEqual(clock.sleeps, []);
        assert.equal(limiter.snapshot().tokens, 0);
    });

    test('waits exactly (1 - tokens) / rate once the bucket is empty', async () => {
        const clock = createFakeClock();
        const limiter = new TokenBucketRateLimiter(2, 2, clock);
        for (let i = 0; i < 6; i++) {
            await limiter.acquire();
        }
        assert.deepEqual(clock.sleeps, [500, 500, 500, 500]);
        // n = 6 acquisitions need at least (n - burst) / rate = 2 seconds
        assert.equal(clock.now(), 2000);
    });

    test('refills from elapsed time but never above burst', async () => {
        const clock = createFakeClock();
        const limiter = new TokenBucketRateLimiter(10, 2, clock);
        await limiter.acquire();
        await limiter.acquire();
        await clock.sleep(60_000);
        await limiter.acquire();
        assert.equal(limiter.snapshot().tokens, 1);
    });

    test('concurrent waiters are served in arrival order', async () => {
        const clock = createFakeClock();
        const limiter = new TokenBucketRateLimiter(1, 1, clock);
        const served: string[] = [];
        const take = async (name: string): Promise<void> => {
            await limiter.acquire();
            served.push(name);
        };

        const early = Promise.all(['a', 'b', 'c'].map(take));
        const late = take('d');
        await Promise.all([early, late]);

        assert.deepEqual(served, ['a', 'b', 'c', 'd']);
        assert.deepEqual(clock.sleeps, [1000, 1000, 1000]);
        assert.equal(clock.now(), 3000);
    });

    test('concurrent callers on the real clock respect the rate floor', async () => {
        const limiter = new TokenBucketRateLimiter(20, 1);
        const started = performance.now();
        await Promise.all(Array.from({ length: 5 }, () => limiter.acquire()));
        const elapsed = performance.now() - started;
        // 4 tokens beyond the burst at 20/s take 200ms; allow for timer granularity
        assert.ok(elapsed >= 180, `expected >= 180ms, got ${elapsed}`);
    });
});

describe('RateLimiterRegistry', () => {
    const settings = {
        openai: { requestsPerSecond: 5, burst: 10 },
        deepseek: { requestsPerSecond: 3, burst: 5 },
    };

    test('returns one shared bucket per provider, case-insensitively', () => {
        const registry = new RateLimiterRegistry(settings);
        const first = registry.get('DeepSeek');
        const second = registry.get('deepseek');
        assert.ok(first);
        assert.equal(first, second);
        assert.equal(first.rate, 3);
        assert.equal(first.burst, 5);
        assert.deepEqual(registry.providers(), ['deepseek']);
    });

    test('returns null for unknown providers and when disabled', () => {
        assert.equal(new RateLimiterRegistry(settings).get('anthropic'), null);
        assert.equal(new RateLimiterRegistry(settings, { enabled: false }).get('openai'), null);
    });
});
