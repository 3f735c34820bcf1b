import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { sanitizeForLogs, sanitizeValue } from '../security/redaction';

describe('sanitizeForLogs', () => {
    test('redacts sensitive keys at any depth', () => {
        assert.deepEqual(sanitizeForLogs({
            apiKey: 'test-secret',
            authorization: 'test-secret',
            provider: { name: 'deepseek', password: 'test-secret', accessToken: 'test-secret' },
            tokenCount: 12,
            ok: true,
        }), {
            apiKey: '[REDACTED]',
            authorization: '[REDACTED]',
            provider: { name: 'deepseek', password: '[REDACTED]', accessToken: '[REDACTED]' },
            tokenCount: 12,
            ok: true,
        });
    });

    test('masks credentials embedded in strings', () => {
        assert.equal(sanitizeValue('using sk-test-placeholder-value now'), 'using [REDACTED] now');
        assert.equal(sanitizeValue('header Bearer test-placeholder-token'), 'header Bearer [REDACTED]');
        assert.equal(sanitizeValue('search key tvly-test-placeholder-key'), 'search key [REDACTED]');
        assert.equal(sanitizeValue('short sk-abc stays'), 'short sk-abc stays');
    });

    test('reduces errors to their sanitized message', () => {
        assert.equal(sanitizeValue(new Error('rejected sk-test-placeholder-value')), 'rejected [REDACTED]');
    });

    test('stops descending past the maximum depth', () => {
        const nested = { l1: { l2: { l3: { l4: { l5: { l6: { l7: { l8: 'x' } } } } } } } };
        assert.deepEqual(sanitizeForLogs(nested), {
            l1: { l2: { l3: { l4: { l5: { l6: { l7: { note: '[MAX_DEPTH_REACHED]' } } } } } } },
        });
    });

    test('keeps primitives and stringifies the rest', () => {
        assert.equal(sanitizeValue(null), null);
        assert.equal(sanitizeValue(undefined), undefined);
        assert.equal(sanitizeValue(42), 42);
        assert.equal(sanitizeValue(BigInt(10)), '10');
        assert.deepEqual(sanitizeValue(['a', 1, { secret: 'test-secret' }]), ['a', 1, { secret: '[REDACTED]' }]);
    });
});
