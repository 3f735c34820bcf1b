import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { decodeClassification, decodeGeneration, encodeGeneration, toStoredGeneration } from '../core/resultCodec';

describe('stage 1 codec', () => {
    test('reads stored verdicts and tolerates bad rows', () => {
        assert.deepEqual(decodeClassification('{"relevant": true, "reason": "fits"}'), { relevant: true, reason: 'fits' });
        assert.deepEqual(decodeClassification('{"relevant": "yes"}'), { relevant: false, reason: '' });
        assert.equal(decodeClassification(null), null);
        assert.equal(decodeClassification('not json'), null);
        assert.equal(decodeClassification('[1, 2]'), null);
    });
});

describe('stage 2 codec', () => {
    test('errored results are stored as rejected with an ERROR assessment', () => {
        assert.deepEqual(toStoredGeneration({
            variant: 'errored',
            message: 'Failed to parse agent response',
            relevanceAssessment: 'ERROR',
            notes: 'raw',
        }), {
            variant: 'errored',
            rejected: true,
            reason: 'Failed to parse agent response',
            letter: null,
            relevance_assessment: 'ERROR',
            notes: 'raw',
        });
    });

    test('an accepted result reads back unchanged', () => {
        const accepted = {
            variant: 'accepted' as const,
            letter: { subject: 'S', body: 'B', sendTime: 'Mon 08:00', personalizationSignals: ['Joined in 2024'] },
            relevanceAssessment: 'HIGH',
            notes: '',
        };
        const stored = encodeGeneration(accepted);
        assert.equal(
            stored,
            '{"variant":"accepted","rejected":false,"reason":null,"letter":{"subject":"S","body":"B","send_time":"Mon 08:00","personalization_signals":["Joined in 2024"]},"relevance_assessment":"HIGH","notes":""}'
        );
        assert.deepEqual(decodeGeneration(stored), accepted);
    });

    test('rows written without a variant are decoded from their flags', () => {
        assert.deepEqual(decodeGeneration('{"rejected": true, "reason": "Too small", "relevance_assessment": "LOW"}'), {
            variant: 'rejected',
            reason: 'Too small',
            relevanceAssessment: 'LOW',
            notes: '',
        });
        assert.deepEqual(decodeGeneration('{"rejected": true, "reason": "timeout", "relevance_assessment": "ERROR"}'), {
            variant: 'errored',
            message: 'timeout',
            relevanceAssessment: 'ERROR',
            notes: '',
        });
        assert.deepEqual(decodeGeneration(JSON.stringify({
            rejected: false,
            letter: { subject: 'Hi', body: 'Text', send_time_msk: 'Wed 11:00', personalization_signals: ' Posted last week ' },
            relevance_assessment: 'MEDIUM',
        })), {
            variant: 'accepted',
            letter: { subject: 'Hi', body: 'Text', sendTime: 'Wed 11:00', personalizationSignals: ['Posted last week'] },
            relevanceAssessment: 'MEDIUM',
            notes: '',
        });
    });

    test('a non-rejected row without a letter is an error', () => {
        const result = decodeGeneration('{"rejected": false, "letter": null}');
        assert.equal(result?.variant, 'errored');
        assert.equal(decodeGeneration(''), null);
    });
});
