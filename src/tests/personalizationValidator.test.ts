import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { looksGeneric, validatePersonalization } from '../validation/personalizationValidator';
import { LeadProfile, OutreachLetter } from '../types/domain';

const LEAD: LeadProfile = {
    email: 'jane@example.test',
    name: 'Jane Doe',
    firstName: 'Jane',
    lastName: 'Doe',
    company: 'Acme',
    jobTitle: 'Head of Operations',
    linkedinUrl: '',
};

function letter(signals: string[], body: string = 'Hi Jane, saw the Berlin move.'): OutreachLetter {
    return { subject: 'Berlin warehouse', body, sendTime: 'Tue 10:00', personalizationSignals: signals };
}

describe('validatePersonalization', () => {
    test('accepts specific, verifiable observations', () => {
        assert.deepEqual(
            validatePersonalization(letter(['Opened a Berlin warehouse in March 2024', 'Raised a Series B to expand']), LEAD),
            { ok: true, reason: '' }
        );
    });

    test('requires at least one signal', () => {
        assert.deepEqual(validatePersonalization(letter([]), LEAD), {
            ok: false,
            reason: 'Missing personalization_signals (must reference a specific, verifiable observation)',
        });
    });

    test('rejects templated or vague signals', () => {
        assert.deepEqual(validatePersonalization(letter(['Works as COO at Acme']), LEAD), {
            ok: false,
            reason: "Generic/placeholder observation found: 'Works as COO at Acme'",
        });
        assert.equal(looksGeneric('Great leader', LEAD), true);
        assert.equal(looksGeneric('Head of Operations at Acme, working on logistics', LEAD), true);
        assert.equal(looksGeneric('Hiring three demand planners', LEAD), false);
    });

    test('truncates a long generic signal to 80 characters in the reason', () => {
        const signal = `job title ${'x'.repeat(100)}`;
        const check = validatePersonalization(letter([signal]), LEAD);
        assert.equal(check.reason, `Generic/placeholder observation found: '${signal.slice(0, 80)}'`);
    });

    test('rejects unresolved template placeholders', () => {
        assert.deepEqual(
            validatePersonalization(letter(['Posted about stock-outs 2 weeks ago'], 'Hi {{first_name}}, at {{company}}'), LEAD),
            { ok: false, reason: 'Unresolved placeholders in letter: {{first_name}}, {{company}}' }
        );
    });
});
