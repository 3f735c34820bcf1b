import { LeadProfile, OutreachLetter } from '../types/domain';

export interface PersonalizationCheck {
    ok: boolean;
    reason: string;
}

const DISALLOWED_SUBSTRINGS = [
    'you work as', 'you are working as', 'работаешь', 'ты работаешь',
    'works as', 'working as', 'it support manager',
    'at company', 'в компании company', 'company company',
    'job title', 'companyname', 'linkedin profile', 'generic observation',
];

const SPECIFICITY_MARKERS = [
    'posted', 'post', 'commented', 'article', 'hiring', 'opening', 'open roles', 'raised', 'series',
    'joined', 'months', 'years', 'week', 'weeks', 'days', 'yesterday', 'today', 'announcement', 'launch',
    'funding', 'seed',
];

const MIN_SPECIFIC_WORDS = 6;

export function extractUnresolvedPlaceholders(text: string): string[] {
    return text.match(/\{\{[^}]+\}\}/g) ?? [];
}

export function looksGeneric(signal: string, lead: LeadProfile): boolean {
    const text = signal.trim().toLowerCase();
    if (!text) {
        return true;
    }
    if (DISALLOWED_SUBSTRINGS.some((fragment) => text.includes(fragment))) {
        return true;
    }
    if (text === 'company') {
        return true;
    }

    const company = lead.company.toLowerCase();
    const role = lead.jobTitle.toLowerCase();
    if (company && role && text.includes(company) && text.includes(role) && (text.includes('work') || text.includes('работа'))) {
        return true;
    }

    const wordCount = text.split(/\s+/).filter(Boolean).length;
    const hasDigit = /\d/.test(text);
    const hasMarker = SPECIFICITY_MARKERS.some((marker) => text.includes(marker));
    return wordCount < MIN_SPECIFIC_WORDS && !hasDigit && !hasMarker;
}

/**
 * Rejects a letter whose personalization is missing, templated or too vague
 * to be a verifiable observation about this lead.
 */
export function validatePersonalization(letter: OutreachLetter, lead: LeadProfile): PersonalizationCheck {
    const signals = letter.personalizationSignals;
    if (signals.length === 0) {
        return {
            ok: false,
            reason: 'Missing personalization_signals (must reference a specific, verifiable observation)',
        };
    }

    const generic = signals.find((signal) => looksGeneric(signal, lead));
    if (generic !== undefined) {
        return { ok: false, reason: `Generic/placeholder observation found: '${generic.slice(0, 80)}'` };
    }

    const unresolved = extractUnresolvedPlaceholders(`${letter.subject}\n${letter.body}`);
    if (unresolved.length > 0) {
        return { ok: false, reason: `Unresolved placeholders in letter: ${unresolved.join(', ')}` };
    }

    return { ok: true, reason: '' };
}
