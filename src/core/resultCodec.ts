import { ClassificationResult, GenerationResult, OutreachLetter } from '../types/domain';
import { isRecord, parsePayload } from './repositories/shared';

/**
 * Stored shape of a stage 2 result. `variant` was added later; rows written
 * without it are decoded from `rejected` and `relevance_assessment`.
 */
export interface StoredGenerationResult {
    variant: GenerationResult['variant'];
    rejected: boolean;
    reason: string | null;
    letter: {
        subject: string;
        body: string;
        send_time: string;
        personalization_signals: string[];
    } | null;
    relevance_assessment: string;
    notes: string;
}

export const ERROR_ASSESSMENT = 'ERROR';

function asString(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value === null || value === undefined) return '';
    return String(value);
}

function asStringList(value: unknown): string[] {
    if (Array.isArray(value)) {
        return value.map((item) => asString(item)).filter((item) => item.length > 0);
    }
    if (typeof value === 'string' && value.trim()) {
        return [value.trim()];
    }
    return [];
}

export function encodeClassification(result: ClassificationResult): string {
    return JSON.stringify({ relevant: result.relevant, reason: result.reason });
}

export function decodeClassification(raw: string | null): ClassificationResult | null {
    const parsed = parsePayload(raw);
    if (!isRecord(parsed)) {
        return null;
    }
    return {
        relevant: parsed.relevant === true,
        reason: asString(parsed.reason),
    };
}

export function toStoredGeneration(result: GenerationResult): StoredGenerationResult {
    switch (result.variant) {
        case 'accepted':
            return {
                variant: 'accepted',
                rejected: false,
                reason: null,
                letter: {
                    subject: result.letter.subject,
                    body: result.letter.body,
                    send_time: result.letter.sendTime,
                    personalization_signals: result.letter.personalizationSignals,
                },
                relevance_assessment: result.relevanceAssessment,
                notes: result.notes,
            };
        case 'rejected':
            return {
                variant: 'rejected',
                rejected: true,
                reason: result.reason,
                letter: null,
                relevance_assessment: result.relevanceAssessment,
                notes: result.notes,
            };
        case 'errored':
            return {
                variant: 'errored',
                rejected: true,
                reason: result.message,
                letter: null,
                relevance_assessment: ERROR_ASSESSMENT,
                notes: result.notes,
            };
    }
}

export function encodeGeneration(result: GenerationResult): string {
    return JSON.stringify(toStoredGeneration(result));
}

export function decodeLetter(value: unknown): OutreachLetter | null {
    if (!isRecord(value)) {
        return null;
    }
    return {
        subject: asString(value.subject),
        body: asString(value.body),
        sendTime: asString(value.send_time ?? value.send_time_msk ?? value.sendTime),
        personalizationSignals: asStringList(value.personalization_signals ?? value.personalizationSignals),
    };
}

/**
 * Maps a loosely-shaped record (stored row or model output) to a tagged result.
 */
export function generationFromRecord(record: Record<string, unknown>): GenerationResult {
    const relevanceAssessment = asString(record.relevance_assessment);
    const notes = asString(record.notes);
    const reason = asString(record.reason);
    const variant = record.variant;

    if (variant === 'errored' || (record.rejected === true && relevanceAssessment === ERROR_ASSESSMENT)) {
        return { variant: 'errored', message: reason || 'Unknown error', relevanceAssessment: ERROR_ASSESSMENT, notes };
    }
    if (variant === 'rejected' || record.rejected === true) {
        return { variant: 'rejected', reason: reason || 'No reason given', relevanceAssessment, notes };
    }
    const letter = decodeLetter(record.letter);
    if (!letter || (!letter.subject && !letter.body)) {
        return {
            variant: 'errored',
            message: 'Result is not rejected but carries no letter',
            relevanceAssessment: ERROR_ASSESSMENT,
            notes,
        };
    }
    return { variant: 'accepted', letter, relevanceAssessment, notes };
}

export function decodeGeneration(raw: string | null): GenerationResult | null {
    const parsed = parsePayload(raw);
    if (!isRecord(parsed)) {
        return null;
    }
    return generationFromRecord(parsed);
}
