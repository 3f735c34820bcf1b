import { generationFromRecord, ERROR_ASSESSMENT } from '../core/resultCodec';
import { isRecord } from '../core/repositories/shared';
import { GenerationResult } from '../types/domain';

const FENCED_BLOCK_PATTERN = /```(?:json)?\s*([\s\S]*?)```/gi;

const REJECTION_VOCABULARY = ['reject', 'not relevant', 'not a fit', 'не релевант', 'отклон'];

export const RAW_PREVIEW_LENGTH = 200;

function tryParseRecord(text: string): Record<string, unknown> | null {
    try {
        const parsed: unknown = JSON.parse(text);
        return isRecord(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * End index (exclusive) of the object opening at `start`, or -1 when the
 * braces never balance. Braces inside JSON strings are ignored.
 */
function balancedObjectEnd(text: string, start: number): number {
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
        const ch = text[i];
        if (inString) {
            if (escaped) {
                escaped = false;
            } else if (ch === '\\') {
                escaped = true;
            } else if (ch === '"') {
                inString = false;
            }
            continue;
        }
        if (ch === '"') {
            inString = true;
        } else if (ch === '{') {
            depth += 1;
        } else if (ch === '}') {
            depth -= 1;
            if (depth === 0) {
                return i + 1;
            }
        }
    }
    return -1;
}

function findBalancedObject(text: string, mustContain: string | null): Record<string, unknown> | null {
    for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
        const end = balancedObjectEnd(text, start);
        if (end === -1) {
            continue;
        }
        const candidate = text.slice(start, end);
        if (mustContain !== null && !candidate.includes(mustContain)) {
            continue;
        }
        const parsed = tryParseRecord(candidate);
        if (parsed) {
            return parsed;
        }
    }
    return null;
}

/**
 * Pulls one JSON object out of free-form model output. Tried in order:
 * the whole text, a fenced code block, a balanced object mentioning
 * "rejected", any balanced object.
 */
export function extractJsonObject(text: string): Record<string, unknown> | null {
    const trimmed = text.trim();
    if (!trimmed) {
        return null;
    }

    const whole = tryParseRecord(trimmed);
    if (whole) {
        return whole;
    }

    for (const match of trimmed.matchAll(FENCED_BLOCK_PATTERN)) {
        const fenced = tryParseRecord(match[1].trim());
        if (fenced) {
            return fenced;
        }
    }

    return findBalancedObject(trimmed, '"rejected"') ?? findBalancedObject(trimmed, null);
}

export function containsRejectionVocabulary(text: string): boolean {
    const normalized = text.toLowerCase();
    return REJECTION_VOCABULARY.some((word) => normalized.includes(word));
}

export function previewText(text: string, length: number = RAW_PREVIEW_LENGTH): string {
    return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Turns raw agent output into a tagged stage 2 result. Never throws.
 */
export function coerceGenerationResult(text: string): GenerationResult {
    const extracted = extractJsonObject(text);
    if (extracted) {
        return generationFromRecord(extracted);
    }
    if (containsRejectionVocabulary(text)) {
        return {
            variant: 'rejected',
            reason: 'Agent declined the lead without structured output',
            relevanceAssessment: '',
            notes: text,
        };
    }
    return {
        variant: 'errored',
        message: 'Failed to parse agent response',
        relevanceAssessment: ERROR_ASSESSMENT,
        notes: `Raw response: ${previewText(text)}`,
    };
}
