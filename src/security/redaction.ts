const MAX_RECURSION_DEPTH = 6;
const REDACTED = '[REDACTED]';

const SENSITIVE_KEY_PATTERN = /(secret|password|apikey|api_key|cookie|authorization|bearer|access_?token|auth_?token)/i;

const JWT_PATTERN = /\b[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\.[A-Za-z0-9_-]{20,}\b/g;
const OPENAI_KEY_PATTERN = /\bsk-(proj-)?[A-Za-z0-9_-]{16,}\b/g;
const TAVILY_KEY_PATTERN = /\btvly-[A-Za-z0-9_-]{16,}\b/gi;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._-]{16,}\b/g;

function sanitizeString(input: string): string {
    return input
        .replace(JWT_PATTERN, REDACTED)
        .replace(OPENAI_KEY_PATTERN, REDACTED)
        .replace(TAVILY_KEY_PATTERN, REDACTED)
        .replace(BEARER_PATTERN, `Bearer ${REDACTED}`);
}

function sanitizeArray(input: unknown[], depth: number): unknown[] {
    if (depth > MAX_RECURSION_DEPTH) {
        return ['[MAX_DEPTH_REACHED]'];
    }
    return input.map((item) => sanitizeValue(item, depth + 1));
}

function sanitizeObject(input: object, depth: number): Record<string, unknown> {
    if (depth > MAX_RECURSION_DEPTH) {
        return { note: '[MAX_DEPTH_REACHED]' };
    }

    const output: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (SENSITIVE_KEY_PATTERN.test(key)) {
            output[key] = REDACTED;
            continue;
        }
        output[key] = sanitizeValue(value, depth + 1);
    }
    return output;
}

export function sanitizeValue(value: unknown, depth: number = 0): unknown {
    if (value === null || value === undefined) {
        return value;
    }
    if (typeof value === 'string') {
        return sanitizeString(value);
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Error) {
        return sanitizeString(value.message);
    }
    if (Array.isArray(value)) {
        return sanitizeArray(value, depth);
    }
    if (typeof value === 'object') {
        return sanitizeObject(value, depth);
    }
    return String(value);
}

export function sanitizeForLogs(payload: Record<string, unknown>): Record<string, unknown> {
    return sanitizeObject(payload, 0);
}
