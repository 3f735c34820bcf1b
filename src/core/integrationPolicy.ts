import { errorMessage } from './errors';
import { defaultSleep, Sleeper } from './rateLimiter';

export type RetryClassification = 'transient' | 'terminal';

export interface RetryEvent {
    integration: string;
    attempt: number;
    delayMs: number;
    error: unknown;
}

export interface RetryPolicyOptions {
    integration: string;
    timeoutMs?: number;
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    /** Fraction of the backoff added as random jitter. 0 gives exact 2x backoff. */
    jitterRatio?: number;
    classifyError?: (error: unknown) => RetryClassification;
    classifyResponse?: (response: Response) => RetryClassification;
    sleep?: Sleeper;
    onRetry?: (event: RetryEvent) => void | Promise<void>;
}

export const DEFAULT_INTEGRATION_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 500;
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

const DEFAULT_TRANSIENT_HTTP_STATUS = new Set<number>([408, 425, 429, 500, 502, 503, 504]);

export function computeDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number, jitterRatio: number): number {
    const exponent = Math.max(0, attempt - 1);
    const base = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, exponent));
    if (jitterRatio <= 0) {
        return base;
    }
    const jitter = Math.floor(Math.random() * Math.max(50, Math.floor(base * jitterRatio)));
    return Math.min(maxDelayMs, base + jitter);
}

function createTimedAbortController(parent: AbortSignal | null | undefined, timeoutMs: number): {
    signal: AbortSignal;
    cleanup: () => void;
} {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(new Error('Integration timeout')), timeoutMs);

    const onAbort = () => controller.abort(parent?.reason);
    if (parent) {
        if (parent.aborted) {
            controller.abort(parent.reason);
        } else {
            parent.addEventListener('abort', onAbort, { once: true });
        }
    }

    return {
        signal: controller.signal,
        cleanup: () => {
            clearTimeout(timeout);
            if (parent) {
                parent.removeEventListener('abort', onAbort);
            }
        },
    };
}

export function isTransientHttpStatus(status: number): boolean {
    return DEFAULT_TRANSIENT_HTTP_STATUS.has(status);
}

export function isRateLimitError(error: unknown): boolean {
    const normalized = errorMessage(error).toLowerCase();
    return normalized.includes('429')
        || normalized.includes('rate limit')
        || normalized.includes('too many requests');
}

export function isLikelyTransientError(error: unknown): boolean {
    const normalized = errorMessage(error).toLowerCase();
    if (normalized.includes('http transient')) {
        return true;
    }
    return normalized.includes('timeout')
        || normalized.includes('timed out')
        || normalized.includes('network')
        || normalized.includes('fetch failed')
        || normalized.includes('econnreset')
        || normalized.includes('econnrefused')
        || normalized.includes('enotfound')
        || normalized.includes('eai_again')
        || normalized.includes('socket hang up')
        || normalized.includes('temporarily unavailable');
}

export async function executeWithRetryPolicy<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryPolicyOptions
): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS);
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS);
    const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS);
    const jitterRatio = Math.max(0, options.jitterRatio ?? 0.25);
    const sleep = options.sleep ?? defaultSleep;

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await operation(attempt);
        } catch (error) {
            lastError = error;
            const classification = options.classifyError
                ? options.classifyError(error)
                : (isLikelyTransientError(error) ? 'transient' : 'terminal');
            if (classification === 'terminal') {
                throw error;
            }
            if (attempt >= maxAttempts) {
                break;
            }
            const delayMs = computeDelayMs(attempt, baseDelayMs, maxDelayMs, jitterRatio);
            if (options.onRetry) {
                await options.onRetry({ integration: options.integration, attempt, delayMs, error });
            }
            await sleep(delayMs);
        }
    }

    throw (lastError instanceof Error ? lastError : new Error(`${options.integration}: retry exhausted`));
}

export async function fetchWithRetryPolicy(
    url: string,
    init: RequestInit,
    options: RetryPolicyOptions
): Promise<Response> {
    const timeoutMs = Math.max(250, options.timeoutMs ?? DEFAULT_INTEGRATION_TIMEOUT_MS);
    const classifyResponse = options.classifyResponse
        ?? ((response: Response) => (isTransientHttpStatus(response.status) ? 'transient' : 'terminal'));

    return executeWithRetryPolicy<Response>(
        async () => {
            const controller = createTimedAbortController(init.signal, timeoutMs);
            try {
                const response = await fetch(url, {
                    ...init,
                    signal: controller.signal,
                });
                const classification = classifyResponse(response);
                if (classification === 'transient') {
                    throw new Error(`HTTP transient ${response.status}`);
                }
                return response;
            } finally {
                controller.cleanup();
            }
        },
        {
            ...options,
            classifyError: (error) => (isLikelyTransientError(error) ? 'transient' : 'terminal'),
        }
    );
}
