import { z } from 'zod';
import { AiRequestError, errorMessage } from '../core/errors';
import { executeWithRetryPolicy, isLikelyTransientError, isRateLimitError } from '../core/integrationPolicy';
import { RateLimiterRegistry, Sleeper, TokenBucketRateLimiter } from '../core/rateLimiter';
import { logWarn } from '../telemetry/logger';
import { TokenUsage } from '../types/domain';

export interface ToolCall {
    id: string;
    name: string;
    /** Raw JSON argument string as produced by the model. */
    arguments: string;
}

export type ChatMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string; toolCalls: ToolCall[] }
    | { role: 'tool'; toolCallId: string; content: string };

export interface ToolDefinition {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
}

export interface ChatRequest {
    messages: ChatMessage[];
    tools?: ToolDefinition[];
    temperature?: number;
    maxOutputTokens?: number;
    responseFormat?: 'json_object' | 'text';
    timeoutMs?: number;
}

export interface ChatResponse {
    content: string;
    toolCalls: ToolCall[];
    usage: TokenUsage;
}

export interface ChatClient {
    readonly provider: string;
    readonly model: string;
    complete(request: ChatRequest): Promise<ChatResponse>;
}

export interface ProviderSettings {
    provider: string;
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
    temperature?: number;
}

export const PROVIDER_BASE_URLS: Record<string, string> = {
    openai: 'https://api.openai.com/v1',
    deepseek: 'https://api.deepseek.com',
};

export function isLocalAiEndpoint(baseUrl: string): boolean {
    try {
        const url = new URL(baseUrl);
        const host = url.hostname.toLowerCase();
        if (host === 'localhost' || host === '127.0.0.1' || host === '::1') {
            return true;
        }
        return host.endsWith('.local');
    } catch {
        return false;
    }
}

function safeJoinUrl(baseUrl: string, suffix: string): string {
    return `${baseUrl.replace(/\/+$/, '')}${suffix}`;
}

const completionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable().optional(),
            tool_calls: z.array(z.object({
                id: z.string(),
                function: z.object({
                    name: z.string(),
                    arguments: z.string().optional().default('{}'),
                }),
            })).nullable().optional(),
        }),
    })).min(1),
    usage: z.object({
        prompt_tokens: z.number().optional().default(0),
        completion_tokens: z.number().optional().default(0),
        prompt_tokens_details: z.object({
            cached_tokens: z.number().optional().default(0),
        }).nullable().optional(),
        // DeepSeek reports cache hits separately
        prompt_cache_hit_tokens: z.number().optional(),
    }).nullable().optional(),
});

type WireMessage =
    | { role: 'system' | 'user'; content: string }
    | {
        role: 'assistant';
        content: string | null;
        tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
    }
    | { role: 'tool'; tool_call_id: string; content: string };

function toWireMessage(message: ChatMessage): WireMessage {
    switch (message.role) {
        case 'system':
        case 'user':
            return { role: message.role, content: message.content };
        case 'assistant':
            if (message.toolCalls.length === 0) {
                return { role: 'assistant', content: message.content };
            }
            return {
                role: 'assistant',
                content: message.content || null,
                tool_calls: message.toolCalls.map((call) => ({
                    id: call.id,
                    type: 'function',
                    function: { name: call.name, arguments: call.arguments },
                })),
            };
        case 'tool':
            return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    }
}

/**
 * OpenAI-compatible chat completions client (OpenAI, DeepSeek, local endpoints).
 */
export class OpenAIChatClient implements ChatClient {
    readonly provider: string;
    readonly model: string;
    private readonly settings: ProviderSettings;

    constructor(settings: ProviderSettings) {
        this.settings = settings;
        this.provider = settings.provider;
        this.model = settings.model;
    }

    async complete(request: ChatRequest): Promise<ChatResponse> {
        const localEndpoint = isLocalAiEndpoint(this.settings.baseUrl);
        if (!this.settings.apiKey && !localEndpoint) {
            throw new AiRequestError(`API key for provider "${this.provider}" is missing.`);
        }

        const headers: Record<string, string> = {
            'content-type': 'application/json',
        };
        if (this.settings.apiKey) {
            headers.authorization = `Bearer ${this.settings.apiKey}`;
        }

        const temperature = request.temperature ?? this.settings.temperature;
        const response = await fetch(safeJoinUrl(this.settings.baseUrl, '/chat/completions'), {
            method: 'POST',
            headers,
            body: JSON.stringify({
                model: this.model,
                messages: request.messages.map(toWireMessage),
                ...(temperature !== undefined ? { temperature } : {}),
                ...(request.maxOutputTokens ? { max_tokens: request.maxOutputTokens } : {}),
                ...(request.tools && request.tools.length > 0
                    ? {
                        tools: request.tools.map((tool) => ({
                            type: 'function',
                            function: { name: tool.name, description: tool.description, parameters: tool.parameters },
                        })),
                    }
                    : {}),
                ...(request.responseFormat ? { response_format: { type: request.responseFormat } } : {}),
            }),
            signal: AbortSignal.timeout(request.timeoutMs ?? this.settings.timeoutMs),
        });

        if (!response.ok) {
            const text = (await response.text().catch(() => '')).slice(0, 500);
            throw new AiRequestError(
                `${this.provider} HTTP ${response.status}: ${response.statusText}${text ? ` ${text}` : ''}`,
                response.status
            );
        }

        const payload: unknown = await response.json().catch(() => null);
        const parsed = completionSchema.safeParse(payload);
        if (!parsed.success) {
            throw new AiRequestError(`${this.provider} returned an unparseable completion: ${parsed.error.message}`);
        }

        const message = parsed.data.choices[0].message;
        const usage = parsed.data.usage;
        return {
            content: (message.content ?? '').trim(),
            toolCalls: (message.tool_calls ?? []).map((call) => ({
                id: call.id,
                name: call.function.name,
                arguments: call.function.arguments,
            })),
            usage: {
                inputTokens: usage?.prompt_tokens ?? 0,
                outputTokens: usage?.completion_tokens ?? 0,
                cachedTokens: usage?.prompt_tokens_details?.cached_tokens ?? usage?.prompt_cache_hit_tokens ?? 0,
            },
        };
    }
}

export interface RateLimitRetryOptions {
    maxRetries?: number;
    baseDelayMs?: number;
    sleep?: Sleeper;
}

export const RATE_LIMIT_MAX_RETRIES = 3;
export const RATE_LIMIT_BASE_DELAY_MS = 2_000;

/** Throttling plus the timeouts and dropped connections a retry can recover from. */
export function isRetryableLlmError(error: unknown): boolean {
    if (error instanceof Error && error.name === 'TimeoutError') {
        return true;
    }
    return isRateLimitError(error) || isLikelyTransientError(error);
}

/**
 * Takes one token per attempt and retries transient provider errors with 2s, 4s, 8s backoff.
 * Any other error propagates on the first attempt.
 */
export class RateLimitedChatClient implements ChatClient {
    readonly provider: string;
    readonly model: string;
    private readonly inner: ChatClient;
    private readonly limiter: TokenBucketRateLimiter | null;
    private readonly retry: Required<Omit<RateLimitRetryOptions, 'sleep'>> & { sleep?: Sleeper };

    constructor(inner: ChatClient, limiter: TokenBucketRateLimiter | null, retry: RateLimitRetryOptions = {}) {
        this.inner = inner;
        this.limiter = limiter;
        this.provider = inner.provider;
        this.model = inner.model;
        this.retry = {
            maxRetries: retry.maxRetries ?? RATE_LIMIT_MAX_RETRIES,
            baseDelayMs: retry.baseDelayMs ?? RATE_LIMIT_BASE_DELAY_MS,
            sleep: retry.sleep,
        };
    }

    async complete(request: ChatRequest): Promise<ChatResponse> {
        return executeWithRetryPolicy(
            async () => {
                if (this.limiter) {
                    await this.limiter.acquire();
                }
                return this.inner.complete(request);
            },
            {
                integration: `llm.${this.provider}`,
                maxAttempts: this.retry.maxRetries + 1,
                baseDelayMs: this.retry.baseDelayMs,
                maxDelayMs: this.retry.baseDelayMs * Math.pow(2, this.retry.maxRetries),
                jitterRatio: 0,
                sleep: this.retry.sleep,
                classifyError: (error) => (isRetryableLlmError(error) ? 'transient' : 'terminal'),
                onRetry: async ({ attempt, delayMs, error }) => {
                    await logWarn(isRateLimitError(error) ? 'llm.rate_limited' : 'llm.transient_error', {
                        provider: this.provider,
                        model: this.model,
                        attempt,
                        maxRetries: this.retry.maxRetries,
                        delayMs,
                        error: errorMessage(error),
                    });
                },
            }
        );
    }
}

export interface ChatClientFactoryOptions {
    registry: RateLimiterRegistry;
    retry?: RateLimitRetryOptions;
}

export function createChatClient(settings: ProviderSettings, options: ChatClientFactoryOptions): ChatClient {
    const limiter = options.registry.get(settings.provider);
    return new RateLimitedChatClient(new OpenAIChatClient(settings), limiter, options.retry);
}
