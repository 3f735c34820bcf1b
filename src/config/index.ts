import fs from 'fs';
import { z } from 'zod';
import { PROVIDER_BASE_URLS, ProviderSettings } from '../ai/openaiClient';
import { ConfigError } from '../core/errors';
import { loadDotEnv, parseBoolEnv, parseFloatEnv, parseIntEnv, parseStringEnv, resolvePathFromEnv, resolvePathValue } from './env';
import { AppConfig, LogLevelName, ModelConfig } from './types';

export { validateConfig } from './validation';
export type { AppConfig, ModelConfig } from './types';

const modelSectionSchema = z.object({
    provider: z.string().min(1).transform((value) => value.trim().toLowerCase()).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout_ms: z.number().int().positive().optional(),
});

const providerLimitSchema = z.object({
    requests_per_second: z.number().positive(),
    burst: z.number().int().min(1),
});

/**
 * Optional `config.json`. Every key overrides the matching environment value.
 */
export const fileConfigSchema = z.object({
    models: z.object({
        classification: modelSectionSchema.optional(),
        letter_generation: modelSectionSchema.optional(),
    }).optional(),
    generation_mode: z.enum(['single', 'multi']).optional(),
    worker_pool: z.object({
        num_workers: z.number().int().min(1).optional(),
        max_agent_iterations: z.number().int().min(1).optional(),
        inter_task_delay_ms: z.number().int().min(0).optional(),
    }).optional(),
    agent_orchestration: z.object({
        research_agents: z.number().int().min(1).optional(),
        writer_agents: z.number().int().min(1).optional(),
        parallel_execution: z.boolean().optional(),
    }).optional(),
    auto_compact: z.object({
        enabled: z.boolean().optional(),
        trigger_at_messages: z.number().int().min(2).optional(),
        preserve_last_messages: z.number().int().min(1).optional(),
        summarization_provider: z.string().min(1).optional(),
        summarization_model: z.string().min(1).optional(),
    }).optional(),
    rate_limiting: z.object({
        enabled: z.boolean().optional(),
        max_retries: z.number().int().min(0).optional(),
        base_delay_ms: z.number().int().positive().optional(),
        providers: z.record(providerLimitSchema).optional(),
    }).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function loadConfigFile(configPath: string | null | undefined): FileConfig {
    if (!configPath) {
        return {};
    }
    const resolved = resolvePathValue(configPath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${resolved}`, 'CONFIG_NOT_FOUND');
    }
    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    } catch (error) {
        throw new ConfigError(`Config file is not valid JSON: ${resolved} (${error instanceof Error ? error.message : String(error)})`, 'CONFIG_INVALID');
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Config file ${resolved} is invalid: ${issues}`, 'CONFIG_INVALID');
    }
    return parsed.data;
}

function parseLogLevel(raw: string): LogLevelName {
    const normalized = raw.toLowerCase();
    if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
        return normalized;
    }
    return 'info';
}

function parseGenerationMode(raw: string): AppConfig['generationMode'] {
    return raw.toLowerCase() === 'multi' ? 'multi' : 'single';
}

/**
 * Environment first (after `.env`), then `config.json` on top.
 */
export function buildAppConfig(file: FileConfig = {}): AppConfig {
    loadDotEnv();

    const defaultTimeoutMs = parseIntEnv('LLM_TIMEOUT_MS', 120_000);
    const classification: ModelConfig = {
        provider: parseStringEnv('CLASSIFICATION_PROVIDER', 'deepseek').toLowerCase(),
        model: parseStringEnv('CLASSIFICATION_MODEL', 'deepseek-chat'),
        temperature: parseFloatEnv('CLASSIFICATION_TEMPERATURE', 0),
        timeoutMs: defaultTimeoutMs,
    };
    const letterGeneration: ModelConfig = {
        provider: parseStringEnv('LETTER_PROVIDER', 'deepseek').toLowerCase(),
        model: parseStringEnv('LETTER_MODEL', 'deepseek-chat'),
        temperature: parseFloatEnv('LETTER_TEMPERATURE', 0.7),
        timeoutMs: defaultTimeoutMs,
    };
    const classificationFile = file.models?.classification;
    const letterFile = file.models?.letter_generation;

    return {
        providers: {
            openai: {
                baseUrl: parseStringEnv('OPENAI_BASE_URL', PROVIDER_BASE_URLS.openai),
                apiKey: parseStringEnv('OPENAI_API_KEY'),
            },
            deepseek: {
                baseUrl: parseStringEnv('DEEPSEEK_BASE_URL', PROVIDER_BASE_URLS.deepseek),
                apiKey: parseStringEnv('DEEPSEEK_API_KEY'),
            },
        },
        classification: {
            provider: classificationFile?.provider ?? classification.provider,
            model: classificationFile?.model ?? classification.model,
            temperature: classificationFile?.temperature ?? classification.temperature,
            timeoutMs: classificationFile?.timeout_ms ?? classification.timeoutMs,
        },
        letterGeneration: {
            provider: letterFile?.provider ?? letterGeneration.provider,
            model: letterFile?.model ?? letterGeneration.model,
            temperature: letterFile?.temperature ?? letterGeneration.temperature,
            timeoutMs: letterFile?.timeout_ms ?? letterGeneration.timeoutMs,
        },
        generationMode: file.generation_mode ?? parseGenerationMode(parseStringEnv('GENERATION_MODE', 'single')),
        numWorkers: file.worker_pool?.num_workers ?? parseIntEnv('NUM_WORKERS', 5),
        maxAgentIterations: file.worker_pool?.max_agent_iterations ?? parseIntEnv('MAX_AGENT_ITERATIONS', 30),
        interTaskDelayMs: file.worker_pool?.inter_task_delay_ms ?? parseIntEnv('INTER_TASK_DELAY_MS', 0),
        researchAgents: file.agent_orchestration?.research_agents ?? parseIntEnv('RESEARCH_AGENTS', 2),
        writerAgents: file.agent_orchestration?.writer_agents ?? parseIntEnv('WRITER_AGENTS', 2),
        parallelExecution: file.agent_orchestration?.parallel_execution ?? parseBoolEnv('AGENT_PARALLEL_EXECUTION', true),
        autoCompact: {
            enabled: file.auto_compact?.enabled ?? parseBoolEnv('AUTO_COMPACT_ENABLED', true),
            triggerAtMessages: file.auto_compact?.trigger_at_messages ?? parseIntEnv('AUTO_COMPACT_TRIGGER_MESSAGES', 15),
            preserveLastMessages: file.auto_compact?.preserve_last_messages ?? parseIntEnv('AUTO_COMPACT_PRESERVE_LAST', 5),
            summarizationProvider: (file.auto_compact?.summarization_provider ?? parseStringEnv('AUTO_COMPACT_PROVIDER', 'openai')).toLowerCase(),
            summarizationModel: file.auto_compact?.summarization_model ?? parseStringEnv('AUTO_COMPACT_MODEL', 'gpt-4o-mini'),
        },
        rateLimiting: {
            enabled: file.rate_limiting?.enabled ?? parseBoolEnv('RATE_LIMIT_ENABLED', true),
            maxRetries: file.rate_limiting?.max_retries ?? parseIntEnv('RATE_LIMIT_MAX_RETRIES', 3),
            baseDelayMs: file.rate_limiting?.base_delay_ms ?? parseIntEnv('RATE_LIMIT_BASE_DELAY_MS', 2000),
            providers: buildProviderLimits(file),
        },
        research: {
            brightDataApiToken: parseStringEnv('BRIGHTDATA_API_TOKEN'),
            brightDataDatasetId: parseStringEnv('BRIGHTDATA_DATASET_ID'),
            tavilyApiKey: parseStringEnv('TAVILY_API_KEY'),
            profileTimeoutMs: parseIntEnv('PROFILE_FETCH_TIMEOUT_MS', 60_000),
            batchTimeoutMs: parseIntEnv('PROFILE_BATCH_TIMEOUT_MS', 300_000),
            searchTimeoutMs: parseIntEnv('WEB_SEARCH_TIMEOUT_MS', 30_000),
            maxResultChars: parseIntEnv('TOOL_RESULT_MAX_CHARS', 20_000),
        },
        dbPath: resolvePathFromEnv('DB_PATH', 'data/progress.db'),
        outputPath: resolvePathFromEnv('OUTPUT_PATH', 'data/output/results.csv'),
        contextDir: resolvePathFromEnv('CONTEXT_DIR', 'context'),
        agentsDir: resolvePathFromEnv('AGENTS_DIR', 'agents'),
        logDir: resolvePathFromEnv('LOG_DIR', 'logs'),
        logLevel: parseLogLevel(parseStringEnv('LOG_LEVEL', 'info')),
    };
}

function buildProviderLimits(file: FileConfig): AppConfig['rateLimiting']['providers'] {
    const limits: AppConfig['rateLimiting']['providers'] = {
        openai: {
            requestsPerSecond: parseFloatEnv('OPENAI_REQUESTS_PER_SECOND', 5),
            burst: parseIntEnv('OPENAI_BURST', 10),
        },
        deepseek: {
            requestsPerSecond: parseFloatEnv('DEEPSEEK_REQUESTS_PER_SECOND', 3),
            burst: parseIntEnv('DEEPSEEK_BURST', 5),
        },
    };
    for (const [provider, value] of Object.entries(file.rate_limiting?.providers ?? {})) {
        limits[provider.trim().toLowerCase()] = {
            requestsPerSecond: value.requests_per_second,
            burst: value.burst,
        };
    }
    return limits;
}

export function providerSettingsFor(config: AppConfig, model: Pick<ModelConfig, 'provider' | 'model' | 'timeoutMs'> & { temperature?: number }): ProviderSettings {
    const endpoint = config.providers[model.provider];
    if (!endpoint) {
        throw new ConfigError(`Unknown LLM provider "${model.provider}" (expected one of ${Object.keys(config.providers).join(', ')})`, 'UNKNOWN_PROVIDER');
    }
    return {
        provider: model.provider,
        baseUrl: endpoint.baseUrl,
        apiKey: endpoint.apiKey,
        model: model.model,
        timeoutMs: model.timeoutMs,
        temperature: model.temperature,
    };
}
