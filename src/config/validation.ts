import { AppConfig, ModelConfig } from './types';
import { isAiRequestConfigured } from './env';

interface ConfigValidationRule {
    message: (cfg: AppConfig) => string;
    when: (cfg: AppConfig) => boolean;
}

function providerMissingKey(cfg: AppConfig, provider: string): boolean {
    const endpoint = cfg.providers[provider];
    return !endpoint || !isAiRequestConfigured(endpoint.baseUrl, endpoint.apiKey);
}

function describeModel(model: ModelConfig): string {
    return `${model.provider}/${model.model}`;
}

const CONFIG_VALIDATION_RULES: ConfigValidationRule[] = [
    {
        message: (cfg) => `[CONFIG] classification model ${describeModel(cfg.classification)} has no API key (set ${cfg.classification.provider.toUpperCase()}_API_KEY)`,
        when: (cfg) => providerMissingKey(cfg, cfg.classification.provider),
    },
    {
        message: (cfg) => `[CONFIG] letter model ${describeModel(cfg.letterGeneration)} has no API key (set ${cfg.letterGeneration.provider.toUpperCase()}_API_KEY)`,
        when: (cfg) => providerMissingKey(cfg, cfg.letterGeneration.provider),
    },
    {
        message: (cfg) => `[CONFIG] AUTO_COMPACT_ENABLED=true but ${cfg.autoCompact.summarizationProvider} has no API key`,
        when: (cfg) => cfg.autoCompact.enabled && providerMissingKey(cfg, cfg.autoCompact.summarizationProvider),
    },
    {
        message: () => '[CONFIG] NUM_WORKERS must be >= 1',
        when: (cfg) => cfg.numWorkers < 1,
    },
    {
        message: () => '[CONFIG] MAX_AGENT_ITERATIONS must be >= 1',
        when: (cfg) => cfg.maxAgentIterations < 1,
    },
    {
        message: () => '[CONFIG] INTER_TASK_DELAY_MS must be >= 0',
        when: (cfg) => cfg.interTaskDelayMs < 0,
    },
    {
        message: () => '[CONFIG] RESEARCH_AGENTS and WRITER_AGENTS must be >= 1 in multi-agent mode',
        when: (cfg) => cfg.generationMode === 'multi' && (cfg.researchAgents < 1 || cfg.writerAgents < 1),
    },
    {
        message: () => '[CONFIG] AUTO_COMPACT_PRESERVE_LAST must be lower than AUTO_COMPACT_TRIGGER_MESSAGES',
        when: (cfg) => cfg.autoCompact.enabled && cfg.autoCompact.preserveLastMessages >= cfg.autoCompact.triggerAtMessages,
    },
    {
        message: () => '[CONFIG] model temperature must be between 0 and 2',
        when: (cfg) => [cfg.classification.temperature, cfg.letterGeneration.temperature].some((value) => value < 0 || value > 2),
    },
    {
        message: () => '[CONFIG] rate limits need requests_per_second > 0 and burst >= 1',
        when: (cfg) => Object.values(cfg.rateLimiting.providers).some((limit) => !(limit.requestsPerSecond > 0) || limit.burst < 1),
    },
    {
        message: () => '[CONFIG] RATE_LIMIT_MAX_RETRIES must be >= 0',
        when: (cfg) => cfg.rateLimiting.maxRetries < 0,
    },
];

export function validateConfig(config: AppConfig): string[] {
    const errors: string[] = [];
    for (const rule of CONFIG_VALIDATION_RULES) {
        if (rule.when(config)) {
            errors.push(rule.message(config));
        }
    }
    return errors;
}
