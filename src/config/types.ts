import { GenerationMode } from '../ai/letterGenerator';
import { ProviderRateLimit } from '../core/rateLimiter';
import { ResearchToolSettings } from '../integrations/researchTools';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface ProviderEndpoint {
    baseUrl: string;
    apiKey: string;
}

export interface ModelConfig {
    provider: string;
    model: string;
    temperature: number;
    timeoutMs: number;
}

export interface AutoCompactConfig {
    enabled: boolean;
    triggerAtMessages: number;
    preserveLastMessages: number;
    summarizationProvider: string;
    summarizationModel: string;
}

export interface RateLimitingConfig {
    enabled: boolean;
    maxRetries: number;
    baseDelayMs: number;
    providers: Record<string, ProviderRateLimit>;
}

export interface AppConfig {
    providers: Record<string, ProviderEndpoint>;
    classification: ModelConfig;
    letterGeneration: ModelConfig;
    generationMode: GenerationMode;
    numWorkers: number;
    maxAgentIterations: number;
    interTaskDelayMs: number;
    researchAgents: number;
    writerAgents: number;
    parallelExecution: boolean;
    autoCompact: AutoCompactConfig;
    rateLimiting: RateLimitingConfig;
    research: ResearchToolSettings;
    dbPath: string;
    outputPath: string;
    contextDir: string;
    agentsDir: string;
    logDir: string;
    logLevel: LogLevelName;
}
