import { addCompression, addUsage, CompressionCounters, EMPTY_COMPRESSION, EMPTY_USAGE, TokenUsage } from '../types/domain';

/** USD per 1M tokens. */
export interface ModelPricing {
    input: number;
    cachedInput: number;
    output: number;
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
    'gpt-4o': { input: 2.5, cachedInput: 1.25, output: 10 },
    'gpt-4o-mini': { input: 0.15, cachedInput: 0.075, output: 0.6 },
    'gpt-4.1': { input: 2, cachedInput: 0.5, output: 8 },
    'gpt-4.1-mini': { input: 0.4, cachedInput: 0.1, output: 1.6 },
    'deepseek-chat': { input: 0.27, cachedInput: 0.07, output: 1.1 },
    'deepseek-reasoner': { input: 0.55, cachedInput: 0.14, output: 2.19 },
};

export const BASELINE_PRICING_MODEL = 'gpt-4o-mini';

export function pricingFor(model: string): ModelPricing {
    return MODEL_PRICING[model.trim().toLowerCase()] ?? MODEL_PRICING[BASELINE_PRICING_MODEL];
}

/**
 * input × (in − cached) + cachedInput × cached + output × out, per million tokens.
 */
export function computeCostUsd(usage: TokenUsage, model: string): number {
    const price = pricingFor(model);
    const cached = Math.min(usage.cachedTokens, usage.inputTokens);
    const uncached = usage.inputTokens - cached;
    return (uncached * price.input + cached * price.cachedInput + usage.outputTokens * price.output) / 1_000_000;
}

export interface TokenStats {
    stage1Input: number;
    stage1Output: number;
    stage1Cached: number;
    stage2Input: number;
    stage2Output: number;
    stage2Cached: number;
    totalInput: number;
    totalOutput: number;
    totalCached: number;
    totalCostUsd: number;
}

export interface CompressionStats {
    totalCompressions: number;
    totalMessagesBefore: number;
    totalMessagesAfter: number;
}

export interface UsageModels {
    stage1Model: string;
    stage2Model: string;
}

/**
 * Per-pool token and compression counters. Updated synchronously after each
 * awaited stage, so concurrent workers never interleave inside an update.
 */
export class UsageTracker {
    private stage1: TokenUsage = { ...EMPTY_USAGE };
    private stage2: TokenUsage = { ...EMPTY_USAGE };
    private compression: CompressionCounters = { ...EMPTY_COMPRESSION };
    private readonly models: UsageModels;

    constructor(models: UsageModels) {
        this.models = models;
    }

    recordStage1(usage: TokenUsage): void {
        this.stage1 = addUsage(this.stage1, usage);
    }

    recordStage2(usage: TokenUsage): void {
        this.stage2 = addUsage(this.stage2, usage);
    }

    recordCompression(counters: CompressionCounters): void {
        this.compression = addCompression(this.compression, counters);
    }

    getTokenStats(): TokenStats {
        const total = addUsage(this.stage1, this.stage2);
        return {
            stage1Input: this.stage1.inputTokens,
            stage1Output: this.stage1.outputTokens,
            stage1Cached: this.stage1.cachedTokens,
            stage2Input: this.stage2.inputTokens,
            stage2Output: this.stage2.outputTokens,
            stage2Cached: this.stage2.cachedTokens,
            totalInput: total.inputTokens,
            totalOutput: total.outputTokens,
            totalCached: total.cachedTokens,
            totalCostUsd: computeCostUsd(this.stage1, this.models.stage1Model)
                + computeCostUsd(this.stage2, this.models.stage2Model),
        };
    }

    getCompressionStats(): CompressionStats {
        return {
            totalCompressions: this.compression.count,
            totalMessagesBefore: this.compression.messagesBefore,
            totalMessagesAfter: this.compression.messagesAfter,
        };
    }
}
