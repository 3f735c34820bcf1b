import { ClassificationResult, LeadProfile, TokenUsage } from '../types/domain';
import { AiRequestError } from '../core/errors';
import { ChatClient } from './openaiClient';
import { extractJsonObject } from './jsonExtraction';
import { buildClassificationPrompt } from './prompts';

export interface ClassificationOutcome {
    result: ClassificationResult;
    usage: TokenUsage;
}

export interface LeadClassifier {
    classify(lead: LeadProfile, gtmContext: string): Promise<ClassificationOutcome>;
}

/**
 * Stage 1: asks the model whether a lead fits the ICP. Provider and parse
 * errors propagate; a lead is never silently marked not relevant.
 */
export class IcpClassifier implements LeadClassifier {
    private readonly client: ChatClient;
    private readonly temperature: number;

    constructor(client: ChatClient, temperature: number = 0) {
        this.client = client;
        this.temperature = temperature;
    }

    async classify(lead: LeadProfile, gtmContext: string): Promise<ClassificationOutcome> {
        const response = await this.client.complete({
            messages: [{ role: 'user', content: buildClassificationPrompt(lead, gtmContext) }],
            temperature: this.temperature,
            responseFormat: 'json_object',
        });

        const parsed = extractJsonObject(response.content);
        if (!parsed || typeof parsed.relevant !== 'boolean') {
            throw new AiRequestError(
                `Classification response is not {relevant, reason}: ${response.content.slice(0, 200)}`
            );
        }
        return {
            result: {
                relevant: parsed.relevant,
                reason: typeof parsed.reason === 'string' ? parsed.reason : '',
            },
            usage: response.usage,
        };
    }
}
