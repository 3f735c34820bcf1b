import { OutreachContext } from '../context/contextLoader';
import { ERROR_ASSESSMENT } from '../core/resultCodec';
import { CompressionCounters, GenerationResult, LeadProfile, TokenUsage } from '../types/domain';
import { AgentTeam } from './agentTeam';
import { ChatClient } from './openaiClient';
import { coerceGenerationResult, previewText } from './jsonExtraction';
import { buildSingleAgentTask } from './prompts';
import { AgentRunResult, CompressionSettings, ToolAgent, ToolSource } from './toolAgent';

export type GenerationMode = 'single' | 'multi';

export interface GenerationOutcome {
    result: GenerationResult;
    usage: TokenUsage;
    compression: CompressionCounters;
}

/**
 * Stage 2. Business rejections and unparseable output come back as result
 * variants; only infrastructure failures throw.
 */
export interface LetterGenerator {
    readonly mode: GenerationMode;
    generate(lead: LeadProfile, context: OutreachContext): Promise<GenerationOutcome>;
}

/**
 * A run that stopped without a final answer (iteration ceiling or empty
 * response) is recorded as an errored result, not as a rejection.
 */
export function resultFromAgentRun(run: AgentRunResult): GenerationResult {
    if (run.status === 'success') {
        return coerceGenerationResult(run.finalText);
    }
    return {
        variant: 'errored',
        message: run.error ?? `Agent finished with status ${run.status}`,
        relevanceAssessment: ERROR_ASSESSMENT,
        notes: `Agent status ${run.status} after ${run.iterations} iteration(s): ${previewText(run.finalText)}`,
    };
}

export interface SingleAgentGeneratorOptions {
    client: ChatClient;
    tools: ToolSource;
    maxIterations: number;
    temperature?: number;
    compression?: CompressionSettings;
}

export class SingleAgentGenerator implements LetterGenerator {
    readonly mode = 'single' as const;
    private readonly options: SingleAgentGeneratorOptions;

    constructor(options: SingleAgentGeneratorOptions) {
        this.options = options;
    }

    async generate(lead: LeadProfile, context: OutreachContext): Promise<GenerationOutcome> {
        const agent = new ToolAgent({
            name: 'letter-agent',
            client: this.options.client,
            tools: this.options.tools.list(),
            maxIterations: this.options.maxIterations,
            temperature: this.options.temperature,
            compression: this.options.compression,
        });
        const run = await agent.run(buildSingleAgentTask(lead, context));
        return { result: resultFromAgentRun(run), usage: run.usage, compression: run.compression };
    }
}

export class MultiAgentGenerator implements LetterGenerator {
    readonly mode = 'multi' as const;
    private readonly team: AgentTeam;

    constructor(team: AgentTeam) {
        this.team = team;
    }

    async generate(lead: LeadProfile, context: OutreachContext): Promise<GenerationOutcome> {
        return this.team.processLead(lead, context);
    }
}
