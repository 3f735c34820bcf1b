import { OutreachContext } from '../context/contextLoader';
import { errorMessage } from '../core/errors';
import { generationFromRecord } from '../core/resultCodec';
import { isRecord } from '../core/repositories/shared';
import { logInfo, logWarn } from '../telemetry/logger';
import {
    addCompression,
    addUsage,
    CompressionCounters,
    EMPTY_COMPRESSION,
    EMPTY_USAGE,
    GenerationResult,
    LeadProfile,
    OutreachLetter,
    TokenUsage,
} from '../types/domain';
import { validatePersonalization } from '../validation/personalizationValidator';
import { AgentDefinition } from './agentLoader';
import { extractJsonObject, previewText } from './jsonExtraction';
import { ChatClient } from './openaiClient';
import { buildAgentTaskPrompt } from './prompts';
import { AgentRunResult, AgentTool, CompressionSettings, ToolAgent, ToolSource } from './toolAgent';

export interface AgentDefinitionSource {
    loadAgent(name: string): Promise<AgentDefinition>;
}

export interface AgentTeamOptions {
    agents: AgentDefinitionSource;
    clientFor: (definition: AgentDefinition) => ChatClient;
    tools: ToolSource;
    researchAgents: number;
    writerAgents: number;
    parallel: boolean;
    compression?: CompressionSettings;
}

export interface TeamOutcome {
    result: GenerationResult;
    usage: TokenUsage;
    compression: CompressionCounters;
}

export const RESEARCH_FOCUSES = [
    'LinkedIn profile and recent personal activity',
    'Company news, funding, and growth signals',
];

const ANGLE_PREVIEW = 100;

interface Variant {
    id: number;
    letter: OutreachLetter;
    relevanceAssessment: string;
    notes: string;
}

type SettledRun = { ok: true; run: AgentRunResult } | { ok: false; error: unknown };

type Parsed = { ok: true; record: Record<string, unknown> } | { ok: false; reason: string };

function parseAgentOutput(run: AgentRunResult): Parsed {
    if (run.status === 'error') {
        return { ok: false, reason: run.error ?? 'Unknown agent error' };
    }
    const record = extractJsonObject(run.finalText);
    if (!record) {
        return { ok: false, reason: `Invalid JSON output: ${previewText(run.finalText, ANGLE_PREVIEW)}` };
    }
    if (record.rejected === true) {
        const reason = record.rejection_reason ?? record.reason;
        return { ok: false, reason: typeof reason === 'string' && reason ? reason : 'Rejected without reason' };
    }
    return { ok: true, record };
}

function readInsight(research: Record<string, unknown>, key: string): string {
    const insights = research.insights;
    if (!isRecord(insights)) {
        return '';
    }
    const value = insights[key];
    return typeof value === 'string' ? value : '';
}

export function writingAngle(index: number, research: Record<string, unknown>): string {
    const angles = [
        `Lead with primary insight: ${readInsight(research, 'primary_insight').slice(0, ANGLE_PREVIEW)}...`,
        `Lead with secondary insight: ${readInsight(research, 'secondary_insight').slice(0, ANGLE_PREVIEW)}...`,
    ];
    return angles[index % angles.length];
}

function firstFailure(runs: SettledRun[]): unknown {
    const failed = runs.find((entry): entry is { ok: false; error: unknown } => !entry.ok);
    return failed ? failed.error : new Error('no agent runs');
}

/**
 * Research → write → review workflow. Runs autonomously: researchers gather
 * findings, writers produce letter variants, one reviewer picks the variant.
 */
export class AgentTeam {
    private readonly options: AgentTeamOptions;

    constructor(options: AgentTeamOptions) {
        this.options = {
            ...options,
            researchAgents: Math.max(1, options.researchAgents),
            writerAgents: Math.max(1, options.writerAgents),
        };
    }

    async processLead(lead: LeadProfile, context: OutreachContext): Promise<TeamOutcome> {
        let usage: TokenUsage = { ...EMPTY_USAGE };
        let compression: CompressionCounters = { ...EMPTY_COMPRESSION };
        const account = (runs: SettledRun[]): void => {
            for (const entry of runs) {
                if (entry.ok) {
                    usage = addUsage(usage, entry.run.usage);
                    compression = addCompression(compression, entry.run.compression);
                }
            }
        };
        const done = (result: GenerationResult): TeamOutcome => ({ result, usage, compression });

        // Phase 1: research
        const researcher = await this.options.agents.loadAgent('researcher');
        const researchRuns = await this.runMany(this.options.researchAgents, (index) => this.runAgent(researcher, {
            lead,
            context: null,
            additionalContext: this.options.researchAgents > 1
                ? `PRIORITY FOCUS: ${RESEARCH_FOCUSES[index % RESEARCH_FOCUSES.length]}`
                : '',
            label: `researcher-${index + 1}`,
        }));
        account(researchRuns);
        if (researchRuns.every((entry) => !entry.ok)) {
            throw firstFailure(researchRuns);
        }

        const rejections: string[] = [];
        let research: Record<string, unknown> | null = null;
        for (const entry of researchRuns) {
            if (!entry.ok) {
                await logWarn('team.researcher_failed', { error: errorMessage(entry.error) });
                continue;
            }
            const parsed = parseAgentOutput(entry.run);
            if (parsed.ok) {
                research = research ?? parsed.record;
            } else {
                rejections.push(parsed.reason);
            }
        }
        if (!research) {
            const reason = this.options.researchAgents === 1 && rejections.length === 1
                ? rejections[0]
                : 'All research agents failed or rejected lead';
            await logInfo('team.rejected_research', { email: lead.email, reason });
            return done({ variant: 'rejected', reason, relevanceAssessment: 'LOW', notes: rejections.join(' | ') });
        }
        const researchFindings = research;
        const researchJson = JSON.stringify(researchFindings, null, 2);

        // Phase 2: writing
        const writer = await this.options.agents.loadAgent('writer');
        const writerRuns = await this.runMany(this.options.writerAgents, (index) => this.runAgent(writer, {
            lead,
            context,
            additionalContext: `RESEARCH FINDINGS:\n${researchJson}\n\nSUGGESTED ANGLE: ${writingAngle(index, researchFindings)}`,
            label: `writer-${index + 1}`,
        }));
        account(writerRuns);
        if (writerRuns.every((entry) => !entry.ok)) {
            throw firstFailure(writerRuns);
        }

        const variants: Variant[] = [];
        const variantRejections: string[] = [];
        for (const [index, entry] of writerRuns.entries()) {
            const variant = entry.ok
                ? this.toVariant(index + 1, entry.run, lead)
                : { ok: false as const, reason: `Writer agent error: ${errorMessage(entry.error)}` };
            if (variant.ok) {
                variants.push(variant.variant);
            } else {
                variantRejections.push(`variant ${index + 1}: ${variant.reason}`);
                await logInfo('team.variant_rejected', { email: lead.email, variant: index + 1, reason: variant.reason });
            }
        }
        if (variants.length === 0) {
            return done({
                variant: 'rejected',
                reason: 'All writer variants were rejected',
                relevanceAssessment: typeof researchFindings.relevance_assessment === 'string'
                    ? researchFindings.relevance_assessment
                    : '',
                notes: variantRejections.join(' | '),
            });
        }

        // Phase 3: review
        const reviewer = await this.options.agents.loadAgent('reviewer');
        const review = await this.review(reviewer, researchJson, variants, context);
        account([review.run]);
        const selected = variants.find((variant) => variant.id === review.selectedId) ?? variants[0];
        await logInfo('team.variant_selected', {
            email: lead.email,
            selected: selected.id,
            candidates: variants.length,
            confidence: review.confidence,
        });
        const reasoning = review.reasoning ? `: ${review.reasoning}` : '';
        return done({
            variant: 'accepted',
            letter: selected.letter,
            relevanceAssessment: selected.relevanceAssessment
                || (typeof researchFindings.relevance_assessment === 'string' ? researchFindings.relevance_assessment : ''),
            notes: `Selected variant ${selected.id} of ${variants.length} (confidence ${review.confidence})${reasoning}`,
        });
    }

    private toVariant(
        id: number,
        run: AgentRunResult,
        lead: LeadProfile
    ): { ok: true; variant: Variant } | { ok: false; reason: string } {
        const parsed = parseAgentOutput(run);
        if (!parsed.ok) {
            return parsed;
        }
        const record = parsed.record;
        // writers sometimes put the signals next to the letter instead of inside it
        const letter = record.letter;
        if (record.personalization_signals !== undefined && isRecord(letter) && letter.personalization_signals === undefined) {
            record.letter = { ...letter, personalization_signals: record.personalization_signals };
        }
        const result = generationFromRecord(record);
        if (result.variant !== 'accepted') {
            return { ok: false, reason: result.variant === 'rejected' ? result.reason : result.message };
        }
        const check = validatePersonalization(result.letter, lead);
        if (!check.ok) {
            return { ok: false, reason: check.reason };
        }
        return {
            ok: true,
            variant: { id, letter: result.letter, relevanceAssessment: result.relevanceAssessment, notes: result.notes },
        };
    }

    private async review(
        reviewer: AgentDefinition,
        researchJson: string,
        variants: Variant[],
        context: OutreachContext
    ): Promise<{ run: SettledRun; selectedId: number; reasoning: string; confidence: string }> {
        const forReview = variants.map((variant) => ({
            variant_id: variant.id,
            letter: {
                subject: variant.letter.subject,
                body: variant.letter.body,
                send_time: variant.letter.sendTime,
            },
            personalization_signals: variant.letter.personalizationSignals,
            notes: variant.notes,
        }));
        const additionalContext = `RESEARCH SUMMARY:
${researchJson}

EMAIL VARIANTS TO REVIEW:
${JSON.stringify(forReview, null, 2)}

Evaluate each variant and select the best one based on:
1. Personalization depth (uses specific research insights)
2. Insight quality (demonstrates understanding)
3. Authenticity (consultative, not sales-y)
4. Framework adherence (structure, word count)

Return JSON: {"selected_variant": <id>, "selection_reasoning": "...", "scores": {...}, "confidence": "HIGH|MEDIUM|LOW"}`;

        const [run] = await this.runMany(1, () => this.runAgent(reviewer, {
            lead: null,
            context,
            additionalContext,
            label: 'reviewer',
        }));
        if (!run.ok) {
            await logWarn('team.review_failed', { error: errorMessage(run.error) });
            return { run, selectedId: variants[0].id, reasoning: '', confidence: 'MEDIUM' };
        }
        const record = run.run.status === 'error' ? null : extractJsonObject(run.run.finalText);
        const selected = record ? Number(record.selected_variant) : NaN;
        return {
            run,
            selectedId: Number.isInteger(selected) ? selected : variants[0].id,
            reasoning: record && typeof record.selection_reasoning === 'string' ? record.selection_reasoning : '',
            confidence: record && typeof record.confidence === 'string' ? record.confidence : 'MEDIUM',
        };
    }

    private async runMany(count: number, start: (index: number) => Promise<AgentRunResult>): Promise<SettledRun[]> {
        const settle = (index: number): Promise<SettledRun> => start(index).then(
            (run): SettledRun => ({ ok: true, run }),
            (error: unknown): SettledRun => ({ ok: false, error })
        );
        if (this.options.parallel) {
            return Promise.all(Array.from({ length: count }, (_, index) => settle(index)));
        }
        const results: SettledRun[] = [];
        for (let index = 0; index < count; index++) {
            results.push(await settle(index));
        }
        return results;
    }

    private async runAgent(
        definition: AgentDefinition,
        input: { lead: LeadProfile | null; context: OutreachContext | null; additionalContext: string; label: string }
    ): Promise<AgentRunResult> {
        const agent = new ToolAgent({
            name: input.label,
            client: this.options.clientFor(definition),
            tools: this.toolsFor(definition),
            maxIterations: definition.maxIterations,
            temperature: definition.temperature,
            compression: this.options.compression,
        });
        const includeProjectContext = definition.role === 'writing' || definition.role === 'review';
        return agent.run(buildAgentTaskPrompt({
            instructions: definition.instructions,
            lead: input.lead,
            context: includeProjectContext ? input.context : null,
            additionalContext: input.additionalContext,
        }));
    }

    private toolsFor(definition: AgentDefinition): AgentTool[] {
        const available = this.options.tools.list();
        if (definition.tools.length === 0) {
            return available;
        }
        const allowed = new Set(definition.tools);
        return available.filter((tool) => allowed.has(tool.definition.name));
    }
}
