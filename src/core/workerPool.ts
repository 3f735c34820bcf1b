import { LeadClassifier } from '../ai/classifier';
import { LetterGenerator } from '../ai/letterGenerator';
import { ToolSource } from '../ai/toolAgent';
import { OutreachContext } from '../context/contextLoader';
import { describeLead } from '../leadProfile';
import { runWithCorrelationId, taskCorrelationId } from '../telemetry/correlation';
import { logError, logInfo } from '../telemetry/logger';
import { ClaimedTask, ClassificationResult, GenerationResult, TerminalTaskStatus } from '../types/domain';
import { errorMessage } from './errors';
import { createLimiterHandle, LimiterHandle } from './limiter';
import { CompressionStats, TokenStats, UsageTracker } from './usageStats';

export interface PoolStats {
    processed: number;
    stage1Relevant: number;
    stage1NotRelevant: number;
    stage2Letters: number;
    stage2Rejected: number;
    errors: number;
}

export interface LeadOutcome {
    status: TerminalTaskStatus;
    stage1: ClassificationResult | null;
    stage2: GenerationResult | null;
    error: string | null;
}

export interface WorkerPoolOptions {
    numWorkers: number;
    context: OutreachContext;
    classifier: LeadClassifier;
    generator: LetterGenerator;
    tools: ToolSource;
    usage: UsageTracker;
}

const LOG_REASON_PREVIEW = 80;

/**
 * Runs the classify → generate pipeline for claimed leads. At most
 * `numWorkers` leads are in flight, whatever number of loops call in.
 */
export class WorkerPool {
    private readonly options: WorkerPoolOptions;
    private readonly slots: LimiterHandle;
    private readonly stats: PoolStats = {
        processed: 0,
        stage1Relevant: 0,
        stage1NotRelevant: 0,
        stage2Letters: 0,
        stage2Rejected: 0,
        errors: 0,
    };
    private toolsReady = false;

    constructor(options: WorkerPoolOptions) {
        this.options = options;
        this.slots = createLimiterHandle(options.numWorkers);
    }

    get size(): number {
        return this.options.numWorkers;
    }

    /** Opens the shared tool connections once for every worker. */
    async initialize(): Promise<void> {
        if (this.toolsReady) {
            return;
        }
        await this.options.tools.initialize();
        this.toolsReady = true;
        await logInfo('pool.initialized', {
            workers: this.options.numWorkers,
            mode: this.options.generator.mode,
            tools: this.options.tools.list().length,
        });
    }

    async close(): Promise<void> {
        if (!this.toolsReady) {
            return;
        }
        await this.options.tools.close();
        this.toolsReady = false;
    }

    inFlight(): number {
        return this.slots.activeCount();
    }

    async processLead(task: ClaimedTask, workerId: string): Promise<LeadOutcome> {
        return this.slots.run(() => runWithCorrelationId(
            taskCorrelationId(workerId, task.id),
            () => this.runPipeline(task, workerId)
        ));
    }

    getStats(): PoolStats {
        return { ...this.stats };
    }

    getTokenStats(): TokenStats {
        return this.options.usage.getTokenStats();
    }

    getCompressionStats(): CompressionStats {
        return this.options.usage.getCompressionStats();
    }

    private async runPipeline(task: ClaimedTask, workerId: string): Promise<LeadOutcome> {
        const { classifier, generator, context, usage } = this.options;
        let stage1: ClassificationResult | null = null;
        try {
            await logInfo('pool.lead_started', { workerId, taskId: task.id, lead: describeLead(task.lead) });

            const classification = await classifier.classify(task.lead, context.gtm);
            usage.recordStage1(classification.usage);
            stage1 = classification.result;

            if (!stage1.relevant) {
                this.stats.stage1NotRelevant += 1;
                this.stats.processed += 1;
                await logInfo('pool.stage1_not_relevant', {
                    workerId,
                    taskId: task.id,
                    reason: stage1.reason.slice(0, LOG_REASON_PREVIEW),
                });
                return { status: 'completed', stage1, stage2: null, error: null };
            }

            this.stats.stage1Relevant += 1;
            await logInfo('pool.stage1_relevant', {
                workerId,
                taskId: task.id,
                reason: stage1.reason.slice(0, LOG_REASON_PREVIEW),
            });

            const generation = await generator.generate(task.lead, context);
            usage.recordStage2(generation.usage);
            usage.recordCompression(generation.compression);
            const stage2 = generation.result;

            if (stage2.variant === 'accepted') {
                this.stats.stage2Letters += 1;
                await logInfo('pool.letter_generated', { workerId, taskId: task.id, subject: stage2.letter.subject });
            } else {
                this.stats.stage2Rejected += 1;
                await logInfo('pool.stage2_rejected', {
                    workerId,
                    taskId: task.id,
                    variant: stage2.variant,
                    reason: (stage2.variant === 'rejected' ? stage2.reason : stage2.message).slice(0, LOG_REASON_PREVIEW),
                });
            }
            this.stats.processed += 1;
            return { status: 'completed', stage1, stage2, error: null };
        } catch (error) {
            this.stats.errors += 1;
            this.stats.processed += 1;
            const message = errorMessage(error);
            await logError('pool.lead_failed', { workerId, taskId: task.id, error: message });
            return { status: 'failed', stage1, stage2: null, error: message };
        }
    }
}
