import { loadContext, OutreachContext } from '../context/contextLoader';
import { logError, logInfo, logWarn } from '../telemetry/logger';
import { LoadResult, QueueStats } from '../types/domain';
import { errorMessage } from './errors';
import { defaultSleep, Sleeper } from './rateLimiter';
import { buildSummary, writeResults } from './resultWriter';
import { PersistentTaskQueue } from './taskQueue';
import { CompressionStats, TokenStats } from './usageStats';
import { PoolStats, WorkerPool } from './workerPool';

export type OrchestratorPhase = 'initializing' | 'loading' | 'processing' | 'exporting' | 'finished';

export interface OrchestratorOptions {
    queue: PersistentTaskQueue;
    contextDir: string;
    createPool: (context: OutreachContext) => WorkerPool;
    inputPath: string | null;
    outputPath: string;
    resume: boolean;
    startPosition: number;
    numWorkers: number;
    interTaskDelayMs?: number;
    contextLoader?: (contextDir: string) => Promise<OutreachContext>;
    forceExit?: () => void;
    sleep?: Sleeper;
}

export interface RunSummary {
    load: LoadResult | null;
    resetProcessing: number;
    queueStats: QueueStats;
    pool: PoolStats;
    tokens: TokenStats;
    compression: CompressionStats;
    exported: number;
    outputPath: string;
    interrupted: boolean;
    summaryLines: string[];
}

export const FORCED_EXIT_CODE = 130;

export class OutreachOrchestrator {
    private readonly options: OrchestratorOptions;
    private readonly sleep: Sleeper;
    private currentPhase: OrchestratorPhase = 'initializing';
    private shutdownRequested = false;
    private loopFailed = false;

    constructor(options: OrchestratorOptions) {
        if (!Number.isInteger(options.numWorkers) || options.numWorkers < 1) {
            throw new Error('numWorkers must be an integer >= 1');
        }
        if (!options.resume && !options.inputPath) {
            throw new Error('inputPath is required unless resuming');
        }
        this.options = options;
        this.sleep = options.sleep ?? defaultSleep;
    }

    get phase(): OrchestratorPhase {
        return this.currentPhase;
    }

    get isShutdownRequested(): boolean {
        return this.shutdownRequested;
    }

    /**
     * First call stops new claims; in-flight leads finish. A second call
     * terminates immediately.
     */
    requestShutdown(signal: string = 'manual'): void {
        if (this.shutdownRequested) {
            console.warn(`[SIGNAL] ${signal} received again, forcing exit`);
            const forceExit = this.options.forceExit ?? ((): void => process.exit(FORCED_EXIT_CODE));
            forceExit();
            return;
        }
        this.shutdownRequested = true;
        console.warn(`[SIGNAL] ${signal} received, finishing in-flight leads (repeat to force exit)`);
    }

    /** Wires SIGINT/SIGTERM to requestShutdown and returns the uninstaller. */
    installSignalHandlers(): () => void {
        const onSigint = (): void => this.requestShutdown('SIGINT');
        const onSigterm = (): void => this.requestShutdown('SIGTERM');
        process.on('SIGINT', onSigint);
        process.on('SIGTERM', onSigterm);
        return () => {
            process.off('SIGINT', onSigint);
            process.off('SIGTERM', onSigterm);
        };
    }

    async run(): Promise<RunSummary> {
        const { queue, resume } = this.options;

        this.currentPhase = 'initializing';
        const contextLoader = this.options.contextLoader ?? loadContext;
        const context = await contextLoader(this.options.contextDir);
        await queue.initialize(!resume);
        const pool = this.options.createPool(context);

        try {
            await pool.initialize();

            let load: LoadResult | null = null;
            if (!resume && this.options.inputPath) {
                this.currentPhase = 'loading';
                load = await queue.loadFromCsv(this.options.inputPath, this.options.startPosition);
            }

            const initialStats = await queue.getStats();
            await logInfo('orchestrator.queue_stats', { ...initialStats });

            let resetProcessing = 0;
            if (resume && initialStats.processing > 0) {
                resetProcessing = await queue.resetProcessingTasks();
            }

            this.currentPhase = 'processing';
            await logInfo('orchestrator.processing_started', { workers: this.options.numWorkers, resume });
            const loops = Array.from({ length: this.options.numWorkers }, (_, index) =>
                this.workerLoop(pool, `worker-${index + 1}`).catch((error: unknown) => {
                    // the other loops finish their current lead and stop claiming
                    this.loopFailed = true;
                    throw error;
                })
            );
            const settled = await Promise.allSettled(loops);
            const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
            if (failure) {
                await logError('orchestrator.processing_failed', { error: errorMessage(failure.reason) });
            }

            this.currentPhase = 'exporting';
            const tasks = await queue.getAllTasks();
            const exported = await writeResults(this.options.outputPath, tasks);
            const tokens = pool.getTokenStats();
            const compression = pool.getCompressionStats();
            const summaryLines = buildSummary(tasks, tokens, compression);
            summaryLines.push(`Results saved to: ${this.options.outputPath}`);
            for (const line of summaryLines) {
                console.log(line);
            }
            await logInfo('orchestrator.exported', {
                exported,
                outputPath: this.options.outputPath,
                interrupted: this.shutdownRequested,
            });

            if (failure) {
                throw failure.reason;
            }

            this.currentPhase = 'finished';
            return {
                load,
                resetProcessing,
                queueStats: await queue.getStats(),
                pool: pool.getStats(),
                tokens,
                compression,
                exported,
                outputPath: this.options.outputPath,
                interrupted: this.shutdownRequested,
                summaryLines,
            };
        } finally {
            await pool.close();
        }
    }

    private async workerLoop(pool: WorkerPool, workerId: string): Promise<void> {
        const { queue } = this.options;
        const delayMs = this.options.interTaskDelayMs ?? 0;
        while (!this.shutdownRequested && !this.loopFailed) {
            const task = await queue.getNextTask(workerId);
            if (!task) {
                break;
            }
            const outcome = await pool.processLead(task, workerId);
            await queue.updateTask(task.id, outcome.status, {
                stage1: outcome.stage1,
                stage2: outcome.stage2,
                error: outcome.error,
            });
            await this.logProgress(pool);
            if (delayMs > 0 && !this.shutdownRequested) {
                await this.sleep(delayMs);
            }
        }
        if (this.shutdownRequested) {
            await logWarn('orchestrator.worker_stopped', { workerId, reason: 'shutdown' });
        }
    }

    private async logProgress(pool: WorkerPool): Promise<void> {
        const stats = pool.getStats();
        const queueStats = await this.options.queue.getStats();
        await logInfo('orchestrator.progress', {
            progress: `processed ${stats.processed} | pending ${queueStats.pending}`
                + ` | S1 ${stats.stage1Relevant}/${stats.stage1NotRelevant}`
                + ` | S2 ${stats.stage2Letters}/${stats.stage2Rejected}`
                + ` | errors ${stats.errors}`,
        });
    }
}
