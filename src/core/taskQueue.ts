import { DatabaseManager, isUniqueConstraintError, openDatabase } from '../db';
import { forEachCsvRow } from '../csvImporter';
import { buildLeadProfile, pickEmail, pickLinkedInUrl } from '../leadProfile';
import { logInfo } from '../telemetry/logger';
import {
    ClaimedTask,
    ClassificationResult,
    ExportedTask,
    GenerationResult,
    LeadRow,
    LoadResult,
    QueueStats,
    TaskRecord,
    TaskStatus,
    TerminalTaskStatus,
} from '../types/domain';
import { TaskQueueError } from './errors';
import { createMutex, Limiter } from './limiter';
import { decodeClassification, decodeGeneration, encodeClassification, encodeGeneration } from './resultCodec';
import { isRecord, nowIso, parsePayload, withTransaction } from './repositories/shared';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT UNIQUE NOT NULL,
    linkedin_url TEXT,
    lead_data TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    stage1_result TEXT,
    stage2_result TEXT,
    error TEXT,
    worker_id TEXT,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    started_at TEXT,
    completed_at TEXT
);
CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_tasks_email ON tasks(email);
`;

export interface TaskUpdate {
    stage1?: ClassificationResult | null;
    stage2?: GenerationResult | null;
    error?: string | null;
}

function decodeLeadRow(raw: string): LeadRow {
    const parsed = parsePayload(raw);
    const row: LeadRow = {};
    if (!isRecord(parsed)) {
        return row;
    }
    for (const [key, value] of Object.entries(parsed)) {
        row[key] = typeof value === 'string' ? value : String(value ?? '');
    }
    return row;
}

function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
    return status === 'completed' || status === 'failed';
}

function toExportedTask(record: TaskRecord): ExportedTask {
    const leadData = decodeLeadRow(record.lead_data);
    return {
        id: record.id,
        email: record.email,
        linkedinUrl: record.linkedin_url,
        leadData,
        lead: buildLeadProfile(leadData),
        status: record.status,
        stage1: decodeClassification(record.stage1_result),
        stage2: decodeGeneration(record.stage2_result),
        error: record.error,
        completedAt: record.completed_at,
    };
}

/**
 * Durable FIFO of per-lead tasks backed by SQLite.
 *
 * Every statement goes through one connection, so each multi-statement
 * operation runs inside a transaction serialized by the queue's own mutex.
 * That makes a claim atomic against concurrent workers in this process.
 */
export class PersistentTaskQueue {
    private readonly database: DatabaseManager;
    private readonly mutex: Limiter;

    constructor(database: DatabaseManager) {
        this.database = database;
        this.mutex = createMutex();
    }

    static async open(dbPath: string): Promise<PersistentTaskQueue> {
        const database = await openDatabase(dbPath);
        return new PersistentTaskQueue(database);
    }

    async initialize(clean: boolean = false): Promise<void> {
        await this.mutex(async () => {
            if (clean) {
                await this.database.exec('DROP TABLE IF EXISTS tasks;');
            }
            await this.database.exec(SCHEMA_SQL);
        });
    }

    async loadFromCsv(csvPath: string, startPosition: number = 0): Promise<LoadResult> {
        const result: LoadResult = {
            inserted: 0,
            skippedNoEmail: 0,
            skippedExisting: 0,
            skippedBeforeStart: 0,
        };

        await this.mutex(() => withTransaction(this.database, async () => {
            await forEachCsvRow(csvPath, async (row, index) => {
                if (index < startPosition) {
                    result.skippedBeforeStart += 1;
                    return;
                }
                const email = pickEmail(row);
                if (!email) {
                    result.skippedNoEmail += 1;
                    return;
                }
                const linkedinUrl = pickLinkedInUrl(row);
                try {
                    await this.database.run(
                        `INSERT INTO tasks (email, linkedin_url, lead_data, status) VALUES (?, ?, ?, 'pending')`,
                        [email, linkedinUrl || null, JSON.stringify(row)]
                    );
                    result.inserted += 1;
                } catch (error) {
                    if (!isUniqueConstraintError(error)) {
                        throw error;
                    }
                    result.skippedExisting += 1;
                }
            });
        }));

        await logInfo('queue.loaded', { csvPath, startPosition, ...result });
        return result;
    }

    async getNextTask(workerId: string): Promise<ClaimedTask | null> {
        return this.mutex(() => withTransaction(this.database, async () => {
            const record = await this.database.get<TaskRecord>(
                `SELECT * FROM tasks WHERE status = 'pending' ORDER BY id ASC LIMIT 1`
            );
            if (!record) {
                return null;
            }
            const updated = await this.database.run(
                `UPDATE tasks SET status = 'processing', worker_id = ?, started_at = ? WHERE id = ? AND status = 'pending'`,
                [workerId, nowIso(), record.id]
            );
            if ((updated.changes ?? 0) !== 1) {
                throw new TaskQueueError(`Task ${record.id} could not be claimed`, 'CLAIM_CONFLICT');
            }
            const leadData = decodeLeadRow(record.lead_data);
            return {
                id: record.id,
                email: record.email,
                linkedinUrl: record.linkedin_url,
                leadData,
                lead: buildLeadProfile(leadData),
                workerId,
            };
        }));
    }

    async updateTask(id: number, status: TaskStatus, update: TaskUpdate = {}): Promise<void> {
        if (!isTerminalStatus(status)) {
            throw new TaskQueueError(`updateTask accepts only completed or failed, got "${status}"`, 'INVALID_STATUS');
        }
        const stage1 = update.stage1 ? encodeClassification(update.stage1) : null;
        const stage2 = update.stage2 ? encodeGeneration(update.stage2) : null;
        const current = await this.mutex(async () => {
            const result = await this.database.run(
                `UPDATE tasks
                    SET status = ?, stage1_result = ?, stage2_result = ?, error = ?, completed_at = ?
                  WHERE id = ? AND status = 'processing'`,
                [status, stage1, stage2, update.error ?? null, nowIso(), id]
            );
            if ((result.changes ?? 0) === 1) {
                return null;
            }
            return this.database.get<{ status: string }>(`SELECT status FROM tasks WHERE id = ?`, [id]);
        });
        if (current === undefined) {
            throw new TaskQueueError(`Task ${id} not found`, 'NOT_FOUND');
        }
        if (current !== null) {
            // only a claimed task may be written back
            throw new TaskQueueError(
                `Task ${id} is ${current.status}, expected processing`,
                'INVALID_TRANSITION'
            );
        }
    }

    async getStats(): Promise<QueueStats> {
        const rows = await this.mutex(() => this.database.query<{ status: string; total: number }>(
            `SELECT status, COUNT(*) AS total FROM tasks GROUP BY status`
        ));
        const stats: QueueStats = { total: 0, pending: 0, processing: 0, completed: 0, failed: 0 };
        for (const row of rows) {
            const count = Number(row.total) || 0;
            stats.total += count;
            if (row.status === 'pending') stats.pending = count;
            else if (row.status === 'processing') stats.processing = count;
            else if (row.status === 'completed') stats.completed = count;
            else if (row.status === 'failed') stats.failed = count;
        }
        return stats;
    }

    /** Terminal tasks only: completed first, then failed, each by insertion order. */
    async getAllTasks(): Promise<ExportedTask[]> {
        const records = await this.mutex(() => this.database.query<TaskRecord>(
            `SELECT * FROM tasks
              WHERE status IN ('completed', 'failed')
              ORDER BY CASE status WHEN 'completed' THEN 0 ELSE 1 END, id ASC`
        ));
        return records.map(toExportedTask);
    }

    async getTask(id: number): Promise<TaskRecord | null> {
        const record = await this.mutex(() => this.database.get<TaskRecord>(`SELECT * FROM tasks WHERE id = ?`, [id]));
        return record ?? null;
    }

    async resetProcessingTasks(): Promise<number> {
        const result = await this.mutex(() => this.database.run(
            `UPDATE tasks SET status = 'pending', worker_id = NULL, started_at = NULL WHERE status = 'processing'`
        ));
        const count = result.changes ?? 0;
        if (count > 0) {
            await logInfo('queue.processing_reset', { count });
        }
        return count;
    }

    async close(): Promise<void> {
        await this.mutex(() => this.database.close());
    }
}
