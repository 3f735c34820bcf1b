import { DatabaseManager } from '../../db';

export function parsePayload(raw: string | null): unknown {
    if (raw === null || raw === '') {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return parsed;
    } catch {
        return null;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function withTransaction<T>(database: DatabaseManager, callback: () => Promise<T>): Promise<T> {
    await database.exec('BEGIN IMMEDIATE');
    try {
        const result = await callback();
        await database.exec('COMMIT');
        return result;
    } catch (error) {
        await database.exec('ROLLBACK');
        throw error;
    }
}

export function nowIso(): string {
    return new Date().toISOString();
}
