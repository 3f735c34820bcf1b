import sqlite3 from 'sqlite3';
import { open, Database as SQLiteDatabase } from 'sqlite';
import { ensureFilePrivate, ensureParentDirectory } from './security/filesystem';

export interface DBRunResult {
    lastID?: number;
    changes?: number;
}

// ------------------------------------------------------------------
// DATABASE ABSTRACTION
// ------------------------------------------------------------------
export interface DatabaseManager {
    query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
    get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined>;
    exec(sql: string, params?: unknown[]): Promise<void>;
    run(sql: string, params?: unknown[]): Promise<DBRunResult>;
    close(): Promise<void>;
}

// ------------------------------------------------------------------
// SQLITE WRAPPER
// ------------------------------------------------------------------
class SQLiteManager implements DatabaseManager {
    private db: SQLiteDatabase;

    constructor(db: SQLiteDatabase) {
        this.db = db;
    }

    async query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]> {
        return this.db.all<T[]>(sql, params ?? []);
    }

    async get<T = unknown>(sql: string, params?: unknown[]): Promise<T | undefined> {
        return this.db.get<T>(sql, params ?? []);
    }

    async exec(sql: string, params?: unknown[]): Promise<void> {
        // multi-statement scripts go through exec, parameterized statements through run
        if (params && params.length > 0) {
            await this.db.run(sql, params);
        } else {
            await this.db.exec(sql);
        }
    }

    async run(sql: string, params?: unknown[]): Promise<DBRunResult> {
        const result = await this.db.run(sql, params ?? []);
        return {
            lastID: result.lastID,
            changes: result.changes,
        };
    }

    async close(): Promise<void> {
        await this.db.close();
    }
}

export const IN_MEMORY_DB_PATH = ':memory:';

export async function openDatabase(dbPath: string): Promise<DatabaseManager> {
    const inMemory = dbPath === IN_MEMORY_DB_PATH;
    if (!inMemory) {
        ensureParentDirectory(dbPath, { private: true });
    }

    const sqliteDb = await open({
        filename: dbPath,
        driver: sqlite3.Database,
    });

    if (!inMemory) {
        await sqliteDb.exec(`PRAGMA journal_mode = WAL;`);
        await sqliteDb.exec(`PRAGMA synchronous = NORMAL;`);
    }
    await sqliteDb.exec(`PRAGMA busy_timeout = 5000;`);
    if (!inMemory) {
        ensureFilePrivate(dbPath);
    }

    return new SQLiteManager(sqliteDb);
}

export function isUniqueConstraintError(error: unknown): boolean {
    const message = error instanceof Error ? error.message : String(error);
    return /SQLITE_CONSTRAINT/i.test(message) && /UNIQUE/i.test(message);
}
