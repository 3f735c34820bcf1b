import fs from 'fs';
import path from 'path';
import { sanitizeForLogs } from '../security/redaction';
import { ensureDirectory } from '../security/filesystem';
import { getCorrelationId } from './correlation';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerOptions {
    level?: 'debug' | 'info' | 'warn' | 'error';
    logDir?: string | null;
    silent?: boolean;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARN: 30,
    ERROR: 40,
};

interface LoggerState {
    minWeight: number;
    logFilePath: string | null;
    silent: boolean;
}

const state: LoggerState = {
    minWeight: LEVEL_WEIGHT.INFO,
    logFilePath: null,
    silent: false,
};

function runLogFileName(): string {
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    return `run-${stamp}.jsonl`;
}

export function configureLogger(options: LoggerOptions): void {
    if (options.level) {
        const key: LogLevel = options.level === 'debug'
            ? 'DEBUG'
            : options.level === 'warn'
                ? 'WARN'
                : options.level === 'error'
                    ? 'ERROR'
                    : 'INFO';
        state.minWeight = LEVEL_WEIGHT[key];
    }
    if (options.logDir !== undefined) {
        if (options.logDir) {
            ensureDirectory(options.logDir, { private: true });
            state.logFilePath = path.join(options.logDir, runLogFileName());
        } else {
            state.logFilePath = null;
        }
    }
    if (options.silent !== undefined) {
        state.silent = options.silent;
    }
}

export function getLogFilePath(): string | null {
    return state.logFilePath;
}

async function appendRunLog(level: LogLevel, event: string, payload: Record<string, unknown>): Promise<void> {
    if (!state.logFilePath) {
        return;
    }
    const line = JSON.stringify({
        ts: new Date().toISOString(),
        level,
        event,
        correlationId: getCorrelationId(),
        payload,
    });
    await fs.promises.appendFile(state.logFilePath, `${line}\n`, 'utf8');
}

async function emit(level: LogLevel, event: string, payload: Record<string, unknown>): Promise<void> {
    if (LEVEL_WEIGHT[level] < state.minWeight) {
        return;
    }
    const safePayload = sanitizeForLogs(payload);
    if (!state.silent) {
        const correlationId = getCorrelationId();
        const printable = correlationId ? { ...safePayload, correlationId } : safePayload;
        if (level === 'ERROR') {
            console.error(`[${level}] ${event}`, printable);
        } else if (level === 'WARN') {
            console.warn(`[${level}] ${event}`, printable);
        } else {
            console.log(`[${level}] ${event}`, printable);
        }
    }
    await appendRunLog(level, event, safePayload);
}

export async function logDebug(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await emit('DEBUG', event, payload);
}

export async function logInfo(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await emit('INFO', event, payload);
}

export async function logWarn(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await emit('WARN', event, payload);
}

export async function logError(event: string, payload: Record<string, unknown> = {}): Promise<void> {
    await emit('ERROR', event, payload);
}
