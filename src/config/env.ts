import path from 'path';
import fs from 'fs';
import dotenv from 'dotenv';
import { isLocalAiEndpoint } from '../ai/openaiClient';

export function loadDotEnv(): void {
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenv.config({ path: envPath });
    }
}

export function parseIntEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseFloatEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (!raw) return fallback;
    const parsed = Number.parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function parseBoolEnv(name: string, defaultValue: boolean): boolean {
    const val = process.env[name];
    if (val === undefined || val === '') return defaultValue;
    return val.toLowerCase() === 'true' || val === '1';
}

export function parseStringEnv(name: string, fallback: string = ''): string {
    const raw = process.env[name];
    if (raw === undefined) return fallback;
    return raw.trim();
}

export function isAiRequestConfigured(baseUrl: string, apiKey: string): boolean {
    return isLocalAiEndpoint(baseUrl) || !!apiKey;
}

export function resolvePathValue(rawPath: string): string {
    return path.isAbsolute(rawPath) ? rawPath : path.resolve(process.cwd(), rawPath);
}

export function resolvePathFromEnv(name: string, fallbackRelativePath: string): string {
    const raw = process.env[name];
    if (!raw) {
        return path.resolve(process.cwd(), fallbackRelativePath);
    }
    return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}
