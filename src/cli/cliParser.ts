/**
 * cliParser.ts — pure helpers that read, validate and normalize CLI arguments.
 * No dependency on the database, the LLM clients or config.
 */

import { GenerationMode } from '../ai/letterGenerator';

// ─── Reading arguments ───────────────────────────────────────────────────────

export function getOptionValue(args: string[], optionName: string, alias?: string): string | undefined {
    const index = args.findIndex((value) => value === optionName || (alias !== undefined && value === alias));
    if (index === -1 || index + 1 >= args.length) {
        return undefined;
    }
    return args[index + 1];
}

export function hasOption(args: string[], optionName: string, alias?: string): boolean {
    return args.includes(optionName) || (alias !== undefined && args.includes(alias));
}

// ─── Parsing values ──────────────────────────────────────────────────────────

export function parseIntStrict(raw: string, optionName: string): number {
    if (!/^-?\d+$/.test(raw.trim())) {
        throw new Error(`Invalid value for ${optionName}: ${raw}`);
    }
    return Number.parseInt(raw, 10);
}

export function parsePositiveInt(raw: string, optionName: string): number {
    const parsed = parseIntStrict(raw, optionName);
    if (parsed < 1) {
        throw new Error(`${optionName} must be >= 1, got ${raw}`);
    }
    return parsed;
}

export function parseNonNegativeInt(raw: string, optionName: string): number {
    const parsed = parseIntStrict(raw, optionName);
    if (parsed < 0) {
        throw new Error(`${optionName} must be >= 0, got ${raw}`);
    }
    return parsed;
}

export function parseGenerationMode(raw: string, optionName: string): GenerationMode {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'single' || normalized === 'multi') {
        return normalized;
    }
    throw new Error(`Invalid value for ${optionName}: ${raw} (use single / multi)`);
}

// ─── Command options ─────────────────────────────────────────────────────────

export interface RunCommandOptions {
    input: string | null;
    output: string | null;
    context: string | null;
    workers: number | null;
    db: string | null;
    resume: boolean;
    start: number;
    config: string | null;
    agents: string | null;
    mode: GenerationMode | null;
}

export function parseRunOptions(args: string[]): RunCommandOptions {
    const workersRaw = getOptionValue(args, '--workers', '-w');
    const startRaw = getOptionValue(args, '--start');
    const modeRaw = getOptionValue(args, '--mode');
    const options: RunCommandOptions = {
        input: getOptionValue(args, '--input', '-i') ?? null,
        output: getOptionValue(args, '--output', '-o') ?? null,
        context: getOptionValue(args, '--context', '-c') ?? null,
        workers: workersRaw === undefined ? null : parsePositiveInt(workersRaw, '--workers'),
        db: getOptionValue(args, '--db') ?? null,
        resume: hasOption(args, '--resume', '-r'),
        start: startRaw === undefined ? 0 : parseNonNegativeInt(startRaw, '--start'),
        config: getOptionValue(args, '--config') ?? null,
        agents: getOptionValue(args, '--agents') ?? null,
        mode: modeRaw === undefined ? null : parseGenerationMode(modeRaw, '--mode'),
    };
    if (!options.resume && !options.input) {
        throw new Error('--input is required unless --resume is given');
    }
    return options;
}
