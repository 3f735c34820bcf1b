#!/usr/bin/env node
import { runPipelineCommand } from './cli/commands/runCommand';
import { runStatsCommand } from './cli/commands/statsCommand';
import { errorMessage } from './core/errors';

function printHelp(): void {
    console.log(`Usage:
  lead-outreach run --input <csv> [--output <csv>] [--context <dir>] [--workers <n>]
                    [--db <path>] [--resume] [--start <n>] [--config <json>]
                    [--agents <dir>] [--mode single|multi]
  lead-outreach stats [--db <path>]

Examples:
  lead-outreach run --input data/input/leads.csv --output data/output/results.csv
  lead-outreach run --input leads.csv --workers 3 --mode multi
  lead-outreach run --resume`);
}

function errorCode(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];
    const commandArgs = args.slice(1);

    switch (command) {
        case 'run':
            await runPipelineCommand(commandArgs);
            break;
        case 'stats':
            await runStatsCommand(commandArgs);
            break;
        default:
            printHelp();
            break;
    }
}

main().catch((error: unknown) => {
    console.error(JSON.stringify({
        ok: false,
        error: {
            name: error instanceof Error ? error.name : 'Error',
            code: errorCode(error),
            message: errorMessage(error),
        },
    }, null, 2));
    process.exitCode = 1;
});
