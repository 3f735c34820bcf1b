import { buildAppConfig } from '../../config';
import { resolvePathValue } from '../../config/env';
import { PersistentTaskQueue } from '../../core/taskQueue';
import { getOptionValue } from '../cliParser';

export async function runStatsCommand(args: string[]): Promise<void> {
    const config = buildAppConfig();
    const dbRaw = getOptionValue(args, '--db');
    const dbPath = dbRaw ? resolvePathValue(dbRaw) : config.dbPath;

    const queue = await PersistentTaskQueue.open(dbPath);
    try {
        await queue.initialize(false);
        const stats = await queue.getStats();
        console.log(JSON.stringify({ dbPath, ...stats }, null, 2));
    } finally {
        await queue.close();
    }
}
