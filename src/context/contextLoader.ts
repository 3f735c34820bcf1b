import fs from 'fs';
import path from 'path';
import { ConfigError } from '../core/errors';
import { logWarn } from '../telemetry/logger';

/**
 * Free-text context injected verbatim into prompts.
 */
export interface OutreachContext {
    /** ICP and value proposition (GTM.md). */
    gtm: string;
    /** Agent task instruction (agent_instruction.md). */
    instruction: string;
    /** Every guides/*.md file, each under a `# <name>` heading. */
    guides: string;
}

export const GUIDE_SEPARATOR = '\n\n---\n\n';

function readRequired(contextDir: string, fileName: string): string {
    const filePath = path.join(contextDir, fileName);
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`${fileName} not found in ${contextDir}`, 'CONTEXT_MISSING');
    }
    return fs.readFileSync(filePath, 'utf8');
}

async function loadGuides(contextDir: string): Promise<string> {
    const guidesDir = path.join(contextDir, 'guides');
    if (!fs.existsSync(guidesDir)) {
        await logWarn('context.guides_missing', { guidesDir });
        return '';
    }
    const files = fs.readdirSync(guidesDir)
        .filter((name) => name.toLowerCase().endsWith('.md'))
        .sort();
    if (files.length === 0) {
        await logWarn('context.guides_empty', { guidesDir });
        return '';
    }
    return files
        .map((name) => `# ${path.basename(name, path.extname(name))}\n\n${fs.readFileSync(path.join(guidesDir, name), 'utf8')}`)
        .join(GUIDE_SEPARATOR);
}

export async function loadContext(contextDir: string): Promise<OutreachContext> {
    if (!fs.existsSync(contextDir)) {
        throw new ConfigError(
            `Context directory not found: ${contextDir}. Add GTM.md, agent_instruction.md and guides/.`,
            'CONTEXT_MISSING'
        );
    }
    return {
        gtm: readRequired(contextDir, 'GTM.md'),
        instruction: readRequired(contextDir, 'agent_instruction.md'),
        guides: await loadGuides(contextDir),
    };
}
