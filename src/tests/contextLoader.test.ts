import assert from 'node:assert/strict';
import path from 'path';
import { after, before, describe, test } from 'node:test';
import { GUIDE_SEPARATOR, loadContext } from '../context/contextLoader';
import { ConfigError } from '../core/errors';
import { makeTempDir, removeDir, silenceLogs, writeTempFile } from './helpers';

describe('loadContext', () => {
    let dir: string;

    before(() => {
        silenceLogs();
        dir = makeTempDir();
    });

    after(() => removeDir(dir));

    test('reads the ICP, the instruction and every markdown guide in name order', async () => {
        const contextDir = path.join(dir, 'full');
        writeTempFile(contextDir, 'GTM.md', 'ICP text');
        writeTempFile(contextDir, 'agent_instruction.md', 'Instruction text');
        writeTempFile(contextDir, 'guides/tone.md', 'Be brief.');
        writeTempFile(contextDir, 'guides/framework.md', 'Hook, insight, ask.');
        writeTempFile(contextDir, 'guides/scratch.txt', 'ignored');

        assert.deepEqual(await loadContext(contextDir), {
            gtm: 'ICP text',
            instruction: 'Instruction text',
            guides: `# framework\n\nHook, insight, ask.${GUIDE_SEPARATOR}# tone\n\nBe brief.`,
        });
    });

    test('guides are optional', async () => {
        const contextDir = path.join(dir, 'bare');
        writeTempFile(contextDir, 'GTM.md', 'ICP');
        writeTempFile(contextDir, 'agent_instruction.md', 'Do it');
        const context = await loadContext(contextDir);
        assert.equal(context.guides, '');
    });

    test('a missing directory or file is a configuration error', async () => {
        await assert.rejects(
            loadContext(path.join(dir, 'nowhere')),
            (error: unknown) => error instanceof ConfigError && error.code === 'CONTEXT_MISSING'
        );
        const contextDir = path.join(dir, 'partial');
        writeTempFile(contextDir, 'agent_instruction.md', 'Do it');
        await assert.rejects(loadContext(contextDir), new RegExp(`GTM\\.md not found in ${contextDir.replace(/[\\^$.*+?()[\]{}|]/g, '\\$&')}`));
    });
});
