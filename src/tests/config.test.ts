import assert from 'node:assert/strict';
import path from 'path';
import { after, before, beforeEach, describe, test } from 'node:test';
import { parseRunOptions } from '../cli/cliParser';
import { applyRunOptions } from '../cli/commands/runCommand';
import { buildAppConfig, loadConfigFile, providerSettingsFor, validateConfig } from '../config';
import { ConfigError } from '../core/errors';
import { makeTempDir, removeDir, writeTempFile } from './helpers';

const MANAGED_ENV = [
    'OPENAI_API_KEY', 'OPENAI_BASE_URL', 'DEEPSEEK_API_KEY', 'DEEPSEEK_BASE_URL',
    'CLASSIFICATION_PROVIDER', 'CLASSIFICATION_MODEL', 'CLASSIFICATION_TEMPERATURE',
    'LETTER_PROVIDER', 'LETTER_MODEL', 'LETTER_TEMPERATURE', 'LLM_TIMEOUT_MS',
    'GENERATION_MODE', 'NUM_WORKERS', 'MAX_AGENT_ITERATIONS', 'INTER_TASK_DELAY_MS',
    'RESEARCH_AGENTS', 'WRITER_AGENTS', 'AGENT_PARALLEL_EXECUTION',
    'AUTO_COMPACT_ENABLED', 'AUTO_COMPACT_TRIGGER_MESSAGES', 'AUTO_COMPACT_PRESERVE_LAST',
    'AUTO_COMPACT_PROVIDER', 'AUTO_COMPACT_MODEL',
    'RATE_LIMIT_ENABLED', 'RATE_LIMIT_MAX_RETRIES', 'RATE_LIMIT_BASE_DELAY_MS',
    'OPENAI_REQUESTS_PER_SECOND', 'OPENAI_BURST', 'DEEPSEEK_REQUESTS_PER_SECOND', 'DEEPSEEK_BURST',
    'DB_PATH', 'OUTPUT_PATH', 'CONTEXT_DIR', 'AGENTS_DIR', 'LOG_DIR', 'LOG_LEVEL',
];

const saved = new Map<string, string | undefined>();

function clearManagedEnv(): void {
    for (const name of MANAGED_ENV) {
        delete process.env[name];
    }
}

function isConfigError(code: string): (error: unknown) => boolean {
    return (error) => error instanceof ConfigError && error.code === code;
}

describe('buildAppConfig', () => {
    before(() => {
        for (const name of MANAGED_ENV) {
            saved.set(name, process.env[name]);
        }
    });

    beforeEach(() => clearManagedEnv());

    after(() => {
        clearManagedEnv();
        for (const [name, value] of saved) {
            if (value !== undefined) {
                process.env[name] = value;
            }
        }
    });

    test('falls back to defaults', () => {
        const config = buildAppConfig();
        assert.deepEqual(config.classification, { provider: 'deepseek', model: 'deepseek-chat', temperature: 0, timeoutMs: 120_000 });
        assert.deepEqual(config.letterGeneration, { provider: 'deepseek', model: 'deepseek-chat', temperature: 0.7, timeoutMs: 120_000 });
        assert.equal(config.generationMode, 'single');
        assert.equal(config.numWorkers, 5);
        assert.equal(config.maxAgentIterations, 30);
        assert.equal(config.parallelExecution, true);
        assert.deepEqual(config.autoCompact, {
            enabled: true,
            triggerAtMessages: 15,
            preserveLastMessages: 5,
            summarizationProvider: 'openai',
            summarizationModel: 'gpt-4o-mini',
        });
        assert.deepEqual(config.rateLimiting, {
            enabled: true,
            maxRetries: 3,
            baseDelayMs: 2000,
            providers: {
                openai: { requestsPerSecond: 5, burst: 10 },
                deepseek: { requestsPerSecond: 3, burst: 5 },
            },
        });
        assert.equal(config.providers.deepseek.baseUrl, 'https://api.deepseek.com');
        assert.equal(config.dbPath, path.resolve(process.cwd(), 'data/progress.db'));
        assert.equal(config.logLevel, 'info');
    });

    test('reads and normalizes environment values', () => {
        process.env.NUM_WORKERS = '8';
        process.env.CLASSIFICATION_PROVIDER = 'OpenAI';
        process.env.GENERATION_MODE = 'MULTI';
        process.env.AGENT_PARALLEL_EXECUTION = '0';
        process.env.LETTER_TEMPERATURE = '0.4';
        process.env.LOG_LEVEL = 'DEBUG';
        process.env.DB_PATH = '/var/tmp/queue.db';
        process.env.DEEPSEEK_BURST = 'many';

        const config = buildAppConfig();
        assert.equal(config.numWorkers, 8);
        assert.equal(config.classification.provider, 'openai');
        assert.equal(config.generationMode, 'multi');
        assert.equal(config.parallelExecution, false);
        assert.equal(config.letterGeneration.temperature, 0.4);
        assert.equal(config.logLevel, 'debug');
        assert.equal(config.dbPath, '/var/tmp/queue.db');
        assert.equal(config.rateLimiting.providers.deepseek.burst, 5);
    });

    test('config file values win over the environment', () => {
        process.env.NUM_WORKERS = '8';
        process.env.LETTER_MODEL = 'deepseek-reasoner';
        const config = buildAppConfig({
            worker_pool: { num_workers: 3 },
            models: { classification: { provider: 'openai', model: 'gpt-4o-mini' } },
            rate_limiting: { providers: { DeepSeek: { requests_per_second: 1, burst: 2 } } },
        });
        assert.equal(config.numWorkers, 3);
        assert.equal(config.classification.provider, 'openai');
        assert.equal(config.classification.model, 'gpt-4o-mini');
        assert.equal(config.letterGeneration.model, 'deepseek-reasoner');
        assert.deepEqual(config.rateLimiting.providers.deepseek, { requestsPerSecond: 1, burst: 2 });
        assert.deepEqual(config.rateLimiting.providers.openai, { requestsPerSecond: 5, burst: 10 });
    });

    test('validation reports providers without keys', () => {
        assert.deepEqual(validateConfig(buildAppConfig()), [
            '[CONFIG] classification model deepseek/deepseek-chat has no API key (set DEEPSEEK_API_KEY)',
            '[CONFIG] letter model deepseek/deepseek-chat has no API key (set DEEPSEEK_API_KEY)',
            '[CONFIG] AUTO_COMPACT_ENABLED=true but openai has no API key',
        ]);

        process.env.DEEPSEEK_BASE_URL = 'http://localhost:8080/v1';
        process.env.OPENAI_API_KEY = 'test-key';
        assert.deepEqual(validateConfig(buildAppConfig()), []);
    });

    test('validation reports out-of-range settings', () => {
        process.env.DEEPSEEK_API_KEY = 'test-key';
        process.env.OPENAI_API_KEY = 'test-key';
        const base = buildAppConfig();
        const broken = {
            ...base,
            numWorkers: 0,
            autoCompact: { ...base.autoCompact, preserveLastMessages: 15 },
            rateLimiting: { ...base.rateLimiting, maxRetries: -1 },
        };
        assert.deepEqual(validateConfig(broken), [
            '[CONFIG] NUM_WORKERS must be >= 1',
            '[CONFIG] AUTO_COMPACT_PRESERVE_LAST must be lower than AUTO_COMPACT_TRIGGER_MESSAGES',
            '[CONFIG] RATE_LIMIT_MAX_RETRIES must be >= 0',
        ]);
    });

    test('providerSettingsFor rejects unknown providers', () => {
        process.env.DEEPSEEK_API_KEY = 'test-key';
        const config = buildAppConfig();
        assert.deepEqual(providerSettingsFor(config, config.classification), {
            provider: 'deepseek',
            baseUrl: 'https://api.deepseek.com',
            apiKey: 'test-key',
            model: 'deepseek-chat',
            timeoutMs: 120_000,
            temperature: 0,
        });
        assert.throws(
            () => providerSettingsFor(config, { provider: 'mistral', model: 'm', timeoutMs: 1000 }),
            isConfigError('UNKNOWN_PROVIDER')
        );
    });

    test('command line options override the loaded config', () => {
        const config = applyRunOptions(buildAppConfig(), parseRunOptions(['--input', 'leads.csv', '-w', '2', '--output', '/tmp/out.csv', '--mode', 'multi']));
        assert.equal(config.numWorkers, 2);
        assert.equal(config.outputPath, '/tmp/out.csv');
        assert.equal(config.generationMode, 'multi');
        assert.equal(config.dbPath, path.resolve(process.cwd(), 'data/progress.db'));
    });
});

describe('loadConfigFile', () => {
    let dir: string;

    before(() => {
        dir = makeTempDir();
    });

    after(() => removeDir(dir));

    test('returns an empty config without a path', () => {
        assert.deepEqual(loadConfigFile(null), {});
    });

    test('parses a valid file', () => {
        const filePath = writeTempFile(dir, 'ok.json', JSON.stringify({
            generation_mode: 'multi',
            models: { letter_generation: { provider: ' DeepSeek ', temperature: 0.5 } },
        }));
        assert.deepEqual(loadConfigFile(filePath), {
            generation_mode: 'multi',
            models: { letter_generation: { provider: 'deepseek', temperature: 0.5 } },
        });
    });

    test('rejects missing, malformed and invalid files', () => {
        assert.throws(() => loadConfigFile(path.join(dir, 'absent.json')), isConfigError('CONFIG_NOT_FOUND'));
        const malformed = writeTempFile(dir, 'bad.json', '{ "worker_pool": ');
        assert.throws(() => loadConfigFile(malformed), isConfigError('CONFIG_INVALID'));
        const invalid = writeTempFile(dir, 'invalid.json', JSON.stringify({ worker_pool: { num_workers: 0 } }));
        assert.throws(() => loadConfigFile(invalid), /worker_pool\.num_workers: /);
    });
});

describe('parseRunOptions', () => {
    test('reads long options and aliases', () => {
        assert.deepEqual(parseRunOptions(['-i', 'leads.csv', '-w', '4', '--mode', 'Multi', '--start', '10', '--db', 'q.db']), {
            input: 'leads.csv',
            output: null,
            context: null,
            workers: 4,
            db: 'q.db',
            resume: false,
            start: 10,
            config: null,
            agents: null,
            mode: 'multi',
        });
    });

    test('resume does not need an input', () => {
        const options = parseRunOptions(['--resume']);
        assert.equal(options.resume, true);
        assert.equal(options.input, null);
    });

    test('rejects bad values', () => {
        assert.throws(() => parseRunOptions([]), /--input is required unless --resume is given/);
        assert.throws(() => parseRunOptions(['-i', 'a.csv', '--workers', '0']), /--workers must be >= 1, got 0/);
        assert.throws(() => parseRunOptions(['-i', 'a.csv', '--workers', 'abc']), /Invalid value for --workers: abc/);
        assert.throws(() => parseRunOptions(['-i', 'a.csv', '--mode', 'team']), /Invalid value for --mode: team \(use single \/ multi\)/);
    });
});
