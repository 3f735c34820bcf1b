import fs from 'fs';
import { AgentLoader } from '../../ai/agentLoader';
import { AgentTeam } from '../../ai/agentTeam';
import { IcpClassifier } from '../../ai/classifier';
import { LetterGenerator, MultiAgentGenerator, SingleAgentGenerator } from '../../ai/letterGenerator';
import { ChatClient, createChatClient } from '../../ai/openaiClient';
import { CompressionSettings } from '../../ai/toolAgent';
import { AppConfig, buildAppConfig, loadConfigFile, providerSettingsFor, validateConfig } from '../../config';
import { resolvePathValue } from '../../config/env';
import { OutreachContext } from '../../context/contextLoader';
import { ConfigError } from '../../core/errors';
import { OutreachOrchestrator, RunSummary } from '../../core/orchestrator';
import { RateLimiterRegistry } from '../../core/rateLimiter';
import { PersistentTaskQueue } from '../../core/taskQueue';
import { UsageTracker } from '../../core/usageStats';
import { WorkerPool } from '../../core/workerPool';
import { ResearchToolRegistry } from '../../integrations/researchTools';
import { configureLogger, getLogFilePath, logInfo } from '../../telemetry/logger';
import { parseRunOptions, RunCommandOptions } from '../cliParser';

export function applyRunOptions(config: AppConfig, options: RunCommandOptions): AppConfig {
    return {
        ...config,
        numWorkers: options.workers ?? config.numWorkers,
        generationMode: options.mode ?? config.generationMode,
        dbPath: options.db ? resolvePathValue(options.db) : config.dbPath,
        outputPath: options.output ? resolvePathValue(options.output) : config.outputPath,
        contextDir: options.context ? resolvePathValue(options.context) : config.contextDir,
        agentsDir: options.agents ? resolvePathValue(options.agents) : config.agentsDir,
    };
}

/**
 * One registry per process: every client of a provider shares its bucket.
 */
export function createPoolFactory(config: AppConfig, registry: RateLimiterRegistry): (context: OutreachContext) => WorkerPool {
    const retry = {
        maxRetries: config.rateLimiting.maxRetries,
        baseDelayMs: config.rateLimiting.baseDelayMs,
    };
    const clientFor = (settings: Parameters<typeof providerSettingsFor>[1]): ChatClient =>
        createChatClient(providerSettingsFor(config, settings), { registry, retry });

    return (context) => {
        const classifierClient = clientFor(config.classification);
        const compression: CompressionSettings = {
            enabled: config.autoCompact.enabled,
            triggerAtMessages: config.autoCompact.triggerAtMessages,
            preserveLastMessages: config.autoCompact.preserveLastMessages,
            summarizer: config.autoCompact.enabled
                ? clientFor({
                    provider: config.autoCompact.summarizationProvider,
                    model: config.autoCompact.summarizationModel,
                    timeoutMs: config.letterGeneration.timeoutMs,
                    temperature: 0,
                })
                : null,
        };
        const tools = new ResearchToolRegistry(config.research);

        let generator: LetterGenerator;
        if (config.generationMode === 'multi') {
            generator = new MultiAgentGenerator(new AgentTeam({
                agents: new AgentLoader(config.agentsDir),
                clientFor: (definition) => clientFor({
                    provider: definition.provider,
                    model: definition.model,
                    temperature: definition.temperature,
                    timeoutMs: config.letterGeneration.timeoutMs,
                }),
                tools,
                researchAgents: config.researchAgents,
                writerAgents: config.writerAgents,
                parallel: config.parallelExecution,
                compression,
            }));
        } else {
            generator = new SingleAgentGenerator({
                client: clientFor(config.letterGeneration),
                tools,
                maxIterations: config.maxAgentIterations,
                temperature: config.letterGeneration.temperature,
                compression,
            });
        }

        return new WorkerPool({
            numWorkers: config.numWorkers,
            classifier: new IcpClassifier(classifierClient, config.classification.temperature),
            generator,
            tools,
            usage: new UsageTracker({
                stage1Model: config.classification.model,
                stage2Model: config.letterGeneration.model,
            }),
            context,
        });
    };
}

export async function runPipelineCommand(args: string[]): Promise<RunSummary> {
    const options = parseRunOptions(args);
    const config = applyRunOptions(buildAppConfig(loadConfigFile(options.config)), options);

    const errors = validateConfig(config);
    if (errors.length > 0) {
        throw new ConfigError(errors.join('\n'), 'CONFIG_VALIDATION');
    }
    const inputPath = options.input ? resolvePathValue(options.input) : null;
    if (inputPath && !fs.existsSync(inputPath)) {
        throw new ConfigError(`Input file not found: ${inputPath}`, 'INPUT_NOT_FOUND');
    }
    if (!fs.existsSync(config.contextDir)) {
        throw new ConfigError(`Context directory not found: ${config.contextDir}`, 'CONTEXT_MISSING');
    }

    configureLogger({ level: config.logLevel, logDir: config.logDir });
    await logInfo('run.starting', {
        input: inputPath,
        output: config.outputPath,
        db: config.dbPath,
        workers: config.numWorkers,
        mode: config.generationMode,
        resume: options.resume,
        startPosition: options.start,
        classificationModel: config.classification.model,
        letterModel: config.letterGeneration.model,
        rateLimiting: config.rateLimiting.enabled,
        logFile: getLogFilePath(),
    });

    const registry = new RateLimiterRegistry(config.rateLimiting.providers, { enabled: config.rateLimiting.enabled });
    const queue = await PersistentTaskQueue.open(config.dbPath);
    const orchestrator = new OutreachOrchestrator({
        queue,
        contextDir: config.contextDir,
        createPool: createPoolFactory(config, registry),
        inputPath,
        outputPath: config.outputPath,
        resume: options.resume,
        startPosition: options.start,
        numWorkers: config.numWorkers,
        interTaskDelayMs: config.interTaskDelayMs,
    });
    const uninstall = orchestrator.installSignalHandlers();
    try {
        return await orchestrator.run();
    } finally {
        uninstall();
        await queue.close();
    }
}
