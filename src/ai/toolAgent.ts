import { isRecord } from '../core/repositories/shared';
import { errorMessage } from '../core/errors';
import { logDebug, logInfo, logWarn } from '../telemetry/logger';
import { addUsage, CompressionCounters, EMPTY_COMPRESSION, EMPTY_USAGE, TokenUsage } from '../types/domain';
import { ConversationHistory } from './conversation';
import { ChatClient, ChatMessage, ChatResponse, ToolCall, ToolDefinition } from './openaiClient';
import { buildSummarizationPrompt } from './prompts';

export interface AgentTool {
    definition: ToolDefinition;
    invoke(args: Record<string, unknown>): Promise<string>;
}

/**
 * Long-lived set of tools shared by every agent run in the pool.
 */
export interface ToolSource {
    initialize(): Promise<void>;
    list(): AgentTool[];
    close(): Promise<void>;
}

export interface CompressionSettings {
    enabled: boolean;
    triggerAtMessages: number;
    preserveLastMessages: number;
    /** Client used to summarize the compressed middle; null disables compression. */
    summarizer: ChatClient | null;
}

export interface ToolAgentOptions {
    name?: string;
    client: ChatClient;
    tools?: AgentTool[];
    maxIterations: number;
    temperature?: number;
    compression?: CompressionSettings;
}

export type AgentRunStatus = 'success' | 'partial' | 'error';

export interface AgentRunResult {
    status: AgentRunStatus;
    finalText: string;
    error: string | null;
    iterations: number;
    usage: TokenUsage;
    compression: CompressionCounters;
}

const TOOL_RESULT_PREVIEW = 500;
const AI_TEXT_PREVIEW = 300;

function describeForSummary(messages: ChatMessage[]): string {
    const parts: string[] = [];
    for (const message of messages) {
        if (message.role === 'tool') {
            parts.push(`Tool Result: ${message.content.slice(0, TOOL_RESULT_PREVIEW) || 'N/A'}`);
        } else if (message.role === 'assistant') {
            if (message.toolCalls.length > 0) {
                parts.push(`AI called: ${message.toolCalls.map((call) => call.name).join(', ')}`);
            } else if (message.content) {
                parts.push(`AI: ${message.content.slice(0, AI_TEXT_PREVIEW)}`);
            }
        }
    }
    return parts.join('\n\n');
}

function parseToolArguments(raw: string): Record<string, unknown> {
    if (!raw.trim()) {
        return {};
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
        throw new Error('tool arguments must be a JSON object');
    }
    return parsed;
}

/**
 * Autonomous tool loop: call the model, run the tools it asks for, feed the
 * results back, stop on a plain answer or after `maxIterations` rounds.
 */
export class ToolAgent {
    private readonly name: string;
    private readonly client: ChatClient;
    private readonly tools: AgentTool[];
    private readonly maxIterations: number;
    private readonly temperature: number | undefined;
    private readonly compression: CompressionSettings | null;
    private compressionCounters: CompressionCounters = { ...EMPTY_COMPRESSION };

    constructor(options: ToolAgentOptions) {
        this.name = options.name ?? 'agent';
        this.client = options.client;
        this.tools = options.tools ?? [];
        this.maxIterations = Math.max(1, options.maxIterations);
        this.temperature = options.temperature;
        this.compression = options.compression && options.compression.enabled && options.compression.summarizer
            ? options.compression
            : null;
    }

    async run(task: string): Promise<AgentRunResult> {
        let history = new ConversationHistory([{ role: 'user', content: task }]);
        let usage: TokenUsage = { ...EMPTY_USAGE };
        const toolDefinitions = this.tools.map((tool) => tool.definition);

        for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
            if (this.compression && history.length >= this.compression.triggerAtMessages) {
                const compressed = await this.compress(history, this.compression);
                history = compressed.history;
                usage = addUsage(usage, compressed.usage);
            }

            await logDebug('agent.iteration', {
                agent: this.name,
                iteration,
                maxIterations: this.maxIterations,
                messages: history.length,
            });

            let response: ChatResponse;
            try {
                response = await this.client.complete({
                    messages: history.messages(),
                    tools: toolDefinitions,
                    temperature: this.temperature,
                });
            } catch (error) {
                const message = errorMessage(error);
                await logWarn('agent.llm_failed', { agent: this.name, iteration, error: message });
                return this.result('error', '', message, iteration, usage);
            }
            usage = addUsage(usage, response.usage);

            if (response.toolCalls.length === 0) {
                if (!response.content.trim()) {
                    await logWarn('agent.empty_response', { agent: this.name, iteration });
                    return this.result('error', '', 'Empty LLM response', iteration, usage);
                }
                return this.result('success', response.content, null, iteration, usage);
            }

            history.appendAssistant(response.content, response.toolCalls);
            for (const call of response.toolCalls) {
                history.appendToolResult(call.id, await this.executeTool(call));
            }
        }

        await logWarn('agent.max_iterations', { agent: this.name, maxIterations: this.maxIterations });
        return this.result(
            'partial',
            'Max iterations reached - agent did not produce final output',
            `Reached max iterations (${this.maxIterations})`,
            this.maxIterations,
            usage
        );
    }

    private result(
        status: AgentRunStatus,
        finalText: string,
        error: string | null,
        iterations: number,
        usage: TokenUsage
    ): AgentRunResult {
        return { status, finalText, error, iterations, usage, compression: { ...this.compressionCounters } };
    }

    private async executeTool(call: ToolCall): Promise<string> {
        const tool = this.tools.find((candidate) => candidate.definition.name === call.name);
        if (!tool) {
            return `Error: Tool '${call.name}' not found`;
        }
        try {
            await logDebug('agent.tool_call', { agent: this.name, tool: call.name });
            return await tool.invoke(parseToolArguments(call.arguments));
        } catch (error) {
            return `Error executing tool: ${errorMessage(error)}`;
        }
    }

    private async compress(
        history: ConversationHistory,
        settings: CompressionSettings
    ): Promise<{ history: ConversationHistory; usage: TokenUsage }> {
        const middle = history.middle(settings.preserveLastMessages);
        if (middle.length === 0 || !settings.summarizer) {
            return { history, usage: { ...EMPTY_USAGE } };
        }
        try {
            const response = await settings.summarizer.complete({
                messages: [{ role: 'user', content: buildSummarizationPrompt(describeForSummary(middle)) }],
                temperature: 0,
            });
            const compacted = history.compact(response.content, settings.preserveLastMessages);
            this.compressionCounters = {
                count: this.compressionCounters.count + 1,
                messagesBefore: this.compressionCounters.messagesBefore + history.length,
                messagesAfter: this.compressionCounters.messagesAfter + compacted.length,
            };
            await logInfo('agent.context_compressed', {
                agent: this.name,
                before: history.length,
                after: compacted.length,
            });
            return { history: compacted, usage: response.usage };
        } catch (error) {
            await logWarn('agent.compression_failed', { agent: this.name, error: errorMessage(error) });
            return { history, usage: { ...EMPTY_USAGE } };
        }
    }
}
