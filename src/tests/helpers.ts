import fs from 'fs';
import os from 'os';
import path from 'path';
import { ClassificationOutcome, LeadClassifier } from '../ai/classifier';
import { GenerationOutcome, LetterGenerator } from '../ai/letterGenerator';
import { ChatClient, ChatRequest, ChatResponse } from '../ai/openaiClient';
import { AgentTool, ToolSource } from '../ai/toolAgent';
import { OutreachContext } from '../context/contextLoader';
import { configureLogger } from '../telemetry/logger';
import { EMPTY_USAGE, GenerationResult, LeadProfile } from '../types/domain';

export function silenceLogs(): void {
    configureLogger({ silent: true, logDir: null, level: 'info' });
}

export type ScriptedReply =
    | Partial<ChatResponse>
    | Error
    | ((request: ChatRequest) => Partial<ChatResponse> | Promise<Partial<ChatResponse>>);

/**
 * Replies from a fixed script in call order, then from `fallback` if set.
 */
export class ScriptedChatClient implements ChatClient {
    readonly provider: string;
    readonly model: string;
    readonly requests: ChatRequest[] = [];
    private readonly replies: ScriptedReply[];
    private readonly fallback: ScriptedReply | null;

    constructor(replies: ScriptedReply[], options: { provider?: string; model?: string; fallback?: ScriptedReply } = {}) {
        this.replies = [...replies];
        this.provider = options.provider ?? 'fake';
        this.model = options.model ?? 'fake-model';
        this.fallback = options.fallback ?? null;
    }

    get calls(): number {
        return this.requests.length;
    }

    async complete(request: ChatRequest): Promise<ChatResponse> {
        this.requests.push({ ...request, messages: [...request.messages] });
        const reply = this.replies.shift() ?? this.fallback;
        if (!reply) {
            throw new Error('ScriptedChatClient: script exhausted');
        }
        if (reply instanceof Error) {
            throw reply;
        }
        const value = typeof reply === 'function' ? await reply(request) : reply;
        return {
            content: value.content ?? '',
            toolCalls: value.toolCalls ?? [],
            usage: value.usage ?? { ...EMPTY_USAGE },
        };
    }
}

/** Same name and message as the error fetch raises when its AbortSignal.timeout fires. */
export function timeoutError(): Error {
    const error = new Error('The operation was aborted due to timeout');
    error.name = 'TimeoutError';
    return error;
}

export function textReply(content: string, inputTokens: number = 0, outputTokens: number = 0): Partial<ChatResponse> {
    return { content, usage: { inputTokens, outputTokens, cachedTokens: 0 } };
}

export class FakeToolSource implements ToolSource {
    initializeCalls = 0;
    closeCalls = 0;
    private readonly tools: AgentTool[];

    constructor(tools: AgentTool[] = []) {
        this.tools = tools;
    }

    async initialize(): Promise<void> {
        this.initializeCalls += 1;
    }

    list(): AgentTool[] {
        return this.tools;
    }

    async close(): Promise<void> {
        this.closeCalls += 1;
    }
}

export function makeTool(name: string, invoke: (args: Record<string, unknown>) => Promise<string>): AgentTool {
    return {
        definition: { name, description: `${name} test tool`, parameters: { type: 'object', properties: {} } },
        invoke,
    };
}

export const TEST_CONTEXT: OutreachContext = {
    gtm: 'ICP: operations leaders at e-commerce brands.',
    instruction: 'Write one short letter.',
    guides: '',
};

export function makeTempDir(prefix: string = 'lead-outreach-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeTempFile(dir: string, name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Manual clock for rate limiter tests: sleeping advances time instantly.
 */
export function createFakeClock(start: number = 0): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
    let current = start;
    const sleeps: number[] = [];
    return {
        now: () => current,
        sleep: async (ms: number) => {
            sleeps.push(ms);
            current += ms;
        },
        sleeps,
    };
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Stage 1 stand-in keyed off the email: `broken*` throws, `skip*` is not
 * relevant, everything else is.
 */
export class KeyedClassifier implements LeadClassifier {
    active = 0;
    maxActive = 0;
    onClassify: ((lead: LeadProfile) => void) | null = null;

    async classify(lead: LeadProfile): Promise<ClassificationOutcome> {
        this.active += 1;
        this.maxActive = Math.max(this.maxActive, this.active);
        try {
            this.onClassify?.(lead);
            await delay(5);
            if (lead.email.startsWith('broken')) {
                throw new Error('classifier down');
            }
            const relevant = !lead.email.startsWith('skip');
            return {
                result: { relevant, reason: relevant ? 'fits the ICP' : 'wrong industry' },
                usage: { inputTokens: 10, outputTokens: 2, cachedTokens: 0 },
            };
        } finally {
            this.active -= 1;
        }
    }
}

/** Stage 2 stand-in: `crash*` throws, `reject*` is rejected, the rest get a letter. */
export class KeyedGenerator implements LetterGenerator {
    readonly mode = 'single' as const;

    async generate(lead: LeadProfile): Promise<GenerationOutcome> {
        if (lead.email.startsWith('crash')) {
            throw new Error('HTTP 503');
        }
        const result: GenerationResult = lead.email.startsWith('reject')
            ? { variant: 'rejected', reason: 'No recent activity', relevanceAssessment: 'LOW', notes: '' }
            : {
                variant: 'accepted',
                letter: { subject: 'Hello', body: 'Body', sendTime: 'Tue 10:00', personalizationSignals: ['Posted about Q3 planning'] },
                relevanceAssessment: 'HIGH',
                notes: '',
            };
        return {
            result,
            usage: { inputTokens: 100, outputTokens: 20, cachedTokens: 5 },
            compression: { count: 1, messagesBefore: 10, messagesAfter: 6 },
        };
    }
}
