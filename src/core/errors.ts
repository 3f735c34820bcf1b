export class TaskQueueError extends Error {
    public readonly code: string;

    constructor(message: string, code: string = 'TASK_QUEUE') {
        super(message);
        this.name = 'TaskQueueError';
        this.code = code;
    }
}

export class ConfigError extends Error {
    public readonly code: string;

    constructor(message: string, code: string = 'CONFIG_INVALID') {
        super(message);
        this.name = 'ConfigError';
        this.code = code;
    }
}

export class AiRequestError extends Error {
    public readonly code: string;
    public readonly status: number | null;

    constructor(message: string, status: number | null = null, code: string = 'AI_REQUEST') {
        super(message);
        this.name = 'AiRequestError';
        this.code = code;
        this.status = status;
    }
}

export class ConversationOrderError extends Error {
    public readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = 'ConversationOrderError';
        this.code = 'CONVERSATION_ORDER';
    }
}

export class AgentDefinitionError extends Error {
    public readonly code: string;
    public readonly filePath: string;

    constructor(message: string, filePath: string) {
        super(message);
        this.name = 'AgentDefinitionError';
        this.code = 'AGENT_DEFINITION';
        this.filePath = filePath;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
