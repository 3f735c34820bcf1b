export type TaskStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type TerminalTaskStatus = 'completed' | 'failed';

/**
 * Raw CSV row as read from the input file. Every source column is preserved.
 */
export type LeadRow = Record<string, string>;

/**
 * Fixed internal lead schema built once from a raw row. Downstream code never
 * reads source column names directly.
 */
export interface LeadProfile {
    email: string;
    name: string;
    firstName: string;
    lastName: string;
    company: string;
    jobTitle: string;
    linkedinUrl: string;
}

export interface TaskRecord {
    id: number;
    email: string;
    linkedin_url: string | null;
    lead_data: string;
    status: TaskStatus;
    stage1_result: string | null;
    stage2_result: string | null;
    error: string | null;
    worker_id: string | null;
    created_at: string;
    started_at: string | null;
    completed_at: string | null;
}

export interface ClaimedTask {
    id: number;
    email: string;
    linkedinUrl: string | null;
    leadData: LeadRow;
    lead: LeadProfile;
    workerId: string;
}

export interface QueueStats {
    total: number;
    pending: number;
    processing: number;
    completed: number;
    failed: number;
}

export interface ClassificationResult {
    relevant: boolean;
    reason: string;
}

export interface OutreachLetter {
    subject: string;
    body: string;
    sendTime: string;
    personalizationSignals: string[];
}

export type GenerationResult =
    | { variant: 'accepted'; letter: OutreachLetter; relevanceAssessment: string; notes: string }
    | { variant: 'rejected'; reason: string; relevanceAssessment: string; notes: string }
    | { variant: 'errored'; message: string; relevanceAssessment: 'ERROR'; notes: string };

/**
 * Terminal task as read back for export.
 */
export interface ExportedTask {
    id: number;
    email: string;
    linkedinUrl: string | null;
    leadData: LeadRow;
    lead: LeadProfile;
    status: TaskStatus;
    stage1: ClassificationResult | null;
    stage2: GenerationResult | null;
    error: string | null;
    completedAt: string | null;
}

export interface LoadResult {
    inserted: number;
    skippedNoEmail: number;
    skippedExisting: number;
    skippedBeforeStart: number;
}

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    cachedTokens: number;
}

export interface CompressionCounters {
    count: number;
    messagesBefore: number;
    messagesAfter: number;
}

export const EMPTY_USAGE: TokenUsage = { inputTokens: 0, outputTokens: 0, cachedTokens: 0 };

export const EMPTY_COMPRESSION: CompressionCounters = { count: 0, messagesBefore: 0, messagesAfter: 0 };

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
    return {
        inputTokens: a.inputTokens + b.inputTokens,
        outputTokens: a.outputTokens + b.outputTokens,
        cachedTokens: a.cachedTokens + b.cachedTokens,
    };
}

export function addCompression(a: CompressionCounters, b: CompressionCounters): CompressionCounters {
    return {
        count: a.count + b.count,
        messagesBefore: a.messagesBefore + b.messagesBefore,
        messagesAfter: a.messagesAfter + b.messagesAfter,
    };
}
