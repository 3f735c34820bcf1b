import fs from 'fs';
import { ensureParentDirectory } from '../security/filesystem';
import { ExportedTask } from '../types/domain';
import { CompressionStats, TokenStats } from './usageStats';

export const EXPORT_COLUMNS = [
    'email',
    'name',
    'company',
    'job_title',
    'linkedin_url',
    'stage1_relevant',
    'stage1_reason',
    'stage2_status',
    'stage2_rejected',
    'stage2_rejection_reason',
    'letter_subject',
    'letter_body',
    'letter_send_time',
    'personalization_signals',
    'relevance_assessment',
    'notes',
    'final_status',
    'error',
    'processed_at',
] as const;

export type ExportColumn = typeof EXPORT_COLUMNS[number];
export type ExportRow = Record<ExportColumn, string>;

export type FinalStatus = 'error' | 'pending' | 'not_relevant_stage1' | 'stage2_not_run' | 'not_relevant_stage2' | 'success';

export const SIGNAL_DELIMITER = '; ';

export function determineFinalStatus(task: ExportedTask): FinalStatus {
    if (task.status === 'failed') return 'error';
    if (task.status === 'pending' || task.status === 'processing') return 'pending';
    if (!task.stage1 || !task.stage1.relevant) return 'not_relevant_stage1';
    if (!task.stage2) return 'stage2_not_run';
    if (task.stage2.variant !== 'accepted') return 'not_relevant_stage2';
    return 'success';
}

export function buildExportRow(task: ExportedTask): ExportRow {
    const stage2 = task.stage2;
    const rejectionReason = stage2 === null
        ? ''
        : stage2.variant === 'rejected'
            ? stage2.reason
            : stage2.variant === 'errored'
                ? stage2.message
                : '';
    const letter = stage2 !== null && stage2.variant === 'accepted' ? stage2.letter : null;

    let letterBody = '';
    if (stage2 !== null && stage2.variant !== 'accepted') {
        letterBody = `REJECTED: ${rejectionReason}`;
    } else if (letter) {
        letterBody = `${task.email}\n\n${letter.sendTime}\n\n${letter.subject}\n\n${letter.body}`;
    }

    return {
        email: task.email,
        name: task.lead.name,
        company: task.lead.company,
        job_title: task.lead.jobTitle,
        linkedin_url: task.linkedinUrl ?? '',
        stage1_relevant: task.stage1?.relevant ? 'Yes' : 'No',
        stage1_reason: task.stage1?.reason ?? '',
        stage2_status: stage2 ? 'completed' : 'skipped',
        stage2_rejected: stage2 ? (stage2.variant === 'accepted' ? 'No' : 'Yes') : '',
        stage2_rejection_reason: rejectionReason,
        letter_subject: letter?.subject ?? '',
        letter_body: letterBody,
        letter_send_time: letter?.sendTime ?? '',
        personalization_signals: letter ? letter.personalizationSignals.join(SIGNAL_DELIMITER) : '',
        relevance_assessment: stage2?.relevanceAssessment ?? '',
        notes: stage2?.notes ?? '',
        final_status: determineFinalStatus(task),
        error: task.error ?? '',
        processed_at: task.completedAt ?? '',
    };
}

export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function toCsv(rows: ExportRow[]): string {
    const lines = [EXPORT_COLUMNS.join(',')];
    for (const row of rows) {
        lines.push(EXPORT_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
    }
    return `${lines.join('\n')}\n`;
}

/** Writes every task as one CSV row and returns the number of rows written. */
export async function writeResults(outputPath: string, tasks: ExportedTask[]): Promise<number> {
    ensureParentDirectory(outputPath);
    const rows = tasks.map(buildExportRow);
    await fs.promises.writeFile(outputPath, toCsv(rows), 'utf8');
    return rows.length;
}

function percent(part: number, total: number): string {
    return `${((part / Math.max(1, total)) * 100).toFixed(1)}%`;
}

export function buildSummary(
    tasks: ExportedTask[],
    tokenStats?: TokenStats | null,
    compressionStats?: CompressionStats | null
): string[] {
    const total = tasks.length;
    if (total === 0) {
        return ['No tasks to summarize'];
    }

    const stage1Relevant = tasks.filter((task) => task.stage1?.relevant === true).length;
    const stage2Run = tasks.filter((task) => task.stage2 !== null).length;
    const stage2Rejected = tasks.filter((task) => task.stage2 !== null && task.stage2.variant !== 'accepted').length;
    const letters = tasks.filter((task) => task.stage2?.variant === 'accepted').length;
    const errors = tasks.filter((task) => task.status === 'failed').length;

    const lines = [
        `Total Leads Processed: ${total}`,
        'Stage 1 - Classification:',
        `  Relevant: ${stage1Relevant} (${percent(stage1Relevant, total)})`,
        `  Not Relevant: ${total - stage1Relevant} (${percent(total - stage1Relevant, total)})`,
    ];
    if (stage2Run > 0) {
        lines.push(
            'Stage 2 - Letter Generation:',
            `  Letters Generated: ${letters} (${percent(letters, total)})`,
            `  Rejected (Stage 2): ${stage2Rejected}`,
            `  Processed: ${stage2Run}`
        );
    }
    if (errors > 0) {
        lines.push(`Errors: ${errors}`);
    }
    if (tokenStats) {
        const totalTokens = tokenStats.totalInput + tokenStats.totalOutput;
        lines.push(
            'Token Usage & Cost:',
            `  Total Tokens: ${totalTokens} (input ${tokenStats.totalInput}, output ${tokenStats.totalOutput}, cached ${tokenStats.totalCached} = ${percent(tokenStats.totalCached, tokenStats.totalInput)} of input)`,
            `  Stage 1 (Classification): ${tokenStats.stage1Input + tokenStats.stage1Output} tokens`,
            `  Stage 2 (Letter Gen): ${tokenStats.stage2Input + tokenStats.stage2Output} tokens`,
            `  Total Cost: $${tokenStats.totalCostUsd.toFixed(3)}`,
            `  Avg Cost per Lead: $${(tokenStats.totalCostUsd / total).toFixed(4)}`
        );
    }
    if (compressionStats && compressionStats.totalCompressions > 0) {
        const saved = compressionStats.totalMessagesBefore - compressionStats.totalMessagesAfter;
        lines.push(
            'Context Compression:',
            `  Total Compressions: ${compressionStats.totalCompressions}`,
            `  Messages Saved: ${saved} (${compressionStats.totalMessagesBefore} -> ${compressionStats.totalMessagesAfter})`,
            `  Avg Reduction: ${percent(saved, compressionStats.totalMessagesBefore)}`
        );
    }
    return lines;
}
