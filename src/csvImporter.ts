import fs from 'fs';
import csv from 'csv-parser';
import { LeadRow } from './types/domain';

function stripBom(header: string): string {
    return header.replace(/^\uFEFF/, '').trim();
}

/**
 * Streams a CSV file with a header row and hands each row to `onRow` in file order.
 * Rows are delivered one at a time; the stream is paused while `onRow` runs.
 */
export async function forEachCsvRow(
    filePath: string,
    onRow: (row: LeadRow, index: number) => Promise<void> | void
): Promise<number> {
    const stream = fs.createReadStream(filePath).pipe(csv({ mapHeaders: ({ header }) => stripBom(header) }));
    let index = 0;
    for await (const chunk of stream) {
        await onRow(toLeadRow(chunk), index);
        index += 1;
    }
    return index;
}

export async function readCsvRows(filePath: string): Promise<LeadRow[]> {
    const rows: LeadRow[] = [];
    await forEachCsvRow(filePath, (row) => {
        rows.push(row);
    });
    return rows;
}

function toLeadRow(chunk: unknown): LeadRow {
    const row: LeadRow = {};
    if (typeof chunk !== 'object' || chunk === null) {
        return row;
    }
    for (const [key, value] of Object.entries(chunk)) {
        row[key] = typeof value === 'string' ? value : String(value ?? '');
    }
    return row;
}
