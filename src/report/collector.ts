import type { PaperRecord } from '../types/index.js';
import { formatDate } from '../utils/dates.js';

/**
 * Papers retained from a date-descending result sequence.
 */
export interface CollectionResult {
    /** Retained records, in the order received */
    papers: PaperRecord[];

    /** Retained-record count per YYYY-MM-DD day */
    dateToCount: Map<string, number>;

    /**
     * True when a record older than the window start was seen, meaning every
     * paper of the window was retrieved. False when the sequence ran out first.
     */
    startPassed: boolean;
}

/**
 * The date a record is filed under: its last update when updates are
 * included, its first submission otherwise.
 */
export function referenceDate(record: PaperRecord, includeUpdates: boolean): Date {
    return includeUpdates ? record.updated : record.published;
}

/**
 * Consume `records` until one falls before `startDate`.
 *
 * The sequence must be sorted by the reference date, newest first. Iteration
 * stops at the first record older than `startDate`, so no further pages are
 * requested. A record dated exactly `startDate` is kept.
 */
export async function collectPapers(
    records: AsyncIterable<PaperRecord>,
    startDate: Date,
    includeUpdates: boolean
): Promise<CollectionResult> {
    const papers: PaperRecord[] = [];
    const dateToCount = new Map<string, number>();
    let startPassed = false;

    for await (const record of records) {
        const date = referenceDate(record, includeUpdates);
        if (date.getTime() < startDate.getTime()) {
            startPassed = true;
            break;
        }

        const day = formatDate(date, record.utcOffsetMinutes);
        dateToCount.set(day, (dateToCount.get(day) ?? 0) + 1);
        papers.push(record);
    }

    return { papers, dateToCount, startPassed };
}
