import pino from 'pino';
import type { PaperRecord, SearchRequest, SearchSource } from '../types/index.js';

/**
 * Build a PaperRecord with placeholder values for everything not overridden.
 */
export function makeRecord(overrides: Partial<PaperRecord> = {}): PaperRecord {
    const published = overrides.published ?? new Date('2024-03-09T08:00:00Z');
    return {
        entryId: 'http://arxiv.org/abs/2403.00001v1',
        title: 'Paper A',
        authors: ['Ada Example'],
        published,
        updated: published,
        utcOffsetMinutes: 0,
        comment: null,
        journalRef: null,
        doi: null,
        primaryCategory: 'cs.CL',
        categories: ['cs.CL'],
        links: [],
        summary: 'Abstract A.',
        ...overrides,
    };
}

/**
 * In-memory search source yielding a fixed, already-sorted list of records.
 */
export class StubSource implements SearchSource {
    readonly name = 'stub';
    readonly requests: SearchRequest[] = [];
    pulled = 0;

    constructor(private readonly records: PaperRecord[]) {}

    async *search(request: SearchRequest): AsyncGenerator<PaperRecord> {
        this.requests.push(request);
        for (const record of this.records.slice(0, request.maxResults)) {
            this.pulled++;
            yield record;
        }
    }
}

export interface LogLine {
    level: number;
    msg: string;
}

/**
 * pino logger writing parsed JSON lines into an array.
 */
export function captureLogger(): { logger: pino.Logger; lines: LogLine[] } {
    const lines: LogLine[] = [];
    const logger = pino({ level: 'debug' }, {
        write(chunk: string) {
            const line: LogLine = JSON.parse(chunk);
            lines.push(line);
        },
    });
    return { logger, lines };
}

export const WARN = 40;
export const INFO = 30;
