import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from 'pino';
import type { ReportConfig, SearchRequest, SearchSource } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { windowDays, windowStart } from '../utils/dates.js';
import { collectPapers } from './collector.js';
import { renderReport } from './format.js';

/**
 * A report input was invalid. Raised before any request is made.
 */
export class ReportPreconditionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReportPreconditionError';
    }
}

/**
 * Resolves the UTC offset, in minutes, that window arithmetic is done in.
 */
export type TimezoneResolver = () => Promise<number>;

export type ReportOptions = Pick<
    ReportConfig,
    'categories' | 'nbDays' | 'includeUpdates' | 'out' | 'maxPapersPerDay' | 'serviceMaxResults'
>;

export interface ReportDependencies {
    source: SearchSource;
    /** Defaults to probing `source` for the offset of its newest record */
    resolveTimezone?: TimezoneResolver;
    /** Defaults to the system clock */
    now?: () => Date;
    logger?: Logger;
}

export interface ReportOutcome {
    /** 'empty' when no paper fell in the window and nothing was written */
    status: 'written' | 'empty';
    /** Absolute path of the written report, null when nothing was written */
    path: string | null;
    papers: number;
    /** The result cap ran out before the start of the window was reached */
    truncated: boolean;
    maxResults: number;
    startDate: Date;
    dateToCount: Map<string, number>;
}

const PROBE_QUERY = 'language';

/**
 * Timezone resolver that asks the service itself: one single-result search,
 * reading the offset stamped on the newest submission.
 */
export function probeTimezone(source: SearchSource): TimezoneResolver {
    return async () => {
        const probe: SearchRequest = {
            query: PROBE_QUERY,
            maxResults: 1,
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        };

        for await (const record of source.search(probe)) {
            return record.utcOffsetMinutes;
        }

        throw new Error(`Timezone probe against ${source.name} returned no results`);
    };
}

/**
 * Query combining every category with OR, e.g. "cat:cs.CL OR cat:cs.IR".
 */
export function buildCategoryQuery(categories: string[]): string {
    return categories.map((category) => `cat:${category}`).join(' OR ');
}

/**
 * Result cap for a window: the per-day policy times the window length,
 * bounded by what the service will return for one query.
 */
export function computeMaxResults(
    nbDays: number,
    maxPapersPerDay: number,
    serviceMaxResults: number
): number {
    return Math.min(maxPapersPerDay * nbDays, serviceMaxResults);
}

/**
 * Check the inputs that must hold before anything touches the network.
 */
export function checkPreconditions(options: ReportOptions): void {
    if (!Number.isInteger(options.nbDays) || options.nbDays <= 0 || options.nbDays >= 367) {
        throw new ReportPreconditionError(
            `nb_days must be an integer between 1 and 366, got ${options.nbDays}`
        );
    }
    if (options.categories.length === 0) {
        throw new ReportPreconditionError('At least one category is required');
    }
    if (existsSync(options.out)) {
        throw new ReportPreconditionError(`Output path already exists: ${options.out}`);
    }
}

/**
 * Fetch the papers of the trailing `nbDays` days and write the report.
 *
 * Nothing is written when the window holds no paper. When the result cap is
 * hit before the window start is reached, the partial report is still written
 * and a warning is logged.
 */
export async function generateReport(
    options: ReportOptions,
    deps: ReportDependencies
): Promise<ReportOutcome> {
    checkPreconditions(options);

    const logger = deps.logger ?? getLogger();
    const now = deps.now ?? (() => new Date());
    const resolveTimezone = deps.resolveTimezone ?? probeTimezone(deps.source);

    const { nbDays, includeUpdates, maxPapersPerDay, serviceMaxResults } = options;

    const utcOffsetMinutes = await resolveTimezone();
    const startDate = windowStart(now(), nbDays, utcOffsetMinutes);

    logger.info(`Getting papers from last ${nbDays} days.`);

    const maxResults = computeMaxResults(nbDays, maxPapersPerDay, serviceMaxResults);
    const request: SearchRequest = {
        query: buildCategoryQuery(options.categories),
        maxResults,
        sortBy: includeUpdates ? 'lastUpdatedDate' : 'submittedDate',
        sortOrder: 'descending',
    };
    logger.debug({ ...request, startDate: startDate.toISOString() }, 'Searching');

    const { papers, dateToCount, startPassed } = await collectPapers(
        deps.source.search(request),
        startDate,
        includeUpdates
    );

    const outcome: ReportOutcome = {
        status: 'empty',
        path: null,
        papers: papers.length,
        truncated: false,
        maxResults,
        startDate,
        dateToCount,
    };

    if (papers.length === 0) {
        let msg = `No papers found in last ${nbDays} days. Consider increasing --nb_days`;
        if (!includeUpdates) {
            msg += ' or adding the flag --include_updates';
        }
        logger.warn(msg + '.');
        return outcome;
    }

    if (!startPassed) {
        let msg = `max_results (${maxResults}) was too low to get all papers for the last ${nbDays} days.`;
        if (maxResults < serviceMaxResults) {
            msg += ` Consider increasing maxPapersPerDay (${maxPapersPerDay}).`;
        } else {
            msg += ` The API limits the number of results to ${serviceMaxResults}.`;
        }
        logger.warn(msg);
        outcome.truncated = true;
    }

    const report = renderReport({
        includeUpdates,
        days: windowDays(startDate, nbDays, utcOffsetMinutes),
        dateToCount,
        papers,
    });

    // 'wx' refuses to clobber a file created since the precondition check
    writeFileSync(options.out, report, { encoding: 'utf-8', flag: 'wx' });

    const path = resolve(options.out);
    logger.info(`Wrote ${papers.length} results in ${path}`);

    return { ...outcome, status: 'written', path };
}
