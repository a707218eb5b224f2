import type { PaperRecord } from './paper.js';

/**
 * Fields the search service can sort on.
 */
export type SortCriterion = 'relevance' | 'lastUpdatedDate' | 'submittedDate';

export type SortOrder = 'ascending' | 'descending';

/**
 * A single search against the upstream service.
 */
export interface SearchRequest {
    /** Query in the service's syntax, e.g. "cat:cs.CL OR cat:cs.IR" */
    query: string;

    /** Upper bound on the number of records the sequence yields */
    maxResults: number;

    sortBy: SortCriterion;

    sortOrder: SortOrder;
}

/**
 * Upstream paper search.
 *
 * `search()` returns a lazy sequence: pages are only fetched as the consumer
 * pulls records, so breaking out of a `for await` loop stops all further requests.
 */
export interface SearchSource {
    readonly name: string;

    search(request: SearchRequest): AsyncIterable<PaperRecord>;
}
