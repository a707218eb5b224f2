import { XMLParser } from 'fast-xml-parser';
import type { PaperLink, PaperRecord, SearchRequest, SearchSource } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { parseUtcOffset } from '../utils/dates.js';
import { asArray, attrOf, collapseWhitespace, isXmlNode, nonEmpty, textOf, type XmlNode } from './utils.js';

const ARXIV_API = 'https://export.arxiv.org/api/query';

const DEFAULT_PAGE_SIZE = 100;

const REPEATED_ELEMENTS = new Set(['entry', 'author', 'link', 'category']);

const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    htmlEntities: true,
    isArray: (name) => REPEATED_ELEMENTS.has(name),
});

/**
 * The Atom feed returned was not a usable search result page.
 */
export class FeedParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FeedParseError';
    }
}

/**
 * One page of search results.
 */
export interface ArxivFeedPage {
    /** Total matches reported by `opensearch:totalResults`, if present */
    totalResults: number | null;
    entries: PaperRecord[];
}

export interface ArxivSourceOptions {
    /** Records requested per API call */
    pageSize?: number;
    httpClient?: HttpClient;
}

/**
 * arXiv search API adapter.
 *
 * Results are paged lazily: a page is requested only once the consumer has
 * pulled every record of the previous one.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivSource implements SearchSource {
    readonly name = 'arXiv';
    private readonly httpClient: HttpClient;
    private readonly pageSize: number;

    constructor(options?: ArxivSourceOptions) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.pageSize = options?.pageSize ?? DEFAULT_PAGE_SIZE;
        if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
            throw new RangeError(`pageSize must be a positive integer, got ${this.pageSize}`);
        }
    }

    async *search(request: SearchRequest): AsyncGenerator<PaperRecord> {
        let start = 0;
        let yielded = 0;

        while (yielded < request.maxResults) {
            const size = Math.min(this.pageSize, request.maxResults - yielded);
            const page = await this.fetchPage(request, start, size);

            if (page.entries.length === 0) {
                getLogger().debug({ start }, 'arXiv returned an empty page, stopping');
                return;
            }

            for (const entry of page.entries) {
                yield entry;
                yielded++;
                if (yielded >= request.maxResults) return;
            }

            start += page.entries.length;
            if (page.totalResults !== null && start >= page.totalResults) return;
        }
    }

    /**
     * Fetch a single page of results starting at offset `start`.
     */
    async fetchPage(request: SearchRequest, start: number, size: number): Promise<ArxivFeedPage> {
        const url = buildQueryUrl(request, start, size);
        getLogger().debug({ url }, 'arXiv search page');

        const response = await this.httpClient.get(url, { source: 'arxiv' });
        const page = parseFeed(response.body);

        getLogger().debug(
            { start, received: page.entries.length, totalResults: page.totalResults },
            'arXiv page received'
        );
        return page;
    }
}

/**
 * Build the API URL for one page of a search.
 */
export function buildQueryUrl(request: SearchRequest, start: number, size: number): string {
    const params = new URLSearchParams({
        search_query: request.query,
        start: String(start),
        max_results: String(size),
        sortBy: request.sortBy,
        sortOrder: request.sortOrder,
    });
    return `${ARXIV_API}?${params.toString()}`;
}

/**
 * Parse an arXiv Atom feed into paper records.
 * The API reports query errors as a feed holding a single entry whose id
 * points at `/api/errors`; those are raised as FeedParseError.
 */
export function parseFeed(xml: string): ArxivFeedPage {
    let document: unknown;
    try {
        document = parser.parse(xml);
    } catch (error) {
        throw new FeedParseError(
            `Malformed arXiv response: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    const feed = isXmlNode(document) ? document['feed'] : undefined;
    if (!isXmlNode(feed)) {
        throw new FeedParseError('arXiv response has no <feed> element');
    }

    const total = textOf(feed['opensearch:totalResults']);
    const totalResults = total !== null && /^\d+$/.test(total) ? parseInt(total, 10) : null;

    const entries: PaperRecord[] = [];
    for (const entry of asArray(feed['entry'])) {
        if (!isXmlNode(entry)) continue;
        const id = textOf(entry['id']) ?? '';
        if (id.includes('/api/errors')) {
            const reason = collapseWhitespace(textOf(entry['summary']) ?? 'unknown error');
            throw new FeedParseError(`arXiv API error: ${reason}`);
        }
        entries.push(normalizeEntry(entry));
    }

    return { totalResults, entries };
}

function normalizeEntry(entry: XmlNode): PaperRecord {
    const entryId = textOf(entry['id']);
    const publishedText = textOf(entry['published']);
    const updatedText = textOf(entry['updated']) ?? publishedText;

    if (!entryId || !publishedText || !updatedText) {
        throw new FeedParseError(`arXiv entry is missing id or timestamps: ${entryId ?? '(no id)'}`);
    }

    const published = parseTimestamp(publishedText);
    const updated = parseTimestamp(updatedText);

    const authors = asArray(entry['author'])
        .map((author) => (isXmlNode(author) ? textOf(author['name']) : null))
        .filter((name): name is string => !!name)
        .map(collapseWhitespace);

    const categories = asArray(entry['category'])
        .map((category) => attrOf(category, 'term'))
        .filter((term): term is string => !!term);

    const links: PaperLink[] = [];
    for (const link of asArray(entry['link'])) {
        const href = attrOf(link, 'href');
        if (href) {
            links.push({ href, title: attrOf(link, 'title') });
        }
    }

    return {
        entryId,
        title: collapseWhitespace(textOf(entry['title']) ?? ''),
        authors,
        published,
        updated,
        utcOffsetMinutes: parseUtcOffset(publishedText),
        comment: nonEmpty(textOf(entry['arxiv:comment'])),
        journalRef: nonEmpty(textOf(entry['arxiv:journal_ref'])),
        doi: nonEmpty(textOf(entry['arxiv:doi'])),
        primaryCategory: attrOf(entry['arxiv:primary_category'], 'term') ?? categories[0] ?? '',
        categories,
        links,
        summary: (textOf(entry['summary']) ?? '').trim(),
    };
}

function parseTimestamp(text: string): Date {
    const date = new Date(text);
    if (isNaN(date.getTime())) {
        throw new FeedParseError(`Invalid timestamp in arXiv entry: ${text}`);
    }
    return date;
}
