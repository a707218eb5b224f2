/**
 * PaperRecord — a single search result as returned by the arXiv API.
 * Read-only to the report pipeline.
 */
export interface PaperRecord {
    /** Canonical abstract-page URL, e.g. "http://arxiv.org/abs/2401.01234v1" */
    entryId: string;

    /** Title with runs of whitespace collapsed to single spaces */
    title: string;

    /** Author names in listing order */
    authors: string[];

    /** Submission instant of the first version */
    published: Date;

    /** Instant of the latest revision (equals `published` for unrevised papers) */
    updated: Date;

    /** Offset from UTC, in minutes, the service stamped on the timestamps */
    utcOffsetMinutes: number;

    /** Author comment (page count, venue, ...) */
    comment: string | null;

    /** Journal reference, if the paper has been published */
    journalRef: string | null;

    /** DOI of the published version */
    doi: string | null;

    primaryCategory: string;

    categories: string[];

    /** Related links: abstract page, pdf, resolved DOI */
    links: PaperLink[];

    /** Abstract text */
    summary: string;
}

export interface PaperLink {
    href: string;
    title: string | null;
}
