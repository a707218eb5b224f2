import type { PaperRecord } from '../types/index.js';
import { formatDate } from '../utils/dates.js';

export const SEPARATOR = '********************';

/**
 * Render one paper as a Markdown-flavoured text block.
 * Optional fields (comment, journal, DOI, extra links) are left out when absent.
 */
export function formatPaper(record: PaperRecord): string {
    const offset = record.utcOffsetMinutes;
    const lines: string[] = [];

    lines.push(`# ${record.title}`);
    lines.push(`- URL: ${record.entryId}`);

    let published = `- Published: ${formatDate(record.published, offset)}`;
    if (record.updated.getTime() !== record.published.getTime()) {
        published += ` (updated ${formatDate(record.updated, offset)})`;
    }
    lines.push(published);

    lines.push(`- Authors: ${record.authors.join(', ')}`);
    if (record.comment) lines.push(`- Comments: ${record.comment}`);
    if (record.journalRef) lines.push(`- Journal: ${record.journalRef}`);
    if (record.doi) lines.push(`- DOI: ${record.doi}`);
    lines.push(`- Primary category: ${record.primaryCategory}`);
    lines.push(`- Categories: ${record.categories.join(', ')}`);

    // Only titled links other than the pdf (in practice, the resolved DOI)
    const links = record.links
        .filter((link) => link.title && link.title !== 'pdf')
        .map((link) => link.href);
    if (links.length > 0) {
        lines.push(`- Links: ${links.join(', ')}`);
    }

    lines.push(`- Abstract: "${record.summary}"`);
    return lines.join('\n');
}

export interface ReportContent {
    includeUpdates: boolean;
    /** Every day of the window, oldest first */
    days: string[];
    dateToCount: Map<string, number>;
    papers: PaperRecord[];
}

/**
 * Render the full report: per-day histogram, separator, then one block per paper.
 */
export function renderReport(content: ReportContent): string {
    const basis = content.includeUpdates ? 'update' : 'submission';
    let out = `# Distribution of paper count by date of ${basis}\n`;

    for (const day of content.days) {
        out += `- ${day}: ${content.dateToCount.get(day) ?? 0}\n`;
    }

    out += `\n${SEPARATOR}\n\n`;

    for (const paper of content.papers) {
        out += formatPaper(paper) + '\n\n\n';
    }

    return out;
}
