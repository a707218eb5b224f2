/**
 * Calendar helpers for timestamps carrying a fixed UTC offset.
 *
 * arXiv stamps every record in a single service-defined zone. Window
 * boundaries and per-day buckets are computed in that zone, not in the
 * zone of the machine running the report.
 */

const MS_PER_MINUTE = 60 * 1000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

const OFFSET_PATTERN = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Read the UTC offset, in minutes, of an ISO-8601 timestamp.
 * "2024-01-05T10:00:00Z" → 0, "2024-01-05T10:00:00+05:30" → 330.
 */
export function parseUtcOffset(timestamp: string): number {
    const match = timestamp.trim().match(OFFSET_PATTERN);
    if (!match?.[1]) {
        throw new Error(`Timestamp has no timezone designator: ${timestamp}`);
    }

    const designator = match[1];
    if (designator.toUpperCase() === 'Z') return 0;

    const sign = designator.startsWith('-') ? -1 : 1;
    const digits = designator.slice(1).replace(':', '');
    const hours = parseInt(digits.slice(0, 2), 10);
    const minutes = parseInt(digits.slice(2, 4), 10);
    return sign * (hours * 60 + minutes);
}

/**
 * Format an instant as YYYY-MM-DD on the calendar of the given offset.
 */
export function formatDate(instant: Date, utcOffsetMinutes: number): string {
    const shifted = new Date(instant.getTime() + utcOffsetMinutes * MS_PER_MINUTE);
    return shifted.toISOString().slice(0, 10);
}

/**
 * Midnight, in the given offset, of the day `nbDays` days before `now`.
 */
export function windowStart(now: Date, nbDays: number, utcOffsetMinutes: number): Date {
    const local = new Date(now.getTime() + utcOffsetMinutes * MS_PER_MINUTE - nbDays * MS_PER_DAY);
    const localMidnight = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate());
    return new Date(localMidnight - utcOffsetMinutes * MS_PER_MINUTE);
}

/**
 * The `nbDays` calendar days starting at `start`, oldest first.
 */
export function windowDays(start: Date, nbDays: number, utcOffsetMinutes: number): string[] {
    return Array.from({ length: nbDays }, (_, i) =>
        formatDate(new Date(start.getTime() + i * MS_PER_DAY), utcOffsetMinutes)
    );
}
