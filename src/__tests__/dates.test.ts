import { describe, it, expect } from 'vitest';
import { formatDate, parseUtcOffset, windowDays, windowStart } from '../utils/dates.js';

describe('dates', () => {
    describe('parseUtcOffset', () => {
        it('should read Z as UTC', () => {
            expect(parseUtcOffset('2024-03-05T09:00:00Z')).toBe(0);
        });

        it('should read positive offsets with a colon', () => {
            expect(parseUtcOffset('2024-03-05T09:00:00+05:30')).toBe(330);
        });

        it('should read negative offsets without a colon', () => {
            expect(parseUtcOffset('2024-03-05T09:00:00-0500')).toBe(-300);
        });

        it('should reject timestamps without a designator', () => {
            expect(() => parseUtcOffset('2024-03-05T09:00:00')).toThrow('no timezone designator');
        });
    });

    describe('formatDate', () => {
        it('should format on the UTC calendar', () => {
            expect(formatDate(new Date('2024-03-10T02:00:00Z'), 0)).toBe('2024-03-10');
        });

        it('should shift to the calendar of the offset', () => {
            expect(formatDate(new Date('2024-03-10T02:00:00Z'), -300)).toBe('2024-03-09');
            expect(formatDate(new Date('2024-03-09T20:00:00Z'), 330)).toBe('2024-03-10');
        });
    });

    describe('windowStart', () => {
        it('should return midnight nbDays before now', () => {
            const start = windowStart(new Date('2024-03-10T12:00:00Z'), 3, 0);
            expect(start.toISOString()).toBe('2024-03-07T00:00:00.000Z');
        });

        it('should take midnight in the given offset', () => {
            // 2024-03-09 22:00 at UTC-5
            const start = windowStart(new Date('2024-03-10T03:00:00Z'), 2, -300);
            expect(start.toISOString()).toBe('2024-03-07T05:00:00.000Z');
        });

        it('should cross month and leap-day boundaries', () => {
            const start = windowStart(new Date('2024-03-01T06:00:00Z'), 1, 0);
            expect(start.toISOString()).toBe('2024-02-29T00:00:00.000Z');
        });
    });

    describe('windowDays', () => {
        it('should list every day of the window, oldest first', () => {
            const start = new Date('2024-03-07T00:00:00Z');
            expect(windowDays(start, 3, 0)).toEqual(['2024-03-07', '2024-03-08', '2024-03-09']);
        });

        it('should label days in the given offset', () => {
            const start = new Date('2024-03-07T05:00:00Z');
            expect(windowDays(start, 2, -300)).toEqual(['2024-03-07', '2024-03-08']);
        });
    });
});
