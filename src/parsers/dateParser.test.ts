import { describe, expect, it } from 'vitest';
import { daysBetween, isValidExamDate, parseExamDate, sortDates } from './dateParser';

describe('parseExamDate', () => {
    it('reads DD-MM-YY as a calendar date', () => {
        const date = parseExamDate('05-09-25');
        expect(date?.getFullYear()).toBe(2025);
        expect(date?.getMonth()).toBe(8);
        expect(date?.getDate()).toBe(5);
    });

    it('ignores surrounding whitespace', () => {
        expect(isValidExamDate('  05-09-25 ')).toBe(true);
    });

    it('rejects impossible and differently formatted dates', () => {
        expect(parseExamDate('31-02-25')).toBeNull();
        expect(parseExamDate('2025-01-05')).toBeNull();
        expect(parseExamDate('05/09/25')).toBeNull();
        expect(parseExamDate('next monday')).toBeNull();
    });
});

describe('sortDates', () => {
    it('orders chronologically and puts malformed tokens last in input order', () => {
        expect(sortDates(['15-01-25', 'bad', '01-01-25', 'oops', '10-01-25']))
            .toEqual(['01-01-25', '10-01-25', '15-01-25', 'bad', 'oops']);
    });

    it('compares across month and year boundaries', () => {
        expect(sortDates(['01-01-26', '31-12-25', '01-02-25'])).toEqual(['01-02-25', '31-12-25', '01-01-26']);
    });

    it('returns trimmed tokens', () => {
        expect(sortDates([' 02-01-25', '01-01-25 '])).toEqual(['01-01-25', '02-01-25']);
    });

    it('yields a non-decreasing permutation of the input', () => {
        const tokens: string[] = [];
        for (let i = 0; i < 40; i++) {
            const day = ((i * 7) % 28) + 1;
            const month = ((i * 5) % 12) + 1;
            const year = 24 + (i % 3);
            tokens.push(`${String(day).padStart(2, '0')}-${String(month).padStart(2, '0')}-${year}`);
        }

        const sorted = sortDates(tokens);

        expect([...sorted].sort()).toEqual([...tokens].sort());
        for (let i = 1; i < sorted.length; i++) {
            const previous = parseExamDate(sorted[i - 1]);
            const current = parseExamDate(sorted[i]);
            expect(previous).not.toBeNull();
            expect(current).not.toBeNull();
            if (previous && current) {
                expect(previous.getTime()).toBeLessThanOrEqual(current.getTime());
            }
        }
    });
});

describe('daysBetween', () => {
    it('counts calendar days in either direction', () => {
        expect(daysBetween('10-01-25', '15-01-25')).toBe(5);
        expect(daysBetween('15-01-25', '10-01-25')).toBe(5);
        expect(daysBetween('28-02-25', '01-03-25')).toBe(1);
    });

    it('is null for malformed tokens', () => {
        expect(daysBetween('10-01-25', 'soon')).toBeNull();
    });
});
