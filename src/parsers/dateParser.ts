// src/parsers/dateParser.ts

import { differenceInCalendarDays, isValid, parse } from 'date-fns';

/**
 * Exam dates are always two-digit day, month and year, hyphen separated
 */
export const EXAM_DATE_FORMAT = 'dd-MM-yy';

// Two-digit years resolve within 50 years of this reference: 69-99 → 19xx, 00-68 → 20xx
const REFERENCE_DATE = new Date(2019, 0, 1);

/**
 * Parse a DD-MM-YY token
 *
 * @returns The calendar date, or null when the token is malformed or impossible
 */
export function parseExamDate(token: string): Date | null {
    const parsed = parse(token.trim(), EXAM_DATE_FORMAT, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
}

export function isValidExamDate(token: string): boolean {
    return parseExamDate(token) !== null;
}

/**
 * Sort date tokens chronologically
 *
 * Malformed tokens are kept, not dropped: they sort after every valid date
 * in their original relative order so validation can report them.
 * Tokens are returned trimmed.
 */
export function sortDates(tokens: string[]): string[] {
    const keyed = tokens.map(token => {
        const trimmed = token.trim();
        const date = parseExamDate(trimmed);
        return {
            token: trimmed,
            time: date === null ? Number.POSITIVE_INFINITY : date.getTime()
        };
    });

    // Array.prototype.sort is stable, so equal keys keep input order
    keyed.sort((a, b) => {
        if (a.time === b.time) {
            return 0;
        }
        return a.time < b.time ? -1 : 1;
    });

    return keyed.map(entry => entry.token);
}

/**
 * Absolute distance in calendar days between two DD-MM-YY tokens
 *
 * @returns null when either token is malformed
 */
export function daysBetween(first: string, second: string): number | null {
    const a = parseExamDate(first);
    const b = parseExamDate(second);
    if (a === null || b === null) {
        return null;
    }
    return Math.abs(differenceInCalendarDays(b, a));
}
