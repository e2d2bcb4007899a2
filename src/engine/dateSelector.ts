// src/engine/dateSelector.ts

import { ExamDate } from '../models/ScheduleRequest';
import { daysBetween, isValidExamDate, sortDates } from '../parsers/dateParser';
import { CapacityProfile, DEFAULT_CAPACITY_PROFILE, calculateRequiredDays } from './capacity';

export interface DateSelection {
    selectedDates: string[];
    message: string;  // Human-readable explanation, may carry an advisory
}

/**
 * Pick the fewest exam dates that fit the head count
 *
 * Pure function - never throws, degrades through the message instead
 *
 * Steps:
 * 1. Required days = ceil(studentCount / daily capacity)
 * 2. Drop malformed dates, sort the rest chronologically
 * 3. Short pool: return all of it with a warning
 * 4. One day needed: earliest date
 * 5. minGapDays <= 1: first N dates
 * 6. Otherwise greedy walk keeping >= minGapDays between accepted dates,
 *    relaxing to the first N dates if the walk comes up short
 *
 * @param availableDates Candidate dates in DD-MM-YY, any order
 * @param studentCount Total register numbers to place
 * @param minGapDays Minimum distance between consecutive exam dates
 */
export function selectOptimalDates(
    availableDates: string[],
    studentCount: number,
    minGapDays: number = 1,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): DateSelection {
    if (availableDates.length === 0) {
        return { selectedDates: [], message: 'No dates provided' };
    }

    const requiredDays = calculateRequiredDays(studentCount, profile);
    if (requiredDays === 0) {
        return { selectedDates: [], message: 'No students to schedule' };
    }

    const sortedDates = sortDates(availableDates.filter(isValidExamDate));
    if (sortedDates.length === 0) {
        return { selectedDates: [], message: 'No valid dates provided' };
    }

    if (sortedDates.length < requiredDays) {
        return {
            selectedDates: sortedDates,
            message: `Warning: Only ${sortedDates.length} dates available, need ${requiredDays} for ${studentCount} students`
        };
    }

    if (requiredDays === 1) {
        return {
            selectedDates: [sortedDates[0]],
            message: `Selected 1 date for ${studentCount} students`
        };
    }

    let selected: string[];

    if (minGapDays <= 1) {
        selected = sortedDates.slice(0, requiredDays);
    } else {
        selected = pickWithGap(sortedDates, requiredDays, minGapDays);

        if (selected.length < requiredDays) {
            selected = sortedDates.slice(0, requiredDays);
            return {
                selectedDates: selected,
                message: `Selected ${selected.length} dates (gap constraint relaxed due to limited dates)`
            };
        }
    }

    return { selectedDates: selected, message: describeSelection(selected, studentCount) };
}

/**
 * Greedy walk from the earliest date, accepting a date only when it sits
 * at least minGapDays after the last accepted one
 */
function pickWithGap(sortedDates: string[], requiredDays: number, minGapDays: number): string[] {
    const selected = [sortedDates[0]];

    for (const date of sortedDates.slice(1)) {
        if (selected.length >= requiredDays) {
            break;
        }

        const gap = daysBetween(selected[selected.length - 1], date);
        if (gap !== null && gap >= minGapDays) {
            selected.push(date);
        }
    }

    return selected;
}

function describeSelection(selected: string[], studentCount: number): string {
    const gaps: number[] = [];
    for (let i = 1; i < selected.length; i++) {
        const gap = daysBetween(selected[i - 1], selected[i]);
        if (gap !== null) {
            gaps.push(gap);
        }
    }

    let message = `Selected ${selected.length} dates for ${studentCount} students`;
    if (gaps.length > 0) {
        const averageGap = gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length;
        message += ` (avg gap: ${averageGap.toFixed(1)} days)`;
    }
    return message;
}

/**
 * Select dates and pair them with subjects in order
 *
 * The i-th selected date gets the i-th subject when one exists. Rosters are
 * left empty for the caller to fill.
 */
export function autoScheduleDates(
    availableDates: string[],
    studentCount: number,
    minGapDays: number = 1,
    subjects: string[] = [],
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): { examDates: ExamDate[]; message: string } {
    const { selectedDates, message } = selectOptimalDates(availableDates, studentCount, minGapDays, profile);

    const examDates = selectedDates.map((date, i): ExamDate => ({
        date,
        subject: i < subjects.length ? subjects[i] : undefined,
        registerNumbers: []
    }));

    return { examDates, message };
}
