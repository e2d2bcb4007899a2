// src/engine/requestReader.ts

import { ScheduleRequest } from '../models/ScheduleRequest';

/**
 * Per-date lookups derived from request.examDates
 */
export interface DateMaps {
    subjects: Map<string, string>;
    registerNumbers: Map<string, string[]>;  // Only dates with a non-empty roster
}

/**
 * All register numbers of a request, from the first source that has any
 *
 * Order: examDates rosters, then semester batches, then the flat list.
 * Duplicates are left in; the deduplicator runs next.
 */
export function collectRequestRegisterNumbers(request: ScheduleRequest): string[] {
    const fromExamDates = request.examDates.flatMap(examDate => examDate.registerNumbers);
    if (fromExamDates.length > 0) {
        return fromExamDates;
    }

    if (request.semesters.length > 0) {
        return request.semesters.flatMap(semester =>
            semester.batches.flatMap(batch => batch.registerNumbers)
        );
    }

    return request.registerNumbers;
}

export function collectRequestDates(request: ScheduleRequest): string[] {
    if (request.examDates.length > 0) {
        return request.examDates.map(examDate => examDate.date);
    }
    return request.dates;
}

/**
 * Keys are trimmed so they line up with the sorted date list
 *
 * A register number listed under several exam dates stays only on the
 * first, matching the deduplicated request roster. Entries sharing a date
 * are merged.
 */
export function buildDateMaps(request: ScheduleRequest): DateMaps {
    const subjects = new Map<string, string>();
    const registerNumbers = new Map<string, string[]>();
    const placed = new Set<string>();

    for (const examDate of request.examDates) {
        const date = examDate.date.trim();
        if (examDate.subject) {
            subjects.set(date, examDate.subject);
        }

        const roster = examDate.registerNumbers.filter(registerNumber => {
            if (placed.has(registerNumber)) {
                return false;
            }
            placed.add(registerNumber);
            return true;
        });
        if (roster.length > 0) {
            registerNumbers.set(date, [...(registerNumbers.get(date) ?? []), ...roster]);
        }
    }

    return { subjects, registerNumbers };
}
