// src/validation/requestValidator.ts

import {
    CapacityProfile,
    DEFAULT_CAPACITY_PROFILE,
    DEFAULT_LABS,
    calculateAdditionalDaysNeeded,
    calculateRequiredDays,
    labCapacity
} from '../engine/capacity';
import { Examiner } from '../models/Examiner';
import { FieldError } from '../models/ScheduleResponse';
import { isValidExamDate } from '../parsers/dateParser';

/**
 * Normalized inputs to validation: deduplicated register numbers and the
 * date list the allocation will use
 */
export interface ValidationInput {
    registerNumbers: string[];
    dates: string[];
    labs: string[];
    internalExaminers: Examiner[];
    externalExaminers: Examiner[];
    /** Per-date rosters when each exam date carries its own candidates */
    dateRosters?: Map<string, string[]>;
}

export interface ValidationResult {
    errors: FieldError[];   // Structural, block allocation
    warnings: string[];     // Advisory only
    labs: string[];         // Labs to allocate with (defaults when none given)
}

export function validateRegisterNumbers(registerNumbers: string[]): FieldError | null {
    if (registerNumbers.length === 0) {
        return {
            field: 'registerNumbers',
            message: 'At least one register number is required to generate a schedule'
        };
    }
    return null;
}

/**
 * Check date tokens and whether there are enough of them
 *
 * Missing or too few dates only warn. The first malformed token is a
 * field error.
 */
export function validateDates(
    dates: string[],
    studentCount: number,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): { error: FieldError | null; warning: string | null } {
    if (dates.length === 0) {
        return { error: null, warning: 'No dates provided. Please add exam dates for scheduling.' };
    }

    const malformed = dates.find(date => !isValidExamDate(date));
    if (malformed !== undefined) {
        return {
            error: { field: 'dates', message: `Invalid date format: ${malformed}. Expected DD-MM-YY` },
            warning: null
        };
    }

    if (calculateAdditionalDaysNeeded(studentCount, dates.length, profile) > 0) {
        const required = calculateRequiredDays(studentCount, profile);
        return {
            error: null,
            warning: `Note: ${studentCount} students may need ${required} dates. You provided ${dates.length}.`
        };
    }

    return { error: null, warning: null };
}

/**
 * Advisories for exam dates whose own roster will not fit on the day
 *
 * Capacity counts only the labs actually used, at most labsPerDay of them.
 */
export function validateDateRosters(
    dateRosters: Map<string, string[]>,
    labCount: number,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): string[] {
    const capacity = labCapacity(profile) * Math.min(labCount, profile.labsPerDay);
    const warnings: string[] = [];

    for (const [date, roster] of dateRosters) {
        if (roster.length > capacity) {
            warnings.push(
                `${date}: ${roster.length - capacity} of ${roster.length} students will not be placed (capacity ${capacity} per day)`
            );
        }
    }

    return warnings;
}

/**
 * Validate a schedule request without allocating
 *
 * Only two things fail a request: no register numbers, and a malformed
 * date. Everything else is defaulted and reported as a warning.
 */
export function validateScheduleRequest(
    input: ValidationInput,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): ValidationResult {
    const errors: FieldError[] = [];
    const warnings: string[] = [];

    const registerError = validateRegisterNumbers(input.registerNumbers);
    if (registerError) {
        errors.push(registerError);
    }

    let labs = input.labs;
    if (labs.length === 0) {
        labs = DEFAULT_LABS.slice(0, profile.labsPerDay);
        warnings.push(`Using default labs: ${labs.join(', ')}`);
    } else if (labs.length > profile.labsPerDay) {
        warnings.push(`Only the first ${profile.labsPerDay} labs are used per exam day`);
    }

    if (input.internalExaminers.length === 0) {
        warnings.push('No internal examiners provided. Schedule will be generated without examiner assignments.');
    }
    if (input.externalExaminers.length === 0) {
        warnings.push('No external examiners provided. Schedule will be generated without examiner assignments.');
    }

    // Dates only matter once there is someone to schedule
    if (input.registerNumbers.length > 0) {
        const { error, warning } = validateDates(input.dates, input.registerNumbers.length, profile);
        if (error) {
            errors.push(error);
        }
        if (warning) {
            warnings.push(warning);
        }
        if (input.dateRosters) {
            warnings.push(...validateDateRosters(input.dateRosters, labs.length, profile));
        }
    }

    return { errors, warnings, labs };
}
