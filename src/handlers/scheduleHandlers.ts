// src/handlers/scheduleHandlers.ts

import { AllocationEngine } from '../engine/allocationEngine';
import { CapacityProfile, calculateRequiredDays, dailyCapacity } from '../engine/capacity';
import { autoScheduleDates } from '../engine/dateSelector';
import { buildDateMaps, collectRequestDates, collectRequestRegisterNumbers } from '../engine/requestReader';
import { formatScheduleResponse } from '../formatter/scheduleFormatter';
import { ExamDate, ScheduleRequest } from '../models/ScheduleRequest';
import { ApiResponse, FieldError } from '../models/ScheduleResponse';
import { sortDates } from '../parsers/dateParser';
import { removeDuplicates, summarizeDuplicates } from '../parsers/registerNumbers';
import { validateScheduleRequest } from '../validation/requestValidator';
import { AutoSelectDatesBody, RequirementsBody } from '../validation/schemas';

/**
 * Generate a schedule for a request
 *
 * Pipeline: collect register numbers → deduplicate → sort dates →
 * validate → allocate → format.
 *
 * Duplicates and soft problems become warnings. Structural errors return
 * success: false with no schedule.
 */
export function handleGenerateSchedule(
    request: ScheduleRequest,
    allocationEngine: AllocationEngine
): ApiResponse {
    const warnings: string[] = [];

    const { unique, duplicates } = removeDuplicates(collectRequestRegisterNumbers(request));
    if (duplicates.length > 0) {
        warnings.push(summarizeDuplicates(duplicates, 'removed'));
    }

    const dates = sortDates(collectRequestDates(request));
    const dateMaps = buildDateMaps(request);

    const validation = validateScheduleRequest(
        {
            registerNumbers: unique,
            dates,
            labs: request.labs,
            internalExaminers: request.internalExaminers,
            externalExaminers: request.externalExaminers,
            dateRosters: dateMaps.registerNumbers
        },
        allocationEngine.profile
    );
    warnings.push(...validation.warnings);

    if (validation.errors.length > 0) {
        return { success: false, errors: validation.errors, warnings };
    }

    const schedules = allocationEngine.allocate(unique, dates, validation.labs, {
        internalExaminers: request.internalExaminers,
        externalExaminers: request.externalExaminers,
        semesters: request.semesters,
        dateSubjects: dateMaps.subjects,
        dateRegisterNumbers: dateMaps.registerNumbers
    });

    return {
        success: true,
        data: formatScheduleResponse(
            request.examMetadata,
            request.internalExaminers,
            request.externalExaminers,
            schedules
        ),
        errors: [],
        warnings
    };
}

export interface ValidationReport {
    success: boolean;
    errors: FieldError[];
    warnings: string[];
    summary: {
        totalStudents: number;
        duplicatesFound: number;
        datesProvided: number;
        labsProvided: number;
        internalExaminers: number;
        externalExaminers: number;
        semesters: number;
    };
}

/**
 * Validate a request without allocating
 */
export function handleValidateSchedule(
    request: ScheduleRequest,
    profile: CapacityProfile
): ValidationReport {
    const warnings: string[] = [];

    const { unique, duplicates } = removeDuplicates(collectRequestRegisterNumbers(request));
    if (duplicates.length > 0) {
        warnings.push(summarizeDuplicates(duplicates, 'found'));
    }

    const dates = collectRequestDates(request);
    const validation = validateScheduleRequest(
        {
            registerNumbers: unique,
            dates,
            labs: request.labs,
            internalExaminers: request.internalExaminers,
            externalExaminers: request.externalExaminers,
            dateRosters: buildDateMaps(request).registerNumbers
        },
        profile
    );
    warnings.push(...validation.warnings);

    return {
        success: validation.errors.length === 0,
        errors: validation.errors,
        warnings,
        summary: {
            totalStudents: unique.length,
            duplicatesFound: duplicates.length,
            datesProvided: dates.length,
            labsProvided: request.labs.length,
            internalExaminers: request.internalExaminers.length,
            externalExaminers: request.externalExaminers.length,
            semesters: request.semesters.length
        }
    };
}

export interface DateSelectionReport {
    success: true;
    selectedDates: string[];
    examDates: ExamDate[];
    requiredDays: number;
    availableDays: number;
    studentsPerDay: number;
    message: string;
    scheduleInfo: {
        totalStudents: number;
        daysNeeded: number;
        daysSelected: number;
        minGapRequested: number;
    };
}

/**
 * Choose exam dates from an available pool for capacity planning
 */
export function handleAutoSelectDates(
    body: AutoSelectDatesBody,
    profile: CapacityProfile
): DateSelectionReport {
    const requiredDays = calculateRequiredDays(body.studentCount, profile);
    const { examDates, message } = autoScheduleDates(
        body.availableDates,
        body.studentCount,
        body.minGapDays,
        body.subjects ?? [],
        profile
    );
    const selectedDates = examDates.map(examDate => examDate.date);

    return {
        success: true,
        selectedDates,
        examDates,
        requiredDays,
        availableDays: body.availableDates.length,
        studentsPerDay: dailyCapacity(profile),
        message,
        scheduleInfo: {
            totalStudents: body.studentCount,
            daysNeeded: requiredDays,
            daysSelected: selectedDates.length,
            minGapRequested: body.minGapDays
        }
    };
}

export interface RequirementsReport {
    studentCount: number;
    dailyCapacity: number;
    requiredDays: number;
    availableDates: number;
    datesSufficient: boolean | null;       // null when no date count was given
    additionalDatesNeeded: number | null;
}

export function handleCalculateRequirements(
    body: RequirementsBody,
    profile: CapacityProfile
): RequirementsReport {
    const requiredDays = calculateRequiredDays(body.studentCount, profile);
    const known = body.availableDates > 0;

    return {
        studentCount: body.studentCount,
        dailyCapacity: dailyCapacity(profile),
        requiredDays,
        availableDates: body.availableDates,
        datesSufficient: known ? body.availableDates >= requiredDays : null,
        additionalDatesNeeded: known ? Math.max(0, requiredDays - body.availableDates) : null
    };
}
