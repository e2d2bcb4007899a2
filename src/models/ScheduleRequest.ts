// src/models/ScheduleRequest.ts

import { Semester } from './Cohort';
import { Examiner } from './Examiner';

/**
 * Exam metadata - every field optional
 */
export interface ExamMetadata {
    examName?: string;
    semester?: string;
    department?: string;
    academicYear?: string;
}

/**
 * Exam date with an optional subject and an optional pre-assigned roster
 */
export interface ExamDate {
    date: string;               // DD-MM-YY
    subject?: string;
    registerNumbers: string[];
}

/**
 * Schedule generation request
 *
 * Register numbers come from the first non-empty source, in this order:
 * examDates rosters, semester batches, the flat registerNumbers list.
 * Dates come from examDates when present, otherwise from dates.
 */
export interface ScheduleRequest {
    examMetadata?: ExamMetadata;
    registerNumbers: string[];
    semesters: Semester[];
    dates: string[];
    examDates: ExamDate[];
    labs: string[];
    internalExaminers: Examiner[];
    externalExaminers: Examiner[];
}
