// src/validation/schemas.ts

import { z } from 'zod';
import { FieldError } from '../models/ScheduleResponse';
import { Session } from '../models/LabSchedule';
import { parseExaminer } from '../parsers/examiners';

/**
 * Wire schemas for request bodies and serialized schedules
 *
 * Shape checks only. Domain rules (at least one register number, date
 * format) belong to the request validator, which reports them as field
 * errors and warnings instead of rejecting the body.
 */

const optionalText = z.string().optional();

export const ExaminerSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1)
});

/**
 * Request examiners come as { id, name } or as typed "ID: Name" text
 */
export const ExaminerInputSchema = z.union([
    ExaminerSchema,
    z.string()
        .transform((text, ctx) => {
            try {
                return parseExaminer(text.trim());
            } catch (err) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: err instanceof Error ? err.message : String(err)
                });
                return z.NEVER;
            }
        })
        .pipe(ExaminerSchema)
]);

export const BatchSchema = z.object({
    name: z.string().min(1),
    registerNumbers: z.array(z.string()).default([])
});

export const SemesterSchema = z.object({
    name: z.string().min(1),
    batches: z.array(BatchSchema).default([])
});

export const ExamMetadataSchema = z.object({
    examName: optionalText,
    semester: optionalText,
    department: optionalText,
    academicYear: optionalText
});

export const ExamDateSchema = z.object({
    date: z.string(),
    subject: optionalText,
    registerNumbers: z.array(z.string()).default([])
});

export const ScheduleRequestSchema = z.object({
    examMetadata: ExamMetadataSchema.optional(),
    registerNumbers: z.array(z.string()).default([]),
    semesters: z.array(SemesterSchema).default([]),
    dates: z.array(z.string()).default([]),
    examDates: z.array(ExamDateSchema).default([]),
    labs: z.array(z.string()).default([]),
    internalExaminers: z.array(ExaminerInputSchema).default([]),
    externalExaminers: z.array(ExaminerInputSchema).default([])
});

export const AutoSelectDatesSchema = z.object({
    availableDates: z.array(z.string()),
    studentCount: z.number().int().nonnegative(),
    minGapDays: z.number().int().default(1),
    subjects: z.array(z.string()).optional()
});

export const RequirementsSchema = z.object({
    studentCount: z.number().int().nonnegative(),
    availableDates: z.number().int().nonnegative().default(0)
});

const TimeSlotSchema = z.object({
    time: z.string(),
    session: z.nativeEnum(Session),
    capacity: z.number().int().nonnegative(),
    registerNumbers: z.array(z.string())
});

export const LabScheduleSchema = z.object({
    date: z.string(),
    subject: optionalText,
    lab: z.string(),
    slots: z.tuple([TimeSlotSchema, TimeSlotSchema]),
    internalExaminer: ExaminerSchema.optional(),
    externalExaminer: ExaminerSchema.optional(),
    semester: optionalText,
    batch: optionalText
});

export const ScheduleResponseSchema = z.object({
    examMetadata: ExamMetadataSchema.optional(),
    examiners: z.object({
        internal: z.array(ExaminerSchema).default([]),
        external: z.array(ExaminerSchema).default([])
    }),
    schedule: z.array(LabScheduleSchema).default([])
});

export type ScheduleRequestBody = z.infer<typeof ScheduleRequestSchema>;
export type AutoSelectDatesBody = z.infer<typeof AutoSelectDatesSchema>;
export type RequirementsBody = z.infer<typeof RequirementsSchema>;

/**
 * Flatten zod issues into field-tagged errors (path joined with dots)
 */
export function toFieldErrors(error: z.ZodError): FieldError[] {
    return error.issues.map(issue => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'body',
        message: issue.message
    }));
}
