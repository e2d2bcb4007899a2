// src/formatter/scheduleFormatter.ts

import { Examiner } from '../models/Examiner';
import { LabSchedule } from '../models/LabSchedule';
import { ExamMetadata } from '../models/ScheduleRequest';
import { ScheduleResponse } from '../models/ScheduleResponse';
import { ScheduleResponseSchema } from '../validation/schemas';

export function formatScheduleResponse(
    examMetadata: ExamMetadata | undefined,
    internalExaminers: Examiner[],
    externalExaminers: Examiner[],
    schedules: LabSchedule[]
): ScheduleResponse {
    const response: ScheduleResponse = {
        examiners: {
            internal: internalExaminers,
            external: externalExaminers
        },
        schedule: schedules
    };
    if (examMetadata) {
        response.examMetadata = examMetadata;
    }
    return response;
}

export function scheduleToJson(response: ScheduleResponse): string {
    return JSON.stringify(response, null, 2);
}

/**
 * Parse a serialized schedule back into a ScheduleResponse
 *
 * @throws Error when the text is not JSON or does not match the schedule shape
 */
export function scheduleFromJson(json: string): ScheduleResponse {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (err) {
        throw new Error(`Schedule is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = ScheduleResponseSchema.safeParse(data);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        throw new Error(`Schedule does not match expected shape at ${first.path.join('.')}: ${first.message}`);
    }
    return parsed.data;
}

/**
 * Structural problems in a schedule, as readable lines (empty when sound)
 *
 * Metadata and examiners are optional; only the schedule entries are checked.
 */
export function validateScheduleSchema(response: ScheduleResponse): string[] {
    const errors: string[] = [];

    response.schedule.forEach((labSchedule, i) => {
        if (!labSchedule.date) {
            errors.push(`Missing schedule[${i}].date`);
        }
        if (!labSchedule.lab) {
            errors.push(`Missing schedule[${i}].lab`);
        }
        // Arrays from untyped JSON can be any length despite the tuple type
        const slots: unknown[] = labSchedule.slots;
        if (slots.length !== 2) {
            errors.push(`schedule[${i}] should have exactly 2 slots`);
            return;
        }
        labSchedule.slots.forEach((slot, j) => {
            if (!slot.time) {
                errors.push(`Missing schedule[${i}].slots[${j}].time`);
            }
            if (!slot.session) {
                errors.push(`Missing schedule[${i}].slots[${j}].session`);
            }
        });
    });

    return errors;
}
