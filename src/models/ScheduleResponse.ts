// src/models/ScheduleResponse.ts

import { Examiner } from './Examiner';
import { LabSchedule } from './LabSchedule';
import { ExamMetadata } from './ScheduleRequest';

/**
 * Structural error tied to a request field. Blocks allocation.
 */
export interface FieldError {
    field: string;
    message: string;
}

/**
 * Generated schedule
 */
export interface ScheduleResponse {
    examMetadata?: ExamMetadata;
    examiners: {
        internal: Examiner[];
        external: Examiner[];
    };
    schedule: LabSchedule[];
}

/**
 * Envelope returned by the generate operation
 *
 * warnings are advisory and never block; errors are structural.
 */
export interface ApiResponse {
    success: boolean;
    data?: ScheduleResponse;
    errors: FieldError[];
    warnings: string[];
}
