// src/routes/scheduleRoutes.ts

import { Router, Request, Response } from 'express';
import { AllocationEngine } from '../engine/allocationEngine';
import {
    handleAutoSelectDates,
    handleCalculateRequirements,
    handleGenerateSchedule,
    handleValidateSchedule
} from '../handlers/scheduleHandlers';
import {
    AutoSelectDatesSchema,
    RequirementsSchema,
    ScheduleRequestSchema,
    toFieldErrors
} from '../validation/schemas';
import { z } from 'zod';

/**
 * Schedule routes - HTTP mapping only
 * Business logic delegated to handlers
 */
export function createScheduleRoutes(allocationEngine: AllocationEngine): Router {
    const router = Router();
    const profile = allocationEngine.profile;

    function rejectBody(res: Response, error: z.ZodError): void {
        res.status(400).json({ success: false, errors: toFieldErrors(error), warnings: [] });
    }

    /**
     * Generate a schedule
     * POST /api/schedule/generate
     * Body: ScheduleRequest
     */
    router.post('/generate', (req: Request, res: Response) => {
        const parsed = ScheduleRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            rejectBody(res, parsed.error);
            return;
        }

        res.json(handleGenerateSchedule(parsed.data, allocationEngine));
    });

    /**
     * Validate without generating
     * POST /api/schedule/validate
     * Body: ScheduleRequest
     */
    router.post('/validate', (req: Request, res: Response) => {
        const parsed = ScheduleRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            rejectBody(res, parsed.error);
            return;
        }

        res.json(handleValidateSchedule(parsed.data, profile));
    });

    /**
     * Pick exam dates from an available pool
     * POST /api/schedule/auto-select-dates
     * Body: { availableDates, studentCount, minGapDays?, subjects? }
     */
    router.post('/auto-select-dates', (req: Request, res: Response) => {
        const parsed = AutoSelectDatesSchema.safeParse(req.body);
        if (!parsed.success) {
            rejectBody(res, parsed.error);
            return;
        }

        res.json(handleAutoSelectDates(parsed.data, profile));
    });

    /**
     * Days needed for a head count
     * POST /api/schedule/calculate-requirements
     * Body: { studentCount, availableDates? }
     */
    router.post('/calculate-requirements', (req: Request, res: Response) => {
        const parsed = RequirementsSchema.safeParse(req.body);
        if (!parsed.success) {
            rejectBody(res, parsed.error);
            return;
        }

        res.json(handleCalculateRequirements(parsed.data, profile));
    });

    return router;
}
