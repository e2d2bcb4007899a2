// src/engine/allocationEngine.ts

import { Semester } from '../models/Cohort';
import { Examiner } from '../models/Examiner';
import { LabSchedule } from '../models/LabSchedule';
import { CapacityProfile, DEFAULT_CAPACITY_PROFILE, labCapacity } from './capacity';
import { CohortLookup, buildCohortLookup, resolveCohort } from './cohortResolver';
import { generateTimeSlots } from './sessionSplitter';

/**
 * Optional inputs to an allocation run
 */
export interface AllocationOptions {
    internalExaminers?: Examiner[];
    externalExaminers?: Examiner[];
    semesters?: Semester[];
    dateSubjects?: Map<string, string>;
    /** When non-empty, each date draws from its own roster instead of the shared list */
    dateRegisterNumbers?: Map<string, string[]>;
}

interface DayContext {
    labs: string[];
    internalExaminers: Examiner[];
    externalExaminers: Examiner[];
    cohorts: CohortLookup;
    dateSubjects: Map<string, string>;
}

/**
 * Core allocation engine - places register numbers into lab-days and sessions
 *
 * Pure and stateless: every call builds fresh schedules from its arguments.
 *
 * Invariants of the output:
 * - Every input register number appears exactly once, in input order when
 *   read date → lab → forenoon → afternoon
 * - No lab-day exceeds lab capacity; forenoon fills before afternoon
 * - No date uses more than labsPerDay labs
 * - Lab-days that would be empty are not emitted
 */
export class AllocationEngine {
    readonly profile: CapacityProfile;

    constructor(profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE) {
        this.profile = profile;
    }

    /**
     * Allocate register numbers across dates and labs
     *
     * Sequential mode walks dates then labs, taking the next chunk of the
     * shared list each time, and stops once the list runs out.
     * Date-keyed mode (dateRegisterNumbers supplied) chunks each date's own
     * roster independently; dates without a roster get nothing.
     *
     * @param registerNumbers Deduplicated register numbers (order preserved)
     * @param dates Exam dates, already sorted
     * @param labs Lab names; only the first labsPerDay are used each day
     * @returns Lab schedules ordered by date, then lab
     */
    allocate(
        registerNumbers: string[],
        dates: string[],
        labs: string[],
        options: AllocationOptions = {}
    ): LabSchedule[] {
        const context: DayContext = {
            labs: labs.slice(0, this.profile.labsPerDay),
            internalExaminers: options.internalExaminers ?? [],
            externalExaminers: options.externalExaminers ?? [],
            cohorts: buildCohortLookup(options.semesters ?? []),
            dateSubjects: options.dateSubjects ?? new Map<string, string>()
        };

        const schedules: LabSchedule[] = [];
        const dateRosters = options.dateRegisterNumbers;

        if (dateRosters && dateRosters.size > 0) {
            for (const date of dates) {
                const roster = dateRosters.get(date) ?? [];
                schedules.push(...this.allocateDay(date, roster, 0, context).schedules);
            }
            return schedules;
        }

        let nextIndex = 0;
        for (const date of dates) {
            if (nextIndex >= registerNumbers.length) {
                break; // Everyone placed
            }

            const day = this.allocateDay(date, registerNumbers, nextIndex, context);
            schedules.push(...day.schedules);
            nextIndex = day.nextIndex;
        }

        return schedules;
    }

    /**
     * Fill one date's labs from pool, starting at startIndex
     *
     * @returns Schedules for the date and the index of the first unplaced entry
     */
    private allocateDay(
        date: string,
        pool: string[],
        startIndex: number,
        context: DayContext
    ): { schedules: LabSchedule[]; nextIndex: number } {
        const schedules: LabSchedule[] = [];
        const chunkSize = labCapacity(this.profile);
        let index = startIndex;

        for (let labIndex = 0; labIndex < context.labs.length; labIndex++) {
            if (index >= pool.length) {
                break;
            }

            const chunk = pool.slice(index, index + chunkSize);
            schedules.push(this.createLabSchedule(date, labIndex, chunk, context));
            index += chunk.length;
        }

        return { schedules, nextIndex: index };
    }

    private createLabSchedule(
        date: string,
        labIndex: number,
        chunk: string[],
        context: DayContext
    ): LabSchedule {
        const schedule: LabSchedule = {
            date,
            lab: context.labs[labIndex],
            slots: generateTimeSlots(chunk, this.profile)
        };

        const subject = context.dateSubjects.get(date);
        if (subject !== undefined) {
            schedule.subject = subject;
        }

        // Examiners cycle by lab position within the day, not across days
        const internal = pickExaminer(context.internalExaminers, labIndex);
        if (internal) {
            schedule.internalExaminer = internal;
        }
        const external = pickExaminer(context.externalExaminers, labIndex);
        if (external) {
            schedule.externalExaminer = external;
        }

        const cohort = resolveCohort(chunk, context.cohorts);
        if (cohort.semester !== undefined) {
            schedule.semester = cohort.semester;
        }
        if (cohort.batch !== undefined) {
            schedule.batch = cohort.batch;
        }

        return schedule;
    }
}

function pickExaminer(pool: Examiner[], labIndex: number): Examiner | undefined {
    if (pool.length === 0) {
        return undefined;
    }
    return pool[labIndex % pool.length];
}

/**
 * Flatten schedules back to register numbers, date → lab → forenoon → afternoon
 */
export function collectRegisterNumbers(schedules: LabSchedule[]): string[] {
    const all: string[] = [];
    for (const schedule of schedules) {
        for (const slot of schedule.slots) {
            all.push(...slot.registerNumbers);
        }
    }
    return all;
}

export function countStudentsPerLab(schedules: LabSchedule[]): number[] {
    return schedules.map(schedule =>
        schedule.slots.reduce((sum, slot) => sum + slot.registerNumbers.length, 0)
    );
}

export function countStudentsPerDate(schedules: LabSchedule[]): Map<string, number> {
    const counts = new Map<string, number>();
    const perLab = countStudentsPerLab(schedules);
    schedules.forEach((schedule, i) => {
        counts.set(schedule.date, (counts.get(schedule.date) ?? 0) + perLab[i]);
    });
    return counts;
}
