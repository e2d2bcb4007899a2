// src/models/LabSchedule.ts

import { Examiner } from './Examiner';

/**
 * Daily exam sessions, in the order they run
 */
export enum Session {
    FORENOON = 'forenoon',
    AFTERNOON = 'afternoon'
}

/**
 * One session of a lab-day
 *
 * capacity records how many register numbers were placed in the slot.
 */
export interface TimeSlot {
    time: string;               // e.g. "09:30 am - 12:30 pm"
    session: Session;
    capacity: number;
    registerNumbers: string[];
}

/**
 * Lab schedule - one lab on one exam date
 *
 * Invariant: slots is always [forenoon, afternoon], both present even when empty
 * Invariant: total register numbers across slots <= lab capacity
 * Invariant: afternoon is non-empty only if forenoon is full
 */
export interface LabSchedule {
    date: string;               // DD-MM-YY
    subject?: string;
    lab: string;
    slots: [TimeSlot, TimeSlot];
    internalExaminer?: Examiner;
    externalExaminer?: Examiner;
    semester?: string;
    batch?: string;             // Single batch label, or sorted comma list when mixed
}
