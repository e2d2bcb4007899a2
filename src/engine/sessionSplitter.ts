// src/engine/sessionSplitter.ts

import { Session, TimeSlot } from '../models/LabSchedule';
import { CapacityProfile, DEFAULT_CAPACITY_PROFILE } from './capacity';

/**
 * Split one lab's chunk into forenoon and afternoon
 *
 * Pure function. Forenoon fills first; afternoon only receives the
 * overflow, capped at its own capacity.
 *
 * @param registerNumbers Chunk for one lab-day (at most lab capacity)
 * @returns [forenoon, afternoon]
 */
export function splitIntoSessions(
    registerNumbers: string[],
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): [string[], string[]] {
    const forenoon = registerNumbers.slice(0, profile.forenoonCapacity);
    const afternoon = registerNumbers.slice(
        profile.forenoonCapacity,
        profile.forenoonCapacity + profile.afternoonCapacity
    );
    return [forenoon, afternoon];
}

export function createTimeSlot(
    session: Session,
    registerNumbers: string[],
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): TimeSlot {
    return {
        time: session === Session.FORENOON ? profile.forenoonTime : profile.afternoonTime,
        session,
        capacity: registerNumbers.length,
        registerNumbers
    };
}

/**
 * Both time slots for a lab-day, always forenoon then afternoon
 */
export function generateTimeSlots(
    registerNumbers: string[],
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): [TimeSlot, TimeSlot] {
    const [forenoon, afternoon] = splitIntoSessions(registerNumbers, profile);
    return [
        createTimeSlot(Session.FORENOON, forenoon, profile),
        createTimeSlot(Session.AFTERNOON, afternoon, profile)
    ];
}
