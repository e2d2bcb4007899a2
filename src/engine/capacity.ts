// src/engine/capacity.ts

/**
 * Capacity profile for one exam lab
 *
 * Threaded through the allocation engine, date selector and validator so an
 * alternate profile (e.g. smaller labs) needs no code changes.
 */
export interface CapacityProfile {
    forenoonCapacity: number;   // Max register numbers in the forenoon session
    afternoonCapacity: number;  // Max register numbers in the afternoon session
    labsPerDay: number;         // Labs in use on a single exam date
    forenoonTime: string;
    afternoonTime: string;
}

export const DEFAULT_CAPACITY_PROFILE: CapacityProfile = {
    forenoonCapacity: 13,
    afternoonCapacity: 12,
    labsPerDay: 5,
    forenoonTime: '09:30 am - 12:30 pm',
    afternoonTime: '01:30 pm - 04:30 pm'
};

export const DEFAULT_LABS = ['Lab 1', 'Lab 2', 'Lab 3', 'Lab 4', 'Lab 5'];

/**
 * Register numbers one lab holds on one date (both sessions)
 */
export function labCapacity(profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE): number {
    return profile.forenoonCapacity + profile.afternoonCapacity;
}

/**
 * Register numbers one exam date holds across all labs
 */
export function dailyCapacity(profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE): number {
    return labCapacity(profile) * profile.labsPerDay;
}

/**
 * Minimum number of exam dates for the given head count
 *
 * @returns 0 when there is nobody to schedule
 */
export function calculateRequiredDays(
    studentCount: number,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): number {
    if (studentCount <= 0) {
        return 0;
    }
    return Math.ceil(studentCount / dailyCapacity(profile));
}

/**
 * How many more dates are needed beyond those provided (0 if sufficient)
 */
export function calculateAdditionalDaysNeeded(
    studentCount: number,
    providedDates: number,
    profile: CapacityProfile = DEFAULT_CAPACITY_PROFILE
): number {
    return Math.max(0, calculateRequiredDays(studentCount, profile) - providedDates);
}
