// src/engine/cohortResolver.ts

import { CohortKey, Semester } from '../models/Cohort';

export type CohortLookup = Map<string, CohortKey>;

export interface CohortAttribution {
    semester?: string;
    batch?: string;
}

/**
 * Map every register number to its (semester, batch label)
 *
 * A number listed under several batches keeps the last one seen.
 */
export function buildCohortLookup(semesters: Semester[]): CohortLookup {
    const lookup: CohortLookup = new Map();

    for (const semester of semesters) {
        for (const batch of semester.batches) {
            const batchLabel = `${semester.name}${batch.name}`;
            for (const registerNumber of batch.registerNumbers) {
                lookup.set(registerNumber, { semester: semester.name, batchLabel });
            }
        }
    }

    return lookup;
}

/**
 * Attribute a lab-day chunk to a cohort by majority vote
 *
 * Pure function - same chunk and lookup always give the same answer
 *
 * Rules:
 * - Tally (semester, batch label) pairs over chunk members found in the lookup
 * - Highest tally wins; on equal tallies the pair met first wins
 * - If more than one distinct pair appears at all, batch becomes the sorted,
 *   comma-joined list of every batch label seen, while semester stays that
 *   of the winning pair
 * - Unknown register numbers are ignored; no known member leaves both unset
 */
export function resolveCohort(chunk: string[], lookup: CohortLookup): CohortAttribution {
    // Map keeps insertion order, which decides ties
    const tallies = new Map<string, { key: CohortKey; count: number }>();

    for (const registerNumber of chunk) {
        const key = lookup.get(registerNumber);
        if (!key) {
            continue;
        }

        const id = `${key.semester}\u0000${key.batchLabel}`;
        const tally = tallies.get(id);
        if (tally) {
            tally.count++;
        } else {
            tallies.set(id, { key, count: 1 });
        }
    }

    let winner: { key: CohortKey; count: number } | undefined;
    for (const tally of tallies.values()) {
        if (!winner || tally.count > winner.count) {
            winner = tally;
        }
    }

    if (!winner) {
        return {};
    }

    if (tallies.size === 1) {
        return { semester: winner.key.semester, batch: winner.key.batchLabel };
    }

    const labels = new Set<string>();
    for (const tally of tallies.values()) {
        labels.add(tally.key.batchLabel);
    }

    return {
        semester: winner.key.semester,
        batch: [...labels].sort().join(', ')
    };
}
