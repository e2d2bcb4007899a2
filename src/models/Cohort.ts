// src/models/Cohort.ts

/**
 * A batch within a semester (e.g. batch "A" of semester "S1" → label "S1A")
 */
export interface Batch {
    name: string;
    registerNumbers: string[];  // Ordered as supplied
}

/**
 * A semester holding one or more batches
 */
export interface Semester {
    name: string;
    batches: Batch[];
}

/**
 * Cohort attribution of a single register number
 */
export interface CohortKey {
    semester: string;
    batchLabel: string;  // Semester name + batch name
}
