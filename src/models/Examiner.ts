// src/models/Examiner.ts

/**
 * Examiner model - an internal or external proctor
 *
 * Data only. The typed "ID: Name" form is parsed in parsers/examiners.
 */
export interface Examiner {
    id: string;    // Staff or university ID, non-empty
    name: string;  // Display name, non-empty
}

