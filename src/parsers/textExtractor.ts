// src/parsers/textExtractor.ts

import { Semester } from '../models/Cohort';
import { REGISTER_NUMBER_PATTERN } from './registerNumbers';

const REGISTER_NUMBER_SCAN = new RegExp(`\\b${REGISTER_NUMBER_PATTERN.source}\\b`, 'g');
const SEMESTER_HINT = /(?:semester|sem)[:\s]*(S?\d+)/i;
const BATCH_HINT = /(?:batch|division|div)[:\s]*([A-Z])/i;

/**
 * Every register-number-shaped token in text, upper-cased, first occurrences only
 */
export function scanRegisterNumbers(text: string): string[] {
    const matches = text.toUpperCase().match(REGISTER_NUMBER_SCAN) ?? [];
    return [...new Set(matches)];
}

/**
 * Pull register numbers and a semester/batch hint out of loose text
 *
 * Semester comes from "Semester: 3" / "Sem S3" style hints and batch from
 * "Batch: B" / "Division B"; defaults are S1 and A. No register numbers
 * means no cohort.
 */
export function extractRegisterNumbersFromText(text: string): {
    semesters: Semester[];
    registerNumbers: string[];
} {
    const registerNumbers = scanRegisterNumbers(text);
    if (registerNumbers.length === 0) {
        return { semesters: [], registerNumbers: [] };
    }

    const semesterMatch = SEMESTER_HINT.exec(text);
    const batchMatch = BATCH_HINT.exec(text);

    let semester = semesterMatch ? semesterMatch[1].toUpperCase() : 'S1';
    if (!semester.startsWith('S')) {
        semester = `S${semester}`;
    }
    const batch = batchMatch ? batchMatch[1].toUpperCase() : 'A';

    return {
        semesters: [{ name: semester, batches: [{ name: batch, registerNumbers }] }],
        registerNumbers
    };
}
