// src/parsers/registerNumbers.ts

/**
 * Register number shape, e.g. TVE20CS001 or ABC21EC123
 */
export const REGISTER_NUMBER_PATTERN = /[A-Z]{2,4}\d{2}[A-Z]{2,3}\d{3}/;

const DUPLICATE_PREVIEW_LIMIT = 10;

export interface DeduplicationResult {
    unique: string[];      // First occurrences, input order
    duplicates: string[];  // Each repeat, in the order it was met
}

/**
 * Parse register numbers from free-form textarea input
 *
 * Accepts newline, comma, or wide-space (2+ spaces) separated values.
 * Input order is preserved.
 */
export function parseRegisterNumbers(text: string): string[] {
    if (!text || !text.trim()) {
        return [];
    }

    return text
        .split(/[\n,]+|\s{2,}/)
        .map(part => part.trim())
        .filter(part => part.length > 0);
}

/**
 * Remove repeated register numbers, keeping the first occurrence
 *
 * Pure function. unique.length + duplicates.length === input.length
 */
export function removeDuplicates(registerNumbers: string[]): DeduplicationResult {
    const seen = new Set<string>();
    const unique: string[] = [];
    const duplicates: string[] = [];

    for (const registerNumber of registerNumbers) {
        if (seen.has(registerNumber)) {
            duplicates.push(registerNumber);
        } else {
            seen.add(registerNumber);
            unique.push(registerNumber);
        }
    }

    return { unique, duplicates };
}

/**
 * Advisory line for removed duplicates, truncated after the first ten
 *
 * @param verb "removed" when generating, "found" when only validating
 */
export function summarizeDuplicates(duplicates: string[], verb: 'removed' | 'found'): string {
    const preview = duplicates.slice(0, DUPLICATE_PREVIEW_LIMIT).join(', ');
    const remainder = duplicates.length - DUPLICATE_PREVIEW_LIMIT;
    const suffix = remainder > 0 ? ` and ${remainder} more` : '';
    return `Duplicate register numbers ${verb}: ${preview}${suffix}`;
}
