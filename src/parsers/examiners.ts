// src/parsers/examiners.ts

import { Examiner } from '../models/Examiner';

/**
 * Parse the "ID: Name" form examiners are typed in; splits on the first ": "
 *
 * @throws Error when the text has no ": " separator
 */
export function parseExaminer(text: string): Examiner {
    const separator = text.indexOf(': ');
    if (separator === -1) {
        throw new Error(`Invalid examiner format: ${text}`);
    }
    return { id: text.slice(0, separator).trim(), name: text.slice(separator + 2).trim() };
}
