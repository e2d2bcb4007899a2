// src/parsers/tabularParser.ts

import * as XLSX from 'xlsx';
import { Semester } from '../models/Cohort';

const HEADER_KEYWORDS = ['semester', 'batch', 'register', 'roll'];
const DEFAULT_SEMESTER = 'S1';
const DEFAULT_BATCH = 'A';

/**
 * Read the first sheet of an uploaded CSV, TSV or XLSX file as text rows
 *
 * Plain-text values are kept as written (no number or date coercion), so
 * register numbers with leading zeros survive.
 */
export function readSpreadsheet(content: Buffer): string[][] {
    const workbook = XLSX.read(content, { type: 'buffer', raw: true });
    const firstSheetName = workbook.SheetNames[0];
    if (firstSheetName === undefined) {
        return [];
    }

    const worksheet = workbook.Sheets[firstSheetName];
    const rows = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
        header: 1,
        defval: '',
        raw: true,
        blankrows: false
    });

    return rows.map(row => dropTrailingBlanks(row.map(cell => String(cell).trim())));
}

/**
 * sheet_to_json pads every row to the widest one; restore each row's own width
 */
function dropTrailingBlanks(cells: string[]): string[] {
    let end = cells.length;
    while (end > 0 && cells[end - 1] === '') {
        end--;
    }
    return cells.slice(0, end);
}

/**
 * Build the semester → batch → register number structure from rows
 *
 * Column layouts:
 * - 3+ columns: semester, batch, register number
 * - 2 columns: semester, register number (batch A)
 * - 1 column: register number (semester S1, batch A)
 *
 * A first row naming semester/batch/register/roll is treated as a header.
 * Semester names are upper-cased and prefixed with "S" when bare
 * ("3" → "S3"). Repeats within a batch are dropped. Output is sorted by
 * semester name, then batch name.
 */
export function parseTabularRows(rows: string[][]): Semester[] {
    if (rows.length === 0) {
        return [];
    }

    const firstLine = rows[0].join(',').toLowerCase();
    const hasHeader = HEADER_KEYWORDS.some(keyword => firstLine.includes(keyword));
    const body = hasHeader ? rows.slice(1) : rows;

    const grouped = new Map<string, Map<string, string[]>>();

    for (const row of body) {
        const cells = row.map(cell => cell.trim());
        if (cells.every(cell => cell === '')) {
            continue;
        }

        let semester = DEFAULT_SEMESTER;
        let batch = DEFAULT_BATCH;
        let registerNumber: string;

        if (cells.length >= 3) {
            semester = cells[0].toUpperCase() || DEFAULT_SEMESTER;
            batch = cells[1].toUpperCase() || DEFAULT_BATCH;
            registerNumber = cells[2];
        } else if (cells.length === 2) {
            semester = cells[0].toUpperCase() || DEFAULT_SEMESTER;
            registerNumber = cells[1];
        } else {
            registerNumber = cells[0];
        }

        if (!semester.startsWith('S')) {
            semester = `S${semester}`;
        }

        let batches = grouped.get(semester);
        if (!batches) {
            batches = new Map();
            grouped.set(semester, batches);
        }
        let registerNumbers = batches.get(batch);
        if (!registerNumbers) {
            registerNumbers = [];
            batches.set(batch, registerNumbers);
        }

        if (registerNumber && !registerNumbers.includes(registerNumber)) {
            registerNumbers.push(registerNumber);
        }
    }

    return [...grouped.entries()]
        .sort(([a], [b]) => compareNames(a, b))
        .map(([name, batches]) => ({
            name,
            batches: [...batches.entries()]
                .sort(([a], [b]) => compareNames(a, b))
                .map(([batchName, registerNumbers]) => ({ name: batchName, registerNumbers }))
        }));
}

function compareNames(a: string, b: string): number {
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}
