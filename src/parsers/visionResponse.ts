// src/parsers/visionResponse.ts

import { Semester } from '../models/Cohort';
import { Examiner } from '../models/Examiner';
import { REGISTER_NUMBER_PATTERN } from './registerNumbers';
import { scanRegisterNumbers } from './textExtractor';

/**
 * Everything recoverable from an exam schedule image description
 */
export interface ExtractedExamData {
    examName: string;
    department: string;
    semester: string;       // Defaults to S1
    batch: string;          // Single letter, defaults to A
    academicYear: string;
    dates: string[];
    labs: string[];
    internalExaminers: Examiner[];
    externalExaminers: Examiner[];
    subjects: string[];
    registerNumbers: string[];
    rawText: string;
}

export interface VisionParseResult {
    semesters: Semester[];
    registerNumbers: string[];
    extracted: ExtractedExamData;
}

type InlineField = 'examName' | 'department' | 'semester' | 'batch' | 'academicYear';
type Section = 'dates' | 'labs' | 'internalExaminers' | 'externalExaminers' | 'subjects' | 'registerNumbers' | 'rawText';

const INLINE_HEADERS: [string, InlineField][] = [
    ['EXAM_NAME:', 'examName'],
    ['DEPARTMENT:', 'department'],
    ['SEMESTER:', 'semester'],
    ['BATCH:', 'batch'],
    ['ACADEMIC_YEAR:', 'academicYear']
];

const SECTION_HEADERS: [string, Section][] = [
    ['DATES:', 'dates'],
    ['LABS:', 'labs'],
    ['INTERNAL_EXAMINERS:', 'internalExaminers'],
    ['EXTERNAL_EXAMINERS:', 'externalExaminers'],
    ['SUBJECTS:', 'subjects'],
    ['REGISTER_NUMBERS:', 'registerNumbers'],
    ['RAW_TEXT:', 'rawText']
];

const LIST_MARKER = /^[\d.\-*\s]+/;
const DATE_LIKE = /\d{1,2}[-/]\d{1,2}[-/]\d{2,4}/;

/**
 * Parse the structured text a vision model returns for a schedule image
 *
 * Lines starting with a known header keyword either carry a value
 * (EXAM_NAME: ...) or open a section whose following lines are list items.
 * After the section pass, the whole text is scanned once more for register
 * numbers so that any mentioned outside REGISTER_NUMBERS are still picked up.
 */
export function parseVisionResponse(response: string): VisionParseResult {
    const extracted: ExtractedExamData = {
        examName: '',
        department: '',
        semester: 'S1',
        batch: 'A',
        academicYear: '',
        dates: [],
        labs: [],
        internalExaminers: [],
        externalExaminers: [],
        subjects: [],
        registerNumbers: [],
        rawText: ''
    };

    const seen = new Set<string>();
    let section: Section | null = null;

    for (const rawLine of response.trim().split('\n')) {
        const line = rawLine.trim();
        if (!line) {
            continue;
        }
        const upper = line.toUpperCase();

        const inline = INLINE_HEADERS.find(([header]) => upper.startsWith(header));
        if (inline) {
            applyInlineField(extracted, inline[1], line.slice(line.indexOf(':') + 1).trim());
            section = null;
            continue;
        }

        const opened = SECTION_HEADERS.find(([header]) => upper.startsWith(header));
        if (opened) {
            section = opened[1];
            continue;
        }

        if (section === null) {
            continue;
        }

        const cleaned = line.replace(LIST_MARKER, '').trim();

        // A bare date is all digits and dashes, so match dates before stripping markers
        if (section === 'dates') {
            const dateMatch = DATE_LIKE.exec(line);
            if (dateMatch) {
                extracted.dates.push(dateMatch[0].replace(/\//g, '-'));
            } else if (cleaned) {
                extracted.dates.push(cleaned);
            }
            continue;
        }

        if (!cleaned) {
            continue;
        }

        switch (section) {
            case 'labs':
                extracted.labs.push(cleaned);
                break;
            case 'internalExaminers':
                extracted.internalExaminers.push(parseExaminerLine(cleaned, 'INT', extracted.internalExaminers.length));
                break;
            case 'externalExaminers':
                extracted.externalExaminers.push(parseExaminerLine(cleaned, 'EXT', extracted.externalExaminers.length));
                break;
            case 'subjects':
                extracted.subjects.push(cleaned);
                break;
            case 'registerNumbers': {
                const match = REGISTER_NUMBER_PATTERN.exec(cleaned.toUpperCase());
                if (match && !seen.has(match[0])) {
                    extracted.registerNumbers.push(match[0]);
                    seen.add(match[0]);
                }
                break;
            }
            case 'rawText':
                extracted.rawText += `${cleaned}\n`;
                break;
        }
    }

    for (const registerNumber of scanRegisterNumbers(response)) {
        if (!seen.has(registerNumber)) {
            extracted.registerNumbers.push(registerNumber);
            seen.add(registerNumber);
        }
    }

    const semesters: Semester[] = extracted.registerNumbers.length > 0
        ? [{
            name: extracted.semester,
            batches: [{ name: extracted.batch, registerNumbers: extracted.registerNumbers }]
        }]
        : [];

    return { semesters, registerNumbers: extracted.registerNumbers, extracted };
}

function applyInlineField(extracted: ExtractedExamData, field: InlineField, value: string): void {
    switch (field) {
        case 'semester':
            if (value) {
                extracted.semester = value.toUpperCase().startsWith('S') ? value.toUpperCase() : `S${value}`;
            }
            break;
        case 'batch':
            if (value) {
                extracted.batch = value[0].toUpperCase();
            }
            break;
        default:
            extracted[field] = value;
    }
}

/**
 * "ID: Name" lines keep their ID; bare names get a generated one (INT1, EXT2, ...)
 */
function parseExaminerLine(line: string, prefix: 'INT' | 'EXT', existing: number): Examiner {
    const separator = line.indexOf(':');
    if (separator !== -1) {
        return {
            id: line.slice(0, separator).trim(),
            name: line.slice(separator + 1).trim()
        };
    }
    return { id: `${prefix}${existing + 1}`, name: line };
}
