// src/handlers/uploadHandlers.ts

import { logError } from '../logging';
import { Semester } from '../models/Cohort';
import { ExtractedExamData, parseVisionResponse } from '../parsers/visionResponse';
import { parseRegisterNumbers } from '../parsers/registerNumbers';
import { parseTabularRows, readSpreadsheet } from '../parsers/tabularParser';
import { extractRegisterNumbersFromText } from '../parsers/textExtractor';
import {
    BackendAttempt,
    SUPPORTED_IMAGE_TYPES,
    VisionBackend,
    VisionImage,
    analyzeImage
} from '../services/visionClient';

const TABULAR_EXTENSIONS = ['.csv', '.tsv', '.xlsx', '.xls'];

export type ParseFileResult =
    | { success: true; semesters: Semester[]; totalStudents: number; message: string }
    | { success: false; error: string; semesters: []; totalStudents: 0 };

export type AnalyzeImageResult =
    | {
        success: true;
        semesters: Semester[];
        totalStudents: number;
        extractedData: ExtractedExamData;
        rawResponse: string;
        backend: string;
        message: string;
    }
    | { success: false; error: string; attempts: BackendAttempt[] };

function countRegisterNumbers(semesters: Semester[]): number {
    return semesters.reduce(
        (sum, semester) => sum + semester.batches.reduce((inner, batch) => inner + batch.registerNumbers.length, 0),
        0
    );
}

/**
 * Turn an uploaded roster file into semesters
 *
 * Spreadsheets and delimited text go through the tabular parser, anything
 * else through the free-text extractor. If neither finds a cohort, the text
 * is split like textarea input (lines, commas, wide gaps) into S1 batch A.
 *
 * @param fileName Original file name, used only to detect the format
 * @param content Raw upload bytes
 */
export function handleParseFile(fileName: string | undefined, content: Buffer): ParseFileResult {
    const name = (fileName ?? '').toLowerCase();
    const isSpreadsheet = TABULAR_EXTENSIONS.some(extension => name.endsWith(extension));

    try {
        const text = isSpreadsheet ? '' : content.toString('utf-8');
        const isDelimited = text.includes(',') || text.includes('\t');

        let semesters = isSpreadsheet || isDelimited
            ? parseTabularRows(readSpreadsheet(content))
            : extractRegisterNumbersFromText(text).semesters;

        if (semesters.length === 0 && text) {
            const registerNumbers = parseRegisterNumbers(text);
            if (registerNumbers.length > 0) {
                semesters = [{ name: 'S1', batches: [{ name: 'A', registerNumbers }] }];
            }
        }

        const totalStudents = countRegisterNumbers(semesters);
        return {
            success: true,
            semesters,
            totalStudents,
            message: `Extracted ${totalStudents} register numbers from ${semesters.length} semester(s)`
        };
    } catch (err) {
        logError(`Could not parse uploaded file ${fileName ?? '(unnamed)'}`, err);
        return {
            success: false,
            error: err instanceof Error ? err.message : String(err),
            semesters: [],
            totalStudents: 0
        };
    }
}

/**
 * Extract exam data from a schedule image through the vision backends
 *
 * Never rejects: a missing API key, an unsupported image type and
 * exhausted backends all come back as success: false.
 *
 * @param backends Preference-ordered backends; empty when no API key is configured
 */
export async function handleAnalyzeImage(
    image: VisionImage,
    backends: VisionBackend[],
    options: { timeoutMs: number; signal?: AbortSignal }
): Promise<AnalyzeImageResult> {
    if (backends.length === 0) {
        return {
            success: false,
            error: 'Vision API key not configured on server. Please contact administrator.',
            attempts: []
        };
    }

    if (!SUPPORTED_IMAGE_TYPES.includes(image.mimeType)) {
        return {
            success: false,
            error: `Invalid image format. Supported formats: PNG, JPG, JPEG. Got: ${image.mimeType}`,
            attempts: []
        };
    }

    const outcome = await analyzeImage(image, backends, options);
    if (outcome.status === 'unavailable') {
        return {
            success: false,
            error: 'Failed to analyze image. Please try again or use a different image.',
            attempts: outcome.attempts
        };
    }

    const { semesters, registerNumbers, extracted } = parseVisionResponse(outcome.text);
    return {
        success: true,
        semesters,
        totalStudents: registerNumbers.length,
        extractedData: extracted,
        rawResponse: outcome.text,
        backend: outcome.backend,
        message: `Extracted ${registerNumbers.length} register numbers and additional exam data using AI`
    };
}
