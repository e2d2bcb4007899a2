// src/services/visionClient.ts

import { z } from 'zod';
import { log } from '../logging';

/**
 * Image handed to a vision backend
 */
export interface VisionImage {
    data: Buffer;
    mimeType: string;
}

/**
 * One vision model endpoint. analyze resolves with free-form text.
 *
 * Rejects with UnsupportedRequestError when the backend cannot serve the
 * request at all (unknown or retired model); any other rejection is a
 * transient failure. The signal aborts the attempt.
 */
export interface VisionBackend {
    name: string;
    analyze(image: VisionImage, signal: AbortSignal): Promise<string>;
}

export class UnsupportedRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedRequestError';
    }
}

export interface BackendAttempt {
    backend: string;
    reason: 'unsupported' | 'failed' | 'timeout';
    detail: string;
}

export type VisionOutcome =
    | { status: 'ok'; backend: string; text: string }
    | { status: 'unavailable'; attempts: BackendAttempt[] };

export interface AnalyzeOptions {
    timeoutMs: number;   // Per backend attempt
    signal?: AbortSignal;
}

export const SUPPORTED_IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/jpg'];

/**
 * Run an image through the backends in preference order
 *
 * Each backend gets exactly one attempt with its own timeout. The first
 * success wins. Unsupported and transient failures both move on to the
 * next backend. Running out of backends, or the caller aborting, resolves
 * to "unavailable" with the reasons collected so far; this never rejects.
 */
export async function analyzeImage(
    image: VisionImage,
    backends: VisionBackend[],
    options: AnalyzeOptions
): Promise<VisionOutcome> {
    const attempts: BackendAttempt[] = [];

    for (const backend of backends) {
        if (options.signal?.aborted) {
            break;
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, options.timeoutMs);
        const onCallerAbort = (): void => controller.abort();
        options.signal?.addEventListener('abort', onCallerAbort, { once: true });

        try {
            const text = await raceAbort(backend.analyze(image, controller.signal), controller.signal);
            return { status: 'ok', backend: backend.name, text };
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            let reason: BackendAttempt['reason'] = 'failed';
            if (err instanceof UnsupportedRequestError) {
                reason = 'unsupported';
            } else if (timedOut) {
                reason = 'timeout';
            }
            attempts.push({ backend: backend.name, reason, detail });
            log(`Vision backend ${backend.name} ${reason} (${detail}), trying next...`);
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onCallerAbort);
        }
    }

    return { status: 'unavailable', attempts };
}

/**
 * Settle as soon as the signal aborts, even if the backend ignores it
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        if (signal.aborted) {
            reject(new Error('aborted'));
            return;
        }
        const onAbort = (): void => reject(new Error('aborted'));
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}

const GROQ_CHAT_COMPLETIONS_URL = 'https://api.groq.com/openai/v1/chat/completions';

export const EXAM_SCHEDULE_PROMPT = `Analyze this image and extract ALL possible information related to an exam schedule.

Output in this exact format (leave blank if not found):
EXAM_NAME: [exam name]
DEPARTMENT: [department]
SEMESTER: [semester, e.g. S1 to S8]
BATCH: [batch or division, e.g. A, B, C]
ACADEMIC_YEAR: [year, e.g. 2024-25]
DATES:
[each exam date on its own line in DD-MM-YY format]
LABS:
[each lab or room on its own line]
INTERNAL_EXAMINERS:
[ID: Name, one per line]
EXTERNAL_EXAMINERS:
[ID: Name, one per line]
SUBJECTS:
[each subject on its own line]
REGISTER_NUMBERS:
[each student register number on its own line, e.g. TVE20CS001]
RAW_TEXT:
[any other text that might be useful]

Include everything you can read, even when unsure.`;

const ChatCompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullish() })
    }))
});

/**
 * One backend per model against Groq's OpenAI-compatible chat completions API
 *
 * A 400 that mentions the model marks the model unsupported; every other
 * non-200 is a transient failure.
 *
 * @param fetchImpl Injected for tests; defaults to the global fetch
 */
export function createGroqBackends(
    apiKey: string,
    models: string[],
    fetchImpl: typeof fetch = fetch
): VisionBackend[] {
    return models.map(model => ({
        name: model,
        async analyze(image: VisionImage, signal: AbortSignal): Promise<string> {
            const imageUrl = `data:${image.mimeType};base64,${image.data.toString('base64')}`;

            const response = await fetchImpl(GROQ_CHAT_COMPLETIONS_URL, {
                method: 'POST',
                headers: {
                    'Authorization': `Bearer ${apiKey}`,
                    'Content-Type': 'application/json'
                },
                body: JSON.stringify({
                    model,
                    messages: [{
                        role: 'user',
                        content: [
                            { type: 'text', text: EXAM_SCHEDULE_PROMPT },
                            { type: 'image_url', image_url: { url: imageUrl } }
                        ]
                    }],
                    max_tokens: 8192
                }),
                signal
            });

            if (response.status === 200) {
                const parsed = ChatCompletionSchema.safeParse(await response.json());
                const content = parsed.success ? parsed.data.choices[0]?.message.content : undefined;
                if (typeof content !== 'string') {
                    throw new Error(`Model ${model} returned no content`);
                }
                return content;
            }

            const body = await response.text();
            if (response.status === 400 && body.toLowerCase().includes('model')) {
                throw new UnsupportedRequestError(`Model ${model} not available`);
            }
            throw new Error(`Groq API error ${response.status}: ${body}`);
        }
    }));
}
