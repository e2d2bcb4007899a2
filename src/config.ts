// src/config.ts

import { z } from 'zod';
import { CapacityProfile, DEFAULT_CAPACITY_PROFILE } from './engine/capacity';

/**
 * Vision models in order of preference
 */
export const DEFAULT_VISION_MODELS = [
    'meta-llama/llama-4-maverick-17b-128e-instruct',
    'openai/gpt-oss-120b',
    'llama-3.3-70b-versatile',
    'llama-4-scout-17b-16e-instruct',
    'llama-3.2-11b-vision-preview',
    'llama-3.2-90b-vision-preview'
];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    PORT: positiveInt(3000),
    GROQ_API_KEY: z.string().min(1).optional(),
    VISION_TIMEOUT_MS: positiveInt(60000),
    VISION_MODELS: z.string().optional(),
    EXAM_FORENOON_CAPACITY: positiveInt(DEFAULT_CAPACITY_PROFILE.forenoonCapacity),
    EXAM_AFTERNOON_CAPACITY: positiveInt(DEFAULT_CAPACITY_PROFILE.afternoonCapacity),
    EXAM_LABS_PER_DAY: positiveInt(DEFAULT_CAPACITY_PROFILE.labsPerDay),
    UPLOAD_LIMIT: z.string().default('10mb')
});

export interface AppConfig {
    port: number;
    groqApiKey?: string;
    visionTimeoutMs: number;
    visionModels: string[];
    capacity: CapacityProfile;
    uploadLimit: string;
}

/**
 * Read configuration from environment variables
 *
 * Unset or empty variables fall back to defaults.
 *
 * @throws Error naming every variable that is set but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    // Treat VAR= as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const vars = parsed.data;
    const visionModels = vars.VISION_MODELS
        ? vars.VISION_MODELS.split(',').map(model => model.trim()).filter(model => model.length > 0)
        : DEFAULT_VISION_MODELS;

    return {
        port: vars.PORT,
        groqApiKey: vars.GROQ_API_KEY,
        visionTimeoutMs: vars.VISION_TIMEOUT_MS,
        visionModels,
        capacity: {
            ...DEFAULT_CAPACITY_PROFILE,
            forenoonCapacity: vars.EXAM_FORENOON_CAPACITY,
            afternoonCapacity: vars.EXAM_AFTERNOON_CAPACITY,
            labsPerDay: vars.EXAM_LABS_PER_DAY
        },
        uploadLimit: vars.UPLOAD_LIMIT
    };
}
