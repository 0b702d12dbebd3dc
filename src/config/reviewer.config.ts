/**
 * Clinical Reviewer Configuration
 * Snapshot of the reviewer settings, built once at startup and handed to the
 * reviewer adapter. Core logic never reads process.env directly.
 */

import { z } from 'zod';

export interface ReviewerConfig {
    enabled: boolean;
    projectId: string;
    location: string;
    /** Deployed model endpoint; when empty the publisher model is used. */
    endpointId: string;
    model: string;
    generationConfig: {
        temperature: number;
        topP: number;
        topK: number;
        maxOutputTokens: number;
    };
    timeoutMs: number;
    retry: {
        maxAttempts: number;
        initialDelayMs: number;
    };
}

export const DEFAULT_REVIEWER_CONFIG: ReviewerConfig = {
    enabled: false,
    projectId: '',
    location: 'us-central1',
    endpointId: '',
    model: 'gemini-2.0-flash',
    generationConfig: {
        temperature: 0.1, // Low temp for clinical consistency
        topP: 0.85,
        topK: 40,
        maxOutputTokens: 2048,
    },
    timeoutMs: 30_000,
    retry: {
        maxAttempts: 3,
        initialDelayMs: 1_000,
    },
};

const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const envString = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const envNumber = (schema: z.ZodNumber, fallback: number) => z.preprocess(blankToUndefined, schema.default(fallback));

const ReviewerEnvSchema = z.object({
    REVIEWER_ENABLED: z.preprocess(blankToUndefined, z.enum(['true', 'false']).default('true')),
    GCP_PROJECT_ID: envString(''),
    GCP_LOCATION: envString(DEFAULT_REVIEWER_CONFIG.location),
    REVIEWER_ENDPOINT_ID: envString(''),
    REVIEWER_MODEL: envString(DEFAULT_REVIEWER_CONFIG.model),
    REVIEWER_TEMPERATURE: envNumber(z.coerce.number().min(0).max(2), DEFAULT_REVIEWER_CONFIG.generationConfig.temperature),
    REVIEWER_MAX_TOKENS: envNumber(z.coerce.number().int().positive(), DEFAULT_REVIEWER_CONFIG.generationConfig.maxOutputTokens),
    REVIEWER_TIMEOUT_MS: envNumber(z.coerce.number().int().positive(), DEFAULT_REVIEWER_CONFIG.timeoutMs),
    REVIEWER_MAX_ATTEMPTS: envNumber(z.coerce.number().int().min(1), DEFAULT_REVIEWER_CONFIG.retry.maxAttempts),
    REVIEWER_INITIAL_BACKOFF_MS: envNumber(z.coerce.number().int().nonnegative(), DEFAULT_REVIEWER_CONFIG.retry.initialDelayMs),
});

/**
 * Reads the reviewer settings from the environment.
 * @throws Error naming every invalid variable
 */
export function loadReviewerConfig(env: NodeJS.ProcessEnv = process.env): ReviewerConfig {
    const parsed = ReviewerEnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid reviewer configuration: ${problems.join('; ')}`);
    }

    const vars = parsed.data;
    return {
        enabled: vars.REVIEWER_ENABLED === 'true' && vars.GCP_PROJECT_ID !== '',
        projectId: vars.GCP_PROJECT_ID,
        location: vars.GCP_LOCATION,
        endpointId: vars.REVIEWER_ENDPOINT_ID,
        model: vars.REVIEWER_MODEL,
        generationConfig: {
            ...DEFAULT_REVIEWER_CONFIG.generationConfig,
            temperature: vars.REVIEWER_TEMPERATURE,
            maxOutputTokens: vars.REVIEWER_MAX_TOKENS,
        },
        timeoutMs: vars.REVIEWER_TIMEOUT_MS,
        retry: {
            maxAttempts: vars.REVIEWER_MAX_ATTEMPTS,
            initialDelayMs: vars.REVIEWER_INITIAL_BACKOFF_MS,
        },
    };
}
