/**
 * Clinical Reviewer Service
 * Independent second opinion from the generative reasoning service.
 * Every failure mode resolves to a ReviewOutcome; nothing is thrown to the pipeline.
 */

import { ReasoningClient, VertexReasoningClient } from '../ai/reviewer/client';
import { SYSTEM_PROMPTS, buildReviewPrompt, buildTreatmentPrompt } from '../ai/reviewer/prompt-templates';
import { parseReviewerOpinion, parseTreatmentSteps } from '../ai/reviewer/response-parser';
import { ReviewerConfig } from '../config/reviewer.config';
import { PatientRecord } from '../models/patient.schema';
import {
    ClassifierOpinion,
    DiagnoseOptions,
    ReviewOutcome,
    ReviewUnavailableReason,
    TreatmentStep,
} from '../models/diagnosis-types';
import { ReviewerUnavailableError, TransientReviewerError, errorMessage } from '../utils/errors';
import { AbortedError, withBackoff, withTimeout } from '../utils/retry';
import logger from '../utils/logger';

export interface ClinicalReviewer {
    readonly name: string;
    review(opinion: ClassifierOpinion, record: PatientRecord, options?: DiagnoseOptions): Promise<ReviewOutcome>;
    planTreatment(
        diagnosis: string,
        severityScore: number,
        record: PatientRecord,
        options?: DiagnoseOptions,
    ): Promise<TreatmentStep[] | null>;
}

class MalformedResponseError extends ReviewerUnavailableError {
    constructor() {
        super('Reviewer response contained no usable diagnosis');
    }
}

const unavailableReason = (error: unknown): ReviewUnavailableReason => {
    if (error instanceof AbortedError) return 'aborted';
    if (error instanceof MalformedResponseError) return 'malformed_response';
    if (error instanceof TransientReviewerError) return 'transient_failure';
    return 'permanent_failure';
};

export class GenerativeClinicalReviewer implements ClinicalReviewer {
    readonly name: string;

    constructor(
        private readonly client: ReasoningClient,
        private readonly config: Pick<ReviewerConfig, 'timeoutMs' | 'retry'>,
    ) {
        this.name = `generative:${client.name}`;
    }

    async review(opinion: ClassifierOpinion, record: PatientRecord, options: DiagnoseOptions = {}): Promise<ReviewOutcome> {
        const prompt = buildReviewPrompt(opinion, record);
        try {
            const reviewerOpinion = await this.call(SYSTEM_PROMPTS.CLINICAL_REVIEW, prompt, 'review', options.signal, text => {
                const parsed = parseReviewerOpinion(text);
                if (!parsed) throw new MalformedResponseError();
                return parsed;
            });
            logger.info(
                { diagnosis: reviewerOpinion.diagnosis, verdict: reviewerOpinion.validationVerdict, certainty: reviewerOpinion.certainty },
                'Clinical review completed',
            );
            return { status: 'available', opinion: reviewerOpinion };
        } catch (error) {
            const reason = unavailableReason(error);
            logger.warn({ reason, error: errorMessage(error) }, 'Clinical review unavailable');
            return { status: 'unavailable', reason, detail: errorMessage(error) };
        }
    }

    async planTreatment(
        diagnosis: string,
        severityScore: number,
        record: PatientRecord,
        options: DiagnoseOptions = {},
    ): Promise<TreatmentStep[] | null> {
        const prompt = buildTreatmentPrompt(diagnosis, severityScore, record);
        try {
            return await this.call(SYSTEM_PROMPTS.TREATMENT_PLAN, prompt, 'treatment', options.signal, parseTreatmentSteps);
        } catch (error) {
            logger.warn({ reason: unavailableReason(error), error: errorMessage(error) }, 'Treatment plan unavailable from reviewer');
            return null;
        }
    }

    /**
     * One timed call per attempt; only transient failures are retried.
     * Parsing happens inside the attempt so a malformed reply is not retried.
     */
    private call<T>(
        systemInstruction: string,
        prompt: string,
        purpose: string,
        signal: AbortSignal | undefined,
        parse: (text: string) => T,
    ): Promise<T> {
        return withBackoff(
            async attempt => {
                const response = await withTimeout(
                    callSignal => this.client.generateJson(systemInstruction, prompt, { signal: callSignal }),
                    this.config.timeoutMs,
                    signal,
                );
                logger.debug({ purpose, attempt, inferenceMs: response.inferenceTimeMs, tokens: response.tokensUsed }, 'Reviewer responded');
                return parse(response.text);
            },
            {
                maxAttempts: this.config.retry.maxAttempts,
                initialDelayMs: this.config.retry.initialDelayMs,
                isRetryable: error => error instanceof TransientReviewerError,
                signal,
                onRetry: (error, attempt, delayMs) =>
                    logger.warn({ purpose, attempt, delayMs, error: errorMessage(error) }, 'Reviewer call failed, retrying'),
            },
        );
    }
}

/**
 * Used when the reviewer is disabled or not configured.
 */
export class UnavailableClinicalReviewer implements ClinicalReviewer {
    readonly name = 'unavailable';

    constructor(private readonly detail = 'Clinical reviewer is not configured') {}

    async review(): Promise<ReviewOutcome> {
        return { status: 'unavailable', reason: 'disabled', detail: this.detail };
    }

    async planTreatment(): Promise<TreatmentStep[] | null> {
        return null;
    }
}

export function createClinicalReviewer(config: ReviewerConfig): ClinicalReviewer {
    if (!config.enabled) {
        logger.info('Clinical reviewer disabled, running classifier-only');
        return new UnavailableClinicalReviewer();
    }
    try {
        return new GenerativeClinicalReviewer(new VertexReasoningClient(config), config);
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Clinical reviewer could not be initialised');
        return new UnavailableClinicalReviewer(errorMessage(error));
    }
}
