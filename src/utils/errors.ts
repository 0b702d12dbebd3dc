/**
 * Error taxonomy for the diagnosis pipeline.
 * Only ValidationError is surfaced to callers; the rest are degraded locally.
 */

export class DiagnosisError extends Error {
    readonly code: string;
    readonly status: number;

    constructor(message: string, code: string, status = 500) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
    }
}

export class ValidationError extends DiagnosisError {
    readonly violations: string[];

    constructor(violations: string[]) {
        super(`Invalid patient data: ${violations.join('; ')}`, 'VALIDATION_ERROR', 400);
        this.violations = violations;
    }
}

export class ModelUnavailableError extends DiagnosisError {
    constructor(message = 'Classifier model is not loaded') {
        super(message, 'MODEL_UNAVAILABLE', 503);
    }
}

export class PredictionError extends DiagnosisError {
    constructor(message: string) {
        super(message, 'PREDICTION_ERROR');
    }
}

export class ReviewerUnavailableError extends DiagnosisError {
    constructor(message: string) {
        super(message, 'REVIEWER_UNAVAILABLE', 503);
    }
}

/** Network failures, timeouts, 429 and 5xx responses. Safe to retry. */
export class TransientReviewerError extends ReviewerUnavailableError {
    constructor(message: string) {
        super(message);
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
