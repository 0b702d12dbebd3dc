import { LoadedModel } from '../src/ai/classifier/model-store';
import { ReasoningCallOptions, ReasoningClient, ReasoningResponse } from '../src/ai/reviewer/client';
import { ClinicalReviewer } from '../src/services/clinical-reviewer.service';
import { PatientRecord, validatePatientRecord } from '../src/models/patient.schema';
import { ClassifierOpinion, ReviewOutcome, ReviewerOpinion, TreatmentStep } from '../src/models/diagnosis-types';

export const NORMAL_VITALS = {
    age: 30,
    temperature: 37.0,
    heartRate: 70,
    systolicBp: 120,
    diastolicBp: 80,
    respiratoryRate: 16,
    oxygenSaturation: 99,
    painScore: 0,
};

export const SEPTIC_VITALS = {
    age: 65,
    temperature: 39.5,
    heartRate: 115,
    systolicBp: 85,
    diastolicBp: 50,
    respiratoryRate: 28,
    oxygenSaturation: 88,
    painScore: 0,
};

export const makeRecord = (overrides: Record<string, unknown> = {}): PatientRecord =>
    validatePatientRecord({ ...NORMAL_VITALS, ...overrides });

export const makeOpinion = (overrides: Partial<ReviewerOpinion> = {}): ReviewerOpinion => ({
    diagnosis: 'Pneumonia',
    validationVerdict: 'Correct',
    certainty: 0.5,
    clinicalReasoning: 'Fever with focal consolidation',
    differentials: ['Bronchitis'],
    redFlags: [],
    needsOverride: false,
    overrideReason: '',
    ...overrides,
});

/**
 * Model with a fixed output, for tests that need exact probabilities.
 */
export const fixedModel = (labels: string[], probabilities: number[], featureNames = ['temperature', 'heartrate', 'fever_high']): LoadedModel => ({
    model: {
        nClasses: labels.length,
        predictProba: () => [...probabilities],
    },
    featureNames,
    labels,
});

type Reply = string | Error | ((signal: AbortSignal | undefined) => Promise<string>);

export interface RecordedCall {
    systemInstruction: string;
    prompt: string;
    signal?: AbortSignal;
}

/**
 * Replays queued replies in order; the last reply repeats once the queue is drained.
 */
export class FakeReasoningClient implements ReasoningClient {
    readonly name = 'fake';
    readonly calls: RecordedCall[] = [];
    private readonly replies: Reply[];

    constructor(...replies: Reply[]) {
        this.replies = replies;
    }

    async generateJson(systemInstruction: string, prompt: string, options: ReasoningCallOptions = {}): Promise<ReasoningResponse> {
        this.calls.push({ systemInstruction, prompt, signal: options.signal });
        const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
        if (reply === undefined) throw new Error('FakeReasoningClient has no replies');
        if (reply instanceof Error) throw reply;
        const text = typeof reply === 'string' ? reply : await reply(options.signal);
        return { text, inferenceTimeMs: 1 };
    }
}

/** Resolves only when aborted, then rejects. */
export const hangUntilAborted = (signal: AbortSignal | undefined): Promise<string> =>
    new Promise((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('request aborted')), { once: true });
    });

/**
 * Deterministic reviewer returning a fixed outcome and plan.
 */
export class StubReviewer implements ClinicalReviewer {
    readonly name = 'stub';
    readonly seen: ClassifierOpinion[] = [];

    constructor(
        private readonly outcome: ReviewOutcome,
        private readonly plan: TreatmentStep[] | null = null,
    ) {}

    async review(opinion: ClassifierOpinion): Promise<ReviewOutcome> {
        this.seen.push(opinion);
        return this.outcome;
    }

    async planTreatment(): Promise<TreatmentStep[] | null> {
        return this.plan;
    }
}

/**
 * Reviewer whose calls reject with the given errors.
 */
export class RejectingReviewer implements ClinicalReviewer {
    readonly name = 'rejecting';

    constructor(
        private readonly failures: { review?: Error; plan?: Error },
        private readonly outcome: ReviewOutcome = { status: 'unavailable', reason: 'disabled' },
    ) {}

    async review(): Promise<ReviewOutcome> {
        if (this.failures.review) throw this.failures.review;
        return this.outcome;
    }

    async planTreatment(): Promise<TreatmentStep[] | null> {
        if (this.failures.plan) throw this.failures.plan;
        return null;
    }
}
