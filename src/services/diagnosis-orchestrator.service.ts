/**
 * Diagnosis Orchestrator
 * validating → classifying → reviewing → reconciling → scoring → planning → done
 *
 * Only an invalid record ends in `failed` with an error for the caller. A
 * failing classifier or reviewer degrades the result and is reported through
 * `source` and `notes`.
 */

import { ClassifierAdapter, topDifferentials } from '../ai/classifier/classifier.adapter';
import { ClinicalReviewer } from './clinical-reviewer.service';
import { vectorize } from './feature-vectorizer.service';
import { decideOverride } from './override.service';
import { scoreBreakdown, scoreSeverity } from './severity.service';
import { TreatmentPlanService } from './treatment-plan.service';
import { PatientRecord, validatePatientRecord } from '../models/patient.schema';
import {
    ClassifierOpinion,
    DiagnoseOptions,
    DiagnosisSource,
    FinalDiagnosis,
    PipelineState,
    ReviewOutcome,
} from '../models/diagnosis-types';
import { ValidationError, errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export interface OrchestratorStatus {
    classifierLoaded: boolean;
    featureCount: number;
    reviewer: string;
}

interface Reconciliation {
    primaryDiagnosis: string;
    confidence: number;
    source: DiagnosisSource;
    clinicalReasoning: string;
    differentials: string[];
    redFlags: string[];
    overrideReason: string | null;
}

const CLASSIFIER_NOTES: Record<Exclude<ClassifierOpinion['status'], 'ok'>, string> = {
    model_unavailable: 'Classifier unavailable; severity is derived from vitals only',
    prediction_error: 'Classifier prediction failed',
};

export class DiagnosisOrchestrator {
    private readonly treatment: TreatmentPlanService;

    constructor(
        private readonly classifier: ClassifierAdapter,
        private readonly reviewer: ClinicalReviewer,
        treatment?: TreatmentPlanService,
    ) {
        this.treatment = treatment ?? new TreatmentPlanService(reviewer);
    }

    async diagnose(input: unknown, options: DiagnoseOptions = {}): Promise<FinalDiagnosis> {
        const trail: PipelineState[] = [];
        const enter = (state: PipelineState, detail?: Record<string, unknown>) => {
            trail.push(state);
            logger.debug({ state, ...detail }, 'Diagnosis pipeline state');
        };
        const notes: string[] = [];

        enter('validating');
        let record: PatientRecord;
        try {
            record = validatePatientRecord(input);
        } catch (error) {
            if (error instanceof ValidationError) {
                enter('failed', { stage: 'validating', violations: error.violations.length });
            }
            throw error;
        }

        enter('classifying');
        const vector = vectorize(record, this.classifier.featureSchema());
        const opinion = this.classifier.predictSafely(vector);
        if (opinion.status !== 'ok') {
            enter('failed', { stage: 'classifying', status: opinion.status });
            notes.push(CLASSIFIER_NOTES[opinion.status]);
        }

        enter('reviewing');
        const outcome = await this.consultReviewer(opinion, record, options);
        if (outcome.status === 'unavailable') {
            notes.push(`Clinical review unavailable (${outcome.reason})`);
        }

        enter('reconciling');
        const reconciled = this.reconcile(opinion, outcome);

        enter('scoring');
        const { severityScore, urgencyLevel } = scoreSeverity(record);

        enter('planning');
        const treatmentPlan = await this.treatment.assemble(
            { primaryDiagnosis: reconciled.primaryDiagnosis, severityScore },
            record,
            options,
        );

        enter('done');
        logger.info(
            {
                diagnosis: reconciled.primaryDiagnosis,
                source: reconciled.source,
                confidence: reconciled.confidence,
                severityScore,
                urgencyLevel,
                severityPoints: scoreBreakdown(record),
                protocol: treatmentPlan.protocol,
                trail,
            },
            'Diagnosis completed',
        );

        return Object.freeze({
            ...reconciled,
            differentials: Object.freeze(reconciled.differentials),
            redFlags: Object.freeze(reconciled.redFlags),
            severityScore,
            urgencyLevel,
            treatmentPlan: Object.freeze({
                ...treatmentPlan,
                steps: Object.freeze(treatmentPlan.steps.map(step => Object.freeze({ ...step }))),
            }),
            classifierDifferentials: Object.freeze(topDifferentials(opinion.probabilities).map(p => Object.freeze(p))),
            notes: Object.freeze(notes),
        });
    }

    status(): OrchestratorStatus {
        return {
            classifierLoaded: this.classifier.isLoaded(),
            featureCount: this.classifier.featureSchema().length,
            reviewer: this.reviewer.name,
        };
    }

    /**
     * A reviewer that rejects is treated like one that reported itself unavailable.
     */
    private async consultReviewer(
        opinion: ClassifierOpinion,
        record: PatientRecord,
        options: DiagnoseOptions,
    ): Promise<ReviewOutcome> {
        try {
            return await this.reviewer.review(opinion, record, options);
        } catch (error) {
            const reason = options.signal?.aborted ? 'aborted' : 'permanent_failure';
            logger.warn({ reviewer: this.reviewer.name, reason, error: errorMessage(error) }, 'Clinical reviewer rejected');
            return { status: 'unavailable', reason, detail: errorMessage(error) };
        }
    }

    private reconcile(opinion: ClassifierOpinion, outcome: ReviewOutcome): Reconciliation {
        if (outcome.status === 'unavailable') {
            return {
                primaryDiagnosis: opinion.label,
                confidence: opinion.confidence,
                source: 'classifier-only',
                clinicalReasoning: '',
                differentials: [],
                redFlags: [],
                overrideReason: null,
            };
        }

        const review = outcome.opinion;
        const decision = decideOverride(opinion.label, review.diagnosis, review);
        const shared = {
            clinicalReasoning: review.clinicalReasoning,
            differentials: [...review.differentials],
            redFlags: [...review.redFlags],
        };

        if (decision.override) {
            logger.info(
                { from: opinion.label, to: review.diagnosis, rule: decision.rule, certainty: review.certainty },
                'Reviewer diagnosis overrides classifier',
            );
            return {
                ...shared,
                primaryDiagnosis: review.diagnosis,
                confidence: Math.max(opinion.confidence, review.certainty),
                source: 'hybrid-overridden',
                overrideReason: decision.reason,
            };
        }

        return {
            ...shared,
            primaryDiagnosis: opinion.label,
            confidence: opinion.confidence,
            source: 'hybrid-validated',
            overrideReason: null,
        };
    }
}
