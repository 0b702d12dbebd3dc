/**
 * TypeScript interfaces for the hybrid diagnosis pipeline.
 */

// ═══════════════════════════════════════════
// CLASSIFIER
// ═══════════════════════════════════════════

export type FeatureVector = number[];

export interface ClassProbability {
    diagnosis: string;
    probability: number;
}

export type ClassifierStatus = 'ok' | 'model_unavailable' | 'prediction_error';

export interface ClassifierOpinion {
    label: string;
    confidence: number;
    probabilities: ClassProbability[];
    status: ClassifierStatus;
}

// ═══════════════════════════════════════════
// CLINICAL REVIEWER
// ═══════════════════════════════════════════

export interface ReviewerOpinion {
    diagnosis: string;
    validationVerdict: string;
    certainty: number;
    clinicalReasoning: string;
    differentials: string[];
    redFlags: string[];
    needsOverride: boolean;
    overrideReason: string;
}

export type ReviewUnavailableReason =
    | 'disabled'
    | 'transient_failure'
    | 'permanent_failure'
    | 'malformed_response'
    | 'aborted';

export type ReviewOutcome =
    | { status: 'available'; opinion: ReviewerOpinion }
    | { status: 'unavailable'; reason: ReviewUnavailableReason; detail?: string };

// ═══════════════════════════════════════════
// OVERRIDE
// ═══════════════════════════════════════════

export type OverrideRule = 'vague_ml_diagnosis' | 'reviewer_requested' | 'verdict_incorrect' | 'category_mismatch';

export interface OverrideDecision {
    override: boolean;
    rule: OverrideRule | null;
    reason: string | null;
}

// ═══════════════════════════════════════════
// SEVERITY
// ═══════════════════════════════════════════

export type UrgencyLevel = 'routine' | 'urgent' | 'emergency';

export interface SeverityAssessment {
    severityScore: number;
    urgencyLevel: UrgencyLevel;
}

export interface SeverityBreakdown {
    temperature: number;
    heartRate: number;
    systolicBp: number;
    respiratoryRate: number;
    oxygenSaturation: number;
    painScore: number;
    total: number;
}

// ═══════════════════════════════════════════
// TREATMENT
// ═══════════════════════════════════════════

export interface TreatmentStep {
    category: string;
    action: string;
}

export interface TreatmentPlan {
    source: 'reviewer' | 'protocol';
    protocol: string | null;
    steps: readonly TreatmentStep[];
}

// ═══════════════════════════════════════════
// FINAL DIAGNOSIS
// ═══════════════════════════════════════════

export type DiagnosisSource = 'classifier-only' | 'hybrid-validated' | 'hybrid-overridden';

export type PipelineState =
    | 'validating'
    | 'classifying'
    | 'reviewing'
    | 'reconciling'
    | 'scoring'
    | 'planning'
    | 'done'
    | 'failed';

/** Frozen all the way down once returned. */
export interface FinalDiagnosis {
    readonly primaryDiagnosis: string;
    readonly confidence: number;
    readonly source: DiagnosisSource;
    readonly severityScore: number;
    readonly urgencyLevel: UrgencyLevel;
    readonly clinicalReasoning: string;
    readonly differentials: readonly string[];
    readonly redFlags: readonly string[];
    readonly treatmentPlan: Readonly<TreatmentPlan>;
    readonly overrideReason: string | null;
    readonly classifierDifferentials: readonly Readonly<ClassProbability>[];
    readonly notes: readonly string[];
}

export interface DiagnoseOptions {
    signal?: AbortSignal;
}
