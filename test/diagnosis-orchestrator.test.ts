import { describe, it, expect } from 'vitest';
import { ClassifierAdapter } from '../src/ai/classifier/classifier.adapter';
import { DiagnosisOrchestrator } from '../src/services/diagnosis-orchestrator.service';
import { GenerativeClinicalReviewer, UnavailableClinicalReviewer } from '../src/services/clinical-reviewer.service';
import { ValidationError } from '../src/utils/errors';
import {
    FakeReasoningClient,
    NORMAL_VITALS,
    RejectingReviewer,
    SEPTIC_VITALS,
    StubReviewer,
    fixedModel,
    makeOpinion,
} from './helpers';

const sepsisClassifier = () =>
    new ClassifierAdapter(fixedModel(['Sepsis', 'Respiratory', 'Other'], [0.7, 0.2, 0.1]));

const vagueClassifier = () =>
    new ClassifierAdapter(fixedModel(['Sepsis', 'Respiratory', 'Other'], [0.1, 0.2, 0.7]));

describe('DiagnosisOrchestrator', () => {
    it('degrades to classifier-only when the reviewer throws', async () => {
        const client = new FakeReasoningClient(new Error('connection reset'));
        const reviewer = new GenerativeClinicalReviewer(client, { timeoutMs: 1_000, retry: { maxAttempts: 3, initialDelayMs: 0 } });
        const orchestrator = new DiagnosisOrchestrator(sepsisClassifier(), reviewer);

        const result = await orchestrator.diagnose(SEPTIC_VITALS);

        expect(result).toEqual({
            primaryDiagnosis: 'Sepsis',
            confidence: 0.7,
            source: 'classifier-only',
            severityScore: 0.79,
            urgencyLevel: 'emergency',
            clinicalReasoning: '',
            differentials: [],
            redFlags: [],
            overrideReason: null,
            treatmentPlan: expect.objectContaining({ source: 'protocol', protocol: 'sepsis-infection' }),
            classifierDifferentials: [
                { diagnosis: 'Sepsis', probability: 0.7 },
                { diagnosis: 'Respiratory', probability: 0.2 },
            ],
            notes: ['Clinical review unavailable (permanent_failure)'],
        });
    });

    it('degrades to classifier-only when the reviewer itself rejects', async () => {
        const reviewer = new RejectingReviewer({ review: new Error('quota exceeded') });
        const result = await new DiagnosisOrchestrator(sepsisClassifier(), reviewer).diagnose(SEPTIC_VITALS);

        expect(result.primaryDiagnosis).toBe('Sepsis');
        expect(result.source).toBe('classifier-only');
        expect(result.confidence).toBe(0.7);
        expect(result.treatmentPlan).toMatchObject({ source: 'protocol', protocol: 'sepsis-infection' });
        expect(result.notes).toEqual(['Clinical review unavailable (permanent_failure)']);
    });

    it('falls back to the protocol when the treatment plan call rejects', async () => {
        const opinion = makeOpinion({ diagnosis: 'Sepsis', certainty: 0.9 });
        const reviewer = new RejectingReviewer({ plan: new Error('network down') }, { status: 'available', opinion });
        const result = await new DiagnosisOrchestrator(sepsisClassifier(), reviewer).diagnose(SEPTIC_VITALS);

        expect(result.source).toBe('hybrid-validated');
        expect(result.treatmentPlan).toMatchObject({ source: 'protocol', protocol: 'sepsis-infection' });
        expect(result.notes).toEqual([]);
    });

    it('validates the classifier when the reviewer agrees', async () => {
        const opinion = makeOpinion({
            diagnosis: 'Sepsis',
            validationVerdict: 'Correct',
            certainty: 0.9,
            differentials: ['Pyelonephritis'],
            redFlags: ['Lactate pending'],
        });
        const reviewer = new StubReviewer({ status: 'available', opinion });
        const result = await new DiagnosisOrchestrator(sepsisClassifier(), reviewer).diagnose(SEPTIC_VITALS);

        expect(result.source).toBe('hybrid-validated');
        expect(result.primaryDiagnosis).toBe('Sepsis');
        expect(result.confidence).toBe(0.7);
        expect(result.clinicalReasoning).toBe(opinion.clinicalReasoning);
        expect(result.differentials).toEqual(['Pyelonephritis']);
        expect(result.redFlags).toEqual(['Lactate pending']);
        expect(result.overrideReason).toBeNull();
        expect(result.notes).toEqual([]);
        expect(reviewer.seen[0].label).toBe('Sepsis');
    });

    it('overrides a vague classifier label', async () => {
        const opinion = makeOpinion({ diagnosis: 'Community-Acquired Pneumonia', certainty: 0.5, validationVerdict: 'Unsure' });
        const reviewer = new StubReviewer({ status: 'available', opinion });
        const result = await new DiagnosisOrchestrator(vagueClassifier(), reviewer).diagnose({
            ...NORMAL_VITALS,
            temperature: 38.9,
            respiratoryRate: 24,
        });

        expect(result.primaryDiagnosis).toBe('Community-Acquired Pneumonia');
        expect(result.source).toBe('hybrid-overridden');
        expect(result.confidence).toBe(0.7);
        expect(result.overrideReason).toBe(
            'Classifier diagnosis "Other" is too vague; reviewer proposed "Community-Acquired Pneumonia"',
        );
        expect(result.treatmentPlan).toMatchObject({ source: 'protocol', protocol: 'respiratory' });
        // temperature 1 + respiratory rate 1
        expect(result.severityScore).toBe(0.14);
        expect(result.urgencyLevel).toBe('routine');
    });

    it('takes the reviewer certainty when it exceeds the classifier confidence', async () => {
        const opinion = makeOpinion({ diagnosis: 'Community-Acquired Pneumonia', certainty: 0.93 });
        const result = await new DiagnosisOrchestrator(vagueClassifier(), new StubReviewer({ status: 'available', opinion })).diagnose(
            NORMAL_VITALS,
        );
        expect(result.confidence).toBe(0.93);
    });

    it('uses the reviewer treatment plan for the final diagnosis', async () => {
        const opinion = makeOpinion({ diagnosis: 'Community-Acquired Pneumonia' });
        const steps = [{ category: 'Medication', action: 'Amoxicillin 1 g PO TID' }];
        const reviewer = new StubReviewer({ status: 'available', opinion }, steps);
        const result = await new DiagnosisOrchestrator(vagueClassifier(), reviewer).diagnose(NORMAL_VITALS);

        expect(result.treatmentPlan).toEqual({ source: 'reviewer', protocol: null, steps });
    });

    it('continues without a classifier model', async () => {
        const opinion = makeOpinion({ diagnosis: 'Pneumonia', certainty: 0.4 });
        const orchestrator = new DiagnosisOrchestrator(new ClassifierAdapter(null), new StubReviewer({ status: 'available', opinion }));
        const result = await orchestrator.diagnose(SEPTIC_VITALS);

        expect(result.primaryDiagnosis).toBe('Pneumonia');
        expect(result.source).toBe('hybrid-overridden');
        expect(result.confidence).toBe(0.4);
        expect(result.severityScore).toBe(0.79);
        expect(result.classifierDifferentials).toEqual([]);
        expect(result.notes).toEqual(['Classifier unavailable; severity is derived from vitals only']);
    });

    it('reports both degradations when neither source is available', async () => {
        const orchestrator = new DiagnosisOrchestrator(new ClassifierAdapter(null), new UnavailableClinicalReviewer());
        const result = await orchestrator.diagnose(NORMAL_VITALS);

        expect(result.primaryDiagnosis).toBe('Unknown (classifier unavailable)');
        expect(result.confidence).toBe(0);
        expect(result.source).toBe('classifier-only');
        expect(result.treatmentPlan.protocol).toBe('general');
        expect(result.notes).toEqual([
            'Classifier unavailable; severity is derived from vitals only',
            'Clinical review unavailable (disabled)',
        ]);
    });

    it('rejects invalid records with every violation', async () => {
        const orchestrator = new DiagnosisOrchestrator(sepsisClassifier(), new UnavailableClinicalReviewer());
        const attempt = orchestrator.diagnose({ ...NORMAL_VITALS, age: 150, oxygenSaturation: 60 });

        await expect(attempt).rejects.toBeInstanceOf(ValidationError);
        await expect(attempt).rejects.toMatchObject({
            violations: [
                'age: Age must be between 0 years and 120 years',
                'oxygenSaturation: Oxygen saturation must be between 70% and 100%',
            ],
        });
    });

    it('is idempotent with a deterministic reviewer', async () => {
        const opinion = makeOpinion({ diagnosis: 'Septic Shock', needsOverride: true, certainty: 0.85, overrideReason: 'Shock' });
        const orchestrator = new DiagnosisOrchestrator(sepsisClassifier(), new StubReviewer({ status: 'available', opinion }));
        const input = { ...SEPTIC_VITALS, symptoms: ['confusion', 'fever'] };

        const first = await orchestrator.diagnose(input);
        const second = await orchestrator.diagnose(input);

        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
        expect(first.source).toBe('hybrid-overridden');
        expect(first.treatmentPlan.protocol).toBe('trauma-shock');
    });

    it('returns a deeply frozen result that later calls do not share', async () => {
        const opinion = makeOpinion({ diagnosis: 'Sepsis', certainty: 0.9, differentials: ['Pyelonephritis'], redFlags: ['Hypotension'] });
        const steps = [{ category: 'Immediate', action: 'Start fluids' }];
        const orchestrator = new DiagnosisOrchestrator(sepsisClassifier(), new StubReviewer({ status: 'available', opinion }, steps));

        const first = await orchestrator.diagnose(SEPTIC_VITALS);

        expect(Object.isFrozen(first)).toBe(true);
        expect(Object.isFrozen(first.differentials)).toBe(true);
        expect(Object.isFrozen(first.redFlags)).toBe(true);
        expect(Object.isFrozen(first.notes)).toBe(true);
        expect(Object.isFrozen(first.classifierDifferentials[0])).toBe(true);
        expect(Object.isFrozen(first.treatmentPlan)).toBe(true);
        expect(Object.isFrozen(first.treatmentPlan.steps)).toBe(true);
        expect(Object.isFrozen(first.treatmentPlan.steps[0])).toBe(true);
        expect(() => Reflect.apply(Array.prototype.push, first.differentials, ['Injected'])).toThrow(TypeError);

        const second = await orchestrator.diagnose(SEPTIC_VITALS);

        expect(second.differentials).toEqual(['Pyelonephritis']);
        expect(second.differentials).not.toBe(first.differentials);
        expect(second.treatmentPlan.steps).not.toBe(first.treatmentPlan.steps);
        expect(opinion.differentials).toEqual(['Pyelonephritis']);
        expect(steps).toEqual([{ category: 'Immediate', action: 'Start fluids' }]);
        expect(Object.isFrozen(steps)).toBe(false);
    });

    it('reports its status', () => {
        const orchestrator = new DiagnosisOrchestrator(sepsisClassifier(), new UnavailableClinicalReviewer());
        expect(orchestrator.status()).toEqual({ classifierLoaded: true, featureCount: 3, reviewer: 'unavailable' });
    });
});
