/**
 * Feature Vectorizer
 * Maps a patient record onto the classifier's trained feature schema.
 *
 * The flag thresholds below are baked into the trained model's feature
 * engineering and must stay identical to the training code.
 */

import { PatientRecord } from '../models/patient.schema';
import { FeatureVector } from '../models/diagnosis-types';

export const CLINICAL_FLAG_THRESHOLDS = Object.freeze({
    feverHighC: 38.5,
    tachycardiaBpm: 100,
    hypotensionSystolic: 90,
    hypoxiaSpO2: 90,
});

export interface ClinicalFlags {
    fever_high: number;
    tachycardia: number;
    hypotension: number;
    hypoxia: number;
}

const flag = (condition: boolean): number => (condition ? 1.0 : 0.0);

export function computeClinicalFlags(record: PatientRecord): ClinicalFlags {
    return {
        fever_high: flag(record.temperature > CLINICAL_FLAG_THRESHOLDS.feverHighC),
        tachycardia: flag(record.heartRate > CLINICAL_FLAG_THRESHOLDS.tachycardiaBpm),
        hypotension: flag(record.systolicBp < CLINICAL_FLAG_THRESHOLDS.hypotensionSystolic),
        hypoxia: flag(record.oxygenSaturation < CLINICAL_FLAG_THRESHOLDS.hypoxiaSpO2),
    };
}

const SEVERE_SYMPTOMS = ['confusion', 'chest pain', 'shortness of breath', 'unconscious', 'seizure', 'bleeding'];

/**
 * ESI-style acuity proxy, 1 (resuscitation) to 5 (non-urgent).
 */
export function estimateAcuity(record: PatientRecord, flags: ClinicalFlags = computeClinicalFlags(record)): number {
    if (flags.hypotension || flags.hypoxia) return 1;

    const symptoms = record.symptoms.map(s => s.toLowerCase());
    const severeSymptom = symptoms.some(s => SEVERE_SYMPTOMS.some(term => s.includes(term)));
    if (flags.fever_high || flags.tachycardia || severeSymptom || record.painScore >= 8) return 2;

    if (record.painScore >= 5 || symptoms.length >= 2) return 3;
    if (symptoms.length === 1 || record.painScore > 0) return 4;
    return 5;
}

/**
 * Every feature value this record can supply, keyed by lower-case feature name.
 * Training column names and snake_case aliases resolve to the same value.
 */
export function resolvableFeatures(record: PatientRecord): Map<string, number> {
    const flags = computeClinicalFlags(record);
    const entries: Array<[string[], number]> = [
        [['temperature', 'temp'], record.temperature],
        [['heartrate', 'heart_rate'], record.heartRate],
        [['resprate', 'respiratory_rate'], record.respiratoryRate],
        [['sbp', 'systolic_bp'], record.systolicBp],
        [['dbp', 'diastolic_bp'], record.diastolicBp],
        [['o2sat', 'oxygen_saturation'], record.oxygenSaturation],
        [['anchor_age', 'age'], record.age],
        [['pain', 'pain_score'], record.painScore],
        [['acuity', 'acuity_score'], estimateAcuity(record, flags)],
        [['fever_high'], flags.fever_high],
        [['tachycardia'], flags.tachycardia],
        [['hypotension'], flags.hypotension],
        [['hypoxia'], flags.hypoxia],
        [['gender_male'], flag(record.gender === 'male')],
        [['gender_female'], flag(record.gender === 'female')],
    ];

    const features = new Map<string, number>();
    for (const [names, value] of entries) {
        for (const name of names) features.set(name, value);
    }
    return features;
}

/**
 * Build the vector in schema order. Names the record cannot supply become 0.0.
 */
export function vectorize(record: PatientRecord, schema: readonly string[]): FeatureVector {
    const features = resolvableFeatures(record);
    return schema.map(name => features.get(name.trim().toLowerCase()) ?? 0.0);
}
