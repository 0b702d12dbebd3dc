/**
 * Severity/Urgency Scorer
 * Additive points over vitals only; never consults either diagnosis source.
 * Each vital contributes its highest matching tier.
 */

import { PatientRecord } from '../models/patient.schema';
import { SeverityAssessment, SeverityBreakdown, UrgencyLevel } from '../models/diagnosis-types';

/** Sum of the top tier of every vital. */
export const MAX_SEVERITY_POINTS = 14;

const URGENCY_THRESHOLDS: Array<[number, UrgencyLevel]> = [
    [0.7, 'emergency'],
    [0.4, 'urgent'],
];

const temperaturePoints = (t: number): number => {
    if (t >= 39.0 || t <= 35.0) return 2;
    if (t >= 38.5) return 1;
    return 0;
};

const heartRatePoints = (hr: number): number => {
    if (hr >= 130 || hr <= 40) return 3;
    if (hr >= 110 || hr <= 50) return 2;
    if (hr >= 100) return 1;
    return 0;
};

const systolicPoints = (sbp: number): number => {
    if (sbp < 90 || sbp >= 180) return 2;
    if (sbp >= 160) return 1;
    return 0;
};

const respiratoryPoints = (rr: number): number => {
    if (rr > 25 || rr < 10) return 2;
    if (rr > 20) return 1;
    return 0;
};

const oxygenPoints = (spo2: number): number => {
    if (spo2 < 92) return 3;
    if (spo2 < 95) return 1;
    return 0;
};

const painPoints = (pain: number): number => {
    if (pain >= 8) return 2;
    if (pain >= 5) return 1;
    return 0;
};

export function scoreBreakdown(record: PatientRecord): SeverityBreakdown {
    const parts = {
        temperature: temperaturePoints(record.temperature),
        heartRate: heartRatePoints(record.heartRate),
        systolicBp: systolicPoints(record.systolicBp),
        respiratoryRate: respiratoryPoints(record.respiratoryRate),
        oxygenSaturation: oxygenPoints(record.oxygenSaturation),
        painScore: painPoints(record.painScore),
    };
    const total = Object.values(parts).reduce((a, b) => a + b, 0);
    return { ...parts, total };
}

export function urgencyFor(severityScore: number): UrgencyLevel {
    for (const [threshold, level] of URGENCY_THRESHOLDS) {
        if (severityScore >= threshold) return level;
    }
    return 'routine';
}

export function scoreSeverity(record: PatientRecord): SeverityAssessment {
    const { total } = scoreBreakdown(record);
    const normalized = Math.min(1, Math.max(0, total / MAX_SEVERITY_POINTS));
    const severityScore = Math.round(normalized * 100) / 100;
    return { severityScore, urgencyLevel: urgencyFor(severityScore) };
}
