/**
 * Defensive parsing of reviewer responses.
 * Model output is untrusted: it may be wrapped in prose or code fences, use
 * older field names, or send numbers and booleans as strings.
 */

import { ReviewerOpinion, TreatmentStep } from '../../models/diagnosis-types';

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParse = (text: string): JsonObject | null => {
    try {
        const value: unknown = JSON.parse(text);
        return isObject(value) ? value : null;
    } catch {
        return null;
    }
};

/**
 * Direct parse, then fenced block, then the outermost `{...}` span.
 */
export function extractJsonObject(text: string): JsonObject | null {
    const trimmed = text.trim();
    if (!trimmed) return null;

    const direct = tryParse(trimmed);
    if (direct) return direct;

    const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
    if (fenced) {
        const inner = tryParse(fenced[1].trim());
        if (inner) return inner;
    }

    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start !== -1 && end > start) {
        return tryParse(trimmed.slice(start, end + 1));
    }
    return null;
}

const pick = (obj: JsonObject, keys: readonly string[]): unknown => {
    for (const key of keys) {
        if (obj[key] !== undefined && obj[key] !== null) return obj[key];
    }
    return undefined;
};

const toText = (value: unknown): string => {
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return '';
};

export function toCertainty(value: unknown): number {
    let n: number;
    if (typeof value === 'number') {
        n = value;
    } else if (typeof value === 'string') {
        const match = value.trim().match(/^(-?\d+(?:\.\d+)?)\s*(%?)$/);
        if (!match) return 0;
        n = Number(match[1]) / (match[2] ? 100 : 1);
    } else {
        return 0;
    }
    if (!Number.isFinite(n)) return 0;
    // "85" is read as a percentage.
    if (n > 1 && n <= 100) n /= 100;
    return Math.min(1, Math.max(0, n));
}

const LIST_ITEM_KEYS = ['diagnosis', 'name', 'condition', 'flag', 'item', 'text'];

export function toStringList(value: unknown): string[] {
    if (typeof value === 'string') {
        return value
            .split(/[,;\n]/)
            .map(item => item.trim())
            .filter(Boolean);
    }
    if (!Array.isArray(value)) return [];

    const items: string[] = [];
    for (const entry of value) {
        const text = isObject(entry) ? toText(pick(entry, LIST_ITEM_KEYS)) : toText(entry);
        if (text) items.push(text);
    }
    return items;
}

const toBoolean = (value: unknown): boolean => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'string') return ['true', 'yes', '1'].includes(value.trim().toLowerCase());
    return value === 1;
};

const OPINION_FIELDS = {
    diagnosis: ['diagnosis', 'reviewer_diagnosis', 'gemini_diagnosis', 'primary_diagnosis'],
    verdict: ['validation_verdict', 'ml_validation', 'validationVerdict', 'verdict'],
    certainty: ['certainty', 'confidence'],
    reasoning: ['clinical_reasoning', 'clinicalReasoning', 'reasoning', 'gemini_diagnostic_plan'],
    differentials: ['differentials', 'differential_diagnoses', 'gemini_differentials'],
    redFlags: ['red_flags', 'redFlags'],
    needsOverride: ['needs_override', 'needsOverride'],
    overrideReason: ['override_reason', 'overrideReason'],
} as const;

/**
 * Coerce a response into a ReviewerOpinion, or null when no diagnosis can be recovered.
 */
export function parseReviewerOpinion(text: string): ReviewerOpinion | null {
    const raw = extractJsonObject(text);
    if (!raw) return null;

    const diagnosis = toText(pick(raw, OPINION_FIELDS.diagnosis));
    if (!diagnosis) return null;

    return {
        diagnosis,
        validationVerdict: toText(pick(raw, OPINION_FIELDS.verdict)) || 'Unsure',
        certainty: toCertainty(pick(raw, OPINION_FIELDS.certainty)),
        clinicalReasoning: toText(pick(raw, OPINION_FIELDS.reasoning)),
        differentials: toStringList(pick(raw, OPINION_FIELDS.differentials)),
        redFlags: toStringList(pick(raw, OPINION_FIELDS.redFlags)),
        needsOverride: toBoolean(pick(raw, OPINION_FIELDS.needsOverride)),
        overrideReason: toText(pick(raw, OPINION_FIELDS.overrideReason)),
    };
}

const PLAN_SECTIONS: ReadonlyArray<[string, readonly string[]]> = [
    ['Immediate', ['immediate_interventions', 'immediateInterventions']],
    ['Medication', ['medications']],
    ['Monitoring', ['monitoring']],
    ['Follow-up', ['follow_up', 'followUp']],
    ['Education', ['patient_education', 'patientEducation']],
];

/**
 * Flatten a plan response into ordered steps, or null when it holds none.
 */
export function parseTreatmentSteps(text: string): TreatmentStep[] | null {
    const raw = extractJsonObject(text);
    if (!raw) return null;

    const steps: TreatmentStep[] = [];
    for (const [category, keys] of PLAN_SECTIONS) {
        for (const action of toStringList(pick(raw, keys))) {
            steps.push({ category, action });
        }
    }
    return steps.length ? steps : null;
}
