/**
 * Override Decision Engine
 * Decides whether the clinical reviewer's diagnosis supersedes the classifier's.
 * Rules are evaluated in priority order; the first match wins.
 */

import { OverrideDecision, ReviewerOpinion } from '../models/diagnosis-types';
import { matchesAny } from '../utils/keywords';

export const VAGUE_TERMS = [
    'cardiovascular',
    'respiratory',
    'gastrointestinal',
    'neurological',
    'other',
    'unknown',
    'unspecified',
    'general',
    'disease',
    'disorder',
] as const;

export type ClinicalCategory = 'cardio' | 'respiratory' | 'gi' | 'neuro' | 'other';

/** Ordered; the first bucket with a matching keyword is the diagnosis' category. */
export const CATEGORY_KEYWORDS: ReadonlyArray<[ClinicalCategory, readonly string[]]> = [
    ['cardio', ['cardi', 'heart', 'myocard', 'infarct', 'angina', 'coronary', 'arrhythm', 'mi', 'acs']],
    ['respiratory', ['respirat', 'pneumon', 'copd', 'asthma', 'bronch', 'lung', 'pulmonar']],
    ['gi', ['gastr', 'colitis', 'hepat', 'abdomin', 'stomach', 'bowel', 'pancrea', 'gi']],
    ['neuro', ['neuro', 'stroke', 'seizure', 'migraine', 'encephal', 'brain', 'mening']],
];

const THRESHOLDS = {
    reviewerRequested: 0.8,
    verdictIncorrect: 0.7,
    categoryMismatch: 0.6,
};

export const isVague = (diagnosis: string): boolean => {
    const text = diagnosis.toLowerCase();
    return VAGUE_TERMS.some(term => text.includes(term));
};

export function categorize(diagnosis: string): ClinicalCategory {
    for (const [category, keywords] of CATEGORY_KEYWORDS) {
        if (matchesAny(diagnosis, keywords)) return category;
    }
    return 'other';
}

const NO_OVERRIDE: OverrideDecision = { override: false, rule: null, reason: null };

export function decideOverride(
    mlDiagnosis: string,
    reviewerDiagnosis: string,
    opinion: ReviewerOpinion,
): OverrideDecision {
    const ml = mlDiagnosis.trim();
    const reviewer = reviewerDiagnosis.trim();
    if (!ml || !reviewer) return NO_OVERRIDE;

    if (isVague(ml) && !isVague(reviewer)) {
        return {
            override: true,
            rule: 'vague_ml_diagnosis',
            reason: `Classifier diagnosis "${ml}" is too vague; reviewer proposed "${reviewer}"`,
        };
    }

    if (opinion.needsOverride && opinion.certainty > THRESHOLDS.reviewerRequested) {
        return {
            override: true,
            rule: 'reviewer_requested',
            reason: opinion.overrideReason || 'Reviewer requested override with high certainty',
        };
    }

    if (opinion.validationVerdict.toLowerCase().includes('incorrect') && opinion.certainty > THRESHOLDS.verdictIncorrect) {
        return {
            override: true,
            rule: 'verdict_incorrect',
            reason: `Reviewer judged the classifier diagnosis incorrect (certainty ${opinion.certainty})`,
        };
    }

    const mlCategory = categorize(ml);
    const reviewerCategory = categorize(reviewer);
    if (mlCategory !== reviewerCategory && opinion.certainty > THRESHOLDS.categoryMismatch) {
        return {
            override: true,
            rule: 'category_mismatch',
            reason: `Reviewer places the case in ${reviewerCategory}, classifier in ${mlCategory}`,
        };
    }

    return NO_OVERRIDE;
}

export const shouldOverride = (mlDiagnosis: string, reviewerDiagnosis: string, opinion: ReviewerOpinion): boolean =>
    decideOverride(mlDiagnosis, reviewerDiagnosis, opinion).override;
