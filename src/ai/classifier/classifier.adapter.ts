/**
 * Classifier Adapter
 * Thin contract around the pre-trained probability model. No retries: a model
 * is either loaded at startup or the process runs in classifier-unavailable mode.
 */

import { LoadedModel } from './model-store';
import { ClassifierOpinion, ClassProbability, FeatureVector } from '../../models/diagnosis-types';
import { ModelUnavailableError, PredictionError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';

export const MODEL_UNAVAILABLE_LABEL = 'Unknown (classifier unavailable)';
export const PREDICTION_ERROR_LABEL = 'prediction error';

const DIFFERENTIAL_MIN_PROBABILITY = 0.1;
const DIFFERENTIAL_LIMIT = 5;

export const toTitleCase = (text: string): string =>
    text.toLowerCase().replace(/(^|[^a-z0-9'])([a-z])/g, (_, sep: string, ch: string) => sep + ch.toUpperCase());

export class ClassifierAdapter {
    constructor(private readonly loaded: LoadedModel | null) {}

    isLoaded(): boolean {
        return this.loaded !== null;
    }

    featureSchema(): readonly string[] {
        return this.loaded?.featureNames ?? [];
    }

    /**
     * Arg-max label and its probability plus the full distribution.
     * Ties resolve to the lowest class index.
     */
    predict(vector: FeatureVector): ClassifierOpinion {
        if (!this.loaded) {
            throw new ModelUnavailableError();
        }
        const { model, featureNames, labels } = this.loaded;

        if (vector.length !== featureNames.length) {
            throw new PredictionError(`Vector has ${vector.length} features, schema expects ${featureNames.length}`);
        }

        const raw = model.predictProba(vector);
        if (raw.length !== labels.length || raw.some(p => !Number.isFinite(p))) {
            throw new PredictionError('Model returned a malformed probability vector');
        }

        let best = 0;
        for (let i = 1; i < raw.length; i++) {
            if (raw[i] > raw[best]) best = i;
        }

        return {
            label: toTitleCase(labels[best]),
            confidence: Math.min(1, Math.max(0, raw[best])),
            probabilities: raw.map((probability, i) => ({ diagnosis: toTitleCase(labels[i]), probability })),
            status: 'ok',
        };
    }

    /**
     * Never throws: an unloaded model or a failing prediction becomes a
     * zero-confidence opinion tagged with its status.
     */
    predictSafely(vector: FeatureVector): ClassifierOpinion {
        try {
            return this.predict(vector);
        } catch (error) {
            if (error instanceof ModelUnavailableError) {
                logger.warn('Classifier unavailable, continuing with vitals-only assessment');
                return { label: MODEL_UNAVAILABLE_LABEL, confidence: 0, probabilities: [], status: 'model_unavailable' };
            }
            logger.error({ err: error, error: errorMessage(error) }, 'Classifier prediction failed');
            return { label: PREDICTION_ERROR_LABEL, confidence: 0, probabilities: [], status: 'prediction_error' };
        }
    }
}

/**
 * Classes above 10% probability, highest first, at most five.
 */
export function topDifferentials(probabilities: ClassProbability[]): ClassProbability[] {
    return probabilities
        .filter(p => p.probability > DIFFERENTIAL_MIN_PROBABILITY)
        .sort((a, b) => b.probability - a.probability)
        .slice(0, DIFFERENTIAL_LIMIT)
        .map(p => ({ diagnosis: p.diagnosis, probability: Math.round(p.probability * 10000) / 10000 }));
}
