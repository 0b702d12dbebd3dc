/**
 * Model Store
 * Loads the pre-trained classifier artifacts once at startup:
 *   feature_names.csv   one feature name per line, no header
 *   disease_mapping.csv class_id,class_name
 *   disease_model.json  tree ensemble (see tree-ensemble.ts)
 */

import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import csv from 'csv-parser';
import { ProbabilisticModel, TreeEnsemble } from './tree-ensemble';
import { ModelUnavailableError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';

export const MODEL_FILES = {
    features: 'feature_names.csv',
    mapping: 'disease_mapping.csv',
    model: 'disease_model.json',
} as const;

export interface LoadedModel {
    readonly model: ProbabilisticModel;
    readonly featureNames: readonly string[];
    /** Index → class name, aligned with the model's probability output. */
    readonly labels: readonly string[];
}

export interface ModelStore {
    load(): Promise<LoadedModel>;
}

const readCsv = (filePath: string, headers: boolean): Promise<Array<Record<string, string>>> =>
    new Promise((resolve, reject) => {
        const rows: Array<Record<string, string>> = [];
        fs.createReadStream(filePath)
            .on('error', reject)
            .pipe(csv({ headers: headers ? undefined : false, mapValues: ({ value }) => String(value).trim() }))
            .on('data', (row: Record<string, string>) => {
                rows.push(row);
            })
            .on('end', () => resolve(rows))
            .on('error', reject);
    });

export class FileModelStore implements ModelStore {
    constructor(private readonly modelDir: string) {}

    async load(): Promise<LoadedModel> {
        const file = (name: string) => path.join(this.modelDir, name);

        let featureRows: Array<Record<string, string>>;
        let mappingRows: Array<Record<string, string>>;
        let rawModel: unknown;
        try {
            [featureRows, mappingRows, rawModel] = await Promise.all([
                readCsv(file(MODEL_FILES.features), false),
                readCsv(file(MODEL_FILES.mapping), true),
                fsPromises.readFile(file(MODEL_FILES.model), 'utf-8').then(text => JSON.parse(text) as unknown),
            ]);
        } catch (error) {
            throw new ModelUnavailableError(`Failed to read model artifacts from ${this.modelDir}: ${errorMessage(error)}`);
        }

        const featureNames = featureRows.map(row => row['0'] ?? '').filter(name => name.length > 0);
        if (!featureNames.length) {
            throw new ModelUnavailableError(`${MODEL_FILES.features} lists no features`);
        }

        const labels = this.buildLabels(mappingRows);

        const model = TreeEnsemble.fromArtifact(rawModel, featureNames.length);
        if (Array.isArray(model)) {
            throw new ModelUnavailableError(`${MODEL_FILES.model} is invalid: ${model.join('; ')}`);
        }
        if (model.nClasses !== labels.length) {
            throw new ModelUnavailableError(
                `Model predicts ${model.nClasses} classes but ${MODEL_FILES.mapping} names ${labels.length}`,
            );
        }

        logger.info({ modelDir: this.modelDir, features: featureNames.length, classes: labels.length }, 'Classifier artifacts loaded');

        return Object.freeze({
            model,
            featureNames: Object.freeze(featureNames),
            labels: Object.freeze(labels),
        });
    }

    private buildLabels(rows: Array<Record<string, string>>): string[] {
        const labels: string[] = [];
        for (const row of rows) {
            const id = Number(row.class_id);
            const name = row.class_name;
            if (!Number.isInteger(id) || id < 0 || !name) {
                throw new ModelUnavailableError(`${MODEL_FILES.mapping} has an invalid row: ${JSON.stringify(row)}`);
            }
            labels[id] = name;
        }
        for (let i = 0; i < labels.length; i++) {
            if (labels[i] === undefined) {
                throw new ModelUnavailableError(`${MODEL_FILES.mapping} is missing class_id ${i}`);
            }
        }
        if (!labels.length) {
            throw new ModelUnavailableError(`${MODEL_FILES.mapping} names no classes`);
        }
        return labels;
    }
}
