import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileModelStore, MODEL_FILES } from '../src/ai/classifier/model-store';
import { ModelUnavailableError } from '../src/utils/errors';

const MODEL_DIR = path.resolve(__dirname, '../models');

describe('FileModelStore', () => {
    let scratch: string;

    beforeAll(() => {
        scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'model-store-'));
    });

    afterAll(() => {
        fs.rmSync(scratch, { recursive: true, force: true });
    });

    const writeArtifacts = (dir: string, files: Partial<Record<keyof typeof MODEL_FILES, string>>) => {
        fs.mkdirSync(dir, { recursive: true });
        for (const key of ['features', 'mapping', 'model'] as const) {
            const contents = files[key] ?? fs.readFileSync(path.join(MODEL_DIR, MODEL_FILES[key]), 'utf-8');
            fs.writeFileSync(path.join(dir, MODEL_FILES[key]), contents);
        }
    };

    it('loads the bundled artifacts', async () => {
        const loaded = await new FileModelStore(MODEL_DIR).load();

        expect(loaded.featureNames).toEqual([
            'temperature',
            'heartrate',
            'resprate',
            'sbp',
            'dbp',
            'o2sat',
            'anchor_age',
            'fever_high',
            'tachycardia',
            'hypotension',
            'hypoxia',
        ]);
        expect(loaded.labels).toEqual([
            'Cardiovascular',
            'Gastrointestinal',
            'Metabolic',
            'Neurological',
            'Other',
            'Respiratory',
            'Sepsis',
            'Trauma',
        ]);
        expect(loaded.model.nClasses).toBe(8);
        expect(Object.isFrozen(loaded.featureNames)).toBe(true);
    });

    it('fails with ModelUnavailableError when the directory is missing', async () => {
        await expect(new FileModelStore(path.join(scratch, 'missing')).load()).rejects.toBeInstanceOf(ModelUnavailableError);
    });

    it('rejects a mapping that disagrees with the model class count', async () => {
        const dir = path.join(scratch, 'mismatch');
        writeArtifacts(dir, { mapping: 'class_id,class_name\n0,Sepsis\n1,Other\n' });

        await expect(new FileModelStore(dir).load()).rejects.toThrow(
            'Model predicts 8 classes but disease_mapping.csv names 2',
        );
    });

    it('rejects a mapping with a gap in class ids', async () => {
        const dir = path.join(scratch, 'gap');
        writeArtifacts(dir, { mapping: 'class_id,class_name\n0,Sepsis\n2,Other\n' });

        await expect(new FileModelStore(dir).load()).rejects.toThrow('disease_mapping.csv is missing class_id 1');
    });

    it('rejects a model that references features beyond the schema', async () => {
        const dir = path.join(scratch, 'short-schema');
        writeArtifacts(dir, { features: 'temperature\nheartrate\n' });

        await expect(new FileModelStore(dir).load()).rejects.toThrow(/disease_model\.json is invalid: .*feature index 9 outside schema of 2/);
    });

    it('rejects an empty feature list', async () => {
        const dir = path.join(scratch, 'no-features');
        writeArtifacts(dir, { features: '' });

        await expect(new FileModelStore(dir).load()).rejects.toThrow('feature_names.csv lists no features');
    });
});
