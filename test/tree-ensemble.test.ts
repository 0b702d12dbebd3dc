import { describe, it, expect } from 'vitest';
import { TreeEnsemble } from '../src/ai/classifier/tree-ensemble';

const artifact = {
    format: 'tree-ensemble/v1',
    nClasses: 2,
    trees: [
        {
            nodes: [{ feature: 0, threshold: 0.5, left: 1, right: 2 }, { value: [3, 1] }, { value: [0, 2] }],
        },
        // Empty leaf: votes uniformly
        { nodes: [{ value: [0, 0] }] },
    ],
};

const build = (raw: unknown, featureCount = 1): TreeEnsemble => {
    const model = TreeEnsemble.fromArtifact(raw, featureCount);
    if (Array.isArray(model)) throw new Error(model.join('; '));
    return model;
};

describe('TreeEnsemble', () => {
    it('averages normalized leaf distributions', () => {
        const model = build(artifact);
        expect(model.nClasses).toBe(2);
        expect(model.predictProba([0])).toEqual([0.625, 0.375]);
        expect(model.predictProba([1])).toEqual([0.25, 0.75]);
    });

    it('sends values equal to the threshold left', () => {
        expect(build(artifact).predictProba([0.5])).toEqual([0.625, 0.375]);
    });

    it('rejects non-finite inputs', () => {
        expect(() => build(artifact).predictProba([Number.NaN])).toThrow('Non-finite value at feature index 0');
    });

    it('reports a feature index outside the schema', () => {
        const raw = {
            format: 'tree-ensemble/v1',
            nClasses: 2,
            trees: [{ nodes: [{ feature: 3, threshold: 0, left: 1, right: 2 }, { value: [1, 0] }, { value: [0, 1] }] }],
        };
        expect(TreeEnsemble.fromArtifact(raw, 2)).toEqual(['trees.0.nodes.0: feature index 3 outside schema of 2']);
    });

    it('reports leaves with the wrong class count and backward child links', () => {
        const raw = {
            format: 'tree-ensemble/v1',
            nClasses: 2,
            trees: [{ nodes: [{ feature: 0, threshold: 0, left: 1, right: 0 }, { value: [1, 0, 0] }] }],
        };
        expect(TreeEnsemble.fromArtifact(raw, 1)).toEqual([
            'trees.0.nodes.0: child index 0 is invalid',
            'trees.0.nodes.1: leaf has 3 classes, expected 2',
        ]);
    });

    it('rejects an unknown format', () => {
        const result = TreeEnsemble.fromArtifact({ ...artifact, format: 'pickle' }, 1);
        expect(Array.isArray(result)).toBe(true);
    });
});
