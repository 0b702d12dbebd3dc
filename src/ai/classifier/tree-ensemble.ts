/**
 * Tree-ensemble evaluator for classifiers exported to JSON.
 * Split nodes send `x[feature] <= threshold` left; leaves hold class weights.
 * Class probabilities are the mean of each tree's normalized leaf distribution.
 */

import { z } from 'zod';

const SplitNodeSchema = z.object({
    feature: z.number().int().nonnegative(),
    threshold: z.number(),
    left: z.number().int().nonnegative(),
    right: z.number().int().nonnegative(),
});

const LeafNodeSchema = z.object({
    value: z.array(z.number().nonnegative()).min(1),
});

const NodeSchema = z.union([SplitNodeSchema, LeafNodeSchema]);

export const TreeEnsembleSchema = z.object({
    format: z.literal('tree-ensemble/v1'),
    nClasses: z.number().int().positive(),
    trees: z.array(z.object({ nodes: z.array(NodeSchema).min(1) })).min(1),
});

export type TreeEnsembleArtifact = z.infer<typeof TreeEnsembleSchema>;
type TreeNode = z.infer<typeof NodeSchema>;

const isLeaf = (node: TreeNode): node is z.infer<typeof LeafNodeSchema> => 'value' in node;

export interface ProbabilisticModel {
    readonly nClasses: number;
    predictProba(vector: readonly number[]): number[];
}

export class TreeEnsemble implements ProbabilisticModel {
    readonly nClasses: number;
    private readonly trees: ReadonlyArray<ReadonlyArray<TreeNode>>;

    private constructor(artifact: TreeEnsembleArtifact) {
        this.nClasses = artifact.nClasses;
        this.trees = artifact.trees.map(tree => Object.freeze(tree.nodes.map(node => Object.freeze(node))));
        Object.freeze(this.trees);
    }

    /**
     * Validate structure against the feature count and build the evaluator.
     * Returns a list of problems instead of throwing so the loader can report them together.
     */
    static fromArtifact(raw: unknown, featureCount: number): TreeEnsemble | string[] {
        const parsed = TreeEnsembleSchema.safeParse(raw);
        if (!parsed.success) {
            return parsed.error.issues.map(issue => `${issue.path.join('.') || 'model'}: ${issue.message}`);
        }

        const artifact = parsed.data;
        const problems: string[] = [];
        artifact.trees.forEach((tree, t) => {
            tree.nodes.forEach((node, n) => {
                if (isLeaf(node)) {
                    if (node.value.length !== artifact.nClasses) {
                        problems.push(`trees.${t}.nodes.${n}: leaf has ${node.value.length} classes, expected ${artifact.nClasses}`);
                    }
                    return;
                }
                if (node.feature >= featureCount) {
                    problems.push(`trees.${t}.nodes.${n}: feature index ${node.feature} outside schema of ${featureCount}`);
                }
                // Children must come after their parent, which also rules out cycles.
                for (const child of [node.left, node.right]) {
                    if (child <= n || child >= tree.nodes.length) {
                        problems.push(`trees.${t}.nodes.${n}: child index ${child} is invalid`);
                    }
                }
            });
        });

        return problems.length ? problems : new TreeEnsemble(artifact);
    }

    predictProba(vector: readonly number[]): number[] {
        const totals = new Array<number>(this.nClasses).fill(0);

        for (const nodes of this.trees) {
            const leaf = this.findLeaf(nodes, vector);
            const sum = leaf.reduce((a, b) => a + b, 0);
            if (sum <= 0) {
                // An empty leaf votes uniformly.
                for (let i = 0; i < this.nClasses; i++) totals[i] += 1 / this.nClasses;
                continue;
            }
            for (let i = 0; i < this.nClasses; i++) totals[i] += leaf[i] / sum;
        }

        return totals.map(total => total / this.trees.length);
    }

    private findLeaf(nodes: ReadonlyArray<TreeNode>, vector: readonly number[]): readonly number[] {
        let node = nodes[0];
        while (!isLeaf(node)) {
            const value = vector[node.feature] ?? 0;
            if (!Number.isFinite(value)) {
                throw new Error(`Non-finite value at feature index ${node.feature}`);
            }
            node = nodes[value <= node.threshold ? node.left : node.right];
        }
        return node.value;
    }
}
