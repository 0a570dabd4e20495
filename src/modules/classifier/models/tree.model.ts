/**
 * Decision Tree Classifier
 * ========================
 * Walks a fitted CART tree; leaves hold p(confirmed).
 */

import type { Classifier } from '../contracts/classifier.types.js';
import type { TreeNode } from '../contracts/artifact.schema.js';

export class DecisionTree implements Classifier {
  readonly type = 'tree' as const;

  constructor(
    private readonly root: TreeNode,
    readonly inputWidth: number
  ) {}

  predictProbaOne(x: readonly number[]): number {
    let node: TreeNode = this.root;
    while (node.type === 'split') {
      const v = x[node.feature] ?? 0;
      node = v <= node.threshold ? node.left : node.right;
    }
    return node.p;
  }

  predictProba(X: readonly number[][]): number[] {
    return X.map((row) => this.predictProbaOne(row));
  }

  /** Largest feature index any split reads, or -1 for a single leaf. */
  maxFeatureIndex(): number {
    let max = -1;
    const traverse = (node: TreeNode) => {
      if (node.type === 'leaf') return;
      max = Math.max(max, node.feature);
      traverse(node.left);
      traverse(node.right);
    };
    traverse(this.root);
    return max;
  }
}
