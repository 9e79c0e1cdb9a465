// tileTree.ts — whole-tree algorithms: flattening, root lookup, traversal

import { SplitDirection, TileNodeType } from './tileTypes.js';
import type { ITileTransaction } from './tileTransaction.js';
import { SplitNode, type LeafNode, type TileNode } from './tileNode.js';

/**
 * Remove redundant levels from the tree below `root`:
 * - empty splits are dropped,
 * - a split with a single child is replaced by that child,
 * - if the root is left with a single split child, the root takes over that
 *   child's direction and children.
 *
 * The root object itself always survives, even with zero or one child, so
 * `getRoot` keeps returning it. Removed splits are disposed. When the
 * structure changed, the root is laid out again, through `tx` if given.
 *
 * @returns Whether any leaf remains in the tree.
 */
export function flattenTree(root: SplitNode, tx?: ITileTransaction): boolean {
  let changed = false;

  const flattenChildren = (split: SplitNode): void => {
    for (const child of [...split.children]) {
      const childSplit = child.asSplitNode();
      if (!childSplit) {
        continue;
      }

      flattenChildren(childSplit);

      if (childSplit.childCount === 0) {
        split.detachChild(childSplit);
        childSplit.dispose();
        changed = true;
      } else if (childSplit.childCount === 1) {
        const only = childSplit.detachChild(childSplit.children[0]);
        split.replaceChild(childSplit, only);
        childSplit.dispose();
        changed = true;
      }
    }
  };

  flattenChildren(root);

  const absorbed = root.absorbOnlyChild();
  if (absorbed) {
    absorbed.dispose();
    changed = true;
  }

  if (changed) {
    root.setGeometry(root.rectangle, tx);
  }

  return hasLeaves(root);
}

/**
 * The topmost split above `node` (or `node` itself). `undefined` only for a
 * leaf that is not in any tree.
 */
export function getRoot(node: TileNode): SplitNode | undefined {
  let current: TileNode = node;
  while (current.parent) {
    current = current.parent;
  }
  return current.asSplitNode();
}

/**
 * Pre-order walk over every leaf below `node`.
 */
export function forEachLeaf(node: TileNode, fn: (leaf: LeafNode) => void): void {
  if (node.type === TileNodeType.Leaf) {
    fn(node);
    return;
  }
  for (const child of node.children) {
    forEachLeaf(child, fn);
  }
}

export function collectLeaves(node: TileNode): LeafNode[] {
  const leaves: LeafNode[] = [];
  forEachLeaf(node, (leaf) => leaves.push(leaf));
  return leaves;
}

export function hasLeaves(node: TileNode): boolean {
  if (node.type === TileNodeType.Leaf) {
    return true;
  }
  return node.children.some(hasLeaves);
}

/**
 * Introduce a split point: `node` is replaced in its parent by a new split
 * of `direction` that contains it. The new split takes over the node's
 * rectangle, so siblings are unaffected.
 */
export function wrapInSplit(node: TileNode, direction: SplitDirection, tx?: ITileTransaction): SplitNode {
  const split = new SplitNode(direction);
  const parent = node.parent;

  if (parent) {
    parent.replaceChild(node, split);
  } else {
    split.setGaps(node.getGaps());
    split.setGeometry(node.rectangle, tx);
  }

  split.addChild(node, tx);
  return split;
}
