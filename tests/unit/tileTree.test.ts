/**
 * Unit tests for whole-tree algorithms and coordinate helpers.
 */

import { describe, expect, it, beforeEach } from 'vitest';
import { LeafNode, SplitNode, type ILeafNodeHost, type TileNode } from '../../src/tile/tileNode.js';
import { TileNodeRegistry } from '../../src/tile/tileNodeRegistry.js';
import { BaseTileView } from '../../src/tile/tileView.js';
import { TileTransaction } from '../../src/tile/tileTransaction.js';
import { collectLeaves, flattenTree, getRoot, hasLeaves, wrapInSplit } from '../../src/tile/tileTree.js';
import {
  IDENTITY_COORDINATE_SPACE,
  distributeProportionally,
  getWorkspaceRectangle,
  toTreePoint,
  toTreeRectangle,
  toWorkspaceLocalPoint,
  toWorkspaceLocalRectangle,
  workspaceAt,
  type ITileCoordinateSpace,
} from '../../src/tile/geometry.js';
import { SplitDirection, TileNodeType, type Rectangle } from '../../src/tile/tileTypes.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function rect(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width, height };
}

/** Compact structural description, e.g. `H(a,V(b,c))`. */
function describeTree(node: TileNode): string {
  if (node.type === TileNodeType.Leaf) {
    return node.view.id;
  }
  const prefix = node.direction === SplitDirection.Horizontal ? 'H' : 'V';
  return `${prefix}(${node.children.map(describeTree).join(',')})`;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('tile tree', () => {
  let host: ILeafNodeHost;
  let root: SplitNode;

  function leaf(id: string): LeafNode {
    return new LeafNode(new BaseTileView(id), host);
  }

  beforeEach(() => {
    host = {
      registry: new TileNodeRegistry(),
      coordinateSpace: IDENTITY_COORDINATE_SPACE,
      animationDuration: 0,
    };
    root = new SplitNode(SplitDirection.Horizontal);
    root.setGeometry(rect(0, 0, 1000, 500));
  });

  // ── getRoot ──

  describe('getRoot', () => {
    it('walks up to the topmost split', () => {
      const column = new SplitNode(SplitDirection.Vertical);
      const a = leaf('a');
      root.addChild(column);
      column.addChild(a);

      expect(getRoot(a)).toBe(root);
      expect(getRoot(column)).toBe(root);
      expect(getRoot(root)).toBe(root);
    });

    it('is undefined for a leaf outside any tree', () => {
      expect(getRoot(leaf('a'))).toBeUndefined();
    });
  });

  // ── flattenTree ──

  describe('flattenTree', () => {
    it('lets the root absorb a single split child and keeps its identity', () => {
      const column = new SplitNode(SplitDirection.Vertical);
      const a = leaf('a');
      const b = leaf('b');
      root.addChild(column);
      column.addChild(a);
      column.addChild(b);

      expect(flattenTree(root)).toBe(true);

      expect(describeTree(root)).toBe('V(a,b)');
      expect(root.direction).toBe(SplitDirection.Vertical);
      expect(a.parent).toBe(root);
      expect(getRoot(b)).toBe(root);
      expect(column.isDisposed).toBe(true);
    });

    it('replaces a chain of single-child splits by the leaf at its end', () => {
      const outer = new SplitNode(SplitDirection.Vertical);
      const inner = new SplitNode(SplitDirection.Horizontal);
      const a = leaf('a');
      const b = leaf('b');
      root.addChild(outer);
      outer.addChild(inner);
      inner.addChild(a);
      root.addChild(b);
      expect(describeTree(root)).toBe('H(V(H(a)),b)');

      flattenTree(root);

      expect(describeTree(root)).toBe('H(a,b)');
      expect(a.parent).toBe(root);
      expect(a.rectangle).toEqual(rect(0, 0, 500, 500));
      expect(outer.isDisposed).toBe(true);
      expect(inner.isDisposed).toBe(true);
      expect(a.isDisposed).toBe(false);
    });

    it('prunes empty splits below the root', () => {
      const a = leaf('a');
      const empty = new SplitNode(SplitDirection.Vertical);
      root.addChild(a);
      root.addChild(empty);

      expect(flattenTree(root)).toBe(true);
      expect(describeTree(root)).toBe('H(a)');
      expect(empty.isDisposed).toBe(true);
    });

    it('keeps an empty root and reports that no leaves remain', () => {
      expect(flattenTree(root)).toBe(false);
      expect(root.isDisposed).toBe(false);
      expect(root.childCount).toBe(0);
    });

    it('reports no leaves when only empty splits were left', () => {
      const column = new SplitNode(SplitDirection.Vertical);
      column.addChild(new SplitNode(SplitDirection.Horizontal));
      root.addChild(column);

      expect(flattenTree(root)).toBe(false);
      expect(describeTree(root)).toBe('H()');
    });

    it('keeps a root with a single leaf', () => {
      const a = leaf('a');
      root.addChild(a);

      expect(flattenTree(root)).toBe(true);
      expect(describeTree(root)).toBe('H(a)');
    });

    it('leaves a tree without redundant levels unchanged', () => {
      const a = leaf('a');
      const column = new SplitNode(SplitDirection.Vertical);
      root.addChild(a);
      root.addChild(column);
      column.addChild(leaf('b'));
      column.addChild(leaf('c'));

      const tx = new TileTransaction();
      flattenTree(root, tx);

      expect(describeTree(root)).toBe('H(a,V(b,c))');
      expect(tx.isEmpty).toBe(true);
    });

    it('is idempotent', () => {
      const outer = new SplitNode(SplitDirection.Vertical);
      const inner = new SplitNode(SplitDirection.Horizontal);
      root.addChild(outer);
      outer.addChild(inner);
      outer.addChild(leaf('a'));
      inner.addChild(leaf('b'));
      inner.addChild(new SplitNode(SplitDirection.Vertical));

      flattenTree(root);
      const once = describeTree(root);
      flattenTree(root);

      expect(once).toBe('V(b,a)');
      expect(describeTree(root)).toBe(once);
    });

    it('lays the root out again through the transaction after a change', () => {
      const column = new SplitNode(SplitDirection.Vertical);
      const a = leaf('a');
      const b = leaf('b');
      root.addChild(column);
      column.addChild(a);
      column.addChild(b);

      const tx = new TileTransaction();
      flattenTree(root, tx);

      expect(tx.getGeometry(a.view)).toEqual(rect(0, 0, 1000, 250));
      expect(tx.getGeometry(b.view)).toEqual(rect(0, 250, 1000, 250));
    });
  });

  // ── wrapInSplit ──

  describe('wrapInSplit', () => {
    it('inserts a split in place of a child without moving its siblings', () => {
      const a = leaf('a');
      const b = leaf('b');
      root.addChild(a);
      root.addChild(b);

      const column = wrapInSplit(a, SplitDirection.Vertical);
      const c = leaf('c');
      column.addChild(c);

      expect(describeTree(root)).toBe('H(V(a,c),b)');
      expect(root.indexOfChild(column)).toBe(0);
      expect(column.rectangle).toEqual(rect(0, 0, 500, 500));
      expect(a.rectangle).toEqual(rect(0, 0, 500, 250));
      expect(c.rectangle).toEqual(rect(0, 250, 500, 250));
      expect(b.rectangle).toEqual(rect(500, 0, 500, 500));
    });

    it('wraps a detached node into a new root of the same geometry', () => {
      const a = leaf('a');
      a.setGeometry(rect(10, 20, 300, 200));

      const split = wrapInSplit(a, SplitDirection.Horizontal);

      expect(split.parent).toBeUndefined();
      expect(split.rectangle).toEqual(rect(10, 20, 300, 200));
      expect(a.rectangle).toEqual(rect(10, 20, 300, 200));
      expect(getRoot(a)).toBe(split);
    });
  });

  // ── Traversal ──

  describe('traversal', () => {
    it('collects leaves in pre-order', () => {
      const a = leaf('a');
      const b = leaf('b');
      const c = leaf('c');
      const column = new SplitNode(SplitDirection.Vertical);
      root.addChild(a);
      root.addChild(column);
      column.addChild(b);
      column.addChild(c);

      expect(collectLeaves(root)).toEqual([a, b, c]);
      expect(collectLeaves(column)).toEqual([b, c]);
      expect(hasLeaves(root)).toBe(true);
      expect(hasLeaves(new SplitNode(SplitDirection.Horizontal))).toBe(false);
    });
  });
});

// ─── Geometry ──────────────────────────────────────────────────────────────

describe('coordinate transforms', () => {
  const space: ITileCoordinateSpace = {
    currentWorkspace: { x: 1, y: 2 },
    outputResolution: { width: 1000, height: 800 },
  };

  it('converts between tree and workspace-local coordinates', () => {
    expect(toWorkspaceLocalPoint(space, { x: 1500, y: 1700 })).toEqual({ x: 500, y: 100 });
    expect(toTreePoint(space, { x: 500, y: 100 })).toEqual({ x: 1500, y: 1700 });
    expect(toWorkspaceLocalRectangle(space, rect(1010, 1620, 30, 40))).toEqual(rect(10, 20, 30, 40));
    expect(toTreeRectangle(space, rect(10, 20, 30, 40))).toEqual(rect(1010, 1620, 30, 40));
  });

  it('falls back to 1920x1080 without an output', () => {
    const unattached: ITileCoordinateSpace = { currentWorkspace: { x: 1, y: 0 }, outputResolution: undefined };
    expect(toWorkspaceLocalPoint(unattached, { x: 2000, y: 10 })).toEqual({ x: 80, y: 10 });
    expect(getWorkspaceRectangle(unattached, { x: 0, y: 1 })).toEqual(rect(0, 1080, 1920, 1080));
  });

  it('finds the workspace containing a point', () => {
    expect(workspaceAt(space, { x: 2500, y: 900 })).toEqual({ x: 2, y: 1 });
    expect(workspaceAt(space, { x: 999, y: 799 })).toEqual({ x: 0, y: 0 });
    expect(workspaceAt(space, { x: -1, y: 0 })).toEqual({ x: -1, y: 0 });
  });
});

describe('distributeProportionally', () => {
  it('floors every part but the last', () => {
    expect(distributeProportionally(1000, [1, 1, 1])).toEqual([333, 333, 334]);
    expect(distributeProportionally(100, [3, 1])).toEqual([75, 25]);
  });

  it('divides equally when no weight is positive', () => {
    expect(distributeProportionally(10, [0, 0])).toEqual([5, 5]);
  });

  it('treats negative weights as zero', () => {
    expect(distributeProportionally(100, [-5, 5])).toEqual([0, 100]);
  });

  it('returns nothing for no weights', () => {
    expect(distributeProportionally(7, [])).toEqual([]);
  });
});
