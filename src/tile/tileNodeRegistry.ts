// tileNodeRegistry.ts — view → leaf lookup owned by the tiling layer

import { toDisposable, type IDisposable } from '../platform/lifecycle.js';
import type { LeafNode } from './tileNode.js';
import type { ITileView } from './tileView.js';
import { TileTreeError } from './tileErrors.js';

/**
 * Maps each tiled view to the single live leaf wrapping it.
 *
 * Leaves register themselves on construction and deregister on disposal.
 */
export class TileNodeRegistry implements IDisposable {
  private readonly _leaves = new Map<ITileView, LeafNode>();

  get size(): number {
    return this._leaves.size;
  }

  /**
   * Record `leaf` as the node for `view`. Returns a disposable that removes
   * the entry again.
   */
  register(view: ITileView, leaf: LeafNode): IDisposable {
    const existing = this._leaves.get(view);
    if (existing && existing !== leaf) {
      throw new TileTreeError(`View "${view.id}" is already tiled`, 'DUPLICATE_LEAF');
    }
    this._leaves.set(view, leaf);
    return toDisposable(() => {
      if (this._leaves.get(view) === leaf) {
        this._leaves.delete(view);
      }
    });
  }

  /**
   * The leaf wrapping `view`, or `undefined` if it is not tiled.
   */
  get(view: ITileView): LeafNode | undefined {
    return this._leaves.get(view);
  }

  has(view: ITileView): boolean {
    return this._leaves.has(view);
  }

  leaves(): IterableIterator<LeafNode> {
    return this._leaves.values();
  }

  dispose(): void {
    this._leaves.clear();
  }
}
