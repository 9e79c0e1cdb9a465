// tileTransaction.ts — batching of geometry assignments
//
// The tree appends geometry to a transaction while a top-level operation
// runs; the owning layer commits it afterwards so no half-updated layout is
// ever applied.

import { Disposable } from '../platform/lifecycle.js';
import { Emitter, type Event } from '../platform/events.js';
import type { Rectangle } from './tileTypes.js';
import type { ITileView } from './tileView.js';
import { TileTreeError } from './tileErrors.js';

/**
 * Sink the tree writes geometry into. The tree only appends.
 */
export interface ITileTransaction {
  addGeometry(view: ITileView, geometry: Rectangle): void;
}

export interface TileTransactionEntry {
  readonly view: ITileView;
  readonly geometry: Rectangle;
}

/**
 * Accumulating transaction. A later assignment for the same view replaces
 * the earlier one but keeps its original position in commit order.
 */
export class TileTransaction extends Disposable implements ITileTransaction {
  private readonly _entries = new Map<ITileView, Rectangle>();
  private _committed = false;

  private readonly _onDidCommit = this._register(new Emitter<readonly TileTransactionEntry[]>());
  readonly onDidCommit: Event<readonly TileTransactionEntry[]> = this._onDidCommit.event;

  get isCommitted(): boolean {
    return this._committed;
  }

  get isEmpty(): boolean {
    return this._entries.size === 0;
  }

  get size(): number {
    return this._entries.size;
  }

  addGeometry(view: ITileView, geometry: Rectangle): void {
    if (this._committed) {
      throw new TileTreeError(`Cannot add geometry for "${view.id}" to a committed transaction`, 'TRANSACTION_COMMITTED');
    }
    this._entries.set(view, { ...geometry });
  }

  getGeometry(view: ITileView): Rectangle | undefined {
    return this._entries.get(view);
  }

  get entries(): readonly TileTransactionEntry[] {
    return [...this._entries].map(([view, geometry]) => ({ view, geometry }));
  }

  /**
   * Apply every pending assignment to its view.
   */
  commit(): void {
    if (this._committed) {
      throw new TileTreeError('Transaction already committed', 'TRANSACTION_COMMITTED');
    }
    this._committed = true;

    const entries = this.entries;
    for (const { view, geometry } of entries) {
      view.setGeometry(geometry);
    }
    this._onDidCommit.fire(entries);
  }
}
