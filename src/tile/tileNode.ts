// tileNode.ts — the tiling tree: split nodes and leaves

import { Disposable, MutableDisposable } from '../platform/lifecycle.js';
import { Emitter, EventUtils, type Event } from '../platform/events.js';
import {
  EMPTY_RECTANGLE,
  SplitDirection,
  TileNodeType,
  ZERO_GAPS,
  type GapSpec,
  type Rectangle,
} from './tileTypes.js';
import {
  distributeProportionally,
  getWorkspaceRectangle,
  type ITileCoordinateSpace,
  rectanglesEqual,
  sameSize,
  shrinkByGaps,
  toWorkspaceLocalRectangle,
  workspaceAt,
} from './geometry.js';
import type { ITileTransaction } from './tileTransaction.js';
import type { ITileView } from './tileView.js';
import type { TileNodeRegistry } from './tileNodeRegistry.js';
import { TileResizeTransformer } from './tileAnimation.js';
import { TileTreeError } from './tileErrors.js';

// ─── Tile Node (union) ──────────────────────────────────────────────────────

export type TileNode = SplitNode | LeafNode;

const NO_CHILDREN: readonly TileNode[] = Object.freeze([]);

// ─── Base Node ──────────────────────────────────────────────────────────────

/**
 * State shared by both node kinds: parent link, assigned rectangle and gaps.
 *
 * The parent link is only changed by `SplitNode` child management.
 */
export abstract class BaseTileNode extends Disposable {
  abstract readonly type: TileNodeType;

  private _parent: SplitNode | undefined;
  protected _rectangle: Rectangle = EMPTY_RECTANGLE;
  protected _gaps: GapSpec = ZERO_GAPS;

  /** The enclosing split, or `undefined` at the root. */
  get parent(): SplitNode | undefined {
    return this._parent;
  }

  get children(): readonly TileNode[] {
    return NO_CHILDREN;
  }

  /** Geometry from the most recent `setGeometry`, in tree coordinates. */
  get rectangle(): Rectangle {
    return this._rectangle;
  }

  get gaps(): GapSpec {
    return this._gaps;
  }

  getGaps(): GapSpec {
    return this._gaps;
  }

  /**
   * Assign the rectangle available to this node. The base implementation
   * only records it.
   */
  setGeometry(geometry: Rectangle, _tx?: ITileTransaction): void {
    this._rectangle = { ...geometry };
  }

  abstract setGaps(gaps: GapSpec): void;

  abstract asSplitNode(): SplitNode | undefined;
  abstract asLeafNode(): LeafNode | undefined;

  /** @internal Parent link maintenance, called by SplitNode only. */
  _setParent(parent: SplitNode | undefined): void {
    this._parent = parent;
  }

  /** @internal Record a rectangle without propagating it. */
  _assignRectangle(geometry: Rectangle): void {
    this._rectangle = { ...geometry };
  }
}

// ─── Split Node ─────────────────────────────────────────────────────────────

/**
 * Divides its rectangle among an ordered list of children along one axis.
 *
 * Children keep their relative sizes across resizes. Along the split axis
 * the node's outer gaps are consumed here and `internal` is inserted
 * between consecutive children; the last child absorbs rounding.
 */
export class SplitNode extends BaseTileNode {
  readonly type = TileNodeType.Split;

  private _children: TileNode[] = [];

  private readonly _onDidChangeChildren = this._register(new Emitter<void>());
  /** Fires after children are added, removed, replaced or absorbed. */
  readonly onDidChangeChildren: Event<void> = this._onDidChangeChildren.event;

  constructor(private _direction: SplitDirection) {
    super();
  }

  get direction(): SplitDirection {
    return this._direction;
  }

  override get children(): readonly TileNode[] {
    return this._children;
  }

  get childCount(): number {
    return this._children.length;
  }

  indexOfChild(child: TileNode): number {
    return this._children.indexOf(child);
  }

  asSplitNode(): SplitNode {
    return this;
  }

  asLeafNode(): undefined {
    return undefined;
  }

  // ── Child Management ──

  /**
   * Insert `child` at `index` (appending when out of range) and re-lay out.
   *
   * The new child is weighted as the average of the existing children, so it
   * receives `1/(N+1)` of the splittable extent and the others shrink in
   * proportion.
   */
  addChild(child: TileNode, tx?: ITileTransaction, index: number = this._children.length): void {
    this._checkInsertable(child);

    const count = this._children.length;
    const insertAt = index < 0 || index > count ? count : index;

    const weights = this._childExtents();
    const existingTotal = weights.reduce((sum, w) => sum + w, 0);
    const newWeight = count === 0 ? this.calculateSplittable() : Math.floor(existingTotal / count);
    weights.splice(insertAt, 0, newWeight);

    this._children.splice(insertAt, 0, child);
    child._setParent(this);

    this._layoutChildren(this._rectangle, tx, weights);
    this._onDidChangeChildren.fire();
  }

  /**
   * Remove `child` and give its space to the survivors in proportion to
   * their current sizes. Ownership of the detached node passes to the caller.
   */
  removeChild(child: TileNode, tx?: ITileTransaction): TileNode {
    const removed = this.detachChild(child);
    this.recalculateChildren(this._rectangle, tx);
    return removed;
  }

  /**
   * Remove `child` without re-laying out the survivors. For structural
   * edits that end with an explicit `setGeometry`.
   */
  detachChild(child: TileNode): TileNode {
    const index = this._children.indexOf(child);
    if (index < 0) {
      throw new TileTreeError(`Cannot remove a node that is not a child of this split`, 'NOT_A_CHILD');
    }
    this._children.splice(index, 1);
    child._setParent(undefined);
    this._onDidChangeChildren.fire();
    return child;
  }

  /**
   * Put `replacement` in the slot of `child`. The replacement inherits the
   * child's rectangle and this node's child gaps; no geometry is pushed.
   */
  replaceChild(child: TileNode, replacement: TileNode): TileNode {
    const index = this._children.indexOf(child);
    if (index < 0) {
      throw new TileTreeError(`Cannot replace a node that is not a child of this split`, 'NOT_A_CHILD');
    }
    this._checkInsertable(replacement);

    replacement._assignRectangle(child.rectangle);
    replacement.setGaps(this._childGaps());
    this._children[index] = replacement;
    replacement._setParent(this);
    child._setParent(undefined);
    this._onDidChangeChildren.fire();
    return child;
  }

  /**
   * If the only child is a split, take over its direction and children.
   * Returns the emptied former child, which the caller disposes.
   */
  absorbOnlyChild(): SplitNode | undefined {
    if (this._children.length !== 1) {
      return undefined;
    }
    const only = this._children[0].asSplitNode();
    if (!only) {
      return undefined;
    }

    const grandchildren = only._takeChildren();
    only._setParent(undefined);
    this._direction = only.direction;
    this._children = grandchildren;
    for (const child of grandchildren) {
      child._setParent(this);
    }
    this._onDidChangeChildren.fire();
    return only;
  }

  private _takeChildren(): TileNode[] {
    const children = this._children;
    this._children = [];
    for (const child of children) {
      child._setParent(undefined);
    }
    this._onDidChangeChildren.fire();
    return children;
  }

  private _checkInsertable(child: TileNode): void {
    if (child.isDisposed) {
      throw new TileTreeError('Cannot insert a disposed node', 'DISPOSED_NODE');
    }
    if (child.parent) {
      throw new TileTreeError('Cannot insert a node that already has a parent', 'ALREADY_PARENTED');
    }
    for (let ancestor: SplitNode | undefined = this; ancestor; ancestor = ancestor.parent) {
      if (ancestor === child) {
        throw new TileTreeError('Cannot insert a node below itself', 'CYCLIC_INSERT');
      }
    }
  }

  // ── Geometry ──

  override setGeometry(geometry: Rectangle, tx?: ITileTransaction): void {
    super.setGeometry(geometry, tx);
    this.recalculateChildren(this._rectangle, tx);
  }

  /**
   * Store `gaps` and push the derived spec to every child. Along the split
   * axis a child gets no outer gap (this node consumes it); across the axis
   * it inherits ours, since every child touches both cross-axis edges.
   */
  setGaps(gaps: GapSpec): void {
    this._gaps = { ...gaps };
    const childGaps = this._childGaps();
    for (const child of this._children) {
      child.setGaps(childGaps);
    }
  }

  /**
   * Extent along the split axis minus the outer gaps on that axis, of
   * `geometry` or, by default, of this node's rectangle.
   */
  calculateSplittable(geometry: Rectangle = this._rectangle): number {
    const extent = this._direction === SplitDirection.Horizontal
      ? geometry.width - this._gaps.left - this._gaps.right
      : geometry.height - this._gaps.top - this._gaps.bottom;
    return Math.max(0, extent);
  }

  /**
   * Outer gap before the first child, capped at the extent along the axis
   * so that children never start past the split's trailing edge.
   */
  calculateLeadingGap(geometry: Rectangle = this._rectangle): number {
    const [gap, extent] = this._direction === SplitDirection.Horizontal
      ? [this._gaps.left, geometry.width]
      : [this._gaps.top, geometry.height];
    return Math.min(gap, Math.max(0, extent));
  }

  /**
   * Gap between `count` adjacent children. Shrinks below the configured
   * internal gap when the gaps alone would exceed the splittable extent.
   */
  calculateInternalGap(geometry: Rectangle = this._rectangle, count: number = this._children.length): number {
    const internal = this._gaps.internal;
    if (count < 2) {
      return internal;
    }
    return Math.min(internal, Math.floor(this.calculateSplittable(geometry) / (count - 1)));
  }

  /**
   * Lay the children out inside `available`, keeping their current
   * proportions along the axis.
   */
  recalculateChildren(available: Rectangle, tx?: ITileTransaction): void {
    this._layoutChildren(available, tx, this._childExtents());
  }

  private _layoutChildren(
    available: Rectangle,
    tx: ITileTransaction | undefined,
    weights: readonly number[],
  ): void {
    const count = this._children.length;
    if (count === 0) {
      return;
    }

    this.setGaps(this._gaps);

    const internal = this.calculateInternalGap(available, count);
    const distributable = this.calculateSplittable(available) - internal * (count - 1);
    const sizes = distributeProportionally(distributable, weights);

    let offset = this.calculateLeadingGap(available);
    for (let i = 0; i < count; i++) {
      this._children[i].setGeometry(this._getChildGeometry(available, offset, sizes[i]), tx);
      offset += sizes[i] + internal;
    }
  }

  /**
   * Rectangle of a child starting `offset` into `available` with `size`
   * along the axis. The cross axis is the parent's.
   */
  private _getChildGeometry(available: Rectangle, offset: number, size: number): Rectangle {
    if (this._direction === SplitDirection.Horizontal) {
      return {
        x: available.x + offset,
        y: available.y,
        width: size,
        height: available.height,
      };
    }
    return {
      x: available.x,
      y: available.y + offset,
      width: available.width,
      height: size,
    };
  }

  private _childExtents(): number[] {
    return this._children.map((child) =>
      this._direction === SplitDirection.Horizontal ? child.rectangle.width : child.rectangle.height,
    );
  }

  private _childGaps(): GapSpec {
    const gaps = this._gaps;
    if (this._direction === SplitDirection.Horizontal) {
      return { left: 0, right: 0, top: gaps.top, bottom: gaps.bottom, internal: gaps.internal };
    }
    return { left: gaps.left, right: gaps.right, top: 0, bottom: 0, internal: gaps.internal };
  }

  /**
   * Disposes the whole subtree.
   */
  override dispose(): void {
    const children = this._children;
    this._children = [];
    for (const child of children) {
      child._setParent(undefined);
      child.dispose();
    }
    super.dispose();
  }
}

// ─── Leaf Node ──────────────────────────────────────────────────────────────

/**
 * What a leaf needs from the layer that tiles its view.
 */
export interface ILeafNodeHost {
  readonly registry: TileNodeRegistry;
  readonly coordinateSpace: ITileCoordinateSpace;
  /** Resize crossfade duration in milliseconds; 0 disables it. */
  readonly animationDuration: number;
}

/**
 * A leaf wraps exactly one view and turns its assigned rectangle into the
 * view's geometry.
 */
export class LeafNode extends BaseTileNode {
  readonly type = TileNodeType.Leaf;

  private readonly _transformer = this._register(new MutableDisposable<TileResizeTransformer>());

  private readonly _onDidChangeTransformer = this._register(new Emitter<TileResizeTransformer | undefined>());
  /** Fires when a resize transformer is attached or detached. */
  readonly onDidChangeTransformer: Event<TileResizeTransformer | undefined> = this._onDidChangeTransformer.event;

  constructor(
    readonly view: ITileView,
    private readonly _host: ILeafNodeHost,
  ) {
    super();
    this._register(_host.registry.register(view, this));
    this._register(view.onDidChangeGeometry(() => this.updateTransformer()));
  }

  /** The resize transformer, present only while the view animates. */
  get transformer(): TileResizeTransformer | undefined {
    return this._transformer.value;
  }

  asSplitNode(): undefined {
    return undefined;
  }

  asLeafNode(): LeafNode {
    return this;
  }

  /**
   * Record `geometry` and push the view's target geometry. Through `tx`
   * when one is given; otherwise immediately, crossfading if the size
   * changes.
   */
  override setGeometry(geometry: Rectangle, tx?: ITileTransaction): void {
    super.setGeometry(geometry, tx);
    const target = this.calculateTargetGeometry();

    if (tx) {
      tx.addGeometry(this.view, target);
      return;
    }

    if (rectanglesEqual(this.view.geometry, target)) {
      return;
    }
    if (this.needsCrossfade(target)) {
      this._startCrossfade(target);
    }
    this.view.setGeometry(target);
  }

  /**
   * Gaps are subtracted from every edge of the view's geometry.
   */
  setGaps(gaps: GapSpec): void {
    this._gaps = { ...gaps };
  }

  /**
   * The view's geometry in workspace-local coordinates. A fullscreen view
   * covers the whole output of its workspace and ignores gaps.
   */
  calculateTargetGeometry(): Rectangle {
    const space = this._host.coordinateSpace;
    if (this.view.isFullscreen) {
      const workspace = workspaceAt(space, this._rectangle);
      return toWorkspaceLocalRectangle(space, getWorkspaceRectangle(space, workspace));
    }
    return toWorkspaceLocalRectangle(space, shrinkByGaps(this._rectangle, this._gaps));
  }

  needsCrossfade(target: Rectangle = this.calculateTargetGeometry()): boolean {
    if (this._host.animationDuration <= 0) {
      return false;
    }
    if (!this.view.isMapped || this.view.isFullscreen) {
      return false;
    }
    return !sameSize(this.view.geometry, target);
  }

  /**
   * Keep the transformer in step with the view's committed geometry:
   * retarget it, or drop it once the view can no longer animate.
   */
  updateTransformer(): void {
    const transformer = this._transformer.value;
    if (!transformer) {
      return;
    }
    if (!this.view.isMapped || this.view.isFullscreen) {
      this._detachTransformer();
      return;
    }
    if (!rectanglesEqual(transformer.animation.to, this.view.geometry)) {
      transformer.retarget(this.view.geometry);
    }
  }

  /**
   * Advance the resize animation, if any, by `deltaMs`.
   */
  tick(deltaMs: number): void {
    this._transformer.value?.advance(deltaMs);
  }

  private _startCrossfade(target: Rectangle): void {
    const existing = this._transformer.value;
    if (existing) {
      existing.retarget(target);
      return;
    }

    const transformer = new TileResizeTransformer(this.view.geometry, target, this._host.animationDuration);
    EventUtils.once(transformer.onDidComplete)(() => this._detachTransformer());
    this._transformer.value = transformer;
    this._onDidChangeTransformer.fire(transformer);
  }

  private _detachTransformer(): void {
    if (!this._transformer.value) {
      return;
    }
    this._transformer.clear();
    this._onDidChangeTransformer.fire(undefined);
  }
}
