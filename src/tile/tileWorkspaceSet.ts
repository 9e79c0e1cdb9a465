// tileWorkspaceSet.ts — one tiling tree per workspace of a workspace set
//
// Owns the roots, the view → leaf registry and the coordinate space the
// leaves translate through, and re-lays out every root when the output
// resolution, the current workspace or the gap settings change.

import { Disposable } from '../platform/lifecycle.js';
import { Emitter, EventUtils, type Event } from '../platform/events.js';
import { SplitDirection, type Dimensions, type Point } from './tileTypes.js';
import { getWorkspaceRectangle, type ITileCoordinateSpace } from './geometry.js';
import type { ITileTransaction } from './tileTransaction.js';
import type { ITileView } from './tileView.js';
import { TileNodeRegistry } from './tileNodeRegistry.js';
import { LeafNode, SplitNode, type ILeafNodeHost } from './tileNode.js';
import { flattenTree, getRoot } from './tileTree.js';
import { TileConfiguration, TileSettings } from '../configuration/tileConfiguration.js';

export interface TileWorkspaceSetOptions {
  /** Workspace grid size; both default to 1. */
  readonly columns?: number;
  readonly rows?: number;
  /** Output resolution if already known. */
  readonly outputResolution?: Dimensions;
}

export interface AttachViewOptions {
  /** Target workspace; defaults to the current one. */
  readonly workspace?: Point;
  /** Position among the root's children; defaults to the end. */
  readonly index?: number;
  readonly tx?: ITileTransaction;
}

export interface TileWorkspaceSetChangeEvent {
  readonly type: 'attach' | 'detach' | 'layout';
  readonly viewId?: string;
}

const GAP_SETTINGS = [
  TileSettings.InnerGapSize,
  TileSettings.OuterHorizontalGapSize,
  TileSettings.OuterVerticalGapSize,
];

/**
 * Tiling state of one workspace set.
 *
 * Workspace `(c, r)` of the grid has its own horizontal root split placed
 * at `(c * W, r * H)` in tree coordinates, where `W × H` is the output
 * resolution (or the default resolution before an output is known).
 */
export class TileWorkspaceSet extends Disposable implements ILeafNodeHost, ITileCoordinateSpace {
  readonly registry = this._register(new TileNodeRegistry());

  readonly columns: number;
  readonly rows: number;

  /** Roots indexed `[column][row]`. */
  private readonly _roots: SplitNode[][] = [];
  private _currentWorkspace: Point = { x: 0, y: 0 };
  private _outputResolution: Dimensions | undefined;

  private readonly _onDidChange = this._register(new Emitter<TileWorkspaceSetChangeEvent>());
  readonly onDidChange: Event<TileWorkspaceSetChangeEvent> = this._onDidChange.event;

  constructor(
    private readonly _configuration: TileConfiguration,
    options: TileWorkspaceSetOptions = {},
  ) {
    super();
    this.columns = Math.max(1, options.columns ?? 1);
    this.rows = Math.max(1, options.rows ?? 1);
    this._outputResolution = options.outputResolution;

    for (let column = 0; column < this.columns; column++) {
      const roots: SplitNode[] = [];
      for (let row = 0; row < this.rows; row++) {
        roots.push(this._register(new SplitNode(SplitDirection.Horizontal)));
      }
      this._roots.push(roots);
    }
    this.relayout();

    const onDidChangeGaps = EventUtils.filter(
      _configuration.onDidChangeConfiguration,
      (e) => GAP_SETTINGS.some((key) => e.affectsConfiguration(key)),
    );
    // No transaction: a gap change is a local adjustment and may animate.
    this._register(onDidChangeGaps(() => this.relayout()));
  }

  // ── ILeafNodeHost / ITileCoordinateSpace ──

  get coordinateSpace(): ITileCoordinateSpace {
    return this;
  }

  get animationDuration(): number {
    return this._configuration.animationDuration;
  }

  get currentWorkspace(): Point {
    return this._currentWorkspace;
  }

  get outputResolution(): Dimensions | undefined {
    return this._outputResolution;
  }

  // ── Queries ──

  /**
   * Root of `workspace` (default: the current one), or `undefined` outside
   * the grid.
   */
  getRoot(workspace: Point = this._currentWorkspace): SplitNode | undefined {
    return this._roots[workspace.x]?.[workspace.y];
  }

  getLeaf(view: ITileView): LeafNode | undefined {
    return this.registry.get(view);
  }

  get viewCount(): number {
    return this.registry.size;
  }

  // ── Mutations ──

  /**
   * Tile `view` on a workspace and return its new leaf.
   */
  attachView(view: ITileView, options: AttachViewOptions = {}): LeafNode {
    const workspace = options.workspace ?? this._currentWorkspace;
    const root = this._requireRoot(workspace);

    const leaf = new LeafNode(view, this);
    root.addChild(leaf, options.tx, options.index);
    this._onDidChange.fire({ type: 'attach', viewId: view.id });
    return leaf;
  }

  /**
   * Stop tiling `view`: its leaf is removed and disposed, and the tree it
   * lived in is flattened. Returns `undefined` if the view was not tiled.
   */
  detachView(view: ITileView, tx?: ITileTransaction): ITileView | undefined {
    const leaf = this.registry.get(view);
    if (!leaf) {
      console.warn(`[TileWorkspaceSet] Cannot detach untiled view "${view.id}"`);
      return undefined;
    }

    const root = getRoot(leaf);
    leaf.parent?.removeChild(leaf, tx);
    leaf.dispose();
    if (root) {
      flattenTree(root, tx);
    }

    this._onDidChange.fire({ type: 'detach', viewId: view.id });
    return view;
  }

  /**
   * Set (or forget) the output resolution and lay every workspace out again.
   */
  setOutputResolution(resolution: Dimensions | undefined, tx?: ITileTransaction): void {
    this._outputResolution = resolution ? { width: resolution.width, height: resolution.height } : undefined;
    this.relayout(tx);
  }

  /**
   * Switch the current workspace. Views are positioned relative to it, so
   * everything is laid out again.
   */
  setCurrentWorkspace(workspace: Point, tx?: ITileTransaction): void {
    this._requireRoot(workspace);
    this._currentWorkspace = { x: workspace.x, y: workspace.y };
    this.relayout(tx);
  }

  /**
   * Push the configured gaps and each workspace's rectangle into its root.
   */
  relayout(tx?: ITileTransaction): void {
    const gaps = this._configuration.getGaps();
    for (let column = 0; column < this.columns; column++) {
      for (let row = 0; row < this.rows; row++) {
        const root = this._roots[column][row];
        root.setGaps(gaps);
        root.setGeometry(getWorkspaceRectangle(this, { x: column, y: row }), tx);
      }
    }
    this._onDidChange.fire({ type: 'layout' });
  }

  /**
   * Advance every running resize animation. Called by the host's frame loop.
   */
  tickAnimations(deltaMs: number): void {
    for (const leaf of [...this.registry.leaves()]) {
      leaf.tick(deltaMs);
    }
  }

  private _requireRoot(workspace: Point): SplitNode {
    const root = this.getRoot(workspace);
    if (!root) {
      throw new RangeError(
        `Workspace (${workspace.x}, ${workspace.y}) is outside the ${this.columns}x${this.rows} grid`,
      );
    }
    return root;
  }
}
