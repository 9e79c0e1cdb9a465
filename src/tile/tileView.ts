// tileView.ts — payload contract for leaves

import { Disposable } from '../platform/lifecycle.js';
import { Emitter, type Event } from '../platform/events.js';
import { EMPTY_RECTANGLE, type Rectangle } from './tileTypes.js';
import { rectanglesEqual } from './geometry.js';

export interface TileViewGeometryChangeEvent {
  readonly view: ITileView;
  readonly oldGeometry: Rectangle;
  readonly newGeometry: Rectangle;
}

/**
 * A tiled view as seen by the tree.
 *
 * The tree never owns views: it assigns geometry to them (directly or
 * through a transaction) and listens for geometry changes.
 */
export interface ITileView {
  readonly id: string;

  /** Last committed geometry, in workspace-local coordinates. */
  readonly geometry: Rectangle;

  readonly isFullscreen: boolean;
  readonly isMapped: boolean;

  /** Apply geometry immediately. */
  setGeometry(geometry: Rectangle): void;

  /**
   * Fires whenever the committed geometry changes, whether the tree or the
   * view itself caused it.
   */
  readonly onDidChangeGeometry: Event<TileViewGeometryChangeEvent>;
}

/**
 * In-process view holding its own state. Hosts subclass it to forward
 * geometry to a real surface in `applyGeometry()`.
 */
export class BaseTileView extends Disposable implements ITileView {
  private _geometry: Rectangle;
  private _fullscreen = false;
  private _mapped: boolean;

  private readonly _onDidChangeGeometry = this._register(new Emitter<TileViewGeometryChangeEvent>());
  readonly onDidChangeGeometry: Event<TileViewGeometryChangeEvent> = this._onDidChangeGeometry.event;

  constructor(
    readonly id: string,
    options: { geometry?: Rectangle; mapped?: boolean; fullscreen?: boolean } = {},
  ) {
    super();
    this._geometry = options.geometry ?? EMPTY_RECTANGLE;
    this._mapped = options.mapped ?? true;
    this._fullscreen = options.fullscreen ?? false;
  }

  get geometry(): Rectangle {
    return this._geometry;
  }

  get isFullscreen(): boolean {
    return this._fullscreen;
  }

  get isMapped(): boolean {
    return this._mapped;
  }

  setGeometry(geometry: Rectangle): void {
    if (rectanglesEqual(this._geometry, geometry)) {
      return;
    }
    const oldGeometry = this._geometry;
    this._geometry = { ...geometry };
    this.applyGeometry(this._geometry);
    this._onDidChangeGeometry.fire({ view: this, oldGeometry, newGeometry: this._geometry });
  }

  setFullscreen(fullscreen: boolean): void {
    this._fullscreen = fullscreen;
  }

  setMapped(mapped: boolean): void {
    this._mapped = mapped;
  }

  /**
   * Override to push committed geometry to the underlying surface.
   */
  protected applyGeometry(_geometry: Rectangle): void {
    // no surface by default
  }
}
