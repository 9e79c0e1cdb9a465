// tileAnimation.ts — resize crossfade driven by an external frame loop
//
// The tree never reads a clock. The host calls `advance(deltaMs)` (usually
// through `TileWorkspaceSet.tickAnimations`) once per frame.

import { Disposable } from '../platform/lifecycle.js';
import { Emitter, type Event } from '../platform/events.js';
import { EMPTY_RECTANGLE, type Point, type Rectangle } from './tileTypes.js';
import { interpolateRectangle } from './geometry.js';

export enum AnimationState {
  Idle = 'idle',
  Animating = 'animating',
}

/**
 * Ease-out quadratic.
 */
function easeOut(t: number): number {
  return 1 - (1 - t) * (1 - t);
}

/**
 * Interpolates a rectangle from `from` to `to` over `duration` milliseconds.
 */
export class TileResizeAnimation extends Disposable {
  private _state = AnimationState.Idle;
  private _from: Rectangle = EMPTY_RECTANGLE;
  private _to: Rectangle = EMPTY_RECTANGLE;
  private _duration = 0;
  private _elapsed = 0;

  private readonly _onDidComplete = this._register(new Emitter<Rectangle>());
  /** Fires with the final geometry when the animation reaches its end. */
  readonly onDidComplete: Event<Rectangle> = this._onDidComplete.event;

  get state(): AnimationState {
    return this._state;
  }

  get isAnimating(): boolean {
    return this._state === AnimationState.Animating;
  }

  get from(): Rectangle {
    return this._from;
  }

  get to(): Rectangle {
    return this._to;
  }

  get duration(): number {
    return this._duration;
  }

  /** Linear progress in [0, 1]. */
  get progress(): number {
    if (this._state === AnimationState.Idle || this._duration <= 0) {
      return 1;
    }
    return Math.min(1, this._elapsed / this._duration);
  }

  /** Interpolated geometry for the current frame. */
  get currentGeometry(): Rectangle {
    if (this._state === AnimationState.Idle) {
      return this._to;
    }
    return interpolateRectangle(this._from, this._to, easeOut(this.progress));
  }

  start(from: Rectangle, to: Rectangle, durationMs: number): void {
    this._from = { ...from };
    this._to = { ...to };
    this._duration = durationMs;
    this._elapsed = 0;
    this._state = AnimationState.Animating;
    if (durationMs <= 0) {
      this._finish();
    }
  }

  /**
   * Continue from the geometry currently shown towards a new end point,
   * restarting the clock.
   */
  retarget(to: Rectangle): void {
    if (this._state === AnimationState.Idle) {
      this._to = { ...to };
      return;
    }
    this.start(this.currentGeometry, to, this._duration);
  }

  advance(deltaMs: number): void {
    if (this._state === AnimationState.Idle) {
      return;
    }
    this._elapsed += Math.max(0, deltaMs);
    if (this._elapsed >= this._duration) {
      this._finish();
    }
  }

  private _finish(): void {
    this._elapsed = this._duration;
    this._state = AnimationState.Idle;
    this._onDidComplete.fire(this._to);
  }
}

/**
 * Visual transformer attached to a leaf while its view animates a resize.
 *
 * The view already has its final geometry; the renderer draws it scaled and
 * translated onto `currentGeometry`, crossfading from the old contents with
 * `crossfadeAlpha`.
 */
export class TileResizeTransformer extends Disposable {
  readonly animation = this._register(new TileResizeAnimation());

  readonly onDidComplete: Event<Rectangle> = this.animation.onDidComplete;

  constructor(from: Rectangle, to: Rectangle, durationMs: number) {
    super();
    this.animation.start(from, to, durationMs);
  }

  get currentGeometry(): Rectangle {
    return this.animation.currentGeometry;
  }

  /** Scale from the final geometry to the geometry shown this frame. */
  get scale(): Point {
    const target = this.animation.to;
    const current = this.currentGeometry;
    return {
      x: target.width > 0 ? current.width / target.width : 1,
      y: target.height > 0 ? current.height / target.height : 1,
    };
  }

  /** Offset from the final position to the position shown this frame. */
  get translation(): Point {
    const target = this.animation.to;
    const current = this.currentGeometry;
    return { x: current.x - target.x, y: current.y - target.y };
  }

  /** Opacity of the snapshot of the old contents. */
  get crossfadeAlpha(): number {
    return 1 - this.animation.progress;
  }

  retarget(to: Rectangle): void {
    this.animation.retarget(to);
  }

  advance(deltaMs: number): void {
    this.animation.advance(deltaMs);
  }
}
