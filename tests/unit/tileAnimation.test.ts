/**
 * Unit tests for the resize animation and transformer.
 */

import { describe, expect, it } from 'vitest';
import { AnimationState, TileResizeAnimation, TileResizeTransformer } from '../../src/tile/tileAnimation.js';
import type { Rectangle } from '../../src/tile/tileTypes.js';

function rect(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width, height };
}

describe('TileResizeAnimation', () => {
  it('is idle until started', () => {
    const animation = new TileResizeAnimation();
    expect(animation.state).toBe(AnimationState.Idle);
    expect(animation.progress).toBe(1);

    animation.advance(100);
    expect(animation.isAnimating).toBe(false);
  });

  it('eases out towards the target and completes with it', () => {
    const animation = new TileResizeAnimation();
    const completed: Rectangle[] = [];
    animation.onDidComplete((r) => completed.push(r));

    animation.start(rect(0, 0, 100, 100), rect(0, 0, 200, 100), 200);
    expect(animation.currentGeometry).toEqual(rect(0, 0, 100, 100));

    animation.advance(100);
    expect(animation.progress).toBe(0.5);
    expect(animation.currentGeometry).toEqual(rect(0, 0, 175, 100));

    animation.advance(-50);
    expect(animation.progress).toBe(0.5);

    animation.advance(100);
    expect(animation.state).toBe(AnimationState.Idle);
    expect(animation.currentGeometry).toEqual(rect(0, 0, 200, 100));
    expect(completed).toEqual([rect(0, 0, 200, 100)]);
  });

  it('completes immediately without a duration', () => {
    const animation = new TileResizeAnimation();
    let completions = 0;
    animation.onDidComplete(() => { completions++; });

    animation.start(rect(0, 0, 1, 1), rect(0, 0, 2, 2), 0);

    expect(animation.isAnimating).toBe(false);
    expect(completions).toBe(1);
  });

  it('restarts from the shown geometry when retargeted', () => {
    const animation = new TileResizeAnimation();
    animation.start(rect(0, 0, 100, 100), rect(0, 0, 200, 100), 200);
    animation.advance(100);

    animation.retarget(rect(0, 0, 300, 100));

    expect(animation.from).toEqual(rect(0, 0, 175, 100));
    expect(animation.to).toEqual(rect(0, 0, 300, 100));
    expect(animation.duration).toBe(200);
    expect(animation.progress).toBe(0);
  });

  it('only moves the end point when retargeted while idle', () => {
    const animation = new TileResizeAnimation();
    animation.retarget(rect(5, 5, 5, 5));

    expect(animation.isAnimating).toBe(false);
    expect(animation.currentGeometry).toEqual(rect(5, 5, 5, 5));
  });
});

describe('TileResizeTransformer', () => {
  it('derives scale, translation and alpha from the current frame', () => {
    const transformer = new TileResizeTransformer(rect(0, 0, 200, 100), rect(100, 0, 100, 100), 100);

    transformer.advance(50);

    expect(transformer.currentGeometry).toEqual(rect(75, 0, 125, 100));
    expect(transformer.scale).toEqual({ x: 1.25, y: 1 });
    expect(transformer.translation).toEqual({ x: -25, y: 0 });
    expect(transformer.crossfadeAlpha).toBe(0.5);
  });

  it('uses a unit scale for an empty target', () => {
    const transformer = new TileResizeTransformer(rect(0, 0, 200, 100), rect(0, 0, 0, 0), 100);
    expect(transformer.scale).toEqual({ x: 1, y: 1 });
  });

  it('forwards completion', () => {
    const transformer = new TileResizeTransformer(rect(0, 0, 200, 100), rect(0, 0, 100, 100), 100);
    let done: Rectangle | undefined;
    transformer.onDidComplete((r) => { done = r; });

    transformer.advance(100);

    expect(done).toEqual(rect(0, 0, 100, 100));
    expect(transformer.crossfadeAlpha).toBe(0);
  });
});
