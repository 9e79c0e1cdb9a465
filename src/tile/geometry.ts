// geometry.ts — integer rectangle math and coordinate transforms

import { DEFAULT_OUTPUT_RESOLUTION } from './tileTypes.js';
import type { Dimensions, GapSpec, Point, Rectangle } from './tileTypes.js';

export function rectanglesEqual(a: Rectangle, b: Rectangle): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

export function sameSize(a: Dimensions, b: Dimensions): boolean {
  return a.width === b.width && a.height === b.height;
}

/**
 * Shrink a rectangle by the outer edges of a gap spec (`internal` is ignored).
 */
export function shrinkByGaps(rect: Rectangle, gaps: GapSpec): Rectangle {
  return {
    x: rect.x + gaps.left,
    y: rect.y + gaps.top,
    width: rect.width - gaps.left - gaps.right,
    height: rect.height - gaps.top - gaps.bottom,
  };
}

/**
 * Linear interpolation between two rectangles, rounded to integers.
 * `alpha` 0 yields `from`, 1 yields `to`.
 */
export function interpolateRectangle(from: Rectangle, to: Rectangle, alpha: number): Rectangle {
  const lerp = (a: number, b: number): number => Math.round(a + (b - a) * alpha);
  return {
    x: lerp(from.x, to.x),
    y: lerp(from.y, to.y),
    width: lerp(from.width, to.width),
    height: lerp(from.height, to.height),
  };
}

// ─── Coordinate Spaces ──────────────────────────────────────────────────────

/**
 * What the tree needs to know about the workspace set it lays out.
 *
 * Tree coordinates are relative to workspace (0, 0): workspace (c, r)
 * occupies `(c * W, r * H, W, H)` where `W × H` is the output resolution.
 * Workspace-local coordinates are relative to the current workspace.
 */
export interface ITileCoordinateSpace {
  /** Grid position of the workspace currently shown. */
  readonly currentWorkspace: Point;
  /** Last known output resolution, `undefined` if never attached to an output. */
  readonly outputResolution: Dimensions | undefined;
}

export const IDENTITY_COORDINATE_SPACE: ITileCoordinateSpace = Object.freeze({
  currentWorkspace: Object.freeze({ x: 0, y: 0 }),
  outputResolution: undefined,
});

export function getEffectiveResolution(space: ITileCoordinateSpace): Dimensions {
  return space.outputResolution ?? DEFAULT_OUTPUT_RESOLUTION;
}

/**
 * Convert a point from tree coordinates to workspace-local coordinates.
 */
export function toWorkspaceLocalPoint(space: ITileCoordinateSpace, point: Point): Point {
  const size = getEffectiveResolution(space);
  return {
    x: point.x - space.currentWorkspace.x * size.width,
    y: point.y - space.currentWorkspace.y * size.height,
  };
}

export function toWorkspaceLocalRectangle(space: ITileCoordinateSpace, rect: Rectangle): Rectangle {
  return { ...toWorkspaceLocalPoint(space, rect), width: rect.width, height: rect.height };
}

/**
 * Convert a point from workspace-local coordinates back to tree coordinates.
 */
export function toTreePoint(space: ITileCoordinateSpace, point: Point): Point {
  const size = getEffectiveResolution(space);
  return {
    x: point.x + space.currentWorkspace.x * size.width,
    y: point.y + space.currentWorkspace.y * size.height,
  };
}

export function toTreeRectangle(space: ITileCoordinateSpace, rect: Rectangle): Rectangle {
  return { ...toTreePoint(space, rect), width: rect.width, height: rect.height };
}

/**
 * Grid position of the workspace containing a tree-space point.
 */
export function workspaceAt(space: ITileCoordinateSpace, point: Point): Point {
  const size = getEffectiveResolution(space);
  return {
    x: Math.floor(point.x / size.width),
    y: Math.floor(point.y / size.height),
  };
}

/**
 * Full output rectangle of workspace `workspace`, in tree coordinates.
 */
export function getWorkspaceRectangle(space: ITileCoordinateSpace, workspace: Point): Rectangle {
  const size = getEffectiveResolution(space);
  return {
    x: workspace.x * size.width,
    y: workspace.y * size.height,
    width: size.width,
    height: size.height,
  };
}

// ─── Proportional Division ──────────────────────────────────────────────────

/**
 * Split `total` into integer parts proportional to `weights`.
 *
 * Every part but the last is rounded down; the last part takes the
 * remainder, so the parts always sum to `total`. Negative weights count as
 * zero, and if no weight is positive the parts are equal.
 */
export function distributeProportionally(total: number, weights: readonly number[]): number[] {
  if (weights.length === 0) {
    return [];
  }

  const clamped = weights.map((w) => Math.max(0, w));
  const weightSum = clamped.reduce((sum, w) => sum + w, 0);
  const effective = weightSum > 0 ? clamped : clamped.map(() => 1);
  const effectiveSum = weightSum > 0 ? weightSum : effective.length;

  const sizes: number[] = [];
  let assigned = 0;
  for (let i = 0; i < effective.length - 1; i++) {
    const size = Math.floor((total * effective[i]) / effectiveSum);
    sizes.push(size);
    assigned += size;
  }
  sizes.push(total - assigned);
  return sizes;
}
