// tileTypes.ts — value types and enums shared by the tiling tree

/**
 * Axis along which a split node divides its rectangle.
 */
export enum SplitDirection {
  Horizontal = 'horizontal', // children laid out left-to-right
  Vertical = 'vertical',     // children laid out top-to-bottom
}

/**
 * Discriminant for the two kinds of tree nodes.
 */
export enum TileNodeType {
  Split = 'split',
  Leaf = 'leaf',
}

/**
 * Integer point in tree or workspace-local coordinates.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Integer rectangle (position + dimensions).
 */
export interface Rectangle extends Point, Dimensions {}

/**
 * Per-edge padding plus the spacing inserted between adjacent siblings.
 */
export interface GapSpec {
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
  readonly internal: number;
}

export const ZERO_GAPS: GapSpec = Object.freeze({
  left: 0,
  right: 0,
  top: 0,
  bottom: 0,
  internal: 0,
});

/**
 * Build a gap spec; omitted edges are zero.
 */
export function createGaps(gaps: Partial<GapSpec> = {}): GapSpec {
  return { ...ZERO_GAPS, ...gaps };
}

export const EMPTY_RECTANGLE: Rectangle = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

/**
 * Output size assumed for a workspace set that has not been attached to an
 * output yet. Replaced once the real resolution is known.
 */
export const DEFAULT_OUTPUT_RESOLUTION: Rectangle = Object.freeze({ x: 0, y: 0, width: 1920, height: 1080 });
