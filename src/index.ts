// index.ts — public surface of the tiling tree

export { Disposable, DisposableStore, MutableDisposable, toDisposable } from './platform/lifecycle.js';
export type { IDisposable } from './platform/lifecycle.js';
export { Emitter, EventUtils } from './platform/events.js';
export type { Event } from './platform/events.js';

export {
  SplitDirection,
  TileNodeType,
  ZERO_GAPS,
  EMPTY_RECTANGLE,
  DEFAULT_OUTPUT_RESOLUTION,
  createGaps,
} from './tile/tileTypes.js';
export type { Dimensions, GapSpec, Point, Rectangle } from './tile/tileTypes.js';

export {
  IDENTITY_COORDINATE_SPACE,
  distributeProportionally,
  getEffectiveResolution,
  getWorkspaceRectangle,
  interpolateRectangle,
  rectanglesEqual,
  shrinkByGaps,
  toTreePoint,
  toTreeRectangle,
  toWorkspaceLocalPoint,
  toWorkspaceLocalRectangle,
  workspaceAt,
} from './tile/geometry.js';
export type { ITileCoordinateSpace } from './tile/geometry.js';

export { TileTreeError } from './tile/tileErrors.js';
export type { TileTreeErrorCode } from './tile/tileErrors.js';

export { BaseTileView } from './tile/tileView.js';
export type { ITileView, TileViewGeometryChangeEvent } from './tile/tileView.js';

export { TileTransaction } from './tile/tileTransaction.js';
export type { ITileTransaction, TileTransactionEntry } from './tile/tileTransaction.js';

export { AnimationState, TileResizeAnimation, TileResizeTransformer } from './tile/tileAnimation.js';

export { TileNodeRegistry } from './tile/tileNodeRegistry.js';

export { BaseTileNode, LeafNode, SplitNode } from './tile/tileNode.js';
export type { ILeafNodeHost, TileNode } from './tile/tileNode.js';

export {
  collectLeaves,
  flattenTree,
  forEachLeaf,
  getRoot,
  hasLeaves,
  wrapInSplit,
} from './tile/tileTree.js';

export { TileWorkspaceSet } from './tile/tileWorkspaceSet.js';
export type {
  AttachViewOptions,
  TileWorkspaceSetChangeEvent,
  TileWorkspaceSetOptions,
} from './tile/tileWorkspaceSet.js';

export {
  TILE_CONFIGURATION_SCHEMA,
  TileConfiguration,
  TileSettings,
} from './configuration/tileConfiguration.js';
export type {
  ITileConfigurationChangeEvent,
  ITileSettingSchema,
  TileSettingKey,
} from './configuration/tileConfiguration.js';
