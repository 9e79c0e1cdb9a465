// tileErrors.ts — contract violations raised by the tiling tree

export type TileTreeErrorCode =
  /** `removeChild` was given a node that is not a child of the split. */
  | 'NOT_A_CHILD'
  /** `addChild` was given a node that still has a parent. */
  | 'ALREADY_PARENTED'
  /** A second live leaf was created for the same view. */
  | 'DUPLICATE_LEAF'
  /** A node was inserted below itself. */
  | 'CYCLIC_INSERT'
  /** A disposed node was inserted into a tree. */
  | 'DISPOSED_NODE'
  /** A transaction was committed twice. */
  | 'TRANSACTION_COMMITTED';

/**
 * Error thrown when a caller breaks the tree's structural contract.
 */
export class TileTreeError extends Error {
  readonly code: TileTreeErrorCode;

  constructor(message: string, code: TileTreeErrorCode) {
    super(message);
    this.name = 'TileTreeError';
    this.code = code;
  }
}
