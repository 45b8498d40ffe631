/**
 * Selectable Port - Hexagonal Architecture
 *
 * Capability set of an item that a user or classifier can select
 * (an on-screen stimulus object, a key in a speller matrix, ...).
 * Rendering lives in the adapter; the core only invokes these hooks.
 */
export interface SelectableItem {
  /** Display name (for logs) */
  readonly name: string;

  /** Whether the item may currently be selected */
  readonly selectable: boolean;

  /**
   * Index in the selectable registry.
   * Assigned by the registry on every repopulation.
   */
  poolIndex: number;

  /** Apply the item's selection effect */
  select(): void;

  /** Highlight the item as the current training target */
  onTrainTargetEnter(): void;

  /** Remove the training target highlight */
  onTrainTargetExit(): void;

  /**
   * Whether the external object still exists.
   * Items without this method are always considered alive.
   */
  isAlive?(): boolean;
}

/**
 * Source of externally registered items, looked up by group tag.
 */
export interface SelectableSource {
  /**
   * List every item registered under the tag, in registration order.
   * Includes items that are not currently selectable.
   */
  listSelectableItems(tag: string): readonly SelectableItem[];
}
