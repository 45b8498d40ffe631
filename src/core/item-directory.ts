/**
 * ItemDirectory - in-process lookup of selectable items by tag.
 *
 * Presentation layers register their stimulus objects here; the selectable
 * registry's Tag strategy discovers them through the SelectableSource port.
 *
 * Registration order is preserved per tag and is the discovery order.
 */

import type { SelectableItem, SelectableSource } from '../ports/selectable.js';

/**
 * In-memory implementation of SelectableSource.
 */
export class ItemDirectory implements SelectableSource {
  /** tag → items in registration order */
  private readonly byTag = new Map<string, SelectableItem[]>();

  /**
   * Register an item under a tag. Registering the same item twice is a no-op.
   */
  register(tag: string, item: SelectableItem): void {
    const items = this.byTag.get(tag) ?? [];
    if (!items.includes(item)) {
      items.push(item);
    }
    this.byTag.set(tag, items);
  }

  /**
   * Remove an item from a tag.
   */
  unregister(tag: string, item: SelectableItem): boolean {
    const items = this.byTag.get(tag);
    const index = items?.indexOf(item) ?? -1;
    if (!items || index === -1) {
      return false;
    }
    items.splice(index, 1);
    if (items.length === 0) {
      this.byTag.delete(tag);
    }
    return true;
  }

  listSelectableItems(tag: string): readonly SelectableItem[] {
    return [...(this.byTag.get(tag) ?? [])];
  }

  /**
   * Number of items registered under a tag.
   */
  size(tag: string): number {
    return this.byTag.get(tag)?.length ?? 0;
  }
}
