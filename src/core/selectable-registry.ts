/**
 * Selectable Registry
 *
 * Ordered set of the items that can be selected during a stimulus run.
 * Insertion order is pool index order; indices are contiguous 0..N-1 and
 * stay stable until the next repopulation.
 */

import { z } from 'zod';
import type { Logger } from '../types/logger.js';
import type { SelectableItem, SelectableSource } from '../ports/selectable.js';
import { PopulationStrategy } from '../types/session.js';
import { IndexOutOfRangeError } from './session-errors.js';

/**
 * Outcome of a populate call.
 */
export type PopulateResult =
  | { status: 'unchanged'; count: number }
  | { status: 'populated'; count: number; discovered: number }
  | { status: 'unimplemented'; strategy: PopulationStrategy }
  | { status: 'invalid'; name: string };

/**
 * Strategy names accepted by populateByName (case-insensitive).
 */
const populationStrategySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.nativeEnum(PopulationStrategy)
);

/**
 * Registry configuration.
 */
export interface SelectableRegistryConfig {
  /** Tag used by the Tag strategy */
  groupTag: string;
}

/**
 * SelectableRegistry - indexed selectable items.
 */
export class SelectableRegistry {
  private readonly source: SelectableSource;
  private readonly config: SelectableRegistryConfig;
  private readonly logger: Logger;
  private entries: SelectableItem[] = [];

  constructor(
    source: SelectableSource,
    config: SelectableRegistryConfig,
    logger: Logger,
    initialItems: readonly SelectableItem[] = []
  ) {
    this.source = source;
    this.config = config;
    this.logger = logger.child({ component: 'selectable-registry' });
    this.entries = [...initialItems];
  }

  /**
   * Repopulate using the given strategy.
   */
  populate(strategy: PopulationStrategy = PopulationStrategy.Tag): PopulateResult {
    switch (strategy) {
      case PopulationStrategy.Predefined:
        return { status: 'unchanged', count: this.entries.length };

      case PopulationStrategy.Children:
        this.logger.warn({ strategy }, 'Populating by children is not yet implemented');
        return { status: 'unimplemented', strategy };

      case PopulationStrategy.Tag:
        return this.populateByTag();
    }
  }

  /**
   * Repopulate using a strategy given by name (e.g. from a config file or UI).
   */
  populateByName(name: string): PopulateResult {
    const parsed = populationStrategySchema.safeParse(name);
    if (!parsed.success) {
      this.logger.error({ name }, 'Unable to convert to a valid population strategy');
      return { status: 'invalid', name };
    }
    return this.populate(parsed.data);
  }

  /**
   * Replace the contents with a predefined set (used with the Predefined strategy).
   * Pool indices are left as the caller set them.
   */
  setItems(items: readonly SelectableItem[]): void {
    this.entries = [...items];
  }

  count(): number {
    return this.entries.length;
  }

  /**
   * Item at a pool index. Callers bounds-check first.
   */
  get(index: number): SelectableItem {
    const item = Number.isInteger(index) ? this.entries[index] : undefined;
    if (!item) {
      throw new IndexOutOfRangeError(index, this.entries.length);
    }
    return item;
  }

  items(): readonly SelectableItem[] {
    return this.entries;
  }

  private populateByTag(): PopulateResult {
    const discovered = this.source.listSelectableItems(this.config.groupTag);
    const next = discovered.filter((item) => item.selectable);

    next.forEach((item, index) => {
      item.poolIndex = index;
    });
    this.entries = next;

    this.logger.debug(
      { tag: this.config.groupTag, discovered: discovered.length, count: next.length },
      'Registry populated by tag'
    );

    return { status: 'populated', count: next.length, discovered: discovered.length };
  }
}
