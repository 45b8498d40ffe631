/**
 * SelectionCoordinator - resolves selections against the registry.
 *
 * Three entry points:
 * - selectByIndex: direct selection, recorded as lastSelected
 * - selectAtEndOfRun: default selection once the run ends, unless something
 *   else was selected first
 * - handleIncomingResponses: classifier tokens ("ping", "", "<index>")
 *
 * Response tokens call the item's select() directly: they do not record
 * lastSelected and never stop the run.
 */

import type { Logger } from '../types/logger.js';
import { PING_RESPONSE } from '../types/session.js';
import type { Routine } from './cooperative-scheduler.js';
import { waitWhile } from './cooperative-scheduler.js';
import type { LoopSlots } from './loop-slots.js';
import type { SelectableRegistry } from './selectable-registry.js';
import type { SessionState } from './session-state.js';

/**
 * Pings between liveness log lines.
 */
const PING_LOG_INTERVAL = 100;

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * What the coordinator needs from the stimulus engine.
 */
export interface StimulusRunControl {
  stopStimulusRun(): void;
}

/**
 * Coordinator dependencies.
 */
export interface SelectionCoordinatorDeps {
  state: SessionState;
  registry: SelectableRegistry;
  slots: LoopSlots;
  run: StimulusRunControl;
  logger: Logger;
}

/**
 * Parse a response token as a decimal integer.
 * Returns null for anything else (including "1.5" and "12abc").
 */
export function parseSelectionToken(token: string): number | null {
  const trimmed = token.trim();
  if (!INTEGER_TOKEN.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export class SelectionCoordinator {
  private readonly deps: SelectionCoordinatorDeps;
  private readonly logger: Logger;
  private pingCount = 0;

  constructor(deps: SelectionCoordinatorDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'selection-coordinator' });
  }

  /**
   * Select the item at a pool index.
   * Invalid requests are logged and leave all state untouched.
   *
   * @returns Whether an item was selected
   */
  selectByIndex(index: number, stopRun = false): boolean {
    const { registry, state, run } = this.deps;
    const count = registry.count();

    if (count === 0) {
      this.logger.info('No objects to select');
      return false;
    }

    if (!Number.isInteger(index) || index < 0 || index >= count) {
      this.logger.warn({ index, count }, `Invalid selection. Must be between 0 and ${String(count - 1)}`);
      return false;
    }

    const item = registry.get(index);
    if (item.isAlive?.() === false) {
      this.logger.warn({ index }, 'Item no longer exists and cannot be selected');
      return false;
    }

    item.select();
    state.lastSelected = item;
    this.logger.info({ index, item: item.name }, 'Item selected');

    if (stopRun) {
      run.stopStimulusRun();
    }
    return true;
  }

  /**
   * Select an item after the current run ends, unless another selection
   * happened during the run. Replaces any earlier pending request.
   */
  selectAtEndOfRun(index: number): void {
    this.deps.slots.replace('waitToSelect', this.waitThenSelect(index));
  }

  /**
   * Handle one batch of response tokens, in delivery order.
   */
  handleIncomingResponses(responses: readonly string[]): void {
    const { registry } = this.deps;

    for (const response of responses) {
      if (response === PING_RESPONSE) {
        this.pingCount++;
        if (this.pingCount % PING_LOG_INTERVAL === 0) {
          this.logger.info({ pingCount: this.pingCount }, 'Ping count');
        }
        continue;
      }

      if (response === '') {
        continue;
      }

      this.logger.debug({ response }, 'Response received');

      const index = parseSelectionToken(response);
      if (index === null || index < 0 || index >= registry.count()) {
        continue;
      }

      registry.get(index).select();
    }
  }

  getPingCount(): number {
    return this.pingCount;
  }

  resetPingCount(): void {
    this.pingCount = 0;
  }

  private *waitThenSelect(index: number): Routine {
    const { state } = this.deps;

    if (state.stimulusRunning) {
      yield waitWhile(() => state.stimulusRunning);
    }

    if (state.lastSelected !== null) {
      return;
    }
    this.selectByIndex(index, false);
  }
}
