/**
 * Loop Slots
 *
 * Named slots for the session's timed loops. Each slot holds at most one
 * live task; starting a loop in a slot cancels the previous occupant first.
 */

import type { Logger } from '../types/logger.js';
import type { CooperativeScheduler, Routine, TaskHandle } from './cooperative-scheduler.js';

/**
 * Loop slot names.
 */
export type LoopSlot = 'receiveMarkers' | 'sendMarkers' | 'runStimulus' | 'waitToSelect' | 'training';

export const LOOP_SLOTS: readonly LoopSlot[] = [
  'receiveMarkers',
  'sendMarkers',
  'runStimulus',
  'waitToSelect',
  'training',
];

/**
 * LoopSlots - at most one running loop per slot.
 */
export class LoopSlots {
  private readonly scheduler: CooperativeScheduler;
  private readonly logger: Logger;
  private readonly handles = new Map<LoopSlot, TaskHandle>();

  constructor(scheduler: CooperativeScheduler, logger: Logger) {
    this.scheduler = scheduler;
    this.logger = logger.child({ component: 'loop-slots' });
  }

  /**
   * Cancel the slot's current loop (if any) and start a new one.
   */
  replace(slot: LoopSlot, routine: Routine<unknown>): TaskHandle {
    const previous = this.handles.get(slot);
    if (previous?.isAlive()) {
      this.logger.debug({ slot, taskId: previous.id }, 'Replacing loop');
    }
    previous?.cancel();
    this.handles.delete(slot);

    const handle = this.scheduler.start(slot, routine);
    this.handles.set(slot, handle);
    return handle;
  }

  /**
   * Cancel the slot's loop and clear the slot.
   */
  stop(slot: LoopSlot): void {
    const handle = this.handles.get(slot);
    if (!handle) {
      return;
    }
    handle.cancel();
    this.handles.delete(slot);
  }

  /**
   * Cancel every slot.
   */
  stopAll(): void {
    for (const slot of LOOP_SLOTS) {
      this.stop(slot);
    }
  }

  /**
   * Whether the slot holds a live loop.
   */
  isActive(slot: LoopSlot): boolean {
    return this.handles.get(slot)?.isAlive() ?? false;
  }

  /**
   * Handle currently stored in the slot.
   */
  get(slot: LoopSlot): TaskHandle | undefined {
    return this.handles.get(slot);
  }
}
