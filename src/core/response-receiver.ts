/**
 * Response Receiver
 *
 * Owns the receiveMarkers loop. Batches delivered by the response channel
 * are queued and handed to the batch handler once per tick, so response
 * handling always runs on the scheduler.
 */

import type { Logger } from '../types/logger.js';
import type { ResponseSubscription } from '../ports/response.js';
import type { Routine } from './cooperative-scheduler.js';
import { nextFrame } from './cooperative-scheduler.js';
import type { LoopSlots } from './loop-slots.js';
import type { ChannelBindings } from './session-state.js';
import { errorMessage } from './session-errors.js';

/**
 * Callback for processing one batch of response tokens.
 */
export type ResponseBatchCallback = (responses: readonly string[]) => void;

/**
 * ResponseReceiver - polls the response channel into the scheduler.
 */
export class ResponseReceiver {
  private readonly slots: LoopSlots;
  private readonly bindings: ChannelBindings;
  private readonly logger: Logger;
  private batchCallback: ResponseBatchCallback | null = null;
  private readonly pending: (readonly string[])[] = [];
  private subscription: ResponseSubscription | null = null;
  private onRestart: (() => void) | null = null;

  constructor(slots: LoopSlots, bindings: ChannelBindings, logger: Logger) {
    this.slots = slots;
    this.bindings = bindings;
    this.logger = logger.child({ component: 'response-receiver' });
  }

  /**
   * Set the callback that processes queued batches.
   */
  setBatchCallback(callback: ResponseBatchCallback): void {
    this.batchCallback = callback;
  }

  /**
   * Set a callback invoked every time reception (re)starts.
   */
  setRestartCallback(callback: () => void): void {
    this.onRestart = callback;
  }

  /**
   * (Re)start response reception.
   */
  start(): void {
    const response = this.bindings.requireResponse('receive responses');

    if (!response.connected) {
      response.connect();
    }
    if (response.polling) {
      response.stopPolling();
    }

    this.subscription?.unsubscribe();
    this.pending.length = 0;
    this.onRestart?.();

    this.subscription = response.startPolling((responses) => {
      this.pending.push([...responses]);
    });
    this.slots.replace('receiveMarkers', this.drain());

    this.logger.debug('Response reception started');
  }

  /**
   * Stop polling and release the receiveMarkers slot.
   */
  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.bindings.getResponse()?.stopPolling();
    this.slots.stop('receiveMarkers');
    this.pending.length = 0;
  }

  private *drain(): Routine {
    for (;;) {
      let batch = this.pending.shift();
      while (batch) {
        try {
          this.batchCallback?.(batch);
        } catch (error) {
          // Log and continue with the next batch
          this.logger.error({ batch, error: errorMessage(error) }, 'Failed to handle response batch');
        }
        batch = this.pending.shift();
      }
      yield nextFrame();
    }
  }
}
