/**
 * QueuedResponseChannel - in-process response source.
 *
 * Producers push batches of response tokens. Batches pushed while nobody
 * is polling stay buffered (like an inlet buffer) and are delivered as soon
 * as polling starts. Nothing is buffered while disconnected.
 */

import type {
  ResponseBatchHandler,
  ResponseChannel,
  ResponseSubscription,
} from '../ports/response.js';
import type { Logger } from '../types/logger.js';

export class QueuedResponseChannel implements ResponseChannel {
  private readonly logger: Logger;
  private readonly handlers = new Set<ResponseBatchHandler>();
  private readonly buffer: (readonly string[])[] = [];
  private isConnected = false;
  private isPolling = false;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'response-channel' });
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get polling(): boolean {
    return this.isPolling;
  }

  connect(): void {
    this.isConnected = true;
    this.logger.debug('Response channel connected');
  }

  disconnect(): void {
    this.stopPolling();
    this.isConnected = false;
    this.buffer.length = 0;
    this.logger.debug('Response channel disconnected');
  }

  startPolling(onBatch: ResponseBatchHandler): ResponseSubscription {
    this.handlers.add(onBatch);
    this.isPolling = true;
    this.flush();

    return {
      unsubscribe: () => {
        this.handlers.delete(onBatch);
        if (this.handlers.size === 0) {
          this.isPolling = false;
        }
      },
    };
  }

  stopPolling(): void {
    this.handlers.clear();
    this.isPolling = false;
  }

  /**
   * Push a batch of response tokens.
   *
   * @returns false when the channel is disconnected and the batch was dropped
   */
  push(responses: readonly string[]): boolean {
    if (!this.isConnected) {
      this.logger.warn({ size: responses.length }, 'Response batch dropped: channel disconnected');
      return false;
    }
    this.buffer.push([...responses]);
    this.flush();
    return true;
  }

  /**
   * Batches waiting for a poller.
   */
  bufferedCount(): number {
    return this.buffer.length;
  }

  private flush(): void {
    if (!this.isPolling) {
      return;
    }
    let batch = this.buffer.shift();
    while (batch) {
      for (const handler of [...this.handlers]) {
        handler(batch);
      }
      batch = this.buffer.shift();
    }
  }
}
