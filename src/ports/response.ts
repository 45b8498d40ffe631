/**
 * Response Port - Hexagonal Architecture
 *
 * Pollable source of classifier/user responses. Each delivery is a batch of
 * string tokens: "ping" heartbeats, empty strings, or decimal selection indices.
 *
 * Adapters that receive data on another thread or I/O callback must hand the
 * batch to the registered callback from the Node event loop; the core queues
 * it and processes it on the next scheduler tick.
 */

/**
 * Callback receiving one batch of response tokens.
 */
export type ResponseBatchHandler = (responses: readonly string[]) => void;

/**
 * Handle returned by startPolling.
 */
export interface ResponseSubscription {
  /** Stop delivering batches to this handler */
  unsubscribe(): void;
}

/**
 * ResponseChannel - inbound response stream.
 */
export interface ResponseChannel {
  /** Whether the underlying stream is connected */
  readonly connected: boolean;

  /** Whether batches are currently being polled */
  readonly polling: boolean;

  /** Open the underlying stream */
  connect(): void;

  /** Close the underlying stream (also stops polling) */
  disconnect(): void;

  /**
   * Begin polling and deliver each batch to the handler.
   */
  startPolling(onBatch: ResponseBatchHandler): ResponseSubscription;

  /**
   * Stop polling. All subscriptions stop receiving batches.
   */
  stopPolling(): void;
}
