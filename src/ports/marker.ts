/**
 * Marker Port - Hexagonal Architecture
 *
 * Write-only event marker stream used to synchronise stimulus presentation
 * with a recording/classification pipeline (LSL outlet, socket, file...).
 *
 * Adapters timestamp each marker at the moment `write` is called.
 * Delivery is fire-and-forget: no acknowledgment is expected.
 */
export interface MarkerChannel {
  /**
   * Emit a marker string.
   */
  write(text: string): void;
}
