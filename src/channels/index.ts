/**
 * Reference channel adapters.
 */

export {
  LoggingMarkerChannel,
  type MarkerRecord,
  type LoggingMarkerChannelConfig,
} from './logging-marker-channel.js';
export { QueuedResponseChannel } from './queued-response-channel.js';
