/**
 * Ports - Hexagonal Architecture Interfaces
 *
 * Boundaries between the session core and the outside world.
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │                      PORTS OVERVIEW                            │
 * ├────────────────────────────────────────────────────────────────┤
 * │ MarkerChannel    - Outbound event markers (LSL, sockets)       │
 * │ ResponseChannel  - Inbound classifier responses                │
 * │ SelectableItem   - Items the user can select                   │
 * │ SelectableSource - Tag lookup of externally registered items   │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { MarkerChannel } from './marker.js';
export type {
  ResponseChannel,
  ResponseBatchHandler,
  ResponseSubscription,
} from './response.js';
export type { SelectableItem, SelectableSource } from './selectable.js';
