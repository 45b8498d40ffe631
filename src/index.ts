/**
 * stimulus-session - BCI stimulus presentation and training orchestration.
 *
 * Entry point for the library.
 */

export {
  SessionController,
  type SessionControllerOptions,
} from './core/session-controller.js';
export {
  createSessionContainer,
  createSessionContainerAsync,
  type SessionContainer,
  type SessionDependencies,
} from './core/container.js';
export {
  CooperativeScheduler,
  createCooperativeScheduler,
  nextFrame,
  waitSeconds,
  waitUntil,
  waitWhile,
  type Routine,
  type Suspension,
  type TaskHandle,
  type TaskInfo,
} from './core/cooperative-scheduler.js';
export { LoopSlots, LOOP_SLOTS, type LoopSlot } from './core/loop-slots.js';
export { SessionState, ChannelBindings } from './core/session-state.js';
export { SelectableRegistry, type PopulateResult } from './core/selectable-registry.js';
export { ItemDirectory } from './core/item-directory.js';
export { ResponseReceiver } from './core/response-receiver.js';
export { StimulusCycleEngine, formatStimulusMarker } from './core/stimulus-cycle.js';
export { SelectionCoordinator, parseSelectionToken } from './core/selection-coordinator.js';
export { TrainingSequencer } from './core/training-sequencer.js';
export { FrameLoop, createFrameLoop, resolveFrameRate, type Tickable } from './core/frame-loop.js';
export { createLogger, type LoggerConfig } from './core/logger.js';
export {
  SessionError,
  PreconditionError,
  ConfigurationOverrunError,
  IndexOutOfRangeError,
  type SessionErrorCode,
} from './core/session-errors.js';

export * from './config/index.js';
export * from './channels/index.js';
export type * from './ports/index.js';
export * from './types/index.js';
export * from './utils/index.js';
