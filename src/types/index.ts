/**
 * Shared type exports.
 */

export type { Logger } from './logger.js';
export { createNoOpLogger } from './logger.js';
export {
  TrainingType,
  PopulationStrategy,
  NO_TRAIN_TARGET,
  MARKERS,
  PING_RESPONSE,
} from './session.js';
export type { ParadigmContext, ParadigmHooks, TrainingPhaseOutcome } from './paradigm.js';
