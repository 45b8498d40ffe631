/**
 * Paradigm hooks.
 *
 * A paradigm (SSVEP, P300 oddball, motor imagery...) customises the session
 * core by supplying routines for the stimulus cycle and for the training
 * types that have no built-in protocol. Every hook is optional.
 */

import type { SessionConfig } from '../config/config-schema.js';
import type { Routine } from '../core/cooperative-scheduler.js';
import type { SelectableRegistry } from '../core/selectable-registry.js';
import type { SessionState } from '../core/session-state.js';
import type { Logger } from './logger.js';

/**
 * Result of one training phase routine.
 * 'repeat' asks the supervising loop to run the phase again.
 */
export type TrainingPhaseOutcome = 'complete' | 'repeat';

/**
 * What a paradigm routine can see and drive.
 */
export interface ParadigmContext {
  readonly config: Readonly<SessionConfig>;
  readonly state: Readonly<SessionState>;
  readonly registry: SelectableRegistry;
  readonly logger: Logger;

  /** Write a marker to the bound marker channel */
  writeMarker(text: string): void;
  startStimulusRun(sendConstantMarkers?: boolean): void;
  stopStimulusRun(): void;
  selectByIndex(index: number, stopRun?: boolean): void;
}

/**
 * Paradigm-specific behaviour.
 */
export interface ParadigmHooks {
  /** Paradigm name (for logs) */
  readonly name?: string;

  /**
   * Default for startStimulusRun's sendConstantMarkers.
   * Paradigms that write a marker per stimulus event set this to false.
   */
  readonly sendConstantMarkers?: boolean;

  /** One pass of the stimulus cycle; repeated while the run is active */
  onStimulusRun?(ctx: ParadigmContext): Routine;

  /** Runs once after the stimulus run ends */
  onStimulusRunComplete?(ctx: ParadigmContext): Routine;

  iterativeTraining?(ctx: ParadigmContext): Routine<TrainingPhaseOutcome>;

  userTraining?(ctx: ParadigmContext): Routine<TrainingPhaseOutcome>;
}
