/**
 * Session State
 *
 * Mutable state shared by the orchestration components. Mutated only from
 * scheduler steps or synchronous API calls, so no locking is needed.
 */

import type { MarkerChannel } from '../ports/marker.js';
import type { ResponseChannel } from '../ports/response.js';
import type { SelectableItem } from '../ports/selectable.js';
import { NO_TRAIN_TARGET, TrainingType } from '../types/session.js';
import { PreconditionError } from './session-errors.js';

/**
 * SessionState - stimulus, selection and training flags.
 */
export class SessionState {
  /** Whether a stimulus run is in progress */
  stimulusRunning = false;

  /** Item recorded by the last index selection of the current run */
  lastSelected: SelectableItem | null = null;

  /** Training protocol being run (None when idle) */
  currentTrainingType: TrainingType = TrainingType.None;

  /** Pool index of the active training target (NO_TRAIN_TARGET when none) */
  trainTarget = NO_TRAIN_TARGET;

  get trainingRunning(): boolean {
    return this.currentTrainingType !== TrainingType.None;
  }
}

/**
 * Marker and response channels bound by SessionController.initialize().
 */
export class ChannelBindings {
  private marker: MarkerChannel | null = null;
  private response: ResponseChannel | null = null;

  bind(marker: MarkerChannel, response: ResponseChannel): void {
    this.marker = marker;
    this.response = response;
  }

  getMarker(): MarkerChannel | null {
    return this.marker;
  }

  getResponse(): ResponseChannel | null {
    return this.response;
  }

  /**
   * Marker channel, or PreconditionError when unbound.
   */
  requireMarker(operation: string): MarkerChannel {
    if (!this.marker) {
      throw new PreconditionError(operation, 'marker channel');
    }
    return this.marker;
  }

  /**
   * Response channel, or PreconditionError when unbound.
   */
  requireResponse(operation: string): ResponseChannel {
    if (!this.response) {
      throw new PreconditionError(operation, 'response channel');
    }
    return this.response;
  }
}
