/**
 * StimulusCycleEngine - the repeating stimulus run and its marker stream.
 *
 * A run owns two loop slots:
 * - runStimulus: repeats the paradigm's per-cycle behaviour while running,
 *   then runs the completion behaviour and releases both slots unless a
 *   newer run has taken them
 * - sendMarkers: writes "marker[,<trainTarget>]" every window
 *   (windowLength + interWindowInterval seconds)
 */

import type { SessionConfig } from '../config/config-schema.js';
import type { Logger } from '../types/logger.js';
import type { ParadigmContext, ParadigmHooks } from '../types/paradigm.js';
import { MARKERS, PopulationStrategy } from '../types/session.js';
import type { Routine } from './cooperative-scheduler.js';
import { nextFrame, waitSeconds } from './cooperative-scheduler.js';
import type { LoopSlots } from './loop-slots.js';
import type { ResponseReceiver } from './response-receiver.js';
import type { SelectableRegistry } from './selectable-registry.js';
import type { ChannelBindings, SessionState } from './session-state.js';

/**
 * Engine dependencies.
 */
export interface StimulusCycleDeps {
  slots: LoopSlots;
  state: SessionState;
  bindings: ChannelBindings;
  registry: SelectableRegistry;
  receiver: ResponseReceiver;
  config: Readonly<SessionConfig>;
  paradigm: ParadigmHooks;
  /** Late-bound: the context refers back to components built after the engine */
  context: () => ParadigmContext;
  logger: Logger;
}

/**
 * Build the periodic marker string for a train target.
 * A target above the selectable count means "no active target".
 */
export function formatStimulusMarker(trainTarget: number, selectableCount: number): string {
  if (trainTarget <= selectableCount) {
    return `${MARKERS.STIMULUS},${String(trainTarget)}`;
  }
  return MARKERS.STIMULUS;
}

export class StimulusCycleEngine {
  private readonly deps: StimulusCycleDeps;
  private readonly logger: Logger;
  private runCount = 0;

  constructor(deps: StimulusCycleDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'stimulus-cycle' });
  }

  isRunning(): boolean {
    return this.deps.state.stimulusRunning;
  }

  /**
   * Start a new stimulus run, ending an active one first.
   *
   * @param sendConstantMarkers - Write a marker every window until the run
   *   ends. Defaults to the paradigm's setting (true when unset).
   */
  startStimulusRun(sendConstantMarkers?: boolean): void {
    const { state, bindings, registry, receiver, slots } = this.deps;
    const constantMarkers = sendConstantMarkers ?? this.deps.paradigm.sendConstantMarkers ?? true;
    const marker = bindings.requireMarker('start stimulus run');
    bindings.requireResponse('start stimulus run');

    if (state.stimulusRunning) {
      this.stopStimulusRun();
    }
    slots.stop('sendMarkers');

    state.stimulusRunning = true;
    state.lastSelected = null;
    this.runCount++;

    marker.write(MARKERS.TRIAL_STARTED);

    receiver.start();
    registry.populate(PopulationStrategy.Tag);
    slots.replace('runStimulus', this.runStimulus(this.runCount));

    if (constantMarkers) {
      slots.replace('sendMarkers', this.sendMarkers(state.trainTarget));
    }

    this.logger.debug(
      {
        run: this.runCount,
        selectable: registry.count(),
        trainTarget: state.trainTarget,
        constantMarkers,
      },
      'Stimulus run started'
    );
  }

  /**
   * End the current stimulus run.
   * The marker is skipped when no marker channel is bound (e.g. during teardown).
   */
  stopStimulusRun(): void {
    this.deps.state.stimulusRunning = false;
    this.deps.bindings.getMarker()?.write(MARKERS.TRIAL_ENDS);
    this.logger.debug({ run: this.runCount }, 'Stimulus run stopped');
  }

  /**
   * Stop the run if one is active, otherwise start one.
   */
  startStopStimulusRun(): void {
    if (this.isRunning()) {
      this.stopStimulusRun();
    } else {
      this.startStimulusRun();
    }
  }

  private *runStimulus(run: number): Routine {
    const { state, paradigm, slots } = this.deps;

    while (state.stimulusRunning) {
      if (paradigm.onStimulusRun) {
        yield* paradigm.onStimulusRun(this.deps.context());
      }
      yield nextFrame();
    }

    if (paradigm.onStimulusRunComplete) {
      yield* paradigm.onStimulusRunComplete(this.deps.context());
    }

    // A completion hook may have started the next run, which owns the slots now
    if (this.runCount === run) {
      slots.stop('runStimulus');
      slots.stop('sendMarkers');
    }
  }

  private *sendMarkers(trainTarget: number): Routine {
    const { state, bindings, registry, config } = this.deps;
    const marker = bindings.requireMarker('send markers');

    while (state.stimulusRunning) {
      marker.write(formatStimulusMarker(trainTarget, registry.count()));
      yield waitSeconds(config.windowLength + config.interWindowInterval);
    }
  }
}
