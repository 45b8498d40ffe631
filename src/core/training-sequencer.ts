/**
 * TrainingSequencer - multi-phase training sessions.
 *
 * State machine over TrainingType: None is both the initial and the terminal
 * state of every session. A supervising loop in the `training` slot holds the
 * current type and runs the phase routine for it; when the routine completes
 * (or the session is stopped) the type returns to None.
 *
 * Automated training is built in. Iterative and User training come from the
 * paradigm hooks and default to a logged one-shot no-op.
 */

import type { SessionConfig } from '../config/config-schema.js';
import type { Logger } from '../types/logger.js';
import type { ParadigmContext, ParadigmHooks, TrainingPhaseOutcome } from '../types/paradigm.js';
import { MARKERS, NO_TRAIN_TARGET, PopulationStrategy, TrainingType } from '../types/session.js';
import { drawUniqueIndices, type RandomSource } from '../utils/random.js';
import type { Routine } from './cooperative-scheduler.js';
import { nextFrame, waitSeconds } from './cooperative-scheduler.js';
import type { LoopSlots } from './loop-slots.js';
import type { ResponseReceiver } from './response-receiver.js';
import type { SelectableRegistry } from './selectable-registry.js';
import type { ChannelBindings, SessionState } from './session-state.js';
import type { StimulusCycleEngine } from './stimulus-cycle.js';

/** Pause between drawing the targets and the first highlight */
const INITIAL_PAUSE_SECONDS = 0.001;

/** Pause between the highlight phase and the stimulus run */
const SETTLE_SECONDS = 0.5;

/**
 * Sequencer dependencies.
 */
export interface TrainingSequencerDeps {
  slots: LoopSlots;
  state: SessionState;
  bindings: ChannelBindings;
  registry: SelectableRegistry;
  engine: StimulusCycleEngine;
  receiver: ResponseReceiver;
  config: Readonly<SessionConfig>;
  paradigm: ParadigmHooks;
  context: () => ParadigmContext;
  logger: Logger;
  /** Random source for drawing training targets (default: Math.random) */
  random?: RandomSource | undefined;
}

type PhaseRoutine = () => Routine<TrainingPhaseOutcome>;

export class TrainingSequencer {
  private readonly deps: TrainingSequencerDeps;
  private readonly logger: Logger;
  private readonly random: RandomSource;

  constructor(deps: TrainingSequencerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'training-sequencer' });
    this.random = deps.random ?? Math.random;
  }

  isTrainingRunning(): boolean {
    return this.deps.state.trainingRunning;
  }

  getCurrentTrainingType(): TrainingType {
    return this.deps.state.currentTrainingType;
  }

  /**
   * Start a training session of the requested type.
   * Starting None is the same as stopTraining().
   *
   * @throws ConfigurationOverrunError when automated training asks for more
   *   unique targets than there are selectable items
   */
  startTraining(type: TrainingType): void {
    const { state, engine, slots } = this.deps;

    if (state.stimulusRunning) {
      engine.stopStimulusRun();
    }

    const phase = this.phaseFor(type);
    if (!phase) {
      this.stopTraining();
      return;
    }

    slots.replace('training', this.runControllerTraining(type, phase));
  }

  /**
   * Stop the current training session.
   */
  stopTraining(): void {
    this.deps.state.currentTrainingType = TrainingType.None;
    this.deps.slots.stop('training');
  }

  /**
   * Phase routine for a training type (null for None).
   * Automated and Iterative sessions (re)start response reception first.
   */
  private phaseFor(type: TrainingType): PhaseRoutine | null {
    switch (type) {
      case TrainingType.Automated:
        this.deps.receiver.start();
        return () => this.automatedTraining();
      case TrainingType.Iterative:
        this.deps.receiver.start();
        return () => this.iterativeTraining();
      case TrainingType.User:
        return () => this.userTraining();
      case TrainingType.None:
        return null;
    }
  }

  private *runControllerTraining(type: TrainingType, phase: PhaseRoutine): Routine {
    const { state } = this.deps;
    state.currentTrainingType = type;
    this.logger.info({ type }, 'Training started');

    try {
      while (state.trainingRunning) {
        const outcome = yield* phase();
        if (outcome !== 'repeat') {
          break;
        }
        yield nextFrame();
      }

      this.logger.info({ type }, 'Training finished');
      this.stopTraining();
    } finally {
      // Cancelled or failed sessions end in None as well
      state.currentTrainingType = TrainingType.None;
    }
  }

  private *automatedTraining(): Routine<TrainingPhaseOutcome> {
    const { registry, state, config, engine, bindings } = this.deps;
    const marker = bindings.requireMarker('run automated training');

    registry.populate(PopulationStrategy.Tag);
    const numOptions = registry.count();
    const trainArray = drawUniqueIndices(config.numTrainingSelections, 0, numOptions, this.random);
    this.logger.info({ trainArray: trainArray.join(', '), numOptions }, 'Training targets drawn');

    try {
      yield waitSeconds(INITIAL_PAUSE_SECONDS);

      for (const [selection, target] of trainArray.entries()) {
        const item = registry.get(target);
        state.trainTarget = target;
        this.logger.info({ selection, target, item: item.name }, 'Running training selection');

        item.onTrainTargetEnter();
        yield waitSeconds(config.trainTargetPresentationTime);

        if (!config.trainTargetPersistent) {
          item.onTrainTargetExit();
        }

        yield waitSeconds(SETTLE_SECONDS);

        engine.startStimulusRun();
        yield waitSeconds((config.windowLength + config.interWindowInterval) * config.numTrainWindows);
        engine.stopStimulusRun();

        if (config.trainTargetPersistent) {
          item.onTrainTargetExit();
        }

        // Visual-only feedback, independent of classifier selections
        if (config.shamFeedback) {
          item.select();
        }

        state.trainTarget = NO_TRAIN_TARGET;
        yield waitSeconds(config.trainBreak);
      }
    } finally {
      state.trainTarget = NO_TRAIN_TARGET;
    }

    marker.write(MARKERS.TRAINING_COMPLETE);
    return 'complete';
  }

  private *iterativeTraining(): Routine<TrainingPhaseOutcome> {
    const { paradigm, context } = this.deps;
    if (paradigm.iterativeTraining) {
      return yield* paradigm.iterativeTraining(context());
    }

    this.logger.info({ paradigm: paradigm.name }, 'No iterative training available for this paradigm');
    yield nextFrame();
    return 'complete';
  }

  private *userTraining(): Routine<TrainingPhaseOutcome> {
    const { paradigm, context } = this.deps;
    if (paradigm.userTraining) {
      return yield* paradigm.userTraining(context());
    }

    this.logger.info({ paradigm: paradigm.name }, 'No user training available for this paradigm');
    yield nextFrame();
    return 'complete';
  }
}
