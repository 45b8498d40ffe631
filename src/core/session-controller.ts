/**
 * SessionController - the orchestration core of a stimulus session.
 *
 * Composes the scheduler, loop slots, registry, stimulus engine, selection
 * coordinator and training sequencer around one SessionState, and exposes
 * the operations a presentation layer drives:
 *
 *   const session = new SessionController({ source, config, logger });
 *   session.initialize(markerChannel, responseChannel);
 *   session.startStimulusRun();
 *   // every frame:
 *   session.tick(deltaSeconds);
 *
 * Channels are bound by initialize(); starting a run or a training session
 * before that throws PreconditionError.
 */

import type { SessionConfig } from '../config/config-schema.js';
import { DEFAULT_SESSION_CONFIG } from '../config/config-schema.js';
import type { MarkerChannel } from '../ports/marker.js';
import type { ResponseChannel } from '../ports/response.js';
import type { SelectableItem, SelectableSource } from '../ports/selectable.js';
import { createNoOpLogger, type Logger } from '../types/logger.js';
import type { ParadigmContext, ParadigmHooks } from '../types/paradigm.js';
import type { PopulationStrategy, TrainingType } from '../types/session.js';
import type { RandomSource } from '../utils/random.js';
import type { TaskInfo } from './cooperative-scheduler.js';
import { CooperativeScheduler } from './cooperative-scheduler.js';
import { LoopSlots, type LoopSlot } from './loop-slots.js';
import { ResponseReceiver } from './response-receiver.js';
import { SelectableRegistry, type PopulateResult } from './selectable-registry.js';
import { SelectionCoordinator } from './selection-coordinator.js';
import { ChannelBindings, SessionState } from './session-state.js';
import { StimulusCycleEngine } from './stimulus-cycle.js';
import { TrainingSequencer } from './training-sequencer.js';

/**
 * Controller options.
 */
export interface SessionControllerOptions {
  /** Where the Tag population strategy discovers items */
  source: SelectableSource;
  /** Default: a no-op logger */
  logger?: Logger | undefined;
  /** Session options (defaults fill missing values) */
  config?: Partial<SessionConfig> | undefined;
  /** Paradigm-specific behaviour */
  paradigm?: ParadigmHooks | undefined;
  /** Initial registry contents for the Predefined strategy */
  initialItems?: readonly SelectableItem[] | undefined;
  /** Random source for training target draws */
  random?: RandomSource | undefined;
}

export class SessionController {
  private readonly logger: Logger;
  private readonly config: Readonly<SessionConfig>;
  private readonly paradigm: ParadigmHooks;

  private readonly scheduler: CooperativeScheduler;
  private readonly slots: LoopSlots;
  private readonly state = new SessionState();
  private readonly bindings = new ChannelBindings();
  private readonly registry: SelectableRegistry;
  private readonly receiver: ResponseReceiver;
  private readonly engine: StimulusCycleEngine;
  private readonly coordinator: SelectionCoordinator;
  private readonly sequencer: TrainingSequencer;
  private readonly context: ParadigmContext;

  constructor(options: SessionControllerOptions) {
    const logger = options.logger ?? createNoOpLogger();
    this.logger = logger.child({ component: 'session-controller' });
    this.config = { ...DEFAULT_SESSION_CONFIG, ...options.config };
    this.paradigm = options.paradigm ?? {};

    this.scheduler = new CooperativeScheduler(logger);
    this.slots = new LoopSlots(this.scheduler, logger);
    this.registry = new SelectableRegistry(
      options.source,
      { groupTag: this.config.groupTag },
      logger,
      options.initialItems
    );
    this.receiver = new ResponseReceiver(this.slots, this.bindings, logger);

    this.context = {
      config: this.config,
      state: this.state,
      registry: this.registry,
      logger: logger.child({ component: 'paradigm', paradigm: this.paradigm.name }),
      writeMarker: (text) => {
        this.bindings.requireMarker('write marker').write(text);
      },
      startStimulusRun: (sendConstantMarkers) => {
        this.startStimulusRun(sendConstantMarkers);
      },
      stopStimulusRun: () => {
        this.stopStimulusRun();
      },
      selectByIndex: (index, stopRun) => {
        this.selectByIndex(index, stopRun);
      },
    };

    this.engine = new StimulusCycleEngine({
      slots: this.slots,
      state: this.state,
      bindings: this.bindings,
      registry: this.registry,
      receiver: this.receiver,
      config: this.config,
      paradigm: this.paradigm,
      context: () => this.context,
      logger,
    });

    this.coordinator = new SelectionCoordinator({
      state: this.state,
      registry: this.registry,
      slots: this.slots,
      run: this.engine,
      logger,
    });

    this.sequencer = new TrainingSequencer({
      slots: this.slots,
      state: this.state,
      bindings: this.bindings,
      registry: this.registry,
      engine: this.engine,
      receiver: this.receiver,
      config: this.config,
      paradigm: this.paradigm,
      context: () => this.context,
      logger,
      random: options.random,
    });

    this.receiver.setBatchCallback((responses) => {
      this.coordinator.handleIncomingResponses(responses);
    });
    this.receiver.setRestartCallback(() => {
      this.coordinator.resetPingCount();
    });
  }

  // ============================================================
  // Lifecycle
  // ============================================================

  /**
   * Bind the marker and response channels for future runs.
   */
  initialize(marker: MarkerChannel, response: ResponseChannel): void {
    this.bindings.bind(marker, response);
    this.logger.info({ paradigm: this.paradigm.name }, 'Session initialized');
  }

  /**
   * Stop every loop and release the response channel.
   */
  cleanUp(): void {
    this.receiver.stop();
    this.bindings.getResponse()?.disconnect();

    this.state.stimulusRunning = false;
    this.sequencer.stopTraining();
    this.slots.stopAll();

    this.logger.info('Session cleaned up');
  }

  /**
   * Advance the session by one frame.
   */
  tick(deltaSeconds: number): void {
    this.scheduler.tick(deltaSeconds);
  }

  // ============================================================
  // Stimulus
  // ============================================================

  startStimulusRun(sendConstantMarkers?: boolean): void {
    this.engine.startStimulusRun(sendConstantMarkers);
  }

  stopStimulusRun(): void {
    this.engine.stopStimulusRun();
  }

  startStopStimulusRun(): void {
    this.engine.startStopStimulusRun();
  }

  /**
   * Stop polling the response channel.
   */
  stopReceivingResponses(): void {
    this.receiver.stop();
  }

  // ============================================================
  // Selection
  // ============================================================

  populate(strategy?: PopulationStrategy): PopulateResult {
    return this.registry.populate(strategy);
  }

  populateByName(name: string): PopulateResult {
    return this.registry.populateByName(name);
  }

  selectByIndex(index: number, stopRun = false): boolean {
    return this.coordinator.selectByIndex(index, stopRun);
  }

  selectAtEndOfRun(index: number): void {
    this.coordinator.selectAtEndOfRun(index);
  }

  handleIncomingResponses(responses: readonly string[]): void {
    this.coordinator.handleIncomingResponses(responses);
  }

  // ============================================================
  // Training
  // ============================================================

  startTraining(type: TrainingType): void {
    this.sequencer.startTraining(type);
  }

  stopTraining(): void {
    this.sequencer.stopTraining();
  }

  // ============================================================
  // Inspection
  // ============================================================

  isStimulusRunning(): boolean {
    return this.state.stimulusRunning;
  }

  isTrainingRunning(): boolean {
    return this.state.trainingRunning;
  }

  getCurrentTrainingType(): TrainingType {
    return this.state.currentTrainingType;
  }

  getLastSelected(): SelectableItem | null {
    return this.state.lastSelected;
  }

  getTrainTarget(): number {
    return this.state.trainTarget;
  }

  /**
   * Set the train target used as marker payload by the next run.
   */
  setTrainTarget(target: number): void {
    this.state.trainTarget = target;
  }

  getPingCount(): number {
    return this.coordinator.getPingCount();
  }

  getSelectableItems(): readonly SelectableItem[] {
    return this.registry.items();
  }

  getConfig(): Readonly<SessionConfig> {
    return this.config;
  }

  isLoopActive(slot: LoopSlot): boolean {
    return this.slots.isActive(slot);
  }

  /**
   * Live scheduler tasks (one per active loop slot).
   */
  listTasks(name?: string): TaskInfo[] {
    return this.scheduler.listTasks(name);
  }

  /**
   * Scheduler clock in seconds.
   */
  getTime(): number {
    return this.scheduler.getTime();
  }
}
