/**
 * Cooperative Scheduler
 *
 * Single-threaded task executor driven by an external per-frame tick.
 * Tasks are generator routines that voluntarily suspend by yielding a
 * Suspension and are resumed on a later tick once it is satisfied:
 *
 *   function* blink(): Routine {
 *     while (on) {
 *       toggle();
 *       yield waitSeconds(0.5);
 *     }
 *   }
 *
 * Nested behaviours compose with `yield*`, and a routine's return value is
 * available to the delegating routine.
 *
 * Time is the scheduler's own clock, advanced only by tick(deltaSeconds).
 */

import type { Logger } from '../types/logger.js';
import { errorMessage } from './session-errors.js';

/**
 * Why a routine is suspended.
 */
export type Suspension =
  | { readonly kind: 'frame' }
  | { readonly kind: 'delay'; readonly seconds: number }
  | { readonly kind: 'until'; readonly predicate: () => boolean };

/**
 * A cooperative routine.
 */
export type Routine<TReturn = void> = Generator<Suspension, TReturn, void>;

/**
 * Handle to a started task.
 */
export interface TaskHandle {
  readonly id: number;
  readonly name: string;
  /** False once the routine finished, failed or was cancelled */
  isAlive(): boolean;
  /** Prevent any future resumption */
  cancel(): void;
}

/**
 * Summary of a live task.
 */
export interface TaskInfo {
  id: number;
  name: string;
}

type Wake =
  | { kind: 'frame' }
  | { kind: 'at'; time: number }
  | { kind: 'until'; predicate: () => boolean };

interface Task {
  id: number;
  name: string;
  routine: Routine<unknown>;
  state: 'running' | 'suspended' | 'done';
  cancelled: boolean;
  wake: Wake;
}

/** Float tolerance when comparing the clock with a delay deadline */
const TIME_EPSILON = 1e-9;

const NEXT_FRAME: Suspension = { kind: 'frame' };

/**
 * Suspend until the next tick.
 */
export function nextFrame(): Suspension {
  return NEXT_FRAME;
}

/**
 * Suspend for a number of scheduler seconds.
 */
export function waitSeconds(seconds: number): Suspension {
  return { kind: 'delay', seconds: Math.max(0, seconds) };
}

/**
 * Suspend until the predicate holds (checked once per tick).
 */
export function waitUntil(predicate: () => boolean): Suspension {
  return { kind: 'until', predicate };
}

/**
 * Suspend while the predicate holds (checked once per tick).
 */
export function waitWhile(predicate: () => boolean): Suspension {
  return { kind: 'until', predicate: () => !predicate() };
}

/**
 * CooperativeScheduler - runs routines one step per tick.
 *
 * Guarantees:
 * - start() runs the routine synchronously up to its first suspension
 * - each live task is resumed at most once per tick, in start order
 * - tasks started during a tick are first resumed on the following tick
 * - a cancelled task is never resumed again
 */
export class CooperativeScheduler {
  private readonly logger: Logger;
  private tasks: Task[] = [];
  private nextId = 1;
  private clock = 0;
  private frameCount = 0;
  private ticking = false;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'cooperative-scheduler' });
  }

  /**
   * Start a routine.
   *
   * Errors thrown before the first suspension are rethrown to the caller.
   * Errors thrown on later ticks are logged and end the task.
   */
  start(name: string, routine: Routine<unknown>): TaskHandle {
    const task: Task = {
      id: this.nextId++,
      name,
      routine,
      state: 'running',
      cancelled: false,
      wake: { kind: 'frame' },
    };
    this.tasks.push(task);
    this.logger.trace({ taskId: task.id, name }, 'Task started');

    this.step(task, true);

    return {
      id: task.id,
      name,
      isAlive: () => task.state !== 'done' && !task.cancelled,
      cancel: () => {
        this.cancelTask(task);
      },
    };
  }

  /**
   * Advance the clock and resume every task whose suspension is satisfied.
   */
  tick(deltaSeconds: number): void {
    if (this.ticking) {
      this.logger.warn('Nested tick ignored');
      return;
    }

    this.ticking = true;
    this.clock += Math.max(0, deltaSeconds);
    this.frameCount++;

    try {
      const snapshot = [...this.tasks];
      for (const task of snapshot) {
        if (task.state !== 'suspended' || task.cancelled) {
          continue;
        }
        if (this.isDue(task)) {
          this.step(task, false);
        }
      }
    } finally {
      this.ticking = false;
      this.prune();
    }
  }

  /**
   * Cancel every live task.
   */
  cancelAll(): void {
    for (const task of [...this.tasks]) {
      this.cancelTask(task);
    }
    this.prune();
  }

  /**
   * Scheduler clock in seconds.
   */
  getTime(): number {
    return this.clock;
  }

  /**
   * Number of ticks processed.
   */
  getFrameCount(): number {
    return this.frameCount;
  }

  /**
   * Live tasks, optionally filtered by name.
   */
  listTasks(name?: string): TaskInfo[] {
    return this.tasks
      .filter((t) => t.state !== 'done' && !t.cancelled)
      .filter((t) => name === undefined || t.name === name)
      .map((t) => ({ id: t.id, name: t.name }));
  }

  /**
   * Run one step of a task.
   */
  private step(task: Task, rethrow: boolean): void {
    task.state = 'running';

    let result: IteratorResult<Suspension, unknown>;
    try {
      result = task.routine.next();
    } catch (error) {
      task.state = 'done';
      if (rethrow) {
        throw error;
      }
      this.logger.error({ taskId: task.id, name: task.name, error: errorMessage(error) }, 'Task failed');
      return;
    }

    if (result.done) {
      task.state = 'done';
      this.logger.trace({ taskId: task.id, name: task.name }, 'Task completed');
      return;
    }

    // Cancelled from inside its own step
    if (task.cancelled) {
      this.close(task);
      return;
    }

    task.wake = this.toWake(result.value);
    task.state = 'suspended';
  }

  private isDue(task: Task): boolean {
    const wake = task.wake;
    switch (wake.kind) {
      case 'frame':
        return true;
      case 'at':
        return this.clock + TIME_EPSILON >= wake.time;
      case 'until':
        try {
          return wake.predicate();
        } catch (error) {
          this.logger.error(
            { taskId: task.id, name: task.name, error: errorMessage(error) },
            'Task wait condition failed'
          );
          this.close(task);
          return false;
        }
    }
  }

  private toWake(suspension: Suspension): Wake {
    switch (suspension.kind) {
      case 'frame':
        return { kind: 'frame' };
      case 'delay':
        return { kind: 'at', time: this.clock + suspension.seconds };
      case 'until':
        return { kind: 'until', predicate: suspension.predicate };
    }
  }

  private cancelTask(task: Task): void {
    if (task.state === 'done' || task.cancelled) {
      return;
    }
    task.cancelled = true;
    this.logger.trace({ taskId: task.id, name: task.name }, 'Task cancelled');

    // A running task is closed once its current step returns
    if (task.state === 'suspended') {
      this.close(task);
    }
  }

  /**
   * Close a routine so its finally blocks run.
   */
  private close(task: Task): void {
    task.state = 'done';
    try {
      task.routine.return(undefined);
    } catch (error) {
      this.logger.error(
        { taskId: task.id, name: task.name, error: errorMessage(error) },
        'Task cleanup failed'
      );
    }
  }

  private prune(): void {
    if (!this.ticking) {
      this.tasks = this.tasks.filter((t) => t.state !== 'done');
    }
  }
}

/**
 * Create a cooperative scheduler.
 */
export function createCooperativeScheduler(logger: Logger): CooperativeScheduler {
  return new CooperativeScheduler(logger);
}
