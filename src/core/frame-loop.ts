/**
 * FrameLoop - real-time heartbeat for a session.
 *
 * Calls tick(deltaSeconds) at a fixed target frame rate using timers,
 * measuring the real elapsed time between frames. Hosts with their own
 * render loop (a browser requestAnimationFrame, a game engine) call
 * SessionController.tick directly instead.
 */

import { DEFAULT_FRAME_RATE } from '../config/config-schema.js';
import type { Logger } from '../types/logger.js';
import { errorMessage } from './session-errors.js';

/**
 * Something advanced once per frame.
 */
export interface Tickable {
  tick(deltaSeconds: number): void;
}

/**
 * Frame loop configuration.
 */
export interface FrameLoopConfig {
  /** Frames per second. -1 and 0 mean "use the default". */
  targetFrameRate: number;
  /** Clock in milliseconds (default: Date.now) */
  now?: (() => number) | undefined;
}

/**
 * Resolve a configured frame rate to an effective one.
 */
export function resolveFrameRate(targetFrameRate: number): number {
  return targetFrameRate > 0 ? targetFrameRate : DEFAULT_FRAME_RATE;
}

export class FrameLoop {
  private readonly target: Tickable;
  private readonly logger: Logger;
  private readonly frameRate: number;
  private readonly now: () => number;

  private running = false;
  private frameTimeout: ReturnType<typeof setTimeout> | null = null;
  private lastFrameAt = 0;
  private frameCount = 0;

  constructor(target: Tickable, config: FrameLoopConfig, logger: Logger) {
    this.target = target;
    this.logger = logger.child({ component: 'frame-loop' });
    this.frameRate = resolveFrameRate(config.targetFrameRate);
    this.now = config.now ?? Date.now;
  }

  /**
   * Start ticking.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Frame loop already running');
      return;
    }

    this.running = true;
    this.lastFrameAt = this.now();
    this.logger.info({ frameRate: this.frameRate }, 'Frame loop started');

    this.scheduleFrame();
  }

  /**
   * Stop ticking.
   */
  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.frameTimeout) {
      clearTimeout(this.frameTimeout);
      this.frameTimeout = null;
    }

    this.logger.info({ frameCount: this.frameCount }, 'Frame loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getFrameCount(): number {
    return this.frameCount;
  }

  getFrameRate(): number {
    return this.frameRate;
  }

  private scheduleFrame(): void {
    if (!this.running) return;

    this.frameTimeout = setTimeout(() => {
      this.frame();
    }, 1000 / this.frameRate);
  }

  private frame(): void {
    if (!this.running) return;

    const now = this.now();
    const deltaSeconds = (now - this.lastFrameAt) / 1000;
    this.lastFrameAt = now;
    this.frameCount++;

    try {
      this.target.tick(deltaSeconds);
    } catch (error) {
      this.logger.error({ frame: this.frameCount, error: errorMessage(error) }, 'Frame tick failed');
    }

    this.scheduleFrame();
  }
}

/**
 * Create a frame loop.
 */
export function createFrameLoop(target: Tickable, config: FrameLoopConfig, logger: Logger): FrameLoop {
  return new FrameLoop(target, config, logger);
}
