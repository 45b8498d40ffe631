/**
 * Session container - wires a SessionController from configuration.
 *
 * createSessionContainer() takes an already merged config (tests, embedding);
 * createSessionContainerAsync() loads it from data/config/session.json and
 * the environment first, then creates the pino logger.
 */

import type { MergedConfig } from '../config/config-schema.js';
import { DEFAULT_CONFIG } from '../config/config-schema.js';
import { loadConfig, type ConfigLoaderOptions } from '../config/config-loader.js';
import type { MarkerChannel } from '../ports/marker.js';
import type { ResponseChannel } from '../ports/response.js';
import type { SelectableItem, SelectableSource } from '../ports/selectable.js';
import type { Logger } from '../types/logger.js';
import type { ParadigmHooks } from '../types/paradigm.js';
import type { RandomSource } from '../utils/random.js';
import { FrameLoop } from './frame-loop.js';
import { ItemDirectory } from './item-directory.js';
import { createLogger } from './logger.js';
import { SessionController } from './session-controller.js';

/**
 * Collaborators supplied by the host application.
 */
export interface SessionDependencies {
  /** Item lookup for the Tag strategy (default: a new empty ItemDirectory) */
  source?: SelectableSource | undefined;
  paradigm?: ParadigmHooks | undefined;
  initialItems?: readonly SelectableItem[] | undefined;
  random?: RandomSource | undefined;
  /** Bound immediately when both channels are given */
  markerChannel?: MarkerChannel | undefined;
  responseChannel?: ResponseChannel | undefined;
}

/**
 * Wired session.
 */
export interface SessionContainer {
  config: MergedConfig;
  logger: Logger;
  source: SelectableSource;
  session: SessionController;
  frameLoop: FrameLoop;
  /** Stop the frame loop and clean up the session */
  shutdown: () => void;
}

/**
 * Wire a session from a merged config.
 */
export function createSessionContainer(
  logger: Logger,
  deps: SessionDependencies = {},
  config: MergedConfig = DEFAULT_CONFIG
): SessionContainer {
  const source = deps.source ?? new ItemDirectory();

  const session = new SessionController({
    source,
    logger,
    config: config.session,
    paradigm: deps.paradigm,
    initialItems: deps.initialItems,
    random: deps.random,
  });

  if (deps.markerChannel && deps.responseChannel) {
    session.initialize(deps.markerChannel, deps.responseChannel);
  }

  const frameLoop = new FrameLoop(session, { targetFrameRate: config.targetFrameRate }, logger);

  return {
    config,
    logger,
    source,
    session,
    frameLoop,
    shutdown: () => {
      frameLoop.stop();
      session.cleanUp();
      logger.info('Session shut down');
    },
  };
}

/**
 * Load configuration, create the logger and wire a session.
 */
export async function createSessionContainerAsync(
  deps: SessionDependencies = {},
  loaderOptions: ConfigLoaderOptions = {}
): Promise<SessionContainer> {
  const config = await loadConfig(loaderOptions);

  const logger = createLogger({
    logDir: config.logging.logDir,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });
  logger.info({ session: config.session, targetFrameRate: config.targetFrameRate }, 'Loaded configuration');

  return createSessionContainer(logger, deps, config);
}
