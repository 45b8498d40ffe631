import { z } from 'zod';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

/**
 * Stimulus and training timing options.
 * Durations are in seconds of scheduler time.
 */
export interface SessionConfig {
  /** Length of one stimulus window */
  windowLength: number;
  /** Gap between stimulus windows */
  interWindowInterval: number;
  /** Number of targets drawn for automated training */
  numTrainingSelections: number;
  /** Stimulus windows per training target */
  numTrainWindows: number;
  /** Pause before a training session (available to paradigm hooks) */
  pauseBeforeTraining: number;
  /** Keep the target highlighted through the stimulus run */
  trainTargetPersistent: boolean;
  /** How long the target is highlighted before the run */
  trainTargetPresentationTime: number;
  /** Rest between training targets */
  trainBreak: number;
  /** Select the training target after its run (visual feedback only) */
  shamFeedback: boolean;
  /** Tag used to discover selectable items */
  groupTag: string;
}

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

/**
 * Session configuration file schema (data/config/session.json).
 * All fields are optional - defaults are used for missing values.
 */
export const sessionConfigFileSchema = z
  .object({
    /** Schema version for migrations */
    version: z.number().int().positive().optional(),

    session: z
      .object({
        windowLength: z.number().positive(),
        interWindowInterval: z.number().nonnegative(),
        numTrainingSelections: z.number().int().nonnegative(),
        numTrainWindows: z.number().int().positive(),
        pauseBeforeTraining: z.number().nonnegative(),
        trainTargetPersistent: z.boolean(),
        trainTargetPresentationTime: z.number().nonnegative(),
        trainBreak: z.number().nonnegative(),
        shamFeedback: z.boolean(),
        groupTag: z.string().min(1),
      })
      .partial()
      .optional(),

    /** Frame rate of the tick driver. -1 or 0 keeps the default. */
    targetFrameRate: z.number().int().min(-1).optional(),

    logging: z
      .object({
        level: logLevelSchema,
        pretty: z.boolean(),
      })
      .partial()
      .optional(),
  })
  .strict();

/**
 * Parsed config file.
 */
export type SessionConfigFile = z.infer<typeof sessionConfigFileSchema>;

/**
 * Log levels accepted in configuration.
 */
export type ConfigLogLevel = z.infer<typeof logLevelSchema>;

/**
 * Merged application configuration.
 *
 * This is the final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables (highest priority)
 */
export interface MergedConfig {
  /** Stimulus and training options */
  session: SessionConfig;

  /** Frame rate of the tick driver (frames per second) */
  targetFrameRate: number;

  /** Logging configuration */
  logging: {
    level: ConfigLogLevel;
    pretty: boolean;
    logDir: string;
  };

  /** Data paths */
  paths: {
    data: string;
    config: string;
    logs: string;
  };
}

/**
 * Default session options.
 */
export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  windowLength: 1.0,
  interWindowInterval: 0,
  numTrainingSelections: 0,
  numTrainWindows: 3,
  pauseBeforeTraining: 2,
  trainTargetPersistent: false,
  trainTargetPresentationTime: 3,
  trainBreak: 1,
  shamFeedback: false,
  groupTag: 'BCI',
};

/**
 * Default frame rate when none (or -1 / 0) is configured.
 */
export const DEFAULT_FRAME_RATE = 60;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  session: DEFAULT_SESSION_CONFIG,
  targetFrameRate: DEFAULT_FRAME_RATE,
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: 'data/logs',
  },
  paths: {
    data: 'data',
    config: 'data/config',
    logs: 'data/logs',
  },
};
