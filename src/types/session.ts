/**
 * Session-level types shared by the orchestration core.
 */

/**
 * Training protocol being run.
 */
export enum TrainingType {
  /** No training session active */
  None = 'none',
  /** Randomised target highlighting interleaved with stimulus runs */
  Automated = 'automated',
  /** Paradigm-specific iterative training */
  Iterative = 'iterative',
  /** Paradigm-specific user-driven training */
  User = 'user',
}

/**
 * How the selectable registry is (re)populated.
 */
export enum PopulationStrategy {
  /** Keep the current contents unchanged */
  Predefined = 'predefined',
  /** Discover items registered under the configured group tag */
  Tag = 'tag',
  /** Reserved - not implemented */
  Children = 'children',
}

/**
 * Train target value meaning "no active training target".
 * Any value above the selectable count has the same effect.
 */
export const NO_TRAIN_TARGET = 99;

/**
 * Marker strings written by the core.
 */
export const MARKERS = {
  TRIAL_STARTED: 'Trial Started',
  TRIAL_ENDS: 'Trial Ends',
  STIMULUS: 'marker',
  TRAINING_COMPLETE: 'Training Complete',
} as const;

/**
 * Response token used by classifiers as a liveness heartbeat.
 */
export const PING_RESPONSE = 'ping';
