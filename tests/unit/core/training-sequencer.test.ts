/**
 * Tests for training sessions.
 *
 * Timing with the default config and 0.5 s ticks: each automated target
 * takes 15 ticks (3 s highlight + 0.5 s settle + 3 windows of 1 s + 1 s break),
 * starting on tick 1 after the initial pause.
 */

import { describe, it, expect } from 'vitest';
import { nextFrame, type Routine } from '../../../src/core/cooperative-scheduler.js';
import { ConfigurationOverrunError } from '../../../src/core/session-errors.js';
import { NO_TRAIN_TARGET, TrainingType } from '../../../src/types/session.js';
import type { ParadigmHooks, TrainingPhaseOutcome } from '../../../src/types/paradigm.js';
import { createTestSession, sequenceRandom } from '../../helpers/factories.js';

function trialMarkers(target: number): string[] {
  const stimulus = `marker,${String(target)}`;
  return ['Trial Started', stimulus, stimulus, stimulus, 'Trial Ends'];
}

describe('TrainingSequencer', () => {
  describe('automated training', () => {
    it('runs one stimulus run per drawn target and ends in None', () => {
      const { session, markerTexts, advance } = createTestSession({
        config: { numTrainingSelections: 3 },
        random: sequenceRandom([0]),
      });

      session.startTraining(TrainingType.Automated);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.Automated);
      expect(session.isTrainingRunning()).toBe(true);

      advance(60);

      expect(markerTexts()).toEqual([
        ...trialMarkers(0),
        ...trialMarkers(1),
        ...trialMarkers(2),
        'Training Complete',
      ]);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
      expect(session.isTrainingRunning()).toBe(false);
      expect(session.isLoopActive('training')).toBe(false);
      expect(session.getTrainTarget()).toBe(NO_TRAIN_TARGET);
    });

    it('highlights distinct targets', () => {
      const { session, items, advance } = createTestSession({
        config: { numTrainingSelections: 3 },
      });

      session.startTraining(TrainingType.Automated);
      advance(60);

      const highlighted = items.filter((item) => item.onTrainTargetEnter.mock.calls.length > 0);
      expect(highlighted).toHaveLength(3);
      for (const item of highlighted) {
        expect(item.onTrainTargetEnter).toHaveBeenCalledTimes(1);
        expect(item.onTrainTargetExit).toHaveBeenCalledTimes(1);
      }
    });

    it('sets the train target for the duration of each selection', () => {
      const { session, advance } = createTestSession({
        config: { numTrainingSelections: 2 },
        random: sequenceRandom([0.5]),
      });

      session.startTraining(TrainingType.Automated);
      advance(1);
      expect(session.getTrainTarget()).toBe(2);

      advance(13);
      expect(session.getTrainTarget()).toBe(NO_TRAIN_TARGET);

      advance(2);
      expect(session.getTrainTarget()).toBe(3);
    });

    it('removes a non-persistent highlight before the stimulus run', () => {
      const { session, items, markerTexts, advance } = createTestSession({
        config: { numTrainingSelections: 1 },
        random: sequenceRandom([0]),
      });

      session.startTraining(TrainingType.Automated);
      advance(6);
      expect(items[0]?.onTrainTargetExit).not.toHaveBeenCalled();

      advance(1);
      expect(items[0]?.onTrainTargetExit).toHaveBeenCalledTimes(1);
      expect(markerTexts()).toEqual([]);
    });

    it('keeps a persistent highlight until the stimulus run ends', () => {
      const { session, items, advance } = createTestSession({
        config: { numTrainingSelections: 1, trainTargetPersistent: true },
        random: sequenceRandom([0]),
      });

      session.startTraining(TrainingType.Automated);
      advance(13);
      expect(session.isStimulusRunning()).toBe(true);
      expect(items[0]?.onTrainTargetExit).not.toHaveBeenCalled();

      advance(1);
      expect(session.isStimulusRunning()).toBe(false);
      expect(items[0]?.onTrainTargetExit).toHaveBeenCalledTimes(1);
    });

    it('selects the target after each run with sham feedback', () => {
      const { session, items, advance } = createTestSession({
        config: { numTrainingSelections: 1, shamFeedback: true },
        random: sequenceRandom([0]),
      });

      session.startTraining(TrainingType.Automated);
      advance(13);
      expect(items[0]?.select).not.toHaveBeenCalled();

      advance(1);
      expect(items[0]?.select).toHaveBeenCalledTimes(1);
      expect(session.getLastSelected()).toBeNull();
    });

    it('completes at once with zero selections', () => {
      const { session, markerTexts, advance } = createTestSession();

      session.startTraining(TrainingType.Automated);
      advance(1);

      expect(markerTexts()).toEqual(['Training Complete']);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
    });

    it('fails fast when more targets are requested than items exist', () => {
      const { session, markerTexts } = createTestSession({
        config: { numTrainingSelections: 6 },
      });

      expect(() => {
        session.startTraining(TrainingType.Automated);
      }).toThrow(ConfigurationOverrunError);

      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
      expect(session.isLoopActive('training')).toBe(false);
      expect(markerTexts()).toEqual([]);
    });

    it('starts response reception', () => {
      const { session, responses } = createTestSession();

      session.startTraining(TrainingType.Automated);

      expect(responses.connected).toBe(true);
      expect(responses.polling).toBe(true);
      expect(session.isLoopActive('receiveMarkers')).toBe(true);
    });
  });

  describe('stopTraining', () => {
    it('cancels the session and restores the train target', () => {
      const { session, markerTexts, advance } = createTestSession({
        config: { numTrainingSelections: 2 },
        random: sequenceRandom([0]),
      });
      session.startTraining(TrainingType.Automated);
      advance(9);
      expect(session.getTrainTarget()).toBe(0);

      session.stopTraining();

      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
      expect(session.isLoopActive('training')).toBe(false);
      expect(session.getTrainTarget()).toBe(NO_TRAIN_TARGET);

      advance(60);
      expect(markerTexts()).not.toContain('Training Complete');
    });

    it('is what starting None does', () => {
      const { session } = createTestSession();
      session.startTraining(TrainingType.User);

      session.startTraining(TrainingType.None);

      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
      expect(session.isLoopActive('training')).toBe(false);
    });
  });

  describe('startTraining', () => {
    it('ends an active stimulus run first', () => {
      const { session, markerTexts } = createTestSession();
      session.startStimulusRun();

      session.startTraining(TrainingType.User);

      expect(session.isStimulusRunning()).toBe(false);
      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends']);
    });

    it('replaces a running session', () => {
      const { session } = createTestSession();

      session.startTraining(TrainingType.User);
      session.startTraining(TrainingType.Iterative);

      expect(session.getCurrentTrainingType()).toBe(TrainingType.Iterative);
      expect(session.listTasks('training')).toHaveLength(1);
    });
  });

  describe('iterative and user training', () => {
    it('logs and finishes when the paradigm has no user training', () => {
      const { session, logger, advance } = createTestSession();

      session.startTraining(TrainingType.User);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.User);
      expect(logger.messages('info')).toContain('No user training available for this paradigm');

      advance(1);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
    });

    it('logs and finishes when the paradigm has no iterative training', () => {
      const { session, logger, advance } = createTestSession();

      session.startTraining(TrainingType.Iterative);
      expect(logger.messages('info')).toContain('No iterative training available for this paradigm');

      advance(1);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
    });

    it('re-runs the paradigm routine while it asks to repeat', () => {
      let runs = 0;
      const paradigm: ParadigmHooks = {
        name: 'motor-imagery',
        *iterativeTraining(): Routine<TrainingPhaseOutcome> {
          runs++;
          yield nextFrame();
          return runs < 3 ? 'repeat' : 'complete';
        },
      };
      const { session, advance } = createTestSession({ paradigm });

      session.startTraining(TrainingType.Iterative);
      advance(4);
      expect(runs).toBe(3);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.Iterative);

      advance(1);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
    });

    it('lets the paradigm drive stimulus runs', () => {
      const paradigm: ParadigmHooks = {
        *userTraining(ctx): Routine<TrainingPhaseOutcome> {
          ctx.startStimulusRun(false);
          yield nextFrame();
          ctx.selectByIndex(1, true);
          return 'complete';
        },
      };
      const { session, items, markerTexts, advance } = createTestSession({ paradigm });

      session.startTraining(TrainingType.User);
      advance(1);

      expect(markerTexts()).toEqual(['Trial Started', 'Trial Ends']);
      expect(items[1]?.select).toHaveBeenCalledTimes(1);
      expect(session.getCurrentTrainingType()).toBe(TrainingType.None);
    });
  });
});
