/**
 * Tests for the stimulus run and its marker stream.
 */

import { describe, it, expect } from 'vitest';
import { formatStimulusMarker } from '../../../src/core/stimulus-cycle.js';
import { nextFrame } from '../../../src/core/cooperative-scheduler.js';
import { PreconditionError } from '../../../src/core/session-errors.js';
import type { ParadigmHooks } from '../../../src/types/paradigm.js';
import { createTestSession } from '../../helpers/factories.js';

describe('formatStimulusMarker', () => {
  it('appends the train target when it is within the selectable count', () => {
    expect(formatStimulusMarker(3, 5)).toBe('marker,3');
    expect(formatStimulusMarker(0, 5)).toBe('marker,0');
    expect(formatStimulusMarker(5, 5)).toBe('marker,5');
  });

  it('writes a bare marker when no target is active', () => {
    expect(formatStimulusMarker(99, 5)).toBe('marker');
    expect(formatStimulusMarker(6, 5)).toBe('marker');
  });
});

describe('StimulusCycleEngine', () => {
  describe('startStimulusRun', () => {
    it('writes the trial start marker followed by the first stimulus marker', () => {
      const { session, markerTexts } = createTestSession();

      session.startStimulusRun();

      expect(session.isStimulusRunning()).toBe(true);
      expect(markerTexts()).toEqual(['Trial Started', 'marker']);
    });

    it('tags stimulus markers with the current train target', () => {
      const { session, markerTexts } = createTestSession();
      session.setTrainTarget(3);

      session.startStimulusRun();

      expect(markerTexts()).toEqual(['Trial Started', 'marker,3']);
    });

    it('repeats the stimulus marker every window', () => {
      const { session, markerTexts, advance } = createTestSession({
        config: { windowLength: 1, interWindowInterval: 0.5 },
      });

      session.startStimulusRun();
      advance(6);

      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'marker', 'marker']);
    });

    it('skips the periodic markers when asked', () => {
      const { session, markerTexts, advance } = createTestSession();

      session.startStimulusRun(false);
      advance(4);

      expect(markerTexts()).toEqual(['Trial Started']);
      expect(session.isLoopActive('sendMarkers')).toBe(false);
      expect(session.isLoopActive('runStimulus')).toBe(true);
    });

    it('takes the periodic marker default from the paradigm', () => {
      const { session, markerTexts } = createTestSession({
        paradigm: { name: 'p300', sendConstantMarkers: false },
      });

      session.startStimulusRun();

      expect(markerTexts()).toEqual(['Trial Started']);
    });

    it('ends an active run before starting the next', () => {
      const { session, markerTexts } = createTestSession();

      session.startStimulusRun();
      session.startStimulusRun();

      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends', 'Trial Started', 'marker']);
    });

    it('never leaves more than one run loop alive', () => {
      const { session, advance } = createTestSession();

      for (let i = 0; i < 5; i++) {
        session.startStimulusRun();
        advance(1);
      }

      expect(session.listTasks('runStimulus')).toHaveLength(1);
      expect(session.listTasks('sendMarkers')).toHaveLength(1);
      expect(session.listTasks('receiveMarkers')).toHaveLength(1);
    });

    it('clears the last selection and repopulates the registry', () => {
      const { session, items } = createTestSession();
      session.populate();
      session.selectByIndex(1);
      expect(session.getLastSelected()).toBe(items[1]);

      session.startStimulusRun();

      expect(session.getLastSelected()).toBeNull();
      expect(session.getSelectableItems()).toHaveLength(5);
    });

    it('requires bound channels', () => {
      const { session, markerTexts } = createTestSession({ initialize: false });

      expect(() => {
        session.startStimulusRun();
      }).toThrow(PreconditionError);
      expect(session.isStimulusRunning()).toBe(false);
      expect(markerTexts()).toEqual([]);
    });
  });

  describe('stopStimulusRun', () => {
    it('writes the trial end marker and releases the run loops on the next tick', () => {
      const { session, markerTexts, advance } = createTestSession();
      session.startStimulusRun();

      session.stopStimulusRun();
      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends']);

      advance(1);
      expect(session.isLoopActive('runStimulus')).toBe(false);
      expect(session.isLoopActive('sendMarkers')).toBe(false);

      advance(10);
      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends']);
    });

    it('is safe without bound channels', () => {
      const { session } = createTestSession({ initialize: false });

      expect(() => {
        session.stopStimulusRun();
      }).not.toThrow();
    });
  });

  describe('startStopStimulusRun', () => {
    it('toggles the run', () => {
      const { session, markerTexts } = createTestSession();

      session.startStopStimulusRun();
      expect(session.isStimulusRunning()).toBe(true);

      session.startStopStimulusRun();
      expect(session.isStimulusRunning()).toBe(false);
      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends']);
    });
  });

  describe('paradigm hooks', () => {
    it('repeats the cycle hook while running and runs the completion hook once', () => {
      let cycles = 0;
      const paradigm: ParadigmHooks = {
        name: 'ssvep',
        *onStimulusRun() {
          cycles++;
          yield nextFrame();
        },
        *onStimulusRunComplete(ctx) {
          ctx.writeMarker('run complete');
        },
      };
      const { session, markerTexts, advance } = createTestSession({ paradigm });

      session.startStimulusRun();
      expect(cycles).toBe(1);

      advance(4);
      expect(cycles).toBe(3);

      session.stopStimulusRun();
      advance(2);

      const texts = markerTexts();
      expect(texts.at(-1)).toBe('run complete');
      expect(texts.filter((text) => text === 'run complete')).toHaveLength(1);
      expect(session.isLoopActive('runStimulus')).toBe(false);
    });

    it('keeps the loops of a run started by the completion hook', () => {
      let restarted = false;
      const paradigm: ParadigmHooks = {
        *onStimulusRunComplete(ctx) {
          if (!restarted) {
            restarted = true;
            ctx.startStimulusRun();
          }
        },
      };
      const { session, markerTexts, advance } = createTestSession({ paradigm });

      session.startStimulusRun();
      session.stopStimulusRun();
      advance(1);

      expect(session.isStimulusRunning()).toBe(true);
      expect(session.isLoopActive('runStimulus')).toBe(true);
      expect(session.isLoopActive('sendMarkers')).toBe(true);
      expect(session.listTasks('runStimulus')).toHaveLength(1);

      advance(2);
      expect(markerTexts()).toEqual(['Trial Started', 'marker', 'Trial Ends', 'Trial Started', 'marker', 'marker']);
    });
  });
});
