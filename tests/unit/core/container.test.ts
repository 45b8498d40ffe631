/**
 * Tests for session container wiring.
 */

import { describe, it, expect } from 'vitest';
import { createSessionContainer } from '../../../src/core/container.js';
import { DEFAULT_CONFIG, type MergedConfig } from '../../../src/config/config-schema.js';
import { ItemDirectory } from '../../../src/core/item-directory.js';
import { LoggingMarkerChannel } from '../../../src/channels/logging-marker-channel.js';
import { QueuedResponseChannel } from '../../../src/channels/queued-response-channel.js';
import { createFakeItems, createMockLogger } from '../../helpers/factories.js';

describe('createSessionContainer', () => {
  it('wires a session from the merged config', () => {
    const logger = createMockLogger();
    const config: MergedConfig = {
      ...DEFAULT_CONFIG,
      session: { ...DEFAULT_CONFIG.session, groupTag: 'SSVEP' },
      targetFrameRate: 30,
    };

    const container = createSessionContainer(logger, {}, config);

    expect(container.config).toBe(config);
    expect(container.source).toBeInstanceOf(ItemDirectory);
    expect(container.session.getConfig().groupTag).toBe('SSVEP');
    expect(container.frameLoop.getFrameRate()).toBe(30);
  });

  it('binds the channels when both are given', () => {
    const logger = createMockLogger();
    const directory = new ItemDirectory();
    for (const item of createFakeItems(3)) {
      directory.register('BCI', item);
    }
    const markers = new LoggingMarkerChannel(logger);

    const { session } = createSessionContainer(logger, {
      source: directory,
      markerChannel: markers,
      responseChannel: new QueuedResponseChannel(logger),
    });
    session.setTrainTarget(2);
    session.startStimulusRun();

    expect(markers.history().map((r) => r.text)).toEqual(['Trial Started', 'marker,2']);
  });

  it('shuts the session down', () => {
    const logger = createMockLogger();
    const responses = new QueuedResponseChannel(logger);
    const container = createSessionContainer(logger, {
      markerChannel: new LoggingMarkerChannel(logger),
      responseChannel: responses,
    });
    container.session.startStimulusRun();

    container.shutdown();

    expect(container.frameLoop.isRunning()).toBe(false);
    expect(container.session.isStimulusRunning()).toBe(false);
    expect(responses.connected).toBe(false);
    expect(logger.messages('info')).toContain('Session shut down');
  });
});
