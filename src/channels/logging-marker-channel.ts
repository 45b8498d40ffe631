/**
 * LoggingMarkerChannel - marker adapter that timestamps and logs markers.
 *
 * Useful as a development sink and as the reference MarkerChannel in tests.
 * Keeps a bounded history of the most recent markers.
 */

import type { MarkerChannel } from '../ports/marker.js';
import type { Logger } from '../types/logger.js';

/**
 * A marker as written.
 */
export interface MarkerRecord {
  text: string;
  /** Milliseconds from the channel clock */
  timestamp: number;
}

/**
 * Logging marker channel configuration.
 */
export interface LoggingMarkerChannelConfig {
  /** Maximum markers kept in history (default: 1000) */
  maxHistory: number;
  /** Clock in milliseconds (default: Date.now) */
  now: () => number;
}

const DEFAULT_CONFIG: LoggingMarkerChannelConfig = {
  maxHistory: 1000,
  now: Date.now,
};

export class LoggingMarkerChannel implements MarkerChannel {
  private readonly logger: Logger;
  private readonly config: LoggingMarkerChannelConfig;
  private readonly records: MarkerRecord[] = [];

  constructor(logger: Logger, config: Partial<LoggingMarkerChannelConfig> = {}) {
    this.logger = logger.child({ component: 'marker-channel' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  write(text: string): void {
    const record: MarkerRecord = { text, timestamp: this.config.now() };
    this.records.push(record);
    if (this.records.length > this.config.maxHistory) {
      this.records.shift();
    }
    this.logger.info({ marker: text, timestamp: record.timestamp }, 'Marker');
  }

  /**
   * Markers written so far (oldest first).
   */
  history(): readonly MarkerRecord[] {
    return this.records;
  }

  clear(): void {
    this.records.length = 0;
  }
}
