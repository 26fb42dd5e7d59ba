// Stack-frame cleaning ahead of hashing and persistence.
//
// Filter failures are absorbed here: a misbehaving user filter degrades to the raw
// frames with a warning, and never aborts a detection or a flush.

import type { BacktraceCleaner, Logger } from './types.js';
import type { Configuration } from './config.js';
import { stderrLogger } from './logger.js';

export interface LocationCleanerOptions {
  /** Host-provided cleaner; used only when the configuration has no locationFilter */
  readonly backtraceCleaner?: BacktraceCleaner;
  readonly logger?: Logger;
}

export class LocationCleaner {
  private readonly config: Configuration;
  private readonly backtraceCleaner?: BacktraceCleaner;
  private readonly logger: Logger;

  constructor(config: Configuration, options: LocationCleanerOptions = {}) {
    this.config = config;
    this.backtraceCleaner = options.backtraceCleaner;
    this.logger = options.logger ?? stderrLogger;
  }

  /** Filter, then cap to maxLocationFrames from the top of the stack. Deterministic. */
  clean(frames: readonly string[]): string[] {
    if (frames.length === 0) return [];

    const filtered = this.filter(frames);
    const limit = this.config.maxLocationFrames;
    if (limit !== null && limit > 0 && filtered.length > limit) {
      return filtered.slice(0, limit);
    }
    return filtered;
  }

  private filter(frames: readonly string[]): string[] {
    const custom = this.config.locationFilter;
    if (custom) {
      let result: unknown;
      try {
        result = custom([...frames]);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`locationFilter threw (${message}) — using unfiltered frames`);
        return [...frames];
      }
      if (!Array.isArray(result)) {
        this.logger.warn(`locationFilter returned ${result === null ? 'null' : typeof result} instead of an array — using unfiltered frames`);
        return [...frames];
      }
      return result.map(frame => String(frame));
    }

    if (this.backtraceCleaner) return this.backtraceCleaner([...frames]);
    return [...frames];
  }
}
