// Core types for the N+1 TODO layer
//
// Design principles:
//   - Persisted shapes are readonly; the store rebuilds entries instead of mutating them
//   - Validate at boundaries, trust inside: the YAML file is parsed once, through a schema
//   - Collaborators (clock, logger, backtrace cleaner) are injected, never reached for globally

/** One observed call site for an entry */
export interface LocationRecord {
  readonly location: string;               // frames joined with " -> "
  readonly testLocation: string | null;    // test file without line number; null for legacy/manual records
}

/** A persisted, deduplicated N+1 record */
export interface TodoEntry {
  readonly fingerprint: string;
  readonly query: string;                  // normalized SQL
  readonly locations: readonly LocationRecord[];
  readonly createdAt: string;              // ISO 8601 UTC, set once
}

/** One detected occurrence waiting in the accumulation buffer */
export interface PendingOccurrence {
  readonly callStack: readonly string[];
  readonly testLocation: string | null;
}

/** Raw query text → occurrences, in call order per query */
export type PendingNotifications = ReadonlyMap<string, readonly PendingOccurrence[]>;

/** A (fingerprint, location) pair re-detected during a run */
export interface DetectedLocation {
  readonly fingerprint: string;
  readonly location: string;
}

/** Counts reported by one reconciliation cycle */
export interface FlushResult {
  readonly added: number;
  readonly removed: number;
}

/** User-supplied frame filter; may throw or misbehave, the cleaner copes */
export type LocationFilter = (frames: readonly string[]) => unknown;

/** Host-provided backtrace cleaner, used when no custom filter is configured */
export type BacktraceCleaner = (frames: readonly string[]) => string[];

/** Injectable clock for deterministic time in tests */
export interface Clock {
  now(): Date;
  isoNow(): string;
}

/** Production clock using real wall time */
export const realClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};

/** Diagnostic sink — stderr in production, recorded in tests */
export interface Logger {
  warn(message: string): void;
  info(message: string): void;
}

/** Where operator tasks write their human-readable output */
export interface OutputWriter {
  write(chunk: string): unknown;
}
