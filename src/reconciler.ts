// One flush cycle: swap the buffer out, reconcile against the TODO file, save.
//
//   1. swap      — buffer contents move to a local snapshot (the only exclusive step)
//   2. open      — fresh TodoStore over the configured path
//   3. prune     — when clean: drop locations whose test ran and did not re-detect them
//   4. add       — record every pending occurrence (dedup is the store's job)
//   5. save
//   6. report    — counts returned; one summary line when anything changed
//   7. keep      — a prune-only flush hands the snapshot back to the buffer
//   8. rollback  — on failure in 2–5 the snapshot is merged back into the buffer
//
// Single flusher: two overlapping flush() calls on one file would race on the write.
// Callers run it from one end-of-run hook.

import type { DetectedLocation, FlushResult, Logger, PendingNotifications } from './types.js';
import type { AccumulationBuffer } from './buffer.js';
import type { Fingerprinter, Identity } from './fingerprint.js';
import type { TodoStore } from './store.js';
import { TodoFileError, TodoFileParseError } from './errors.js';
import { formatFlushSummary } from './formatters.js';

export interface FlushOptions {
  /** Prune resolved locations. Default: true. */
  readonly clean?: boolean;
  /** Record pending occurrences. Default: true; false makes a prune-only flush, which
   *  uses pending occurrences as evidence and hands them back to the buffer afterwards. */
  readonly add?: boolean;
  /** Start from an empty store instead of the file contents (regenerate). Default: false. */
  readonly reset?: boolean;
  /** Log the one-line summary when counts changed. Default: true; off when the caller prints its own. */
  readonly summary?: boolean;
}

export interface FlushReport extends FlushResult {
  readonly path: string;
  readonly total: number;
}

export interface ReconcilerDeps {
  readonly buffer: AccumulationBuffer;
  readonly fingerprinter: Fingerprinter;
  readonly openStore: () => TodoStore;
  readonly logger: Logger;
}

export class Reconciler {
  private readonly deps: ReconcilerDeps;

  constructor(deps: ReconcilerDeps) {
    this.deps = deps;
  }

  async flush(options: FlushOptions = {}): Promise<FlushReport> {
    const { clean = true, add = true, reset = false, summary = true } = options;
    const { buffer, logger } = this.deps;

    const snapshot = buffer.takeSnapshot();
    const store = this.deps.openStore();

    try {
      const identities = this.identify(snapshot.notifications);
      if (reset) store.clear();

      let removed = 0;
      if (clean && !reset) {
        const detected: DetectedLocation[] = identities.map(i => ({ fingerprint: i.fingerprint, location: i.location }));
        removed = await store.filterByTestLocations(detected, snapshot.executedTests);
      }

      let added = 0;
      if (add) {
        const before = (await store.all()).length;
        for (const identity of identities) {
          await store.addEntry(identity);
        }
        added = (await store.all()).length - before;
      }

      await store.save();

      const total = (await store.all()).length;
      if (summary && (added > 0 || removed > 0)) {
        logger.info(formatFlushSummary({ added, removed }, store.path));
      }
      // Nothing was recorded; keep the detections for a later adding flush
      if (!add) buffer.restore(snapshot);
      return { added, removed, total, path: store.path };
    } catch (error: unknown) {
      buffer.restore(snapshot);
      if (error instanceof TodoFileParseError) throw error;
      throw new TodoFileError('update', store.path, error);
    }
  }

  private identify(notifications: PendingNotifications): Identity[] {
    const identities: Identity[] = [];
    for (const [query, occurrences] of notifications) {
      for (const occurrence of occurrences) {
        identities.push(this.deps.fingerprinter.identify(query, occurrence.callStack, occurrence.testLocation));
      }
    }
    return identities;
  }
}
