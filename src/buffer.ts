// In-flight detections, collected before a batched reconciliation.
//
// Every operation is synchronous, so each one runs to completion on the event loop
// before any other caller can observe the buffer: the loop is the mutex, and no
// critical section ever spans an await or any I/O. Worker threads each own their own
// buffer; merge them through takeSnapshot()/restore() on the main thread.

import type { PendingNotifications, PendingOccurrence } from './types.js';
import { normalizeTestLocation } from './normalize.js';

/** Everything swapped out of the buffer by one flush */
export interface BufferSnapshot {
  readonly notifications: PendingNotifications;
  readonly executedTests: ReadonlySet<string>;
}

function copyNotifications(source: PendingNotifications): Map<string, PendingOccurrence[]> {
  const copy = new Map<string, PendingOccurrence[]>();
  for (const [query, occurrences] of source) {
    copy.set(query, occurrences.map(o => ({ callStack: [...o.callStack], testLocation: o.testLocation })));
  }
  return copy;
}

export class AccumulationBuffer {
  private pending = new Map<string, PendingOccurrence[]>();
  private executed = new Set<string>();

  /** Append one occurrence per call stack under the raw query text */
  add(query: string, callStacks: readonly (readonly string[])[], testLocation: string | null): void {
    const list = this.pending.get(query) ?? [];
    for (const stack of callStacks) {
      list.push({ callStack: [...stack], testLocation });
    }
    this.pending.set(query, list);
  }

  /** Deep copy; mutating it never reaches the buffer */
  notifications(): Map<string, PendingOccurrence[]> {
    return copyNotifications(this.pending);
  }

  clearNotifications(): void {
    this.pending = new Map();
  }

  /** Record that a test ran, whether or not it detected anything. Null/empty is ignored. */
  registerExecutedTest(testLocation: string | null | undefined): void {
    const normalized = normalizeTestLocation(testLocation);
    if (normalized !== null) this.executed.add(normalized);
  }

  executedTests(): Set<string> {
    return new Set(this.executed);
  }

  clearExecutedTests(): void {
    this.executed = new Set();
  }

  /** Swap both containers for fresh ones and hand back the old contents */
  takeSnapshot(): BufferSnapshot {
    const snapshot: BufferSnapshot = { notifications: this.pending, executedTests: this.executed };
    this.pending = new Map();
    this.executed = new Set();
    return snapshot;
  }

  /** Merge a snapshot back after a failed flush. Nothing recorded since the swap is
   *  overwritten; restored occurrences go ahead of it to keep per-query call order. */
  restore(snapshot: BufferSnapshot): void {
    const merged = copyNotifications(snapshot.notifications);
    for (const [query, occurrences] of this.pending) {
      const list = merged.get(query) ?? [];
      list.push(...occurrences);
      merged.set(query, list);
    }
    this.pending = merged;
    for (const test of snapshot.executedTests) this.executed.add(test);
  }

  get isEmpty(): boolean {
    return this.pending.size === 0 && this.executed.size === 0;
  }
}
