// One-time converter from older fingerprint compositions (query only, query + location)
// to the current one (query + location + test file).
//
// Stored locations are already cleaned, so they are hashed as-is: re-running the
// frame filter or limit here would change them a second time.

import type { LocationRecord, TodoEntry } from './types.js';
import type { TodoStore } from './store.js';
import { hashComponents } from './fingerprint.js';
import { normalizeQuery, normalizeTestLocation } from './normalize.js';

export interface MigrationResult {
  /** Location records whose fingerprint changed */
  readonly rewritten: number;
  /** Entries after regrouping */
  readonly entries: number;
}

/** Re-key every location of the store under the current fingerprint composition.
 *  Records that now share a fingerprint merge into one entry, keeping the earliest
 *  createdAt. The caller saves. */
export async function migrateEntries(store: TodoStore): Promise<MigrationResult> {
  const regrouped = new Map<string, TodoEntry>();
  let rewritten = 0;

  const place = (fingerprint: string, query: string, createdAt: string, record: LocationRecord | null): void => {
    const existing = regrouped.get(fingerprint);
    if (!existing) {
      regrouped.set(fingerprint, { fingerprint, query, createdAt, locations: record ? [record] : [] });
      return;
    }
    const locations = record && !existing.locations.some(l => l.location === record.location)
      ? [...existing.locations, record]
      : existing.locations;
    regrouped.set(fingerprint, {
      ...existing,
      locations,
      createdAt: createdAt < existing.createdAt ? createdAt : existing.createdAt,
    });
  };

  for (const entry of await store.all()) {
    const query = normalizeQuery(entry.query);
    if (entry.locations.length === 0) {
      const fingerprint = hashComponents(query, '', null);
      if (fingerprint !== entry.fingerprint) rewritten++;
      place(fingerprint, query, entry.createdAt, null);
      continue;
    }
    for (const record of entry.locations) {
      const testLocation = normalizeTestLocation(record.testLocation);
      const fingerprint = hashComponents(query, record.location, testLocation);
      if (fingerprint !== entry.fingerprint) rewritten++;
      place(fingerprint, query, entry.createdAt, { location: record.location, testLocation });
    }
  }

  store.replaceAll(Array.from(regrouped.values()));
  return { rewritten, entries: regrouped.size };
}
