// Fingerprints: short, stable identities for detected N+1 occurrences.
//
// One generation only: sha256(normalized query | cleaned joined stack | test file)[0..16].
// Fingerprints follow the active Configuration — changing the frame limit or filter
// changes the fingerprint of every stack the change affects. Files written under an
// older composition are rewritten once with migrateEntries() (see migrate.ts).

import crypto from 'crypto';
import { normalizeQuery, normalizeTestLocation } from './normalize.js';
import type { LocationCleaner } from './location-cleaner.js';
import {
  LOCATION_SEPARATOR,
  FINGERPRINT_COMPONENT_SEPARATOR,
  FINGERPRINT_LENGTH,
} from './defaults.js';

/** Hash already-canonical components. Exposed for the migrator, which works on stored
 *  locations that must not be cleaned a second time. */
export function hashComponents(normalizedQuery: string, location: string, testLocation: string | null): string {
  const content = [normalizedQuery, location, testLocation ?? ''].join(FINGERPRINT_COMPONENT_SEPARATOR);
  return crypto.createHash('sha256').update(content).digest('hex').substring(0, FINGERPRINT_LENGTH);
}

/** Join cleaned frames into the persisted location string */
export function joinLocation(frames: readonly string[]): string {
  return frames.join(LOCATION_SEPARATOR);
}

/** Everything derived from one occurrence — what gets hashed and what gets stored */
export interface Identity {
  readonly fingerprint: string;
  readonly query: string;
  readonly location: string;
  readonly testLocation: string | null;
}

export class Fingerprinter {
  private readonly cleaner: LocationCleaner;

  constructor(cleaner: LocationCleaner) {
    this.cleaner = cleaner;
  }

  /** Derive the normalized query, cleaned location and fingerprint of one occurrence */
  identify(query: string, callStack: readonly string[] = [], testLocation: string | null = null): Identity {
    const normalizedQuery = normalizeQuery(query);
    const location = joinLocation(this.cleaner.clean(callStack));
    const normalizedTest = normalizeTestLocation(testLocation);
    return {
      fingerprint: hashComponents(normalizedQuery, location, normalizedTest),
      query: normalizedQuery,
      location,
      testLocation: normalizedTest,
    };
  }

  fingerprint(query: string, callStack: readonly string[] = [], testLocation: string | null = null): string {
    return this.identify(query, callStack, testLocation).fingerprint;
  }
}
