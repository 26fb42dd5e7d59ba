// YAML-backed TODO store — one file, one ordered list of entries
// Lazily loaded on first access; single writer per process (only the reconciler saves).
// No file locking: two processes flushing the same file concurrently is unsupported.

import { promises as fs } from 'fs';
import path from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import type { Clock, DetectedLocation, LocationRecord, TodoEntry } from './types.js';
import { realClock } from './types.js';
import { TodoFileParseError } from './errors.js';

// --- Persisted shape (snake_case on disk, camelCase in memory) ---

const persistedLocationSchema = z.object({
  location: z.string(),
  test_location: z.string().nullable().optional(),
});

/** Current generation has `locations`; the older one a flat `location` string */
const persistedEntrySchema = z.object({
  fingerprint: z.string().min(1),
  query: z.string(),
  locations: z.array(persistedLocationSchema).optional(),
  location: z.string().nullable().optional(),
  created_at: z.string(),
});

const persistedFileSchema = z.array(persistedEntrySchema);

type PersistedEntry = z.infer<typeof persistedEntrySchema>;

function fromPersisted(raw: PersistedEntry): TodoEntry {
  const locations: LocationRecord[] = raw.locations
    ? raw.locations.map(l => ({ location: l.location, testLocation: l.test_location || null }))
    : raw.location != null ? [{ location: raw.location, testLocation: null }] : [];
  return { fingerprint: raw.fingerprint, query: raw.query, locations, createdAt: raw.created_at };
}

function toPersisted(entry: TodoEntry) {
  return {
    fingerprint: entry.fingerprint,
    query: entry.query,
    locations: entry.locations.map(l => ({ location: l.location, test_location: l.testLocation })),
    created_at: entry.createdAt,
  };
}

function detectedKey(fingerprint: string, location: string): string {
  return `${fingerprint}\u0000${location}`;
}

export interface AddEntryInput {
  readonly fingerprint: string;
  readonly query: string;
  readonly location: string | null;
  readonly testLocation?: string | null;
}

export class TodoStore {
  readonly path: string;
  private readonly clock: Clock;
  private entries: Map<string, TodoEntry> | null = null;
  private loading: Promise<Map<string, TodoEntry>> | null = null;

  constructor(filePath: string, options: { clock?: Clock } = {}) {
    this.path = filePath;
    this.clock = options.clock ?? realClock;
  }

  /** All entries in file order */
  async all(): Promise<readonly TodoEntry[]> {
    return Array.from((await this.load()).values());
  }

  async fingerprints(): Promise<string[]> {
    return Array.from((await this.load()).keys());
  }

  async isIgnored(fingerprint: string): Promise<boolean> {
    return (await this.load()).has(fingerprint);
  }

  async findEntry(fingerprint: string): Promise<TodoEntry | undefined> {
    return (await this.load()).get(fingerprint);
  }

  /** Add a location under a fingerprint. Idempotent per (fingerprint, location);
   *  a null location creates the entry with no locations, or adds nothing. */
  async addEntry(input: AddEntryInput): Promise<void> {
    const entries = await this.load();
    const record: LocationRecord | null = input.location === null
      ? null
      : { location: input.location, testLocation: input.testLocation ?? null };

    const existing = entries.get(input.fingerprint);
    if (existing) {
      if (!record || existing.locations.some(l => l.location === record.location)) return;
      entries.set(input.fingerprint, { ...existing, locations: [...existing.locations, record] });
      return;
    }

    entries.set(input.fingerprint, {
      fingerprint: input.fingerprint,
      query: input.query,
      locations: record ? [record] : [],
      createdAt: this.clock.isoNow(),
    });
  }

  /** Serialize every entry. I/O errors propagate untouched — the caller owns rollback. */
  async save(): Promise<void> {
    const entries = await this.load();
    const content = stringify(Array.from(entries.values()).map(toPersisted), { lineWidth: 0 });
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.writeFile(this.path, content, 'utf-8');
  }

  /** Drop all entries in memory; persist with save() */
  clear(): void {
    this.entries = new Map();
    this.loading = null;
  }

  /** Swap in a whole new entry list, in order; persist with save() */
  replaceAll(entries: readonly TodoEntry[]): void {
    this.entries = new Map(entries.map(e => [e.fingerprint, e]));
    this.loading = null;
  }

  /**
   * Prune locations confirmed resolved by a test that ran this cycle.
   *
   * A location is kept when it has no test identity, when its test did not run, or
   * when (fingerprint, location) was detected again. Entries left without locations
   * are dropped. Returns the number of removed locations.
   */
  async filterByTestLocations(
    detected: Iterable<DetectedLocation>,
    executedTests: ReadonlySet<string>,
  ): Promise<number> {
    const entries = await this.load();
    const detectedKeys = new Set<string>();
    for (const d of detected) detectedKeys.add(detectedKey(d.fingerprint, d.location));

    let removed = 0;
    for (const entry of Array.from(entries.values())) {
      const kept = entry.locations.filter(record => {
        if (!record.testLocation) return true;
        if (!executedTests.has(record.testLocation)) return true;
        return detectedKeys.has(detectedKey(entry.fingerprint, record.location));
      });
      removed += entry.locations.length - kept.length;

      if (kept.length === 0 && entry.locations.length > 0) {
        entries.delete(entry.fingerprint);
      } else if (kept.length !== entry.locations.length) {
        entries.set(entry.fingerprint, { ...entry, locations: kept });
      }
    }
    return removed;
  }

  /** Every non-empty test identity recorded across all locations */
  async testLocations(): Promise<Set<string>> {
    const result = new Set<string>();
    for (const entry of (await this.load()).values()) {
      for (const record of entry.locations) {
        if (record.testLocation) result.add(record.testLocation);
      }
    }
    return result;
  }

  // --- Loading ---

  private async load(): Promise<Map<string, TodoEntry>> {
    if (this.entries) return this.entries;
    if (!this.loading) {
      // clear()/replaceAll() during a read win over the file contents
      const loading: Promise<Map<string, TodoEntry>> = this.readFile().then(
        entries => {
          if (this.loading !== loading) return this.entries ?? entries;
          this.entries = entries;
          return entries;
        },
        (error: unknown) => {
          if (this.loading === loading) this.loading = null;
          throw error;
        },
      );
      this.loading = loading;
    }
    return this.loading;
  }

  private async readFile(): Promise<Map<string, TodoEntry>> {
    let content: string;
    try {
      content = await fs.readFile(this.path, 'utf-8');
    } catch (error: unknown) {
      const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      if (isFileNotFound) return new Map();
      throw error;
    }
    if (content.trim().length === 0) return new Map();

    let raw: unknown;
    try {
      raw = parse(content);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TodoFileParseError(this.path, message, { cause: error });
    }
    if (raw === null || raw === undefined) return new Map();

    const parsed = persistedFileSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new TodoFileParseError(this.path, detail, { cause: parsed.error });
    }

    const entries = new Map<string, TodoEntry>();
    for (const item of parsed.data) {
      if (entries.has(item.fingerprint)) {
        throw new TodoFileParseError(this.path, `duplicate fingerprint ${item.fingerprint}`);
      }
      entries.set(item.fingerprint, fromPersisted(item));
    }
    return entries;
  }
}
