// Detector boundary: the two notification shapes an N+1 detector hands over.
//
//   grouped       key = similar raw queries (first one wins), value = one flat call stack
//   per-location  key = one raw query, value = call stacks, one per occurrence
//
// Both collapse to Map<query, stacks[]>. Anything else is rejected here, before it
// can reach the buffer.

import { z } from 'zod';
import type { TodoStore } from './store.js';
import type { Fingerprinter } from './fingerprint.js';

const stackSchema = z.array(z.string());
const stacksSchema = z.array(stackSchema);
const querySchema = z.array(z.string()).min(1);

/** Occurrences per raw query, in detector order */
export type Notifications = Map<string, string[][]>;

/** What a detector may pass: a Map (either key shape) or a plain object keyed by query */
export type RawNotifications =
  | Iterable<readonly [unknown, unknown]>
  | Readonly<Record<string, unknown>>;

function appendStacks(target: Notifications, query: string, stacks: string[][]): void {
  const list = target.get(query) ?? [];
  list.push(...stacks);
  target.set(query, list);
}

function normalizePair(target: Notifications, key: unknown, value: unknown): void {
  if (typeof key === 'string') {
    const stacks = stacksSchema.safeParse(value);
    if (stacks.success) {
      appendStacks(target, key, stacks.data);
      return;
    }
    // A lone flat stack under a string key is one occurrence
    const single = stackSchema.safeParse(value);
    if (single.success) {
      appendStacks(target, key, [single.data]);
      return;
    }
    throw new TypeError(`Notification for query "${key}" is not a list of call stacks`);
  }

  const queries = querySchema.safeParse(key);
  if (!queries.success) {
    throw new TypeError('Notification key must be a query string or a non-empty list of query strings');
  }
  const stack = stackSchema.safeParse(value);
  if (!stack.success) {
    throw new TypeError(`Notification for query "${queries.data[0]}" is not a call stack`);
  }
  appendStacks(target, queries.data[0], [stack.data]);
}

function isPairIterable(raw: RawNotifications): raw is Iterable<readonly [unknown, unknown]> {
  return raw instanceof Map || Array.isArray(raw);
}

/** Collapse either detector shape into per-location notifications */
export function normalizeNotifications(raw: RawNotifications): Notifications {
  const result: Notifications = new Map();
  if (isPairIterable(raw)) {
    for (const [key, value] of raw) normalizePair(result, key, value);
  } else {
    for (const [key, value] of Object.entries(raw)) normalizePair(result, key, value);
  }
  return result;
}

/**
 * Drop occurrences already recorded in the TODO file.
 * Queries left with no occurrence are removed from the result.
 */
export async function filterNotifications(
  notifications: Notifications,
  store: TodoStore,
  fingerprinter: Fingerprinter,
  testLocation: string | null,
): Promise<Notifications> {
  const result: Notifications = new Map();
  for (const [query, stacks] of notifications) {
    const kept: string[][] = [];
    for (const stack of stacks) {
      const fingerprint = fingerprinter.fingerprint(query, stack, testLocation);
      if (!(await store.isIgnored(fingerprint))) kept.push(stack);
    }
    if (kept.length > 0) result.set(query, kept);
  }
  return result;
}
