// Current-test identity, threaded explicitly.
//
// Test-runner adapters either wrap each test body in run(), which survives awaits via
// AsyncLocalStorage, or call enter()/exit() from before/after hooks. Stack sniffing is
// only a fallback for callers that set neither.

import { AsyncLocalStorage } from 'async_hooks';
import path from 'path';
import { normalizeTestLocation } from './normalize.js';

/** A file whose name marks it as a test: *.test.*, *.spec.* */
const TEST_FILE_NAME = /\.(?:test|spec)\.[cm]?[jt]sx?(?::\d+){0,2}$/;

/** Any file under test/, tests/, spec/ or __tests__/ (helpers included) */
const TEST_DIRECTORY = /(?:^|[\\/])(?:test|tests|spec|__tests__)[\\/]/;

/** Pull the file part out of one V8 stack line: `    at fn (file:///x/y.test.ts:3:9)` → `file:///x/y.test.ts:3:9` */
function frameLocation(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('at ')) return null;
  const paren = trimmed.match(/\((.+)\)$/);
  const location = paren ? paren[1] : trimmed.slice(3);
  return location.length > 0 ? location : null;
}

/** Project-relative, forward-slashed file identity; paths outside cwd stay absolute */
function toProjectPath(location: string, cwd: string): string | null {
  const file = normalizeTestLocation(location.replace(/^file:\/\//, ''));
  if (file === null || !path.isAbsolute(file)) return file;
  const relative = path.relative(cwd, file);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return file;
  return relative.split(path.sep).join('/');
}

/**
 * Test file of a V8 stack string, relative to cwd; null when there is none.
 *
 * A frame named like a test wins over any frame that is only under a test directory,
 * so a query issued from a shared helper is charged to the test that called it. With
 * directory matches only, the outermost one is taken.
 */
export function detectTestLocationFromStack(stack: string | undefined, cwd: string = process.cwd()): string | null {
  if (!stack) return null;
  let outermostInTestDirectory: string | null = null;
  for (const line of stack.split('\n')) {
    const location = frameLocation(line);
    if (!location || location.startsWith('node:')) continue;
    if (location.includes('/node_modules/')) continue;
    if (TEST_FILE_NAME.test(location)) return toProjectPath(location, cwd);
    if (TEST_DIRECTORY.test(location)) outermostInTestDirectory = location;
  }
  return outermostInTestDirectory === null ? null : toProjectPath(outermostInTestDirectory, cwd);
}

export class TestContext {
  private readonly storage = new AsyncLocalStorage<string | null>();
  private fallback: string | null = null;
  private readonly sniffStack: boolean;
  private readonly cwd: string;

  /** Sniffed paths are reported relative to cwd */
  constructor(options: { sniffStack?: boolean; cwd?: string } = {}) {
    this.sniffStack = options.sniffStack ?? true;
    this.cwd = options.cwd ?? process.cwd();
  }

  /** Run fn with testLocation as the current test, across awaits */
  run<T>(testLocation: string, fn: () => T): T {
    return this.storage.run(normalizeTestLocation(testLocation), fn);
  }

  /** Set the current test for hook-based adapters; cleared by exit() */
  enter(testLocation: string): void {
    this.fallback = normalizeTestLocation(testLocation);
  }

  exit(): void {
    this.fallback = null;
  }

  /** Explicit context first, then the hook-set value, then the stack */
  current(): string | null {
    const scoped = this.storage.getStore();
    if (scoped !== undefined) return scoped;
    if (this.fallback !== null) return this.fallback;
    if (!this.sniffStack) return null;
    return detectTestLocationFromStack(new Error().stack, this.cwd);
  }
}
