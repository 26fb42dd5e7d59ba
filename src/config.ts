// Configuration for the N+1 TODO layer.
//
// Two halves:
//   - Configuration: the in-process knobs that shape fingerprints (frame limit, frame filter).
//     Validated eagerly in the setters; a bad value never survives until first use.
//   - loadSettings(): where the TODO file lives and the defaults for the knobs above.
//     Priority: n1-todo.config.json → env vars → defaults. Each source degrades to the
//     next with a warning instead of failing startup.

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { LocationFilter, Logger } from './types.js';
import { ConfigurationError } from './errors.js';
import { stderrLogger } from './logger.js';
import {
  DEFAULT_MAX_LOCATION_FRAMES,
  DEFAULT_TODO_FILENAME,
  SETTINGS_FILENAME,
  TRUTHY_TOGGLE_VALUES,
  FALSY_TOGGLE_VALUES,
} from './defaults.js';

const maxLocationFramesSchema = z.number().int().nonnegative().nullable();

export interface ConfigurationOptions {
  /** Frames kept per location; null keeps all. Default: 5. */
  readonly maxLocationFrames?: number | null;
  /** Overrides the host backtrace cleaner when set. */
  readonly locationFilter?: LocationFilter | null;
}

/** Frame-shaping configuration. Mutable by convention only during initialization:
 *  changing it later changes every fingerprint computed afterwards. */
export class Configuration {
  private _maxLocationFrames: number | null = DEFAULT_MAX_LOCATION_FRAMES;
  private _locationFilter: LocationFilter | null = null;

  constructor(options: ConfigurationOptions = {}) {
    if (options.maxLocationFrames !== undefined) this.maxLocationFrames = options.maxLocationFrames;
    if (options.locationFilter !== undefined) this.locationFilter = options.locationFilter;
  }

  get maxLocationFrames(): number | null {
    return this._maxLocationFrames;
  }

  set maxLocationFrames(value: number | null) {
    const parsed = maxLocationFramesSchema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigurationError(`maxLocationFrames must be a non-negative integer or null, got ${String(value)}`);
    }
    this._maxLocationFrames = parsed.data;
  }

  get locationFilter(): LocationFilter | null {
    return this._locationFilter;
  }

  set locationFilter(value: LocationFilter | null) {
    if (value !== null && typeof value !== 'function') {
      throw new ConfigurationError(`locationFilter must be a function or null, got ${typeof value}`);
    }
    this._locationFilter = value;
  }
}

// ─── Settings loading ──────────────────────────────────────────────────────

/** How the settings were loaded — path only exists when source is 'file' */
export type SettingsOrigin =
  | { readonly source: 'file'; readonly path: string }
  | { readonly source: 'env' }
  | { readonly source: 'default' };

export interface Settings {
  readonly todoFilePath: string;
  readonly maxLocationFrames: number | null;
  readonly origin: SettingsOrigin;
}

const settingsFileSchema = z.object({
  todoFile: z.string().min(1).optional(),
  maxLocationFrames: maxLocationFramesSchema.optional(),
});

const KNOWN_SETTINGS_KEYS = new Set<string>(['todoFile', 'maxLocationFrames']);

export interface LoadSettingsOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: Logger;
}

/** Parse N1_TODO_MAX_FRAMES: "none"/"unlimited" → null, integer ≥ 0 → number, else undefined */
export function parseMaxFramesEnv(raw: string | undefined, logger: Logger = stderrLogger): number | null | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (value === 'none' || value === 'unlimited') return null;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    logger.warn(`N1_TODO_MAX_FRAMES must be a non-negative integer or "none": ${raw} — using default ${DEFAULT_MAX_LOCATION_FRAMES}`);
    return undefined;
  }
  return n;
}

function resolveTodoPath(cwd: string, raw: string): string {
  return path.isAbsolute(raw) ? raw : path.join(cwd, raw);
}

/** Load settings with priority: n1-todo.config.json → env vars → defaults */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const logger = options.logger ?? stderrLogger;

  const envTodoFile = env.N1_TODO_FILE;
  const envMaxFrames = parseMaxFramesEnv(env.N1_TODO_MAX_FRAMES, logger);

  // 1. Settings file (highest priority)
  const settingsPath = path.join(cwd, SETTINGS_FILENAME);
  try {
    const raw: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));
    if (raw !== null && typeof raw === 'object') {
      for (const key of Object.keys(raw)) {
        if (!KNOWN_SETTINGS_KEYS.has(key)) {
          logger.warn(`Unknown key "${key}" in ${SETTINGS_FILENAME} — ignored. Valid keys: ${Array.from(KNOWN_SETTINGS_KEYS).join(', ')}`);
        }
      }
    }
    const parsed = settingsFileSchema.safeParse(raw);
    if (parsed.success) {
      const file = parsed.data;
      return {
        todoFilePath: resolveTodoPath(cwd, file.todoFile ?? envTodoFile ?? DEFAULT_TODO_FILENAME),
        maxLocationFrames: file.maxLocationFrames !== undefined
          ? file.maxLocationFrames
          : envMaxFrames !== undefined ? envMaxFrames : DEFAULT_MAX_LOCATION_FRAMES,
        origin: { source: 'file', path: settingsPath },
      };
    }
    logger.warn(`Invalid ${SETTINGS_FILENAME}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  } catch (error: unknown) {
    // ENOENT = no settings file, which is the common case — fall through silently
    const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!isFileNotFound) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to read ${SETTINGS_FILENAME}: ${message}`);
    }
  }

  // 2. Environment
  if (envTodoFile || envMaxFrames !== undefined) {
    return {
      todoFilePath: resolveTodoPath(cwd, envTodoFile || DEFAULT_TODO_FILENAME),
      maxLocationFrames: envMaxFrames !== undefined ? envMaxFrames : DEFAULT_MAX_LOCATION_FRAMES,
      origin: { source: 'env' },
    };
  }

  // 3. Defaults
  return {
    todoFilePath: path.join(cwd, DEFAULT_TODO_FILENAME),
    maxLocationFrames: DEFAULT_MAX_LOCATION_FRAMES,
    origin: { source: 'default' },
  };
}

// ─── Environment toggles ───────────────────────────────────────────────────

/** N1_TODO_UPDATE: off unless explicitly 1/true/yes */
export function isUpdateEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.N1_TODO_UPDATE?.trim().toLowerCase();
  return value !== undefined && TRUTHY_TOGGLE_VALUES.includes(value);
}

/** N1_TODO_CLEAN: on unless explicitly 0/false/no */
export function isCleanEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.N1_TODO_CLEAN?.trim().toLowerCase();
  return value === undefined || !FALSY_TOGGLE_VALUES.includes(value);
}
