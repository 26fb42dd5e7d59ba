// Central constants for the N+1 TODO layer.
//
// Split into two categories:
//
//   IDENTITY — feed into fingerprints. Changing any of these rewrites every
//   fingerprint in every existing TODO file; run the migrate task afterwards.
//
//   USER-FACING — defaults for values exposed through n1-todo.config.json and
//   the N1_TODO_* environment variables.

// ─── Identity ──────────────────────────────────────────────────────────────

/** Replaces string and numeric literals in normalized SQL. */
export const QUERY_PLACEHOLDER = '?';

/** Joins cleaned stack frames into one display/location string. */
export const LOCATION_SEPARATOR = ' -> ';

/** Separates the components hashed into a fingerprint. */
export const FINGERPRINT_COMPONENT_SEPARATOR = '|';

/** Hex characters kept from the SHA-256 digest (64 bits). */
export const FINGERPRINT_LENGTH = 16;

// ─── User-facing defaults ──────────────────────────────────────────────────

/** Stack frames kept per location when not configured. */
export const DEFAULT_MAX_LOCATION_FRAMES = 5;

/** TODO file name, resolved against the working directory. */
export const DEFAULT_TODO_FILENAME = '.n1_todo.yaml';

/** Optional settings file, resolved against the working directory. */
export const SETTINGS_FILENAME = 'n1-todo.config.json';

/** Prefix for every diagnostic line written to stderr. */
export const LOG_PREFIX = '[n1-todo]';

/** Values that switch a boolean environment toggle on. */
export const TRUTHY_TOGGLE_VALUES: readonly string[] = ['1', 'true', 'yes'];

/** Values that switch a default-on environment toggle off. */
export const FALSY_TOGGLE_VALUES: readonly string[] = ['0', 'false', 'no'];
