// Public API of n1-todo.

export type {
  TodoEntry, LocationRecord, PendingOccurrence, PendingNotifications, DetectedLocation,
  FlushResult, LocationFilter, BacktraceCleaner, Clock, Logger, OutputWriter,
} from './types.js';
export { realClock } from './types.js';
export { ConfigurationError, TodoFileError, TodoFileParseError } from './errors.js';
export { stderrLogger, recordingLogger, type RecordingLogger } from './logger.js';
export { normalizeQuery, normalizeTestLocation } from './normalize.js';
export {
  Configuration, loadSettings, isUpdateEnabled, isCleanEnabled,
  type ConfigurationOptions, type Settings, type SettingsOrigin, type LoadSettingsOptions,
} from './config.js';
export { LocationCleaner, type LocationCleanerOptions } from './location-cleaner.js';
export { Fingerprinter, hashComponents, joinLocation, type Identity } from './fingerprint.js';
export { AccumulationBuffer, type BufferSnapshot } from './buffer.js';
export { TodoStore, type AddEntryInput } from './store.js';
export { Reconciler, type FlushOptions, type FlushReport } from './reconciler.js';
export { TestContext, detectTestLocationFromStack } from './test-context.js';
export { normalizeNotifications, filterNotifications, type Notifications, type RawNotifications } from './ingest.js';
export { DetectionCoordinator, type DetectionCoordinatorOptions } from './coordinator.js';
export { migrateEntries, type MigrationResult } from './migrate.js';
export { generate, update, clean, list, migrate, type TaskOptions } from './tasks.js';
