// DetectionCoordinator: the one object an embedding application holds per process.
//
// Owns the accumulation buffer, the executed-test registry and the frame configuration,
// and is passed explicitly to the detector callback and to the end-of-run flush.
// Nothing here is a module-level singleton.

import type { BacktraceCleaner, Clock, Logger, PendingOccurrence } from './types.js';
import { realClock } from './types.js';
import { Configuration, loadSettings, type LoadSettingsOptions } from './config.js';
import { AccumulationBuffer } from './buffer.js';
import { LocationCleaner } from './location-cleaner.js';
import { Fingerprinter } from './fingerprint.js';
import { TodoStore } from './store.js';
import { Reconciler, type FlushOptions, type FlushReport } from './reconciler.js';
import { TestContext } from './test-context.js';
import { normalizeNotifications, filterNotifications, type Notifications, type RawNotifications } from './ingest.js';
import { stderrLogger } from './logger.js';

export interface DetectionCoordinatorOptions {
  readonly todoFilePath: string;
  readonly configuration?: Configuration;
  readonly backtraceCleaner?: BacktraceCleaner;
  readonly testContext?: TestContext;
  readonly logger?: Logger;
  readonly clock?: Clock;
}

export class DetectionCoordinator {
  readonly todoFilePath: string;
  readonly configuration: Configuration;
  readonly testContext: TestContext;
  readonly fingerprinter: Fingerprinter;
  readonly logger: Logger;
  private readonly clock: Clock;
  private readonly buffer = new AccumulationBuffer();
  private readonly reconciler: Reconciler;
  private readStore: TodoStore | null = null;

  constructor(options: DetectionCoordinatorOptions) {
    this.todoFilePath = options.todoFilePath;
    this.configuration = options.configuration ?? new Configuration();
    this.testContext = options.testContext ?? new TestContext();
    this.logger = options.logger ?? stderrLogger;
    this.clock = options.clock ?? realClock;

    const cleaner = new LocationCleaner(this.configuration, {
      backtraceCleaner: options.backtraceCleaner,
      logger: this.logger,
    });
    this.fingerprinter = new Fingerprinter(cleaner);
    this.reconciler = new Reconciler({
      buffer: this.buffer,
      fingerprinter: this.fingerprinter,
      openStore: () => this.openStore(),
      logger: this.logger,
    });
  }

  /** Build a coordinator from n1-todo.config.json / N1_TODO_* / defaults */
  static fromSettings(
    options: LoadSettingsOptions & Omit<DetectionCoordinatorOptions, 'todoFilePath'> = {},
  ): DetectionCoordinator {
    const settings = loadSettings(options);
    const configuration = options.configuration
      ?? new Configuration({ maxLocationFrames: settings.maxLocationFrames });
    return new DetectionCoordinator({ ...options, configuration, todoFilePath: settings.todoFilePath });
  }

  /** Fresh store over the TODO file; reads on first access */
  openStore(): TodoStore {
    return new TodoStore(this.todoFilePath, { clock: this.clock });
  }

  // --- Accumulation ---

  /** Record one occurrence per call stack. Without an explicit test location the current
   *  test is taken from the test context; pass null to record none. */
  addPendingNotification(
    query: string,
    callStacks: readonly (readonly string[])[],
    testLocation?: string | null,
  ): void {
    const test = testLocation === undefined ? this.testContext.current() : testLocation;
    this.buffer.add(query, callStacks, test);
  }

  pendingNotifications(): Map<string, PendingOccurrence[]> {
    return this.buffer.notifications();
  }

  clearPendingNotifications(): void {
    this.buffer.clearNotifications();
  }

  registerExecutedTest(testLocation: string | null | undefined): void {
    this.buffer.registerExecutedTest(testLocation);
  }

  executedTestLocations(): Set<string> {
    return this.buffer.executedTests();
  }

  clearExecutedTestLocations(): void {
    this.buffer.clearExecutedTests();
  }

  // --- Detector callback ---

  /**
   * Register with the upstream detector as its finish callback.
   * Records every occurrence for the next flush, then returns only the ones not yet
   * accepted in the TODO file.
   */
  async onDetection(raw: RawNotifications): Promise<Notifications> {
    const notifications = normalizeNotifications(raw);
    const testLocation = this.testContext.current();
    for (const [query, stacks] of notifications) {
      this.buffer.add(query, stacks, testLocation);
    }
    if (!this.readStore) this.readStore = this.openStore();
    return filterNotifications(notifications, this.readStore, this.fingerprinter, testLocation);
  }

  // --- Reconciliation ---

  async flush(options: FlushOptions = {}): Promise<FlushReport> {
    const report = await this.reconciler.flush(options);
    // The file changed under the suppression store; re-read it on next detection
    this.readStore = null;
    return report;
  }
}
