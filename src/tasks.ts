// Operator tasks: the primitives a CLI, a test-runner hook or the MCP server call.
// Each writes human-readable lines to the given output and returns what it did.

import type { OutputWriter } from './types.js';
import type { DetectionCoordinator } from './coordinator.js';
import type { FlushReport } from './reconciler.js';
import { isCleanEnabled } from './config.js';
import { formatEntryList } from './formatters.js';
import { migrateEntries, type MigrationResult } from './migrate.js';

export interface TaskOptions {
  readonly output?: OutputWriter;
}

function writeLine(output: OutputWriter, line: string): void {
  output.write(`${line}\n`);
}

/** Rebuild the TODO file from scratch out of the current pending detections */
export async function generate(coordinator: DetectionCoordinator, options: TaskOptions = {}): Promise<FlushReport> {
  const output = options.output ?? process.stdout;
  const report = await coordinator.flush({ reset: true, clean: false, summary: false });
  writeLine(output, `Generated ${report.path} with ${report.total} ${report.total === 1 ? 'entry' : 'entries'}`);
  return report;
}

/** Add pending detections; prune resolved ones unless N1_TODO_CLEAN disables it */
export async function update(
  coordinator: DetectionCoordinator,
  options: TaskOptions & { readonly clean?: boolean } = {},
): Promise<FlushReport> {
  const output = options.output ?? process.stdout;
  const report = await coordinator.flush({ clean: options.clean ?? isCleanEnabled(), summary: false });
  if (report.added > 0 || report.removed > 0) {
    writeLine(output, `Updated ${report.path}: added ${report.added}, removed ${report.removed}, ${report.total} total entries`);
  }
  return report;
}

/** Prune only. Pending detections count as evidence, are not recorded, and stay pending */
export async function clean(coordinator: DetectionCoordinator, options: TaskOptions = {}): Promise<FlushReport> {
  const output = options.output ?? process.stdout;
  const report = await coordinator.flush({ clean: true, add: false, summary: false });
  if (report.removed > 0) {
    writeLine(output, `Cleaned ${report.path}: removed ${report.removed} locations, ${report.total} remaining`);
  }
  return report;
}

export async function list(coordinator: DetectionCoordinator, options: TaskOptions = {}): Promise<void> {
  const output = options.output ?? process.stdout;
  const store = coordinator.openStore();
  writeLine(output, formatEntryList(await store.all(), store.path));
}

/** Rewrite every fingerprint under the current composition and save */
export async function migrate(coordinator: DetectionCoordinator, options: TaskOptions = {}): Promise<MigrationResult> {
  const output = options.output ?? process.stdout;
  const store = coordinator.openStore();
  const result = await migrateEntries(store);
  await store.save();
  writeLine(output, `Migrated ${store.path}: rewrote ${result.rewritten} fingerprints, ${result.entries} entries`);
  return result;
}
