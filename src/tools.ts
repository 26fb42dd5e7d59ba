// MCP tool definitions and handlers for the operator server.
//
// Handlers take the coordinator explicitly and return tool results; index.ts only wires
// them to the transport. Validation failures and domain errors become isError results.

import { z } from 'zod';
import type { DetectionCoordinator } from './coordinator.js';
import { formatEntryList } from './formatters.js';
import { migrateEntries } from './migrate.js';

export interface ToolResult {
  readonly content: Array<{ type: 'text'; text: string }>;
  readonly isError?: boolean;
}

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function failure(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }], isError: true };
}

const stackProperty = {
  type: 'array',
  items: { type: 'string' },
  description: 'Call stack frames, innermost first. Example: ["src/models/user.ts:10", "src/routes/users.ts:5"]',
};

export const TOOL_DEFINITIONS = [
  {
    name: 'n1_todo_list',
    description: 'List accepted N+1 entries in the TODO file. Optional filter matches query, location or test file (case-insensitive substring).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        filter: { type: 'string', description: 'Substring to match' },
      },
    },
  },
  {
    name: 'n1_todo_check',
    description: 'Compute the fingerprint of a detection and report whether the TODO file already suppresses it.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Raw SQL as detected' },
        stack: stackProperty,
        testLocation: { type: 'string', description: 'Test file that produced the detection, e.g. "test/users.test.ts:12"' },
      },
      required: ['query'],
    },
  },
  {
    name: 'n1_todo_add',
    description: 'Accept an N+1 by hand. Recorded without a test identity, so automatic pruning never removes it.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Raw SQL as detected' },
        stack: stackProperty,
      },
      required: ['query', 'stack'],
    },
  },
  {
    name: 'n1_todo_migrate',
    description: 'Rewrite every fingerprint in the TODO file under the current composition (query + location + test file).',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

const listArgs = z.object({ filter: z.string().optional() });
const checkArgs = z.object({
  query: z.string(),
  stack: z.array(z.string()).default([]),
  testLocation: z.string().optional(),
});
const addArgs = z.object({
  query: z.string().min(1),
  stack: z.array(z.string()).min(1),
});

export async function handleToolCall(
  coordinator: DetectionCoordinator,
  name: string,
  args: Record<string, unknown> | undefined,
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'n1_todo_list': {
        const { filter } = listArgs.parse(args ?? {});
        const store = coordinator.openStore();
        let entries = await store.all();
        if (filter) {
          const needle = filter.toLowerCase();
          entries = entries.filter(e =>
            e.query.toLowerCase().includes(needle)
            || e.locations.some(l => l.location.toLowerCase().includes(needle)
              || (l.testLocation?.toLowerCase().includes(needle) ?? false)));
        }
        return text(formatEntryList(entries, store.path));
      }

      case 'n1_todo_check': {
        const { query, stack, testLocation } = checkArgs.parse(args ?? {});
        const identity = coordinator.fingerprinter.identify(query, stack, testLocation ?? null);
        const suppressed = await coordinator.openStore().isIgnored(identity.fingerprint);
        return text(JSON.stringify({ ...identity, suppressed }, null, 2));
      }

      case 'n1_todo_add': {
        const { query, stack } = addArgs.parse(args ?? {});
        coordinator.addPendingNotification(query, [stack], null);
        const report = await coordinator.flush({ clean: false });
        return text(report.added > 0
          ? `Added 1 entry to ${report.path} (${report.total} total)`
          : `Already accepted in ${report.path}`);
      }

      case 'n1_todo_migrate': {
        const store = coordinator.openStore();
        const result = await migrateEntries(store);
        await store.save();
        return text(`Migrated ${store.path}: rewrote ${result.rewritten} fingerprints, ${result.entries} entries`);
      }

      default:
        return failure(`Unknown tool: ${name}`);
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(`Error: ${message}`);
  }
}
