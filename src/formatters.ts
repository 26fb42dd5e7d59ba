// Human-readable output for flush summaries, task output and MCP tool responses.
//
// Pure functions — no side effects, no state.

import type { FlushResult, TodoEntry } from './types.js';

function plural(n: number, one: string, many: string): string {
  return n === 1 ? one : many;
}

/** One-line summary of a flush that changed something */
export function formatFlushSummary(result: FlushResult, todoPath: string): string {
  const parts: string[] = [];
  if (result.added > 0) {
    parts.push(`Added ${result.added} new N+1 ${plural(result.added, 'entry', 'entries')}`);
  }
  if (result.removed > 0) {
    parts.push(`${parts.length > 0 ? 'removed' : 'Removed'} ${result.removed} resolved ${plural(result.removed, 'location', 'locations')}`);
  }
  return `${parts.join(', ')} in ${todoPath}`;
}

/** Numbered listing of every entry, or a one-liner for an empty file */
export function formatEntryList(entries: readonly TodoEntry[], todoPath: string): string {
  if (entries.length === 0) return `No entries in ${todoPath}`;

  const lines: string[] = [`Entries in ${todoPath}:`, ''];
  entries.forEach((entry, index) => {
    lines.push(`${index + 1}. ${entry.query}`);
    if (entry.locations.length === 0) {
      lines.push('   Location: (none)');
    }
    for (const record of entry.locations) {
      const test = record.testLocation ? ` [test: ${record.testLocation}]` : '';
      lines.push(`   Location: ${record.location}${test}`);
    }
    lines.push(`   Fingerprint: ${entry.fingerprint}`);
    lines.push('');
  });
  return lines.join('\n');
}
