// Diagnostics boundary. stdout belongs to MCP JSON-RPC and task output, so
// every diagnostic line goes to stderr with a fixed prefix.

import type { Logger } from './types.js';
import { LOG_PREFIX } from './defaults.js';

/** Production logger writing one prefixed line per message to stderr */
export const stderrLogger: Logger = {
  warn(message: string): void {
    process.stderr.write(`${LOG_PREFIX} WARN: ${message}\n`);
  },
  info(message: string): void {
    process.stderr.write(`${LOG_PREFIX} ${message}\n`);
  },
};

/** Logger that keeps messages in memory — for tests */
export interface RecordingLogger extends Logger {
  readonly warnings: string[];
  readonly infos: string[];
}

export function recordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const infos: string[] = [];
  return {
    warnings,
    infos,
    warn: (message: string) => { warnings.push(message); },
    info: (message: string) => { infos.push(message); },
  };
}
