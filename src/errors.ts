// Domain errors. Everything else (raw fs errors from save, zod errors at the
// MCP boundary) propagates as-is.

/** Rejected configuration value — thrown at set time, never deferred to first use */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The TODO file exists but is not valid YAML or not a list of entries */
export class TodoFileParseError extends Error {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(`Malformed TODO file ${path}: ${detail}`, options);
    this.name = 'TodoFileParseError';
    this.path = path;
  }
}

/** A reconciliation cycle failed; pending detections were restored before this was thrown */
export class TodoFileError extends Error {
  readonly path: string;
  readonly operation: string;

  constructor(operation: string, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} TODO file ${path}: ${detail}`, { cause });
    this.name = 'TodoFileError';
    this.path = path;
    this.operation = operation;
  }
}
