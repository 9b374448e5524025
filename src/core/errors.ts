export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Raised when a directory or `.gitignore` on the walk cannot be read. Aborts the run. */
export class TraversalError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to read ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'TraversalError';
    this.path = path;
  }
}

/** Raised when the output destination cannot be created or written. */
export class OutputError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cannot write output to ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'OutputError';
    this.path = path;
  }
}
