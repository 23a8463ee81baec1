export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`${filePath}: ${message}`, options);
    this.name = 'PersistenceError';
  }
}

export class TerminalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
