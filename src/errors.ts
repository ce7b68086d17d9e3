export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/** Raised by the status probe when a fixed introspection query returns nothing. */
export class MissingRowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingRowError';
  }
}

/** Wraps a failure to open a session, so callers can tell it from a failing statement. */
export class ConnectionFailureError extends Error {
  constructor(cause: unknown) {
    super(errorMessage(cause));
    this.name = 'ConnectionFailureError';
  }
}
