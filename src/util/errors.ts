export class HueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A named light or room is absent from the latest bridge snapshot. */
export class NotFoundError extends HueError {}

/** Transport failure, non-2xx reply, or an error item returned by the bridge. */
export class BackendError extends HueError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** The bridge answered with JSON of an unexpected shape. */
export class ProtocolError extends HueError {}

export class InvalidParameterError extends HueError {}

/** Missing or invalid environment configuration. Fatal at startup. */
export class ConfigError extends HueError {}

/** Failures a long-running effect should ride out rather than die on. */
export function isTransient(err: unknown): boolean {
  return err instanceof BackendError || err instanceof ProtocolError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
