/**
 * Base class for structured errors. Subclasses add the fields a caller needs to
 * render a precise diagnostic; `toJSON` keeps them intact across log lines and
 * wire boundaries.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.context = options?.context;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
