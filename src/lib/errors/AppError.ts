/**
 * Base class for errors raised by catalog code.
 * `code` is stable and machine-readable; `name` follows the subclass.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly cause?: unknown;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.cause = cause;
    Error.captureStackTrace?.(this, new.target);
  }
}
