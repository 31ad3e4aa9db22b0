import { AppError } from './AppError';

/**
 * Canonical Mongo operation names performed by the catalog.
 * Open-ended so callers can name their own composite operations.
 */
export type MongoOperation =
  | 'connect'
  | 'getDb'
  | 'getCollection'
  | 'listCollections'
  | 'find'
  | 'findOne'
  | 'countDocuments'
  | 'insertOne'
  | 'deleteOne'
  | (string & {});

/**
 * Lightweight, structured context attached to Mongo errors.
 */
export interface MongoErrorContext {
  /** Logical operation being attempted (e.g., "products.list"). */
  readonly operation: MongoOperation;
  readonly dbName?: string;
  readonly collection?: string;
  /**
   * Sanitized arguments preview. Keep this minimal to avoid leaking payloads.
   */
  readonly argsPreview?: Readonly<Record<string, unknown>>;
  /** Driver error code (e.g., from MongoServerError.code). */
  readonly driverCode?: number | string;
}

/**
 * A failure during a MongoDB action.
 * Wraps the original driver error (if any) and carries safe, structured context.
 */
export class MongoActionError extends AppError {
  public readonly name = 'MongoActionError' as const;
  public readonly context: Readonly<MongoErrorContext>;

  constructor(message: string, context: MongoErrorContext, cause?: Error) {
    super(message, 'MONGO_ACTION_FAILED', cause);
    this.context = Object.freeze({ ...context });
  }

  /** Human-readable summary for logs. */
  public summary(): string {
    const parts: string[] = [
      `op=${this.context.operation}`,
      this.context.dbName ? `db=${this.context.dbName}` : undefined,
      this.context.collection ? `coll=${this.context.collection}` : undefined,
      this.context.driverCode !== undefined
        ? `driverCode=${String(this.context.driverCode)}`
        : undefined,
    ].filter((p): p is string => p !== undefined);
    return `Mongo action failed: ${parts.join(' ')}`;
  }

  /** JSON-safe representation (e.g., for structured logs). */
  public toJSON(): {
    name: string;
    message: string;
    context: MongoErrorContext;
    cause?: { name: string; message: string };
  } {
    const c = this.cause;
    return {
      name: this.name,
      message: this.message,
      context: this.context,
      cause: c instanceof Error ? { name: c.name, message: c.message } : undefined,
    };
  }

  /**
   * Wrap a thrown error with consistent context.
   * An existing MongoActionError is returned as-is.
   */
  public static wrap(
    err: unknown,
    context: MongoErrorContext,
    fallbackMessage = 'Mongo action failed',
  ): MongoActionError {
    if (err instanceof MongoActionError) {
      return err;
    }
    const { message, driverCode } = extractDriverDetails(err);
    return new MongoActionError(
      message ?? fallbackMessage,
      { ...context, driverCode },
      err instanceof Error ? err : undefined,
    );
  }
}

/**
 * Pull a message/code out of driver errors (MongoServerError, MongoNetworkError, ...).
 */
function extractDriverDetails(err: unknown): {
  message?: string;
  driverCode?: number | string;
} {
  if (err instanceof Error) {
    const code: unknown = 'code' in err ? err.code : undefined;
    return {
      message: err.message.length > 0 ? err.message : undefined,
      driverCode:
        typeof code === 'number' || typeof code === 'string' ? code : undefined,
    };
  }
  return {};
}
