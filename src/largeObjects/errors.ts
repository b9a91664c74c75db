export type LargeObjectErrorKind =
  | 'NotFound'
  | 'AlreadyExists'
  | 'ReadOnly'
  | 'InvalidOffset'
  | 'InvalidMode'
  | 'InvalidArgument';

export interface LargeObjectErrorContext {
  operation?: string;
  objectId?: number;
  descriptor?: number;
  cause?: unknown;
}

export class LargeObjectError extends Error {
  readonly kind: LargeObjectErrorKind;
  readonly operation?: string;
  readonly objectId?: number;
  readonly descriptor?: number;

  constructor(kind: LargeObjectErrorKind, message: string, context: LargeObjectErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'LargeObjectError';
    this.kind = kind;
    this.operation = context.operation;
    this.objectId = context.objectId;
    this.descriptor = context.descriptor;
  }
}

export const isLargeObjectError = (error: unknown, kind?: LargeObjectErrorKind): error is LargeObjectError =>
  error instanceof LargeObjectError && (kind === undefined || error.kind === kind);

// SQLSTATE codes raised by the server-side lo_* functions.
const SQLSTATE_KINDS: Record<string, LargeObjectErrorKind> = {
  '23505': 'AlreadyExists',
  '42704': 'NotFound',
  '55000': 'ReadOnly',
  '42501': 'ReadOnly',
  '22023': 'InvalidOffset',
};

export const getPgErrorCode = (error: unknown): string | null => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }
  return typeof error.code === 'string' ? error.code : null;
};

const describeTarget = (context: LargeObjectErrorContext) => {
  if (typeof context.descriptor === 'number') {
    return `descriptor ${context.descriptor}`;
  }
  if (typeof context.objectId === 'number') {
    return `large object ${context.objectId}`;
  }
  return 'large object';
};

/**
 * Translates a database error thrown by one of the `lo_*` functions into a
 * {@link LargeObjectError}. Errors without a known SQLSTATE are returned as-is
 * so the caller can rethrow them unchanged.
 */
export const fromPgError = (error: unknown, context: LargeObjectErrorContext): unknown => {
  const code = getPgErrorCode(error);
  const kind = code ? SQLSTATE_KINDS[code] : undefined;
  if (!kind) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  const operation = context.operation ?? 'operation';
  return new LargeObjectError(kind, `${operation} failed on ${describeTarget(context)}: ${detail}`, {
    ...context,
    cause: error,
  });
};
