// packages/core/src/errors.ts

export type ErrorCode =
  | 'FB_UNRECOGNIZED_NATIVE_TYPE'
  | 'FB_UNSUPPORTED_OPERATION'
  | 'FB_DTYPE_MISMATCH'
  | 'FB_UNKNOWN_DTYPE'
  | 'FB_COLUMN_NOT_FOUND'
  | 'FB_INVALID_OPERATION'
  | 'FB_NATIVE_ENGINE';

export class FrameBridgeError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UnrecognizedNativeTypeError extends FrameBridgeError {
  constructor(readonly typeName: string) {
    super('FB_UNRECOGNIZED_NATIVE_TYPE', `Unsupported native object type: ${typeName}`, { typeName });
  }
}

export class UnsupportedOperationError extends FrameBridgeError {
  constructor(readonly nodeKind: string, readonly backend: string, reason?: string) {
    super(
      'FB_UNSUPPORTED_OPERATION',
      `'${nodeKind}' is not supported by the ${backend} backend${reason ? `: ${reason}` : ''}`,
      { nodeKind, backend }
    );
  }
}

export class DtypeMismatchError extends FrameBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('FB_DTYPE_MISMATCH', message, details);
  }
}

export class UnknownDtypeError extends FrameBridgeError {
  constructor(readonly nativeType: string, readonly backend: string) {
    super('FB_UNKNOWN_DTYPE', `Cannot map native ${backend} type '${nativeType}' to a dtype`, { nativeType, backend });
  }
}

export class ColumnNotFoundError extends FrameBridgeError {
  constructor(readonly column: string, available: readonly string[]) {
    super(
      'FB_COLUMN_NOT_FOUND',
      `Column '${column}' not found. Available columns: [${available.join(', ')}]`,
      { column, available: [...available] }
    );
  }
}

export class InvalidOperationError extends FrameBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('FB_INVALID_OPERATION', message, details);
  }
}

/** Engine failures pass through untouched as `cause`, tagged with the backend they came from. */
export class NativeEngineError extends FrameBridgeError {
  constructor(readonly backend: string, cause: unknown) {
    super(
      'FB_NATIVE_ENGINE',
      `[${backend}] ${cause instanceof Error ? cause.message : String(cause)}`,
      { backend },
      { cause }
    );
  }
}

/** 64-bit integers are read as numbers; refuse the ones a number cannot hold exactly. */
export function safeInteger(value: bigint, backend: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n)) {
    throw new NativeEngineError(backend, new RangeError(`integer ${value} does not fit in a float64 without rounding`));
  }
  return n;
}

/** Run an engine call, wrapping anything that is not already ours. */
export function withBackendErrors<T>(backend: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof FrameBridgeError) throw e;
    throw new NativeEngineError(backend, e);
  }
}

export async function withBackendErrorsAsync<T>(backend: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof FrameBridgeError) throw e;
    throw new NativeEngineError(backend, e);
  }
}
