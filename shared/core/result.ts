export type CoreErrorCode = 'NotFound' | 'AlreadyExists' | 'InvalidInput' | 'Corrupt' | 'Exhausted' | 'StorageFailed';

export class CoreError extends Error {
  code: CoreErrorCode;
  detail?: Record<string, unknown>;

  constructor(params: { code: CoreErrorCode; message: string; detail?: Record<string, unknown> }) {
    super(params.message);
    this.name = 'CoreError';
    this.code = params.code;
    this.detail = params.detail;
  }
}

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: CoreError };
export type CoreResult<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(code: CoreErrorCode, message: string, detail?: Record<string, unknown>): Failure {
  return { ok: false, error: new CoreError({ code, message, detail }) };
}

/** Unwraps a result, throwing its `CoreError` on failure. */
export function unwrap<T>(result: CoreResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
