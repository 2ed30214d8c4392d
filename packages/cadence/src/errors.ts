export type CadenceErrorCode =
  | 'parse_error'
  | 'invalid_unit'
  | 'invalid_name'
  | 'not_found'
  | 'index_out_of_range'
  | 'store_error'
  | 'config_error';

export class CadenceError extends Error {
  constructor(
    public readonly code: CadenceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CadenceError';
  }

  toJSON(): { error: CadenceErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}

export class ParseError extends CadenceError {
  constructor(message: string, code: CadenceErrorCode = 'parse_error') {
    super(code, message);
    this.name = 'ParseError';
  }
}

export class InvalidUnitError extends ParseError {
  constructor(public readonly unit: string) {
    super(`Invalid duration unit '${unit}' (expected one of d, h, m, s)`, 'invalid_unit');
    this.name = 'InvalidUnitError';
  }
}

export class InvalidNameError extends CadenceError {
  constructor(message = 'Tracker name must not be empty') {
    super('invalid_name', message);
    this.name = 'InvalidNameError';
  }
}

export class NotFoundError extends CadenceError {
  /** `target` is a tracker id, or the tag that named no tracker. */
  constructor(public readonly target: number | string, message = `No tracker with id ${target}`) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class IndexOutOfRangeError extends CadenceError {
  constructor(
    public readonly index: number,
    public readonly length: number,
  ) {
    super('index_out_of_range', length === 0
      ? `History is empty; there is no entry ${index}`
      : `History index ${index} is outside 0..${length - 1}`);
    this.name = 'IndexOutOfRangeError';
  }
}

export class StoreError extends CadenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_error', message);
    this.name = 'StoreError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class ConfigError extends CadenceError {
  constructor(message: string) {
    super('config_error', message);
    this.name = 'ConfigError';
  }
}

export type Result<T, E extends CadenceError = CadenceError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends CadenceError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
