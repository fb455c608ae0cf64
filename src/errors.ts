export type SignatureErrorKind = 'io' | 'decode';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SignatureError extends Error {
  constructor(
    message: string,
    public readonly kind: SignatureErrorKind,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SignatureError';
  }
}

export class SamplerError extends Error {
  constructor(
    message: string,
    public readonly videoPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SamplerError';
  }
}

export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

const IO_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'EMFILE', 'ENFILE', 'EBUSY', 'EIO']);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Maps an error thrown while reading or decoding a file onto the
 * transient-I/O / decode split used for per-file failures.
 */
export function classifyError(error: unknown): SignatureErrorKind {
  if (error instanceof SignatureError) {
    return error.kind;
  }

  if (isErrnoException(error) && error.code && IO_ERROR_CODES.has(error.code)) {
    return 'io';
  }

  return 'decode';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
