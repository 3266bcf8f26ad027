/**
 * Error kinds raised by the transfer core. Every failure is scoped to the
 * operation that raised it; the HTTP layer maps `status` onto the response.
 */

export type ErrorKind = 'auth' | 'limit_exceeded' | 'not_found' | 'storage' | 'io_failure' | 'bad_request';

export type AuthFailure =
  | 'TokenMissing'
  | 'OriginUnknown'
  | 'TokenInvalid'
  | 'TokenConsumed'
  | 'TokenExpired'
  | 'MissingDeviceId'
  | 'ReservedDeviceId'
  | 'Unauthenticated'
  | 'DesktopOnly'
  | 'NotOwner';

export class TransferError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get code(): string {
    return this.kind;
  }
}

const AUTH_MESSAGES: Record<AuthFailure, string> = {
  TokenMissing: 'Missing one-time token',
  OriginUnknown: 'Unable to identify device address',
  TokenInvalid: 'Token is invalid',
  TokenConsumed: 'Token has already been used',
  TokenExpired: 'Token has expired',
  MissingDeviceId: 'Missing device identity',
  ReservedDeviceId: 'Device identity is reserved',
  Unauthenticated: 'Unauthorized',
  DesktopOnly: 'Only the desktop may perform this operation',
  NotOwner: 'Record belongs to another device',
};

const AUTH_STATUS: Record<AuthFailure, number> = {
  TokenMissing: 403,
  OriginUnknown: 403,
  TokenInvalid: 403,
  TokenConsumed: 403,
  TokenExpired: 403,
  MissingDeviceId: 400,
  ReservedDeviceId: 400,
  Unauthenticated: 401,
  DesktopOnly: 403,
  NotOwner: 403,
};

export class AuthError extends TransferError {
  constructor(public readonly reason: AuthFailure, message?: string) {
    super('auth', AUTH_STATUS[reason], message ?? AUTH_MESSAGES[reason]);
  }

  override get code(): string {
    return this.reason;
  }
}

export class LimitExceededError extends TransferError {
  constructor(public readonly limitBytes: number) {
    super('limit_exceeded', 413, `Upload exceeds the size limit of ${limitBytes} bytes`);
  }
}

export class NotFoundError extends TransferError {
  constructor(message: string) {
    super('not_found', 404, message);
  }
}

export class StorageError extends TransferError {
  constructor(message: string, cause?: unknown) {
    super('storage', 500, `${message}: ${describeCause(cause)}`, { cause });
  }
}

export class IOFailureError extends TransferError {
  constructor(message: string, cause?: unknown) {
    super('io_failure', 500, `${message}: ${describeCause(cause)}`, { cause });
  }
}

export class BadRequestError extends TransferError {
  constructor(message: string) {
    super('bad_request', 400, message);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
