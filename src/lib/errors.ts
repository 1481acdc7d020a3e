import { ZodError } from 'zod';

export type ErrorCode =
  | 'EncryptionNotInitialized'
  | 'KeyNotFound'
  | 'InvalidArmorFormat'
  | 'InvalidMessageFormat'
  | 'DecryptionFailure'
  | 'NoRecipients'
  | 'CorruptKeyData'
  | 'CorruptRecord'
  | 'InvalidArgument'
  | 'DataDirectoryLocked'
  | 'InternalError';

/**
 * Base class for every failure the engine reports on purpose.
 * `details` carries structured diagnostics; it never holds key material.
 */
export class SealringError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = code;
    this.code = code;
    this.details = details;
  }
}

export class EncryptionNotInitializedError extends SealringError {
  constructor(message = 'Encryption not initialized. Set a master password first.') {
    super('EncryptionNotInitialized', message);
  }
}

export class KeyNotFoundError extends SealringError {
  constructor(fingerprint: string, secret = false) {
    super('KeyNotFound', `${secret ? 'Private' : 'Public'} key not found: ${fingerprint}`, {
      fingerprint,
      secret
    });
  }
}

export class InvalidArmorFormatError extends SealringError {
  constructor(message = 'Invalid ASCII armor format') {
    super('InvalidArmorFormat', message);
  }
}

export class InvalidMessageFormatError extends SealringError {
  constructor(message = 'Invalid message format') {
    super('InvalidMessageFormat', message);
  }
}

export class DecryptionFailureError extends SealringError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DecryptionFailure', message, details);
  }
}

export class NoRecipientsError extends SealringError {
  constructor() {
    super('NoRecipients', 'No recipients specified');
  }
}

export class CorruptKeyDataError extends SealringError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CorruptKeyData', message, details);
  }
}

export class CorruptRecordError extends SealringError {
  constructor(file: string, reason: string) {
    super('CorruptRecord', `Stored record ${file} is unreadable: ${reason}`, { file });
  }
}

export class InvalidArgumentError extends SealringError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('InvalidArgument', message, details);
  }
}

export class DataDirectoryLockedError extends SealringError {
  constructor(dataDir: string, pid: number) {
    super('DataDirectoryLocked', `Data directory ${dataDir} is in use by process ${pid}`, {
      dataDir,
      pid
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Failure half of an operation result.
 */
export interface Failure {
  success: false;
  code: ErrorCode;
  error: string;
  details?: Record<string, unknown>;
}

export type Outcome<T extends object = object> = ({ success: true } & T) | Failure;

export function toFailure(error: unknown): Failure {
  if (error instanceof SealringError) {
    return {
      success: false,
      code: error.code,
      error: error.message,
      ...(error.details ? { details: error.details } : {})
    };
  }

  if (error instanceof ZodError) {
    return {
      success: false,
      code: 'InvalidArgument',
      error: error.errors.map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ')
    };
  }

  return {
    success: false,
    code: 'InternalError',
    error: errorMessage(error)
  };
}

/**
 * `code` of a Node system error (ENOENT, EEXIST, ...), if any
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
