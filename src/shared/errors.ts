export class FootprintError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'FootprintError';
  }
}

export class ConfigError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class CredentialsError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CREDENTIALS_ERROR', details);
    this.name = 'CredentialsError';
  }
}

/**
 * Transport-level failure: network error, timeout, non-2xx status, body that is not JSON.
 */
export class RequestFailedError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REQUEST_FAILED', details);
    this.name = 'RequestFailedError';
  }
}

/**
 * The remote answered, but with a non-zero application code.
 */
export class RemoteApiError extends FootprintError {
  constructor(
    message: string,
    public readonly remoteCode: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'REMOTE_API_ERROR', { ...details, remoteCode });
    this.name = 'RemoteApiError';
  }
}

/**
 * A response envelope did not have the shape its feed promises.
 */
export class DecodeError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', details);
    this.name = 'DecodeError';
  }
}

export class DeleteError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DELETE_ERROR', details);
    this.name = 'DeleteError';
  }
}

export class JobError extends FootprintError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'JOB_ERROR', details);
    this.name = 'JobError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
