export class OtaUpdateError extends Error {
  readonly code: string = 'OTA_UPDATE_FAILED';
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = 'OtaUpdateError';
  }
}

export class InvalidRepositoryUrlError extends OtaUpdateError {
  readonly code = 'INVALID_REPOSITORY_URL';
  readonly url: string;

  constructor(url: string) {
    super(`Repository URL is not valid: ${url}`);
    this.name = 'InvalidRepositoryUrlError';
    this.url = url;
  }
}

export class EmptyRepositoryError extends OtaUpdateError {
  readonly code = 'EMPTY_REPOSITORY';

  constructor(branch: string) {
    super(`Repository is empty. Does the '${branch}' branch exist?`);
    this.name = 'EmptyRepositoryError';
  }
}

export class HashMismatchError extends OtaUpdateError {
  readonly code = 'HASH_MISMATCH';
  readonly path: string;
  readonly expected: string;
  readonly actual: string;

  constructor(path: string, actual: string, expected: string) {
    super(`Hash value '${actual}' does not match the expected hash value '${expected}' for ${path}.`);
    this.name = 'HashMismatchError';
    this.path = path;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConnectionExhaustedError extends OtaUpdateError {
  readonly code = 'CONNECTION_EXHAUSTED';
  readonly retryable = true;
  readonly url: string;
  readonly attempts: number;

  constructor(url: string, attempts: number, options?: { cause?: unknown }) {
    super(`Failed to establish connection to ${url} after ${attempts} attempts.`);
    this.name = 'ConnectionExhaustedError';
    this.url = url;
    this.attempts = attempts;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RequestFailedError extends OtaUpdateError {
  readonly code = 'REQUEST_FAILED';
  readonly statusCode: number;
  readonly url: string;
  readonly details: unknown;

  constructor(url: string, statusCode: number, details?: unknown) {
    super(`Request to ${url} failed with status ${statusCode}`);
    this.name = 'RequestFailedError';
    this.url = url;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class InvalidResponseError extends OtaUpdateError {
  readonly code = 'INVALID_RESPONSE';
  readonly url: string;
  readonly issues: unknown;

  constructor(url: string, issues: unknown) {
    super(`Unexpected response payload from ${url}`);
    this.name = 'InvalidResponseError';
    this.url = url;
    this.issues = issues;
  }
}

export class InvalidRepositoryPathError extends OtaUpdateError {
  readonly code = 'INVALID_REPOSITORY_PATH';
  readonly path: string;

  constructor(path: string, reason = 'escapes the staging directory') {
    super(`Repository path ${reason}: ${path}`);
    this.name = 'InvalidRepositoryPathError';
    this.path = path;
  }
}

export class UpdateInProgressError extends OtaUpdateError {
  readonly code = 'UPDATE_IN_PROGRESS';

  constructor() {
    super('A firmware update is already in progress');
    this.name = 'UpdateInProgressError';
  }
}

export function isRetryableUpdateError(error: unknown): boolean {
  return error instanceof OtaUpdateError && error.retryable;
}
