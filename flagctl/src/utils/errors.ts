/**
 * Base class for every failure the CLI reports as a structured envelope.
 * `code` is stable and appears verbatim in `--output json` error payloads.
 */
export class FlagctlError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'FlagctlError';
  }
}

export type ResolutionErrorCode =
  | 'MISSING_ENVIRONMENT'
  | 'ENVIRONMENT_NOT_FOUND'
  | 'INCOMPLETE_CONNECTION';

/**
 * Connection could not be resolved. Always raised before any network call.
 */
export class ResolutionError extends FlagctlError {
  constructor(
    public readonly reason: ResolutionErrorCode,
    message: string,
    details?: unknown
  ) {
    super(reason, message, details);
    this.name = 'ResolutionError';
  }
}

export type ConfigErrorCode =
  | 'CONFIG_READ_ERROR'
  | 'CONFIG_PARSE_ERROR'
  | 'INVALID_KEY_PATH'
  | 'UNKNOWN_FIELD'
  | 'ENVIRONMENT_NOT_FOUND'
  | 'CONFIG_EXISTS';

export class ConfigError extends FlagctlError {
  constructor(
    public readonly reason: ConfigErrorCode,
    message: string,
    details?: unknown
  ) {
    super(reason, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Bad user input: option values, JSON overrides, import documents.
 */
export class ValidationError extends FlagctlError {
  constructor(message: string, details?: unknown, code: 'INVALID_ARGUMENT' | 'INVALID_DOCUMENT' = 'INVALID_ARGUMENT') {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Non-success response from the flag service. `body` is the raw response text.
 * Transport failures (DNS, refused connection, timeout) use status 0.
 */
export class RemoteError extends FlagctlError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    message?: string
  ) {
    super(
      'REMOTE_ERROR',
      message ?? `API error (status ${status}): ${body}`,
      { status, body }
    );
    this.name = 'RemoteError';
  }
}

export class FlagNotFoundError extends FlagctlError {
  constructor(
    public readonly key: string,
    public readonly env: string
  ) {
    super('FLAG_NOT_FOUND', `flag '${key}' not found in environment '${env}'`, { key, env });
    this.name = 'FlagNotFoundError';
  }
}
