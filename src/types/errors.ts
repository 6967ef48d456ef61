export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export type CredentialsErrorKind =
  | 'env'
  | 'keyring'
  | 'missingPassword'
  | 'missingApiSecret'
  | 'http'
  | 'exhausted';

export class CredentialsError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(
    readonly kind: CredentialsErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(`Credentials Error: ${message}`, context);
  }

  static missingEnv(variable: string): CredentialsError {
    return new CredentialsError('env', `Environment variable ${variable} is not set`, {
      variable,
    });
  }

  static missingPassword(): CredentialsError {
    return new CredentialsError(
      'missingPassword',
      'Password has not been set! Run with --password to set it'
    );
  }

  static missingApiSecret(): CredentialsError {
    return new CredentialsError(
      'missingApiSecret',
      'LastFM API secret has not been set! Run with --secret to set it'
    );
  }

  static exhausted(attempts: number): CredentialsError {
    return new CredentialsError('exhausted', `Failed to connect to LastFM after ${attempts} attempts`, {
      attempts,
    });
  }
}

export type LastFmErrorKind = 'transport' | 'status' | 'protocol' | 'api';

export class LastFmApiError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;
  /** Transport failures, rate limiting and server errors may succeed on a later attempt. */
  readonly retryable: boolean;

  constructor(
    readonly kind: LastFmErrorKind,
    message: string,
    readonly status?: number,
    context?: Record<string, unknown>
  ) {
    super(`LastFM API Error: ${message}`, { ...context, kind, status });
    this.retryable =
      kind === 'transport' ||
      (kind === 'status' && status !== undefined && (status === 429 || status >= 500));
  }
}

export class SecretStoreError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Secret Store Error: ${message}`, context);
  }
}

export class MediaPollError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Media Poll Error: ${message}`, context);
  }
}
