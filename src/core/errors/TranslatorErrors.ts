/**
 * Typed failures surfaced by a translation session.
 *
 * Callers switch on `kind` to pick remediation: reconfigure credentials,
 * request model access, or wait and retry.
 */
export type TranslatorErrorKind =
  | 'ConfigurationError'
  | 'ModelNotFound'
  | 'AccessDenied'
  | 'RateLimited'
  | 'ServiceError';

export interface TranslatorErrorPayload {
  kind: TranslatorErrorKind;
  message: string;
  retryable: boolean;
  modelId?: string;
  errorCode?: string;
}

export class TranslatorError extends Error {
  constructor(
    public readonly kind: TranslatorErrorKind,
    message: string,
    public readonly retryable: boolean,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TranslatorError';
  }

  toPayload(): TranslatorErrorPayload {
    return {
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * Credentials or client setup are unusable. Not retryable without an external fix.
 */
export class ConfigurationError extends TranslatorError {
  constructor(message: string, cause?: unknown) {
    super('ConfigurationError', message, false, cause);
    this.name = 'ConfigurationError';
  }
}

export class ModelNotFoundError extends TranslatorError {
  constructor(
    public readonly modelId: string,
    message: string,
    cause?: unknown
  ) {
    super('ModelNotFound', message, false, cause);
    this.name = 'ModelNotFoundError';
  }

  toPayload(): TranslatorErrorPayload {
    return { ...super.toPayload(), modelId: this.modelId };
  }
}

export class AccessDeniedError extends TranslatorError {
  constructor(message: string, cause?: unknown) {
    super('AccessDenied', message, false, cause);
    this.name = 'AccessDeniedError';
  }
}

export class RateLimitedError extends TranslatorError {
  constructor(message: string, cause?: unknown) {
    super('RateLimited', message, true, cause);
    this.name = 'RateLimitedError';
  }
}

const TRANSIENT_SERVICE_CODES = new Set(['ServiceUnavailable', 'InternalServerError']);

export class ServiceError extends TranslatorError {
  constructor(
    public readonly errorCode: string,
    message: string,
    cause?: unknown
  ) {
    super('ServiceError', message, TRANSIENT_SERVICE_CODES.has(errorCode), cause);
    this.name = 'ServiceError';
  }

  toPayload(): TranslatorErrorPayload {
    return { ...super.toPayload(), errorCode: this.errorCode };
  }
}

/**
 * Remediation hint for each error kind, for surfaces that show errors to people.
 */
export function describeRemediation(kind: TranslatorErrorKind): string {
  switch (kind) {
    case 'ConfigurationError':
      return 'Check the AWS profile and region settings and the network connection, then restart the session.';
    case 'ModelNotFound':
      return 'Request access to the model in the AWS Bedrock console, or configure a model available in this region.';
    case 'AccessDenied':
      return 'Grant the profile the bedrock:InvokeModel permission.';
    case 'RateLimited':
      return 'Wait a moment before sending more strings.';
    case 'ServiceError':
      return 'The provider reported a fault. Retry later if it persists.';
  }
}
