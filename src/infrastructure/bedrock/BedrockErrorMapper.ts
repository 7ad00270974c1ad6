import {
  AccessDeniedException,
  BedrockRuntimeServiceException,
  InternalServerException,
  ServiceUnavailableException,
  ThrottlingException,
  ValidationException,
} from '@aws-sdk/client-bedrock-runtime';
import {
  AccessDeniedError,
  ConfigurationError,
  ModelNotFoundError,
  RateLimitedError,
  ServiceError,
  TranslatorError,
} from '../../core/errors/TranslatorErrors.js';

/** Error names raised on the client side before a request reaches Bedrock */
const CLIENT_FAULT_NAMES = new Set([
  'CredentialsProviderError',
  'TokenProviderError',
  'TimeoutError',
  'NetworkingError',
]);

/** Socket-level errno codes surfaced by the Node HTTP handler */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'EPIPE',
]);

/**
 * True for local transport or configuration faults: credentials that cannot
 * be loaded, endpoints that cannot be reached.
 */
export function isClientFault(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (CLIENT_FAULT_NAMES.has(error.name)) {
    return true;
  }
  return 'code' in error && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code);
}

/**
 * Map a fault raised by a Bedrock Converse call to a TranslatorError.
 * Checks run most-specific first; the original fault is kept as `cause`.
 */
export function mapBedrockError(error: unknown, modelId: string): TranslatorError {
  if (error instanceof TranslatorError) {
    return error;
  }

  if (error instanceof ValidationException) {
    return new ModelNotFoundError(
      modelId,
      `Model '${modelId}' is not available in your AWS region. Please check your AWS Bedrock model access in the AWS Console.`,
      error
    );
  }

  if (error instanceof AccessDeniedException) {
    return new AccessDeniedError(
      'Access denied to AWS Bedrock. Please check your AWS credentials and IAM permissions (bedrock:InvokeModel required).',
      error
    );
  }

  if (error instanceof ThrottlingException) {
    return new RateLimitedError('AWS Bedrock rate limit exceeded. Please wait a moment and try again.', error);
  }

  if (error instanceof ServiceUnavailableException) {
    return new ServiceError(
      'ServiceUnavailable',
      'AWS Bedrock service is temporarily unavailable. Please try again later.',
      error
    );
  }

  if (error instanceof InternalServerException) {
    return new ServiceError(
      'InternalServerError',
      'AWS Bedrock encountered an internal error. Please try again later.',
      error
    );
  }

  if (error instanceof BedrockRuntimeServiceException) {
    return new ServiceError(error.name, `AWS Bedrock error (${error.name}): ${error.message}`, error);
  }

  if (isClientFault(error)) {
    return new ConfigurationError(
      'AWS client configuration error. Please check your AWS credentials and network connection.',
      error
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ServiceError('UnknownError', `Unexpected error during translation: ${message}`, error);
}
