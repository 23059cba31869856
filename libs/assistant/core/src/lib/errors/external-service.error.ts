export type ExternalServiceErrorKind =
  | 'network'
  | 'authentication'
  | 'quota'
  | 'timeout'
  | 'cancelled'
  | 'malformed-response'
  | 'service';

const AUTHENTICATION_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredTokenException',
  'CredentialsProviderError',
]);

const QUOTA_ERRORS = new Set([
  'ThrottlingException',
  'ServiceQuotaExceededException',
  'TooManyRequestsException',
]);

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
]);

/**
 * Failure of a call to Bedrock, classified by what went wrong.
 */
export class ExternalServiceError extends Error {
  constructor(
    readonly kind: ExternalServiceErrorKind,
    readonly operation: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed (${kind}): ${message}`, options);
    this.name = 'ExternalServiceError';
  }

  static malformed(operation: string, detail: string): ExternalServiceError {
    return new ExternalServiceError('malformed-response', operation, detail);
  }

  /**
   * Wrap whatever the AWS SDK (or the socket under it) threw.
   */
  static fromUnknown(operation: string, error: unknown): ExternalServiceError {
    if (error instanceof ExternalServiceError) {
      return error;
    }
    if (!(error instanceof Error)) {
      return new ExternalServiceError('service', operation, String(error), {
        cause: error,
      });
    }

    const code =
      'code' in error && typeof error.code === 'string' ? error.code : undefined;

    let kind: ExternalServiceErrorKind = 'service';
    if (AUTHENTICATION_ERRORS.has(error.name)) {
      kind = 'authentication';
    } else if (QUOTA_ERRORS.has(error.name)) {
      kind = 'quota';
    } else if (error.name === 'TimeoutError') {
      kind = 'timeout';
    } else if (code && NETWORK_CODES.has(code)) {
      kind = 'network';
    }

    return new ExternalServiceError(kind, operation, error.message, {
      cause: error,
    });
  }
}
