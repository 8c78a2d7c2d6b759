import { EngineError, ErrorContext, errorMessage } from '../errors';

const TRANSIENT_ERROR_CODES = new Set([
  'RequestTimeout',
  'RequestTimeoutException',
  'PriorRequestNotComplete',
  'ConnectionError',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'NetworkingError',
  'TimeoutError',
  'ProvisionedThroughputExceededException',
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'RequestLimitExceeded',
  'TooManyRequestsException',
  'SlowDown',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalError',
  'InternalServiceError',
  'OperationAbortedException'
]);

const TRANSIENT_MESSAGE_PATTERNS = [
  /rate exceeded/i,
  /throttl/i,
  /too many requests/i,
  /timed? ?out/i,
  /ECONNRESET/,
  /ETIMEDOUT/,
  /socket hang up/i
];

export interface AwsErrorInfo {
  code?: string;
  httpStatus?: number;
  message: string;
}

/**
 * Pull the error code and HTTP status out of an SDK v3 service exception or a
 * Node system error
 */
export function describeAwsError(error: unknown): AwsErrorInfo {
  const info: AwsErrorInfo = { message: errorMessage(error) };
  if (!error || typeof error !== 'object') {
    return info;
  }

  if ('code' in error && typeof error.code === 'string') {
    info.code = error.code;
  } else if ('name' in error && typeof error.name === 'string' && error.name !== 'Error') {
    info.code = error.name;
  }

  if ('$metadata' in error && error.$metadata && typeof error.$metadata === 'object') {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      info.httpStatus = metadata.httpStatusCode;
    }
  }

  return info;
}

export function isTransientAwsError(error: unknown): boolean {
  if (error instanceof EngineError) {
    return error.transient;
  }

  const { code, httpStatus, message } = describeAwsError(error);

  if (code && TRANSIENT_ERROR_CODES.has(code)) {
    return true;
  }

  if (httpStatus !== undefined && (httpStatus === 429 || httpStatus >= 500)) {
    return true;
  }

  return TRANSIENT_MESSAGE_PATTERNS.some(pattern => pattern.test(message));
}

export interface EngineCallContext extends ErrorContext {
  operation: string;
  stackName?: string;
}

/**
 * Wrap any failure from an AWS call as an EngineError carrying the operation,
 * stack name and AWS error code
 */
export function toEngineError(error: unknown, context: EngineCallContext): EngineError {
  if (error instanceof EngineError) {
    return error;
  }

  const { code, message } = describeAwsError(error);
  const target = context.stackName ? ` on stack ${context.stackName}` : '';

  return new EngineError(`${context.operation} failed${target}: ${code ? `${code}: ` : ''}${message}`, {
    ...context,
    kind: isTransientAwsError(error) ? 'transient' : 'permanent',
    awsCode: code,
    cause: error
  });
}
