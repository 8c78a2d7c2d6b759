import { describe, it, expect } from 'vitest';
import { describeAwsError, isTransientAwsError, toEngineError } from '../error-classifier';
import { EngineError } from '../../errors';
import { awsError } from '../../__tests__/helpers/aws-sdk';

describe('describeAwsError', () => {
  it('should read the code and HTTP status of a service exception', () => {
    expect(describeAwsError(awsError('ThrottlingException', 'Rate exceeded', 400))).toEqual({
      code: 'ThrottlingException',
      httpStatus: 400,
      message: 'Rate exceeded'
    });
  });

  it('should prefer the code of a system error', () => {
    const error = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(describeAwsError(error)).toEqual({ code: 'ECONNRESET', message: 'socket hang up' });
  });

  it('should describe plain values', () => {
    expect(describeAwsError('boom')).toEqual({ message: 'boom' });
  });
});

describe('isTransientAwsError', () => {
  it('should treat throttling and server errors as transient', () => {
    expect(isTransientAwsError(awsError('Throttling', 'Rate exceeded'))).toBe(true);
    expect(isTransientAwsError(awsError('InternalFailure', 'oops', 500))).toBe(true);
    expect(isTransientAwsError(awsError('SomethingElse', 'unavailable', 503))).toBe(true);
    expect(isTransientAwsError(awsError('SomethingElse', 'slow down', 429))).toBe(true);
  });

  it('should treat client errors as permanent', () => {
    expect(isTransientAwsError(awsError('AccessDenied', 'User is not authorized', 403))).toBe(false);
    expect(isTransientAwsError(awsError('ValidationError', 'Template format error: unsupported structure'))).toBe(false);
  });

  it('should keep the kind of an engine error', () => {
    const error = new EngineError('x', { kind: 'transient', operation: 'CreateStack' });
    expect(isTransientAwsError(error)).toBe(true);
  });
});

describe('toEngineError', () => {
  it('should name the operation, stack and AWS code', () => {
    const error = toEngineError(awsError('AccessDenied', 'User is not authorized', 403), {
      operation: 'UpdateStack',
      stackName: 'api1',
      projectName: 'api1',
      stage: 'SUBMITTING'
    });

    expect(error.message).toBe('UpdateStack failed on stack api1: AccessDenied: User is not authorized');
    expect(error.kind).toBe('permanent');
    expect(error.code).toBe('EngineFailed');
    expect(error.awsCode).toBe('AccessDenied');
    expect(error.stage).toBe('SUBMITTING');
    expect(error.projectName).toBe('api1');
  });

  it('should return an engine error unchanged', () => {
    const original = new EngineError('x', { kind: 'permanent', operation: 'DeleteStack' });
    expect(toEngineError(original, { operation: 'Other' })).toBe(original);
  });
});
