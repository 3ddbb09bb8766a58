import { NoSuchKey, S3ServiceException } from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';
import { TransferError, classifyStorageError, describeError, toTransferError } from './errors';

function named(name: string, message = 'boom'): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('classifyStorageError', () => {
  it('treats a missing key as not found', () => {
    const error = new NoSuchKey({ $metadata: { httpStatusCode: 404 }, message: 'The specified key does not exist.' });

    expect(classifyStorageError(error)).toBe('not_found');
  });

  it('uses the HTTP status of other service exceptions', () => {
    const forbidden = new S3ServiceException({
      name: 'AccessDenied',
      $fault: 'client',
      $metadata: { httpStatusCode: 403 },
      message: 'Access Denied',
    });
    const missing = new S3ServiceException({
      name: 'UnknownError',
      $fault: 'client',
      $metadata: { httpStatusCode: 404 },
      message: 'Not Found',
    });

    expect(classifyStorageError(forbidden)).toBe('auth');
    expect(classifyStorageError(missing)).toBe('not_found');
  });

  it('recognises aborted calls and credential failures', () => {
    expect(classifyStorageError(named('TimeoutError'))).toBe('timeout');
    expect(classifyStorageError(named('AbortError'))).toBe('timeout');
    expect(classifyStorageError(named('CredentialsProviderError'))).toBe('auth');
  });

  it('falls back to transport', () => {
    expect(classifyStorageError(new Error('socket hang up'))).toBe('transport');
    expect(classifyStorageError('weird')).toBe('transport');
  });
});

describe('toTransferError', () => {
  it('keeps the original message and cause', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');

    const error = toTransferError(cause);

    expect(error).toBeInstanceOf(TransferError);
    expect(error.reason).toBe('transport');
    expect(error.message).toBe('connect ECONNREFUSED 127.0.0.1:443');
    expect(error.cause).toBe(cause);
  });

  it('returns transfer errors unchanged', () => {
    const original = new TransferError('not_found', 'gone');

    expect(toTransferError(original)).toBe(original);
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies anything else', () => {
    expect(describeError(new Error('disk full'))).toBe('disk full');
    expect(describeError(42)).toBe('42');
  });
});
