import { NoSuchKey, NotFound, S3ServiceException } from '@aws-sdk/client-s3';

export class LocatorFormatError extends Error {
  readonly url: string;

  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocatorFormatError';
    this.url = url;
  }
}

export class BinaryNotFoundError extends Error {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super('FFmpeg binary not found');
    this.name = 'BinaryNotFoundError';
    this.candidates = candidates;
  }
}

export class WorkspaceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WorkspaceError';
  }
}

export class CredentialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

export class InstructionSyntaxError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InstructionSyntaxError';
  }
}

export class ProcessTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`ffmpeg did not finish within ${timeoutMs}ms and was killed`);
    this.name = 'ProcessTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// not_found vira 404, o resto vira 500
export type TransferFailureReason = 'not_found' | 'auth' | 'timeout' | 'transport';

export class TransferError extends Error {
  readonly reason: TransferFailureReason;

  constructor(reason: TransferFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferError';
    this.reason = reason;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// Função que classifica os erros do SDK do S3
// Usado para separar "objeto não existe" de falhas de rede ou de permissão
export function classifyStorageError(error: unknown): TransferFailureReason {
  if (error instanceof TransferError) return error.reason;
  if (error instanceof NoSuchKey || error instanceof NotFound) return 'not_found';
  if (!(error instanceof Error)) return 'transport';

  if (error.name === 'NoSuchKey' || error.name === 'NotFound') return 'not_found';
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return 'timeout';
  if (error.name === 'CredentialsProviderError') return 'auth';

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;
    if (status === 404) return 'not_found';
    if (status === 401 || status === 403) return 'auth';
  }
  return 'transport';
}

export function toTransferError(error: unknown): TransferError {
  if (error instanceof TransferError) return error;
  return new TransferError(classifyStorageError(error), describeError(error), { cause: error });
}
