export type TranscodeRequest = {
  sourceObjectUrl: string; // URL do objeto de origem: https://{account}.{domain}/{container}/{path}
  destinationContainerUrl: string; // URL do container de destino, só o primeiro segmento conta
  transformInstruction: string; // opções do ffmpeg, ex: -vf "scale=1280:720"
};

export type StorageLocator = {
  accountName: string;
  containerName: string;
  objectPath: string;
};

export type ContainerLocator = Omit<StorageLocator, 'objectPath'>;

// Mesmo formato de AwsCredentialIdentity do SDK
export type StorageCredential = {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
};

export type Workspace = {
  dir: string;
  inputPath: string;
  outputPath: string;
};

// [binário, "-i", entrada, ...instrução, saída]
export type TranscodeCommand = readonly string[];

export type ProcessResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export type ProbeInfo = {
  durationSeconds: number;
  width?: number;
  height?: number;
  fps?: number;
  hasAudio?: boolean;
  audioChannels?: number;
  audioSampleRate?: number;
};

export type FailureKind =
  | 'ValidationError'
  | 'WorkspaceError'
  | 'LocatorFormatError'
  | 'CredentialError'
  | 'SourceNotFoundError'
  | 'TransferError'
  | 'BinaryMissingError'
  | 'ProcessExecutionError'
  | 'PostProcessLocatorError'
  | 'UploadError';

export type FailureStatus = 400 | 404 | 500;

export const FAILURE_STATUS: Record<FailureKind, FailureStatus> = {
  ValidationError: 400,
  WorkspaceError: 500,
  LocatorFormatError: 400,
  CredentialError: 500,
  SourceNotFoundError: 404,
  TransferError: 500,
  BinaryMissingError: 500,
  ProcessExecutionError: 500,
  PostProcessLocatorError: 500,
  UploadError: 500,
};

export type Success = { ok: true; status: 200; message: string };
export type Failure = { ok: false; kind: FailureKind; status: FailureStatus; message: string };
export type Outcome = Success | Failure;

export function succeed(message: string): Success {
  return { ok: true, status: 200, message };
}

export function fail(kind: FailureKind, message: string): Failure {
  return { ok: false, kind, status: FAILURE_STATUS[kind], message };
}

export type Result<T, E extends Error = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
