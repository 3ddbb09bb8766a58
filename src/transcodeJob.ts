import { resolveFfmpeg } from './binary';
import { buildTranscodeCommand } from './command';
import { CredentialSource, createCredentialSource } from './credential';
import { Env } from './env';
import { BinaryNotFoundError, WorkspaceError, describeError, toTransferError } from './errors';
import { CommandRunner, probe, resolveFfprobePath, runCommand, withWorkspace } from './ffmpeg';
import { parseContainerLocator, parseObjectLocator } from './locator';
import { Logger, logger } from './logger';
import { TransferClient, createS3TransferClient } from './storage';
import { Outcome, ProbeInfo, Result, StorageCredential, TranscodeRequest, Workspace, fail, succeed } from './types';

export const MISSING_FIELDS_MESSAGE =
  'Please pass sourceObjectUrl, destinationContainerUrl, and transformInstruction in the request body';
export const SUCCESS_MESSAGE = 'Video processed successfully';
const UPLOAD_FAILED_PREFIX = 'Video processing completed but upload failed';

export type PipelineDeps = {
  transfer: TransferClient;
  acquireCredential: CredentialSource;
  resolveBinary: () => Promise<Result<string, BinaryNotFoundError>>;
  runCommand: CommandRunner;
  probe?: (filePath: string) => Promise<ProbeInfo>;
  workspaceRoot: string;
  outputObjectName: string;
  processTimeoutMs: number;
};

// Dependências novas a cada requisição: nenhum cliente ou credencial é compartilhado
export function createPipelineDeps(config: Env): PipelineDeps {
  return {
    transfer: createS3TransferClient({
      domain: config.STORAGE_DOMAIN,
      region: config.STORAGE_REGION,
      timeoutMs: config.TRANSFER_TIMEOUT_MS,
    }),
    acquireCredential: createCredentialSource(config),
    resolveBinary: () =>
      resolveFfmpeg({
        override: config.FFMPEG_PATH,
        cwd: process.cwd(),
        deployPath: config.FFMPEG_DEPLOY_PATH,
        searchPath: process.env.PATH,
      }),
    runCommand,
    probe: config.PROBE_SOURCE
      ? async (filePath) => probe(filePath, await resolveFfprobePath(config.FFPROBE_PATH))
      : undefined,
    workspaceRoot: config.WORKSPACE_ROOT,
    outputObjectName: config.OUTPUT_OBJECT_NAME,
    processTimeoutMs: config.FFMPEG_TIMEOUT_MS,
  };
}

// Campos ausentes ou só com espaços contam como faltando
export function validateRequest(input: Partial<TranscodeRequest>): TranscodeRequest | undefined {
  const sourceObjectUrl = input.sourceObjectUrl?.trim();
  const destinationContainerUrl = input.destinationContainerUrl?.trim();
  const transformInstruction = input.transformInstruction?.trim();
  if (!sourceObjectUrl || !destinationContainerUrl || !transformInstruction) return undefined;
  return { sourceObjectUrl, destinationContainerUrl, transformInstruction };
}

// Função que trata a requisição de transcodificação
// Ela é responsável por:
// 1) Validar a requisição
// 2) Criar o workspace temporário
// 3) Baixar o objeto de origem
// 4) Rodar o ffmpeg com a instrução
// 5) Subir o resultado para o container de destino
// 6) Remover o workspace em qualquer saída
// Cada etapa que falha vira um Outcome terminal, sem retry
export async function handleTranscodeRequest(
  input: Partial<TranscodeRequest>,
  deps: PipelineDeps,
  log: Logger = logger,
): Promise<Outcome> {
  const request = validateRequest(input);
  if (!request) {
    log.warn({ phase: 'validate' }, 'Missing required request field');
    return fail('ValidationError', MISSING_FIELDS_MESSAGE);
  }

  log.info(
    {
      phase: 'validate',
      source: request.sourceObjectUrl,
      destination: request.destinationContainerUrl,
      instruction: request.transformInstruction,
    },
    'Processing transcode request',
  );

  try {
    return await withWorkspace(
      { root: deps.workspaceRoot, outputObjectName: deps.outputObjectName },
      (workspace) => runStages(request, workspace, deps, log),
      log,
    );
  } catch (error) {
    if (error instanceof WorkspaceError) {
      log.error({ phase: 'workspace', err: error }, 'Unable to create temporary directory');
      return fail('WorkspaceError', error.message);
    }
    throw error;
  }
}

async function runStages(
  request: TranscodeRequest,
  workspace: Workspace,
  deps: PipelineDeps,
  log: Logger,
): Promise<Outcome> {
  const startTime = Date.now();
  log.info({ phase: 'workspace', dir: workspace.dir }, 'Temporary directory created');

  // Locator de origem: https://{account}.{domain}/{container}/{path}
  const source = parseObjectLocator(request.sourceObjectUrl);
  if (!source.ok) {
    log.error({ phase: 'locator', url: request.sourceObjectUrl }, 'Invalid source object URL');
    return fail('LocatorFormatError', source.error.message);
  }
  const { containerName, objectPath } = source.value;
  log.info({ phase: 'locator', account: source.value.accountName, container: containerName, objectPath }, 'Source locator resolved');

  // Uma credencial por execução, usada em todas as chamadas ao storage
  let credential: StorageCredential;
  try {
    credential = await deps.acquireCredential();
  } catch (error) {
    log.error({ phase: 'credential', err: error }, 'Unable to acquire storage credential');
    return fail('CredentialError', `Unable to acquire storage credential: ${describeError(error)}`);
  }

  // 1) Download do objeto original para o slot de entrada
  const downloadStart = Date.now();
  try {
    const { bytes } = await deps.transfer.download(source.value, credential, workspace.inputPath);
    log.info(
      { phase: 'download', duration: Date.now() - downloadStart, sizeMB: (bytes / (1024 * 1024)).toFixed(2) },
      'Download completed',
    );
  } catch (error) {
    const transferError = toTransferError(error);
    if (transferError.reason === 'not_found') {
      log.error({ phase: 'download', container: containerName, objectPath, err: transferError }, 'Input object not found');
      return fail('SourceNotFoundError', `Input object not found at ${containerName}/${objectPath}`);
    }
    log.error({ phase: 'download', reason: transferError.reason, err: transferError }, 'Error downloading object');
    return fail('TransferError', `Error downloading input file: ${transferError.message}`);
  }

  // Probe é só informativa: falha não interrompe o pipeline
  if (deps.probe) {
    try {
      const info = await deps.probe(workspace.inputPath);
      log.info({ phase: 'probe', info }, 'ffprobe info');
    } catch (probeError) {
      log.warn({ phase: 'probe', err: probeError }, 'Failed to probe input, continuing...');
    }
  }

  // 2) Localizar o binário do ffmpeg
  const binary = await deps.resolveBinary();
  if (!binary.ok) {
    return fail('BinaryMissingError', binary.error.message);
  }

  // 3) Montar o argv e rodar o ffmpeg; instrução mal formada também é erro de execução
  const transcodeStart = Date.now();
  try {
    const command = buildTranscodeCommand(
      binary.value,
      workspace.inputPath,
      request.transformInstruction,
      workspace.outputPath,
    );
    log.info({ phase: 'transcode', command: command.join(' ') }, 'Executing command');
    const result = await deps.runCommand(command, { timeoutMs: deps.processTimeoutMs });
    if (result.exitCode !== 0) {
      log.error({ phase: 'transcode', exitCode: result.exitCode, stderr: result.stderr }, 'FFmpeg error');
      return fail('ProcessExecutionError', `FFmpeg error: ${result.stderr}`);
    }
  } catch (error) {
    log.error({ phase: 'transcode', err: error }, 'Error executing FFmpeg');
    return fail('ProcessExecutionError', `Error executing FFmpeg: ${describeError(error)}`);
  }
  log.info({ phase: 'transcode', duration: Date.now() - transcodeStart }, 'FFmpeg command executed successfully');

  // 4) Upload do resultado; a partir daqui as falhas dizem que o processamento terminou
  const destination = parseContainerLocator(request.destinationContainerUrl);
  if (!destination.ok) {
    log.error({ phase: 'upload', url: request.destinationContainerUrl }, 'Invalid destination container URL');
    return fail('PostProcessLocatorError', `${UPLOAD_FAILED_PREFIX}: ${destination.error.message}`);
  }

  const target = { ...destination.value, objectPath: deps.outputObjectName };
  const uploadStart = Date.now();
  try {
    const { bytes } = await deps.transfer.upload(target, credential, workspace.outputPath);
    log.info(
      {
        phase: 'upload',
        container: target.containerName,
        objectPath: target.objectPath,
        duration: Date.now() - uploadStart,
        sizeMB: (bytes / (1024 * 1024)).toFixed(2),
      },
      'Upload completed',
    );
  } catch (error) {
    log.error({ phase: 'upload', err: error }, 'Error uploading processed file');
    return fail('UploadError', `${UPLOAD_FAILED_PREFIX}: ${describeError(error)}`);
  }

  log.info(
    { phase: 'summary', totalDuration: Date.now() - startTime, output: `${target.containerName}/${target.objectPath}` },
    'Job completed',
  );
  return succeed(SUCCESS_MESSAGE);
}
