import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import ffmpeg from 'fluent-ffmpeg';
import { ProcessTimeoutError, WorkspaceError, describeError } from './errors';
import { Logger, logger } from './logger';
import { ProbeInfo, ProcessResult, TranscodeCommand, Workspace } from './types';

export type RunOptions = { timeoutMs: number };

export type CommandRunner = (command: TranscodeCommand, options: RunOptions) => Promise<ProcessResult>;

// Função que executa o comando e espera o processo terminar
// Exit code diferente de zero não rejeita: quem chama decide com stdout/stderr
// Falha ao iniciar o processo ou estouro do timeout rejeitam
export const runCommand: CommandRunner = (command, options) => {
  return new Promise<ProcessResult>((resolve, reject) => {
    const [file, ...args] = command;
    if (!file) {
      reject(new Error('Empty command'));
      return;
    }

    const signal = AbortSignal.timeout(options.timeoutMs);
    const child = spawn(file, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      signal,
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
    child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));
    child.on('error', (error) => {
      reject(signal.aborted ? new ProcessTimeoutError(options.timeoutMs) : error);
    });
    child.on('close', (code) => resolve({ exitCode: code, stdout, stderr }));
  });
};

export type WorkspaceOptions = {
  root: string;
  outputObjectName: string;
};

// Criar o diretório temporário com sufixo aleatório (mkdtemp), um por requisição
// A saída mantém a extensão do objeto final para o ffmpeg inferir o formato
export async function createWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  let dir: string;
  try {
    dir = await fs.mkdtemp(path.join(options.root, 'transcode-'));
  } catch (error) {
    throw new WorkspaceError(`Unable to prepare workspace: ${describeError(error)}`, { cause: error });
  }
  return {
    dir,
    inputPath: path.join(dir, 'input'),
    outputPath: path.join(dir, `output${path.extname(options.outputObjectName)}`),
  };
}

// Falha na limpeza só gera log, nunca muda o resultado
export async function releaseWorkspace(workspace: Workspace, log: Logger = logger): Promise<void> {
  try {
    await fs.rm(workspace.dir, { recursive: true, force: true });
    log.info({ phase: 'cleanup', dir: workspace.dir }, 'Cleaned up temporary directory');
  } catch (error) {
    log.warn({ phase: 'cleanup', dir: workspace.dir, err: error }, 'Failed to clean up temporary files');
  }
}

// Função que executa fn dentro de um workspace e remove o workspace em qualquer saída
export async function withWorkspace<T>(
  options: WorkspaceOptions,
  fn: (workspace: Workspace) => Promise<T>,
  log: Logger = logger,
): Promise<T> {
  const workspace = await createWorkspace(options);
  try {
    return await fn(workspace);
  } finally {
    await releaseWorkspace(workspace, log);
  }
}

// O ffprobe vem de FFPROBE_PATH ou do @ffprobe-installer
export async function resolveFfprobePath(override?: string): Promise<string | undefined> {
  if (override) return override;
  try {
    const { default: ffprobeInstaller } = await import('@ffprobe-installer/ffprobe');
    return ffprobeInstaller.path;
  } catch (error) {
    logger.debug({ err: error }, 'Bundled ffprobe binary unavailable for this platform');
    return undefined;
  }
}

function parseFrameRate(rate: string | undefined): number | undefined {
  if (!rate || !rate.includes('/')) return undefined;
  const [num, den] = rate.split('/').map(Number);
  return den ? num / den : undefined;
}

// Função que faz a probe do vídeo
// Usada só para log: o resultado não altera a transcodificação
export async function probe(filePath: string, ffprobePath?: string): Promise<ProbeInfo> {
  const command = ffmpeg();
  if (ffprobePath) command.setFfprobePath(ffprobePath);

  return new Promise((resolve, reject) => {
    command.input(filePath).ffprobe((error: unknown, data: ffmpeg.FfprobeData) => {
      if (error) return reject(error);
      // Obter o stream de vídeo e o de áudio
      const vStream = data.streams.find((s) => s.codec_type === 'video');
      const aStream = data.streams.find((s) => s.codec_type === 'audio');
      resolve({
        durationSeconds: Number(data.format.duration || 0),
        width: vStream?.width,
        height: vStream?.height,
        fps: parseFrameRate(vStream?.r_frame_rate),
        hasAudio: Boolean(aStream),
        audioChannels: aStream?.channels,
        audioSampleRate: aStream?.sample_rate ? Number(aStream.sample_rate) : undefined,
      });
    });
  });
}
