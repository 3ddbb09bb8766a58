import fs from 'node:fs/promises';
import path from 'node:path';
import { BinaryNotFoundError } from './errors';
import { logger } from './logger';
import { Result, err, ok } from './types';

export const SYSTEM_FFMPEG_PATHS = ['/usr/bin/ffmpeg', '/usr/local/bin/ffmpeg'];

export type CandidateOptions = {
  override?: string; // FFMPEG_PATH
  cwd: string;
  deployPath: string;
  searchPath?: string; // conteúdo do PATH
  bundledPath?: string; // binário do @ffmpeg-installer
};

// Ordem de busca: override, bin/ local, caminho de deploy, PATH, instalações do sistema e por último o binário do npm
export function ffmpegCandidates(options: CandidateOptions): string[] {
  const candidates: string[] = [];
  if (options.override) candidates.push(options.override);
  candidates.push(path.join(options.cwd, 'bin', 'ffmpeg'));
  candidates.push(options.deployPath);
  for (const dir of (options.searchPath ?? '').split(path.delimiter)) {
    if (dir) candidates.push(path.join(dir, 'ffmpeg'));
  }
  candidates.push(...SYSTEM_FFMPEG_PATHS);
  if (options.bundledPath) candidates.push(options.bundledPath);
  return [...new Set(candidates)];
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch {
    return false;
  }
}

// Função que retorna o primeiro candidato que existe no disco
// Não tem retry: binário ausente é erro de ambiente
export async function resolveBinary(candidates: readonly string[]): Promise<Result<string, BinaryNotFoundError>> {
  for (const candidate of candidates) {
    if (await isFile(candidate)) return ok(candidate);
  }
  return err(new BinaryNotFoundError(candidates));
}

// O @ffmpeg-installer lança erro em plataformas sem binário publicado
export async function bundledFfmpegPath(): Promise<string | undefined> {
  try {
    const { default: ffmpegInstaller } = await import('@ffmpeg-installer/ffmpeg');
    return ffmpegInstaller.path;
  } catch (error) {
    logger.debug({ err: error }, 'Bundled ffmpeg binary unavailable for this platform');
    return undefined;
  }
}

export async function resolveFfmpeg(options: Omit<CandidateOptions, 'bundledPath'>): Promise<Result<string, BinaryNotFoundError>> {
  const candidates = ffmpegCandidates({ ...options, bundledPath: await bundledFfmpegPath() });
  const resolved = await resolveBinary(candidates);
  if (resolved.ok) {
    logger.info({ ffmpegPath: resolved.value }, 'Using FFmpeg binary');
  } else {
    logger.error({ candidates }, 'FFmpeg binary not found in any of the expected locations');
  }
  return resolved;
}
