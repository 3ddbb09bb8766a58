import fs from 'node:fs/promises';
import { vi } from 'vitest';
import { TransferError } from './errors';
import { CommandRunner } from './ffmpeg';
import { TransferClient } from './storage';
import { PipelineDeps } from './transcodeJob';
import { StorageCredential, StorageLocator, ok } from './types';

export const TEST_CREDENTIAL: StorageCredential = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

function objectKey(locator: StorageLocator): string {
  return `${locator.accountName}/${locator.containerName}/${locator.objectPath}`;
}

// Storage em memória, indexado por conta/container/objeto
export class MemoryTransferClient implements TransferClient {
  readonly objects = new Map<string, Buffer>();
  readonly credentials: StorageCredential[] = [];
  uploads = 0;
  downloadError?: Error;
  uploadError?: Error;

  async download(locator: StorageLocator, credential: StorageCredential, destinationPath: string) {
    this.credentials.push(credential);
    if (this.downloadError) throw this.downloadError;
    const body = this.objects.get(objectKey(locator));
    if (!body) throw new TransferError('not_found', 'The specified key does not exist.');
    await fs.writeFile(destinationPath, body);
    return { bytes: body.length };
  }

  async upload(locator: StorageLocator, credential: StorageCredential, sourcePath: string) {
    this.credentials.push(credential);
    if (this.uploadError) throw this.uploadError;
    const body = await fs.readFile(sourcePath);
    this.objects.set(objectKey(locator), body);
    this.uploads += 1;
    return { bytes: body.length };
  }
}

// Transformação identidade: copia o slot de entrada para o de saída
export const copyRunner: CommandRunner = async (command) => {
  await fs.copyFile(command[2], command[command.length - 1]);
  return { exitCode: 0, stdout: '', stderr: '' };
};

export function createTestDeps(root: string, transfer: TransferClient, overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    transfer,
    acquireCredential: vi.fn(async () => TEST_CREDENTIAL),
    resolveBinary: vi.fn(async () => ok('/opt/ffmpeg/bin/ffmpeg')),
    runCommand: vi.fn(copyRunner),
    workspaceRoot: root,
    outputObjectName: 'output.mp4',
    processTimeoutMs: 60000,
    ...overrides,
  };
}
