import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getType } from 'mime';
import { TransferError, toTransferError } from './errors';
import { StorageCredential, StorageLocator } from './types';

export type TransferStats = { bytes: number };

export interface TransferClient {
  download(locator: StorageLocator, credential: StorageCredential, destinationPath: string): Promise<TransferStats>;
  upload(locator: StorageLocator, credential: StorageCredential, sourcePath: string): Promise<TransferStats>;
}

export type S3TransferOptions = {
  domain: string; // ex: r2.cloudflarestorage.com
  region: string;
  timeoutMs: number;
};

export function storageEndpoint(accountName: string, domain: string): string {
  return `https://${accountName}.${domain}`;
}

// Cliente de transferência sobre o S3 (R2)
// Cada chamada cria o cliente da conta do locator e o destrói no fim
export function createS3TransferClient(options: S3TransferOptions): TransferClient {
  const clientFor = (accountName: string, credential: StorageCredential) =>
    new S3Client({
      region: options.region,
      endpoint: storageEndpoint(accountName, options.domain),
      credentials: credential,
      forcePathStyle: true,
    });

  return {
    // Baixa o objeto inteiro para o arquivo; se o stream falhar a promise rejeita
    // e o arquivo parcial fica no workspace, que é removido depois
    async download(locator, credential, destinationPath) {
      const s3 = clientFor(locator.accountName, credential);
      try {
        const res = await s3.send(
          new GetObjectCommand({ Bucket: locator.containerName, Key: locator.objectPath }),
          { abortSignal: AbortSignal.timeout(options.timeoutMs) },
        );
        const body = res.Body;
        if (!body) {
          throw new TransferError('transport', `Empty body for ${locator.containerName}/${locator.objectPath}`);
        }
        if (body instanceof Readable) {
          await pipeline(body, createWriteStream(destinationPath));
        } else {
          await fs.writeFile(destinationPath, await body.transformToByteArray());
        }
        const stats = await fs.stat(destinationPath);
        return { bytes: stats.size };
      } catch (error) {
        throw toTransferError(error);
      } finally {
        s3.destroy();
      }
    },

    // PutObject sobrescreve o objeto se ele já existir
    async upload(locator, credential, sourcePath) {
      const s3 = clientFor(locator.accountName, credential);
      try {
        const buf = await fs.readFile(sourcePath);
        await s3.send(
          new PutObjectCommand({
            Bucket: locator.containerName,
            Key: locator.objectPath,
            Body: buf,
            ContentType: getType(locator.objectPath) ?? undefined,
          }),
          { abortSignal: AbortSignal.timeout(options.timeoutMs) },
        );
        return { bytes: buf.length };
      } catch (error) {
        throw toTransferError(error);
      } finally {
        s3.destroy();
      }
    },
  };
}
