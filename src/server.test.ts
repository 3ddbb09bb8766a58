import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildServer, readTranscodeRequest } from './server';
import { MemoryTransferClient, createTestDeps } from './testUtils';

const SOURCE_URL = 'https://media01.r2.cloudflarestorage.com/uploads/intro.mov';
const DESTINATION_URL = 'https://media02.r2.cloudflarestorage.com/processed';

describe('readTranscodeRequest', () => {
  it('prefers the JSON body', () => {
    const input = readTranscodeRequest(
      { sourceObjectUrl: 'a', destinationContainerUrl: 'b', transformInstruction: 'c' },
      { sourceObjectUrl: 'x' },
    );

    expect(input).toEqual({ sourceObjectUrl: 'a', destinationContainerUrl: 'b', transformInstruction: 'c' });
  });

  it('falls back to the query string when there is no body object', () => {
    const input = readTranscodeRequest(undefined, { sourceObjectUrl: 'x', transformInstruction: 'y' });

    expect(input).toEqual({ sourceObjectUrl: 'x', destinationContainerUrl: undefined, transformInstruction: 'y' });
  });

  it('falls back to the query string when the body has no known field', () => {
    const input = readTranscodeRequest({}, { sourceObjectUrl: 'x', destinationContainerUrl: 'y', transformInstruction: 'z' });

    expect(input).toEqual({ sourceObjectUrl: 'x', destinationContainerUrl: 'y', transformInstruction: 'z' });
  });

  it('returns no fields when neither body nor query has any', () => {
    expect(readTranscodeRequest({ other: 'a' }, {})).toEqual({});
  });

  it('accepts the legacy field names', () => {
    const input = readTranscodeRequest(
      { inputBlobUrl: 'a', outputContainerName: 'b', ffmpegCommand: 'c' },
      undefined,
    );

    expect(input).toEqual({ sourceObjectUrl: 'a', destinationContainerUrl: 'b', transformInstruction: 'c' });
  });

  it('drops values that are not strings', () => {
    const input = readTranscodeRequest({ sourceObjectUrl: 42, destinationContainerUrl: 'b' }, undefined);

    expect(input).toEqual({ sourceObjectUrl: undefined, destinationContainerUrl: 'b', transformInstruction: undefined });
  });
});

describe('transcode server', () => {
  let root: string;
  let transfer: MemoryTransferClient;
  let app: ReturnType<typeof buildServer>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'server-test-'));
    transfer = new MemoryTransferClient();
    transfer.objects.set('media01/uploads/intro.mov', Buffer.from('clip'));
    app = buildServer({ createDeps: () => createTestDeps(root, transfer) });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('processes a JSON body and replies with plain text', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      payload: { sourceObjectUrl: SOURCE_URL, destinationContainerUrl: DESTINATION_URL, transformInstruction: '-c copy' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.body).toBe('Video processed successfully');
    expect(transfer.objects.get('media02/processed/output.mp4')?.toString()).toBe('clip');
  });

  it('reads query parameters on GET', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/transcode',
      query: { inputBlobUrl: SOURCE_URL, outputContainerName: DESTINATION_URL, ffmpegCommand: '-c copy' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('Video processed successfully');
  });

  it('falls back to the query string when the JSON body is malformed', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      headers: { 'content-type': 'application/json' },
      payload: '{not json',
      query: { sourceObjectUrl: SOURCE_URL, destinationContainerUrl: DESTINATION_URL, transformInstruction: '-c copy' },
    });

    expect(res.statusCode).toBe(200);
  });

  it('reads the query string when the JSON body is an empty object', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      payload: {},
      query: { sourceObjectUrl: SOURCE_URL, destinationContainerUrl: DESTINATION_URL, transformInstruction: '-c copy' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('Video processed successfully');
  });

  it('ignores a form-encoded body and reads the query string', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      payload: 'sourceObjectUrl=ignored',
      query: { sourceObjectUrl: SOURCE_URL, destinationContainerUrl: DESTINATION_URL, transformInstruction: '-c copy' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.body).toBe('Video processed successfully');
  });

  it('returns 400 when a field is missing', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      payload: { sourceObjectUrl: SOURCE_URL, destinationContainerUrl: DESTINATION_URL },
    });

    expect(res.statusCode).toBe(400);
    expect(res.body).toBe(
      'Please pass sourceObjectUrl, destinationContainerUrl, and transformInstruction in the request body',
    );
  });

  it('returns 404 when the source object does not exist', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/transcode',
      payload: {
        sourceObjectUrl: 'https://media01.r2.cloudflarestorage.com/uploads/other.mov',
        destinationContainerUrl: DESTINATION_URL,
        transformInstruction: '-c copy',
      },
    });

    expect(res.statusCode).toBe(404);
    expect(res.body).toBe('Input object not found at uploads/other.mov');
  });
});
