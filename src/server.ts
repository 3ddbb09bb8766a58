import Fastify, { FastifyError } from 'fastify';
import { z } from 'zod';
import { Env, env } from './env';
import { logger } from './logger';
import { PipelineDeps, createPipelineDeps, handleTranscodeRequest } from './transcodeJob';
import { TranscodeRequest } from './types';

// Valores que não são string contam como ausentes
const field = z.string().optional().catch(undefined);

// Aceita os nomes atuais e os antigos (inputBlobUrl, outputContainerName, ffmpegCommand)
const requestFieldsSchema = z.object({
  sourceObjectUrl: field,
  destinationContainerUrl: field,
  transformInstruction: field,
  inputBlobUrl: field,
  outputContainerName: field,
  ffmpegCommand: field,
});

function pickRequestFields(source: unknown): Partial<TranscodeRequest> | undefined {
  const parsed = requestFieldsSchema.safeParse(source);
  if (!parsed.success) return undefined;
  const f = parsed.data;
  const fields = {
    sourceObjectUrl: f.sourceObjectUrl ?? f.inputBlobUrl,
    destinationContainerUrl: f.destinationContainerUrl ?? f.outputContainerName,
    transformInstruction: f.transformInstruction ?? f.ffmpegCommand,
  };
  return Object.values(fields).some((value) => value !== undefined) ? fields : undefined;
}

// Body JSON primeiro; se o body não trouxer nenhum campo conhecido, usa a query string
export function readTranscodeRequest(body: unknown, query: unknown): Partial<TranscodeRequest> {
  return pickRequestFields(body) ?? pickRequestFields(query) ?? {};
}

export type ServerOptions = {
  config?: Env;
  createDeps?: () => PipelineDeps;
};

export function buildServer(options: ServerOptions = {}) {
  const config = options.config ?? env;
  const createDeps = options.createDeps ?? (() => createPipelineDeps(config));

  const app = Fastify({ loggerInstance: logger });

  // JSON inválido ou body vazio não é erro: cai no fallback da query string
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      const parsed: unknown = JSON.parse(String(body));
      done(null, parsed);
    } catch {
      done(null, undefined);
    }
  });

  // Outros content types não viram 415: o body é ignorado e a query string é lida
  app.addContentTypeParser('*', { parseAs: 'string' }, (_req, _body, done) => {
    done(null, undefined);
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.route({
    method: ['GET', 'POST'],
    url: '/api/transcode',
    handler: async (request, reply) => {
      const input = readTranscodeRequest(request.body, request.query);
      const outcome = await handleTranscodeRequest(input, createDeps(), request.log);
      if (outcome.ok) {
        request.log.info({ status: outcome.status }, 'Transcode request succeeded');
      } else {
        request.log.warn({ status: outcome.status, kind: outcome.kind }, 'Transcode request failed');
      }
      return reply.code(outcome.status).type('text/plain; charset=utf-8').send(outcome.message);
    },
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    request.log.error({ err: error }, 'Unhandled error');
    const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    return reply.code(status).type('text/plain; charset=utf-8').send(`Unexpected error: ${error.message}`);
  });

  return app;
}
