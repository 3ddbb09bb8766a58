import pino from 'pino';
import { env } from './env';

// Subconjunto comum ao logger raiz e ao request.log do Fastify
export type Logger = Pick<pino.BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'media-transcode-relay', pid: process.pid },
});
