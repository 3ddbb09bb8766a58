import 'dotenv/config';
import os from 'node:os';
import { z } from 'zod';

// Variáveis vazias no .env contam como ausentes
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

const schema = z.object({
  PORT: z.coerce.number().int().positive().default(7071),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Storage S3-compatible (R2): https://{account}.{STORAGE_DOMAIN}/{container}/{object}
  STORAGE_DOMAIN: z.string().min(1).default('r2.cloudflarestorage.com'),
  STORAGE_REGION: z.string().min(1).default('auto'),
  // Sem chaves estáticas, a credencial vem da cadeia padrão do SDK (identidade da máquina/container)
  STORAGE_ACCESS_KEY_ID: optionalString,
  STORAGE_SECRET_ACCESS_KEY: optionalString,
  STORAGE_SESSION_TOKEN: optionalString,

  FFMPEG_PATH: optionalString,
  FFPROBE_PATH: optionalString,
  FFMPEG_DEPLOY_PATH: z.string().min(1).default('/home/site/wwwroot/bin/ffmpeg'),

  WORKSPACE_ROOT: z.string().min(1).default(os.tmpdir()),
  OUTPUT_OBJECT_NAME: z.string().min(1).default('output.mp4'),

  FFMPEG_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  TRANSFER_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  PROBE_SOURCE: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});

export type Env = z.infer<typeof schema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return schema.parse(source);
}

export const env = loadEnv();
