import process from 'node:process';
import { env } from './env';
import { logger } from './logger';
import { buildServer } from './server';

async function main() {
  const app = buildServer({ config: env });

  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid }, 'Shutting down server');
      await app.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during server shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  logger.info(
    { port: env.PORT, storageDomain: env.STORAGE_DOMAIN, outputObjectName: env.OUTPUT_OBJECT_NAME },
    'Transcode relay listening',
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
