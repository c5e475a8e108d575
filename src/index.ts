import 'dotenv/config';
import http from 'http';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { Database } from './db/database';
import { ConfigurationError } from './errors';
import { MongoFocusStore } from './store/mongoFocusStore';
import { logError, logger } from './utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const database = new Database({
    url: config.database.url,
    name: config.database.name,
  });
  await database.open();

  const store = new MongoFocusStore(database);
  const app = createApp({ config, store });
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger.info({ port: config.port, host: config.host }, 'Focus tracker backend listening');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await database.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logError(error, { signal });
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    for (const issue of error.issues) {
      logger.fatal({ issue }, 'Invalid environment variable');
    }
  } else {
    logError(error);
  }
  process.exit(1);
});
