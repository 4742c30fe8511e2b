import { buildApp } from './api/app.js';
import { StoreNoteRepository } from './repositories/store-note-repository.js';
import { JsonFileNoteStore } from './storage/json-file-note-store.js';
import { loadConfig } from './utils/config.js';
import logger from './utils/logger.js';

async function main() {
  // Load configuration
  const config = loadConfig();

  const store = new JsonFileNoteStore(config.storage);
  const repository = new StoreNoteRepository(store);
  logger.info({ filePath: store.getFilePath() }, 'Initialized JSON note store');

  // Fail fast on an unreadable notes file
  await store.query();

  const app = await buildApp(repository);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await app.close();
    if (!(await repository.flush())) {
      logger.error('Pending note changes could not be written');
      process.exit(1);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error) => logger.error({ error }, 'Shutdown failed'));
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error) => logger.error({ error }, 'Shutdown failed'));
  });
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
