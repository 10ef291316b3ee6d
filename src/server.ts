// src/server.ts
// What: HTTP server entrypoint.
// How: Builds the services from config, ingests DOCS_DIR without clearing existing data, then mounts the Express
//      app and listens.

import { createApp } from './app.js';
import { buildServices } from './bootstrap.js';
import config from './config/env.js';
import logger from './logging.js';

async function main(): Promise<void> {
  const { rag } = buildServices(config);

  const summary = await rag.addCourseFolder(config.DOCS_DIR, { clearExisting: false });
  logger.info({ dir: config.DOCS_DIR, ...summary }, 'Startup ingestion finished');

  const app = createApp(rag);
  app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, vector_store: config.VECTOR_STORE }, 'Server listening');
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
