// scripts/ingest.ts
// What: Command-line folder ingestion.
// How: `tsx scripts/ingest.ts <dir> [--clear]` builds the RAG services from config and runs addCourseFolder,
//      printing the summary as JSON. Exits non-zero when any document failed.

import config from '../src/config/env.js';
import logger from '../src/logging.js';
import { buildServices } from '../src/bootstrap.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const clearExisting = args.includes('--clear');
  const dir = args.find((a) => !a.startsWith('--')) ?? config.DOCS_DIR;

  const { rag, close } = buildServices(config);
  try {
    const summary = await rag.addCourseFolder(dir, { clearExisting });
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
    if (summary.failed.length > 0) process.exitCode = 1;
  } finally {
    await close();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Ingestion failed');
  process.exit(1);
});
