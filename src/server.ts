import 'dotenv/config';
import { createApp } from './app.js';
import { getConfig } from './config.js';
import { seedIfEmpty } from './ingestion.js';
import { logger } from './logger.js';

async function main() {
  const { port } = getConfig();

  const seeded = await seedIfEmpty();
  if (seeded) logger.info(seeded, 'startup.seeded');

  const app = createApp();
  app.listen(port, () => {
    logger.info({ port }, `API listening on http://localhost:${port}`);
  });
}

main().catch((e) => {
  logger.fatal({ err: e }, 'startup.failed');
  process.exit(1);
});
