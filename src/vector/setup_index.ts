import 'dotenv/config';
import { getConfig } from '../config.js';
import { logger } from '../logger.js';
import { ensureIndex } from '../vector.js';

async function main() {
  const { pinecone, embeddings } = getConfig();
  const created = await ensureIndex();
  if (created) {
    logger.info({ index: pinecone.index, dimension: embeddings.dimension }, `Index '${pinecone.index}' created.`);
  } else {
    logger.info({ index: pinecone.index }, `Index '${pinecone.index}' already exists.`);
  }
}

main().catch((e) => {
  logger.error({ err: e }, 'setup-index failed');
  process.exit(1);
});
