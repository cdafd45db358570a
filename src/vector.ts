import { Pinecone, type PineconeRecord, type RecordMetadata } from '@pinecone-database/pinecone';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { getConfig } from './config.js';
import { createEmbeddings } from './embeddings.js';
import { logger } from './logger.js';

// Pinecone limits the size of a single upsert request.
const UPSERT_BATCH_SIZE = 100;

let pc: Pinecone | undefined;
let embeddings: EmbeddingsInterface | undefined;

function getClient(): Pinecone {
  pc ??= new Pinecone({ apiKey: getConfig().pinecone.apiKey });
  return pc;
}

function getEmbeddings(): EmbeddingsInterface {
  embeddings ??= createEmbeddings(getConfig().embeddings);
  return embeddings;
}

function getIndex() {
  return getClient().index(getConfig().pinecone.index);
}

export async function embedText(text: string): Promise<number[]> {
  return getEmbeddings().embedQuery(text);
}

export async function embedTexts(texts: string[]): Promise<number[][]> {
  if (!texts.length) return [];
  const vectors = await getEmbeddings().embedDocuments(texts);
  if (vectors.length !== texts.length) {
    throw new Error(`Embedding backend returned ${vectors.length} vectors for ${texts.length} texts`);
  }
  return vectors;
}

/** Creates the serverless index when missing. Resolves to true when it had to create it. */
export async function ensureIndex(): Promise<boolean> {
  const { pinecone, embeddings: emb } = getConfig();
  const client = getClient();

  const { indexes = [] } = await client.listIndexes();
  if (indexes.some((i) => i.name === pinecone.index)) return false;

  logger.info({ index: pinecone.index, dimension: emb.dimension }, 'vector.index.create');
  await client.createIndex({
    name: pinecone.index,
    dimension: emb.dimension,
    metric: 'cosine',
    spec: {
      serverless: {
        cloud: pinecone.cloud,
        region: pinecone.region,
      },
    },
    waitUntilReady: true,
    suppressConflicts: true,
  });
  return true;
}

export async function countRecords(): Promise<number> {
  const stats = await getIndex().describeIndexStats();
  return stats.totalRecordCount ?? 0;
}

export async function pingIndex(): Promise<void> {
  await getIndex().describeIndexStats();
}

export async function upsertRecords(records: PineconeRecord[]): Promise<void> {
  const index = getIndex();
  for (let i = 0; i < records.length; i += UPSERT_BATCH_SIZE) {
    await index.upsert(records.slice(i, i + UPSERT_BATCH_SIZE));
  }
}

export type MetadataFilter = Record<string, unknown>;

export type QueryMatch = {
  id: string;
  score: number;
  metadata?: RecordMetadata;
};

export async function queryByVector(
  vector: number[],
  topK = 5,
  filter?: MetadataFilter
): Promise<{ matches: QueryMatch[] }> {
  const res = await getIndex().query({
    vector,
    topK,
    includeMetadata: true,
    ...(filter && { filter }),
  });
  const matches = (res.matches || []).map((m) => ({
    id: m.id,
    score: m.score ?? 0,
    metadata: m.metadata,
  }));
  matches.sort((a, b) => b.score - a.score);
  return { matches };
}
