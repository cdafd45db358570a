import 'dotenv/config';
import fs from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { PineconeRecord, RecordMetadata } from '@pinecone-database/pinecone';
import { getConfig } from './config.js';
import { CatalogError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { countRecords, embedTexts, ensureIndex, upsertRecords } from './vector.js';

export const ProductSchema = z.object({
  id: z.union([z.string().trim().min(1), z.number()]).transform(String),
  name: z.string(),
  description: z.string(),
  price: z.number().finite(),
  url: z.string(),
  category: z.string().optional(),
});
export type Product = z.infer<typeof ProductSchema>;

export type ReindexResult = {
  ok: true;
  seeded: number;
  note?: string;
};

export function embeddingText(product: Product): string {
  return `${product.name} - ${product.description}`;
}

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * Reads and validates the whole catalog. Resolves to null when the file does not exist;
 * any other problem is a CatalogError, raised before anything is written.
 */
export async function readCatalog(filePath: string): Promise<Product[] | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }

  if (!raw.trim()) throw new CatalogError('Catalog file is empty');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new CatalogError(`Invalid catalog JSON: ${errorMessage(e)}`);
  }
  if (!Array.isArray(parsed)) throw new CatalogError('Catalog must be a JSON array');
  if (!parsed.length) throw new CatalogError('Catalog contains no products');

  const result = z.array(ProductSchema).safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((i) => {
      const [index, ...field] = i.path;
      return `[${index}]${field.length ? '.' + field.join('.') : ''}: ${i.message}`;
    });
    throw new CatalogError('Catalog contains invalid products', problems);
  }

  const seen = new Set<string>();
  for (const product of result.data) {
    if (seen.has(product.id)) throw new CatalogError(`Duplicate product id '${product.id}'`);
    seen.add(product.id);
  }
  return result.data;
}

function toRecord(product: Product, values: number[]): PineconeRecord {
  const metadata: RecordMetadata = {
    id: product.id,
    name: product.name,
    description: product.description,
    price: product.price,
    url: product.url,
    ...(product.category !== undefined && { category: product.category }),
  };
  return { id: product.id, values, metadata };
}

async function ingestCatalog(filePath: string, opts: { indexReady: boolean }): Promise<ReindexResult> {
  const products = await readCatalog(filePath);
  if (!products) {
    logger.warn({ path: filePath }, 'ingest.catalog_missing');
    return { ok: true, seeded: 0, note: 'catalog file not found' };
  }

  if (!opts.indexReady) await ensureIndex();

  const vectors = await embedTexts(products.map(embeddingText));
  const records = products.map((p, i) => toRecord(p, vectors[i]));
  await upsertRecords(records);

  logger.info({ path: filePath, seeded: records.length }, 'ingest.upserted');
  return { ok: true, seeded: records.length };
}

/** Embeds every catalog product and upserts it under its own id, replacing earlier copies. */
export async function upsertProducts(filePath = getConfig().catalogPath): Promise<ReindexResult> {
  return ingestCatalog(filePath, { indexReady: false });
}

/** Startup hook: fills the index from the catalog when it holds nothing yet. */
export async function seedIfEmpty(): Promise<ReindexResult | null> {
  await ensureIndex();
  const count = await countRecords();
  if (count > 0) {
    logger.info({ count }, 'ingest.seed_skipped');
    return null;
  }
  return ingestCatalog(getConfig().catalogPath, { indexReady: true });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  upsertProducts()
    .then((res) => {
      logger.info(res, 'Reindex complete');
    })
    .catch((e) => {
      logger.error({ err: e }, 'Reindex failed');
      process.exit(1);
    });
}
