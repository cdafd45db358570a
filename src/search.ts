import { ProductSchema, type Product } from './ingestion.js';
import { logger } from './logger.js';
import { extractPriceFilters } from './priceFilters.js';
import { embedText, queryByVector, type MetadataFilter } from './vector.js';

// Candidate pool pulled from the index before the score threshold is applied.
const MIN_CANDIDATES = 12;

export const DEFAULT_TOP_K = 8;
export const DEFAULT_SCORE_THRESHOLD = 0.2;

export type SearchParams = {
  q: string;
  topK?: number;
  scoreThreshold?: number;
  category?: string;
};

export function buildMetadataFilter(opts: {
  minPrice?: number;
  maxPrice?: number;
  category?: string;
}): MetadataFilter | undefined {
  const filter: MetadataFilter = {};
  if (opts.minPrice !== undefined || opts.maxPrice !== undefined) {
    filter.price = {
      ...(opts.minPrice !== undefined && { $gte: opts.minPrice }),
      ...(opts.maxPrice !== undefined && { $lte: opts.maxPrice }),
    };
  }
  if (opts.category) filter.category = { $eq: opts.category };
  return Object.keys(filter).length ? filter : undefined;
}

/**
 * Semantic product search. Price phrases in `q` ("under 10 dollars", "5-10",
 * "premium") become a metadata filter and are stripped before embedding.
 * Results are the stored payloads, best match first.
 */
export async function searchProducts({
  q,
  topK = DEFAULT_TOP_K,
  scoreThreshold = DEFAULT_SCORE_THRESHOLD,
  category,
}: SearchParams): Promise<Product[]> {
  const { query, minPrice, maxPrice } = extractPriceFilters(q);
  const filter = buildMetadataFilter({ minPrice, maxPrice, category });

  const vector = await embedText(query);
  const { matches } = await queryByVector(vector, Math.max(topK, MIN_CANDIDATES), filter);

  const products: Product[] = [];
  for (const m of matches) {
    if (m.score < scoreThreshold) continue;
    const parsed = ProductSchema.safeParse(m.metadata);
    if (!parsed.success) {
      logger.warn({ id: m.id }, 'search.invalid_payload');
      continue;
    }
    products.push(parsed.data);
    if (products.length >= topK) break;
  }

  logger.info({ q, query, minPrice, maxPrice, category, returned: products.length }, 'search.done');
  return products;
}
