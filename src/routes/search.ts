import { Router } from 'express';
import { z } from 'zod';
import { HttpError } from '../errors.js';
import { logger } from '../logger.js';
import { DEFAULT_SCORE_THRESHOLD, DEFAULT_TOP_K, searchProducts } from '../search.js';

const router = Router();

// An absent parameter takes the default; a present but blank one is an error.
const numberParam = <T extends z.ZodTypeAny>(schema: T) =>
  z.string().trim().min(1, 'Must not be blank').pipe(schema).optional();

const QuerySchema = z.object({
  q: z.string().trim().min(1),
  top_k: numberParam(z.coerce.number().int().min(1).max(100)),
  // raise to drop weaker semantic matches
  score_threshold: numberParam(z.coerce.number().min(-1).max(1)),
  category: z.string().trim().min(1).optional(),
});

// GET /search?q=&top_k=&score_threshold=&category=
router.get('/', async (req, res) => {
  const parsed = QuerySchema.safeParse(req.query);
  if (!parsed.success) {
    throw new HttpError(400, 'Invalid search parameters', parsed.error.flatten().fieldErrors);
  }
  const { q, top_k = DEFAULT_TOP_K, score_threshold = DEFAULT_SCORE_THRESHOLD, category } = parsed.data;
  logger.info({ q, top_k, score_threshold, category }, 'search.request');

  const products = await searchProducts({ q, topK: top_k, scoreThreshold: score_threshold, category });
  res.json(products);
});

export default router;
