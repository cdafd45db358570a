import { Router } from 'express';
import { upsertProducts } from '../ingestion.js';

const router = Router();

// POST /reindex - re-embed and upsert every product in the catalog file
router.post('/', async (_req, res) => {
  const result = await upsertProducts();
  res.json(result);
});

export default router;
