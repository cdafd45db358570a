import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../products.json');

// Output sizes of the default models for each backend.
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'all-minilm': 384,
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
};

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    EMBEDDINGS_BACKEND: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(['local', 'openai']).default('local')
    ),
    OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
    OPENAI_EMBEDDINGS_MODEL: z.string().min(1).default('text-embedding-3-small'),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OLLAMA_EMBEDDINGS_MODEL: z.string().min(1).default('all-minilm'),
    EMBEDDINGS_DIMENSION: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
    PINECONE_API_KEY: z.preprocess(blankToUndefined, z.string({ required_error: 'PINECONE_API_KEY not set' })),
    PINECONE_INDEX: z
      .string()
      .regex(/^[a-z0-9-]+$/, 'must contain only lowercase letters, digits and hyphens')
      .default('products'),
    PINECONE_CLOUD: z.enum(['aws', 'gcp', 'azure']).default('aws'),
    PINECONE_REGION: z.string().min(1).default('us-east-1'),
    CATALOG_PATH: z.preprocess(blankToUndefined, z.string().optional()),
  })
  .superRefine((env, ctx) => {
    if (env.EMBEDDINGS_BACKEND === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when EMBEDDINGS_BACKEND=openai',
      });
    }
  });

export type EmbeddingsBackend = 'local' | 'openai';

export type Config = {
  port: number;
  catalogPath: string;
  embeddings: {
    backend: EmbeddingsBackend;
    model: string;
    dimension: number;
    openaiApiKey?: string;
    ollamaBaseUrl: string;
  };
  pinecone: {
    apiKey: string;
    index: string;
    cloud: 'aws' | 'gcp' | 'azure';
    region: string;
  };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
  const e = parsed.data;

  const model = e.EMBEDDINGS_BACKEND === 'openai' ? e.OPENAI_EMBEDDINGS_MODEL : e.OLLAMA_EMBEDDINGS_MODEL;
  const dimension = e.EMBEDDINGS_DIMENSION ?? MODEL_DIMENSIONS[model];
  if (dimension === undefined) {
    throw new ConfigError(`EMBEDDINGS_DIMENSION must be set for embedding model '${model}'`);
  }

  return {
    port: e.PORT,
    catalogPath: e.CATALOG_PATH ? path.resolve(e.CATALOG_PATH) : DEFAULT_CATALOG_PATH,
    embeddings: {
      backend: e.EMBEDDINGS_BACKEND,
      model,
      dimension,
      openaiApiKey: e.OPENAI_API_KEY,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
    },
    pinecone: {
      apiKey: e.PINECONE_API_KEY,
      index: e.PINECONE_INDEX,
      cloud: e.PINECONE_CLOUD,
      region: e.PINECONE_REGION,
    },
  };
}

let cached: Config | undefined;

export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}

export function resetConfig(): void {
  cached = undefined;
}
