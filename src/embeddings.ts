import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import type { Config } from './config.js';

/**
 * Builds the embedding model for the configured backend.
 *
 * `local` talks to an Ollama server on the host, `openai` calls the OpenAI
 * embeddings API.
 */
export function createEmbeddings(cfg: Config['embeddings']): EmbeddingsInterface {
  if (cfg.backend === 'openai') {
    return new OpenAIEmbeddings({
      model: cfg.model,
      apiKey: cfg.openaiApiKey,
    });
  }
  return new OllamaEmbeddings({
    model: cfg.model,
    baseUrl: cfg.ollamaBaseUrl,
  });
}
