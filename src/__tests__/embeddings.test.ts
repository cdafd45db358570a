import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../config.js';
import { createEmbeddings } from '../embeddings.js';

describe('createEmbeddings', () => {
  it('uses Ollama for the local backend', () => {
    const { embeddings } = loadConfig({ PINECONE_API_KEY: 'test-key' });
    expect(createEmbeddings(embeddings)).toBeInstanceOf(OllamaEmbeddings);
  });

  it('uses OpenAI for the openai backend', () => {
    const { embeddings } = loadConfig({
      PINECONE_API_KEY: 'test-key',
      EMBEDDINGS_BACKEND: 'openai',
      OPENAI_API_KEY: 'test-openai-key',
    });
    const model = createEmbeddings(embeddings);
    expect(model).toBeInstanceOf(OpenAIEmbeddings);
    expect(model).toHaveProperty('model', 'text-embedding-3-small');
  });
});
