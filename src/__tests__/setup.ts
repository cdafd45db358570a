process.env.PINECONE_API_KEY = 'test-key';
process.env.PINECONE_INDEX = 'products-test';
process.env.EMBEDDINGS_BACKEND = 'openai';
process.env.OPENAI_API_KEY = 'test-key';
process.env.LOG_LEVEL = 'silent';
delete process.env.CATALOG_PATH;
delete process.env.EMBEDDINGS_DIMENSION;
