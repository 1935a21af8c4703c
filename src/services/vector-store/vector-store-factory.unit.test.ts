import { describe, it, expect, vi, beforeEach } from 'vitest';

import { ConfigurationError } from '../../lib/errors.js';
import { MemoryVectorStore } from './memory-vector-store.service.js';
import { OpenSearchVectorStore } from './opensearch-vector-store.service.js';
import { PgVectorStore } from './pgvector-vector-store.service.js';
import { PineconeVectorStore } from './pinecone-vector-store.service.js';
import { QdrantVectorStore } from './qdrant-vector-store.service.js';
import { VectorStoreFactory } from './vector-store-factory.service.js';

describe('VectorStoreFactory', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('registers the built-in backends on load', () => {
    expect(VectorStoreFactory.getSupportedTypes()).toEqual(
      expect.arrayContaining(['opensearch', 'pgvector', 'qdrant', 'pinecone', 'memory'])
    );
  });

  it('creates backends by name, ignoring case', () => {
    expect(VectorStoreFactory.create('opensearch', { endpoint: 'http://localhost:9200' })).toBeInstanceOf(
      OpenSearchVectorStore
    );
    expect(VectorStoreFactory.create('PGVector', { password: 'test-secret' })).toBeInstanceOf(PgVectorStore);
    expect(VectorStoreFactory.create('qdrant')).toBeInstanceOf(QdrantVectorStore);
    expect(VectorStoreFactory.create('pinecone', { apiKey: 'test-secret' })).toBeInstanceOf(PineconeVectorStore);
    expect(VectorStoreFactory.create('memory')).toBeInstanceOf(MemoryVectorStore);
  });

  it('passes configuration errors through', () => {
    expect(() => VectorStoreFactory.create('opensearch')).toThrow('OpenSearch endpoint is required');
  });

  it('rejects an unknown backend and lists the supported ones', () => {
    expect(() => VectorStoreFactory.create('chroma')).toThrow(ConfigurationError);
    expect(() => VectorStoreFactory.create('chroma')).toThrow(
      /^Unsupported vector store type: chroma\. Supported types: .*qdrant/
    );
  });

  it('accepts custom backends', () => {
    class CustomStore extends MemoryVectorStore {}
    VectorStoreFactory.registerStore('Custom', CustomStore);

    expect(VectorStoreFactory.create('custom')).toBeInstanceOf(CustomStore);
    expect(VectorStoreFactory.getSupportedTypes()).toContain('custom');
  });
});
