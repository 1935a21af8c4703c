import { describe, it, expect, vi, beforeEach } from 'vitest';

type Body = Record<string, unknown>;

const mocks = vi.hoisted(() => ({
  listIndexes: vi.fn<() => Promise<{ indexes?: { name: string }[] }>>(),
  createIndex: vi.fn<(options: Body) => Promise<void>>(),
  describeIndex: vi.fn<(name: string) => Promise<{ name: string; dimension: number; metric: string }>>(),
  selectIndex: vi.fn<(name: string, namespace: string) => void>(),
  upsert: vi.fn<(records: Body[]) => Promise<void>>(),
  query: vi.fn<(options: Body) => Promise<{ matches?: Body[] }>>(),
  listPaginated: vi.fn<(options: Body) => Promise<Body>>(),
  deleteMany: vi.fn<(ids: string[]) => Promise<void>>(),
  describeIndexStats: vi.fn<() => Promise<Body>>(),
}));

vi.mock('@pinecone-database/pinecone', () => ({
  Pinecone: class {
    listIndexes = mocks.listIndexes;
    createIndex = mocks.createIndex;
    describeIndex = mocks.describeIndex;
    Index(name: string) {
      return {
        namespace: (namespace: string) => {
          mocks.selectIndex(name, namespace);
          return {
            upsert: mocks.upsert,
            query: mocks.query,
            listPaginated: mocks.listPaginated,
            deleteMany: mocks.deleteMany,
            describeIndexStats: mocks.describeIndexStats,
          };
        },
      };
    }
  },
}));

import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import { ConfigurationError } from '../../lib/errors.js';
import { PineconeVectorStore, pineconeScoreToScore, toPineconeMetadata } from './pinecone-vector-store.service.js';

function chunk(chunkIndex: number, embedding: number[]): ChunkWithEmbedding {
  return {
    chunkId: `doc-1:chunk:${chunkIndex}`,
    documentId: 'doc-1',
    chunkIndex,
    content: `part ${chunkIndex}`,
    metadata: { startChar: 0, endChar: 6, charCount: 6, wordCount: 2, chunkingStrategy: 'fixed' },
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    embedding,
  };
}

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('PineconeVectorStore', () => {
  beforeEach(() => {
    for (const mock of Object.values(mocks)) {
      mock.mockReset();
    }
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  async function createStore(): Promise<PineconeVectorStore> {
    mocks.listIndexes.mockResolvedValueOnce({ indexes: [] });
    const store = new PineconeVectorStore({ apiKey: 'test-secret', namespace: 'tenant-a' });
    await store.initialize();
    return store;
  }

  it('requires an API key', () => {
    expect(() => new PineconeVectorStore()).toThrow(ConfigurationError);
    expect(() => new PineconeVectorStore({ apiKey: '' })).toThrow('Pinecone API key is required');
  });

  it('creates a serverless index', async () => {
    const store = await createStore();
    mocks.createIndex.mockResolvedValueOnce(undefined);

    await expect(store.createIndex('docs', 3, 'cosine', { region: 'eu-west-1' })).resolves.toBe(true);

    expect(mocks.createIndex).toHaveBeenCalledWith({
      name: 'docs',
      dimension: 3,
      metric: 'cosine',
      spec: { serverless: { cloud: 'aws', region: 'eu-west-1' } },
      waitUntilReady: true,
      suppressConflicts: true,
    });
  });

  it('does not support manhattan', async () => {
    const store = await createStore();

    await expect(store.createIndex('docs', 3, 'manhattan')).resolves.toBe(false);
    expect(mocks.createIndex).not.toHaveBeenCalled();
  });

  it('checks existence through the index list', async () => {
    const store = await createStore();
    mocks.listIndexes.mockResolvedValueOnce({ indexes: [{ name: 'docs' }] });
    mocks.listIndexes.mockResolvedValueOnce({});

    await expect(store.indexExists('docs')).resolves.toBe(true);
    await expect(store.indexExists('docs')).resolves.toBe(false);
  });

  it('upserts records in the configured namespace', async () => {
    const store = await createStore();
    mocks.describeIndex.mockResolvedValueOnce({ name: 'docs', dimension: 2, metric: 'cosine' });
    mocks.upsert.mockResolvedValueOnce(undefined);

    const result = await store.indexChunks('docs', [chunk(0, [1, 0])]);

    expect(result).toEqual({ success: true, indexedCount: 1, failedCount: 0, errors: [] });
    expect(mocks.selectIndex).toHaveBeenCalledWith('docs', 'tenant-a');
    expect(mocks.upsert).toHaveBeenCalledWith([
      {
        id: 'doc-1:chunk:0',
        values: [1, 0],
        metadata: {
          startChar: 0,
          endChar: 6,
          charCount: 6,
          wordCount: 2,
          chunkingStrategy: 'fixed',
          chunkId: 'doc-1:chunk:0',
          documentId: 'doc-1',
          chunkIndex: 0,
          content: 'part 0',
          createdAt: '2024-01-01T00:00:00.000Z',
        },
      },
    ]);
  });

  it('searches and strips reserved keys from the returned metadata', async () => {
    // Given a dotproduct index
    const store = await createStore();
    mocks.describeIndex.mockResolvedValueOnce({ name: 'docs', dimension: 2, metric: 'dotproduct' });
    mocks.query.mockResolvedValueOnce({
      matches: [
        {
          id: 'doc-1:chunk:0',
          score: 0.5,
          metadata: {
            chunkId: 'doc-1:chunk:0',
            documentId: 'doc-1',
            chunkIndex: 0,
            content: 'part 0',
            createdAt: '2024-01-01T00:00:00.000Z',
            lang: 'en',
          },
        },
      ],
    });

    // When searching with a metadata filter
    const results = await store.search('docs', [1, 0], { filters: { lang: 'en' } });

    // Then the inner product 0.5 scores 0.75
    expect(results).toEqual([
      { chunkId: 'doc-1:chunk:0', documentId: 'doc-1', content: 'part 0', score: 0.75, metadata: { lang: 'en' }, chunkIndex: 0 },
    ]);
    expect(mocks.query).toHaveBeenCalledWith({
      vector: [1, 0],
      topK: 10,
      includeMetadata: true,
      filter: { lang: { $eq: 'en' } },
    });
  });

  it('returns no results for a missing index', async () => {
    const store = await createStore();
    mocks.describeIndex.mockRejectedValueOnce(namedError('PineconeNotFoundError', 'index docs not found'));

    await expect(store.search('docs', [1, 0])).resolves.toEqual([]);
    expect(mocks.query).not.toHaveBeenCalled();
  });

  it('deletes every page of a document by id prefix', async () => {
    // Given a document whose chunk ids span two pages
    const store = await createStore();
    mocks.listPaginated.mockResolvedValueOnce({
      vectors: [{ id: 'doc-1:chunk:0' }, { id: 'doc-1:chunk:1' }],
      pagination: { next: 'page-2' },
    });
    mocks.listPaginated.mockResolvedValueOnce({ vectors: [{ id: 'doc-1:chunk:2' }] });
    mocks.deleteMany.mockResolvedValueOnce(undefined);

    // When deleting the document
    const deleted = await store.deleteByDocumentId('docs', 'doc-1');

    // Then all ids are deleted in one call
    expect(deleted).toBe(true);
    expect(mocks.listPaginated.mock.calls).toEqual([
      [{ prefix: 'doc-1:chunk:', paginationToken: undefined }],
      [{ prefix: 'doc-1:chunk:', paginationToken: 'page-2' }],
    ]);
    expect(mocks.deleteMany).toHaveBeenCalledWith(['doc-1:chunk:0', 'doc-1:chunk:1', 'doc-1:chunk:2']);
  });

  it('counts a document by prefix and the namespace from index stats', async () => {
    const store = await createStore();
    mocks.listPaginated.mockResolvedValueOnce({ vectors: [{ id: 'doc-1:chunk:0' }] });
    mocks.describeIndexStats.mockResolvedValueOnce({ namespaces: { 'tenant-a': { recordCount: 12 } }, totalRecordCount: 40 });
    mocks.describeIndexStats.mockRejectedValueOnce(new Error('timeout'));

    await expect(store.getDocumentCount('docs', 'doc-1')).resolves.toBe(1);
    await expect(store.getDocumentCount('docs')).resolves.toBe(12);
    await expect(store.getDocumentCount('docs')).resolves.toBe(0);
  });
});

describe('toPineconeMetadata', () => {
  it('flattens caller metadata and lets the chunk fields win', () => {
    const base = chunk(2, [1]);
    const metadata = toPineconeMetadata({
      ...base,
      metadata: { ...base.metadata, tags: ['a', 'b'], owner: { team: 'ops' }, note: null, content: 'caller value' },
    });

    expect(metadata).toEqual({
      startChar: 0,
      endChar: 6,
      charCount: 6,
      wordCount: 2,
      chunkingStrategy: 'fixed',
      tags: ['a', 'b'],
      owner: '{"team":"ops"}',
      chunkId: 'doc-1:chunk:2',
      documentId: 'doc-1',
      chunkIndex: 2,
      content: 'part 2',
      createdAt: '2024-01-01T00:00:00.000Z',
    });
  });
});

describe('pineconeScoreToScore', () => {
  it('normalises per metric', () => {
    expect(pineconeScoreToScore(0, DistanceMetricEnum.COSINE)).toBe(0.5);
    expect(pineconeScoreToScore(1, DistanceMetricEnum.EUCLIDEAN)).toBe(0.5);
  });
});
