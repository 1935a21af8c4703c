import { describe, it, expect, vi, beforeEach } from 'vitest';

type Body = Record<string, unknown>;

const mocks = vi.hoisted(() => ({
  construct: vi.fn<(options: Body) => void>(),
  getCollections: vi.fn<() => Promise<Body>>(),
  collectionExists: vi.fn<(name: string) => Promise<{ exists: boolean }>>(),
  createCollection: vi.fn<(name: string, body: Body) => Promise<boolean>>(),
  createPayloadIndex: vi.fn<(name: string, body: Body) => Promise<Body>>(),
  getCollection: vi.fn<(name: string) => Promise<Body>>(),
  upsert: vi.fn<(name: string, body: Body) => Promise<Body>>(),
  search: vi.fn<(name: string, body: Body) => Promise<Body[]>>(),
  delete: vi.fn<(name: string, body: Body) => Promise<Body>>(),
  count: vi.fn<(name: string, body: Body) => Promise<{ count: number }>>(),
}));

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: class {
    getCollections = mocks.getCollections;
    collectionExists = mocks.collectionExists;
    createCollection = mocks.createCollection;
    createPayloadIndex = mocks.createPayloadIndex;
    getCollection = mocks.getCollection;
    upsert = mocks.upsert;
    search = mocks.search;
    delete = mocks.delete;
    count = mocks.count;
    constructor(options: Body) {
      mocks.construct(options);
    }
  },
}));

import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import { NotInitializedError } from '../../lib/errors.js';
import {
  QdrantVectorStore,
  qdrantScoreToScore,
  toPointId,
  toQdrantThreshold,
} from './qdrant-vector-store.service.js';

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

function collectionInfo(size: number, distance: string): Body {
  return { status: 'green', points_count: 0, config: { params: { vectors: { size, distance } } } };
}

describe('QdrantVectorStore', () => {
  beforeEach(() => {
    for (const mock of Object.values(mocks)) {
      mock.mockReset();
    }
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  async function createStore(): Promise<QdrantVectorStore> {
    mocks.getCollections.mockResolvedValueOnce({ collections: [] });
    const store = new QdrantVectorStore({ url: 'http://qdrant.local:6333', apiKey: 'test-secret' });
    await store.initialize();
    return store;
  }

  it('connects with the configured url and key', async () => {
    const store = await createStore();

    expect(mocks.construct).toHaveBeenCalledWith({ url: 'http://qdrant.local:6333', apiKey: 'test-secret', timeout: 30000 });
    mocks.getCollections.mockRejectedValueOnce(new Error('connection refused'));
    await expect(store.healthCheck()).resolves.toBe(false);
  });

  it('reports a failed connection', async () => {
    mocks.getCollections.mockRejectedValueOnce(new Error('connection refused'));

    await expect(new QdrantVectorStore().initialize()).resolves.toBe(false);
    expect(mocks.construct).toHaveBeenCalledWith({ url: 'http://localhost:6333', apiKey: undefined, timeout: 30000 });
  });

  it('creates a collection with payload indexes', async () => {
    // Given no collection yet
    const store = await createStore();
    mocks.collectionExists.mockResolvedValueOnce({ exists: false });
    mocks.createCollection.mockResolvedValueOnce(true);
    mocks.createPayloadIndex.mockResolvedValue({ status: 'completed' });

    // When creating a euclidean collection stored on disk
    const created = await store.createIndex('docs', 4, 'euclidean', { onDisk: true });

    // Then the collection and both payload indexes exist
    expect(created).toBe(true);
    expect(mocks.createCollection).toHaveBeenCalledWith('docs', {
      vectors: { size: 4, distance: 'Euclid', on_disk: true },
      hnsw_config: { m: 16, ef_construct: 100, full_scan_threshold: 10000 },
      on_disk_payload: false,
      replication_factor: 1,
    });
    expect(mocks.createPayloadIndex.mock.calls).toEqual([
      ['docs', { field_name: 'documentId', field_schema: 'keyword', wait: true }],
      ['docs', { field_name: 'chunkIndex', field_schema: 'integer', wait: true }],
    ]);
  });

  it('leaves an existing collection alone', async () => {
    const store = await createStore();
    mocks.collectionExists.mockResolvedValueOnce({ exists: true });

    await expect(store.createIndex('docs', 4)).resolves.toBe(true);
    expect(mocks.createCollection).not.toHaveBeenCalled();
  });

  it('upserts points keyed by a uuid derived from the chunk id', async () => {
    const store = await createStore();
    mocks.getCollection.mockResolvedValueOnce(collectionInfo(2, 'Cosine'));
    mocks.upsert.mockResolvedValueOnce({ status: 'completed' });

    const result = await store.indexChunks('docs', [chunk(0, [1, 0])]);

    expect(result).toEqual({ success: true, indexedCount: 1, failedCount: 0, errors: [] });
    expect(mocks.upsert).toHaveBeenCalledWith('docs', {
      wait: true,
      points: [
        {
          id: toPointId('doc-1:chunk:0'),
          vector: [1, 0],
          payload: {
            chunkId: 'doc-1:chunk:0',
            documentId: 'doc-1',
            chunkIndex: 0,
            content: 'part 0',
            createdAt: '2024-01-01T00:00:00.000Z',
            metadata: { startChar: 0, endChar: 6, charCount: 6, wordCount: 2, chunkingStrategy: 'fixed' },
          },
        },
      ],
    });
  });

  it('derives stable version 5 point ids', () => {
    const id = toPointId('doc-1:chunk:0');

    expect(id).toBe(toPointId('doc-1:chunk:0'));
    expect(id).not.toBe(toPointId('doc-1:chunk:1'));
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('records a failed upsert as a failed batch', async () => {
    const store = await createStore();
    mocks.getCollection.mockResolvedValueOnce(collectionInfo(2, 'Cosine'));
    mocks.upsert.mockRejectedValueOnce(new Error('Bad Request'));

    const result = await store.indexChunks('docs', [chunk(0, [1, 0]), chunk(1, [0, 1])]);

    expect(result).toEqual({ success: false, indexedCount: 0, failedCount: 2, errors: ['Batch 1: Bad Request'] });
  });

  it('pushes filters and the raw threshold down to Qdrant', async () => {
    // Given a euclidean collection returning a point at distance 1
    const store = await createStore();
    mocks.getCollection.mockResolvedValueOnce(collectionInfo(2, 'Euclid'));
    mocks.search.mockResolvedValueOnce([
      {
        id: toPointId('doc-1:chunk:0'),
        version: 1,
        score: 1,
        payload: { chunkId: 'doc-1:chunk:0', documentId: 'doc-1', chunkIndex: 0, content: 'part 0', metadata: { lang: 'en' } },
      },
    ]);

    // When searching with a 0.4 threshold
    const results = await store.search('docs', [1, 0], { limit: 3, threshold: 0.4, filters: { documentId: 'doc-1', lang: 'en' } });

    // Then the score is 1 / (1 + 1) and the request carries the filter
    expect(results).toEqual([
      { chunkId: 'doc-1:chunk:0', documentId: 'doc-1', content: 'part 0', score: 0.5, metadata: { lang: 'en' }, chunkIndex: 0 },
    ]);
    const request = mocks.search.mock.calls[0]?.[1];
    expect(request).toMatchObject({
      vector: [1, 0],
      limit: 3,
      with_payload: true,
      filter: {
        must: [
          { key: 'documentId', match: { value: 'doc-1' } },
          { key: 'metadata.lang', match: { value: 'en' } },
        ],
      },
    });
    expect(request?.['score_threshold']).toBeCloseTo(1.5);
  });

  it('returns no results for a missing collection', async () => {
    const store = await createStore();
    mocks.getCollection.mockRejectedValueOnce(Object.assign(new Error('Not Found'), { status: 404 }));
    mocks.search.mockRejectedValueOnce(Object.assign(new Error('Not Found'), { status: 404 }));

    await expect(store.search('missing', [1, 0])).resolves.toEqual([]);
  });

  it('deletes and counts with a document filter', async () => {
    const store = await createStore();
    mocks.delete.mockResolvedValueOnce({ status: 'completed' });
    mocks.count.mockResolvedValueOnce({ count: 3 });
    mocks.count.mockRejectedValueOnce(new Error('timeout'));

    await expect(store.deleteByDocumentId('docs', 'doc-1')).resolves.toBe(true);
    await expect(store.getDocumentCount('docs', 'doc-1')).resolves.toBe(3);
    await expect(store.getDocumentCount('docs')).resolves.toBe(0);

    const filter = { must: [{ key: 'documentId', match: { value: 'doc-1' } }] };
    expect(mocks.delete).toHaveBeenCalledWith('docs', { wait: true, filter });
    expect(mocks.count.mock.calls).toEqual([
      ['docs', { exact: true, filter }],
      ['docs', { exact: true }],
    ]);
  });

  it('forgets the client on close', async () => {
    const store = await createStore();

    await store.close();

    await expect(store.search('docs', [1, 0])).rejects.toThrow(NotInitializedError);
  });
});

describe('Qdrant score conversion', () => {
  it('normalises raw scores per metric', () => {
    expect(qdrantScoreToScore(0.5, DistanceMetricEnum.COSINE)).toBe(0.75);
    expect(qdrantScoreToScore(-1, DistanceMetricEnum.DOT_PRODUCT)).toBe(0);
    expect(qdrantScoreToScore(3, DistanceMetricEnum.MANHATTAN)).toBe(0.25);
  });

  it('maps a normalised threshold onto the raw scale', () => {
    expect(toQdrantThreshold(0.7, DistanceMetricEnum.COSINE)).toBeCloseTo(0.4);
    expect(toQdrantThreshold(0.5, DistanceMetricEnum.EUCLIDEAN)).toBe(1);
    expect(toQdrantThreshold(0, DistanceMetricEnum.COSINE)).toBeUndefined();
  });
});
