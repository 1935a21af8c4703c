import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchResult } from '../../interfaces/search-result.interface.js';
import { NotInitializedError } from '../../lib/errors.js';
import { normalizeDistanceMetric } from '../../lib/utils/distance-metric.util.js';
import {
  cosineSimilarity,
  cosineToScore,
  distanceToScore,
  dotProduct,
  euclideanDistance,
  innerProductToScore,
  manhattanDistance,
} from '../../lib/utils/vector.util.js';
import {
  BaseVectorStore,
  type BatchWriteOutcome,
  type ResolvedSearchOptions,
} from './base-vector-store.service.js';

interface MemoryIndex {
  dimension: number;
  metric: DistanceMetricEnum;
  records: Map<string, ChunkWithEmbedding>;
}

class MissingIndexError extends Error {
  constructor(indexName: string) {
    super(`Index ${indexName} does not exist`);
    this.name = 'MissingIndexError';
  }
}

/**
 * In-process vector store with exact (brute-force) search
 */
export class MemoryVectorStore extends BaseVectorStore {
  private indexes?: Map<string, MemoryIndex>;

  constructor() {
    super(VectorStoreProviderEnum.MEMORY);
  }

  async initialize(): Promise<boolean> {
    this.indexes ??= new Map();
    return true;
  }

  async createIndex(
    indexName: string,
    dimension: number,
    distanceMetric: string = DistanceMetricEnum.COSINE
  ): Promise<boolean> {
    const indexes = this.requireIndexes();
    try {
      const metric = normalizeDistanceMetric(distanceMetric);
      if (!indexes.has(indexName)) {
        indexes.set(indexName, { dimension, metric, records: new Map() });
        this.rememberMetric(indexName, metric);
        this.logger.info(`Created index ${indexName} (${dimension} dimensions, ${metric})`);
      }
      return true;
    } catch (error) {
      this.logger.error(`Failed to create index ${indexName}`, error);
      return false;
    }
  }

  async indexExists(indexName: string): Promise<boolean> {
    return this.requireIndexes().has(indexName);
  }

  async deleteByDocumentId(indexName: string, documentId: string): Promise<boolean> {
    const index = this.requireIndexes().get(indexName);
    if (!index) {
      this.logger.warn(`Index ${indexName} does not exist`);
      return false;
    }
    for (const [chunkId, record] of index.records) {
      if (record.documentId === documentId) {
        index.records.delete(chunkId);
      }
    }
    return true;
  }

  async getDocumentCount(indexName: string, documentId?: string): Promise<number> {
    const index = this.requireIndexes().get(indexName);
    if (!index) {
      return 0;
    }
    if (documentId === undefined) {
      return index.records.size;
    }
    let count = 0;
    for (const record of index.records.values()) {
      if (record.documentId === documentId) count++;
    }
    return count;
  }

  async healthCheck(): Promise<boolean> {
    return this.isInitialized();
  }

  async close(): Promise<void> {
    this.indexes = undefined;
    this.forgetIndexes();
  }

  protected isInitialized(): boolean {
    return this.indexes !== undefined;
  }

  protected override async getIndexDimension(indexName: string): Promise<number | undefined> {
    return this.requireIndexes().get(indexName)?.dimension;
  }

  protected override isMissingIndexError(error: unknown): boolean {
    return error instanceof MissingIndexError;
  }

  protected async writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome> {
    const index = this.requireIndexes().get(indexName);
    if (!index) {
      throw new MissingIndexError(indexName);
    }
    for (const chunk of batch) {
      index.records.set(chunk.chunkId, { ...chunk, embedding: [...chunk.embedding] });
    }
    return { indexedCount: batch.length, errors: [] };
  }

  protected async searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]> {
    const index = this.requireIndexes().get(indexName);
    if (!index) {
      throw new MissingIndexError(indexName);
    }

    const results: SearchResult[] = [];
    for (const record of index.records.values()) {
      if (!matchesFilters(record, options.filters)) {
        continue;
      }
      results.push({
        chunkId: record.chunkId,
        documentId: record.documentId,
        content: record.content,
        score: score(index.metric, queryVector, record.embedding),
        metadata: { ...record.metadata },
        chunkIndex: record.chunkIndex,
      });
    }
    return results;
  }

  private requireIndexes(): Map<string, MemoryIndex> {
    if (!this.indexes) {
      throw new NotInitializedError('MemoryVectorStore');
    }
    return this.indexes;
  }
}

function score(metric: DistanceMetricEnum, query: number[], embedding: number[]): number {
  switch (metric) {
    case DistanceMetricEnum.COSINE:
      return cosineToScore(cosineSimilarity(query, embedding));
    case DistanceMetricEnum.EUCLIDEAN:
      return distanceToScore(euclideanDistance(query, embedding));
    case DistanceMetricEnum.DOT_PRODUCT:
      return innerProductToScore(dotProduct(query, embedding));
    case DistanceMetricEnum.MANHATTAN:
      return distanceToScore(manhattanDistance(query, embedding));
  }
}

function matchesFilters(record: ChunkWithEmbedding, filters?: MetadataFilter): boolean {
  if (!filters) {
    return true;
  }
  return Object.entries(filters).every(([key, value]) => {
    switch (key) {
      case 'documentId':
        return record.documentId === value;
      case 'chunkId':
        return record.chunkId === value;
      case 'chunkIndex':
        return record.chunkIndex === value;
      default:
        return record.metadata[key] === value;
    }
  });
}
