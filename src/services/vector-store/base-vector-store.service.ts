import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import type { BatchIndexResult } from '../../interfaces/batch-index-result.interface.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchOptions, SearchResult } from '../../interfaces/search-result.interface.js';
import type { CreateIndexOptions } from '../../interfaces/vector-store-config.interface.js';
import { NotInitializedError, formatError } from '../../lib/errors.js';
import { toBatches } from '../../lib/utils/async.util.js';
import { Logger } from '../../lib/utils/logger.util.js';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_SEARCH_THRESHOLD = 0.7;
export const DEFAULT_INDEX_BATCH_SIZE = 100;

export interface ResolvedSearchOptions {
  limit: number;
  threshold: number;
  filters?: MetadataFilter;
}

/**
 * Outcome of writing one batch; every error string stands for one failed chunk
 */
export interface BatchWriteOutcome {
  indexedCount: number;
  errors: string[];
}

/**
 * Common contract for vector stores. Scores returned by `search` are
 * normalised to [0, 1] with higher meaning more similar.
 */
export abstract class BaseVectorStore {
  protected readonly logger: Logger;
  private readonly indexMetrics = new Map<string, DistanceMetricEnum>();

  constructor(providerName: string) {
    this.logger = Logger.getInstance(`vector-store:${providerName}`);
  }

  /**
   * Connect to the backend
   * @returns true when the backend is reachable
   */
  abstract initialize(): Promise<boolean>;

  /**
   * Create an index if it does not exist yet
   * @param indexName - Index, table or collection name
   * @param dimension - Vector dimension
   * @param distanceMetric - 'cosine', 'euclidean', 'dot_product', 'manhattan' or an alias
   * @param options - Backend-specific index settings
   * @returns false when creation failed
   */
  abstract createIndex(
    indexName: string,
    dimension: number,
    distanceMetric?: string,
    options?: CreateIndexOptions
  ): Promise<boolean>;

  abstract indexExists(indexName: string): Promise<boolean>;

  /**
   * Delete every chunk of a document
   * @returns false when deletion failed
   */
  abstract deleteByDocumentId(indexName: string, documentId: string): Promise<boolean>;

  /**
   * Count chunks in an index, optionally for one document; 0 on failure
   */
  abstract getDocumentCount(indexName: string, documentId?: string): Promise<number>;

  abstract healthCheck(): Promise<boolean>;

  abstract close(): Promise<void>;

  protected abstract isInitialized(): boolean;

  /**
   * Upsert one batch of chunks keyed by chunkId
   */
  protected abstract writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome>;

  /**
   * Backend query returning normalised scores
   */
  protected abstract searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]>;

  /**
   * Upsert chunks in sequential batches. A failing batch is recorded and the
   * remaining batches still run.
   */
  async indexChunks(
    indexName: string,
    chunks: ChunkWithEmbedding[],
    batchSize: number = DEFAULT_INDEX_BATCH_SIZE
  ): Promise<BatchIndexResult> {
    this.ensureInitialized();
    if (chunks.length === 0) {
      return { success: true, indexedCount: 0, failedCount: 0, errors: [] };
    }

    const dimension = await this.getIndexDimension(indexName);
    let indexedCount = 0;
    let failedCount = 0;
    const errors: string[] = [];

    const batches = toBatches(chunks, batchSize);
    for (const [i, batch] of batches.entries()) {
      const batchNumber = i + 1;
      const valid: ChunkWithEmbedding[] = [];
      for (const chunk of batch) {
        if (dimension !== undefined && chunk.embedding.length !== dimension) {
          failedCount++;
          errors.push(
            `Chunk ${chunk.chunkId}: embedding dimension ${chunk.embedding.length} does not match index dimension ${dimension}`
          );
        } else {
          valid.push(chunk);
        }
      }
      if (valid.length === 0) {
        continue;
      }

      try {
        const outcome = await this.writeBatch(indexName, valid);
        indexedCount += outcome.indexedCount;
        failedCount += outcome.errors.length;
        errors.push(...outcome.errors);
        this.logger.debug(`Indexed batch ${batchNumber}/${batches.length} into ${indexName}`);
      } catch (error) {
        failedCount += valid.length;
        errors.push(`Batch ${batchNumber}: ${formatError(error)}`);
        this.logger.error(`Failed to index batch ${batchNumber} into ${indexName}`, error);
      }
    }

    this.logger.info(`Indexed ${indexedCount} chunks into ${indexName} (${failedCount} failed)`);
    return { success: failedCount === 0, indexedCount, failedCount, errors };
  }

  /**
   * Nearest chunks to a query vector, best first. Never throws for backend
   * failures or a missing index; returns [] instead.
   */
  async search(indexName: string, queryVector: number[], options: SearchOptions = {}): Promise<SearchResult[]> {
    this.ensureInitialized();
    const resolved: ResolvedSearchOptions = {
      limit: options.limit ?? DEFAULT_SEARCH_LIMIT,
      threshold: options.threshold ?? DEFAULT_SEARCH_THRESHOLD,
      filters: options.filters,
    };

    try {
      const results = await this.searchIndex(indexName, queryVector, resolved);
      return results
        .filter((result) => result.score >= resolved.threshold)
        .sort((a, b) => b.score - a.score)
        .slice(0, resolved.limit);
    } catch (error) {
      if (this.isMissingIndexError(error)) {
        this.logger.warn(`Index ${indexName} does not exist`);
      } else {
        this.logger.error(`Search failed in ${indexName}`, error);
      }
      return [];
    }
  }

  /**
   * Dimension of an existing index, when the backend can tell
   */
  protected async getIndexDimension(_indexName: string): Promise<number | undefined> {
    return undefined;
  }

  protected isMissingIndexError(_error: unknown): boolean {
    return false;
  }

  protected rememberMetric(indexName: string, metric: DistanceMetricEnum): void {
    this.indexMetrics.set(indexName, metric);
  }

  /**
   * Metric of an index: cached from createIndex, else asked from the backend, else cosine
   */
  protected async resolveMetric(indexName: string): Promise<DistanceMetricEnum> {
    const cached = this.indexMetrics.get(indexName);
    if (cached) {
      return cached;
    }
    const fetched = await this.fetchIndexMetric(indexName);
    if (fetched) {
      this.indexMetrics.set(indexName, fetched);
      return fetched;
    }
    return DistanceMetricEnum.COSINE;
  }

  protected async fetchIndexMetric(_indexName: string): Promise<DistanceMetricEnum | undefined> {
    return undefined;
  }

  protected forgetIndexes(): void {
    this.indexMetrics.clear();
  }

  protected ensureInitialized(): void {
    if (!this.isInitialized()) {
      throw new NotInitializedError(this.constructor.name);
    }
  }
}
