import { QdrantClient } from '@qdrant/js-client-rest';
import { v5 as uuidv5 } from 'uuid';
import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchResult } from '../../interfaces/search-result.interface.js';
import type { CreateIndexOptions, QdrantStoreConfig } from '../../interfaces/vector-store-config.interface.js';
import { NotInitializedError, formatError } from '../../lib/errors.js';
import { normalizeDistanceMetric } from '../../lib/utils/distance-metric.util.js';
import { readNumber, readPath, readString, toMetadata } from '../../lib/utils/object.util.js';
import {
  cosineToScore,
  distanceToScore,
  innerProductToScore,
  scoreToCosine,
  scoreToDistance,
} from '../../lib/utils/vector.util.js';
import {
  BaseVectorStore,
  type BatchWriteOutcome,
  type ResolvedSearchOptions,
} from './base-vector-store.service.js';

export const DEFAULT_QDRANT_URL = 'http://localhost:6333';

/** Namespace for deriving point ids from chunk ids */
export const POINT_ID_NAMESPACE = '3f1b6c52-8d2e-4a57-9c0b-7e4d1a9f2c68';

const TOP_LEVEL_FIELDS = new Set(['documentId', 'chunkId', 'chunkIndex']);

type QdrantDistance = 'Cosine' | 'Euclid' | 'Dot' | 'Manhattan';

const QDRANT_DISTANCES: Record<DistanceMetricEnum, QdrantDistance> = {
  [DistanceMetricEnum.COSINE]: 'Cosine',
  [DistanceMetricEnum.EUCLIDEAN]: 'Euclid',
  [DistanceMetricEnum.DOT_PRODUCT]: 'Dot',
  [DistanceMetricEnum.MANHATTAN]: 'Manhattan',
};

/**
 * Qdrant accepts only UUIDs and integers as point ids
 */
export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

/**
 * Raw Qdrant score to [0, 1]. Euclid and Manhattan scores are distances.
 */
export function qdrantScoreToScore(score: number, metric: DistanceMetricEnum): number {
  switch (metric) {
    case DistanceMetricEnum.COSINE:
      return cosineToScore(score);
    case DistanceMetricEnum.DOT_PRODUCT:
      return innerProductToScore(score);
    case DistanceMetricEnum.EUCLIDEAN:
    case DistanceMetricEnum.MANHATTAN:
      return distanceToScore(score);
  }
}

/**
 * Normalised threshold on Qdrant's raw scale; undefined when it admits everything
 */
export function toQdrantThreshold(threshold: number, metric: DistanceMetricEnum): number | undefined {
  if (threshold <= 0) {
    return undefined;
  }
  switch (metric) {
    case DistanceMetricEnum.COSINE:
    case DistanceMetricEnum.DOT_PRODUCT:
      return scoreToCosine(threshold);
    case DistanceMetricEnum.EUCLIDEAN:
    case DistanceMetricEnum.MANHATTAN:
      return scoreToDistance(threshold);
  }
}

function toQdrantFilter(filters: MetadataFilter | undefined) {
  const entries = Object.entries(filters ?? {});
  if (entries.length === 0) {
    return undefined;
  }
  return {
    must: entries.map(([key, value]) => ({
      key: TOP_LEVEL_FIELDS.has(key) ? key : `metadata.${key}`,
      match: { value },
    })),
  };
}

function documentFilter(documentId: string) {
  return { must: [{ key: 'documentId', match: { value: documentId } }] };
}

function fromQdrantDistance(distance: unknown): DistanceMetricEnum | undefined {
  for (const [metric, name] of Object.entries(QDRANT_DISTANCES)) {
    if (name === distance) {
      return normalizeDistanceMetric(metric);
    }
  }
  return undefined;
}

/**
 * Vector store on Qdrant collections. Chunk fields travel in the point payload.
 */
export class QdrantVectorStore extends BaseVectorStore {
  private client?: QdrantClient;
  private readonly config: QdrantStoreConfig;

  constructor(config: QdrantStoreConfig = {}) {
    super(VectorStoreProviderEnum.QDRANT);
    this.config = config;
  }

  async initialize(): Promise<boolean> {
    try {
      const { url = DEFAULT_QDRANT_URL, apiKey, timeoutMs = 30_000 } = this.config;
      this.client = new QdrantClient({ url, apiKey, timeout: timeoutMs });

      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info(`Connected to Qdrant at ${url}`);
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize Qdrant vector store', error);
      return false;
    }
  }

  async createIndex(
    indexName: string,
    dimension: number,
    distanceMetric: string = DistanceMetricEnum.COSINE,
    options: CreateIndexOptions = {}
  ): Promise<boolean> {
    const client = this.requireClient();
    try {
      const metric = normalizeDistanceMetric(distanceMetric);
      if (await this.indexExists(indexName)) {
        this.logger.info(`Collection ${indexName} already exists`);
        return true;
      }

      await client.createCollection(indexName, {
        vectors: {
          size: dimension,
          distance: QDRANT_DISTANCES[metric],
          on_disk: options.onDisk ?? false,
        },
        hnsw_config: {
          m: options.hnswM ?? 16,
          ef_construct: options.hnswEfConstruct ?? 100,
          full_scan_threshold: options.fullScanThreshold ?? 10_000,
        },
        on_disk_payload: options.onDiskPayload ?? false,
        replication_factor: options.replicationFactor ?? 1,
      });
      await client.createPayloadIndex(indexName, { field_name: 'documentId', field_schema: 'keyword', wait: true });
      await client.createPayloadIndex(indexName, { field_name: 'chunkIndex', field_schema: 'integer', wait: true });

      this.rememberMetric(indexName, metric);
      this.logger.info(`Created collection ${indexName} (${dimension} dimensions, ${QDRANT_DISTANCES[metric]})`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to create collection ${indexName}`, error);
      return false;
    }
  }

  async indexExists(indexName: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      const { exists } = await client.collectionExists(indexName);
      return exists;
    } catch (error) {
      this.logger.error(`Failed to check collection ${indexName}`, error);
      return false;
    }
  }

  async deleteByDocumentId(indexName: string, documentId: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      await client.delete(indexName, { wait: true, filter: documentFilter(documentId) });
      this.logger.info(`Deleted chunks of document ${documentId} from ${indexName}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete document ${documentId} from ${indexName}`, error);
      return false;
    }
  }

  async getDocumentCount(indexName: string, documentId?: string): Promise<number> {
    const client = this.requireClient();
    try {
      const { count } = await client.count(indexName, {
        exact: true,
        ...(documentId === undefined ? {} : { filter: documentFilter(documentId) }),
      });
      return count;
    } catch (error) {
      this.logger.error(`Failed to count points in ${indexName}`, error);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    const client = this.requireClient();
    try {
      await client.getCollections();
      return true;
    } catch (error) {
      this.logger.warn(`Health check failed: ${formatError(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    // The REST client holds no open connections
    this.client = undefined;
    this.forgetIndexes();
  }

  protected isInitialized(): boolean {
    return this.client !== undefined;
  }

  protected override async getIndexDimension(indexName: string): Promise<number | undefined> {
    const info = await this.describeCollection(indexName);
    return readNumber(readPath(info, 'config', 'params', 'vectors'), 'size');
  }

  protected override async fetchIndexMetric(indexName: string): Promise<DistanceMetricEnum | undefined> {
    const info = await this.describeCollection(indexName);
    return fromQdrantDistance(readPath(info, 'config', 'params', 'vectors', 'distance'));
  }

  protected override isMissingIndexError(error: unknown): boolean {
    return readPath(error, 'status') === 404;
  }

  protected async writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome> {
    const client = this.requireClient();
    await client.upsert(indexName, {
      wait: true,
      points: batch.map((chunk) => ({
        id: toPointId(chunk.chunkId),
        vector: chunk.embedding,
        payload: {
          chunkId: chunk.chunkId,
          documentId: chunk.documentId,
          chunkIndex: chunk.chunkIndex,
          content: chunk.content,
          createdAt: chunk.createdAt.toISOString(),
          metadata: chunk.metadata,
        },
      })),
    });
    return { indexedCount: batch.length, errors: [] };
  }

  protected async searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]> {
    const client = this.requireClient();
    const metric = await this.resolveMetric(indexName);
    const filter = toQdrantFilter(options.filters);
    const scoreThreshold = toQdrantThreshold(options.threshold, metric);

    const points = await client.search(indexName, {
      vector: queryVector,
      limit: options.limit,
      with_payload: true,
      ...(filter ? { filter } : {}),
      ...(scoreThreshold === undefined ? {} : { score_threshold: scoreThreshold }),
    });

    return points.map((point) => ({
      chunkId: readString(point.payload, 'chunkId') ?? String(point.id),
      documentId: readString(point.payload, 'documentId') ?? '',
      content: readString(point.payload, 'content') ?? '',
      score: qdrantScoreToScore(point.score, metric),
      metadata: toMetadata(readPath(point.payload, 'metadata')),
      chunkIndex: readNumber(point.payload, 'chunkIndex') ?? 0,
    }));
  }

  private async describeCollection(indexName: string): Promise<unknown> {
    const client = this.requireClient();
    try {
      return await client.getCollection(indexName);
    } catch (error) {
      this.logger.debug(`Could not describe collection ${indexName}: ${formatError(error)}`);
      return undefined;
    }
  }

  private requireClient(): QdrantClient {
    if (!this.client) {
      throw new NotInitializedError('QdrantVectorStore');
    }
    return this.client;
  }
}
