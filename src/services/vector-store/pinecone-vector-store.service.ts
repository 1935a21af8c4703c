import { Pinecone, type Index, type RecordMetadata } from '@pinecone-database/pinecone';
import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { ChunkWithEmbedding, DocumentMetadata } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchResult } from '../../interfaces/search-result.interface.js';
import type { CreateIndexOptions, PineconeStoreConfig } from '../../interfaces/vector-store-config.interface.js';
import { ConfigurationError, NotInitializedError, errorName, formatError } from '../../lib/errors.js';
import { normalizeDistanceMetric } from '../../lib/utils/distance-metric.util.js';
import { cosineToScore, distanceToScore, innerProductToScore } from '../../lib/utils/vector.util.js';
import {
  BaseVectorStore,
  type BatchWriteOutcome,
  type ResolvedSearchOptions,
} from './base-vector-store.service.js';

type PineconeMetric = 'cosine' | 'euclidean' | 'dotproduct';

const PINECONE_METRICS: Partial<Record<DistanceMetricEnum, PineconeMetric>> = {
  [DistanceMetricEnum.COSINE]: 'cosine',
  [DistanceMetricEnum.EUCLIDEAN]: 'euclidean',
  [DistanceMetricEnum.DOT_PRODUCT]: 'dotproduct',
};

/** Keys the store writes next to caller metadata; they win over caller keys of the same name */
export const RESERVED_METADATA_KEYS = ['chunkId', 'documentId', 'chunkIndex', 'content', 'createdAt'] as const;

const RESERVED = new Set<string>(RESERVED_METADATA_KEYS);

export function chunkIdPrefix(documentId: string): string {
  return `${documentId}:chunk:`;
}

/**
 * Pinecone metadata is flat: strings, numbers, booleans and string lists.
 * Nulls are dropped and any other value is stored as JSON text.
 */
export function toPineconeMetadata(chunk: ChunkWithEmbedding): RecordMetadata {
  const metadata: RecordMetadata = {};
  for (const [key, value] of Object.entries(chunk.metadata)) {
    if (value === null || RESERVED.has(key)) continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      metadata[key] = value;
    } else {
      metadata[key] = JSON.stringify(value);
    }
  }
  return {
    ...metadata,
    chunkId: chunk.chunkId,
    documentId: chunk.documentId,
    chunkIndex: chunk.chunkIndex,
    content: chunk.content,
    createdAt: chunk.createdAt.toISOString(),
  };
}

function fromPineconeMetadata(metadata: RecordMetadata | undefined): DocumentMetadata {
  const result: DocumentMetadata = {};
  for (const [key, value] of Object.entries(metadata ?? {})) {
    if (!RESERVED.has(key)) {
      result[key] = value;
    }
  }
  return result;
}

export function pineconeScoreToScore(score: number, metric: DistanceMetricEnum): number {
  switch (metric) {
    case DistanceMetricEnum.DOT_PRODUCT:
      return innerProductToScore(score);
    case DistanceMetricEnum.EUCLIDEAN:
    case DistanceMetricEnum.MANHATTAN:
      return distanceToScore(score);
    case DistanceMetricEnum.COSINE:
      return cosineToScore(score);
  }
}

function toPineconeFilter(filters: MetadataFilter | undefined): object | undefined {
  const entries = Object.entries(filters ?? {});
  if (entries.length === 0) {
    return undefined;
  }
  return Object.fromEntries(entries.map(([key, value]) => [key, { $eq: value }]));
}

/**
 * Vector store on Pinecone serverless indexes. Record ids are chunk ids, all
 * chunks live in one namespace.
 */
export class PineconeVectorStore extends BaseVectorStore {
  private client?: Pinecone;
  private readonly config: PineconeStoreConfig;
  private readonly indexes = new Map<string, Index<RecordMetadata>>();

  constructor(config: PineconeStoreConfig = {}) {
    super(VectorStoreProviderEnum.PINECONE);
    if (!config.apiKey) {
      throw new ConfigurationError('Pinecone API key is required');
    }
    this.config = config;
  }

  async initialize(): Promise<boolean> {
    try {
      this.client = new Pinecone({ apiKey: this.config.apiKey ?? '' });
      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info('Connected to Pinecone');
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize Pinecone vector store', error);
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
      const pineconeMetric = PINECONE_METRICS[metric];
      if (!pineconeMetric) {
        this.logger.error(`Pinecone does not support the ${metric} metric`);
        return false;
      }

      await client.createIndex({
        name: indexName,
        dimension,
        metric: pineconeMetric,
        spec: {
          serverless: {
            cloud: options.cloud ?? 'aws',
            region: options.region ?? 'us-east-1',
          },
        },
        waitUntilReady: true,
        suppressConflicts: true,
      });

      this.rememberMetric(indexName, metric);
      this.logger.info(`Created index ${indexName} (${dimension} dimensions, ${pineconeMetric})`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to create index ${indexName}`, error);
      return false;
    }
  }

  async indexExists(indexName: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      const { indexes = [] } = await client.listIndexes();
      return indexes.some((index) => index.name === indexName);
    } catch (error) {
      this.logger.error(`Failed to check index ${indexName}`, error);
      return false;
    }
  }

  async deleteByDocumentId(indexName: string, documentId: string): Promise<boolean> {
    this.ensureInitialized();
    try {
      const ids = await this.listDocumentIds(indexName, documentId);
      if (ids.length > 0) {
        await this.getIndex(indexName).deleteMany(ids);
      }
      this.logger.info(`Deleted ${ids.length} chunks of document ${documentId} from ${indexName}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete document ${documentId} from ${indexName}`, error);
      return false;
    }
  }

  async getDocumentCount(indexName: string, documentId?: string): Promise<number> {
    this.ensureInitialized();
    try {
      if (documentId !== undefined) {
        return (await this.listDocumentIds(indexName, documentId)).length;
      }
      const stats = await this.getIndex(indexName).describeIndexStats();
      return stats.namespaces?.[this.namespace]?.recordCount ?? 0;
    } catch (error) {
      this.logger.error(`Failed to count records in ${indexName}`, error);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    const client = this.requireClient();
    try {
      await client.listIndexes();
      return true;
    } catch (error) {
      this.logger.warn(`Health check failed: ${formatError(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    this.client = undefined;
    this.indexes.clear();
    this.forgetIndexes();
  }

  protected isInitialized(): boolean {
    return this.client !== undefined;
  }

  protected override async getIndexDimension(indexName: string): Promise<number | undefined> {
    const client = this.requireClient();
    try {
      return (await client.describeIndex(indexName)).dimension;
    } catch (error) {
      this.logger.debug(`Could not describe index ${indexName}: ${formatError(error)}`);
      return undefined;
    }
  }

  protected override async fetchIndexMetric(indexName: string): Promise<DistanceMetricEnum | undefined> {
    const client = this.requireClient();
    const description = await client.describeIndex(indexName);
    return normalizeDistanceMetric(description.metric);
  }

  protected override isMissingIndexError(error: unknown): boolean {
    return errorName(error) === 'PineconeNotFoundError';
  }

  protected async writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome> {
    await this.getIndex(indexName).upsert(
      batch.map((chunk) => ({
        id: chunk.chunkId,
        values: chunk.embedding,
        metadata: toPineconeMetadata(chunk),
      }))
    );
    return { indexedCount: batch.length, errors: [] };
  }

  protected async searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]> {
    const metric = await this.resolveMetric(indexName);
    const filter = toPineconeFilter(options.filters);
    const response = await this.getIndex(indexName).query({
      vector: queryVector,
      topK: options.limit,
      includeMetadata: true,
      ...(filter ? { filter } : {}),
    });

    return (response.matches ?? []).map((match) => {
      const documentId = match.metadata?.['documentId'];
      const content = match.metadata?.['content'];
      const chunkIndex = match.metadata?.['chunkIndex'];
      return {
        chunkId: match.id,
        documentId: typeof documentId === 'string' ? documentId : '',
        content: typeof content === 'string' ? content : '',
        score: pineconeScoreToScore(match.score ?? 0, metric),
        metadata: fromPineconeMetadata(match.metadata),
        chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : 0,
      };
    });
  }

  private get namespace(): string {
    return this.config.namespace ?? '';
  }

  private async listDocumentIds(indexName: string, documentId: string): Promise<string[]> {
    const index = this.getIndex(indexName);
    const ids: string[] = [];
    let paginationToken: string | undefined;
    do {
      const page = await index.listPaginated({ prefix: chunkIdPrefix(documentId), paginationToken });
      for (const vector of page.vectors ?? []) {
        if (vector.id) ids.push(vector.id);
      }
      paginationToken = page.pagination?.next;
    } while (paginationToken);
    return ids;
  }

  private getIndex(indexName: string): Index<RecordMetadata> {
    const client = this.requireClient();
    const existing = this.indexes.get(indexName);
    if (existing) {
      return existing;
    }
    const created = client.Index<RecordMetadata>(indexName).namespace(this.namespace);
    this.indexes.set(indexName, created);
    return created;
  }

  private requireClient(): Pinecone {
    if (!this.client) {
      throw new NotInitializedError('PineconeVectorStore');
    }
    return this.client;
  }
}
