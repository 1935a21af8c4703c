import { Client } from '@opensearch-project/opensearch';
import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchResult } from '../../interfaces/search-result.interface.js';
import type { CreateIndexOptions, OpenSearchStoreConfig } from '../../interfaces/vector-store-config.interface.js';
import { ConfigurationError, NotInitializedError, formatError } from '../../lib/errors.js';
import { isRecord, readNumber, readPath, readString, toMetadata } from '../../lib/utils/object.util.js';
import { normalizeDistanceMetric } from '../../lib/utils/distance-metric.util.js';
import { clampScore, innerProductToScore } from '../../lib/utils/vector.util.js';
import {
  BaseVectorStore,
  type BatchWriteOutcome,
  type ResolvedSearchOptions,
} from './base-vector-store.service.js';

const SPACE_TYPES: Record<DistanceMetricEnum, string> = {
  [DistanceMetricEnum.COSINE]: 'cosinesimil',
  [DistanceMetricEnum.EUCLIDEAN]: 'l2',
  [DistanceMetricEnum.DOT_PRODUCT]: 'innerproduct',
  [DistanceMetricEnum.MANHATTAN]: 'l1',
};

const TOP_LEVEL_FIELDS = new Set(['documentId', 'chunkId', 'chunkIndex']);

const DEFAULT_INDEX_OPTIONS = {
  engine: 'nmslib',
  m: 16,
  efConstruction: 512,
  efSearch: 512,
  shards: 1,
  replicas: 0,
};

interface IndexDescription {
  dimension?: number;
  metric?: DistanceMetricEnum;
}

/**
 * OpenSearch k-NN score to [0, 1]. Scores for cosinesimil, l2 and l1 already lie
 * in (0, 1]; innerproduct scores are mapped back to the raw product first.
 */
export function openSearchScoreToScore(score: number, metric: DistanceMetricEnum): number {
  if (metric !== DistanceMetricEnum.DOT_PRODUCT) {
    return clampScore(score);
  }
  if (score <= 0) {
    return 0;
  }
  const innerProduct = score >= 1 ? score - 1 : 1 - 1 / score;
  return innerProductToScore(innerProduct);
}

/**
 * Vector store on OpenSearch k-NN indexes
 */
export class OpenSearchVectorStore extends BaseVectorStore {
  private client?: Client;
  private readonly config: OpenSearchStoreConfig;

  constructor(config: OpenSearchStoreConfig = {}) {
    super(VectorStoreProviderEnum.OPENSEARCH);
    if (!config.endpoint) {
      throw new ConfigurationError('OpenSearch endpoint is required');
    }
    this.config = config;
  }

  async initialize(): Promise<boolean> {
    try {
      const { endpoint = '', username, password, useSsl = true, verifyCerts = true, timeoutMs = 30_000 } = this.config;
      const node = /^https?:\/\//.test(endpoint) ? endpoint : `${useSsl ? 'https' : 'http'}://${endpoint}`;

      this.client = new Client({
        node,
        ...(username && password ? { auth: { username, password } } : {}),
        ssl: { rejectUnauthorized: verifyCerts },
        requestTimeout: timeoutMs,
      });

      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info(`Connected to OpenSearch at ${node}`);
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize OpenSearch vector store', error);
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
        this.logger.info(`Index ${indexName} already exists`);
        return true;
      }

      const settings = { ...DEFAULT_INDEX_OPTIONS, ...options };
      await client.indices.create({
        index: indexName,
        body: {
          settings: {
            index: {
              knn: true,
              'knn.algo_param.ef_search': settings.efSearch,
              number_of_shards: settings.shards,
              number_of_replicas: settings.replicas,
            },
          },
          mappings: {
            dynamic_templates: [
              {
                metadata_strings: {
                  path_match: 'metadata.*',
                  match_mapping_type: 'string',
                  mapping: { type: 'keyword' },
                },
              },
            ],
            properties: {
              chunkId: { type: 'keyword' },
              documentId: { type: 'keyword' },
              chunkIndex: { type: 'integer' },
              content: { type: 'text' },
              createdAt: { type: 'date' },
              metadata: { type: 'object', dynamic: true },
              embedding: {
                type: 'knn_vector',
                dimension,
                method: {
                  name: 'hnsw',
                  space_type: SPACE_TYPES[metric],
                  engine: settings.engine,
                  parameters: { m: settings.m, ef_construction: settings.efConstruction },
                },
              },
            },
          },
        },
      });

      this.rememberMetric(indexName, metric);
      this.logger.info(`Created index ${indexName} (${dimension} dimensions, ${SPACE_TYPES[metric]})`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to create index ${indexName}`, error);
      return false;
    }
  }

  async indexExists(indexName: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      const response = await client.indices.exists({ index: indexName });
      return response.body === true;
    } catch (error) {
      this.logger.error(`Failed to check index ${indexName}`, error);
      return false;
    }
  }

  async deleteByDocumentId(indexName: string, documentId: string): Promise<boolean> {
    const client = this.requireClient();
    try {
      const response = await client.deleteByQuery({
        index: indexName,
        refresh: true,
        body: { query: { term: { documentId } } },
      });
      const deleted = readNumber(response.body, 'deleted') ?? 0;
      this.logger.info(`Deleted ${deleted} chunks of document ${documentId} from ${indexName}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete document ${documentId} from ${indexName}`, error);
      return false;
    }
  }

  async getDocumentCount(indexName: string, documentId?: string): Promise<number> {
    const client = this.requireClient();
    try {
      const response = await client.count({
        index: indexName,
        body: { query: documentId === undefined ? { match_all: {} } : { term: { documentId } } },
      });
      return readNumber(response.body, 'count') ?? 0;
    } catch (error) {
      this.logger.error(`Failed to count documents in ${indexName}`, error);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    const client = this.requireClient();
    try {
      const response = await client.cluster.health({});
      const status = readString(response.body, 'status');
      return status === 'green' || status === 'yellow';
    } catch (error) {
      this.logger.warn(`Health check failed: ${formatError(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = undefined;
    }
    this.forgetIndexes();
  }

  protected isInitialized(): boolean {
    return this.client !== undefined;
  }

  protected override async getIndexDimension(indexName: string): Promise<number | undefined> {
    return (await this.describeIndex(indexName)).dimension;
  }

  protected override async fetchIndexMetric(indexName: string): Promise<DistanceMetricEnum | undefined> {
    return (await this.describeIndex(indexName)).metric;
  }

  protected override isMissingIndexError(error: unknown): boolean {
    return readPath(error, 'meta', 'body', 'error', 'type') === 'index_not_found_exception';
  }

  protected async writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome> {
    const client = this.requireClient();
    const operations = batch.flatMap((chunk) => [
      { index: { _index: indexName, _id: chunk.chunkId } },
      {
        chunkId: chunk.chunkId,
        documentId: chunk.documentId,
        chunkIndex: chunk.chunkIndex,
        content: chunk.content,
        metadata: chunk.metadata,
        createdAt: chunk.createdAt.toISOString(),
        embedding: chunk.embedding,
      },
    ]);

    const response = await client.bulk({ body: operations });
    const items: unknown = readPath(response.body, 'items');

    const errors: string[] = [];
    if (Array.isArray(items)) {
      for (const [i, item] of items.entries()) {
        const error = readPath(item, 'index', 'error');
        if (error !== undefined && error !== null) {
          const chunkId = readString(readPath(item, 'index'), '_id') ?? String(i);
          errors.push(`Chunk ${chunkId}: ${readString(error, 'reason') ?? formatError(error)}`);
        }
      }
    }

    return { indexedCount: batch.length - errors.length, errors };
  }

  protected async searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]> {
    const client = this.requireClient();
    const metric = await this.resolveMetric(indexName);
    const knn = { knn: { embedding: { vector: queryVector, k: options.limit } } };
    const filters = buildFilterClauses(options.filters);

    const response = await client.search({
      index: indexName,
      body: {
        size: options.limit,
        _source: { excludes: ['embedding'] },
        query: filters.length > 0 ? { bool: { must: [knn], filter: filters } } : knn,
      },
    });

    const hits: unknown = readPath(response.body, 'hits', 'hits');
    if (!Array.isArray(hits)) {
      return [];
    }

    const results: SearchResult[] = [];
    for (const hit of hits) {
      const source = readPath(hit, '_source');
      const score = readNumber(hit, '_score');
      if (!isRecord(source) || score === undefined) continue;
      results.push({
        chunkId: readString(source, 'chunkId') ?? readString(hit, '_id') ?? '',
        documentId: readString(source, 'documentId') ?? '',
        content: readString(source, 'content') ?? '',
        score: openSearchScoreToScore(score, metric),
        metadata: toMetadata(source['metadata']),
        chunkIndex: readNumber(source, 'chunkIndex') ?? 0,
      });
    }
    return results;
  }

  private async describeIndex(indexName: string): Promise<IndexDescription> {
    const client = this.requireClient();
    try {
      const response = await client.indices.getMapping({ index: indexName });
      const embedding = readPath(response.body, indexName, 'mappings', 'properties', 'embedding');
      const spaceType = readString(readPath(embedding, 'method'), 'space_type');
      return {
        dimension: readNumber(embedding, 'dimension'),
        metric: spaceType ? normalizeDistanceMetric(spaceType) : undefined,
      };
    } catch (error) {
      this.logger.debug(`Could not read mapping of ${indexName}: ${formatError(error)}`);
      return {};
    }
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new NotInitializedError('OpenSearchVectorStore');
    }
    return this.client;
  }
}

function buildFilterClauses(filters?: MetadataFilter): Record<string, unknown>[] {
  if (!filters) {
    return [];
  }
  return Object.entries(filters).map(([key, value]) => ({
    term: { [TOP_LEVEL_FIELDS.has(key) ? key : `metadata.${key}`]: value },
  }));
}
