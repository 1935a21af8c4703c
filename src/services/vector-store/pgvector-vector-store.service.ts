import pg from 'pg';
import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { ChunkWithEmbedding } from '../../interfaces/chunk.interface.js';
import type { MetadataFilter, SearchResult } from '../../interfaces/search-result.interface.js';
import type { CreateIndexOptions, PgVectorStoreConfig } from '../../interfaces/vector-store-config.interface.js';
import { ConfigurationError, NotInitializedError, ValidationError, formatError } from '../../lib/errors.js';
import { normalizeDistanceMetric } from '../../lib/utils/distance-metric.util.js';
import { readPath, toMetadata } from '../../lib/utils/object.util.js';
import { cosineToScore, distanceToScore, innerProductToScore } from '../../lib/utils/vector.util.js';
import {
  BaseVectorStore,
  type BatchWriteOutcome,
  type ResolvedSearchOptions,
} from './base-vector-store.service.js';

const { Pool } = pg;

interface MetricSql {
  /** Operator class for the vector index */
  opsClass: string;
  /** Distance operator; smaller is closer */
  operator: string;
  toScore(distance: number): number;
}

const METRIC_SQL: Record<DistanceMetricEnum, MetricSql> = {
  [DistanceMetricEnum.COSINE]: {
    opsClass: 'vector_cosine_ops',
    operator: '<=>',
    toScore: (distance) => cosineToScore(1 - distance),
  },
  [DistanceMetricEnum.EUCLIDEAN]: {
    opsClass: 'vector_l2_ops',
    operator: '<->',
    toScore: (distance) => distanceToScore(distance),
  },
  [DistanceMetricEnum.DOT_PRODUCT]: {
    opsClass: 'vector_ip_ops',
    // <#> is the negated inner product
    operator: '<#>',
    toScore: (distance) => innerProductToScore(-distance),
  },
  [DistanceMetricEnum.MANHATTAN]: {
    opsClass: 'vector_l1_ops',
    operator: '<+>',
    toScore: (distance) => distanceToScore(distance),
  },
};

const COLUMN_FILTERS: Record<string, string> = {
  documentId: 'document_id',
  chunkId: 'chunk_id',
  chunkIndex: 'chunk_index',
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

const UNDEFINED_TABLE = '42P01';

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  metadata: unknown;
  distance: number;
}

/**
 * Reject table names that are not plain SQL identifiers; they are interpolated into DDL.
 * Returns the lower-cased name Postgres folds unquoted identifiers to.
 */
export function validateIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new ValidationError(`Invalid index name: ${name}. Use letters, digits and underscores only.`);
  }
  return name.toLowerCase();
}

export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(',')}]`;
}

function buildWhere(filters: MetadataFilter | undefined, params: unknown[]): string {
  if (!filters) {
    return '';
  }
  const clauses = Object.entries(filters).map(([key, value]) => {
    const column = COLUMN_FILTERS[key];
    if (column) {
      params.push(value);
      return `${column} = $${params.length}`;
    }
    params.push(key, String(value));
    return `metadata->>$${params.length - 1} = $${params.length}`;
  });
  return clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
}

/**
 * Vector store on PostgreSQL with the pgvector extension; one table per index
 */
export class PgVectorStore extends BaseVectorStore {
  private pool?: pg.Pool;
  private readonly config: PgVectorStoreConfig;

  constructor(config: PgVectorStoreConfig = {}) {
    super(VectorStoreProviderEnum.PGVECTOR);
    if (!config.connectionString && !config.password) {
      throw new ConfigurationError('PGVector requires a connectionString or a password');
    }
    this.config = config;
  }

  async initialize(): Promise<boolean> {
    try {
      const { connectionString, host, port = 5432, database, user, password, maxPoolSize = 10, minPoolSize = 1 } =
        this.config;
      const pool = new Pool({
        ...(connectionString ? { connectionString } : { host, port, database, user, password }),
        max: maxPoolSize,
        min: minPoolSize,
      });

      try {
        await pool.query('SELECT 1');
        await pool.query('CREATE EXTENSION IF NOT EXISTS vector');
      } catch (error) {
        await pool.end();
        throw error;
      }

      this.pool = pool;
      this.logger.info('Connected to PostgreSQL with pgvector');
      return true;
    } catch (error) {
      this.logger.error('Failed to initialize PGVector store', error);
      return false;
    }
  }

  async createIndex(
    indexName: string,
    dimension: number,
    distanceMetric: string = DistanceMetricEnum.COSINE,
    options: CreateIndexOptions = {}
  ): Promise<boolean> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`Invalid dimension: ${dimension}`);
    }

    try {
      const metric = normalizeDistanceMetric(distanceMetric);
      const { opsClass } = METRIC_SQL[metric];
      // ivfflat has no l1 operator class
      const indexType = metric === DistanceMetricEnum.MANHATTAN ? 'hnsw' : (options.indexType ?? 'ivfflat');
      const indexParams =
        indexType === 'hnsw'
          ? `m = ${Math.floor(options.m ?? 16)}, ef_construction = ${Math.floor(options.efConstruction ?? 64)}`
          : `lists = ${Math.floor(options.lists ?? 100)}`;

      await pool.query(
        `CREATE TABLE IF NOT EXISTS ${table} (
          id BIGSERIAL PRIMARY KEY,
          chunk_id TEXT NOT NULL UNIQUE,
          document_id TEXT NOT NULL,
          chunk_index INTEGER NOT NULL,
          content TEXT NOT NULL,
          metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
          embedding vector(${dimension}) NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`
      );
      await pool.query(`CREATE INDEX IF NOT EXISTS ${table}_document_id_idx ON ${table} (document_id)`);
      await pool.query(
        `CREATE INDEX IF NOT EXISTS ${table}_embedding_idx ON ${table} USING ${indexType} (embedding ${opsClass}) WITH (${indexParams})`
      );

      this.rememberMetric(table, metric);
      this.logger.info(`Created table ${table} (${dimension} dimensions, ${indexType} ${opsClass})`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to create index ${indexName}`, error);
      return false;
    }
  }

  async indexExists(indexName: string): Promise<boolean> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    try {
      const result = await pool.query<{ exists: boolean }>(
        `SELECT EXISTS (
          SELECT 1 FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1
        ) AS exists`,
        [table]
      );
      return result.rows[0]?.exists === true;
    } catch (error) {
      this.logger.error(`Failed to check index ${indexName}`, error);
      return false;
    }
  }

  async deleteByDocumentId(indexName: string, documentId: string): Promise<boolean> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    try {
      const result = await pool.query(`DELETE FROM ${table} WHERE document_id = $1`, [documentId]);
      this.logger.info(`Deleted ${result.rowCount ?? 0} chunks of document ${documentId} from ${table}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete document ${documentId} from ${table}`, error);
      return false;
    }
  }

  async getDocumentCount(indexName: string, documentId?: string): Promise<number> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    try {
      const result =
        documentId === undefined
          ? await pool.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${table}`)
          : await pool.query<{ count: number }>(
              `SELECT COUNT(*)::int AS count FROM ${table} WHERE document_id = $1`,
              [documentId]
            );
      return result.rows[0]?.count ?? 0;
    } catch (error) {
      this.logger.error(`Failed to count documents in ${table}`, error);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    const pool = this.requirePool();
    try {
      await pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Health check failed: ${formatError(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
    }
    this.forgetIndexes();
  }

  protected isInitialized(): boolean {
    return this.pool !== undefined;
  }

  protected override async getIndexDimension(indexName: string): Promise<number | undefined> {
    const pool = this.requirePool();
    try {
      // atttypmod of a vector column holds its dimension
      const result = await pool.query<{ dimension: number }>(
        `SELECT atttypmod AS dimension FROM pg_attribute WHERE attrelid = to_regclass($1) AND attname = 'embedding'`,
        [validateIdentifier(indexName)]
      );
      const dimension = result.rows[0]?.dimension;
      return dimension !== undefined && dimension > 0 ? dimension : undefined;
    } catch (error) {
      this.logger.debug(`Could not read dimension of ${indexName}: ${formatError(error)}`);
      return undefined;
    }
  }

  protected override async fetchIndexMetric(indexName: string): Promise<DistanceMetricEnum | undefined> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    const result = await pool.query<{ indexdef: string }>(
      'SELECT indexdef FROM pg_indexes WHERE tablename = $1 AND indexname = $2',
      [table, `${table}_embedding_idx`]
    );
    const definition = result.rows[0]?.indexdef ?? '';
    for (const [metric, sql] of Object.entries(METRIC_SQL)) {
      if (definition.includes(sql.opsClass)) {
        return normalizeDistanceMetric(metric);
      }
    }
    return undefined;
  }

  protected override isMissingIndexError(error: unknown): boolean {
    return readPath(error, 'code') === UNDEFINED_TABLE;
  }

  protected async writeBatch(indexName: string, batch: ChunkWithEmbedding[]): Promise<BatchWriteOutcome> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);

    // A row may only be upserted once per statement
    const unique = [...new Map(batch.map((chunk) => [chunk.chunkId, chunk])).values()];
    const params: unknown[] = [];
    const rows = unique.map((chunk) => {
      params.push(
        chunk.chunkId,
        chunk.documentId,
        chunk.chunkIndex,
        chunk.content,
        JSON.stringify(chunk.metadata),
        toVectorLiteral(chunk.embedding),
        chunk.createdAt
      );
      const n = params.length;
      return `($${n - 6}, $${n - 5}, $${n - 4}, $${n - 3}, $${n - 2}::jsonb, $${n - 1}::vector, $${n})`;
    });

    await pool.query(
      `INSERT INTO ${table} (chunk_id, document_id, chunk_index, content, metadata, embedding, created_at)
       VALUES ${rows.join(', ')}
       ON CONFLICT (chunk_id) DO UPDATE SET
         document_id = EXCLUDED.document_id,
         chunk_index = EXCLUDED.chunk_index,
         content = EXCLUDED.content,
         metadata = EXCLUDED.metadata,
         embedding = EXCLUDED.embedding,
         created_at = EXCLUDED.created_at`,
      params
    );

    return { indexedCount: batch.length, errors: [] };
  }

  protected async searchIndex(
    indexName: string,
    queryVector: number[],
    options: ResolvedSearchOptions
  ): Promise<SearchResult[]> {
    const pool = this.requirePool();
    const table = validateIdentifier(indexName);
    const metric = METRIC_SQL[await this.resolveMetric(table)];

    const params: unknown[] = [toVectorLiteral(queryVector)];
    const where = buildWhere(options.filters, params);
    params.push(options.limit);

    const result = await pool.query<ChunkRow>(
      `SELECT chunk_id, document_id, chunk_index, content, metadata, embedding ${metric.operator} $1::vector AS distance
       FROM ${table}
       ${where}
       ORDER BY embedding ${metric.operator} $1::vector
       LIMIT $${params.length}`,
      params
    );

    return result.rows.map((row) => ({
      chunkId: row.chunk_id,
      documentId: row.document_id,
      content: row.content,
      score: metric.toScore(Number(row.distance)),
      metadata: toMetadata(row.metadata),
      chunkIndex: row.chunk_index,
    }));
  }

  private requirePool(): pg.Pool {
    if (!this.pool) {
      throw new NotInitializedError('PgVectorStore');
    }
    return this.pool;
  }
}
