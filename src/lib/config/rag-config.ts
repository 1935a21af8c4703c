import { z } from 'zod';

import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import { ConfigProfileEnum } from '../../enums/config-profile.enum.js';
import { DistanceMetricEnum } from '../../enums/distance-metric.enum.js';
import { EmbeddingProviderEnum } from '../../enums/embedding-provider.enum.js';
import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import { ChunkerFactory } from '../../services/chunking/chunker-factory.service.js';
import { EmbeddingServiceFactory } from '../../services/embedding/embedding-factory.service.js';
import { ConfigurationError } from '../errors.js';
import { Logger } from '../utils/logger.util.js';
import { isRecord } from '../utils/object.util.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ChunkingOptionsSchema = z.object({
  chunkSize: positiveInt.optional(),
  chunkOverlap: nonNegativeInt.optional(),
  minChunkSize: nonNegativeInt.optional(),
  maxChunkSize: positiveInt.optional(),
  separators: z.array(z.string()).optional(),
  respectParagraphs: z.boolean().optional(),
  respectHeaders: z.boolean().optional(),
  preserveCodeBlocks: z.boolean().optional(),
});

const EmbeddingConfigSchema = z.object({
  modelId: z.string().min(1).optional(),
  dimension: positiveInt.optional(),
  batchSize: positiveInt.optional(),
  batchDelayMs: nonNegativeInt.optional(),
  region: z.string().min(1).optional(),
  maxRetries: nonNegativeInt.optional(),
  retryBaseDelayMs: nonNegativeInt.optional(),
  apiKey: z.string().optional(),
  timeoutMs: positiveInt.optional(),
  baseUrl: z.string().url().optional(),
});

const VectorStoreConnectionSchema = z.object({
  endpoint: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  useSsl: z.boolean().optional(),
  verifyCerts: z.boolean().optional(),
  timeoutMs: positiveInt.optional(),
  connectionString: z.string().optional(),
  host: z.string().optional(),
  port: positiveInt.optional(),
  database: z.string().optional(),
  user: z.string().optional(),
  maxPoolSize: positiveInt.optional(),
  minPoolSize: nonNegativeInt.optional(),
  url: z.string().url().optional(),
  apiKey: z.string().optional(),
  namespace: z.string().optional(),
});

const IndexOptionsSchema = z.object({
  engine: z.enum(['nmslib', 'faiss', 'lucene']).optional(),
  m: positiveInt.optional(),
  efConstruction: positiveInt.optional(),
  efSearch: positiveInt.optional(),
  shards: positiveInt.optional(),
  replicas: nonNegativeInt.optional(),
  indexType: z.enum(['ivfflat', 'hnsw']).optional(),
  lists: positiveInt.optional(),
  onDisk: z.boolean().optional(),
  hnswM: positiveInt.optional(),
  hnswEfConstruct: positiveInt.optional(),
  fullScanThreshold: positiveInt.optional(),
  onDiskPayload: z.boolean().optional(),
  replicationFactor: positiveInt.optional(),
  cloud: z.enum(['aws', 'gcp', 'azure']).optional(),
  region: z.string().optional(),
});

const ProfileSchema = z.nativeEnum(ConfigProfileEnum);

export const RagConfigSchema = z.object({
  chunking: z
    .object({
      strategy: z.string().default(ChunkingStrategyEnum.SEMANTIC),
      profile: ProfileSchema.optional(),
      options: ChunkingOptionsSchema.default({}),
    })
    .default({}),

  embedding: z
    .object({
      provider: z.string().default(EmbeddingProviderEnum.OPENAI),
      profile: ProfileSchema.optional(),
      config: EmbeddingConfigSchema.default({}),
    })
    .default({}),

  vectorStore: z
    .object({
      provider: z.string().default(VectorStoreProviderEnum.MEMORY),
      indexName: z.string().min(1).default('rag_chunks'),
      distanceMetric: z.string().default(DistanceMetricEnum.COSINE),
      config: VectorStoreConnectionSchema.default({}),
      indexOptions: IndexOptionsSchema.default({}),
    })
    .default({}),

  decomposition: z
    .object({
      enabled: z.boolean().default(false),
      apiKey: z.string().optional(),
      model: z.string().optional(),
      maxSubqueries: positiveInt.default(4),
    })
    .default({}),

  retrieval: z
    .object({
      retrieveK: positiveInt.default(10),
      threshold: z.number().min(0).max(1).default(0.7),
      indexBatchSize: positiveInt.default(100),
    })
    .default({}),
});

export type RagConfigInput = z.input<typeof RagConfigSchema>;
export type RagConfig = z.output<typeof RagConfigSchema>;

const logger = Logger.getInstance('config');

/**
 * Validate a configuration object and fill in profile defaults. Values given
 * explicitly win over the profile's recommended ones.
 * @throws ConfigurationError listing every invalid path
 */
export function parseRagConfig(input: unknown): RagConfig {
  const result = RagConfigSchema.safeParse(stripUndefined(input));
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Configuration validation failed', undefined, { issues: messages });
    throw new ConfigurationError(`Invalid RAG configuration: ${messages.join('; ')}`);
  }

  const config = result.data;
  const { chunking, embedding } = config;
  if (chunking.profile) {
    chunking.options = {
      ...ChunkerFactory.getRecommendedConfig(chunking.strategy, chunking.profile),
      ...chunking.options,
    };
  }
  if (embedding.profile) {
    embedding.config = {
      ...EmbeddingServiceFactory.getRecommendedConfig(embedding.provider, embedding.profile),
      ...embedding.config,
    };
  }
  return config;
}

/**
 * Build the configuration from environment variables
 * @param env - Defaults to process.env
 */
export function loadRagConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const vectorStore = env['RAG_VECTOR_STORE'];
  const decompositionModel = env['RAG_DECOMPOSITION_MODEL'];

  const rawConfig = {
    chunking: {
      strategy: env['RAG_CHUNKING_STRATEGY'],
      profile: env['RAG_CHUNKING_PROFILE'],
    },
    embedding: {
      provider: env['RAG_EMBEDDING_PROVIDER'],
      profile: env['RAG_EMBEDDING_PROFILE'],
      config: {
        modelId: env['RAG_EMBEDDING_MODEL'],
        apiKey: env['OPENAI_API_KEY'],
        region: env['AWS_REGION'],
        baseUrl: env['OLLAMA_BASE_URL'],
      },
    },
    vectorStore: {
      provider: vectorStore,
      indexName: env['RAG_INDEX_NAME'],
      distanceMetric: env['RAG_DISTANCE_METRIC'],
      config: {
        endpoint: env['OPENSEARCH_ENDPOINT'],
        username: env['OPENSEARCH_USERNAME'],
        password: env['OPENSEARCH_PASSWORD'],
        connectionString: env['PGVECTOR_CONNECTION_STRING'],
        url: env['QDRANT_URL'],
        apiKey:
          vectorStore?.toLowerCase() === VectorStoreProviderEnum.PINECONE
            ? env['PINECONE_API_KEY']
            : env['QDRANT_API_KEY'],
      },
    },
    decomposition: {
      enabled: decompositionModel !== undefined && decompositionModel !== '',
      apiKey: env['OPENAI_API_KEY'],
      model: decompositionModel,
    },
    retrieval: {
      retrieveK: parseNumber(env['RAG_RETRIEVE_K']),
      threshold: parseNumber(env['RAG_SEARCH_THRESHOLD']),
    },
  };

  return parseRagConfig(rawConfig);
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Drop keys whose value is undefined so unset variables fall back to defaults
 */
function stripUndefined(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripUndefined);
  }
  if (!isRecord(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .map(([key, entry]) => [key, stripUndefined(entry)])
  );
}
