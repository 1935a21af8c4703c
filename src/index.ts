// Chunking
export { BaseChunker } from './services/chunking/base-chunker.service.js';
export { FixedSizeChunker } from './services/chunking/fixed-size-chunker.service.js';
export { RecursiveChunker } from './services/chunking/recursive-chunker.service.js';
export { SemanticChunker } from './services/chunking/semantic-chunker.service.js';
export { ChunkerFactory } from './services/chunking/chunker-factory.service.js';

// Embeddings
export { BaseEmbeddingService } from './services/embedding/base-embedding.service.js';
export { BedrockEmbeddingService } from './services/embedding/bedrock-embedding.service.js';
export { OpenAIEmbeddingService } from './services/embedding/openai-embedding.service.js';
export { LocalEmbeddingService } from './services/embedding/local-embedding.service.js';
export { EmbeddingServiceFactory } from './services/embedding/embedding-factory.service.js';

// Vector stores
export { BaseVectorStore } from './services/vector-store/base-vector-store.service.js';
export { OpenSearchVectorStore } from './services/vector-store/opensearch-vector-store.service.js';
export { PgVectorStore } from './services/vector-store/pgvector-vector-store.service.js';
export { QdrantVectorStore } from './services/vector-store/qdrant-vector-store.service.js';
export { PineconeVectorStore } from './services/vector-store/pinecone-vector-store.service.js';
export { MemoryVectorStore } from './services/vector-store/memory-vector-store.service.js';
export { VectorStoreFactory } from './services/vector-store/vector-store-factory.service.js';

// RAG Services
export { QueryDecomposer } from './services/query-decomposer.service.js';
export { RagService } from './services/rag.service.js';

// Config
export { RagConfigSchema, parseRagConfig, loadRagConfigFromEnv } from './lib/config/rag-config.js';

// Errors
export {
  RagError,
  ValidationError,
  ConfigurationError,
  NotInitializedError,
  EmbeddingProviderError,
} from './lib/errors.js';

// Utils
export { Logger, LogLevel } from './lib/utils/logger.util.js';
export { mergeSearchResults } from './lib/utils/search-result.util.js';
export {
  cosineSimilarity,
  dotProduct,
  euclideanDistance,
  manhattanDistance,
  zeroVector,
} from './lib/utils/vector.util.js';

// Interfaces
export type { Chunk, ChunkMetadata, ChunkWithEmbedding, DocumentMetadata, MetadataValue } from './interfaces/chunk.interface.js';
export type { ChunkingOptions } from './interfaces/chunking-options.interface.js';
export type {
  BedrockEmbeddingConfig,
  EmbeddingServiceConfig,
  LocalEmbeddingConfig,
  OpenAIEmbeddingConfig,
} from './interfaces/embedding-config.interface.js';
export type { EmbeddingCostEstimate, EmbeddingModel } from './interfaces/embedding-model.interface.js';
export type { BatchIndexResult } from './interfaces/batch-index-result.interface.js';
export type { MetadataFilter, SearchOptions, SearchResult } from './interfaces/search-result.interface.js';
export type { CreateIndexOptions, VectorStoreConfig } from './interfaces/vector-store-config.interface.js';
export type { LlmConfig } from './interfaces/llm-config.interface.js';
export type { LlmParamsConfig } from './interfaces/llm-params-config.interface.js';
export type { DefaultPromptsConfig } from './interfaces/default-prompts-config.interface.js';
export type { MergedSearchResult } from './lib/utils/search-result.util.js';
export type { QueryDecomposerOptions } from './services/query-decomposer.service.js';
export type {
  IngestResult,
  RagEvent,
  RagOptions,
  RetrievalGraph,
  RetrievalGraphInput,
  RetrievalResult,
  RetrieveOptions,
} from './services/rag.service.js';
export type { RagConfig, RagConfigInput } from './lib/config/rag-config.js';

// Enums
export { ChunkingStrategyEnum } from './enums/chunking-strategy.enum.js';
export { ConfigProfileEnum } from './enums/config-profile.enum.js';
export { DistanceMetricEnum } from './enums/distance-metric.enum.js';
export { EmbeddingProviderEnum } from './enums/embedding-provider.enum.js';
export { LlmProviderEnum } from './enums/llm-provider.enum.js';
export { VectorStoreProviderEnum } from './enums/vector-store-provider.enum.js';
