/**
 * Options shared by every embedding provider
 */
export interface BaseEmbeddingConfig {
  /** Provider model identifier, e.g. 'text-embedding-3-small' */
  modelId?: string;
  /** Output dimension. Only some models accept a value other than their default. */
  dimension?: number;
  /** Items per sub-batch in embedBatch. Capped at the provider limit. */
  batchSize?: number;
  /** Pause between sub-batches. Default: 100 */
  batchDelayMs?: number;
}

export interface BedrockEmbeddingConfig extends BaseEmbeddingConfig {
  /** Default: 'us-east-2' */
  region?: string;
  /** Attempts per text, including the first. Default: 3 */
  maxRetries?: number;
  /** Backoff base; attempt n waits base * 2^n. Default: 1000 */
  retryBaseDelayMs?: number;
}

export interface OpenAIEmbeddingConfig extends BaseEmbeddingConfig {
  apiKey?: string;
  /** Retries performed by the SDK client. Default: 2 */
  maxRetries?: number;
  /** Default: 60000 */
  timeoutMs?: number;
}

export interface LocalEmbeddingConfig extends BaseEmbeddingConfig {
  /** Ollama server. Default: 'http://localhost:11434' */
  baseUrl?: string;
}

/**
 * Union of every provider's options, accepted by the factory
 */
export type EmbeddingServiceConfig = BedrockEmbeddingConfig & OpenAIEmbeddingConfig & LocalEmbeddingConfig;
