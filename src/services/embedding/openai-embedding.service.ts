import { OpenAI } from 'openai';
import { EmbeddingProviderEnum } from '../../enums/embedding-provider.enum.js';
import type { OpenAIEmbeddingConfig } from '../../interfaces/embedding-config.interface.js';
import type { EmbeddingModel, EmbeddingModelSpec } from '../../interfaces/embedding-model.interface.js';
import { ConfigurationError, EmbeddingProviderError, formatError } from '../../lib/errors.js';
import { BaseEmbeddingService } from './base-embedding.service.js';

export const OPENAI_MODELS: Record<string, EmbeddingModelSpec> = {
  'text-embedding-3-small': { dimension: 1536, maxTokens: 8191, costPer1kTokens: 0.00002 },
  'text-embedding-3-large': { dimension: 3072, maxTokens: 8191, costPer1kTokens: 0.00013 },
  'text-embedding-ada-002': { dimension: 1536, maxTokens: 8191, costPer1kTokens: 0.0001 },
};

/**
 * Default embedding model constant
 */
const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

const DEFAULT_BATCH_SIZE = 100;
const MAX_OPENAI_BATCH_SIZE = 2048;

/** Models that accept a `dimensions` request parameter */
const SHORTENABLE_MODELS = new Set(['text-embedding-3-small', 'text-embedding-3-large']);

/**
 * Embeddings from the OpenAI embeddings endpoint
 */
export class OpenAIEmbeddingService extends BaseEmbeddingService {
  private openai?: OpenAI;
  private readonly apiKey: string;
  private readonly modelId: string;
  private readonly modelSpec: EmbeddingModelSpec;
  private readonly dimension: number;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;

  constructor(config: OpenAIEmbeddingConfig = {}) {
    super(EmbeddingProviderEnum.OPENAI, config.batchDelayMs);

    if (!config.apiKey) {
      throw new ConfigurationError('OpenAI API key is required');
    }
    this.apiKey = config.apiKey;
    this.modelId = config.modelId ?? DEFAULT_EMBEDDING_MODEL;

    const spec = Object.hasOwn(OPENAI_MODELS, this.modelId) ? OPENAI_MODELS[this.modelId] : undefined;
    if (!spec) {
      throw new ConfigurationError(
        `Unsupported OpenAI model: ${this.modelId}. Supported models: ${Object.keys(OPENAI_MODELS).join(', ')}`
      );
    }
    this.modelSpec = spec;

    this.dimension = config.dimension ?? spec.dimension;
    if (this.dimension !== spec.dimension && !SHORTENABLE_MODELS.has(this.modelId)) {
      throw new ConfigurationError(`Model ${this.modelId} only produces ${spec.dimension}-dimensional embeddings`);
    }
    if (this.dimension <= 0 || this.dimension > spec.dimension) {
      throw new ConfigurationError(`Dimension for ${this.modelId} must be between 1 and ${spec.dimension}`);
    }

    this.batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxRetries = config.maxRetries ?? 2;
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  async initialize(): Promise<boolean> {
    try {
      this.openai = new OpenAI({
        apiKey: this.apiKey,
        maxRetries: this.maxRetries,
        timeout: this.timeoutMs,
      });
      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info(`OpenAI embedding service initialized with ${this.modelId}`);
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize OpenAI embedding service', error);
      return false;
    }
  }

  /**
   * Generate embeddings for a text string
   * @param text - The text to embed
   * @returns Promise resolving to the embedding vector
   */
  async embedText(text: string): Promise<number[]> {
    this.validateText(text);
    const [embedding] = await this.requestEmbeddings([this.truncateText(text.trim())]);
    return embedding;
  }

  getDimension(): number {
    return this.dimension;
  }

  getMaxTokens(): number {
    return this.modelSpec.maxTokens;
  }

  getModelInfo(): EmbeddingModel {
    return {
      modelId: this.modelId,
      provider: EmbeddingProviderEnum.OPENAI,
      dimension: this.dimension,
      maxTokens: this.modelSpec.maxTokens,
      costPer1kTokens: this.modelSpec.costPer1kTokens,
    };
  }

  override async close(): Promise<void> {
    this.openai = undefined;
    await super.close();
  }

  protected isInitialized(): boolean {
    return this.openai !== undefined;
  }

  protected getDefaultBatchSize(): number {
    return this.batchSize;
  }

  protected getMaxBatchSize(): number {
    return MAX_OPENAI_BATCH_SIZE;
  }

  /**
   * One request for the whole sub-batch; on failure, retry item by item so only
   * the failing items become zero vectors
   */
  protected override async embedSubBatch(batch: string[], offset: number): Promise<number[][]> {
    const inputs = batch.map((text) => text.trim());
    if (inputs.some((text) => !text)) {
      return this.embedEachSettled(batch, offset);
    }

    try {
      return await this.requestEmbeddings(inputs.map((text) => this.truncateText(text)));
    } catch (error) {
      this.logger.warn(`Batch request failed, embedding items individually: ${formatError(error)}`);
      return this.embedEachSettled(batch, offset);
    }
  }

  private async requestEmbeddings(input: string[]): Promise<number[][]> {
    const openai = this.requireClient(this.openai, 'OpenAIEmbeddingService');
    try {
      const res = await openai.embeddings.create({
        input,
        model: this.modelId,
        ...(SHORTENABLE_MODELS.has(this.modelId) ? { dimensions: this.dimension } : {}),
      });

      const ordered = [...res.data].sort((a, b) => a.index - b.index);
      if (ordered.length !== input.length) {
        throw new Error(`Expected ${input.length} embeddings, got ${ordered.length}`);
      }
      return ordered.map((item) => item.embedding);
    } catch (error) {
      throw new EmbeddingProviderError(`Failed to generate OpenAI embeddings: ${formatError(error)}`, {
        provider: EmbeddingProviderEnum.OPENAI,
        retryable: false,
        cause: error,
      });
    }
  }
}
