import { OllamaEmbeddings } from '@langchain/ollama';
import { EmbeddingProviderEnum } from '../../enums/embedding-provider.enum.js';
import type { LocalEmbeddingConfig } from '../../interfaces/embedding-config.interface.js';
import type { EmbeddingModel, EmbeddingModelSpec } from '../../interfaces/embedding-model.interface.js';
import { EmbeddingProviderError, formatError } from '../../lib/errors.js';
import { BaseEmbeddingService } from './base-embedding.service.js';

export const LOCAL_MODELS: Record<string, EmbeddingModelSpec> = {
  'all-minilm': { dimension: 384, maxTokens: 256, costPer1kTokens: 0 },
  'nomic-embed-text': { dimension: 768, maxTokens: 2048, costPer1kTokens: 0 },
  'mxbai-embed-large': { dimension: 1024, maxTokens: 512, costPer1kTokens: 0 },
};

const FALLBACK_MODEL_SPEC: EmbeddingModelSpec = { dimension: 768, maxTokens: 256, costPer1kTokens: 0 };

const DEFAULT_LOCAL_CONFIG = {
  modelId: 'nomic-embed-text',
  baseUrl: 'http://localhost:11434',
  batchSize: 32,
};

const MAX_LOCAL_BATCH_SIZE = 512;

/**
 * Embeddings from a locally hosted model served by Ollama
 */
export class LocalEmbeddingService extends BaseEmbeddingService {
  private embeddings?: OllamaEmbeddings;
  private readonly modelId: string;
  private readonly modelSpec: EmbeddingModelSpec;
  private readonly dimension: number;
  private readonly baseUrl: string;
  private readonly batchSize: number;

  constructor(config: LocalEmbeddingConfig = {}) {
    super(EmbeddingProviderEnum.LOCAL, config.batchDelayMs ?? 0);
    this.modelId = config.modelId ?? DEFAULT_LOCAL_CONFIG.modelId;

    const spec = Object.hasOwn(LOCAL_MODELS, this.modelId) ? LOCAL_MODELS[this.modelId] : undefined;
    if (!spec) {
      this.logger.warn(
        `Unknown local model ${this.modelId}, assuming ${FALLBACK_MODEL_SPEC.dimension} dimensions and ${FALLBACK_MODEL_SPEC.maxTokens} max tokens`
      );
    }
    this.modelSpec = spec ?? FALLBACK_MODEL_SPEC;
    this.dimension = config.dimension ?? this.modelSpec.dimension;
    this.baseUrl = config.baseUrl ?? DEFAULT_LOCAL_CONFIG.baseUrl;
    this.batchSize = config.batchSize ?? DEFAULT_LOCAL_CONFIG.batchSize;
  }

  async initialize(): Promise<boolean> {
    try {
      this.embeddings = new OllamaEmbeddings({ model: this.modelId, baseUrl: this.baseUrl });
      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info(`Local embedding service initialized with ${this.modelId} at ${this.baseUrl}`);
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize local embedding service', error);
      return false;
    }
  }

  async embedText(text: string): Promise<number[]> {
    this.validateText(text);
    const embeddings = this.requireClient(this.embeddings, 'LocalEmbeddingService');
    try {
      return await embeddings.embedQuery(this.truncateText(text));
    } catch (error) {
      throw new EmbeddingProviderError(`Failed to generate local embedding: ${formatError(error)}`, {
        provider: EmbeddingProviderEnum.LOCAL,
        retryable: false,
        cause: error,
      });
    }
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
      provider: EmbeddingProviderEnum.LOCAL,
      dimension: this.dimension,
      maxTokens: this.modelSpec.maxTokens,
      costPer1kTokens: 0,
    };
  }

  override async close(): Promise<void> {
    this.embeddings = undefined;
    await super.close();
  }

  protected isInitialized(): boolean {
    return this.embeddings !== undefined;
  }

  protected getDefaultBatchSize(): number {
    return this.batchSize;
  }

  protected getMaxBatchSize(): number {
    return MAX_LOCAL_BATCH_SIZE;
  }

  /**
   * One embedDocuments call per sub-batch, falling back to single texts on failure
   */
  protected override async embedSubBatch(batch: string[], offset: number): Promise<number[][]> {
    const embeddings = this.requireClient(this.embeddings, 'LocalEmbeddingService');
    if (batch.some((text) => !text.trim())) {
      return this.embedEachSettled(batch, offset);
    }

    try {
      const vectors = await embeddings.embedDocuments(batch.map((text) => this.truncateText(text)));
      if (vectors.length !== batch.length) {
        throw new Error(`Expected ${batch.length} embeddings, got ${vectors.length}`);
      }
      return vectors;
    } catch (error) {
      this.logger.warn(`Batch request failed, embedding items individually: ${formatError(error)}`);
      return this.embedEachSettled(batch, offset);
    }
  }
}
