import type { EmbeddingCostEstimate, EmbeddingModel } from '../../interfaces/embedding-model.interface.js';
import { NotInitializedError, ValidationError, formatError } from '../../lib/errors.js';
import { delay } from '../../lib/utils/async.util.js';
import { Logger } from '../../lib/utils/logger.util.js';
import { zeroVector } from '../../lib/utils/vector.util.js';

/** Rough characters-per-token ratio used for truncation and cost estimates */
export const CHARS_PER_TOKEN = 4;

const HEALTH_CHECK_TEXT = 'health check';

/**
 * Common contract for embedding providers
 */
export abstract class BaseEmbeddingService {
  protected readonly logger: Logger;
  protected readonly batchDelayMs: number;

  constructor(providerName: string, batchDelayMs = 100) {
    this.logger = Logger.getInstance(`embedding:${providerName}`);
    this.batchDelayMs = batchDelayMs;
  }

  /**
   * Create the provider client and verify it with a test embedding
   * @returns true when the provider answered, false otherwise
   */
  abstract initialize(): Promise<boolean>;

  /**
   * Embed a single text
   * @throws ValidationError for empty text
   */
  abstract embedText(text: string): Promise<number[]>;

  abstract getDimension(): number;

  abstract getMaxTokens(): number;

  abstract getModelInfo(): EmbeddingModel;

  /** Whether initialize() has created the provider client */
  protected abstract isInitialized(): boolean;

  /** Items per sub-batch when embedBatch is called without one */
  protected abstract getDefaultBatchSize(): number;

  /** Largest sub-batch the provider accepts */
  protected abstract getMaxBatchSize(): number;

  /**
   * Embed many texts, sub-batch by sub-batch. Output is aligned with input; an
   * item that fails is replaced by a zero vector.
   * @param texts - Texts to embed
   * @param batchSize - Items per sub-batch, capped at the provider limit
   */
  async embedBatch(texts: string[], batchSize?: number): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (!this.isInitialized()) {
      throw new NotInitializedError(this.constructor.name);
    }

    const size = Math.max(1, Math.min(batchSize ?? this.getDefaultBatchSize(), this.getMaxBatchSize()));
    const totalBatches = Math.ceil(texts.length / size);
    const embeddings: number[][] = [];

    for (let offset = 0; offset < texts.length; offset += size) {
      const batch = texts.slice(offset, offset + size);
      this.logger.debug(`Processing embedding batch ${offset / size + 1}/${totalBatches}`);
      embeddings.push(...(await this.embedSubBatch(batch, offset)));

      if (offset + size < texts.length && this.batchDelayMs > 0) {
        await delay(this.batchDelayMs);
      }
    }

    this.logger.info(`Generated ${embeddings.length} embeddings`);
    return embeddings;
  }

  /**
   * Embed one sub-batch. Defaults to concurrent single-text calls.
   */
  protected embedSubBatch(batch: string[], offset: number): Promise<number[][]> {
    return this.embedEachSettled(batch, offset);
  }

  protected async embedEachSettled(batch: string[], offset: number): Promise<number[][]> {
    const settled = await Promise.allSettled(batch.map((text) => this.embedText(text)));
    return settled.map((result, i) => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      this.logger.error(`Failed to embed text ${offset + i}`, result.reason);
      return zeroVector(this.getDimension());
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      const embedding = await this.embedText(HEALTH_CHECK_TEXT);
      return embedding.length > 0;
    } catch (error) {
      this.logger.warn(`Health check failed: ${formatError(error)}`);
      return false;
    }
  }

  /**
   * Estimate token usage and cost from character counts
   */
  estimateCost(texts: string[]): EmbeddingCostEstimate {
    const model = this.getModelInfo();
    const totalChars = texts.reduce((sum, text) => sum + text.length, 0);
    const estimatedTokens = Math.floor(totalChars / CHARS_PER_TOKEN);
    return {
      modelId: model.modelId,
      estimatedTokens,
      estimatedCost: (estimatedTokens / 1000) * model.costPer1kTokens,
      textCount: texts.length,
    };
  }

  async close(): Promise<void> {
    this.logger.debug('Closed embedding service');
  }

  protected validateText(text: string): void {
    if (!text || !text.trim()) {
      throw new ValidationError('Text cannot be empty');
    }
  }

  /**
   * Cut text to the model's input budget (maxTokens * 4 characters)
   */
  protected truncateText(text: string, maxChars = this.getMaxTokens() * CHARS_PER_TOKEN): string {
    if (text.length <= maxChars) {
      return text;
    }
    this.logger.warn(`Text truncated from ${text.length} to ${maxChars} characters`);
    return text.slice(0, maxChars);
  }

  protected requireClient<T>(client: T | undefined, component: string): T {
    if (client === undefined) {
      throw new NotInitializedError(component);
    }
    return client;
  }
}
