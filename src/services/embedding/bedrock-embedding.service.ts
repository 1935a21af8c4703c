import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { EmbeddingProviderEnum } from '../../enums/embedding-provider.enum.js';
import type { BedrockEmbeddingConfig } from '../../interfaces/embedding-config.interface.js';
import type { EmbeddingModel, EmbeddingModelSpec } from '../../interfaces/embedding-model.interface.js';
import { ConfigurationError, EmbeddingProviderError, errorName, formatError } from '../../lib/errors.js';
import { delay } from '../../lib/utils/async.util.js';
import { isRecord } from '../../lib/utils/object.util.js';
import { toNumberArray } from '../../lib/utils/vector.util.js';
import { BaseEmbeddingService } from './base-embedding.service.js';

export type BedrockRequestFormat = 'titan' | 'titan_v2' | 'cohere';

interface BedrockModelSpec extends EmbeddingModelSpec {
  requestFormat: BedrockRequestFormat;
  /** Output dimensions the model accepts; absent when fixed */
  supportedDimensions?: readonly number[];
}

export const BEDROCK_MODELS: Record<string, BedrockModelSpec> = {
  'amazon.titan-embed-text-v1': { dimension: 1536, maxTokens: 8192, costPer1kTokens: 0.0001, requestFormat: 'titan' },
  'amazon.titan-embed-text-v2:0': {
    dimension: 1024,
    maxTokens: 8192,
    costPer1kTokens: 0.00002,
    requestFormat: 'titan_v2',
    supportedDimensions: [256, 512, 1024],
  },
  'cohere.embed-english-v3': { dimension: 1024, maxTokens: 512, costPer1kTokens: 0.0001, requestFormat: 'cohere' },
  'cohere.embed-multilingual-v3': { dimension: 1024, maxTokens: 512, costPer1kTokens: 0.0001, requestFormat: 'cohere' },
};

interface BedrockCodec {
  encode(text: string, dimension: number): Record<string, unknown>;
  decode(body: unknown): number[] | undefined;
}

const BEDROCK_CODECS: Record<BedrockRequestFormat, BedrockCodec> = {
  titan: {
    encode: (text) => ({ inputText: text }),
    decode: (body) => (isRecord(body) ? toNumberArray(body['embedding']) : undefined),
  },
  titan_v2: {
    encode: (text, dimension) => ({ inputText: text, dimensions: dimension, normalize: true }),
    decode: (body) => (isRecord(body) ? toNumberArray(body['embedding']) : undefined),
  },
  cohere: {
    encode: (text) => ({ texts: [text], input_type: 'search_document', truncate: 'END' }),
    decode: (body) => {
      if (!isRecord(body) || !Array.isArray(body['embeddings'])) return undefined;
      return toNumberArray(body['embeddings'][0]);
    },
  },
};

/** Errors Bedrock will return again on retry */
const PERMANENT_ERRORS = new Set(['ValidationException', 'AccessDeniedException']);

const DEFAULT_BEDROCK_CONFIG = {
  modelId: 'amazon.titan-embed-text-v2:0',
  region: 'us-east-2',
  batchSize: 20,
  maxRetries: 3,
  retryBaseDelayMs: 1000,
};

const MAX_BEDROCK_BATCH_SIZE = 100;

/**
 * Embeddings from Amazon Bedrock models (Titan, Cohere)
 */
export class BedrockEmbeddingService extends BaseEmbeddingService {
  private client?: BedrockRuntimeClient;
  private readonly modelId: string;
  private readonly modelSpec: BedrockModelSpec;
  private readonly dimension: number;
  private readonly region: string;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(config: BedrockEmbeddingConfig = {}) {
    super(EmbeddingProviderEnum.BEDROCK, config.batchDelayMs);
    this.modelId = config.modelId ?? DEFAULT_BEDROCK_CONFIG.modelId;

    const spec = Object.hasOwn(BEDROCK_MODELS, this.modelId) ? BEDROCK_MODELS[this.modelId] : undefined;
    if (!spec) {
      throw new ConfigurationError(
        `Unsupported Bedrock model: ${this.modelId}. Supported models: ${Object.keys(BEDROCK_MODELS).join(', ')}`
      );
    }
    this.modelSpec = spec;

    this.dimension = config.dimension ?? spec.dimension;
    if (spec.supportedDimensions && !spec.supportedDimensions.includes(this.dimension)) {
      throw new ConfigurationError(
        `Unsupported dimension ${this.dimension} for ${this.modelId}. Supported: ${spec.supportedDimensions.join(', ')}`
      );
    }
    if (!spec.supportedDimensions && this.dimension !== spec.dimension) {
      throw new ConfigurationError(`Model ${this.modelId} only produces ${spec.dimension}-dimensional embeddings`);
    }

    this.region = config.region ?? DEFAULT_BEDROCK_CONFIG.region;
    this.batchSize = config.batchSize ?? DEFAULT_BEDROCK_CONFIG.batchSize;
    this.maxRetries = Math.max(1, config.maxRetries ?? DEFAULT_BEDROCK_CONFIG.maxRetries);
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? DEFAULT_BEDROCK_CONFIG.retryBaseDelayMs;
  }

  async initialize(): Promise<boolean> {
    try {
      // Retries are handled here, per text
      this.client = new BedrockRuntimeClient({ region: this.region, maxAttempts: 1 });
      const healthy = await this.healthCheck();
      if (healthy) {
        this.logger.info(`Bedrock embedding service initialized with ${this.modelId}`);
      }
      return healthy;
    } catch (error) {
      this.logger.error('Failed to initialize Bedrock embedding service', error);
      return false;
    }
  }

  async embedText(text: string): Promise<number[]> {
    this.validateText(text);
    const client = this.requireClient(this.client, 'BedrockEmbeddingService');
    const input = this.truncateText(text);

    let lastError: unknown;
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        return await this.invokeModel(client, input);
      } catch (error) {
        lastError = error;
        const name = errorName(error);
        if (name && PERMANENT_ERRORS.has(name)) {
          throw new EmbeddingProviderError(`Bedrock rejected the request: ${formatError(error)}`, {
            provider: EmbeddingProviderEnum.BEDROCK,
            retryable: false,
            cause: error,
          });
        }
        if (attempt < this.maxRetries - 1) {
          const waitMs = this.retryBaseDelayMs * 2 ** attempt;
          this.logger.warn(`Bedrock attempt ${attempt + 1} failed, retrying in ${waitMs}ms: ${formatError(error)}`);
          await delay(waitMs);
        }
      }
    }

    throw new EmbeddingProviderError(`Failed after ${this.maxRetries} attempts: ${formatError(lastError)}`, {
      provider: EmbeddingProviderEnum.BEDROCK,
      retryable: true,
      cause: lastError,
    });
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
      provider: EmbeddingProviderEnum.BEDROCK,
      dimension: this.dimension,
      maxTokens: this.modelSpec.maxTokens,
      costPer1kTokens: this.modelSpec.costPer1kTokens,
    };
  }

  override async close(): Promise<void> {
    this.client?.destroy();
    this.client = undefined;
    await super.close();
  }

  protected isInitialized(): boolean {
    return this.client !== undefined;
  }

  protected getDefaultBatchSize(): number {
    return this.batchSize;
  }

  protected getMaxBatchSize(): number {
    return MAX_BEDROCK_BATCH_SIZE;
  }

  private async invokeModel(client: BedrockRuntimeClient, text: string): Promise<number[]> {
    const codec = BEDROCK_CODECS[this.modelSpec.requestFormat];
    const response = await client.send(
      new InvokeModelCommand({
        modelId: this.modelId,
        body: JSON.stringify(codec.encode(text, this.dimension)),
        contentType: 'application/json',
        accept: 'application/json',
      })
    );

    const body: unknown = JSON.parse(new TextDecoder().decode(response.body));
    const embedding = codec.decode(body);
    if (!embedding) {
      throw new Error(`Unexpected response body from ${this.modelId}`);
    }
    if (embedding.length !== this.dimension) {
      this.logger.warn(`Expected ${this.dimension} dimensions, got ${embedding.length}`);
    }
    return embedding;
  }
}
