import { ConfigProfileEnum, isConfigProfile } from '../../enums/config-profile.enum.js';
import { EmbeddingProviderEnum } from '../../enums/embedding-provider.enum.js';
import type { EmbeddingServiceConfig } from '../../interfaces/embedding-config.interface.js';
import { ConfigurationError } from '../../lib/errors.js';
import { Logger } from '../../lib/utils/logger.util.js';
import type { BaseEmbeddingService } from './base-embedding.service.js';
import { BedrockEmbeddingService } from './bedrock-embedding.service.js';
import { LocalEmbeddingService } from './local-embedding.service.js';
import { OpenAIEmbeddingService } from './openai-embedding.service.js';

export type EmbeddingServiceConstructor = new (config: EmbeddingServiceConfig) => BaseEmbeddingService;

const RECOMMENDED_CONFIGS: Record<string, Record<ConfigProfileEnum, EmbeddingServiceConfig>> = {
  [EmbeddingProviderEnum.BEDROCK]: {
    [ConfigProfileEnum.ECONOMY]: { modelId: 'amazon.titan-embed-text-v1', dimension: 1536, batchSize: 10 },
    [ConfigProfileEnum.STANDARD]: { modelId: 'amazon.titan-embed-text-v2:0', dimension: 1024, batchSize: 20 },
    [ConfigProfileEnum.PREMIUM]: { modelId: 'cohere.embed-english-v3', dimension: 1024, batchSize: 50 },
  },
  [EmbeddingProviderEnum.OPENAI]: {
    [ConfigProfileEnum.ECONOMY]: { modelId: 'text-embedding-3-small', dimension: 1536, batchSize: 100 },
    [ConfigProfileEnum.STANDARD]: { modelId: 'text-embedding-3-small', dimension: 1536, batchSize: 100 },
    [ConfigProfileEnum.PREMIUM]: { modelId: 'text-embedding-3-large', dimension: 3072, batchSize: 100 },
  },
  [EmbeddingProviderEnum.LOCAL]: {
    [ConfigProfileEnum.ECONOMY]: { modelId: 'all-minilm', dimension: 384, batchSize: 32 },
    [ConfigProfileEnum.STANDARD]: { modelId: 'nomic-embed-text', dimension: 768, batchSize: 32 },
    [ConfigProfileEnum.PREMIUM]: { modelId: 'nomic-embed-text', dimension: 768, batchSize: 64 },
  },
};

const logger = Logger.getInstance('embedding');

/**
 * Registry of embedding providers by name
 */
export class EmbeddingServiceFactory {
  private static readonly services = new Map<string, EmbeddingServiceConstructor>();

  static registerService(type: string, service: EmbeddingServiceConstructor): void {
    EmbeddingServiceFactory.services.set(type.toLowerCase(), service);
    logger.debug(`Registered embedding service: ${type}`);
  }

  /**
   * @param type - Registered provider name, e.g. 'bedrock', 'openai' or 'local'
   * @param config - Provider options
   * @throws ConfigurationError for an unregistered provider
   */
  static create(type: string, config: EmbeddingServiceConfig = {}): BaseEmbeddingService {
    const Service = EmbeddingServiceFactory.services.get(type.toLowerCase());
    if (!Service) {
      throw new ConfigurationError(
        `Unsupported embedding service type: ${type}. Supported types: ${EmbeddingServiceFactory.getSupportedTypes().join(', ')}`
      );
    }
    return new Service(config);
  }

  static getSupportedTypes(): string[] {
    return [...EmbeddingServiceFactory.services.keys()];
  }

  /**
   * Recommended model and batch settings for a provider and cost/quality profile
   */
  static getRecommendedConfig(type: string, profile: string = ConfigProfileEnum.STANDARD): EmbeddingServiceConfig {
    const table = RECOMMENDED_CONFIGS[type.toLowerCase()];
    const key = profile.toLowerCase();
    if (!table || !isConfigProfile(key)) {
      return {};
    }
    return { ...table[key] };
  }
}

export function registerDefaultEmbeddingServices(): void {
  EmbeddingServiceFactory.registerService(EmbeddingProviderEnum.BEDROCK, BedrockEmbeddingService);
  EmbeddingServiceFactory.registerService(EmbeddingProviderEnum.OPENAI, OpenAIEmbeddingService);
  EmbeddingServiceFactory.registerService(EmbeddingProviderEnum.LOCAL, LocalEmbeddingService);
}

registerDefaultEmbeddingServices();
