import { VectorStoreProviderEnum } from '../../enums/vector-store-provider.enum.js';
import type { VectorStoreConfig } from '../../interfaces/vector-store-config.interface.js';
import { ConfigurationError } from '../../lib/errors.js';
import { Logger } from '../../lib/utils/logger.util.js';
import type { BaseVectorStore } from './base-vector-store.service.js';
import { MemoryVectorStore } from './memory-vector-store.service.js';
import { OpenSearchVectorStore } from './opensearch-vector-store.service.js';
import { PgVectorStore } from './pgvector-vector-store.service.js';
import { PineconeVectorStore } from './pinecone-vector-store.service.js';
import { QdrantVectorStore } from './qdrant-vector-store.service.js';

export type VectorStoreConstructor = new (config: VectorStoreConfig) => BaseVectorStore;

const logger = Logger.getInstance('vector-store');

/**
 * Registry of vector store backends by name
 */
export class VectorStoreFactory {
  private static readonly stores = new Map<string, VectorStoreConstructor>();

  static registerStore(type: string, store: VectorStoreConstructor): void {
    VectorStoreFactory.stores.set(type.toLowerCase(), store);
    logger.debug(`Registered vector store: ${type}`);
  }

  /**
   * @param type - Registered backend name, e.g. 'opensearch', 'pgvector' or 'qdrant'
   * @param config - Connection options
   * @throws ConfigurationError for an unregistered backend
   */
  static create(type: string, config: VectorStoreConfig = {}): BaseVectorStore {
    const Store = VectorStoreFactory.stores.get(type.toLowerCase());
    if (!Store) {
      throw new ConfigurationError(
        `Unsupported vector store type: ${type}. Supported types: ${VectorStoreFactory.getSupportedTypes().join(', ')}`
      );
    }
    return new Store(config);
  }

  static getSupportedTypes(): string[] {
    return [...VectorStoreFactory.stores.keys()];
  }
}

export function registerDefaultVectorStores(): void {
  VectorStoreFactory.registerStore(VectorStoreProviderEnum.OPENSEARCH, OpenSearchVectorStore);
  VectorStoreFactory.registerStore(VectorStoreProviderEnum.PGVECTOR, PgVectorStore);
  VectorStoreFactory.registerStore(VectorStoreProviderEnum.QDRANT, QdrantVectorStore);
  VectorStoreFactory.registerStore(VectorStoreProviderEnum.PINECONE, PineconeVectorStore);
  VectorStoreFactory.registerStore(VectorStoreProviderEnum.MEMORY, MemoryVectorStore);
}

registerDefaultVectorStores();
