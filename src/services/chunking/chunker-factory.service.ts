import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import { ConfigProfileEnum, isConfigProfile } from '../../enums/config-profile.enum.js';
import type { ChunkingOptions } from '../../interfaces/chunking-options.interface.js';
import { ConfigurationError } from '../../lib/errors.js';
import type { BaseChunker } from './base-chunker.service.js';
import { FixedSizeChunker } from './fixed-size-chunker.service.js';
import { RecursiveChunker } from './recursive-chunker.service.js';
import { SemanticChunker } from './semantic-chunker.service.js';

type ChunkerConstructor = new (options?: ChunkingOptions) => BaseChunker;

const CHUNKERS: Record<string, ChunkerConstructor> = {
  semantic: SemanticChunker,
  fixed: FixedSizeChunker,
  fixed_size: FixedSizeChunker,
  recursive: RecursiveChunker,
};

type RecommendedTable = Record<ConfigProfileEnum, ChunkingOptions>;

const SEMANTIC_RECOMMENDED: RecommendedTable = {
  [ConfigProfileEnum.ECONOMY]: {
    chunkSize: 800,
    chunkOverlap: 100,
    minChunkSize: 100,
    maxChunkSize: 1500,
    respectParagraphs: true,
    respectHeaders: false,
    preserveCodeBlocks: true,
  },
  [ConfigProfileEnum.STANDARD]: {
    chunkSize: 1000,
    chunkOverlap: 200,
    minChunkSize: 100,
    maxChunkSize: 2000,
    respectParagraphs: true,
    respectHeaders: true,
    preserveCodeBlocks: true,
  },
  [ConfigProfileEnum.PREMIUM]: {
    chunkSize: 1200,
    chunkOverlap: 300,
    minChunkSize: 150,
    maxChunkSize: 2500,
    respectParagraphs: true,
    respectHeaders: true,
    preserveCodeBlocks: true,
  },
};

const FIXED_RECOMMENDED: RecommendedTable = {
  [ConfigProfileEnum.ECONOMY]: { chunkSize: 500, chunkOverlap: 50, minChunkSize: 100, maxChunkSize: 1000 },
  [ConfigProfileEnum.STANDARD]: { chunkSize: 1000, chunkOverlap: 100, minChunkSize: 100, maxChunkSize: 1500 },
  [ConfigProfileEnum.PREMIUM]: { chunkSize: 1500, chunkOverlap: 200, minChunkSize: 150, maxChunkSize: 2000 },
};

const RECURSIVE_RECOMMENDED: RecommendedTable = {
  [ConfigProfileEnum.ECONOMY]: {
    chunkSize: 800,
    chunkOverlap: 100,
    minChunkSize: 100,
    maxChunkSize: 1500,
    separators: ['\n\n', '\n', ' ', ''],
  },
  [ConfigProfileEnum.STANDARD]: {
    chunkSize: 1000,
    chunkOverlap: 150,
    minChunkSize: 100,
    maxChunkSize: 2000,
    separators: ['\n\n', '\n', '. ', ' ', ''],
  },
  [ConfigProfileEnum.PREMIUM]: {
    chunkSize: 1200,
    chunkOverlap: 250,
    minChunkSize: 150,
    maxChunkSize: 2500,
    separators: ['\n\n', '\n', '. ', '! ', '? ', ' ', ''],
  },
};

const RECOMMENDED_CONFIGS: Record<string, RecommendedTable> = {
  semantic: SEMANTIC_RECOMMENDED,
  fixed: FIXED_RECOMMENDED,
  fixed_size: FIXED_RECOMMENDED,
  recursive: RECURSIVE_RECOMMENDED,
};

/**
 * Creates chunkers by strategy name
 */
export class ChunkerFactory {
  /**
   * @param strategy - 'semantic', 'fixed', 'fixed_size' or 'recursive' (case-insensitive)
   * @param options - Size constraints and strategy-specific options
   * @throws ConfigurationError for an unknown strategy
   */
  static create(strategy: string = ChunkingStrategyEnum.SEMANTIC, options: ChunkingOptions = {}): BaseChunker {
    const Chunker = CHUNKERS[strategy.toLowerCase()];
    if (!Chunker) {
      throw new ConfigurationError(
        `Unknown chunking strategy: ${strategy}. Supported strategies: ${ChunkerFactory.getSupportedStrategies().join(', ')}`
      );
    }
    return new Chunker(options);
  }

  static getSupportedStrategies(): string[] {
    return Object.keys(CHUNKERS);
  }

  /**
   * Recommended options for a strategy and cost/quality profile; `{}` when either is unknown
   */
  static getRecommendedConfig(strategy: string, profile: string = ConfigProfileEnum.STANDARD): ChunkingOptions {
    const table = RECOMMENDED_CONFIGS[strategy.toLowerCase()];
    const key = profile.toLowerCase();
    if (!table || !isConfigProfile(key)) {
      return {};
    }
    const recommended = table[key];
    return { ...recommended, ...(recommended.separators ? { separators: [...recommended.separators] } : {}) };
  }
}
