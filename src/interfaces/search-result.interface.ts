import type { DocumentMetadata } from './chunk.interface.js';

export interface SearchResult {
  chunkId: string;
  documentId: string;
  content: string;
  /** Normalised relevance in [0, 1], higher is better */
  score: number;
  metadata: DocumentMetadata;
  chunkIndex: number;
}

/**
 * AND of equality predicates. `documentId`, `chunkId` and `chunkIndex` address the
 * top-level chunk fields, every other key a metadata field.
 */
export type MetadataFilter = Record<string, string | number | boolean>;

export interface SearchOptions {
  /** Default: 10 */
  limit?: number;
  /** Minimum normalised score. Default: 0.7 */
  threshold?: number;
  filters?: MetadataFilter;
}
