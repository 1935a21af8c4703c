/**
 * Options for text chunking operations
 */
export interface ChunkingOptions {
  /** Target chunk size in characters. Default: 1000 */
  chunkSize?: number;
  /** Overlap between consecutive chunks in characters. Default: 200 */
  chunkOverlap?: number;
  /** Smallest chunk kept, except for the last chunk of a document. Default: 100 */
  minChunkSize?: number;
  /** Hard upper bound before a piece is split further. Default: 2000 */
  maxChunkSize?: number;
  /** Recursive strategy only. Default: ['\n\n', '\n', '. ', ' ', ''] */
  separators?: string[];
  /** Semantic strategy only. Default: true */
  respectParagraphs?: boolean;
  /** Semantic strategy only. Default: true */
  respectHeaders?: boolean;
  /** Semantic strategy only. Default: true */
  preserveCodeBlocks?: boolean;
}
