/**
 * JSON-compatible metadata value
 */
export type MetadataValue = string | number | boolean | null | MetadataValue[] | { [key: string]: MetadataValue };

export type DocumentMetadata = Record<string, MetadataValue>;

/**
 * Metadata recorded on every chunk. Caller-supplied document metadata is merged in.
 */
export interface ChunkMetadata extends DocumentMetadata {
  /** Offset of the first character of the chunk in the original text */
  startChar: number;
  /** Offset one past the last character of the chunk in the original text */
  endChar: number;
  charCount: number;
  wordCount: number;
  chunkingStrategy: string;
}

/**
 * A contiguous piece of a source document
 */
export interface Chunk {
  /** `${documentId}:chunk:${chunkIndex}` */
  readonly chunkId: string;
  readonly documentId: string;
  readonly chunkIndex: number;
  readonly content: string;
  readonly metadata: ChunkMetadata;
  readonly createdAt: Date;
}

export interface ChunkWithEmbedding extends Chunk {
  readonly embedding: number[];
}
