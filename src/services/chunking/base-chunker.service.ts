import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import type { Chunk, DocumentMetadata } from '../../interfaces/chunk.interface.js';
import type { ChunkingOptions } from '../../interfaces/chunking-options.interface.js';
import { ValidationError } from '../../lib/errors.js';
import { Logger } from '../../lib/utils/logger.util.js';

export type ChunkSizeConfig = Required<Pick<ChunkingOptions, 'chunkSize' | 'chunkOverlap' | 'minChunkSize' | 'maxChunkSize'>>;

/**
 * Default size constraints shared by every strategy
 */
export const DEFAULT_CHUNK_SIZE_CONFIG: ChunkSizeConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  minChunkSize: 100,
  maxChunkSize: 2000,
};

/**
 * Half-open character range [start, end) of the original text
 */
export interface TextSpan {
  start: number;
  end: number;
}

interface ChunkDraft {
  documentId: string;
  chunkIndex: number;
  text: string;
  span: TextSpan;
  /** Chunk text when it differs from the span's text (restored code blocks, joined sentences) */
  content?: string;
  metadata: DocumentMetadata;
  extra?: DocumentMetadata;
}

/**
 * Common contract for chunking strategies
 */
export abstract class BaseChunker {
  protected readonly config: ChunkSizeConfig;
  protected readonly logger: Logger;

  constructor(options: ChunkingOptions = {}) {
    this.config = {
      chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE_CONFIG.chunkSize,
      chunkOverlap: options.chunkOverlap ?? DEFAULT_CHUNK_SIZE_CONFIG.chunkOverlap,
      minChunkSize: options.minChunkSize ?? DEFAULT_CHUNK_SIZE_CONFIG.minChunkSize,
      maxChunkSize: options.maxChunkSize ?? DEFAULT_CHUNK_SIZE_CONFIG.maxChunkSize,
    };
    this.logger = Logger.getInstance('chunking');
    this.validateConfig();
  }

  /**
   * Split text into ordered chunks
   * @param text - Plain text of the document
   * @param documentId - Stable identifier of the source document
   * @param metadata - Document metadata copied onto every chunk
   * @returns Promise resolving to chunks with sequential indices starting at 0
   * @throws ValidationError if the text is empty or whitespace
   */
  abstract chunkText(text: string, documentId: string, metadata?: DocumentMetadata): Promise<Chunk[]>;

  abstract getStrategyName(): ChunkingStrategyEnum;

  getConfig(): Readonly<ChunkSizeConfig> {
    return this.config;
  }

  protected validateConfig(): void {
    const { chunkSize, chunkOverlap, minChunkSize, maxChunkSize } = this.config;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError('chunkSize must be a positive integer');
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
      throw new ValidationError('chunkOverlap must be a non-negative integer');
    }
    if (chunkOverlap >= chunkSize) {
      throw new ValidationError('chunkOverlap must be less than chunkSize');
    }
    if (minChunkSize > chunkSize) {
      throw new ValidationError('minChunkSize must be less than or equal to chunkSize');
    }
    if (maxChunkSize < chunkSize) {
      throw new ValidationError('maxChunkSize must be greater than or equal to chunkSize');
    }
  }

  protected validateText(text: string): void {
    if (!text || !text.trim()) {
      throw new ValidationError('Text cannot be empty');
    }
  }

  protected generateChunkId(documentId: string, chunkIndex: number): string {
    return `${documentId}:chunk:${chunkIndex}`;
  }

  /**
   * Build a chunk from a span of the original text. The span is narrowed to
   * exclude surrounding whitespace; returns undefined for whitespace-only spans.
   */
  protected createChunk(draft: ChunkDraft): Chunk | undefined {
    const span = trimSpan(draft.text, draft.span);
    const content = (draft.content ?? draft.text.slice(span.start, span.end)).trim();
    if (!content) {
      return undefined;
    }

    return {
      chunkId: this.generateChunkId(draft.documentId, draft.chunkIndex),
      documentId: draft.documentId,
      chunkIndex: draft.chunkIndex,
      content,
      metadata: {
        ...draft.metadata,
        ...draft.extra,
        startChar: span.start,
        endChar: span.end,
        charCount: content.length,
        wordCount: countWords(content),
        chunkingStrategy: this.getStrategyName(),
      },
      createdAt: new Date(),
    };
  }

  /**
   * Turn ordered spans into chunks, skipping empty ones and numbering the rest
   */
  protected spansToChunks(text: string, spans: TextSpan[], documentId: string, metadata: DocumentMetadata): Chunk[] {
    const chunks: Chunk[] = [];
    for (const span of spans) {
      const chunk = this.createChunk({ documentId, chunkIndex: chunks.length, text, span, metadata });
      if (chunk) {
        chunks.push(chunk);
      }
    }
    return chunks;
  }

  protected logResult(documentId: string, chunks: Chunk[]): void {
    this.logger.debug(`Created ${chunks.length} ${this.getStrategyName()} chunks for document ${documentId}`);
  }
}

/**
 * Narrow a span so it starts and ends on non-whitespace characters
 */
export function trimSpan(text: string, span: TextSpan): TextSpan {
  let { start, end } = span;
  while (start < end && /\s/.test(text[start])) start++;
  while (end > start && /\s/.test(text[end - 1])) end--;
  return { start, end };
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
