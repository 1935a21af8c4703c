import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import type { Chunk, DocumentMetadata } from '../../interfaces/chunk.interface.js';
import type { ChunkingOptions } from '../../interfaces/chunking-options.interface.js';
import { BaseChunker, trimSpan, type TextSpan } from './base-chunker.service.js';

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Splits on a hierarchy of separators, descending to finer separators only for
 * pieces that are still too large. Pieces are tracked as spans of the original
 * text, so chunk offsets are exact.
 */
export class RecursiveChunker extends BaseChunker {
  private readonly separators: readonly string[];

  constructor(options: ChunkingOptions = {}) {
    super(options);
    this.separators = options.separators?.length ? [...options.separators] : DEFAULT_SEPARATORS;
  }

  getStrategyName(): ChunkingStrategyEnum {
    return ChunkingStrategyEnum.RECURSIVE;
  }

  getSeparators(): readonly string[] {
    return this.separators;
  }

  async chunkText(text: string, documentId: string, metadata: DocumentMetadata = {}): Promise<Chunk[]> {
    this.validateText(text);

    const pieces = this.splitRecursive(text, { start: 0, end: text.length }, this.separators);
    const spans = this.mergeSmallPieces(text, dropCoveredPieces(pieces));
    const chunks = this.spansToChunks(text, spans, documentId, metadata);
    this.logResult(documentId, chunks);
    return chunks;
  }

  private splitRecursive(text: string, span: TextSpan, separators: readonly string[]): TextSpan[] {
    const { chunkSize, chunkOverlap, maxChunkSize } = this.config;
    if (separators.length === 0 || span.end - span.start <= chunkSize) {
      return [span];
    }

    const [separator, ...remaining] = separators;
    const splits = splitSpan(text, span, separator);
    const pieces: TextSpan[] = [];
    let current: TextSpan[] = [];
    let currentLength = 0;

    const flush = (): void => {
      const joined: TextSpan = { start: current[0].start, end: current[current.length - 1].end };
      if (joined.end - joined.start > maxChunkSize && remaining.length > 0) {
        pieces.push(...this.splitRecursive(text, joined, remaining));
      } else {
        pieces.push(joined);
      }
    };

    for (const split of splits) {
      const splitLength = split.end - split.start;
      if (currentLength + splitLength > chunkSize && current.length > 0) {
        flush();
        // Overlap carries the last split only
        if (chunkOverlap > 0) {
          const last = current[current.length - 1];
          current = [last];
          currentLength = last.end - last.start;
        } else {
          current = [];
          currentLength = 0;
        }
      }
      current.push(split);
      currentLength += splitLength;
    }

    if (current.length > 0) {
      flush();
    }

    return pieces;
  }

  /**
   * Fold pieces below minChunkSize into a neighbour while the result stays within
   * maxChunkSize. A leading short piece folds into the following one.
   */
  private mergeSmallPieces(text: string, pieces: TextSpan[]): TextSpan[] {
    const { minChunkSize, maxChunkSize } = this.config;
    const isShort = (span: TextSpan): boolean => {
      const trimmed = trimSpan(text, span);
      return trimmed.end - trimmed.start < minChunkSize;
    };

    const merged: TextSpan[] = [];
    for (const piece of pieces) {
      const previous = merged[merged.length - 1];
      if (previous && isShort(piece) && piece.end - previous.start <= maxChunkSize) {
        merged[merged.length - 1] = { start: previous.start, end: Math.max(previous.end, piece.end) };
        continue;
      }
      merged.push(piece);
    }

    if (merged.length > 1 && isShort(merged[0]) && merged[1].end - merged[0].start <= maxChunkSize) {
      merged.splice(0, 2, { start: merged[0].start, end: merged[1].end });
    }

    return merged;
  }
}

/**
 * Spans ending just after each occurrence of a separator, so no text falls between
 * consecutive splits; the empty separator yields characters
 */
function splitSpan(text: string, span: TextSpan, separator: string): TextSpan[] {
  const splits: TextSpan[] = [];
  if (separator === '') {
    for (let i = span.start; i < span.end; i++) {
      splits.push({ start: i, end: i + 1 });
    }
    return splits;
  }

  let position = span.start;
  while (position < span.end) {
    const found = text.indexOf(separator, position);
    const end = found === -1 || found + separator.length > span.end ? span.end : found + separator.length;
    splits.push({ start: position, end });
    position = end;
  }
  return splits;
}

/**
 * Drop pieces that add nothing past the end of the previous kept piece.
 * The single-split overlap seed can otherwise surface as a piece of its own.
 */
function dropCoveredPieces(pieces: TextSpan[]): TextSpan[] {
  const kept: TextSpan[] = [];
  let coveredUntil = -1;
  for (const piece of pieces) {
    if (piece.end > coveredUntil) {
      kept.push(piece);
      coveredUntil = piece.end;
    }
  }
  return kept;
}
