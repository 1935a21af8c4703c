import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import type { Chunk, DocumentMetadata } from '../../interfaces/chunk.interface.js';
import { BaseChunker, type TextSpan } from './base-chunker.service.js';

/** How far back from a window end to look for a word boundary */
const WORD_BOUNDARY_WINDOW = 50;

/**
 * Fixed-size windows with overlap, ending on a word boundary when one is close
 */
export class FixedSizeChunker extends BaseChunker {
  getStrategyName(): ChunkingStrategyEnum {
    return ChunkingStrategyEnum.FIXED_SIZE;
  }

  async chunkText(text: string, documentId: string, metadata: DocumentMetadata = {}): Promise<Chunk[]> {
    this.validateText(text);

    const spans = this.computeWindows(text);
    const chunks = this.spansToChunks(text, spans, documentId, metadata);
    this.logResult(documentId, chunks);
    return chunks;
  }

  private computeWindows(text: string): TextSpan[] {
    const { chunkSize, chunkOverlap, minChunkSize } = this.config;
    const windows: TextSpan[] = [];
    let start = 0;

    while (start < text.length) {
      let end = Math.min(start + chunkSize, text.length);

      if (end < text.length) {
        const searchStart = Math.max(end - WORD_BOUNDARY_WINDOW, start);
        const lastSpace = text.lastIndexOf(' ', end - 1);
        if (lastSpace >= searchStart && lastSpace > start) {
          end = lastSpace + 1;
        }
      }

      const isTerminal = end >= text.length;
      if (isTerminal || end - start >= minChunkSize) {
        windows.push({ start, end });
      }
      if (isTerminal) {
        break;
      }

      const next = end - chunkOverlap;
      start = next > start ? next : end;
    }

    return windows;
  }
}
