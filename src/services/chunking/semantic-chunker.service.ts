import { ChunkingStrategyEnum } from '../../enums/chunking-strategy.enum.js';
import type { Chunk, DocumentMetadata } from '../../interfaces/chunk.interface.js';
import type { ChunkingOptions } from '../../interfaces/chunking-options.interface.js';
import { BaseChunker, trimSpan, type TextSpan } from './base-chunker.service.js';

type SemanticOptions = Required<Pick<ChunkingOptions, 'respectParagraphs' | 'respectHeaders' | 'preserveCodeBlocks'>>;

const DEFAULT_SEMANTIC_OPTIONS: SemanticOptions = {
  respectParagraphs: true,
  respectHeaders: true,
  preserveCodeBlocks: true,
};

const CODE_BLOCK_PATTERN = /```[\s\S]*?```/g;
const HEADER_PATTERN = /^#{1,6}\s+.+$/gm;
const PARAGRAPH_BREAK_PATTERN = /\n\s*\n+/g;
// Whitespace after . ? ! followed by a capital, except after an initial (J.),
// a dotted abbreviation (e.g.) or a short title (Mr.)
const SENTENCE_BOUNDARY_PATTERN = /(?<!\b[A-Z]\.)(?<!\w\.\w\.)(?<![A-Z][a-z]\.)(?<=[.?!])\s+(?=[A-Z])/g;

interface Sentence extends TextSpan {
  text: string;
}

interface CodeBlock {
  placeholder: string;
  code: string;
  /** Offset of the placeholder in the working text */
  workingStart: number;
  /** Offset of the code block in the original text */
  originalStart: number;
}

/**
 * Text with fenced code blocks swapped for placeholders, able to map offsets back
 */
class MaskedText {
  readonly text: string;
  private readonly blocks: CodeBlock[];

  constructor(original: string, maskCodeBlocks: boolean) {
    this.blocks = [];
    if (!maskCodeBlocks) {
      this.text = original;
      return;
    }

    let working = '';
    let last = 0;
    const pattern = new RegExp(CODE_BLOCK_PATTERN.source, 'g');
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(original)) !== null) {
      working += original.slice(last, match.index);
      const placeholder = `__CODE_BLOCK_${this.blocks.length}__`;
      this.blocks.push({ placeholder, code: match[0], workingStart: working.length, originalStart: match.index });
      working += placeholder;
      last = match.index + match[0].length;
    }
    this.text = working + original.slice(last);
  }

  toOriginalOffset(offset: number): number {
    let shift = 0;
    for (const block of this.blocks) {
      const placeholderEnd = block.workingStart + block.placeholder.length;
      if (offset >= placeholderEnd) {
        shift += block.code.length - block.placeholder.length;
      } else if (offset > block.workingStart) {
        return block.originalStart;
      } else {
        break;
      }
    }
    return offset + shift;
  }

  restore(content: string): string {
    let restored = content;
    for (const block of this.blocks) {
      if (restored.includes(block.placeholder)) {
        restored = restored.split(block.placeholder).join(block.code);
      }
    }
    return restored;
  }
}

/**
 * Structure-aware chunking: sections by headers or paragraphs, then whole
 * sentences accumulated up to the target size with sentence-level overlap.
 */
export class SemanticChunker extends BaseChunker {
  private readonly semanticOptions: SemanticOptions;

  constructor(options: ChunkingOptions = {}) {
    super(options);
    this.semanticOptions = {
      respectParagraphs: options.respectParagraphs ?? DEFAULT_SEMANTIC_OPTIONS.respectParagraphs,
      respectHeaders: options.respectHeaders ?? DEFAULT_SEMANTIC_OPTIONS.respectHeaders,
      preserveCodeBlocks: options.preserveCodeBlocks ?? DEFAULT_SEMANTIC_OPTIONS.preserveCodeBlocks,
    };
  }

  getStrategyName(): ChunkingStrategyEnum {
    return ChunkingStrategyEnum.SEMANTIC;
  }

  async chunkText(text: string, documentId: string, metadata: DocumentMetadata = {}): Promise<Chunk[]> {
    this.validateText(text);

    const masked = new MaskedText(text, this.semanticOptions.preserveCodeBlocks);
    const sections = this.splitSections(masked.text).map((section) => splitSentences(masked.text, section));
    const groups = this.groupSentences(sections);

    const chunks: Chunk[] = [];
    for (const group of groups) {
      const first = group[0];
      const last = group[group.length - 1];
      const chunk = this.createChunk({
        documentId,
        chunkIndex: chunks.length,
        text,
        span: { start: masked.toOriginalOffset(first.start), end: masked.toOriginalOffset(last.end) },
        content: masked.restore(group.map((sentence) => sentence.text).join(' ')),
        metadata,
        extra: { sentenceCount: group.length },
      });
      if (chunk) {
        chunks.push(chunk);
      }
    }

    this.logResult(documentId, chunks);
    return chunks;
  }

  private splitSections(text: string): TextSpan[] {
    if (this.semanticOptions.respectHeaders) {
      const headerStarts = matchOffsets(text, HEADER_PATTERN).map((match) => match.start);
      if (headerStarts.length > 0) {
        const boundaries = [0, ...headerStarts.filter((start) => start > 0), text.length];
        return nonEmptySpans(
          text,
          boundaries.slice(0, -1).map((start, i) => ({ start, end: boundaries[i + 1] }))
        );
      }
    }

    if (this.semanticOptions.respectParagraphs) {
      const spans: TextSpan[] = [];
      let last = 0;
      for (const breakSpan of matchOffsets(text, PARAGRAPH_BREAK_PATTERN)) {
        spans.push({ start: last, end: breakSpan.start });
        last = breakSpan.end;
      }
      spans.push({ start: last, end: text.length });
      return nonEmptySpans(text, spans);
    }

    return nonEmptySpans(text, [{ start: 0, end: text.length }]);
  }

  /**
   * Accumulate sentences into chunk groups. Overlap never crosses a section
   * boundary; a section remainder below minChunkSize is carried forward.
   */
  private groupSentences(sections: Sentence[][]): Sentence[][] {
    const { chunkSize, maxChunkSize, minChunkSize } = this.config;
    const groups: Sentence[][] = [];
    let current: Sentence[] = [];
    let currentLength = 0;
    let hasNewContent = false;

    const emit = (): void => {
      groups.push(current);
      current = this.getOverlapSentences(current);
      currentLength = current.reduce((sum, sentence) => sum + sentence.text.length, 0);
      hasNewContent = false;
    };
    const reset = (): void => {
      current = [];
      currentLength = 0;
      hasNewContent = false;
    };

    for (const sentences of sections) {
      for (const sentence of sentences) {
        const sentenceLength = sentence.text.length;

        if (currentLength + sentenceLength > maxChunkSize && current.length > 0) {
          if (hasNewContent) {
            emit();
          }
          if (currentLength + sentenceLength > maxChunkSize) {
            reset();
          }
        }

        current.push(sentence);
        currentLength += sentenceLength + 1;
        hasNewContent = true;

        if (currentLength >= chunkSize && current.length > 1) {
          emit();
        }
      }

      if (hasNewContent && currentLength >= minChunkSize) {
        groups.push(current);
        reset();
      } else if (!hasNewContent) {
        reset();
      }
    }

    if (hasNewContent) {
      groups.push(current);
    }

    return groups;
  }

  /**
   * Trailing whole sentences covering up to chunkOverlap characters, at least one
   */
  private getOverlapSentences(sentences: Sentence[]): Sentence[] {
    const overlap: Sentence[] = [];
    let overlapLength = 0;

    for (let i = sentences.length - 1; i >= 0; i--) {
      const sentenceLength = sentences[i].text.length;
      if (overlapLength + sentenceLength <= this.config.chunkOverlap) {
        overlap.unshift(sentences[i]);
        overlapLength += sentenceLength;
      } else {
        if (overlap.length === 0) {
          overlap.unshift(sentences[i]);
        }
        break;
      }
    }

    return overlap;
  }
}

function matchOffsets(text: string, pattern: RegExp): TextSpan[] {
  const regex = new RegExp(pattern.source, pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`);
  const offsets: TextSpan[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    offsets.push({ start: match.index, end: match.index + match[0].length });
    if (match[0].length === 0) {
      regex.lastIndex++;
    }
  }
  return offsets;
}

function nonEmptySpans(text: string, spans: TextSpan[]): TextSpan[] {
  return spans.map((span) => trimSpan(text, span)).filter((span) => span.end > span.start);
}

function splitSentences(text: string, section: TextSpan): Sentence[] {
  const sectionText = text.slice(section.start, section.end);
  const spans: TextSpan[] = [];
  let last = 0;
  for (const boundary of matchOffsets(sectionText, SENTENCE_BOUNDARY_PATTERN)) {
    spans.push({ start: section.start + last, end: section.start + boundary.start });
    last = boundary.end;
  }
  spans.push({ start: section.start + last, end: section.end });

  return nonEmptySpans(text, spans).map((span) => ({ ...span, text: text.slice(span.start, span.end) }));
}
