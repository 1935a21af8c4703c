import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../lib/errors.js';
import { FixedSizeChunker } from './fixed-size-chunker.service.js';

describe('FixedSizeChunker', () => {
  it('windows a text without spaces and stops at the end of the text', async () => {
    // Given 250 characters without any word boundary
    const chunker = new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 20, minChunkSize: 10 });
    const text = 'a'.repeat(250);

    // When chunking
    const chunks = await chunker.chunkText(text, 'doc-1');

    // Then three overlapping windows are produced
    expect(chunks.map((chunk) => [chunk.metadata.startChar, chunk.metadata.endChar])).toEqual([
      [0, 100],
      [80, 180],
      [160, 250],
    ]);
    expect(chunks.map((chunk) => chunk.chunkId)).toEqual(['doc-1:chunk:0', 'doc-1:chunk:1', 'doc-1:chunk:2']);
    expect(chunks.map((chunk) => chunk.content.length)).toEqual([100, 100, 90]);
  });

  it('ends windows on the closest preceding space', async () => {
    const chunker = new FixedSizeChunker({ chunkSize: 12, chunkOverlap: 0, minChunkSize: 1 });

    const chunks = await chunker.chunkText('alpha beta gamma delta epsilon', 'doc-1');

    expect(chunks.map((chunk) => chunk.content)).toEqual(['alpha beta', 'gamma delta', 'epsilon']);
    expect(chunks.map((chunk) => [chunk.metadata.startChar, chunk.metadata.endChar])).toEqual([
      [0, 10],
      [11, 22],
      [23, 30],
    ]);
  });

  it('skips a non-terminal window shorter than minChunkSize', async () => {
    // Given a space that pulls the first window end down to 61 characters
    const chunker = new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 20, minChunkSize: 80 });
    const text = `${'x'.repeat(60)} ${'y'.repeat(100)}`;

    // When chunking
    const chunks = await chunker.chunkText(text, 'doc-1');

    // Then the short window is re-windowed from end - overlap
    expect(chunks.map((chunk) => [chunk.metadata.startChar, chunk.metadata.endChar])).toEqual([
      [41, 141],
      [121, 161],
    ]);
    expect(chunks[0].chunkIndex).toBe(0);
    expect(chunks[1].chunkIndex).toBe(1);
  });

  it('records offsets that slice the original text into the chunk content', async () => {
    const chunker = new FixedSizeChunker({ chunkSize: 40, chunkOverlap: 10, minChunkSize: 5 });
    const text = 'The pump must be primed before use. Check the seals weekly and replace worn gaskets. '.repeat(4);

    const chunks = await chunker.chunkText(text, 'manual');

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(text.slice(chunk.metadata.startChar, chunk.metadata.endChar)).toBe(chunk.content);
      expect(chunk.content.length).toBeLessThanOrEqual(40);
    }
    const starts = chunks.map((chunk) => chunk.metadata.startChar);
    expect([...starts].sort((a, b) => a - b)).toEqual(starts);
    expect(chunks[chunks.length - 1].metadata.endChar).toBe(text.trimEnd().length);
  });

  it('merges caller metadata and records chunk statistics', async () => {
    const chunker = new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 10, minChunkSize: 1 });

    const [chunk] = await chunker.chunkText('  two words  ', 'doc-9', { source: 'manual.pdf', page: 3 });

    expect(chunk.content).toBe('two words');
    expect(chunk.metadata).toEqual({
      source: 'manual.pdf',
      page: 3,
      startChar: 2,
      endChar: 11,
      charCount: 9,
      wordCount: 2,
      chunkingStrategy: 'fixed_size',
    });
    expect(chunk.createdAt).toBeInstanceOf(Date);
  });

  it('rejects empty and whitespace-only text', async () => {
    const chunker = new FixedSizeChunker();

    await expect(chunker.chunkText('', 'doc-1')).rejects.toThrow(ValidationError);
    await expect(chunker.chunkText(' \n\t ', 'doc-1')).rejects.toThrow('Text cannot be empty');
  });

  it('validates size constraints on construction', () => {
    expect(() => new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      'chunkOverlap must be less than chunkSize'
    );
    expect(() => new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 10, minChunkSize: 101 })).toThrow(
      'minChunkSize must be less than or equal to chunkSize'
    );
    expect(() => new FixedSizeChunker({ chunkSize: 100, chunkOverlap: 10, minChunkSize: 10, maxChunkSize: 99 })).toThrow(
      'maxChunkSize must be greater than or equal to chunkSize'
    );
    expect(new FixedSizeChunker().getConfig()).toEqual({
      chunkSize: 1000,
      chunkOverlap: 200,
      minChunkSize: 100,
      maxChunkSize: 2000,
    });
  });
});
