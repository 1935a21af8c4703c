import { describe, it, expect } from 'vitest';

import { SemanticChunker } from './semantic-chunker.service.js';

describe('SemanticChunker', () => {
  it('accumulates whole sentences and overlaps by the trailing sentence', async () => {
    // Given three short maintenance sentences
    const chunker = new SemanticChunker({ chunkSize: 20, chunkOverlap: 5, minChunkSize: 5 });
    const text = 'Check oil. Check belts. Clean filters.';

    // When chunking
    const chunks = await chunker.chunkText(text, 'manual');

    // Then each chunk ends on a sentence and the second repeats the last sentence of the first
    expect(chunks.map((chunk) => chunk.content)).toEqual(['Check oil. Check belts.', 'Check belts. Clean filters.']);
    expect(chunks.map((chunk) => [chunk.metadata.startChar, chunk.metadata.endChar])).toEqual([
      [0, 23],
      [11, 38],
    ]);
    expect(chunks.map((chunk) => chunk.metadata['sentenceCount'])).toEqual([2, 2]);
    expect(chunks.map((chunk) => chunk.metadata.chunkingStrategy)).toEqual(['semantic', 'semantic']);
  });

  it('does not split after initials, dotted abbreviations or titles', async () => {
    const chunker = new SemanticChunker();

    const [chunk] = await chunker.chunkText('Dr. Smith arrived. He said e.g. Apples work. Then J. Doe left.', 'doc-1');

    expect(chunk.metadata['sentenceCount']).toBe(3);
  });

  it('keeps fenced code blocks intact and maps offsets to the original text', async () => {
    const code = '```js\nconst a = 1;\n\nconst b = 2;\n```';
    const text = `Intro sentence here.\n\n${code}\n\nAfter the code.`;
    const chunker = new SemanticChunker();

    const chunks = await chunker.chunkText(text, 'doc-1');

    expect(chunks).toHaveLength(1);
    expect(chunks[0].content).toBe(`Intro sentence here. ${code} After the code.`);
    expect(chunks[0].metadata.startChar).toBe(0);
    expect(chunks[0].metadata.endChar).toBe(text.length);
    expect(chunks[0].metadata['sentenceCount']).toBe(3);
  });

  it('numbers chunks sequentially across header sections', async () => {
    const text = '# Intro\nFirst part is here. It has two sentences.\n# Usage\nSecond part is here.';
    const chunker = new SemanticChunker({ chunkSize: 30, chunkOverlap: 0, minChunkSize: 5 });

    const chunks = await chunker.chunkText(text, 'guide');

    expect(chunks.map((chunk) => chunk.chunkId)).toEqual(['guide:chunk:0', 'guide:chunk:1']);
    expect(chunks.map((chunk) => chunk.chunkIndex)).toEqual([0, 1]);
    expect(chunks[0].content).toBe('# Intro\nFirst part is here. It has two sentences.');
    expect(chunks[1].content).toBe('# Usage\nSecond part is here.');
    expect(chunks[1].metadata.startChar).toBe(text.indexOf('# Usage'));
  });

  it('carries a short section remainder into the next section instead of dropping it', async () => {
    const text = 'Tiny one.\n\nThis paragraph is long enough to stand alone.';
    const chunker = new SemanticChunker({ minChunkSize: 20 });

    const chunks = await chunker.chunkText(text, 'doc-1');

    expect(chunks).toHaveLength(1);
    expect(chunks[0].content).toBe('Tiny one. This paragraph is long enough to stand alone.');
    expect(chunks[0].metadata.startChar).toBe(0);
    expect(chunks[0].metadata.endChar).toBe(text.length);
  });

  it('emits a section remainder that reaches minChunkSize', async () => {
    const text = 'The first paragraph stands on its own.\n\nThe second paragraph also stands alone.';
    const chunker = new SemanticChunker({ minChunkSize: 20 });

    const chunks = await chunker.chunkText(text, 'doc-1');

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      'The first paragraph stands on its own.',
      'The second paragraph also stands alone.',
    ]);
  });

  it('contains every sentence of the document in order', async () => {
    const sentences = Array.from({ length: 30 }, (_, i) => `Step ${i} requires a careful inspection of the assembly.`);
    const chunker = new SemanticChunker({ chunkSize: 200, chunkOverlap: 60, minChunkSize: 50, maxChunkSize: 400 });

    const chunks = await chunker.chunkText(sentences.join(' '), 'doc-1');
    const seen = new Set(chunks.flatMap((chunk) => chunk.content.split(/(?<=\.) /)));

    expect([...seen]).toEqual(sentences);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(400);
    }
  });

  it('rejects empty text', async () => {
    await expect(new SemanticChunker().chunkText('   ', 'doc-1')).rejects.toThrow('Text cannot be empty');
  });
});
