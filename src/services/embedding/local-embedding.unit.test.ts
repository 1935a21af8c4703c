import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockEmbedQuery, mockEmbedDocuments, mockConstructor } = vi.hoisted(() => ({
  mockEmbedQuery: vi.fn<(text: string) => Promise<number[]>>(),
  mockEmbedDocuments: vi.fn<(texts: string[]) => Promise<number[][]>>(),
  mockConstructor: vi.fn(),
}));

vi.mock('@langchain/ollama', () => ({
  OllamaEmbeddings: class {
    embedQuery = mockEmbedQuery;
    embedDocuments = mockEmbedDocuments;
    constructor(fields: unknown) {
      mockConstructor(fields);
    }
  },
}));

import { LocalEmbeddingService } from './local-embedding.service.js';

describe('LocalEmbeddingService', () => {
  beforeEach(() => {
    mockEmbedQuery.mockReset();
    mockEmbedDocuments.mockReset();
    mockConstructor.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('connects to the configured Ollama server', async () => {
    mockEmbedQuery.mockResolvedValue([0.1, 0.2]);
    const service = new LocalEmbeddingService({ modelId: 'all-minilm', baseUrl: 'http://ollama.test:11434' });

    await expect(service.initialize()).resolves.toBe(true);
    expect(mockConstructor).toHaveBeenCalledWith({ model: 'all-minilm', baseUrl: 'http://ollama.test:11434' });
    expect(service.getDimension()).toBe(384);
  });

  it('falls back to default dimensions for unknown models', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const service = new LocalEmbeddingService({ modelId: 'custom-model' });

    expect(service.getModelInfo()).toEqual({
      modelId: 'custom-model',
      provider: 'local',
      dimension: 768,
      maxTokens: 256,
      costPer1kTokens: 0,
    });
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('Unknown local model custom-model'));
    expect(new LocalEmbeddingService({ modelId: 'constructor' }).getDimension()).toBe(768);
  });

  it('embeds a sub-batch with one embedDocuments call', async () => {
    mockEmbedQuery.mockResolvedValue([1]);
    const service = new LocalEmbeddingService();
    await service.initialize();
    mockEmbedDocuments.mockImplementation(async (texts) => texts.map((text) => [text.length]));

    const embeddings = await service.embedBatch(['one', 'three', 'seventeen'], 2);

    expect(embeddings).toEqual([[3], [5], [9]]);
    expect(mockEmbedDocuments.mock.calls.map(([texts]) => texts)).toEqual([['one', 'three'], ['seventeen']]);
  });

  it('retries a failed sub-batch item by item', async () => {
    const service = new LocalEmbeddingService({ modelId: 'all-minilm', dimension: 2 });
    mockEmbedQuery.mockResolvedValueOnce([1, 1]);
    await service.initialize();
    mockEmbedDocuments.mockRejectedValue(new Error('model crashed'));
    mockEmbedQuery.mockImplementation(async (text) => {
      if (text === 'poison') throw new Error('cannot embed');
      return [text.length, 0];
    });

    const embeddings = await service.embedBatch(['good', 'poison']);

    expect(embeddings).toEqual([
      [4, 0],
      [0, 0],
    ]);
  });

  it('reports the health check failure instead of throwing', async () => {
    mockEmbedQuery.mockRejectedValue(new Error('connection refused'));
    const service = new LocalEmbeddingService();

    await expect(service.initialize()).resolves.toBe(false);
    await expect(service.healthCheck()).resolves.toBe(false);
  });

  it('estimates zero cost', () => {
    const service = new LocalEmbeddingService();

    expect(service.estimateCost(['abcdefgh'])).toEqual({
      modelId: 'nomic-embed-text',
      estimatedTokens: 2,
      estimatedCost: 0,
      textCount: 1,
    });
  });
});
