import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeListChatModel } from '@langchain/core/utils/testing';

import { ConfigurationError } from '../lib/errors.js';
import { QueryDecomposer, parseSubqueries } from './query-decomposer.service.js';

const MULTI_PART = 'What are the specifications of the pump and what are its safety requirements?';

describe('QueryDecomposer', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  function createDecomposer(responses: string[]) {
    const model = new FakeListChatModel({ responses });
    const invokeSpy = vi.spyOn(model, 'invoke');
    return { decomposer: new QueryDecomposer(model), invokeSpy };
  }

  it('returns a blank question unchanged', async () => {
    const { decomposer, invokeSpy } = createDecomposer([]);

    await expect(decomposer.decomposeQuery('   ')).resolves.toEqual(['   ']);
    expect(invokeSpy).not.toHaveBeenCalled();
  });

  it('skips the model for simple questions', async () => {
    const { decomposer, invokeSpy } = createDecomposer(['should not be used']);

    await expect(decomposer.decomposeQuery('What is AI?')).resolves.toEqual(['What is AI?']);
    expect(invokeSpy).not.toHaveBeenCalled();
  });

  it('classifies simple and compound questions', () => {
    const { decomposer } = createDecomposer([]);

    expect(decomposer.isSimpleQuery('Which maintenance tasks are required for the hydraulic pump every month?')).toBe(true);
    expect(decomposer.isSimpleQuery(MULTI_PART)).toBe(false);
    expect(decomposer.isSimpleQuery('Where is the filter located? When should the filter be replaced each year?')).toBe(
      false
    );
    expect(decomposer.isSimpleQuery('How long does the compressor run before it needs service, why does it overheat')).toBe(
      false
    );
  });

  it('splits a multi-part question and drops fragments', async () => {
    // Given a model answering with numbered lines and a short fragment
    const { decomposer, invokeSpy } = createDecomposer([
      '1. What are the specifications of the pump?\n2. What are the safety requirements of the pump?\n\n- Pump?',
    ]);

    // When decomposing
    const subQueries = await decomposer.decomposeQuery(MULTI_PART);

    // Then the numbered lines are cleaned and the fragment is gone
    expect(subQueries).toEqual([
      'What are the specifications of the pump?',
      'What are the safety requirements of the pump?',
    ]);
    expect(invokeSpy).toHaveBeenCalledTimes(1);
    expect(String(invokeSpy.mock.calls[0]?.[0])).toContain('You split complex questions');
    expect(String(invokeSpy.mock.calls[0]?.[0])).toContain(`Question: ${MULTI_PART}`);
  });

  it('falls back to the question when only an echo of it remains', async () => {
    const { decomposer } = createDecomposer([`${MULTI_PART.toUpperCase()}\nWhat are the specs?`]);

    await expect(decomposer.decomposeQuery(MULTI_PART)).resolves.toEqual([MULTI_PART]);
  });

  it('keeps at most maxSubqueries', async () => {
    const { decomposer } = createDecomposer([
      'What are the pump specifications?\nWhat are the safety requirements?\nWhat are the warranty terms?',
    ]);

    await expect(decomposer.decomposeQuery(MULTI_PART, 2)).resolves.toEqual([
      'What are the pump specifications?',
      'What are the safety requirements?',
    ]);
  });

  it('uses the summary prompt for overview requests', async () => {
    const question = 'Give me an overview of this maintenance manual and its most important chapters';
    const { decomposer, invokeSpy } = createDecomposer([
      'What is the main topic of the manual?\nWhat are the key points of the manual?',
    ]);

    const subQueries = await decomposer.decomposeQuery(question);

    expect(subQueries).toEqual(['What is the main topic of the manual?', 'What are the key points of the manual?']);
    expect(String(invokeSpy.mock.calls[0]?.[0])).toContain('You prepare document search queries for a summary request');
    expect(String(invokeSpy.mock.calls[0]?.[0])).toContain('Return at most 4 sub-questions');
  });

  it('accepts prompt overrides', async () => {
    const model = new FakeListChatModel({ responses: ['What are the pump specifications?\nWhat are the safety rules?'] });
    const invokeSpy = vi.spyOn(model, 'invoke');
    const decomposer = new QueryDecomposer(model, { prompts: { generalPrompt: 'Split into {max_subqueries} lines.' } });

    await decomposer.decomposeQuery(MULTI_PART, 3);

    expect(String(invokeSpy.mock.calls[0]?.[0])).toContain('Split into 3 lines.');
  });

  it('falls back to the question when the model fails', async () => {
    // Given a model that rejects the request
    const { decomposer, invokeSpy } = createDecomposer([]);
    invokeSpy.mockRejectedValueOnce(new Error('rate limited'));

    // When decomposing
    const subQueries = await decomposer.decomposeQuery(MULTI_PART);

    // Then the original question is used and a warning is logged
    expect(subQueries).toEqual([MULTI_PART]);
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining('Query decomposition failed: rate limited. Using original query.')
    );
  });

  it('requires an API key to build the default model', () => {
    expect(() => QueryDecomposer.fromConfig({})).toThrow(ConfigurationError);
    expect(() => QueryDecomposer.fromConfig({ apiKey: '' })).toThrow(
      'OpenAI API key is required for query decomposition'
    );
    expect(QueryDecomposer.fromConfig({ apiKey: 'test-secret', model: 'gpt-4o-mini' })).toBeInstanceOf(QueryDecomposer);
  });
});

describe('parseSubqueries', () => {
  it('strips numbering and bullets and drops blank lines', () => {
    expect(parseSubqueries('1) First question here\n* Second one here\n• Third item here\n   \n10. Tenth question')).toEqual([
      'First question here',
      'Second one here',
      'Third item here',
      'Tenth question',
    ]);
  });
});
