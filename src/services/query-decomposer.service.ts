import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { ChatOpenAI } from '@langchain/openai';
import { LlmProviderEnum } from '../enums/llm-provider.enum.js';
import type { DefaultPromptsConfig } from '../interfaces/default-prompts-config.interface.js';
import type { LlmConfig } from '../interfaces/llm-config.interface.js';
import type { LlmParamsConfig } from '../interfaces/llm-params-config.interface.js';
import { ConfigurationError, formatError } from '../lib/errors.js';
import { Logger } from '../lib/utils/logger.util.js';

export const DEFAULT_MAX_SUBQUERIES = 4;
export const DEFAULT_DECOMPOSITION_MODEL = 'gpt-4o-mini';

/** Questions shorter than this are answered by a single retrieval */
const SIMPLE_QUERY_MAX_LENGTH = 60;
const MIN_SUBQUERY_LENGTH = 10;

const CONJUNCTIONS = [' and ', ' or ', ' but ', ' also ', ' plus ', ' as well as '];
const INTERROGATIVES = ['what', 'how', 'why', 'when', 'where', 'who', 'which'];
const SUMMARY_KEYWORDS = [
  'summary',
  'summarize',
  'overview',
  'describe',
  'tell me about',
  'what is this document about',
  'what does this document contain',
  'what is in this document',
  'explain this document',
];

const LEADING_MARKER = /^[\d.\-)*•\s]+/;

/**
 * Default configuration constants
 */
const DEFAULT_LLM_PARAMS: Required<LlmParamsConfig> = {
  temperature: 0.3,
  maxTokens: 200,
  topP: 1,
};

const DEFAULT_PROMPTS: Required<DefaultPromptsConfig> = {
  generalPrompt: `You split complex questions into independent sub-questions for document search.

Rules:
- Only split a question that asks about several things.
- Each sub-question covers one aspect of the original question and can be answered on its own.
- Return a simple, specific question unchanged.
- Return at most {max_subqueries} sub-questions, one per line, without numbering or bullets.

Example input: What are the torque settings and the service intervals?
Example output:
What are the torque settings?
What are the service intervals?`,
  summaryPrompt: `You prepare document search queries for a summary request.

Split the request into the aspects a complete summary needs: the main topic of the document,
its key points, the subjects it covers and the important details it contains.

Return at most {max_subqueries} sub-questions, one per line, without numbering or bullets.

Example input: Give me an overview of this manual
Example output:
What is the main topic of the manual?
What are the key points of the manual?
Which subjects does the manual cover?
What important details does the manual contain?`,
};

const USER_PROMPT = `Decompose this question into specific sub-questions:

Question: {question}`;

export interface QueryDecomposerOptions {
  /** Prompt overrides; both receive `{question}` and `{max_subqueries}` */
  prompts?: DefaultPromptsConfig;
}

/**
 * Split a model response into candidate sub-queries: one per line, with leading
 * numbering and bullets removed
 */
export function parseSubqueries(response: string): string[] {
  return response
    .split('\n')
    .map((line) => line.trim().replace(LEADING_MARKER, '').trim())
    .filter((line) => line.length > 0);
}

/**
 * Splits multi-part questions into sub-queries that are retrieved separately.
 * Never fails: any problem falls back to the original question.
 */
export class QueryDecomposer {
  private readonly logger = Logger.getInstance('query-decomposer');
  private readonly prompts: Required<DefaultPromptsConfig>;

  constructor(
    private readonly llm: BaseChatModel,
    options: QueryDecomposerOptions = {}
  ) {
    this.prompts = { ...DEFAULT_PROMPTS, ...options.prompts };
  }

  /**
   * Build a decomposer on an OpenAI chat model
   * @param config - Provider, API key, model and sampling parameters
   * @param options - Prompt overrides
   * @throws ConfigurationError when the API key is missing or the provider is unsupported
   */
  static fromConfig(config: LlmConfig, options: QueryDecomposerOptions = {}): QueryDecomposer {
    const provider = config.provider ?? LlmProviderEnum.OPENAI;
    if (provider !== LlmProviderEnum.OPENAI) {
      throw new ConfigurationError(`Unsupported LLM provider: ${provider}`);
    }
    if (!config.apiKey) {
      throw new ConfigurationError('OpenAI API key is required for query decomposition');
    }

    const llmParams = { ...DEFAULT_LLM_PARAMS, ...config.params };
    const llm = new ChatOpenAI({
      model: config.model ?? DEFAULT_DECOMPOSITION_MODEL,
      apiKey: config.apiKey,
      temperature: llmParams.temperature,
      maxTokens: llmParams.maxTokens,
      topP: llmParams.topP,
    });
    return new QueryDecomposer(llm, options);
  }

  /**
   * Decompose a question into sub-queries
   * @param question - The user question
   * @param maxSubqueries - Upper bound on returned sub-queries
   * @returns The sub-queries, or `[question]` when no useful split exists
   */
  async decomposeQuery(question: string, maxSubqueries: number = DEFAULT_MAX_SUBQUERIES): Promise<string[]> {
    if (!question.trim()) {
      return [question];
    }
    if (this.isSimpleQuery(question)) {
      this.logger.debug(`Query is simple, skipping decomposition: ${question.slice(0, 50)}`);
      return [question];
    }

    try {
      const candidates = await this.requestSubqueries(question, maxSubqueries);
      const subQueries = this.validateSubqueries(candidates, question, maxSubqueries);
      if (subQueries.length < 2) {
        this.logger.debug('Decomposition produced a single query, using the original');
        return [question];
      }
      this.logger.info(`Query decomposed into ${subQueries.length} sub-queries`);
      return subQueries;
    } catch (error) {
      this.logger.warn(`Query decomposition failed: ${formatError(error)}. Using original query.`);
      return [question];
    }
  }

  /**
   * True when the question is short, or long but a single question without
   * conjunctions or several interrogatives
   */
  isSimpleQuery(question: string): boolean {
    const lower = question.toLowerCase().trim();
    if (lower.length < SIMPLE_QUERY_MAX_LENGTH) {
      return true;
    }
    if ((question.match(/\?/g) ?? []).length > 1) {
      return false;
    }
    if (CONJUNCTIONS.some((conjunction) => lower.includes(conjunction))) {
      return false;
    }
    const words = new Set(lower.match(/[a-z]+/g) ?? []);
    return INTERROGATIVES.filter((word) => words.has(word)).length <= 1;
  }

  isSummaryQuery(question: string): boolean {
    const lower = question.toLowerCase();
    return SUMMARY_KEYWORDS.some((keyword) => lower.includes(keyword));
  }

  private async requestSubqueries(question: string, maxSubqueries: number): Promise<string[]> {
    const systemPrompt = this.isSummaryQuery(question) ? this.prompts.summaryPrompt : this.prompts.generalPrompt;
    const promptTemplate = ChatPromptTemplate.fromMessages([
      ['system', systemPrompt],
      ['human', USER_PROMPT],
    ]);

    const messages = await promptTemplate.invoke({ question, max_subqueries: String(maxSubqueries) });
    const response = await this.llm.invoke(messages);
    const content = await new StringOutputParser().invoke(response);
    return parseSubqueries(content);
  }

  private validateSubqueries(candidates: string[], question: string, maxSubqueries: number): string[] {
    const original = question.trim().toLowerCase();
    return candidates
      .filter((query) => query.length >= MIN_SUBQUERY_LENGTH && query.toLowerCase() !== original)
      .slice(0, maxSubqueries);
  }
}
