import type { LlmProviderEnum } from '../enums/llm-provider.enum.js';
import type { LlmParamsConfig } from './llm-params-config.interface.js';

/**
 * Configuration for a chat model provider
 */
export interface LlmConfig {
  /** Default: 'openai' */
  provider?: LlmProviderEnum;
  apiKey?: string;
  /** Default: 'gpt-4o-mini' */
  model?: string;
  /** Optional LLM parameters configuration */
  params?: LlmParamsConfig;
}
