/**
 * Configuration for LLM parameters
 */
export interface LlmParamsConfig {
  /** Temperature for sampling (0-2). Higher values make output more random. Default: 0.3 */
  temperature?: number;
  /** Upper bound on generated tokens. Default: 200 */
  maxTokens?: number;
  /** Top-p (nucleus) sampling parameter. Default: 1 */
  topP?: number;
}
