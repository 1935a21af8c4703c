/**
 * Prompt overrides for query decomposition. Both templates receive
 * `{question}` and `{max_subqueries}`.
 */
export interface DefaultPromptsConfig {
  /** Used for multi-part questions */
  generalPrompt?: string;
  /** Used when the question asks for a summary or overview */
  summaryPrompt?: string;
}
