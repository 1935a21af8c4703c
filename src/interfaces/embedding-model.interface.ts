export interface EmbeddingModel {
  modelId: string;
  provider: string;
  dimension: number;
  maxTokens: number;
  costPer1kTokens: number;
}

/**
 * Static description of a model in a provider's model table
 */
export interface EmbeddingModelSpec {
  dimension: number;
  maxTokens: number;
  costPer1kTokens: number;
}

export interface EmbeddingCostEstimate {
  modelId: string;
  estimatedTokens: number;
  estimatedCost: number;
  textCount: number;
}
