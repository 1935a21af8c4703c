export enum EmbeddingProviderEnum {
  BEDROCK = 'bedrock',
  OPENAI = 'openai',
  LOCAL = 'local',
}
