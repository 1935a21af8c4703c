export enum LlmProviderEnum {
  OPENAI = 'openai',
}
