export enum ChunkingStrategyEnum {
  FIXED_SIZE = 'fixed_size',
  RECURSIVE = 'recursive',
  SEMANTIC = 'semantic',
}
