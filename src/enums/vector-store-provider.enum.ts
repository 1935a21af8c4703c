export enum VectorStoreProviderEnum {
  OPENSEARCH = 'opensearch',
  PGVECTOR = 'pgvector',
  QDRANT = 'qdrant',
  PINECONE = 'pinecone',
  MEMORY = 'memory',
}
