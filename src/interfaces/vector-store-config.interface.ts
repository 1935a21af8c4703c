export interface OpenSearchStoreConfig {
  /** Cluster URL, e.g. 'https://search.example.com:9200' */
  endpoint?: string;
  username?: string;
  password?: string;
  /** Default: true */
  useSsl?: boolean;
  /** Default: true */
  verifyCerts?: boolean;
  /** Default: 30000 */
  timeoutMs?: number;
}

export interface PgVectorStoreConfig {
  /** Takes precedence over the individual connection fields */
  connectionString?: string;
  host?: string;
  /** Default: 5432 */
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** Default: 10 */
  maxPoolSize?: number;
  /** Default: 1 */
  minPoolSize?: number;
}

export interface QdrantStoreConfig {
  /** Default: 'http://localhost:6333' */
  url?: string;
  apiKey?: string;
  /** Default: 30000 */
  timeoutMs?: number;
}

export interface PineconeStoreConfig {
  apiKey?: string;
  /** Namespace holding the chunks. Default: '' (the default namespace) */
  namespace?: string;
}

/**
 * Union of every backend's options, accepted by the factory
 */
export type VectorStoreConfig = OpenSearchStoreConfig & PgVectorStoreConfig & QdrantStoreConfig & PineconeStoreConfig;

export interface OpenSearchIndexOptions {
  /** Default: 'nmslib' */
  engine?: 'nmslib' | 'faiss' | 'lucene';
  /** Default: 16 */
  m?: number;
  /** Default: 512 */
  efConstruction?: number;
  /** Default: 512 */
  efSearch?: number;
  /** Default: 1 */
  shards?: number;
  /** Default: 0 */
  replicas?: number;
}

export interface PgVectorIndexOptions {
  /** Default: 'ivfflat'; manhattan always uses 'hnsw' */
  indexType?: 'ivfflat' | 'hnsw';
  /** IVFFlat lists. Default: 100 */
  lists?: number;
  /** HNSW m. Default: 16 */
  m?: number;
  /** HNSW ef_construction. Default: 64 */
  efConstruction?: number;
}

export interface QdrantIndexOptions {
  /** Store vectors on disk. Default: false */
  onDisk?: boolean;
  /** Default: 16 */
  hnswM?: number;
  /** Default: 100 */
  hnswEfConstruct?: number;
  /** Default: 10000 */
  fullScanThreshold?: number;
  /** Default: false */
  onDiskPayload?: boolean;
  /** Default: 1 */
  replicationFactor?: number;
}

export interface PineconeIndexOptions {
  /** Default: 'aws' */
  cloud?: 'aws' | 'gcp' | 'azure';
  /** Default: 'us-east-1' */
  region?: string;
}

export type CreateIndexOptions = OpenSearchIndexOptions &
  PgVectorIndexOptions &
  QdrantIndexOptions &
  PineconeIndexOptions;
