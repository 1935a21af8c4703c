import { Annotation, StateGraph } from '@langchain/langgraph';
import { DistanceMetricEnum } from '../enums/distance-metric.enum.js';
import type { ChunkWithEmbedding, DocumentMetadata } from '../interfaces/chunk.interface.js';
import type { BatchIndexResult } from '../interfaces/batch-index-result.interface.js';
import type { MetadataFilter, SearchResult } from '../interfaces/search-result.interface.js';
import type { CreateIndexOptions } from '../interfaces/vector-store-config.interface.js';
import type { RagConfig } from '../lib/config/rag-config.js';
import { RagError, ValidationError, formatError } from '../lib/errors.js';
import { Logger } from '../lib/utils/logger.util.js';
import { type MergedSearchResult, mergeSearchResults } from '../lib/utils/search-result.util.js';
import type { BaseChunker } from './chunking/base-chunker.service.js';
import { ChunkerFactory } from './chunking/chunker-factory.service.js';
import type { BaseEmbeddingService } from './embedding/base-embedding.service.js';
import { EmbeddingServiceFactory } from './embedding/embedding-factory.service.js';
import { QueryDecomposer } from './query-decomposer.service.js';
import type { BaseVectorStore } from './vector-store/base-vector-store.service.js';
import { VectorStoreFactory } from './vector-store/vector-store-factory.service.js';

export interface RagEvent {
  stage: string;
  data?: unknown;
}

/**
 * Optional hooks and knobs for the RAG pipeline
 */
export interface RagOptions {
  /** Results kept per sub-query and after merging. Default: 10 */
  retrieveK?: number;
  /** Minimum normalised score. Default: 0.7 */
  threshold?: number;
  /** Upper bound on sub-queries from the decomposer. Default: 4 */
  maxSubqueries?: number;
  /** Chunks per vector store write. Default: 100 */
  indexBatchSize?: number;
  /** Metric used when the index is created. Default: 'cosine' */
  distanceMetric?: string;
  /** Backend-specific index settings */
  indexOptions?: CreateIndexOptions;
  /** Observability hook */
  onEvent?: (event: RagEvent) => void;
}

export interface RetrieveOptions {
  limit?: number;
  threshold?: number;
  filters?: MetadataFilter;
}

export interface RetrievalResult {
  subQueries: string[];
  results: MergedSearchResult[];
}

export interface IngestResult {
  documentId: string;
  chunkCount: number;
  result: BatchIndexResult;
}

export interface RetrievalGraphInput {
  question: string;
  filters?: MetadataFilter;
}

/**
 * Compiled retrieval pipeline: decompose → retrieve → merge
 */
export interface RetrievalGraph {
  invoke(input: RetrievalGraphInput): Promise<RetrievalResult>;
}

const DEFAULT_RAG_OPTIONS: Required<
  Pick<RagOptions, 'retrieveK' | 'threshold' | 'maxSubqueries' | 'indexBatchSize' | 'distanceMetric'>
> = {
  retrieveK: 10,
  threshold: 0.7,
  maxSubqueries: 4,
  indexBatchSize: 100,
  distanceMetric: DistanceMetricEnum.COSINE,
};

const RetrievalState = Annotation.Root({
  question: Annotation<string>,
  filters: Annotation<MetadataFilter | undefined>,
  subQueries: Annotation<string[]>,
  resultSets: Annotation<SearchResult[][]>,
  results: Annotation<MergedSearchResult[]>,
});

/**
 * Ingests documents (chunk → embed → index) and answers retrieval requests
 * (decompose → embed → search → merge) over one index.
 */
export class RagService {
  private readonly logger = Logger.getInstance('rag');
  private readonly options: RagOptions & typeof DEFAULT_RAG_OPTIONS;

  constructor(
    private readonly chunker: BaseChunker,
    private readonly embeddings: BaseEmbeddingService,
    private readonly vectorStore: BaseVectorStore,
    private readonly indexName: string,
    options: RagOptions = {},
    private readonly decomposer?: QueryDecomposer
  ) {
    this.options = { ...DEFAULT_RAG_OPTIONS, ...options };
  }

  /**
   * Build the pipeline from a validated configuration
   * @param config - Output of parseRagConfig or loadRagConfigFromEnv
   * @param options - Hooks that cannot come from configuration
   * @throws ConfigurationError for unknown providers or missing credentials
   */
  static fromConfig(config: RagConfig, options: Pick<RagOptions, 'onEvent'> = {}): RagService {
    const chunker = ChunkerFactory.create(config.chunking.strategy, config.chunking.options);
    const embeddings = EmbeddingServiceFactory.create(config.embedding.provider, config.embedding.config);
    const vectorStore = VectorStoreFactory.create(config.vectorStore.provider, config.vectorStore.config);
    const decomposer = config.decomposition.enabled
      ? QueryDecomposer.fromConfig({ apiKey: config.decomposition.apiKey, model: config.decomposition.model })
      : undefined;

    return new RagService(
      chunker,
      embeddings,
      vectorStore,
      config.vectorStore.indexName,
      {
        retrieveK: config.retrieval.retrieveK,
        threshold: config.retrieval.threshold,
        maxSubqueries: config.decomposition.maxSubqueries,
        indexBatchSize: config.retrieval.indexBatchSize,
        distanceMetric: config.vectorStore.distanceMetric,
        indexOptions: config.vectorStore.indexOptions,
        ...options,
      },
      decomposer
    );
  }

  /**
   * Connect the embedding service and the vector store, then create the index
   * with the embedding dimension
   * @returns false when any step failed
   */
  public async initialize(): Promise<boolean> {
    if (!(await this.embeddings.initialize())) {
      this.logger.error('Embedding service failed to initialize');
      return false;
    }
    if (!(await this.vectorStore.initialize())) {
      this.logger.error('Vector store failed to initialize');
      return false;
    }

    const dimension = this.embeddings.getDimension();
    const created = await this.vectorStore.createIndex(
      this.indexName,
      dimension,
      this.options.distanceMetric,
      this.options.indexOptions
    );
    this.emit('initialize:done', { indexName: this.indexName, dimension, created });
    return created;
  }

  /**
   * Replace a document's chunks in the index
   * @param text - Plain document text
   * @param documentId - Stable document identifier
   * @param metadata - Copied onto every chunk
   * @throws ValidationError for empty text
   * @throws RagError when the previous chunks cannot be removed
   */
  public async ingestDocument(text: string, documentId: string, metadata: DocumentMetadata = {}): Promise<IngestResult> {
    this.emit('ingest:start', { documentId });

    const chunks = await this.chunker.chunkText(text, documentId, metadata);
    const embeddings = await this.embeddings.embedBatch(chunks.map((chunk) => chunk.content));
    const withEmbeddings: ChunkWithEmbedding[] = chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));

    // Stale chunks past the new count would survive the upsert
    const removed = await this.vectorStore.deleteByDocumentId(this.indexName, documentId);
    if (!removed) {
      throw new RagError(`Failed to remove previous chunks of ${documentId} from ${this.indexName}`);
    }
    const result = await this.vectorStore.indexChunks(this.indexName, withEmbeddings, this.options.indexBatchSize);

    if (!result.success) {
      this.logger.warn(`Indexed ${result.indexedCount} of ${chunks.length} chunks for ${documentId}`);
    }
    this.emit('ingest:done', { documentId, chunkCount: chunks.length, indexed: result.indexedCount });
    return { documentId, chunkCount: chunks.length, result };
  }

  /**
   * Retrieve chunks for a question, one search per sub-query
   * @param question - The user question
   * @param options - Overrides for limit, threshold and filters
   * @throws ValidationError for an empty question
   */
  public async retrieve(question: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const subQueries = await this.decompose(question);
    const resultSets = await this.searchAll(subQueries, options);
    const results = this.merge(resultSets, options.limit);
    return { subQueries, results };
  }

  /**
   * Create a state graph running the retrieval flow
   * @param options - Limit and threshold applied to every invocation
   */
  public createRetrievalGraph(options: Omit<RetrieveOptions, 'filters'> = {}): RetrievalGraph {
    const decompose = async (state: typeof RetrievalState.State): Promise<{ subQueries: string[] }> => ({
      subQueries: await this.decompose(state.question),
    });

    const retrieve = async (state: typeof RetrievalState.State): Promise<{ resultSets: SearchResult[][] }> => ({
      resultSets: await this.searchAll(state.subQueries, { ...options, filters: state.filters }),
    });

    const merge = (state: typeof RetrievalState.State): { results: MergedSearchResult[] } => ({
      results: this.merge(state.resultSets, options.limit),
    });

    const graph = new StateGraph(RetrievalState)
      .addNode('decompose', decompose)
      .addNode('retrieve', retrieve)
      .addNode('merge', merge)
      .addEdge('__start__', 'decompose')
      .addEdge('decompose', 'retrieve')
      .addEdge('retrieve', 'merge')
      .addEdge('merge', '__end__')
      .compile();

    return {
      invoke: async (input: RetrievalGraphInput): Promise<RetrievalResult> => {
        const state = await graph.invoke({ question: input.question, filters: input.filters });
        return { subQueries: state.subQueries, results: state.results };
      },
    };
  }

  /**
   * Remove every chunk of a document
   * @throws RagError when the vector store reports a failure
   */
  public async removeDocument(documentId: string): Promise<void> {
    const removed = await this.vectorStore.deleteByDocumentId(this.indexName, documentId);
    if (!removed) {
      throw new RagError(`Failed to remove document ${documentId} from ${this.indexName}`);
    }
    this.emit('remove:done', { documentId });
  }

  public async close(): Promise<void> {
    await this.embeddings.close();
    await this.vectorStore.close();
  }

  private async decompose(question: string): Promise<string[]> {
    if (!question.trim()) {
      throw new ValidationError('Question cannot be empty');
    }
    const subQueries = this.decomposer
      ? await this.decomposer.decomposeQuery(question, this.options.maxSubqueries)
      : [question];
    this.emit('decompose:done', { question, subQueries });
    return subQueries;
  }

  private async searchAll(subQueries: string[], options: RetrieveOptions): Promise<SearchResult[][]> {
    const searchOptions = {
      limit: options.limit ?? this.options.retrieveK,
      threshold: options.threshold ?? this.options.threshold,
      filters: options.filters,
    };
    this.emit('retrieve:start', { indexName: this.indexName, subQueries: subQueries.length });

    const resultSets = await Promise.all(
      subQueries.map(async (subQuery) => {
        const vector = await this.embeddings.embedText(subQuery);
        return this.vectorStore.search(this.indexName, vector, searchOptions);
      })
    );

    this.emit('retrieve:done', { retrieved: resultSets.reduce((sum, results) => sum + results.length, 0) });
    return resultSets;
  }

  private merge(resultSets: SearchResult[][], limit?: number): MergedSearchResult[] {
    const results = mergeSearchResults(resultSets, limit ?? this.options.retrieveK);
    this.emit('merge:done', { used: results.length });
    return results;
  }

  /**
   * Emit observability events if hook is provided
   */
  private emit(stage: string, data?: unknown): void {
    try {
      this.options.onEvent?.({ stage, data });
    } catch (error) {
      this.logger.warn(`Event hook failed at ${stage}: ${formatError(error)}`);
    }
  }
}
