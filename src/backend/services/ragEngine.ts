/**
 * RAG Engine Service
 *
 * Retrieval-Augmented Generation (RAG) combines retrieval and generation:
 * 1. RETRIEVE: Find passages relevant to the user's query
 * 2. AUGMENT: Add the retrieved passages to the prompt
 * 3. GENERATE: Let the LLM answer from that context only
 *
 * The engine is the single pipeline behind both corpus profiles: the fixed
 * policy corpus (claim evaluation) and per-session uploads (free-text QA).
 * Only the index it is handed differs.
 */

import { EvaluationResult, PageText } from '../../shared/types';
import { CompletionProvider, EmbeddingProvider } from '../clients/geminiClient';
import { AnswerSynthesizer, createAnswerSynthesizer } from './answerSynthesizer';
import { ChunkingConfig, DocumentChunker, createDocumentChunker } from './documentChunker';
import { Indexer, createIndexer } from './indexer';
import { DEFAULT_TOP_K, Retriever, createRetriever } from './retriever';
import { IVectorIndex } from './vectorIndex';

/**
 * Configuration for the RAG engine.
 */
export interface RAGEngineConfig {
    /** Number of passages to retrieve for context */
    topK: number;
    chunking: Partial<ChunkingConfig>;
}

export const DEFAULT_RAG_CONFIG: RAGEngineConfig = {
    topK: DEFAULT_TOP_K,
    chunking: {},
};

/**
 * Interface for the RAG engine.
 */
export interface IRAGEngine {
    buildIndex(pages: PageText[]): Promise<IVectorIndex>;
    answer(index: IVectorIndex, query: string): Promise<string>;
    evaluate(index: IVectorIndex, query: string): Promise<EvaluationResult>;
}

export class RAGEngine implements IRAGEngine {
    private readonly chunker: DocumentChunker;
    private readonly indexer: Indexer;
    private readonly retriever: Retriever;
    private readonly synthesizer: AnswerSynthesizer;

    constructor(
        embeddings: EmbeddingProvider,
        llm: CompletionProvider,
        config: Partial<RAGEngineConfig> = {}
    ) {
        const merged = { ...DEFAULT_RAG_CONFIG, ...config };
        this.chunker = createDocumentChunker(merged.chunking);
        this.indexer = createIndexer(embeddings);
        this.retriever = createRetriever(embeddings, merged.topK);
        this.synthesizer = createAnswerSynthesizer(llm);
    }

    /**
     * Ingestion phase: chunk the pages and embed them into a new index.
     */
    async buildIndex(pages: PageText[]): Promise<IVectorIndex> {
        const passages = this.chunker.chunkPages(pages);
        return this.indexer.build(passages);
    }

    async answer(index: IVectorIndex, query: string): Promise<string> {
        const retrieved = await this.retriever.search(index, query);
        return this.synthesizer.answer(
            retrieved.map((result) => result.passage),
            query
        );
    }

    async evaluate(index: IVectorIndex, query: string): Promise<EvaluationResult> {
        const retrieved = await this.retriever.search(index, query);
        return this.synthesizer.evaluate(
            retrieved.map((result) => result.passage),
            query
        );
    }
}

/**
 * Factory function to create a RAG engine.
 */
export function createRAGEngine(
    embeddings: EmbeddingProvider,
    llm: CompletionProvider,
    config?: Partial<RAGEngineConfig>
): RAGEngine {
    return new RAGEngine(embeddings, llm, config);
}
