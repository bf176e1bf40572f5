/**
 * Backend services
 *
 * Core pipeline components:
 * - DocumentIngestor / PdfParser: PDF files to page text
 * - DocumentChunker: page text to overlapping passages
 * - Indexer / VectorIndex: passages to an immutable similarity index
 * - SessionStore: session ids to indexes
 * - Retriever / AnswerSynthesizer: query to answer or verdict
 * - RAGEngine / FixedCorpus: the pipeline shared by both corpus profiles
 */

export {
    validateQuery,
    validateEvaluateRequest,
    validateQueryRequest,
} from './queryProcessor';

export type { RequestValidation } from './queryProcessor';

export {
    PdfParser,
    createPdfParser,
    detectDocumentType,
    splitRenderedPages,
} from './documentParser';

export type { PdfTextExtractor } from './documentParser';

export { DocumentIngestor, createDocumentIngestor } from './documentIngestor';

export type { IDocumentIngestor } from './documentIngestor';

export {
    DocumentChunker,
    createDocumentChunker,
    splitIntoChunks,
    validateChunkingConfig,
    DEFAULT_CHUNKING_CONFIG,
} from './documentChunker';

export type { ChunkingConfig, TextChunk } from './documentChunker';

export { VectorIndex, cosineSimilarity, cosineDistance } from './vectorIndex';

export type { IVectorIndex } from './vectorIndex';

export { Indexer, createIndexer, validateEmbeddings } from './indexer';

export {
    InMemorySessionStore,
    createSessionStore,
    DEFAULT_SESSION_STORE_CONFIG,
} from './sessionStore';

export type { ISessionStore, SessionStoreConfig } from './sessionStore';

export { Retriever, createRetriever, DEFAULT_TOP_K } from './retriever';

export {
    AnswerSynthesizer,
    createAnswerSynthesizer,
    buildContext,
    buildPrompt,
    EMPTY_ANSWER_PLACEHOLDER,
} from './answerSynthesizer';

export {
    extractJsonObject,
    findBalancedObject,
    parseEvaluation,
    NOT_APPLICABLE,
} from './modelOutputParser';

export type { ParseOutcome } from './modelOutputParser';

export { RAGEngine, createRAGEngine, DEFAULT_RAG_CONFIG } from './ragEngine';

export type { RAGEngineConfig, IRAGEngine } from './ragEngine';

export { FixedCorpus, staticCorpus } from './fixedCorpus';

export type { CorpusSource } from './fixedCorpus';
