/**
 * Shared type definitions for the Policy QA service
 *
 * These types define the contract between the HTTP layer and the pipeline.
 * They're organized by domain:
 * - Documents: Extracted text and passages
 * - Index: Embedded passages and search results
 * - Answers: Claim evaluation and free-text answers
 * - API: Request/response shapes
 */

// ============================================================================
// Document Types
// ============================================================================

/**
 * Supported document formats. Only PDF is accepted for ingestion.
 */
export type DocumentType = 'pdf';

/**
 * An uploaded file as it sits in temporary storage.
 */
export interface UploadedDocument {
    /** Filename as submitted by the client */
    originalName: string;
    /** Location of the uploaded bytes on disk */
    path: string;
}

/**
 * Text extracted from a single PDF page.
 */
export interface PageText {
    source: string;
    /** 1-based page number within the source document */
    page: number;
    text: string;
}

export interface PassageMetadata {
    source: string;
    page: number;
    chunkIndex: number;
}

/**
 * A contiguous span of one page's text.
 * Passages are the unit of embedding and retrieval.
 */
export interface Passage {
    id: string;
    content: string;
    metadata: PassageMetadata;
}

// ============================================================================
// Index Types
// ============================================================================

/**
 * A passage paired with its embedding vector.
 */
export interface IndexEntry {
    passage: Passage;
    embedding: number[];
}

/**
 * A passage returned by the retriever, with its cosine distance to the query.
 */
export interface RetrievedPassage {
    passage: Passage;
    distance: number;
}

// ============================================================================
// Answer Types
// ============================================================================

export type EvaluationDecision = 'Approved' | 'Rejected';

/**
 * Structured verdict for a claim query.
 */
export interface EvaluationResult {
    decision: EvaluationDecision;
    /** Payout amount or coverage, "Not Applicable" when none is stated */
    amount: string;
    justification: string;
}

/**
 * Prompt flavour: free-text answer or strict JSON claim evaluation.
 */
export type SynthesisMode = 'answer' | 'evaluation';

// ============================================================================
// LLM Client Types
// ============================================================================

/**
 * Options for text generation.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

/**
 * Embedding task hint. Documents and queries are embedded differently
 * by retrieval-tuned models.
 */
export type EmbeddingTask = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

// ============================================================================
// Validation Types
// ============================================================================

/**
 * Result of request validation.
 * Invalid requests are rejected before processing.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /evaluate
 */
export interface EvaluateRequest {
    query: string;
}

/**
 * Response body for POST /upload
 */
export interface UploadResponse {
    message: string;
    session_id: string;
}

/**
 * Request body for POST /query
 */
export interface QueryRequest {
    query: string;
    session_id: string;
}

/**
 * Response body for POST /query
 */
export interface QueryResponse {
    answer: string;
}

/**
 * Response body for GET /health
 */
export interface HealthResponse {
    status: 'ok' | 'degraded';
    corpusLoaded: boolean;
    apiKeyConfigured: boolean;
    sessions: number;
}

/**
 * Error body returned by every endpoint.
 */
export interface ErrorResponse {
    error: string;
    code?: string;
}
