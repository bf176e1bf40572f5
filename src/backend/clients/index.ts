/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - GeminiClient: embeddings and text generation through @google/genai
 */

export {
    GeminiClient,
    createGeminiClient,
    GeminiError,
    GeminiErrorCode,
    DEFAULT_GEMINI_CONFIG,
    type CompletionProvider,
    type EmbeddingProvider,
    type IGeminiClient,
    type GeminiClientConfig,
} from './geminiClient';
