/**
 * Gemini Client
 *
 * Wrapper around the @google/genai SDK for the two hosted collaborators the
 * pipeline needs: text embeddings and text generation.
 *
 * - This follows the Adapter pattern: the rest of the backend only sees the
 *   EmbeddingProvider and CompletionProvider interfaces
 * - Every SDK failure is wrapped in GeminiError so callers can tell
 *   collaborator failures apart from local bugs
 * - Each request is bounded by a timeout passed through the SDK's HTTP options
 */

import { GoogleGenAI } from '@google/genai';
import { EmbeddingTask, GenerationOptions } from '../../shared/types';

/**
 * Configuration for the Gemini client.
 */
export interface GeminiClientConfig {
    /** API key; when absent every request fails with MISSING_API_KEY */
    apiKey: string | undefined;
    /** Default model for text generation */
    defaultModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
    /** Maximum number of texts sent in one embedding request */
    embeddingBatchSize: number;
}

export const DEFAULT_GEMINI_CONFIG: GeminiClientConfig = {
    apiKey: undefined,
    defaultModel: 'gemini-2.0-flash',
    embeddingModel: 'text-embedding-004',
    timeoutMs: 60_000,
    embeddingBatchSize: 100,
};

/**
 * Error codes for different failure scenarios.
 */
export enum GeminiErrorCode {
    /** No API key was configured at startup */
    MISSING_API_KEY = 'MISSING_API_KEY',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** The API answered with an error status */
    API_ERROR = 'API_ERROR',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

export class GeminiError extends Error {
    constructor(
        message: string,
        public readonly code: GeminiErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'GeminiError';
    }
}

/**
 * Embedding collaborator contract.
 * Returns one vector per input text, in input order.
 */
export interface EmbeddingProvider {
    embed(texts: string[], task: EmbeddingTask): Promise<number[][]>;
}

/**
 * LLM collaborator contract.
 */
export interface CompletionProvider {
    generateCompletion(prompt: string, options?: GenerationOptions): Promise<string>;
}

export interface IGeminiClient extends EmbeddingProvider, CompletionProvider {
    isConfigured(): boolean;
}

export class GeminiClient implements IGeminiClient {
    private readonly config: GeminiClientConfig;
    private readonly ai: GoogleGenAI | null;

    constructor(config: Partial<GeminiClientConfig> = {}) {
        this.config = { ...DEFAULT_GEMINI_CONFIG, ...config };
        this.ai = this.config.apiKey
            ? new GoogleGenAI({
                  apiKey: this.config.apiKey,
                  httpOptions: { timeout: this.config.timeoutMs },
              })
            : null;
    }

    isConfigured(): boolean {
        return this.ai !== null;
    }

    /**
     * Generate a completion for a single prompt.
     *
     * @returns The generated text, or an empty string if the model returned none
     * @throws GeminiError if generation fails
     */
    async generateCompletion(prompt: string, options: GenerationOptions = {}): Promise<string> {
        const ai = this.requireClient();

        try {
            const response = await ai.models.generateContent({
                model: options.model ?? this.config.defaultModel,
                contents: prompt,
                config: {
                    temperature: options.temperature ?? 0,
                    maxOutputTokens: options.maxTokens,
                },
            });
            return response.text ?? '';
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate completion');
        }
    }

    /**
     * Embed texts in batches, preserving input order.
     *
     * Entries the API returns without values come back as empty vectors;
     * validating dimensions is left to the caller.
     *
     * @throws GeminiError if any batch fails
     */
    async embed(texts: string[], task: EmbeddingTask): Promise<number[][]> {
        const ai = this.requireClient();
        const vectors: number[][] = [];

        for (let start = 0; start < texts.length; start += this.config.embeddingBatchSize) {
            const batch = texts.slice(start, start + this.config.embeddingBatchSize);

            try {
                const response = await ai.models.embedContent({
                    model: this.config.embeddingModel,
                    contents: batch,
                    config: { taskType: task },
                });
                const embeddings = response.embeddings ?? [];
                for (const embedding of embeddings) {
                    vectors.push(embedding.values ?? []);
                }
            } catch (error) {
                throw this.wrapError(error, 'Failed to generate embeddings');
            }
        }

        return vectors;
    }

    private requireClient(): GoogleGenAI {
        if (!this.ai) {
            throw new GeminiError(
                'GOOGLE_API_KEY is not configured',
                GeminiErrorCode.MISSING_API_KEY
            );
        }
        return this.ai;
    }

    /**
     * Wrap errors in GeminiError for consistent error handling.
     */
    private wrapError(error: unknown, context: string): GeminiError {
        if (error instanceof GeminiError) {
            return error;
        }

        if (error instanceof Error) {
            if (error.name === 'AbortError' || /timed? ?out/i.test(error.message)) {
                return new GeminiError(
                    `${context}: request timed out after ${this.config.timeoutMs}ms`,
                    GeminiErrorCode.TIMEOUT,
                    error
                );
            }
            if ('status' in error && typeof error.status === 'number') {
                return new GeminiError(
                    `${context}: API error ${error.status}: ${error.message}`,
                    GeminiErrorCode.API_ERROR,
                    error
                );
            }
            return new GeminiError(`${context}: ${error.message}`, GeminiErrorCode.UNKNOWN, error);
        }

        return new GeminiError(`${context}: ${String(error)}`, GeminiErrorCode.UNKNOWN);
    }
}

/**
 * Factory function to create a Gemini client.
 */
export function createGeminiClient(config?: Partial<GeminiClientConfig>): GeminiClient {
    return new GeminiClient(config);
}
