/**
 * Retriever Service
 *
 * This is the "retrieval" phase of RAG: embed the query and return the
 * nearest passages from a given index.
 */

import { RetrievedPassage } from '../../shared/types';
import { EmbeddingProvider } from '../clients/geminiClient';
import { EmbeddingUnavailableError, asError } from '../errors';
import { validateEmbeddings } from './indexer';
import { IVectorIndex } from './vectorIndex';

export const DEFAULT_TOP_K = 4;

export class Retriever {
    constructor(
        private readonly embeddings: EmbeddingProvider,
        private readonly topK: number = DEFAULT_TOP_K
    ) {}

    /**
     * @returns At most k passages, nearest first; all of them if the index is smaller
     * @throws EmbeddingUnavailableError if the query cannot be embedded
     */
    async search(index: IVectorIndex, query: string, k: number = this.topK): Promise<RetrievedPassage[]> {
        let vectors: number[][];
        try {
            vectors = await this.embeddings.embed([query], 'RETRIEVAL_QUERY');
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new EmbeddingUnavailableError(
                `Embedding service unavailable: ${message}`,
                asError(error)
            );
        }

        validateEmbeddings(vectors, 1);
        const queryEmbedding = vectors[0] ?? [];

        if (queryEmbedding.length !== index.dimension()) {
            throw new EmbeddingUnavailableError(
                `Query embedding has dimension ${queryEmbedding.length}, index expects ${index.dimension()}`
            );
        }

        return index.search(queryEmbedding, k);
    }
}

export function createRetriever(embeddings: EmbeddingProvider, topK?: number): Retriever {
    return new Retriever(embeddings, topK);
}
