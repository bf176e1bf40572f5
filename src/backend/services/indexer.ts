/**
 * Indexer Service
 *
 * Embeds a batch of passages and builds one immutable VectorIndex from them.
 * A batch either produces a complete index or fails as a whole.
 */

import { Passage } from '../../shared/types';
import { EmbeddingProvider } from '../clients/geminiClient';
import { EmbeddingUnavailableError, EmptyCorpusError, asError } from '../errors';
import { VectorIndex } from './vectorIndex';

/**
 * Checks that the provider returned one usable vector per input and that
 * all vectors share a dimension.
 *
 * @throws EmbeddingUnavailableError describing the first problem found
 */
export function validateEmbeddings(vectors: number[][], expectedCount: number): void {
    if (vectors.length !== expectedCount) {
        throw new EmbeddingUnavailableError(
            `Embedding service returned ${vectors.length} vectors for ${expectedCount} inputs`
        );
    }

    const dims = vectors[0]?.length ?? 0;

    vectors.forEach((vector, index) => {
        if (vector.length === 0) {
            throw new EmbeddingUnavailableError(`Embedding ${index} is empty`);
        }
        if (vector.length !== dims) {
            throw new EmbeddingUnavailableError(
                `Embedding ${index} has dimension ${vector.length}, expected ${dims}`
            );
        }
        if (!vector.every((value) => Number.isFinite(value))) {
            throw new EmbeddingUnavailableError(`Embedding ${index} contains non-numeric values`);
        }
    });
}

export class Indexer {
    constructor(private readonly embeddings: EmbeddingProvider) {}

    /**
     * @throws EmptyCorpusError if there is nothing to index
     * @throws EmbeddingUnavailableError if the provider fails or returns malformed vectors
     */
    async build(passages: Passage[]): Promise<VectorIndex> {
        if (passages.length === 0) {
            throw new EmptyCorpusError();
        }

        let vectors: number[][];
        try {
            vectors = await this.embeddings.embed(
                passages.map((passage) => passage.content),
                'RETRIEVAL_DOCUMENT'
            );
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new EmbeddingUnavailableError(
                `Embedding service unavailable: ${message}`,
                asError(error)
            );
        }

        validateEmbeddings(vectors, passages.length);

        return VectorIndex.build(
            passages.map((passage, index) => ({
                passage,
                embedding: vectors[index] ?? [],
            }))
        );
    }
}

export function createIndexer(embeddings: EmbeddingProvider): Indexer {
    return new Indexer(embeddings);
}
