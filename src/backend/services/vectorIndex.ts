/**
 * Vector Index
 *
 * Immutable in-memory index for semantic similarity search.
 *
 * HOW IT WORKS:
 * 1. Passages are converted to embedding vectors when the index is built
 * 2. A query is converted to an embedding vector at search time
 * 3. We return the passages whose vectors are "close" to the query vector
 * 4. Closeness is cosine distance (1 - cosine similarity), lower = closer
 *
 * An index is built once per ingestion batch and never changes afterwards,
 * so it can be shared freely between concurrent requests.
 */

import { IndexEntry, RetrievedPassage } from '../../shared/types';

/**
 * Interface for vector index operations.
 */
export interface IVectorIndex {
    search(queryEmbedding: number[], limit: number): RetrievedPassage[];
    size(): number;
    dimension(): number;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * - 1.0 = identical direction (most similar)
 * - 0.0 = perpendicular (unrelated)
 * - -1.0 = opposite direction
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
    }

    if (a.length === 0) {
        return 0;
    }

    let dotProduct = 0;
    let magnitudeA = 0;
    let magnitudeB = 0;

    for (let i = 0; i < a.length; i++) {
        const aVal = a[i] ?? 0;
        const bVal = b[i] ?? 0;
        dotProduct += aVal * bVal;
        magnitudeA += aVal * aVal;
        magnitudeB += bVal * bVal;
    }

    const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

    // Zero vectors are treated as unrelated to everything
    if (magnitude === 0) {
        return 0;
    }

    return dotProduct / magnitude;
}

export function cosineDistance(a: number[], b: number[]): number {
    return 1 - cosineSimilarity(a, b);
}

/**
 * Exact (brute-force) nearest-neighbour index.
 *
 * Search is O(n) per query, which is fine for the few thousand passages a
 * handful of policy PDFs produce.
 */
export class VectorIndex implements IVectorIndex {
    private readonly entries: readonly IndexEntry[];
    private readonly dims: number;

    private constructor(entries: IndexEntry[], dims: number) {
        this.entries = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
        this.dims = dims;
    }

    /**
     * Build an index over entries that all share one dimension.
     *
     * @throws Error if dimensions differ
     */
    static build(entries: IndexEntry[]): VectorIndex {
        const dims = entries[0]?.embedding.length ?? 0;

        for (const entry of entries) {
            if (entry.embedding.length !== dims) {
                throw new Error(
                    `Vector dimension mismatch: expected ${dims}, got ${entry.embedding.length}`
                );
            }
        }

        return new VectorIndex(
            entries.map((entry) => ({ passage: entry.passage, embedding: [...entry.embedding] })),
            dims
        );
    }

    /**
     * Return the closest passages to the query, nearest first.
     *
     * Ties keep insertion order (Array.prototype.sort is stable), so a given
     * index and query embedding always produce the same result.
     *
     * @param queryEmbedding - The embedding vector to search for
     * @param limit - Maximum number of results to return
     */
    search(queryEmbedding: number[], limit: number): RetrievedPassage[] {
        if (limit <= 0) {
            return [];
        }

        const results: RetrievedPassage[] = this.entries.map((entry) => ({
            passage: entry.passage,
            distance: cosineDistance(queryEmbedding, entry.embedding),
        }));

        results.sort((a, b) => a.distance - b.distance);

        return results.slice(0, limit);
    }

    size(): number {
        return this.entries.length;
    }

    dimension(): number {
        return this.dims;
    }
}
