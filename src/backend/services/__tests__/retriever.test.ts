/**
 * Vector Index and Retriever Tests
 *
 * Embeddings come from KeywordEmbeddings (keyword counts over a fixed
 * vocabulary), so every distance below can be worked out by hand.
 */

import * as fc from 'fast-check';
import { Passage } from '../../../shared/types';
import { EmbeddingUnavailableError } from '../../errors';
import { FailingEmbeddings, KeywordEmbeddings, StaticEmbeddings, keywordVector } from '../../__tests__/fakes';
import { Retriever, createRetriever } from '../retriever';
import { VectorIndex, cosineSimilarity, cosineDistance } from '../vectorIndex';

const passage = (id: string, content: string): Passage => ({
    id,
    content,
    metadata: { source: 'policy.pdf', page: 1, chunkIndex: 0 },
});

const PASSAGES = [
    passage('p1', 'Dental coverage is $500.'),
    passage('p2', 'Vision exams are covered yearly.'),
    passage('p3', 'Hospital surgery requires approval.'),
    passage('p4', 'Dental surgery is excluded.'),
    passage('p5', 'General terms apply.'),
];

function buildIndex(passages: Passage[] = PASSAGES): VectorIndex {
    return VectorIndex.build(passages.map((p) => ({ passage: p, embedding: keywordVector(p.content) })));
}

describe('cosineSimilarity', () => {
    it('should be 1 for identical directions', () => {
        expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    });

    it('should be 0 for perpendicular vectors', () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('should treat zero vectors as unrelated', () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
        expect(cosineDistance([0, 0], [1, 1])).toBe(1);
    });

    it('should reject vectors of different dimensions', () => {
        expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector dimension mismatch');
    });
});

describe('VectorIndex', () => {
    it('should report size and dimension', () => {
        const index = buildIndex();
        expect(index.size()).toBe(5);
        expect(index.dimension()).toBe(5);
    });

    it('should reject entries with mixed dimensions', () => {
        expect(() =>
            VectorIndex.build([
                { passage: passage('a', 'a'), embedding: [1, 0] },
                { passage: passage('b', 'b'), embedding: [1, 0, 0] },
            ])
        ).toThrow('Vector dimension mismatch');
    });

    it('should not be affected by later changes to the source vectors', () => {
        const embedding = [1, 0];
        const index = VectorIndex.build([{ passage: passage('a', 'a'), embedding }]);

        embedding[0] = 0;

        expect(index.search([1, 0], 1)[0].distance).toBeCloseTo(0);
    });

    it('should order results by distance and keep insertion order on ties', () => {
        const results = buildIndex().search(keywordVector('Is dental covered?'), 5);

        expect(results.map((r) => r.passage.id)).toEqual(['p1', 'p4', 'p2', 'p3', 'p5']);
        expect(results[0].distance).toBeCloseTo(1 - Math.SQRT1_2);
        expect(results[1].distance).toBeCloseTo(1 - Math.SQRT1_2);
        expect(results[4].distance).toBe(1);
    });

    it('should return nothing for a non-positive limit', () => {
        expect(buildIndex().search(keywordVector('dental'), 0)).toEqual([]);
    });
});

describe('Retriever', () => {
    it('should return the top 4 passages by default', async () => {
        const retriever = createRetriever(new KeywordEmbeddings());

        const results = await retriever.search(buildIndex(), 'Is dental covered?');

        expect(results.map((r) => r.passage.id)).toEqual(['p1', 'p4', 'p2', 'p3']);
    });

    it('should embed the query with the query task', async () => {
        const embeddings = new KeywordEmbeddings();
        await new Retriever(embeddings).search(buildIndex(), 'dental surgery', 2);

        expect(embeddings.calls).toEqual([{ texts: ['dental surgery'], task: 'RETRIEVAL_QUERY' }]);
    });

    it('should rank the closest passage first', async () => {
        const results = await new Retriever(new KeywordEmbeddings()).search(buildIndex(), 'dental surgery', 3);

        expect(results.map((r) => r.passage.id)).toEqual(['p4', 'p1', 'p3']);
        expect(results[0].distance).toBeCloseTo(0);
        expect(results[1].distance).toBeCloseTo(0.5);
    });

    it('should return every passage when the index holds fewer than k', async () => {
        const index = buildIndex(PASSAGES.slice(0, 2));
        const results = await new Retriever(new KeywordEmbeddings()).search(index, 'vision', 4);

        expect(results.map((r) => r.passage.id)).toEqual(['p2', 'p1']);
    });

    it('should fail with EmbeddingUnavailableError when the provider is down', async () => {
        const retriever = new Retriever(new FailingEmbeddings());
        await expect(retriever.search(buildIndex(), 'dental')).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    });

    it('should fail when the query vector does not match the index dimension', async () => {
        const retriever = new Retriever(new StaticEmbeddings([[1, 0]]));
        await expect(retriever.search(buildIndex(), 'dental')).rejects.toThrow('index expects 5');
    });

    it('should return at most k results from the index in non-decreasing distance', async () => {
        const index = buildIndex();
        const ids = new Set(PASSAGES.map((p) => p.id));
        const retriever = new Retriever(new KeywordEmbeddings());
        const words = fc.constantFrom('dental', 'vision', 'surgery', 'coverage', 'hospital', 'other');

        await fc.assert(
            fc.asyncProperty(fc.array(words, { maxLength: 6 }), fc.integer({ min: 0, max: 8 }), async (query, k) => {
                const results = await retriever.search(index, query.join(' '), k);

                expect(results.length).toBe(Math.min(k, index.size()));
                for (let i = 0; i < results.length; i++) {
                    expect(ids.has(results[i].passage.id)).toBe(true);
                    if (i > 0) {
                        expect(results[i].distance).toBeGreaterThanOrEqual(results[i - 1].distance);
                    }
                }
            }),
            { numRuns: 100 }
        );
    });
});
