/**
 * Session Store Tests
 *
 * Tests for the in-memory store mapping session ids to indexes,
 * including its size and time-to-live bounds.
 */

import * as fc from 'fast-check';
import { InMemorySessionStore, createSessionStore } from '../sessionStore';
import { VectorIndex } from '../vectorIndex';

function makeIndex(label: string): VectorIndex {
    return VectorIndex.build([
        {
            passage: { id: label, content: label, metadata: { source: `${label}.pdf`, page: 1, chunkIndex: 0 } },
            embedding: [1, 0],
        },
    ]);
}

describe('InMemorySessionStore', () => {
    describe('create', () => {
        it('should return an opaque string id', async () => {
            const store = createSessionStore();
            const id = await store.create(makeIndex('a'));

            expect(typeof id).toBe('string');
            expect(id.length).toBeGreaterThan(0);
        });

        it('should return distinct ids for every session', async () => {
            const store = createSessionStore();
            const ids = new Set<string>();

            for (let i = 0; i < 50; i++) {
                ids.add(await store.create(makeIndex(`doc-${i}`)));
            }

            expect(ids.size).toBe(50);
        });

        it('should not lose entries when creates run concurrently', async () => {
            const store = createSessionStore();
            const indexes = Array.from({ length: 20 }, (_, i) => makeIndex(`doc-${i}`));

            const ids = await Promise.all(indexes.map((index) => store.create(index)));

            expect(store.size()).toBe(20);
            for (let i = 0; i < ids.length; i++) {
                expect(await store.get(ids[i])).toBe(indexes[i]);
            }
        });
    });

    describe('get', () => {
        it('should return exactly the stored index', async () => {
            const store = createSessionStore();
            const index = makeIndex('a');

            const id = await store.create(index);

            expect(await store.get(id)).toBe(index);
        });

        it('should return null for an unknown id', async () => {
            const store = createSessionStore();
            expect(await store.get('non-existent-id')).toBeNull();
        });

        it('should round-trip any index through create and get', async () => {
            await fc.assert(
                fc.asyncProperty(fc.string({ minLength: 1, maxLength: 20 }), async (label) => {
                    const store = createSessionStore();
                    const index = makeIndex(label);
                    const id = await store.create(index);
                    expect(await store.get(id)).toBe(index);
                }),
                { numRuns: 50 }
            );
        });
    });

    describe('lifecycle', () => {
        it('should evict the oldest session when full', async () => {
            const store = new InMemorySessionStore({ maxSessions: 2, ttlMs: 0 });

            const first = await store.create(makeIndex('first'));
            const second = await store.create(makeIndex('second'));
            const third = await store.create(makeIndex('third'));

            expect(await store.get(first)).toBeNull();
            expect(await store.get(second)).not.toBeNull();
            expect(await store.get(third)).not.toBeNull();
            expect(store.size()).toBe(2);
        });

        it('should expire sessions after the ttl', async () => {
            let now = 1_000;
            const store = new InMemorySessionStore({ ttlMs: 500, now: () => now });

            const id = await store.create(makeIndex('a'));

            now = 1_499;
            expect(await store.get(id)).not.toBeNull();

            now = 1_500;
            expect(await store.get(id)).toBeNull();
            expect(store.size()).toBe(0);
        });

        it('should keep sessions indefinitely when ttl is 0', async () => {
            let now = 0;
            const store = new InMemorySessionStore({ ttlMs: 0, now: () => now });

            const id = await store.create(makeIndex('a'));
            now = Number.MAX_SAFE_INTEGER;

            expect(await store.get(id)).not.toBeNull();
        });

        it('should reject a non-positive maxSessions', () => {
            expect(() => new InMemorySessionStore({ maxSessions: 0 })).toThrow(RangeError);
        });
    });
});
