/**
 * Document Chunker Service
 *
 * Splits page text into overlapping passages for embedding and retrieval.
 *
 * WHY CHUNKING MATTERS FOR RAG:
 * Embeddings work best on focused text, and the prompt can only carry a few
 * passages. Large pages must be split into chunks that:
 * 1. Stay within a fixed character budget
 * 2. End at a natural boundary where one is close enough
 * 3. Overlap their neighbour so a sentence cut at a boundary is still seen whole
 *
 * Overlap is exact: chunk n+1 always starts chunkOverlap characters before
 * chunk n ends, so the chunks can be stitched back into the original text.
 */

import { v4 as uuidv4 } from 'uuid';
import { PageText, Passage } from '../../shared/types';

/**
 * Configuration for the chunking process.
 */
export interface ChunkingConfig {
    /** Maximum size of each chunk in characters */
    chunkSize: number;
    /** Number of characters shared by consecutive chunks */
    chunkOverlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
    chunkSize: 1000,
    chunkOverlap: 100,
};

/**
 * Result of chunking a single text, before ids and metadata are attached.
 */
export interface TextChunk {
    content: string;
    chunkIndex: number;
    /** Offset of the chunk's first character in the source text */
    start: number;
}

/**
 * @throws RangeError if the sizes cannot produce forward progress
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
    const { chunkSize, chunkOverlap } = config;

    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
        throw new RangeError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
    }
    if (chunkOverlap >= chunkSize) {
        throw new RangeError(
            `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
        );
    }
}

/**
 * Splits text into overlapping chunks.
 *
 * This is a "sliding window" approach:
 * 1. Start at position 0
 * 2. Take up to chunkSize characters, cutting early at a natural break
 * 3. Start the next chunk chunkOverlap characters before the cut
 * 4. Repeat until the window reaches the end of the text
 *
 * The last chunk keeps whatever length is left. Text is never trimmed, so
 * the chunks reproduce the input exactly once overlaps are removed.
 */
export function splitIntoChunks(
    text: string,
    config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): TextChunk[] {
    validateChunkingConfig(config);
    const { chunkSize, chunkOverlap } = config;

    if (text.trim().length === 0) {
        return [];
    }

    const chunks: TextChunk[] = [];
    let start = 0;

    for (;;) {
        const windowEnd = start + chunkSize;

        if (windowEnd >= text.length) {
            chunks.push({ content: text.slice(start), chunkIndex: chunks.length, start });
            return chunks;
        }

        let end = findNaturalBreak(text, start, windowEnd);
        // The next chunk must start after this one does
        if (end - chunkOverlap <= start) {
            end = windowEnd;
        }

        chunks.push({ content: text.slice(start, end), chunkIndex: chunks.length, start });
        start = end - chunkOverlap;
    }
}

/**
 * Find a natural break point near the target position.
 *
 * Preference order:
 * 1. Paragraph break (double newline)
 * 2. Sentence end (. ! ? followed by whitespace and a capital)
 * 3. Word boundary (whitespace)
 * 4. Original position (if no better option)
 */
function findNaturalBreak(text: string, start: number, targetEnd: number): number {
    const searchWindow = text.slice(start, targetEnd);

    const paragraphBreak = searchWindow.lastIndexOf('\n\n');
    if (paragraphBreak > searchWindow.length * 0.5) {
        return start + paragraphBreak + 2;
    }

    let sentenceEnd = -1;
    for (const match of searchWindow.matchAll(/[.!?]\s+(?=[A-Z])/g)) {
        sentenceEnd = (match.index ?? 0) + match[0].length;
    }
    if (sentenceEnd > searchWindow.length * 0.5) {
        return start + sentenceEnd;
    }

    const lastSpace = Math.max(searchWindow.lastIndexOf(' '), searchWindow.lastIndexOf('\n'));
    if (lastSpace > searchWindow.length * 0.7) {
        return start + lastSpace + 1;
    }

    return targetEnd;
}

/**
 * Turns extracted pages into passages.
 *
 * Each page is chunked on its own so no passage spans two pages.
 */
export class DocumentChunker {
    private readonly config: ChunkingConfig;

    constructor(config: Partial<ChunkingConfig> = {}) {
        this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
        validateChunkingConfig(this.config);
    }

    chunkPages(pages: PageText[]): Passage[] {
        const passages: Passage[] = [];

        for (const page of pages) {
            for (const chunk of splitIntoChunks(page.text, this.config)) {
                passages.push({
                    id: uuidv4(),
                    content: chunk.content,
                    metadata: {
                        source: page.source,
                        page: page.page,
                        chunkIndex: chunk.chunkIndex,
                    },
                });
            }
        }

        return passages;
    }

    getConfig(): ChunkingConfig {
        return { ...this.config };
    }
}

/**
 * Factory function to create a DocumentChunker.
 */
export function createDocumentChunker(config?: Partial<ChunkingConfig>): DocumentChunker {
    return new DocumentChunker(config);
}
