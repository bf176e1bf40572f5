/**
 * Fixed policy corpus.
 *
 * Indexes every PDF in the policy directory once, at startup. If loading
 * fails the service still starts; /evaluate then answers 500 until the
 * process is restarted with a working corpus.
 */

import { IDocumentIngestor } from './documentIngestor';
import { IRAGEngine } from './ragEngine';
import { IVectorIndex } from './vectorIndex';

export interface CorpusSource {
    getIndex(): IVectorIndex | null;
}

export class FixedCorpus implements CorpusSource {
    private index: IVectorIndex | null = null;

    constructor(
        private readonly directory: string,
        private readonly ingestor: IDocumentIngestor,
        private readonly ragEngine: IRAGEngine
    ) {}

    /**
     * Builds the index. Failures are logged, never thrown.
     *
     * @returns true if an index is available afterwards
     */
    async load(): Promise<boolean> {
        try {
            const pages = await this.ingestor.ingestDirectory(this.directory);
            if (pages.length === 0) {
                console.warn(`No PDF files found in '${this.directory}'. /evaluate is unavailable.`);
                return false;
            }

            console.log(`Indexing ${pages.length} page(s) from '${this.directory}'...`);
            this.index = await this.ragEngine.buildIndex(pages);
            console.log(`Vector store created successfully (${this.index.size()} passages).`);
            return true;
        } catch (error) {
            console.error('Error creating vector store:', error);
            return false;
        }
    }

    getIndex(): IVectorIndex | null {
        return this.index;
    }
}

/**
 * A corpus around an already-built index (or none).
 */
export function staticCorpus(index: IVectorIndex | null): CorpusSource {
    return { getIndex: () => index };
}
