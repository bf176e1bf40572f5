/**
 * Document Ingestor Service
 *
 * Turns PDF files into page texts, in submission order.
 *
 * Two sources feed it:
 * - Uploads: temporary files written by the HTTP layer. The batch is
 *   validated as a whole before anything is extracted, and the temporary
 *   files are always removed afterwards.
 * - A policy directory: read in place at startup, never modified.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PageText, UploadedDocument } from '../../shared/types';
import { UnsupportedFileTypeError } from '../errors';
import { PdfTextExtractor, createPdfParser, detectDocumentType } from './documentParser';

export interface IDocumentIngestor {
    ingestUploads(files: UploadedDocument[]): Promise<PageText[]>;
    ingestDirectory(directory: string): Promise<PageText[]>;
}

export class DocumentIngestor implements IDocumentIngestor {
    private readonly extractor: PdfTextExtractor;

    constructor(extractor: PdfTextExtractor = createPdfParser()) {
        this.extractor = extractor;
    }

    /**
     * Extract page texts from uploaded files.
     *
     * @throws UnsupportedFileTypeError if any file is not a PDF (nothing is extracted)
     */
    async ingestUploads(files: UploadedDocument[]): Promise<PageText[]> {
        try {
            for (const file of files) {
                if (detectDocumentType(file.originalName) !== 'pdf') {
                    throw new UnsupportedFileTypeError(file.originalName);
                }
            }

            const pages: PageText[] = [];
            for (const file of files) {
                pages.push(...(await this.extractFile(file.path, file.originalName)));
            }
            return pages;
        } finally {
            await removeFiles(files.map((file) => file.path));
        }
    }

    /**
     * Extract page texts from every PDF in a directory, sorted by filename.
     * A missing directory is treated as empty.
     */
    async ingestDirectory(directory: string): Promise<PageText[]> {
        let entries: string[];
        try {
            entries = await fs.readdir(directory);
        } catch (error) {
            if (isMissingPathError(error)) {
                return [];
            }
            throw error;
        }

        const pdfFiles = entries.filter((name) => detectDocumentType(name) === 'pdf').sort();

        const pages: PageText[] = [];
        for (const name of pdfFiles) {
            pages.push(...(await this.extractFile(path.join(directory, name), name)));
        }
        return pages;
    }

    private async extractFile(filePath: string, source: string): Promise<PageText[]> {
        const buffer = await fs.readFile(filePath);
        const pageTexts = await this.extractor.extractPages(buffer);

        return pageTexts.map((text, index) => ({
            source,
            page: index + 1,
            text,
        }));
    }
}

function isMissingPathError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Remove temporary files. Already-missing files are ignored; any other
 * failure is logged so the request outcome is not masked by cleanup.
 */
async function removeFiles(paths: string[]): Promise<void> {
    const results = await Promise.allSettled(paths.map((filePath) => fs.rm(filePath, { force: true })));

    results.forEach((result, index) => {
        if (result.status === 'rejected') {
            console.error(`Failed to remove temporary upload ${paths[index]}:`, result.reason);
        }
    });
}

export function createDocumentIngestor(extractor?: PdfTextExtractor): DocumentIngestor {
    return new DocumentIngestor(extractor);
}
