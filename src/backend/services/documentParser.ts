/**
 * Document Parser Service
 *
 * Extracts page text from PDF documents for indexing.
 *
 * PDFs are designed for visual rendering, not text extraction. They can contain:
 * - Text in arbitrary order (not reading order)
 * - Embedded fonts that map characters differently
 * - Scanned images (requires OCR, which we don't support)
 *
 * pdf-parse handles most common cases but may struggle with complex layouts.
 */

import { DocumentType } from '../../shared/types';
import { DocumentParseError, asError } from '../errors';

/**
 * Interface for page-level text extraction.
 * The ingestor depends on this so tests can run without real PDFs.
 */
export interface PdfTextExtractor {
    extractPages(buffer: Buffer): Promise<string[]>;
}

/**
 * pdf-parse renders each page after a blank line, so the raw text looks like
 * "\n\n<page 1>\n\n<page 2>...". Splits on that boundary, or returns null
 * when the piece count differs from the page count (a page contains a blank
 * line of its own).
 */
export function splitRenderedPages(text: string, pageCount: number): string[] | null {
    if (!text.startsWith('\n\n')) {
        return pageCount <= 1 ? [text] : null;
    }

    const pages = text.slice(2).split('\n\n');
    return pages.length === pageCount ? pages : null;
}

export class PdfParser implements PdfTextExtractor {
    async extractPages(buffer: Buffer): Promise<string[]> {
        try {
            // Loaded lazily: pdf-parse reads a bundled sample file when required as a main module
            const pdfParse = (await import('pdf-parse')).default;
            const pdf = await pdfParse(buffer);

            const pages = splitRenderedPages(pdf.text, pdf.numpages);
            if (pages) {
                return pages;
            }

            // Ambiguous boundaries: render growing prefixes of the document
            // and take each page as the difference between two of them
            const exact: string[] = [];
            let previous = '';
            for (let max = 1; max <= pdf.numpages; max++) {
                const prefix = await pdfParse(buffer, { max });
                exact.push(prefix.text.slice(previous.length + 2));
                previous = prefix.text;
            }
            return exact;
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Unknown error';
            throw new DocumentParseError(
                `Failed to parse PDF: ${message}. The file may be corrupted or password-protected.`,
                asError(error)
            );
        }
    }
}

/**
 * Detects document type from filename extension.
 * Returns undefined if the extension is not supported.
 */
export function detectDocumentType(filename: string): DocumentType | undefined {
    const parts = filename.toLowerCase().split('.');
    if (parts.length < 2) {
        return undefined;
    }

    switch (parts.pop()) {
        case 'pdf':
            return 'pdf';
        default:
            return undefined;
    }
}

export function createPdfParser(): PdfParser {
    return new PdfParser();
}
