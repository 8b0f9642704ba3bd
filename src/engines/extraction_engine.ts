import { existsSync } from 'fs';
import path from 'path';
import type { ParseOptions, Segmenter, UnifiedReport } from '../types';
import { ReportNotFoundError, UnsupportedFormatError } from './extraction_errors';
import { htmlSegmenter } from './html_segmenter';
import { pdfSegmenter } from './pdf_segmenter';

export const SEGMENTERS: Readonly<Record<string, Segmenter>> = Object.freeze({
    '.pdf': pdfSegmenter,
    '.html': htmlSegmenter,
    '.htm': htmlSegmenter,
});

export const SUPPORTED_EXTENSIONS = Object.keys(SEGMENTERS);

export function segmenterFor(filePath: string): Segmenter | undefined {
    return SEGMENTERS[path.extname(filePath).toLowerCase()];
}

export const extractionEngine = {
    /**
     * Reads one bureau report and returns its unified record. Only a missing
     * file, an unknown extension or an I/O failure escapes as an error; every
     * field-level miss degrades to null or zero.
     */
    async extract(filePath: string, options: ParseOptions = {}): Promise<UnifiedReport> {
        if (!existsSync(filePath)) {
            throw new ReportNotFoundError(filePath);
        }

        const segmenter = segmenterFor(filePath);
        if (!segmenter) {
            throw new UnsupportedFormatError(path.extname(filePath).toLowerCase());
        }

        console.log(`[Extractor] ${path.basename(filePath)} → ${segmenter.format} segmenter`);
        return segmenter.extract(filePath, options);
    },
};
