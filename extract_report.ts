import * as path from 'path';
import { extractionEngine } from './src/engines/extraction_engine';
import { pdfSegmenter } from './src/engines/pdf_segmenter';

const USAGE = 'Usage: npm run extract -- <report.pdf|report.html> [--dpd-blocks]';

async function main() {
    const args = process.argv.slice(2);
    const filePath = args.find(arg => !arg.startsWith('--'));
    const dpdBlocks = args.includes('--dpd-blocks');

    if (!filePath) {
        console.error(USAGE);
        process.exitCode = 1;
        return;
    }

    if (dpdBlocks) {
        if (path.extname(filePath).toLowerCase() !== '.pdf') {
            console.error('--dpd-blocks only applies to PDF reports.');
            process.exitCode = 1;
            return;
        }
        const text = await pdfSegmenter.loadText(filePath);
        console.log(JSON.stringify(pdfSegmenter.extractDpdBlocks(text), null, 2));
        return;
    }

    const report = await extractionEngine.extract(filePath);
    console.log(JSON.stringify(report, null, 2));
}

main().catch(err => {
    console.error('[Extract]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});
