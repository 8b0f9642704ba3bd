import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { extractionEngine, segmenterFor, SUPPORTED_EXTENSIONS } from '../extraction_engine';
import { ReportNotFoundError, UnsupportedFormatError } from '../extraction_errors';
import { htmlSegmenter } from '../html_segmenter';
import { pdfSegmenter } from '../pdf_segmenter';

describe('segmenterFor', () => {
    it('dispatches on the lowercased extension', () => {
        assert.equal(segmenterFor('report.pdf'), pdfSegmenter);
        assert.equal(segmenterFor('REPORT.HTM'), htmlSegmenter);
        assert.equal(segmenterFor('/tmp/a.b/report.html'), htmlSegmenter);
        assert.equal(segmenterFor('report.docx'), undefined);
    });

    it('lists the supported extensions', () => {
        assert.deepEqual(SUPPORTED_EXTENSIONS, ['.pdf', '.html', '.htm']);
    });
});

describe('extractionEngine.extract', () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'extraction-engine-'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('fails with ReportNotFoundError for a missing path', async () => {
        const missing = path.join(tempDir, 'missing.pdf');
        await assert.rejects(extractionEngine.extract(missing), (err: unknown) => {
            assert.ok(err instanceof ReportNotFoundError);
            assert.equal(err.filePath, missing);
            return true;
        });
    });

    it('fails with UnsupportedFormatError before reading the file', async () => {
        const notes = path.join(tempDir, 'report.txt');
        fs.writeFileSync(notes, 'CONSUMER: ASHA KUMAR');
        await assert.rejects(extractionEngine.extract(notes), (err: unknown) => {
            assert.ok(err instanceof UnsupportedFormatError);
            assert.equal(err.extension, '.txt');
            return true;
        });
    });

    it('extracts a markup report from disk', async () => {
        const file = path.join(tempDir, 'report.html');
        fs.writeFileSync(file, [
            '<html><body>',
            '<p>CONSUMER: ASHA KUMAR</p>',
            '<p>PAN: ABCDE1234F</p>',
            '<p>CONSUMER ACCOUNT DETAILS</p>',
            '<p>DATE OPENED: 01-01-2020</p><p>SANCTIONED AMOUNT: 75,000</p><p>CURRENT BALANCE: 5,000</p>',
            '</body></html>',
        ].join('\n'));

        const now = new Date(2024, 2, 1);
        const report = await extractionEngine.extract(file, { now });

        assert.equal(report.metadata.format_type, 'HTML');
        assert.equal(report.basic_info.name, 'ASHA KUMAR');
        assert.equal(report.basic_info.pan_card, 'ABCDE1234F');
        assert.equal(report.accounts.total, 1);
        assert.equal(report.accounts.list[0].sanctioned_amount, '75000');
        assert.equal(report.accounts.list[0].deterioration_reasoning, '');
        assert.equal(report.accounts.final_dpd_average, null);
    });
});
