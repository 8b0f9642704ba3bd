import express from 'express';
import multer from 'multer';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { SUPPORTED_EXTENSIONS, extractionEngine } from '../engines/extraction_engine';
import { UnsupportedFormatError } from '../engines/extraction_errors';
import { reportProcessor } from '../services/report_processor';
import { uploadWindow } from '../services/upload_window';

const router = express.Router();
const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: env.MAX_UPLOAD_BYTES },
});

function unsupportedFiles(files: Express.Multer.File[]): string[] {
    return files
        .filter(file => !SUPPORTED_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase()))
        .map(file => file.originalname);
}

router.get('/window', (req, res) => {
    res.json({
        window: uploadWindow.describe(),
        isWithinWindow: uploadWindow.isWithinWindow(),
        serverTime: new Date().toISOString(),
    });
});

router.post('/upload', upload.array('files'), async (req, res) => {
    try {
        const files = Array.isArray(req.files) ? req.files : [];
        if (files.length === 0) {
            return res.status(400).json({ error: "Please select at least one file in 'files'." });
        }

        const rejected = unsupportedFiles(files);
        if (rejected.length > 0) {
            return res.status(400).json({ error: `Unsupported file extension: ${rejected.join(', ')}` });
        }

        if (!uploadWindow.isWithinWindow()) {
            return res.status(403).json({ error: `Uploads are only accepted between ${uploadWindow.describe()}` });
        }

        console.log(`[Reports] Received ${files.length} file(s) for ingestion`);
        const summary = await reportProcessor.ingest(files);
        res.status(summary.accepted ? 200 : 422).json(summary);
    } catch (error) {
        console.error('[Reports] Ingestion error:', error);
        res.status(500).json({ error: error instanceof Error ? error.message : 'Ingestion failed' });
    }
});

// Extraction only: nothing is stored or persisted.
router.post('/extract', upload.single('file'), async (req, res) => {
    if (!req.file) {
        return res.status(400).json({ error: "No report uploaded in 'file' field." });
    }

    const tempPath = path.join(os.tmpdir(), `${uuidv4()}${path.extname(req.file.originalname).toLowerCase()}`);
    try {
        await fs.promises.writeFile(tempPath, req.file.buffer);
        const report = await extractionEngine.extract(tempPath);
        res.json(report);
    } catch (error) {
        if (error instanceof UnsupportedFormatError) {
            return res.status(400).json({ error: error.message });
        }
        console.error('[Reports] Extraction error:', error);
        res.status(500).json({ error: error instanceof Error ? error.message : 'Extraction failed' });
    } finally {
        await fs.promises.rm(tempPath, { force: true });
    }
});

export default router;
