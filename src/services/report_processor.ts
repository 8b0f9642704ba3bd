import { format, startOfDay } from 'date-fns';
import fs from 'fs';
import path from 'path';
import { extractionEngine } from '../engines/extraction_engine';
import type { ParseOptions, UnifiedReport } from '../types';
import { normalizeReportTimestamp } from '../utils/normalization';
import { type ReportRecord, type ReportRepository, type StoredReportRef, reportRepository } from './report_repository';
import { type ObjectStore, PROCESSED_PREFIX, RAW_PREFIX, contentTypeFor, objectStore } from './storage';
import { uploadWindow } from './upload_window';

export type ProcessingStatus = 'INSERTED' | 'REPLACED' | 'SKIPPED' | 'ERROR';

export interface ProcessingResult {
    status: ProcessingStatus;
    errorMessage: string | null;
    reason: string | null;
    name: string | null;
    pan: string | null;
    originalFile: string;
    url: string | null;
}

export type Decision =
    | { action: 'INSERT_NEW'; reason: string }
    | { action: 'REPLACE_OLD'; reason: string; existing: StoredReportRef }
    | { action: 'SKIP'; reason: string };

export interface UploadedReport {
    originalname: string;
    buffer: Buffer;
}

export interface IngestSummary {
    accepted: boolean;
    message: string;
    details: { inserted: number; replaced: number; skipped: number; errors: number };
    results: ProcessingResult[];
}

export interface ReportExtractor {
    extract(filePath: string, options?: ParseOptions): Promise<UnifiedReport>;
}

export interface AdmissionGate {
    isWithinWindow(now?: Date): boolean;
    describe(): string;
}

export interface ReportProcessorDeps {
    store: ObjectStore;
    repository: ReportRepository;
    window: AdmissionGate;
    extractor: ReportExtractor;
    now?: () => Date;
}

function sanitizeFilenamePart(value: string, maxLength = 100): string {
    return value
        .trim()
        .replace(/[^\w\s-]/g, '')
        .replace(/[-\s]+/g, '_')
        .replace(/^_+|_+$/g, '')
        .slice(0, maxLength);
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Takes stored uploads through extraction and decides whether each one is a
 * new borrower, a newer report for a known borrower, or stale.
 */
export class ReportProcessor {
    private readonly now: () => Date;

    constructor(private readonly deps: ReportProcessorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    processedFilename(name: string, pan: string, originalFilename: string): string {
        const ext = path.extname(originalFilename).toLowerCase();
        const combined = pan ? `${name}_${pan}` : name;
        let safe = sanitizeFilenamePart(combined).toUpperCase();
        if (!safe) {
            safe = sanitizeFilenamePart(path.basename(originalFilename, path.extname(originalFilename))).toUpperCase();
        }
        return `${safe}${ext}`;
    }

    /** Compares at day precision; same-day or older uploads never replace. */
    decide(existing: StoredReportRef | null, incoming: Date): Decision {
        if (!existing) {
            return { action: 'INSERT_NEW', reason: 'No existing record - will insert' };
        }

        const incomingDay = format(startOfDay(incoming), 'yyyy-MM-dd');
        const existingDay = format(startOfDay(new Date(existing.report_date)), 'yyyy-MM-dd');

        if (incomingDay > existingDay) {
            return {
                action: 'REPLACE_OLD',
                existing,
                reason: `Incoming date ${incomingDay} is newer than existing ${existingDay}`,
            };
        }
        const relation = incomingDay === existingDay ? 'same as' : 'older than';
        return { action: 'SKIP', reason: `Incoming date ${incomingDay} is ${relation} existing ${existingDay}` };
    }

    buildRecord(report: UnifiedReport, url: string, reportDate: string): ReportRecord {
        const { basic_info: info, overdue_summary: overdue } = report;

        const summary = {
            score: info.score ?? 0,
            overdue_accounts: overdue.total_overdue_accounts,
            overdue_amount: overdue.total_overdue_amount,
            current_amount: overdue.total_current_amount,
            enquiry_count: report.enquiries.list.length,
            default_months: report.accounts.final_default_month_average,
        };

        return {
            name: (info.name ?? '').trim().toLowerCase(),
            pan_card: (info.pan_card ?? '').trim().toUpperCase(),
            mobile_no: [...new Set(info.mobile_numbers)].join(','),
            email: [...new Set(info.emails)].join(','),
            report_date: reportDate,
            score: info.score ?? 0,
            ckyc: (info.ckyc ?? '').trim(),
            summary: JSON.stringify(summary),
            url,
        };
    }

    async processStoredFile(key: string): Promise<ProcessingResult> {
        const result: ProcessingResult = {
            status: 'ERROR',
            errorMessage: null,
            reason: null,
            name: null,
            pan: null,
            originalFile: key,
            url: null,
        };
        let tempPath: string | null = null;
        const staged: { replacedUrl: string | null } = { replacedUrl: null };

        try {
            console.log(`[Processor] Processing ${key}`);
            tempPath = await this.deps.store.download(key);
            const report = await this.deps.extractor.extract(tempPath, { now: this.now() });

            const name = (report.basic_info.name ?? '').trim().toLowerCase();
            const pan = (report.basic_info.pan_card ?? '').trim().toUpperCase();
            result.name = name;
            result.pan = pan;

            if (!name || !pan) {
                result.errorMessage = 'Missing name or PAN in extracted data';
                console.error(`[Processor] ${key}: ${result.errorMessage}`);
                return result;
            }

            const timestamp = normalizeReportTimestamp(report.basic_info.report_date, this.now());
            const bytes = await fs.promises.readFile(tempPath);
            const processedKey = `${PROCESSED_PREFIX}${this.processedFilename(name, pan, key)}`;

            const decision = await this.deps.repository.transaction(async store => {
                const verdict = this.decide(await store.findLatest(name, pan), timestamp.date);
                if (verdict.action === 'SKIP') return verdict;

                if (verdict.action === 'REPLACE_OLD') {
                    staged.replacedUrl = verdict.existing.url;
                    await store.deleteAll(name, pan);
                }

                result.url = await this.deps.store.upload(bytes, processedKey, contentTypeFor(processedKey));
                await store.insert(this.buildRecord(report, result.url, timestamp.value));
                return verdict;
            });

            // The old object goes only once its rows are gone for good.
            if (decision.action === 'REPLACE_OLD') {
                await this.removeStoredObject(decision.existing.url, processedKey);
            }

            result.reason = decision.reason;
            result.status = decision.action === 'SKIP'
                ? 'SKIPPED'
                : decision.action === 'REPLACE_OLD' ? 'REPLACED' : 'INSERTED';
            console.log(`[Processor] ${key}: ${result.status}. ${decision.reason}`);
            return result;
        } catch (err) {
            // Rolled back after the upload: no row points at the new object,
            // unless it was written over the one the old rows still use.
            const replacedKey = staged.replacedUrl ? this.deps.store.keyFromUrl(staged.replacedUrl) : null;
            await this.removeStoredObject(result.url, replacedKey);
            result.status = 'ERROR';
            result.url = null;
            result.errorMessage = errorMessage(err);
            console.error(`[Processor] Error processing file ${key}:`, err);
            return result;
        } finally {
            if (tempPath) {
                await fs.promises.rm(tempPath, { force: true });
            }
        }
    }

    /**
     * Best effort; a failed delete is logged and processing goes ahead.
     * `keep` names a key that is still in use and must survive.
     */
    private async removeStoredObject(url: string | null, keep?: string | null): Promise<void> {
        const key = url ? this.deps.store.keyFromUrl(url) : null;
        if (!key || key === keep) return;
        try {
            await this.deps.store.remove(key);
            console.log(`[Processor] Deleted stored object: ${key}`);
        } catch (err) {
            console.warn(`[Processor] Delete failed for ${key}: ${errorMessage(err)}`);
        }
    }

    /**
     * Stores each upload under raw-data/ and processes it straight away.
     * Nothing is accepted outside the upload window.
     */
    async ingest(files: UploadedReport[]): Promise<IngestSummary> {
        const details = { inserted: 0, replaced: 0, skipped: 0, errors: 0 };

        if (!this.deps.window.isWithinWindow(this.now())) {
            const message = `Uploads only accepted between ${this.deps.window.describe()}`;
            console.warn(`[Processor] ${message}`);
            return { accepted: false, message, details, results: [] };
        }
        if (files.length === 0) {
            return { accepted: false, message: 'No files provided', details, results: [] };
        }

        console.log(`[Processor] Starting upload of ${files.length} file(s)`);
        const succeeded: string[] = [];
        const failed: string[] = [];
        const results: ProcessingResult[] = [];

        for (const file of files) {
            const filename = path.basename(file.originalname);
            let rawKey: string;
            try {
                await this.deps.store.upload(file.buffer, `${RAW_PREFIX}${filename}`, contentTypeFor(filename));
                rawKey = `${RAW_PREFIX}${filename}`;
            } catch (err) {
                console.error(`[Processor] Upload failed for ${filename}: ${errorMessage(err)}`);
                failed.push(filename);
                continue;
            }

            const outcome = await this.processStoredFile(rawKey);
            results.push(outcome);

            switch (outcome.status) {
                case 'INSERTED':
                    details.inserted++;
                    succeeded.push(filename);
                    break;
                case 'REPLACED':
                    details.replaced++;
                    succeeded.push(filename);
                    break;
                case 'SKIPPED':
                    details.skipped++;
                    succeeded.push(filename);
                    break;
                case 'ERROR':
                    details.errors++;
                    failed.push(filename);
                    break;
            }
        }

        console.log(`[Processor] Upload complete. Successful: ${succeeded.length}, Failed: ${failed.length}`);

        if (succeeded.length === 0) {
            return {
                accepted: false,
                message: `Failed to upload all files. Errors: ${failed.join(', ')}`,
                details,
                results,
            };
        }

        const parts = [
            details.inserted > 0 ? `${details.inserted} inserted` : null,
            details.replaced > 0 ? `${details.replaced} replaced` : null,
            details.skipped > 0 ? `${details.skipped} skipped` : null,
        ].filter((part): part is string => part !== null);

        let message = `Successfully uploaded ${succeeded.length} file(s)`;
        if (parts.length > 0) message += ` (${parts.join(', ')})`;
        message += `: ${succeeded.join(', ')}`;
        if (failed.length > 0) message += `. Failed: ${failed.length} file(s)`;

        return { accepted: true, message, details, results };
    }
}

export const reportProcessor = new ReportProcessor({
    store: objectStore,
    repository: reportRepository,
    window: uploadWindow,
    extractor: extractionEngine,
});
