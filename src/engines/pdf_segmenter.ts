import { readFile } from 'fs/promises';
import pdfParse from 'pdf-parse';
import { format } from 'date-fns';
import type { Enquiry, OverdueSummary, ParseOptions, SegmentedAccount, Segmenter, UnifiedReport } from '../types';
import { cleanAmount, dpdToNumber, mean, parseDayMonthYear, roundTo1 } from '../utils/normalization';
import { PATTERNS, findAll, firstMatch } from '../utils/patterns';
import { deteriorationEngine } from './deterioration_engine';
import { dpdHistoryEngine } from './dpd_history';
import { reportBuilder } from './report_builder';

/** Upper bound on grid headers walked per document. */
const MAX_ACCOUNTS = 200;
/** Grid headers summarised by `extractDpdBlocks`. */
const MAX_DPD_BLOCKS = 5;

const META_LINES_BEFORE = 25;
const META_LINES_AFTER = 60;

const SCORE_PATTERNS = [
    /(\d{3})\s*1\.\s*PRESENCE\s+OF\s+DELINQUENCY[\s\S]*?CREDITVISION/i,
    /SCORE\s+NAME\s+SCORE[\s\S]*?(\d{3})/i,
    /SCORING FACTORS\s*\n\s*(\d{3})/i,
    /CREDITVISION[\s\S]*?(\d{3})\s*\d/i,
];
const MIN_SCORE = 300;
const MAX_SCORE = 900;

const METADATA_FIELDS = {
    memberName: /MEMBER NAME[:\s]*(.+?)(?=\s+(?:OPENED|ACCOUNT|TYPE|SANCTIONED|DATE)\b|\n|$)/i,
    dateOpened: /OPENED[:\s]*(\d{2}-\d{2}-\d{4})/i,
    dateClosed: /CLOSED[:\s]*(\d{2}-\d{2}-\d{4})/i,
    sanctionedAmount: /SANCTIONED(?:\s+AMOUNT)?[:\s]*₹?\s*([\d,]+)/i,
    currentBalance: /CURRENT BALANCE[:\s]*₹?\s*([\d,]+)/i,
    overdueAmount: /OVERDUE(?:\s+AMOUNT)?[:\s]*₹?\s*([\d,]+)/i,
    accountType: /TYPE[:\s]*([^\n]+)/i,
    dateReported: /REPORTED AND CERTIFIED[:\s]*(\d{2}-\d{2}-\d{4})/i,
};

export interface DpdBlockEntry {
    status: string;
    numeric_status: number;
    month: string;
}

export interface DpdBlock {
    account_index: number;
    total_entries: number;
    numeric_status_count: number;
    per_account_dpd_average: number | null;
    entries: DpdBlockEntry[];
}

export interface DpdBlockSummary {
    dpd_blocks: DpdBlock[];
    final_dpd_average: number | null;
    accounts_processed: number;
    max_accounts_limit: number;
}

/** Line that opens the next account's metadata table. */
function isAccountBoundary(line: string): boolean {
    return ['ACCOUNT', 'DATES', 'AMOUNTS', 'STATUS'].every(label => line.includes(label));
}

/**
 * Page-format reports. Each delinquency-grid header marks one account, and only
 * accounts whose timeline shows deterioration are kept.
 */
export class PdfSegmenter implements Segmenter {
    readonly format = 'PDF' as const;

    async extract(filePath: string, options: ParseOptions = {}): Promise<UnifiedReport> {
        const text = await this.loadText(filePath);
        return this.parse(text, options);
    }

    async loadText(filePath: string): Promise<string> {
        const data = await pdfParse(await readFile(filePath));
        console.log(`[PdfSegmenter] Read ${data.numpages} pages (${data.text.length} chars) from ${filePath}`);
        return data.text.replace(/\n\s*\n+/g, '\n\n');
    }

    parse(text: string, options: ParseOptions = {}): UnifiedReport {
        const score = this.extractScore(text) ?? Number.parseInt(firstMatch(text, PATTERNS.score) ?? '', 10);

        return reportBuilder.build({
            format: this.format,
            basicInfo: reportBuilder.extractBasicInfo(text, Number.isNaN(score) ? null : score),
            enquiries: this.extractEnquiries(text),
            accounts: this.extractDeterioratingAccounts(text),
            overdueSummary: this.extractOverdueSummary(text),
            now: options.now,
        });
    }

    extractScore(text: string): number | null {
        for (const pattern of SCORE_PATTERNS) {
            const value = firstMatch(text, pattern);
            if (!value) continue;
            const score = parseInt(value, 10);
            if (score >= MIN_SCORE && score <= MAX_SCORE) return score;
        }
        return null;
    }

    extractDeterioratingAccounts(text: string): SegmentedAccount[] {
        const lines = text.split('\n').map(line => line.trim()).filter(Boolean);
        const accounts: SegmentedAccount[] = [];
        let accountIdx = 1;
        let previousEnd = 0;

        let i = 0;
        while (i < lines.length) {
            if (!PATTERNS.dpdHeader.test(lines[i])) {
                i++;
                continue;
            }
            if (accountIdx > MAX_ACCOUNTS) {
                console.warn(`[PdfSegmenter] Account cap of ${MAX_ACCOUNTS} reached; ignoring remaining grids.`);
                break;
            }

            // Metadata sits on either side of the grid; never reach back into the previous account.
            // Without a boundary line the previous grid's rows run on to this header, so only
            // the lines before that grid's own header are out of reach.
            const metaStart = Math.max(previousEnd, i - META_LINES_BEFORE);
            const metaEnd = Math.min(lines.length, i + META_LINES_AFTER);
            const meta = lines.slice(metaStart, metaEnd).join('\n');

            let j = i + 1;
            while (j < lines.length && !isAccountBoundary(lines[j]) && !PATTERNS.dpdHeader.test(lines[j])) {
                j++;
            }

            const dpdHistory = dpdHistoryEngine.fromPageText(lines.slice(i, j).join(' '));
            const reasoning = deteriorationEngine.reason(dpdHistory);
            if (reasoning) {
                accounts.push({
                    ...this.extractMetadata(meta),
                    index: accountIdx,
                    sourceBlock: null,
                    status: null,
                    dpdHistory,
                    deteriorationReasoning: reasoning,
                });
            }

            accountIdx++;
            previousEnd = j < lines.length && isAccountBoundary(lines[j]) ? j : i + 1;
            i = j;
        }

        console.log(`[PdfSegmenter] ${accounts.length} of ${accountIdx - 1} accounts show deterioration.`);
        return accounts;
    }

    extractMetadata(block: string): Pick<SegmentedAccount,
        'memberName' | 'accountType' | 'dateOpened' | 'dateClosed' | 'dateReported'
        | 'sanctionedAmount' | 'currentBalance' | 'overdueAmount'> {
        return {
            memberName: firstMatch(block, METADATA_FIELDS.memberName),
            accountType: firstMatch(block, METADATA_FIELDS.accountType),
            dateOpened: firstMatch(block, METADATA_FIELDS.dateOpened),
            dateClosed: firstMatch(block, METADATA_FIELDS.dateClosed),
            dateReported: firstMatch(block, METADATA_FIELDS.dateReported),
            sanctionedAmount: cleanAmount(firstMatch(block, METADATA_FIELDS.sanctionedAmount)),
            currentBalance: cleanAmount(firstMatch(block, METADATA_FIELDS.currentBalance)),
            overdueAmount: cleanAmount(firstMatch(block, METADATA_FIELDS.overdueAmount)),
        };
    }

    /**
     * Summary layout: the first OVERDUE figure is the account count and the
     * second is the amount.
     */
    extractOverdueSummary(text: string): OverdueSummary {
        const count = firstMatch(text, PATTERNS.overdueCount);
        const overdueMatches = findAll(text, PATTERNS.overdueAmount);
        const current = findAll(text, PATTERNS.currentAmount)
            .map(value => value.replace(/,/g, ''))
            .find(value => /^\d+$/.test(value));

        return {
            total_overdue_accounts: count === null ? null : parseInt(count, 10),
            total_overdue_amount: overdueMatches.length > 1 ? parseInt(overdueMatches[1].replace(/,/g, ''), 10) : null,
            total_current_amount: current === undefined ? null : parseInt(current, 10),
        };
    }

    /** Only bare dates survive in this format; member, purpose and amount stay null. */
    extractEnquiries(text: string): Enquiry[] {
        const section = firstMatch(text, PATTERNS.enquirySection);
        if (!section) return [];

        const enquiries: Enquiry[] = [];
        for (const raw of findAll(section, PATTERNS.strictDate)) {
            const date = parseDayMonthYear(raw);
            if (!date) continue;
            enquiries.push({
                date: format(date, 'dd-MM-yyyy'),
                parsed_date: format(date, 'yyyy-MM-dd'),
                member: null,
                purpose: null,
                amount: null,
            });
        }
        return reportBuilder.filterLatestMonth(enquiries);
    }

    /**
     * Month-by-month view of the first few grids: status rows and month rows
     * directly under each header, paired by position.
     */
    extractDpdBlocks(text: string): DpdBlockSummary {
        const lines = text.split('\n').map(line => line.trimEnd());
        const blocks: DpdBlock[] = [];

        let i = 0;
        while (i < lines.length) {
            if (!PATTERNS.dpdHeader.test(lines[i]) || blocks.length >= MAX_DPD_BLOCKS) {
                i++;
                continue;
            }

            i++;
            if (i < lines.length && lines[i].toUpperCase().includes('(UP TO')) i++;

            const statusTokens: string[] = [];
            const monthTokens: string[] = [];
            while (i < lines.length) {
                const row = lines[i].trim();
                if (!row) break;
                if (PATTERNS.monthToken.test(row)) {
                    monthTokens.push(...findAll(row, PATTERNS.monthToken));
                } else if (PATTERNS.statusToken.test(row)) {
                    statusTokens.push(...findAll(row, PATTERNS.statusToken));
                } else {
                    break;
                }
                i++;
            }

            const pairs = Math.min(statusTokens.length, monthTokens.length);
            const entries: DpdBlockEntry[] = [];
            for (let k = 0; k < pairs; k++) {
                entries.push({
                    status: statusTokens[k],
                    numeric_status: dpdToNumber(statusTokens[k]),
                    month: monthTokens[k],
                });
            }

            const avg = mean(entries.map(entry => entry.numeric_status));
            blocks.push({
                account_index: blocks.length + 1,
                total_entries: entries.length,
                numeric_status_count: entries.filter(entry => entry.numeric_status > 0).length,
                per_account_dpd_average: avg === null ? null : roundTo1(avg),
                entries,
            });
        }

        const finalAvg = mean(
            blocks.map(block => block.per_account_dpd_average).filter((avg): avg is number => avg !== null),
        );

        return {
            dpd_blocks: blocks,
            final_dpd_average: finalAvg === null ? null : roundTo1(finalAvg),
            accounts_processed: blocks.length,
            max_accounts_limit: MAX_DPD_BLOCKS,
        };
    }
}

export const pdfSegmenter = new PdfSegmenter();
