import * as cheerio from 'cheerio';
import { type AnyNode, hasChildren, isText } from 'domhandler';
import { readFile } from 'fs/promises';
import type { Enquiry, OverdueSummary, ParseOptions, SegmentedAccount, Segmenter, UnifiedReport } from '../types';
import { amountToInt, cleanAmount, normalizeDate, ZERO_AMOUNT } from '../utils/normalization';
import { PATTERNS, firstMatch } from '../utils/patterns';
import { deteriorationEngine } from './deterioration_engine';
import { dpdHistoryEngine } from './dpd_history';
import { EMPTY_OVERDUE_SUMMARY, reportBuilder } from './report_builder';

const NON_CONTENT_SELECTORS = 'script, style, meta, link, noscript';

/** Fragments shorter than this between delimiters are layout noise, not accounts. */
const MIN_BLOCK_LENGTH = 50;

const ACCOUNT_FIELDS = {
    dateOpened: /DATE OPENED[:\s]*([^\n|]+)/i,
    dateClosed: /DATE CLOSED[:\s]*([^\n|]+)/i,
    dateReported: /DATE REPORTED[^:\n]*[:\s]*([^\n|]+)/i,
    status: /\b(inactive|active|STD|NA|STANDARD)\b/i,
    accountType: /ACCOUNT TYPE\s*:\s*([^\n:]+)/i,
    memberName: /MEMBER NAME\s*:\s*([^\n:]+)/i,
    sanctionedAmount: /SANCTIONED AMOUNT\s*:\s*₹?\s*([^\n:]+)/i,
    currentBalance: /CURRENT BALANCE\s*:\s*₹?\s*([^\n:]+)/i,
};

const ENQUIRY_COLUMN_HEADERS = ['MEMBER NAME', 'ENQUIRY DATE'];

function collectText(nodes: AnyNode[], out: string[]): void {
    for (const node of nodes) {
        if (isText(node)) {
            const text = node.data.trim();
            if (text) out.push(text);
        } else if (hasChildren(node)) {
            collectText(node.children, out);
        }
    }
}

function optionalField(block: string, pattern: RegExp): string | null {
    const value = firstMatch(block, pattern);
    return value && value !== ':' ? value : null;
}

/**
 * Markup-format reports. Accounts are carved out by a disjunctive delimiter
 * and every surviving block is kept, deteriorating or not.
 */
export class HtmlSegmenter implements Segmenter {
    readonly format = 'HTML' as const;

    async extract(filePath: string, options: ParseOptions = {}): Promise<UnifiedReport> {
        const html = await readFile(filePath, 'utf-8');
        return this.parse(html, options);
    }

    parse(html: string, options: ParseOptions = {}): UnifiedReport {
        const text = this.flatten(html);
        const score = Number.parseInt(
            firstMatch(text, PATTERNS.score) ?? firstMatch(text, PATTERNS.fallbackScore) ?? '',
            10,
        );

        return reportBuilder.build({
            format: this.format,
            basicInfo: reportBuilder.extractBasicInfo(text, Number.isNaN(score) ? null : score),
            enquiries: this.extractEnquiries(text),
            accounts: this.extractAccounts(text),
            overdueSummary: this.extractOverdueSummary(text),
            now: options.now,
        });
    }

    /** Document text as trimmed, non-empty text nodes joined by newlines. */
    flatten(html: string): string {
        const $ = cheerio.load(html);
        $(NON_CONTENT_SELECTORS).remove();
        const parts: string[] = [];
        collectText($.root().toArray(), parts);
        return parts.join('\n');
    }

    extractAccounts(text: string): SegmentedAccount[] {
        const section = PATTERNS.accountSection.exec(text);
        if (!section) {
            console.warn('[HtmlSegmenter] No CONSUMER ACCOUNT DETAILS heading; scanning full text.');
        }
        const accountsText = section ? text.slice(section.index) : text;

        const accounts: SegmentedAccount[] = [];
        accountsText.split(PATTERNS.accountDelimiter).forEach((raw, i) => {
            const block = raw.trim();
            if (block.length < MIN_BLOCK_LENGTH) return;

            const dpdHistory = dpdHistoryEngine.fromMarkupBlock(block);
            accounts.push({
                index: accounts.length + 1,
                sourceBlock: i + 1,
                memberName: optionalField(block, ACCOUNT_FIELDS.memberName),
                accountType: optionalField(block, ACCOUNT_FIELDS.accountType),
                status: optionalField(block, ACCOUNT_FIELDS.status),
                dateOpened: optionalField(block, ACCOUNT_FIELDS.dateOpened),
                dateClosed: optionalField(block, ACCOUNT_FIELDS.dateClosed),
                dateReported: optionalField(block, ACCOUNT_FIELDS.dateReported),
                sanctionedAmount: cleanAmount(firstMatch(block, ACCOUNT_FIELDS.sanctionedAmount)),
                currentBalance: cleanAmount(firstMatch(block, ACCOUNT_FIELDS.currentBalance)),
                // Markup reports carry no per-account overdue figure.
                overdueAmount: ZERO_AMOUNT,
                dpdHistory,
                deteriorationReasoning: deteriorationEngine.reason(dpdHistory),
            });
        });

        console.log(`[HtmlSegmenter] Extracted ${accounts.length} accounts.`);
        return accounts;
    }

    /**
     * Rows after the enquiry heading: for each date-bearing line, the line
     * before is the member, the line after is the purpose, and the first digit
     * run in the next two lines is the amount.
     */
    extractEnquiries(text: string): Enquiry[] {
        const heading = PATTERNS.enquiryHeading.exec(text);
        if (!heading) return [];

        let lines = text
            .slice(heading.index + heading[0].length)
            .split('\n')
            .map(line => line.trim())
            .filter(Boolean);

        if (lines.length > 0 && ENQUIRY_COLUMN_HEADERS.some(h => lines[0].toUpperCase().includes(h))) {
            lines = lines.slice(1);
        }

        const enquiries: Enquiry[] = [];
        for (let i = 0; i < lines.length - 2; i++) {
            const raw = firstMatch(lines[i], PATTERNS.enquiryDate);
            if (!raw) continue;
            const parsed = normalizeDate(raw);
            if (!parsed) continue;

            let amount = ZERO_AMOUNT;
            for (const candidate of lines.slice(i + 2, i + 4)) {
                const digits = firstMatch(candidate, PATTERNS.digitRun);
                if (digits) {
                    amount = cleanAmount(digits);
                    break;
                }
            }

            enquiries.push({
                date: raw,
                parsed_date: parsed,
                member: i > 0 ? lines[i - 1] : null,
                purpose: lines[i + 1] ?? null,
                amount,
            });
        }

        return reportBuilder.filterLatestMonth(enquiries);
    }

    extractOverdueSummary(text: string): OverdueSummary {
        if (!text) return { ...EMPTY_OVERDUE_SUMMARY };

        const section = firstMatch(text, PATTERNS.accountSummarySection) ?? text;
        const normalized = section.replace(/\s+/g, ' ').trim();

        const count = firstMatch(normalized, /\bOverdue\s*:\s*(\d+)\b/i);
        const current = firstMatch(normalized, /\bCurrent\s*:\s*₹?\s*([\d,]+)\b/i);
        const overdue = firstMatch(normalized, /\bOverdue\s*:\s*₹\s*([\d,]+)\b/i)
            ?? firstMatch(normalized, /Overdue\s*[:\s]*₹?\s*([\d,]+)/i);

        return {
            total_overdue_accounts: count === null ? null : parseInt(count, 10),
            total_overdue_amount: amountToInt(overdue),
            total_current_amount: amountToInt(current),
        };
    }
}

export const htmlSegmenter = new HtmlSegmenter();
