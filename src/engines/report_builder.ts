import type {
    Account,
    BasicInfo,
    Enquiry,
    OverdueSummary,
    ReportFormat,
    SegmentedAccount,
    UnifiedReport,
} from '../types';
import { mean, roundTo1 } from '../utils/normalization';
import { PATTERNS, findAll, firstMatch } from '../utils/patterns';
import { deteriorationEngine } from './deterioration_engine';

export const EMPTY_OVERDUE_SUMMARY: OverdueSummary = Object.freeze({
    total_overdue_accounts: null,
    total_overdue_amount: null,
    total_current_amount: null,
});

export interface ReportParts {
    format: ReportFormat;
    basicInfo: BasicInfo;
    enquiries: Enquiry[];
    accounts: SegmentedAccount[];
    overdueSummary: OverdueSummary;
    now?: Date;
}

export const reportBuilder = {
    /**
     * Identity fields shared by both formats. The score is resolved by the
     * caller because each layout places it differently.
     */
    extractBasicInfo(text: string, score: number | null): BasicInfo {
        const mobiles = findAll(text, PATTERNS.mobile);
        const emails = findAll(text, PATTERNS.email).map(email => email.toLowerCase());

        return {
            name: firstMatch(text, PATTERNS.name),
            pan_card: firstMatch(text, PATTERNS.panCard),
            ckyc: firstMatch(text, PATTERNS.ckyc),
            report_date: firstMatch(text, PATTERNS.reportDate),
            score,
            mobile_numbers: [...new Set(mobiles)],
            emails: [...new Set(emails)],
        };
    },

    /**
     * Keeps only the enquiries of the latest calendar month present. Entries
     * keep their input order within that month.
     */
    filterLatestMonth(enquiries: Enquiry[]): Enquiry[] {
        const byMonth = new Map<string, Enquiry[]>();
        for (const enquiry of enquiries) {
            if (!enquiry.parsed_date) continue;
            const key = enquiry.parsed_date.slice(0, 7);
            const bucket = byMonth.get(key) ?? [];
            bucket.push(enquiry);
            byMonth.set(key, bucket);
        }
        if (byMonth.size === 0) return [];

        const latest = [...byMonth.keys()].sort().pop();
        return latest ? byMonth.get(latest) ?? [] : [];
    },

    toAccount(segmented: SegmentedAccount): Account {
        const yearly = deteriorationEngine.yearlyAverages(segmented.dpdHistory);
        return {
            account_index: segmented.index,
            source_block: segmented.sourceBlock,
            member_name: segmented.memberName,
            account_type: segmented.accountType,
            status: segmented.status,
            date_opened: segmented.dateOpened,
            date_closed: segmented.dateClosed,
            date_reported: segmented.dateReported,
            sanctioned_amount: segmented.sanctionedAmount,
            current_balance: segmented.currentBalance,
            overdue_amount: segmented.overdueAmount,
            dpd_history: segmented.dpdHistory,
            deterioration_reasoning: segmented.deteriorationReasoning,
            default_month_number: deteriorationEngine.defaultMonthNumber(segmented.dpdHistory),
            dpd_summary: {
                yearly_averages: yearly,
                account_dpd_average: deteriorationEngine.accountDpdAverage(yearly),
            },
        };
    },

    build(parts: ReportParts): UnifiedReport {
        const now = parts.now ?? new Date();
        const accounts = parts.accounts.map(account => this.toAccount(account));

        const accountAverages = accounts
            .map(account => account.dpd_summary.account_dpd_average)
            .filter((avg): avg is number => avg !== null);
        const finalDpdAverage = mean(accountAverages);

        return {
            basic_info: parts.basicInfo,
            enquiries: {
                list: parts.enquiries,
                count: parts.enquiries.length,
            },
            accounts: {
                list: accounts,
                total: accounts.length,
                final_dpd_average: finalDpdAverage === null ? null : roundTo1(finalDpdAverage),
                final_default_month_average: deteriorationEngine.finalDefaultMonthAverage(
                    accounts.map(account => account.dpd_history),
                    now,
                ),
            },
            overdue_summary: { ...parts.overdueSummary },
            metadata: {
                format_type: parts.format,
                extraction_timestamp: now.toISOString(),
            },
        };
    },
};
