export type ReportFormat = 'HTML' | 'PDF';

/**
 * Year label ("2023") or UNKNOWN_YEAR → raw delinquency tokens in report order.
 */
export type DpdHistory = Record<string, string[]>;

export interface BasicInfo {
    name: string | null;
    pan_card: string | null;
    ckyc: string | null;
    report_date: string | null;
    score: number | null;
    mobile_numbers: string[];
    emails: string[];
}

export interface YearlyDpdAverage {
    year: string;
    average_dpd: number;
}

export interface DpdSummary {
    yearly_averages: YearlyDpdAverage[];
    account_dpd_average: number | null;
}

export interface Account {
    account_index: number;
    source_block: number | null;
    member_name: string | null;
    account_type: string | null;
    status: string | null;
    date_opened: string | null;
    date_closed: string | null;
    date_reported: string | null;
    sanctioned_amount: string;
    current_balance: string;
    overdue_amount: string;
    dpd_history: DpdHistory;
    deterioration_reasoning: string;
    default_month_number: number | null;
    dpd_summary: DpdSummary;
}

export interface Enquiry {
    date: string;
    parsed_date: string;
    member: string | null;
    purpose: string | null;
    amount: string | null;
}

export interface OverdueSummary {
    total_overdue_accounts: number | null;
    total_overdue_amount: number | null;
    total_current_amount: number | null;
}

export interface UnifiedReport {
    basic_info: BasicInfo;
    enquiries: {
        list: Enquiry[];
        count: number;
    };
    accounts: {
        list: Account[];
        total: number;
        final_dpd_average: number | null;
        final_default_month_average: number | null;
    };
    overdue_summary: OverdueSummary;
    metadata: {
        format_type: ReportFormat;
        extraction_timestamp: string;
    };
}

/**
 * Per-format account shape produced by a segmenter before the schema builder
 * derives the summary fields.
 */
export interface SegmentedAccount {
    index: number;
    sourceBlock: number | null;
    memberName: string | null;
    accountType: string | null;
    status: string | null;
    dateOpened: string | null;
    dateClosed: string | null;
    dateReported: string | null;
    sanctionedAmount: string;
    currentBalance: string;
    overdueAmount: string;
    dpdHistory: DpdHistory;
    deteriorationReasoning: string;
}

export interface ParseOptions {
    now?: Date;
}

export interface Segmenter {
    readonly format: ReportFormat;
    extract(filePath: string, options?: ParseOptions): Promise<UnifiedReport>;
    parse(text: string, options?: ParseOptions): UnifiedReport;
}
