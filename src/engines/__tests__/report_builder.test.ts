import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { Enquiry, SegmentedAccount } from '../../types';
import { EMPTY_OVERDUE_SUMMARY, reportBuilder } from '../report_builder';

function enquiry(parsedDate: string, member: string): Enquiry {
    return { date: parsedDate, parsed_date: parsedDate, member, purpose: null, amount: null };
}

function segmented(index: number, dpdHistory: SegmentedAccount['dpdHistory']): SegmentedAccount {
    return {
        index,
        sourceBlock: null,
        memberName: `LENDER ${index}`,
        accountType: null,
        status: null,
        dateOpened: null,
        dateClosed: null,
        dateReported: null,
        sanctionedAmount: '0',
        currentBalance: '0',
        overdueAmount: '0',
        dpdHistory,
        deteriorationReasoning: '',
    };
}

describe('reportBuilder.extractBasicInfo', () => {
    it('reads identity fields and deduplicates contacts in order', () => {
        const text = [
            'CONSUMER NAME: PRIYA NAIR',
            'PAN: XYZAB6789K',
            'CKYC: 987654321098',
            'MOBILE: 9123456780',
            'ALT MOBILE: 9123456780, 8012345678',
            'EMAIL: Priya.N@Example.COM, priya.n@example.com',
            'REPORT DATE & TIME: 05/04/2024',
        ].join('\n');

        assert.deepEqual(reportBuilder.extractBasicInfo(text, 755), {
            name: 'PRIYA NAIR',
            pan_card: 'XYZAB6789K',
            ckyc: '987654321098',
            report_date: '05/04/2024',
            score: 755,
            mobile_numbers: ['9123456780', '8012345678'],
            emails: ['priya.n@example.com'],
        });
    });

    it('leaves missing fields null or empty', () => {
        assert.deepEqual(reportBuilder.extractBasicInfo('nothing useful', null), {
            name: null,
            pan_card: null,
            ckyc: null,
            report_date: null,
            score: null,
            mobile_numbers: [],
            emails: [],
        });
    });
});

describe('reportBuilder.filterLatestMonth', () => {
    it('keeps only the latest month, in input order', () => {
        const latest = reportBuilder.filterLatestMonth([
            enquiry('2024-01-20', 'A'),
            enquiry('2024-03-02', 'B'),
            enquiry('2024-02-11', 'C'),
            enquiry('2024-03-28', 'D'),
            enquiry('2023-12-31', 'E'),
        ]);
        assert.deepEqual(latest.map(e => e.member), ['B', 'D']);
    });

    it('compares months across years', () => {
        const latest = reportBuilder.filterLatestMonth([enquiry('2023-12-05', 'A'), enquiry('2024-01-02', 'B')]);
        assert.deepEqual(latest.map(e => e.member), ['B']);
    });

    it('returns nothing for an empty list', () => {
        assert.deepEqual(reportBuilder.filterLatestMonth([]), []);
    });
});

describe('reportBuilder.build', () => {
    const now = new Date(2024, 1, 1, 9, 30);

    it('derives account summaries and document averages', () => {
        const report = reportBuilder.build({
            format: 'PDF',
            basicInfo: reportBuilder.extractBasicInfo('', null),
            enquiries: [enquiry('2024-01-10', 'A')],
            accounts: [segmented(1, { '2023': ['000', '030', '060'] }), segmented(2, {})],
            overdueSummary: { total_overdue_accounts: 1, total_overdue_amount: 3500, total_current_amount: null },
            now,
        });

        assert.equal(report.accounts.total, 2);
        assert.equal(report.enquiries.count, 1);
        // Accounts without any dirty token do not drag the average down.
        assert.equal(report.accounts.final_dpd_average, 45);
        assert.equal(report.accounts.final_default_month_average, 2);
        assert.deepEqual(report.overdue_summary, {
            total_overdue_accounts: 1,
            total_overdue_amount: 3500,
            total_current_amount: null,
        });
        assert.deepEqual(report.metadata, { format_type: 'PDF', extraction_timestamp: now.toISOString() });

        const [first, second] = report.accounts.list;
        assert.equal(first.account_index, 1);
        assert.equal(first.member_name, 'LENDER 1');
        assert.equal(first.default_month_number, 2);
        assert.deepEqual(first.dpd_summary, {
            yearly_averages: [{ year: '2023', average_dpd: 45 }],
            account_dpd_average: 45,
        });
        assert.equal(second.default_month_number, null);
        assert.deepEqual(second.dpd_summary, { yearly_averages: [], account_dpd_average: null });
    });

    it('reports null averages when there are no accounts', () => {
        const report = reportBuilder.build({
            format: 'HTML',
            basicInfo: reportBuilder.extractBasicInfo('', null),
            enquiries: [],
            accounts: [],
            overdueSummary: EMPTY_OVERDUE_SUMMARY,
            now,
        });

        assert.equal(report.accounts.final_dpd_average, null);
        assert.equal(report.accounts.final_default_month_average, null);
        assert.notEqual(report.overdue_summary, EMPTY_OVERDUE_SUMMARY);
        assert.deepEqual(report.overdue_summary, EMPTY_OVERDUE_SUMMARY);
    });
});
