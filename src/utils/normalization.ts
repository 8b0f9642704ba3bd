import { format, isValid, parse, startOfDay } from 'date-fns';
import { firstMatch, isCleanToken } from './patterns';

/**
 * Literal date layouts found in bureau reports, in priority order.
 */
const REPORT_DATE_FORMATS = ['dd-MM-yyyy', 'dd/MM/yyyy', 'dd/MM/yyyy, HH:mm', 'dd-MM-yyyy HH:mm:ss'];

/**
 * Layouts accepted for the report timestamp when deciding whether a stored
 * report is superseded. Wider than REPORT_DATE_FORMATS because the value may
 * come from either source format or from an operator.
 */
const TIMESTAMP_FORMATS = ['dd/MM/yyyy, HH:mm', 'dd/MM/yyyy', 'dd-MM-yyyy', 'yyyy-MM-dd', 'yyyy/MM/dd', 'dd.MM.yyyy'];

const EMBEDDED_DATES: { pattern: RegExp; layout: string }[] = [
    { pattern: /(\d{1,2}[/-]\d{1,2}[/-]\d{4})/, layout: 'dd/MM/yyyy' },
    { pattern: /(\d{4}[/-]\d{1,2}[/-]\d{1,2})/, layout: 'yyyy/MM/dd' },
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export const ZERO_AMOUNT = '0';

function tryParse(raw: string, layout: string): Date | null {
    const parsed = parse(raw, layout, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
}

/**
 * Strips the currency glyph, grouping commas and whitespace. Anything left that
 * is not a plain digit string becomes "0".
 */
export function cleanAmount(raw: string | null | undefined): string {
    if (!raw) return ZERO_AMOUNT;
    const cleaned = raw.trim().replace(/[₹,\s]/g, '');
    return /^\d+$/.test(cleaned) ? cleaned : ZERO_AMOUNT;
}

/**
 * Same cleaning as `cleanAmount`, but a rejected value is null rather than
 * zero. Used by document-level summaries where "absent" must stay distinct.
 */
export function amountToInt(raw: string | null | undefined): number | null {
    if (!raw) return null;
    const cleaned = raw.trim().replace(/[₹,\s]/g, '');
    return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : null;
}

/**
 * Normalizes a report date string to YYYY-MM-DD. The first layout that parses
 * the whole string wins.
 */
export function normalizeDate(raw: string | null | undefined): string | null {
    if (!raw || !raw.trim()) return null;
    const value = raw.trim();

    for (const layout of REPORT_DATE_FORMATS) {
        const parsed = tryParse(value, layout);
        if (parsed) return format(parsed, 'yyyy-MM-dd');
    }
    return null;
}

/**
 * Strict day-month-year parse used by the page-text enquiry section.
 */
export function parseDayMonthYear(raw: string): Date | null {
    return tryParse(raw.trim(), 'dd-MM-yyyy');
}

/**
 * Numeric value of a delinquency token; clean sentinels count as zero.
 */
export function dpdToNumber(token: string): number {
    if (isCleanToken(token.trim())) return 0;
    const value = parseInt(token.trim(), 10);
    return Number.isNaN(value) ? 0 : value;
}

export function roundTo1(value: number): number {
    return Math.round(value * 10) / 10;
}

export function mean(values: number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Report timestamp at day precision, as stored alongside a persisted report.
 * Unrecognized or missing input falls back to the start of `now`'s day.
 */
export function normalizeReportTimestamp(raw: string | null | undefined, now: Date = new Date()): { value: string; date: Date } {
    const resolve = (date: Date) => {
        const day = startOfDay(date);
        return { value: format(day, 'yyyy-MM-dd 00:00:00'), date: day };
    };

    const cleaned = (raw ?? '').trim();
    if (!cleaned) return resolve(now);

    for (const layout of TIMESTAMP_FORMATS) {
        const parsed = tryParse(cleaned, layout);
        if (parsed) return resolve(parsed);
    }

    for (const { pattern, layout } of EMBEDDED_DATES) {
        const embedded = firstMatch(cleaned, pattern);
        if (!embedded) continue;
        const parsed = tryParse(embedded.replace(/-/g, '/'), layout);
        if (parsed) return resolve(parsed);
    }

    return resolve(now);
}
