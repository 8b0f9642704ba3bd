/**
 * Shared extraction rules for bureau reports.
 *
 * Every pattern is compiled once at module load and the registry is frozen.
 * Patterns are stored without the `g` flag; use `findAll` to enumerate matches.
 */

/** Clean-state delinquency sentinels. Anything else that matches DPD_TOKEN is dirty. */
export const CLEAN_DPD_TOKENS: ReadonlySet<string> = new Set(['000', 'XXX', 'STD', '-']);

/** Year bucket for page-text tokens that outnumber their month stamps. */
export const UNKNOWN_YEAR = 'UNKNOWN';

// Tokens only count when delimited by whitespace or a line edge, so date parts,
// "MM-YY" stamps and grouped amounts ("1,00,000") never leak into a grid.
const TOKEN_EDGE_BEFORE = '(?<![\\w.,/-])';
const TOKEN_EDGE_AFTER = '(?![\\w.,/-])';

export const DPD_TOKEN = new RegExp(`${TOKEN_EDGE_BEFORE}(?:000|XXX|STD|-|\\d{3})${TOKEN_EDGE_AFTER}`, 'i');

export const PATTERNS = Object.freeze({
    name: /CONSUMER(?: NAME)?\s*:\s*([A-Z][A-Z\s.]+?)(?=\s+DATE\s*:|\n|$)/i,
    panCard: /(?:PAN[:\s]+|INCOME TAX ID NUMBER \(PAN\)\s*)([A-Z]{5}\d{4}[A-Z])/i,
    ckyc: /CKYC[:\s]*(\d{12,15})/i,
    score: /CREDITVISION[®\s]*SCORE[:\s]*(-?\d{1,3})|SCORE[:\s]*(-?\d{1,3})/i,
    fallbackScore: /(?:CREDIT|SCORE)[\s\S]*?(\d{3})\b/i,
    reportDate: /DATE[:\s]*(\d{2}-\d{2}-\d{4})|REPORT\s+DATE\s*&?\s*TIME\s*:\s*(\d{2}\/\d{2}\/\d{4})|(\d{2}\/\d{2}\/\d{4},\s*\d{2}:\d{2})/i,
    mobile: /\b([789]\d{9})\b/,
    email: /[\w.%+-]+@[\w.-]+\.[a-zA-Z]{2,}/,

    overdueCount: /OVERDUE[:\s]*(\d+)/i,
    overdueAmount: /OVERDUE[:\s]*([\d,]+)/i,
    currentAmount: /CURRENT[:\s]*([\d,]+)/i,

    dpdHeader: /DAYS\s+PAST\s+DUE\/ASSET\s+CLASSIFICATION/i,
    dpdToken: DPD_TOKEN,
    statusToken: new RegExp(`${TOKEN_EDGE_BEFORE}(STD|XXX|\\d{3})${TOKEN_EDGE_AFTER}`),
    monthToken: /(?<![\d-])(\d{2}-\d{2})(?![\d-])/,
    yearLine: /^\s*(\d{4})\s*$/,

    enquirySection: /ENQUIRIES:\s*([\s\S]*)$/i,
    enquiryHeading: /CONSUMER ENQUIRY DETAILS\s*Enquiries/i,
    enquiryDate: /(\d{1,2}[/-]\d{1,2}[/-]\d{4})/,
    strictDate: /\b(\d{2}-\d{2}-\d{4})\b/,
    digitRun: /[\d,]+/,

    accountSection: /CONSUMER ACCOUNT DETAILS/i,
    accountSummarySection: /CONSUMER\s+ACCOUNT\s+SUMMARY([\s\S]*?)(?:CONSUMER\s+ACCOUNT\s+DETAILS|CONSUMER\s+ENQUIRY\s+DETAILS|CONSUMER\s+DETAILS|$)/i,
    // Labeled dates ("DATE OPENED: 01-01-2020") stay inside their block.
    accountDelimiter: /(?<!:\s*)(?=\b\d{2}-\d{2}-\d{4})|(?=MEMBER NAME|ACCOUNT TYPE|DATE OPENED)/i,
});

export type PatternName = keyof typeof PATTERNS;

/**
 * First non-empty capture group of the first match, trimmed. Lets a single
 * pattern encode several layout variants as alternatives.
 */
export function firstMatch(text: string, pattern: RegExp): string | null {
    const match = pattern.exec(text);
    if (!match) return null;
    if (match.length === 1) return match[0].trim();
    for (let i = 1; i < match.length; i++) {
        const group = match[i];
        if (group) return group.trim();
    }
    return null;
}

/**
 * Every match of `pattern` in `text`, reduced to its first non-empty group
 * (or the whole match for group-less patterns).
 */
export function findAll(text: string, pattern: RegExp): string[] {
    const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
    const values: string[] = [];
    for (const match of text.matchAll(global)) {
        const group = match.slice(1).find((g): g is string => Boolean(g));
        values.push(group ?? match[0]);
    }
    return values;
}

export function isCleanToken(token: string): boolean {
    return CLEAN_DPD_TOKENS.has(token.toUpperCase());
}

export function extractDpdTokens(text: string): string[] {
    return findAll(text, DPD_TOKEN).map(token => token.toUpperCase());
}
