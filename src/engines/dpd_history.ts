import type { DpdHistory } from '../types';
import { PATTERNS, UNKNOWN_YEAR, extractDpdTokens, findAll } from '../utils/patterns';

/** One report year spans at most twelve monthly slots. */
const MONTHS_PER_YEAR = 12;

export const dpdHistoryEngine = {
    /**
     * Markup grid: a line holding only a 4-digit year, followed by up to twelve
     * non-blank lines carrying that year's tokens.
     */
    fromMarkupBlock(block: string): DpdHistory {
        const history: DpdHistory = {};
        const lines = block.split('\n').map(line => line.trim()).filter(Boolean);

        lines.forEach((line, i) => {
            const yearMatch = PATTERNS.yearLine.exec(line);
            if (!yearMatch) return;

            const tokens: string[] = [];
            for (const next of lines.slice(i + 1, i + 1 + MONTHS_PER_YEAR)) {
                tokens.push(...extractDpdTokens(next));
            }
            if (tokens.length > 0) history[yearMatch[1]] = tokens;
        });

        return history;
    },

    /**
     * Page-text grid: tokens and "MM-YY" stamps are matched as two independent
     * streams and paired by position. Tokens past the last stamp land in
     * UNKNOWN_YEAR.
     */
    fromPageText(dpdBlock: string): DpdHistory {
        const tokens = extractDpdTokens(dpdBlock);
        if (tokens.length === 0) return {};

        const months = findAll(dpdBlock, PATTERNS.monthToken);
        if (months.length !== tokens.length) {
            console.warn(`[DpdHistory] ${tokens.length} tokens vs ${months.length} month stamps; pairing by position.`);
        }

        const history: DpdHistory = {};
        tokens.forEach((token, idx) => {
            const month = months[idx];
            const year = month ? `20${month.split('-')[1]}` : UNKNOWN_YEAR;
            (history[year] ??= []).push(token);
        });
        return history;
    },
};
