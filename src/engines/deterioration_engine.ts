import type { DpdHistory, YearlyDpdAverage } from '../types';
import { dpdToNumber, mean, roundTo1 } from '../utils/normalization';
import { isCleanToken } from '../utils/patterns';

/** Dirty codes that mark deterioration on their own. */
const KNOWN_DIRTY_CODES = ['015', '032', '046'];

/** Below this many current-year values the document average also uses last year. */
const CURRENT_YEAR_QUORUM = 5;

export const deteriorationEngine = {
    /**
     * Explains why a delinquency timeline shows decline, or returns "" when it
     * does not. Years are visited oldest first and the first rule to fire wins.
     */
    reason(history: DpdHistory): string {
        for (const year of Object.keys(history).sort()) {
            const tokens = history[year].map(t => t.toUpperCase());
            if (tokens.length === 0) continue;

            if (!tokens.some(isCleanToken)) {
                return `COMPLETELY_DIRTY: ${tokens.length} dirty tokens in ${year}`;
            }

            for (let i = 0; i < tokens.length - 1; i++) {
                const prev = tokens[i];
                const curr = tokens[i + 1];
                if (isCleanToken(prev) !== isCleanToken(curr)) {
                    const direction = isCleanToken(curr) ? 'DIRTY_TO_CLEAN' : 'CLEAN_TO_DIRTY';
                    return `${direction}: '${prev}'→'${curr}' in ${year}`;
                }
            }

            const explicit = KNOWN_DIRTY_CODES.find(code => tokens.includes(code));
            if (explicit) {
                return `EXPLICIT_DIRTY: '${explicit}' in ${year}`;
            }
        }
        return '';
    },

    /** 1-based slot of the first dirty token, null for a clean or empty year. */
    defaultMonthForYear(tokens: string[] | undefined): number | null {
        if (!tokens) return null;
        const idx = tokens.findIndex(token => !isCleanToken(token));
        return idx === -1 ? null : idx + 1;
    },

    /** Mean of the per-year default months. */
    defaultMonthNumber(history: DpdHistory): number | null {
        const yearly = Object.values(history)
            .map(tokens => this.defaultMonthForYear(tokens))
            .filter((month): month is number => month !== null);
        const avg = mean(yearly);
        return avg === null ? null : roundTo1(avg);
    },

    /**
     * Document-level default month. Uses current-year values alone once enough
     * accounts report them; otherwise pools them with the previous year's.
     */
    finalDefaultMonthAverage(histories: DpdHistory[], now: Date = new Date()): number | null {
        const currentYear = String(now.getFullYear());
        const previousYear = String(now.getFullYear() - 1);

        const current: number[] = [];
        const previous: number[] = [];
        for (const history of histories) {
            const cur = this.defaultMonthForYear(history[currentYear]);
            if (cur !== null) current.push(cur);
            const prev = this.defaultMonthForYear(history[previousYear]);
            if (prev !== null) previous.push(prev);
        }

        const pool = current.length >= CURRENT_YEAR_QUORUM ? current : [...current, ...previous];
        const avg = mean(pool);
        return avg === null ? null : roundTo1(avg);
    },

    /** Mean of dirty token values per year. Clean tokens are left out, not counted as zero. */
    yearlyAverages(history: DpdHistory): YearlyDpdAverage[] {
        const averages: YearlyDpdAverage[] = [];
        for (const [year, tokens] of Object.entries(history)) {
            const dirty = tokens.filter(t => !isCleanToken(t)).map(dpdToNumber);
            const avg = mean(dirty);
            if (avg !== null) averages.push({ year, average_dpd: roundTo1(avg) });
        }
        return averages;
    },

    accountDpdAverage(yearly: YearlyDpdAverage[]): number | null {
        const avg = mean(yearly.map(y => y.average_dpd));
        return avg === null ? null : roundTo1(avg);
    },
};
