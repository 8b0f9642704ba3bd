/**
 * Deterioration reasoning and default-month rules.
 *
 * Run: node --import tsx --test src/engines/__tests__/deterioration_engine.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { DpdHistory } from '../../types';
import { deteriorationEngine } from '../deterioration_engine';

/** Year tokens whose first dirty slot is `month` (1-based). */
function dirtyAt(month: number): string[] {
    return [...Array<string>(month - 1).fill('000'), '030'];
}

describe('deteriorationEngine.reason', () => {
    it('flags a year with no clean token as completely dirty', () => {
        assert.equal(
            deteriorationEngine.reason({ '2023': ['015', '032'] }),
            'COMPLETELY_DIRTY: 2 dirty tokens in 2023',
        );
    });

    it('reports the first clean to dirty transition', () => {
        assert.equal(
            deteriorationEngine.reason({ '2023': ['000', '015'] }),
            "CLEAN_TO_DIRTY: '000'→'015' in 2023",
        );
    });

    it('reports a dirty to clean transition', () => {
        assert.equal(
            deteriorationEngine.reason({ '2023': ['090', '000'] }),
            "DIRTY_TO_CLEAN: '090'→'000' in 2023",
        );
    });

    it('visits years oldest first', () => {
        assert.equal(
            deteriorationEngine.reason({ '2024': ['000', '030'], '2021': ['060'] }),
            'COMPLETELY_DIRTY: 1 dirty tokens in 2021',
        );
    });

    it('checks the UNKNOWN bucket after dated years', () => {
        assert.equal(
            deteriorationEngine.reason({ UNKNOWN: ['030'], '2023': ['000'] }),
            'COMPLETELY_DIRTY: 1 dirty tokens in UNKNOWN',
        );
    });

    it('returns an empty string for a clean or empty history', () => {
        assert.equal(deteriorationEngine.reason({ '2023': ['000', 'XXX', 'STD', '-'] }), '');
        assert.equal(deteriorationEngine.reason({}), '');
    });
});

describe('deteriorationEngine.defaultMonthNumber', () => {
    it('uses the first non-clean slot of a single year', () => {
        const history = { '2023': ['000', '000', '015', 'XXX'] };
        assert.equal(deteriorationEngine.defaultMonthForYear(history['2023']), 3);
        assert.equal(deteriorationEngine.defaultMonthNumber(history), 3);
    });

    it('averages across years that have a default month', () => {
        const history = { '2023': ['000', '000', '030'], '2022': ['000', '060'], '2021': ['000'] };
        assert.equal(deteriorationEngine.defaultMonthNumber(history), 2.5);
    });

    it('is null for a clean history', () => {
        assert.equal(deteriorationEngine.defaultMonthNumber({ '2023': ['000'] }), null);
        assert.equal(deteriorationEngine.defaultMonthForYear(undefined), null);
    });
});

describe('deteriorationEngine.finalDefaultMonthAverage', () => {
    const now = new Date(2024, 5, 15);

    it('uses current-year values alone once six accounts supply them', () => {
        const histories: DpdHistory[] = [1, 2, 3, 4, 5, 6].map(month => ({
            '2024': dirtyAt(month),
            '2023': dirtyAt(12),
        }));
        assert.equal(deteriorationEngine.finalDefaultMonthAverage(histories, now), 3.5);
    });

    it('pools current and previous year when only four accounts supply a current value', () => {
        const histories: DpdHistory[] = [
            { '2024': dirtyAt(1), '2023': dirtyAt(12) },
            { '2024': dirtyAt(2), '2023': dirtyAt(12) },
            { '2024': dirtyAt(3), '2023': dirtyAt(12) },
            { '2024': dirtyAt(4), '2023': dirtyAt(10) },
        ];
        // (1 + 2 + 3 + 4 + 12 + 12 + 12 + 10) / 8
        assert.equal(deteriorationEngine.finalDefaultMonthAverage(histories, now), 7);
    });

    it('ignores years older than the previous one', () => {
        assert.equal(deteriorationEngine.finalDefaultMonthAverage([{ '2021': dirtyAt(4) }], now), null);
    });
});

describe('deteriorationEngine.yearlyAverages', () => {
    it('averages dirty tokens only and skips clean years', () => {
        const yearly = deteriorationEngine.yearlyAverages({
            '2023': ['000', '030', '060'],
            '2022': ['000', 'XXX'],
        });
        assert.deepEqual(yearly, [{ year: '2023', average_dpd: 45 }]);
    });

    it('rounds to one decimal', () => {
        assert.deepEqual(deteriorationEngine.yearlyAverages({ '2024': ['010', '020', '025'] }), [
            { year: '2024', average_dpd: 18.3 },
        ]);
    });

    it('averages the yearly values for the account', () => {
        assert.equal(
            deteriorationEngine.accountDpdAverage([
                { year: '2023', average_dpd: 45 },
                { year: '2024', average_dpd: 30 },
            ]),
            37.5,
        );
        assert.equal(deteriorationEngine.accountDpdAverage([]), null);
    });
});
