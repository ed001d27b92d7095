import { test, expect } from '@playwright/test';
import { DateUtils } from '../../utils/acquisition/dateUtils';

test.describe('DateUtils', () => {
    test('target dates roll across month ends', () => {
        expect(DateUtils.getTargetDates(new Date(2026, 0, 30, 23, 15), 1, 3)).toEqual(['2026-01-31', '2026-02-01', '2026-02-02']);
    });

    test('start offset 0 begins today', () => {
        expect(DateUtils.getTargetDates(new Date(2026, 9, 18), 0, 2)).toEqual(['2026-10-18', '2026-10-19']);
    });

    test('formats search dates as dd/mm/yyyy', () => {
        expect(DateUtils.formatForSearch('2026-11-05')).toBe('05/11/2026');
        expect(() => DateUtils.formatForSearch('05-11-2026')).toThrow(RangeError);
    });

    test('rejects calendar roll-overs', () => {
        expect(DateUtils.parseIsoDate('2026-02-30')).toBeNull();
        expect(DateUtils.isIsoDate('2028-02-29')).toBe(true);
        expect(DateUtils.isIsoDate('2026-13-01')).toBe(false);
    });

    test('day name and weekend flag', () => {
        expect(DateUtils.dayName('2026-11-04')).toBe('Wednesday');
        expect(DateUtils.dayName('2026-11-07')).toBe('Saturday');
        expect(DateUtils.isWeekend('2026-11-07')).toBe(true);
        expect(DateUtils.isWeekend('2026-10-18')).toBe(true);
        expect(DateUtils.isWeekend('2026-11-02')).toBe(false);
        expect(DateUtils.dayName('not a date')).toBeNull();
    });
});
