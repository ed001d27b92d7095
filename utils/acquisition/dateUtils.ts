/**
 * Calendar date helpers
 * Search dates are plain ISO calendar dates (YYYY-MM-DD) with no time zone attached.
 */

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

export type DayName = typeof DAY_NAMES[number];

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export class DateUtils {
    /**
     * Local calendar date of a Date as YYYY-MM-DD
     */
    public static toIsoDate(date: Date): string {
        const year = date.getFullYear();
        const month = String(date.getMonth() + 1).padStart(2, '0');
        const day = String(date.getDate()).padStart(2, '0');
        return `${year}-${month}-${day}`;
    }

    /**
     * Ordered search dates: reference + startOffset, ..., reference + startOffset + dayCount - 1
     * @param reference - "Today" for the run
     * @param startOffset - 1 means tomorrow is the first date
     * @param dayCount - Number of consecutive dates
     */
    public static getTargetDates(reference: Date, startOffset: number, dayCount: number): string[] {
        const dates: string[] = [];
        for (let i = 0; i < dayCount; i++) {
            const target = new Date(reference.getFullYear(), reference.getMonth(), reference.getDate() + startOffset + i);
            dates.push(this.toIsoDate(target));
        }
        return dates;
    }

    /**
     * Parses YYYY-MM-DD into a UTC midnight Date, or null when the text is not a real calendar date
     */
    public static parseIsoDate(isoDate: string): Date | null {
        const match = isoDate.match(ISO_DATE_PATTERN);
        if (!match) return null;

        const year = parseInt(match[1]);
        const month = parseInt(match[2]);
        const day = parseInt(match[3]);
        const parsed = new Date(Date.UTC(year, month - 1, day));

        // Rejects roll-overs such as 2026-02-30
        if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
            return null;
        }
        return parsed;
    }

    public static isIsoDate(value: string): boolean {
        return this.parseIsoDate(value) !== null;
    }

    /**
     * Search-form date format expected by the listing site (dd/mm/yyyy)
     */
    public static formatForSearch(isoDate: string): string {
        const parsed = this.parseIsoDate(isoDate);
        if (!parsed) {
            throw new RangeError(`Not an ISO calendar date: "${isoDate}"`);
        }
        const day = String(parsed.getUTCDate()).padStart(2, '0');
        const month = String(parsed.getUTCMonth() + 1).padStart(2, '0');
        return `${day}/${month}/${parsed.getUTCFullYear()}`;
    }

    public static dayName(isoDate: string): DayName | null {
        const parsed = this.parseIsoDate(isoDate);
        return parsed ? DAY_NAMES[parsed.getUTCDay()] : null;
    }

    public static isWeekend(isoDate: string): boolean {
        const day = this.dayName(isoDate);
        return day === 'Saturday' || day === 'Sunday';
    }
}
