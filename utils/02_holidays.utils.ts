import * as fs from 'fs';
import { z } from 'zod';
import { DateUtils } from './acquisition/dateUtils';

export interface HolidayEntry {
    date: string;       // YYYY-MM-DD
    name: string;
}

/**
 * Date → "is a public holiday"
 */
export type HolidayLookup = (isoDate: string) => boolean;

const holidayFileSchema = z.object({
    region: z.string(),
    description: z.string().optional(),
    holidays: z.array(z.object({
        date: z.string().refine(value => DateUtils.isIsoDate(value), 'not an ISO calendar date'),
        name: z.string().min(1)
    }))
});

/**
 * Regional public-holiday calendar backed by a fixed table (data/holidays-in.json)
 */
export class HolidayCalendar {
    readonly region: string;
    private readonly byDate: Map<string, HolidayEntry>;

    constructor(region: string, entries: HolidayEntry[]) {
        this.region = region;
        this.byDate = new Map(entries.map(entry => [entry.date, entry]));
    }

    /**
     * @throws Error when the file is missing or does not match the expected shape
     */
    public static fromFile(filePath: string): HolidayCalendar {
        const parsed = holidayFileSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf8')));
        if (!parsed.success) {
            throw new Error(`Invalid holiday table ${filePath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
        }
        console.log(`📅 Loaded ${parsed.data.holidays.length} ${parsed.data.region} holidays from ${filePath}`);
        return new HolidayCalendar(parsed.data.region, parsed.data.holidays);
    }

    public isHoliday(isoDate: string): boolean {
        return this.byDate.has(isoDate);
    }

    public getHoliday(isoDate: string): HolidayEntry | undefined {
        return this.byDate.get(isoDate);
    }

    public toLookup(): HolidayLookup {
        return isoDate => this.isHoliday(isoDate);
    }
}
