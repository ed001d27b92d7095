import { DateUtils } from '../acquisition/dateUtils';
import { LoadedPartition, RawFlightRow } from '../acquisition/fareTypes';
import { PartitionStore } from '../acquisition/partitionStore';
import { HolidayLookup } from '../02_holidays.utils';
import { EmptyDatasetError } from '../pipelineErrors';
import { CleanedRecord, CleaningResult, DepartureSegment } from './processingTypes';
import { StatisticsUtils } from './statistics';

const DEPARTURE_TIME_PATTERN = /^(\d{1,2}):(\d{2})\s*([AaPp][Mm])$/;
const FARE_DIGITS_PATTERN = /^\d+$/;

/**
 * Cleaning stage: partitions → one typed, enriched, outlier-free dataset
 */
export class CleaningUtils {
    /**
     * 12-hour clock "h:mm AM/PM" → hour of day (0-23), null when unparsable
     */
    public static parseDepartureHour(departureTime: string): number | null {
        const match = departureTime.trim().match(DEPARTURE_TIME_PATTERN);
        if (!match) return null;

        const hour = parseInt(match[1]);
        const minute = parseInt(match[2]);
        if (hour < 1 || hour > 12 || minute > 59) return null;

        const isPm = match[3].toUpperCase() === 'PM';
        if (hour === 12) return isPm ? 12 : 0;
        return isPm ? hour + 12 : hour;
    }

    public static bucketHour(hour: number | null): DepartureSegment {
        if (hour === null) return 'Unknown';
        if (hour < 11) return 'Morning';
        if (hour < 17) return 'Afternoon';
        return 'Evening';
    }

    /**
     * Positive integer fare or null. Strings must be plain digits ("4523"); formatted text is not guessed at.
     */
    public static coerceFare(value: number | string | null): number | null {
        if (value === null) return null;

        let fare: number;
        if (typeof value === 'number') {
            fare = value;
        } else {
            const trimmed = value.trim();
            if (!FARE_DIGITS_PATTERN.test(trimmed)) return null;
            fare = parseInt(trimmed, 10);
        }
        return Number.isSafeInteger(fare) && fare > 0 ? fare : null;
    }

    public static cleanRow(row: RawFlightRow, isHoliday: HolidayLookup): CleanedRecord {
        const departureHour = this.parseDepartureHour(row.departureTime);
        return {
            ...row,
            totalFare: this.coerceFare(row.totalFare),
            departureHour,
            departureSegment: this.bucketHour(departureHour),
            dayOfWeek: DateUtils.dayName(row.date),
            isWeekend: DateUtils.isWeekend(row.date),
            isHoliday: isHoliday(row.date)
        };
    }

    public static cleanRecords(partitions: LoadedPartition[], isHoliday: HolidayLookup): CleanedRecord[] {
        return partitions.flatMap(partition => partition.records.map(row => this.cleanRow(row, isHoliday)));
    }

    /**
     * Per airline, keeps rows whose fare lies within the 1.5·IQR fences.
     * Rows without a numeric fare never pass.
     */
    public static removeOutliersByAirline(records: CleanedRecord[]): CleanedRecord[] {
        const faresByAirline = new Map<string, number[]>();
        for (const record of records) {
            if (record.totalFare === null) continue;
            const fares = faresByAirline.get(record.airlineName) ?? [];
            fares.push(record.totalFare);
            faresByAirline.set(record.airlineName, fares);
        }

        const bounds = new Map<string, { lower: number; upper: number }>();
        for (const [airline, fares] of faresByAirline) {
            bounds.set(airline, StatisticsUtils.iqrBounds(fares));
        }

        return records.filter(record => {
            const fence = bounds.get(record.airlineName);
            if (record.totalFare === null || !fence) return false;
            return record.totalFare >= fence.lower && record.totalFare <= fence.upper;
        });
    }

    /**
     * Loads every partition in the store and cleans them
     * @throws EmptyDatasetError when nothing usable is left
     */
    public static run(store: PartitionStore, isHoliday: HolidayLookup): CleaningResult {
        console.log(`🧹 Loading partitions from ${store.directory}...`);
        const scan = store.readAll();

        for (const rejected of scan.rejected) {
            console.error(`  ⚠️ Skipping invalid partition ${rejected.file}: ${rejected.reason}`);
        }
        if (scan.partitions.length === 0) {
            throw new EmptyDatasetError(`No readable partitions in ${store.directory}`);
        }
        console.log(`  📂 ${scan.partitions.length} partitions (${scan.partitions[0].date} → ${scan.partitions[scan.partitions.length - 1].date})`);

        const cleaned = this.cleanRecords(scan.partitions, isHoliday);
        const missingFareRows = cleaned.filter(record => record.totalFare === null).length;
        const kept = this.removeOutliersByAirline(cleaned);
        const outliersRemoved = cleaned.length - missingFareRows - kept.length;

        console.log(`  📊 ${cleaned.length} rows loaded, ${missingFareRows} without a valid fare, ${outliersRemoved} outliers removed`);
        if (kept.length === 0) {
            throw new EmptyDatasetError('No flights left after cleaning');
        }
        console.log(`  ✅ ${kept.length} clean rows`);

        return {
            records: kept,
            loadedRows: cleaned.length,
            outliersRemoved,
            missingFareRows,
            partitionsRead: scan.partitions.length,
            partitionsRejected: scan.rejected.length
        };
    }
}
