import {
    AirlineDateSegmentSummary,
    AirlineSummary,
    CleanedRecord,
    DailyStatistic,
    DepartureSegment,
    EstimatorName,
    HourSummary,
    SegmentSummary,
    StabilityVerdict,
    SummaryTables
} from './processingTypes';
import { StatisticsUtils } from './statistics';

const SEGMENT_ORDER: DepartureSegment[] = ['Morning', 'Afternoon', 'Evening', 'Unknown'];
const ESTIMATORS: EstimatorName[] = ['rawMean', 'filteredMean', 'median', 'trimmedMean'];

interface PricedRecord extends CleanedRecord {
    totalFare: number;
}

function isPriced(record: CleanedRecord): record is PricedRecord {
    return record.totalFare !== null;
}

function isBusinessDay(record: CleanedRecord): boolean {
    return !record.isWeekend && !record.isHoliday;
}

function groupBy<K, T>(items: T[], keyOf: (item: T) => K): Map<K, T[]> {
    const groups = new Map<K, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}

const faresOf = (records: PricedRecord[]): number[] => records.map(record => record.totalFare);

/**
 * Denoising / aggregation stage
 *
 * Four per-date estimators (raw mean, business-day filtered mean, median, 10% trimmed mean),
 * their stability ranking, and the grouped summary tables the dashboard reads.
 */
export class FareAnalyticsUtils {
    public static computeDailyStatistics(records: CleanedRecord[]): DailyStatistic[] {
        const priced = records.filter(isPriced);

        // Fallback when a date has no business-day rows of its own
        const businessFares = faresOf(priced.filter(isBusinessDay));
        const pooledBusinessMean = businessFares.length > 0 ? StatisticsUtils.mean(businessFares) : null;

        const byDate = groupBy(priced, record => record.date);
        const dates = [...byDate.keys()].sort();

        return dates.map(date => {
            const dayRecords = byDate.get(date) ?? [];
            const fares = faresOf(dayRecords);
            const rawMean = StatisticsUtils.mean(fares);
            const dayBusinessFares = faresOf(dayRecords.filter(isBusinessDay));

            let filteredMean: number;
            if (dayBusinessFares.length > 0) {
                filteredMean = StatisticsUtils.mean(dayBusinessFares);
            } else if (pooledBusinessMean !== null) {
                filteredMean = pooledBusinessMean;
            } else {
                filteredMean = rawMean;
            }

            return {
                date,
                rawMean,
                filteredMean,
                median: StatisticsUtils.median(fares),
                trimmedMean: StatisticsUtils.trimmedMean(fares, 0.1, 5),
                count: fares.length,
                isWeekend: dayRecords.some(record => record.isWeekend),
                isHoliday: dayRecords.some(record => record.isHoliday)
            };
        });
    }

    /**
     * Estimator whose daily series has the lowest sample standard deviation.
     * Ties keep the earlier estimator in rawMean → filteredMean → median → trimmedMean order.
     */
    public static computeStability(daily: DailyStatistic[]): StabilityVerdict | null {
        if (daily.length < 2) return null;

        const stdDevByEstimator: Record<EstimatorName, number> = { rawMean: 0, filteredMean: 0, median: 0, trimmedMean: 0 };
        for (const estimator of ESTIMATORS) {
            stdDevByEstimator[estimator] = StatisticsUtils.sampleStdDev(daily.map(row => row[estimator])) ?? 0;
        }

        let mostStable: EstimatorName = ESTIMATORS[0];
        for (const estimator of ESTIMATORS) {
            if (stdDevByEstimator[estimator] < stdDevByEstimator[mostStable]) {
                mostStable = estimator;
            }
        }
        return { mostStable, stdDev: stdDevByEstimator[mostStable], stdDevByEstimator };
    }

    public static meanByAirline(records: CleanedRecord[]): AirlineSummary[] {
        const groups = groupBy(records.filter(isPriced), record => record.airlineName);
        return [...groups.entries()]
            .map(([airlineName, group]) => ({ airlineName, meanFare: StatisticsUtils.mean(faresOf(group)), count: group.length }))
            .sort((a, b) => a.airlineName.localeCompare(b.airlineName));
    }

    public static meanBySegment(records: CleanedRecord[]): SegmentSummary[] {
        const groups = groupBy(records.filter(isPriced), record => record.departureSegment);
        return SEGMENT_ORDER
            .filter(segment => groups.has(segment))
            .map(segment => {
                const group = groups.get(segment) ?? [];
                return { departureSegment: segment, meanFare: StatisticsUtils.mean(faresOf(group)), count: group.length };
            });
    }

    public static meanByAirlineDateSegment(records: CleanedRecord[]): AirlineDateSegmentSummary[] {
        const groups = groupBy(records.filter(isPriced), record => `${record.airlineName}|${record.date}|${record.departureSegment}`);
        return [...groups.values()]
            .map(group => ({
                airlineName: group[0].airlineName,
                date: group[0].date,
                departureSegment: group[0].departureSegment,
                meanFare: StatisticsUtils.mean(faresOf(group)),
                count: group.length
            }))
            .sort((a, b) =>
                a.airlineName.localeCompare(b.airlineName)
                || a.date.localeCompare(b.date)
                || SEGMENT_ORDER.indexOf(a.departureSegment) - SEGMENT_ORDER.indexOf(b.departureSegment)
            );
    }

    /**
     * Rows with an unknown departure hour are left out
     */
    public static meanByHour(records: CleanedRecord[]): HourSummary[] {
        const summaries: HourSummary[] = [];
        const groups = groupBy(records.filter(isPriced), record => record.departureHour);
        for (const [departureHour, group] of groups) {
            if (departureHour === null) continue;
            summaries.push({ departureHour, meanFare: StatisticsUtils.mean(faresOf(group)), count: group.length });
        }
        return summaries.sort((a, b) => a.departureHour - b.departureHour);
    }

    public static buildSummaryTables(records: CleanedRecord[]): SummaryTables {
        const daily = this.computeDailyStatistics(records);
        return {
            byAirline: this.meanByAirline(records),
            bySegment: this.meanBySegment(records),
            daily,
            stability: this.computeStability(daily),
            byAirlineDateSegment: this.meanByAirlineDateSegment(records),
            byHour: this.meanByHour(records)
        };
    }

    /**
     * Printable summary of the summary tables
     */
    public static generateReport(tables: SummaryTables): string {
        const money = (value: number): string => `₹${Math.round(value).toLocaleString('en-IN')}`;
        const lines: string[] = [
            '',
            '='.repeat(60),
            '📈 FARE ANALYSIS REPORT',
            '='.repeat(60),
            '',
            '✈️  Mean fare by airline:'
        ];

        for (const row of tables.byAirline) {
            lines.push(`   ${row.airlineName.padEnd(20)} ${money(row.meanFare).padStart(10)}  (${row.count} flights)`);
        }

        lines.push('', '🕐 Mean fare by time of day:');
        for (const row of tables.bySegment) {
            lines.push(`   ${row.departureSegment.padEnd(20)} ${money(row.meanFare).padStart(10)}  (${row.count} flights)`);
        }

        lines.push('', '📅 Daily estimators (raw / filtered / median / trimmed):');
        for (const row of tables.daily) {
            const flags = [row.isWeekend ? 'weekend' : '', row.isHoliday ? 'holiday' : ''].filter(Boolean).join(', ');
            lines.push(
                `   ${row.date}  ${money(row.rawMean)} / ${money(row.filteredMean)} / ${money(row.median)} / ${money(row.trimmedMean)}`
                + `  n=${row.count}${flags ? `  [${flags}]` : ''}`
            );
        }

        lines.push('');
        if (tables.stability) {
            lines.push(`🏆 Most stable estimator: ${tables.stability.mostStable} (std dev ${StatisticsUtils.round(tables.stability.stdDev)})`);
        } else {
            lines.push('🏆 Most stable estimator: n/a (needs at least 2 dates)');
        }
        lines.push('='.repeat(60));

        return lines.join('\n');
    }
}
