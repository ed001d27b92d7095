import { DayName } from '../acquisition/dateUtils';
import { FlightRecord } from '../acquisition/fareTypes';

export type DepartureSegment = 'Morning' | 'Afternoon' | 'Evening' | 'Unknown';

/**
 * Flight record enriched for analysis
 */
export interface CleanedRecord extends Omit<FlightRecord, 'totalFare'> {
    totalFare: number | null;       // null unless the stored fare is a positive integer
    departureHour: number | null;   // 0-23
    departureSegment: DepartureSegment;
    dayOfWeek: DayName | null;
    isWeekend: boolean;
    isHoliday: boolean;
}

export type EstimatorName = 'rawMean' | 'filteredMean' | 'median' | 'trimmedMean';

export interface DailyStatistic {
    date: string;
    rawMean: number;
    filteredMean: number;
    median: number;
    trimmedMean: number;
    count: number;
    isWeekend: boolean;
    isHoliday: boolean;
}

export interface StabilityVerdict {
    mostStable: EstimatorName;
    stdDev: number;
    stdDevByEstimator: Record<EstimatorName, number>;
}

export interface AirlineSummary {
    airlineName: string;
    meanFare: number;
    count: number;
}

export interface SegmentSummary {
    departureSegment: DepartureSegment;
    meanFare: number;
    count: number;
}

export interface AirlineDateSegmentSummary {
    airlineName: string;
    date: string;
    departureSegment: DepartureSegment;
    meanFare: number;
    count: number;
}

export interface HourSummary {
    departureHour: number;
    meanFare: number;
    count: number;
}

export interface SummaryTables {
    byAirline: AirlineSummary[];
    bySegment: SegmentSummary[];
    daily: DailyStatistic[];
    stability: StabilityVerdict | null;     // null below two dates
    byAirlineDateSegment: AirlineDateSegmentSummary[];
    byHour: HourSummary[];
}

export interface CleaningResult {
    records: CleanedRecord[];
    loadedRows: number;
    outliersRemoved: number;
    missingFareRows: number;
    partitionsRead: number;
    partitionsRejected: number;
}
