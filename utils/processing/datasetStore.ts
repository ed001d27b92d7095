import * as fs from 'fs';
import * as path from 'path';
import { StorageError } from '../pipelineErrors';
import { CleanedRecord, SummaryTables } from './processingTypes';

export const DATASET_FILES = {
    cleaned: 'all_flights_cleaned.json',
    byAirline: 'summary_by_airline.json',
    bySegment: 'summary_by_segment.json',
    daily: 'daily_statistics.json',
    stability: 'stability.json',
    byAirlineDateSegment: 'summary_by_airline_date_segment.json',
    byHour: 'summary_by_hour.json'
} as const;

/**
 * Processed outputs. Rewritten in full on every processing run.
 */
export class DatasetStore {
    readonly directory: string;

    constructor(directory: string) {
        this.directory = directory;
    }

    /**
     * @returns Paths of all written files
     */
    public save(records: CleanedRecord[], tables: SummaryTables): string[] {
        try {
            fs.mkdirSync(this.directory, { recursive: true });
        } catch (error) {
            throw new StorageError('STORAGE_UNAVAILABLE', this.directory, `Cannot use output directory ${this.directory}`, { cause: error });
        }

        return [
            this.writeJson(DATASET_FILES.cleaned, records),
            this.writeJson(DATASET_FILES.byAirline, tables.byAirline),
            this.writeJson(DATASET_FILES.bySegment, tables.bySegment),
            this.writeJson(DATASET_FILES.daily, tables.daily),
            this.writeJson(DATASET_FILES.stability, tables.stability),
            this.writeJson(DATASET_FILES.byAirlineDateSegment, tables.byAirlineDateSegment),
            this.writeJson(DATASET_FILES.byHour, tables.byHour)
        ];
    }

    public filePath(fileName: string): string {
        return path.join(this.directory, fileName);
    }

    private writeJson(fileName: string, data: unknown): string {
        const target = this.filePath(fileName);
        const tempFile = `${target}.${process.pid}.tmp`;
        try {
            fs.writeFileSync(tempFile, JSON.stringify(data, null, 2), 'utf8');
            fs.renameSync(tempFile, target);
        } catch (error) {
            fs.rmSync(tempFile, { force: true });
            throw new StorageError('STORAGE_UNAVAILABLE', target, `Failed to write ${fileName}`, { cause: error });
        }
        console.log(`  💾 ${target}`);
        return target;
    }
}
