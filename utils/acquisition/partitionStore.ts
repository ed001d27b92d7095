import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StorageError } from '../pipelineErrors';
import { DateUtils } from './dateUtils';
import { DatePartition, LoadedPartition, RawFlightRow, RouteConfig } from './fareTypes';

const PARTITION_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.json$/;

const routeSchema: z.ZodType<RouteConfig> = z.object({
    sourceCity: z.string(),
    destinationCity: z.string(),
    sourceAirport: z.string(),
    destinationAirport: z.string()
});

// Fares are read loosely here; the cleaning stage decides what counts as numeric
const rawRowSchema: z.ZodType<RawFlightRow> = z.object({
    flightNumber: z.string(),
    airlineName: z.string(),
    sourceCity: z.string(),
    destinationCity: z.string(),
    sourceAirport: z.string(),
    destinationAirport: z.string(),
    date: z.string(),
    departureTime: z.string(),
    arrivalTime: z.string(),
    layover: z.string(),
    totalFare: z.union([z.number(), z.string(), z.null()]),
    baseFare: z.number().nullable(),
    tax: z.number().nullable()
});

const partitionSchema: z.ZodType<LoadedPartition> = z.object({
    date: z.string().refine(value => DateUtils.isIsoDate(value), 'not an ISO calendar date'),
    route: routeSchema,
    scrapedAt: z.string(),
    records: z.array(rawRowSchema)
});

export interface RejectedPartition {
    file: string;
    reason: string;
}

export interface PartitionScan {
    partitions: LoadedPartition[];
    rejected: RejectedPartition[];
}

/**
 * One JSON file per search date: <rawDir>/<YYYY-MM-DD>.json
 *
 * A file is written exactly once, through a temp file + rename, so readers never
 * see a half-written partition and an existing partition is never replaced.
 */
export class PartitionStore {
    readonly directory: string;

    constructor(directory: string) {
        this.directory = directory;
    }

    /**
     * Creates the output directory. Failure here is fatal for the run.
     */
    public ensureDirectory(): void {
        try {
            fs.mkdirSync(this.directory, { recursive: true });
            fs.accessSync(this.directory, fs.constants.W_OK);
        } catch (error) {
            throw new StorageError('STORAGE_UNAVAILABLE', this.directory, `Cannot use output directory ${this.directory}`, { cause: error });
        }
    }

    public partitionPath(date: string): string {
        return path.join(this.directory, `${date}.json`);
    }

    public exists(date: string): boolean {
        return fs.existsSync(this.partitionPath(date));
    }

    /**
     * @returns Path of the written file
     */
    public write(partition: DatePartition): string {
        const target = this.partitionPath(partition.date);
        if (fs.existsSync(target)) {
            throw new StorageError('PARTITION_EXISTS', target, `Partition for ${partition.date} already exists - refusing to overwrite`);
        }

        const tempFile = path.join(this.directory, `.${partition.date}.${process.pid}.tmp`);
        try {
            fs.writeFileSync(tempFile, JSON.stringify(partition, null, 2), { encoding: 'utf8', flag: 'wx' });
            fs.renameSync(tempFile, target);
        } catch (error) {
            fs.rmSync(tempFile, { force: true });
            throw new StorageError('STORAGE_UNAVAILABLE', target, `Failed to write partition for ${partition.date}`, { cause: error });
        }
        return target;
    }

    /**
     * Dates that have a partition file, ascending
     */
    public listDates(): string[] {
        if (!fs.existsSync(this.directory)) return [];
        return fs.readdirSync(this.directory)
            .map(file => file.match(PARTITION_FILE_PATTERN))
            .filter((match): match is RegExpMatchArray => match !== null)
            .map(match => match[1])
            .sort();
    }

    /**
     * Reads every partition. Any subset of dates may be missing; unreadable or
     * malformed files are reported in `rejected` and left out.
     */
    public readAll(): PartitionScan {
        const partitions: LoadedPartition[] = [];
        const rejected: RejectedPartition[] = [];

        for (const date of this.listDates()) {
            const file = this.partitionPath(date);
            try {
                const parsed = partitionSchema.safeParse(JSON.parse(fs.readFileSync(file, 'utf8')));
                if (!parsed.success) {
                    rejected.push({ file, reason: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') });
                    continue;
                }
                if (parsed.data.date !== date) {
                    rejected.push({ file, reason: `file name date ${date} does not match content date ${parsed.data.date}` });
                    continue;
                }
                partitions.push(parsed.data);
            } catch (error) {
                rejected.push({ file, reason: error instanceof Error ? error.message : String(error) });
            }
        }

        return { partitions, rejected };
    }
}
