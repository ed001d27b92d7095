/**
 * Pipeline error types
 *
 * Per-date acquisition problems never surface as errors - they become
 * structured outcomes in the run report. The classes below are the
 * conditions that end a phase.
 */

export type PipelineErrorCode =
    | 'CONFIG_INVALID'
    | 'STORAGE_UNAVAILABLE'
    | 'PARTITION_EXISTS'
    | 'DATASET_EMPTY';

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.code = code;
    }
}

export class ConfigError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONFIG_INVALID', message, options);
        this.name = 'ConfigError';
    }
}

/**
 * Output directory cannot be created or written - there is no degraded mode
 */
export class StorageError extends PipelineError {
    readonly path: string;

    constructor(
        code: Extract<PipelineErrorCode, 'STORAGE_UNAVAILABLE' | 'PARTITION_EXISTS'>,
        path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(code, message, options);
        this.name = 'StorageError';
        this.path = path;
    }
}

export class EmptyDatasetError extends PipelineError {
    constructor(message: string) {
        super('DATASET_EMPTY', message);
        this.name = 'EmptyDatasetError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
