/**
 * Processing Utils - Central Facade for cleaning and aggregation
 *
 * Implementation details live in the ./processing/ subdirectory.
 */

export { CleaningUtils } from './processing/cleaningUtils';
export { FareAnalyticsUtils } from './processing/fareAnalyticsUtils';
export { StatisticsUtils } from './processing/statistics';
export { DatasetStore, DATASET_FILES } from './processing/datasetStore';

export * from './processing/processingTypes';
