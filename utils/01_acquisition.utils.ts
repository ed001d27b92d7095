/**
 * Acquisition Utils - Central Facade for the scraping phase
 *
 * Implementation details live in the ./acquisition/ subdirectory.
 *
 * Usage:
 *   import { AcquisitionOrchestrator, AcquisitionSession } from '../utils/01_acquisition.utils';
 */

export { AcquisitionOrchestrator } from './acquisition/acquisitionOrchestrator';
export type { OrchestratorDependencies, RunnableSession, SessionFactory } from './acquisition/acquisitionOrchestrator';
export { AcquisitionSession, buildSearchUrl } from './acquisition/acquisitionSession';
export type { PopupOutcome, SessionDependencies } from './acquisition/acquisitionSession';
export { RecordExtractor, createDefaultChains } from './acquisition/recordExtractor';
export { FieldLocatorChain, parseFare, textValue } from './acquisition/fieldLocators';
export { PartitionStore } from './acquisition/partitionStore';
export { createContextFactory, buildFingerprint, STEALTH_LAUNCH_ARGS } from './acquisition/stealthContext';

export * from './acquisition/fareTypes';
export * from './acquisition/dateUtils';
