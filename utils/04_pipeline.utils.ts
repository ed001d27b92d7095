import { PipelineConfig, printConfigSummary } from '../config';
import { AcquisitionOrchestrator, AcquisitionSession, ContextFactory, PartitionStore, RunReport } from './01_acquisition.utils';
import { HolidayCalendar, HolidayLookup } from './02_holidays.utils';
import { CleaningResult, CleaningUtils, DatasetStore, FareAnalyticsUtils, SummaryTables } from './03_processing.utils';

export interface ProcessingSummary {
    cleaning: CleaningResult;
    tables: SummaryTables;
    writtenFiles: string[];
    report: string;
}

/**
 * Pipeline Utils - wires config, stores and stages into the two phases
 */
export class PipelineUtils {
    private readonly config: PipelineConfig;

    constructor(config: PipelineConfig) {
        this.config = config;
    }

    public printPipelineInfo(): void {
        console.log('\n' + '='.repeat(60));
        console.log('✈️  FARE TRACKER PIPELINE');
        console.log('='.repeat(60));
        printConfigSummary(this.config);
        console.log('='.repeat(60) + '\n');
    }

    /**
     * Scrapes every target date that has no partition yet
     */
    public async runScrapingPhase(openContext: ContextFactory): Promise<RunReport> {
        console.log('🛫 Phase 1: Scraping');
        const store = new PartitionStore(this.config.paths.rawDir);
        const orchestrator = new AcquisitionOrchestrator(
            this.config,
            store,
            date => new AcquisitionSession(date, this.config, openContext)
        );

        const report = await orchestrator.run();
        console.log(AcquisitionOrchestrator.formatReport(report));
        return report;
    }

    /**
     * Cleans all partitions and rewrites the processed outputs
     * @param isHoliday - Defaults to the regional table at config.paths.holidaysFile
     * @throws EmptyDatasetError when there is nothing to process
     */
    public runProcessingPhase(isHoliday?: HolidayLookup): ProcessingSummary {
        console.log('🧮 Phase 2: Cleaning and aggregation');
        const holidays = isHoliday ?? HolidayCalendar.fromFile(this.config.paths.holidaysFile).toLookup();

        const cleaning = CleaningUtils.run(new PartitionStore(this.config.paths.rawDir), holidays);
        const tables = FareAnalyticsUtils.buildSummaryTables(cleaning.records);
        const writtenFiles = new DatasetStore(this.config.paths.processedDir).save(cleaning.records, tables);

        const report = FareAnalyticsUtils.generateReport(tables);
        console.log(report);
        return { cleaning, tables, writtenFiles, report };
    }

    public async runAll(openContext: ContextFactory): Promise<{ scraping: RunReport; processing: ProcessingSummary }> {
        this.printPipelineInfo();
        const scraping = await this.runScrapingPhase(openContext);
        const processing = this.runProcessingPhase();
        console.log('✅ Pipeline complete');
        return { scraping, processing };
    }
}
