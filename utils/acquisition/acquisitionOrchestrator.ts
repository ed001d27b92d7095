import { PipelineConfig } from '../../config';
import { GeneralUtils, RandomSource, Sleeper } from '../00_general.utils';
import { describeError } from '../pipelineErrors';
import { DateUtils } from './dateUtils';
import { DateOutcome, DateOutcomeStatus, RunReport, SessionResult } from './fareTypes';
import { PartitionStore } from './partitionStore';

export interface RunnableSession {
    run(): Promise<SessionResult>;
}

export type SessionFactory = (date: string) => RunnableSession;

export interface OrchestratorDependencies {
    sleep: Sleeper;
    random: RandomSource;
    now: () => Date;
}

const STATUS_ICONS: Record<DateOutcomeStatus, string> = {
    saved: '🎉',
    empty: '😔',
    inconclusive: '❓',
    failed: '❌',
    skipped: '⏭️ '
};

/**
 * Acquisition Orchestrator
 *
 * Walks the target dates in ascending order, one browser session at a time.
 * A date that already has a partition is skipped; a date whose session fails
 * is reported and the loop moves on.
 */
export class AcquisitionOrchestrator {
    private readonly config: PipelineConfig;
    private readonly store: PartitionStore;
    private readonly createSession: SessionFactory;
    private readonly deps: OrchestratorDependencies;

    constructor(
        config: PipelineConfig,
        store: PartitionStore,
        createSession: SessionFactory,
        deps: OrchestratorDependencies = { sleep: GeneralUtils.sleep, random: Math.random, now: () => new Date() }
    ) {
        this.config = config;
        this.store = store;
        this.createSession = createSession;
        this.deps = deps;
    }

    public getTargetDates(): string[] {
        return DateUtils.getTargetDates(this.deps.now(), this.config.startOffset, this.config.daysToScrape);
    }

    /**
     * @throws StorageError when the output directory cannot be created
     */
    public async run(): Promise<RunReport> {
        this.store.ensureDirectory();

        const startedAt = this.deps.now().toISOString();
        const dates = this.getTargetDates();
        const outcomes: DateOutcome[] = [];
        let sessionsStarted = 0;

        console.log(`🛫 Scraping ${dates.length} dates: ${dates[0] ?? '-'} → ${dates[dates.length - 1] ?? '-'}`);
        console.log(`   Delay between dates: ${this.config.delayMinMs / 1000}-${this.config.delayMaxMs / 1000}s`);

        for (const [index, date] of dates.entries()) {
            const prefix = `[${index + 1}/${dates.length}]`;

            if (this.store.exists(date)) {
                console.log(`${prefix} ⏭️  Skipping ${date}, already scraped.`);
                outcomes.push({ date, status: 'skipped', recordCount: 0, reason: 'partition already exists', partitionPath: this.store.partitionPath(date) });
                continue;
            }

            // Pause only between sessions that actually run
            if (sessionsStarted > 0) {
                await GeneralUtils.randomDelay(this.config.delayMinMs, this.config.delayMaxMs, 'Waiting before next date', this.deps.sleep, this.deps.random);
            }
            sessionsStarted++;

            console.log(`${prefix} 🔍 Scraping for ${date}...`);
            const outcome = await this.scrapeDate(date);
            console.log(`${prefix} ${STATUS_ICONS[outcome.status]} ${date}: ${this.describeOutcome(outcome)}`);
            outcomes.push(outcome);
        }

        const report: RunReport = {
            startedAt,
            finishedAt: this.deps.now().toISOString(),
            route: { ...this.config.route },
            outcomes,
            totals: AcquisitionOrchestrator.countOutcomes(outcomes)
        };
        return report;
    }

    private async scrapeDate(date: string): Promise<DateOutcome> {
        let result: SessionResult;
        try {
            result = await this.createSession(date).run();
        } catch (error) {
            console.error(`  💥 Error while scraping ${date}:`, error);
            return { date, status: 'failed', recordCount: 0, reason: describeError(error), partitionPath: null };
        }

        if (result.state === 'Failed') {
            return { date, status: 'failed', recordCount: 0, reason: result.reason, partitionPath: null };
        }
        if (result.state === 'Inconclusive') {
            return { date, status: 'inconclusive', recordCount: 0, reason: result.reason, partitionPath: null };
        }
        if (result.records.length === 0) {
            return { date, status: 'empty', recordCount: 0, reason: `${result.cardsFound} cards, none valid`, partitionPath: null };
        }

        // Storage errors are not per-date problems - let them end the run
        const partitionPath = this.store.write({
            date,
            route: { ...this.config.route },
            scrapedAt: this.deps.now().toISOString(),
            records: result.records
        });
        return { date, status: 'saved', recordCount: result.records.length, reason: null, partitionPath };
    }

    private describeOutcome(outcome: DateOutcome): string {
        switch (outcome.status) {
            case 'saved':
                return `saved ${outcome.recordCount} flights to ${outcome.partitionPath}`;
            case 'empty':
                return `no valid flights (${outcome.reason})`;
            case 'inconclusive':
                return `inconclusive - ${outcome.reason}`;
            case 'failed':
                return `failed - ${outcome.reason}`;
            case 'skipped':
                return 'skipped';
        }
    }

    public static countOutcomes(outcomes: DateOutcome[]): Record<DateOutcomeStatus, number> {
        const totals: Record<DateOutcomeStatus, number> = { saved: 0, empty: 0, inconclusive: 0, failed: 0, skipped: 0 };
        for (const outcome of outcomes) {
            totals[outcome.status]++;
        }
        return totals;
    }

    /**
     * Boxed summary for the console
     */
    public static formatReport(report: RunReport): string {
        const lines = [
            '',
            '='.repeat(60),
            '📊 SCRAPING RUN SUMMARY',
            '='.repeat(60),
            `Route:                 ${report.route.sourceAirport} → ${report.route.destinationAirport}`,
            `Dates:                 ${report.outcomes.length}`,
            `  - Saved:             ${report.totals.saved}`,
            `  - Skipped:           ${report.totals.skipped}`,
            `  - Empty:             ${report.totals.empty}`,
            `  - Inconclusive:      ${report.totals.inconclusive}`,
            `  - Failed:            ${report.totals.failed}`,
            `Flights saved:         ${report.outcomes.reduce((sum, o) => sum + o.recordCount, 0)}`,
            '='.repeat(60)
        ];
        return lines.join('\n');
    }
}
