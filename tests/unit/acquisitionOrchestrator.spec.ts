import { test, expect } from '@playwright/test';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ROUTES, buildPipelineConfig } from '../../config';
import { AcquisitionOrchestrator, RunnableSession } from '../../utils/acquisition/acquisitionOrchestrator';
import { FlightRecord, SessionResult } from '../../utils/acquisition/fareTypes';
import { PartitionStore } from '../../utils/acquisition/partitionStore';
import { StorageError } from '../../utils/pipelineErrors';
import { recordingSleeper } from '../helpers/fakePage';

// Local "today" → targets 2026-11-02 .. 2026-11-04 with the default start offset of 1
const TODAY = new Date(2026, 10, 1, 9, 30);

function makeRecord(date: string, fare: number): FlightRecord {
    return {
        flightNumber: `6E ${fare}`,
        airlineName: 'IndiGo',
        ...ROUTES.MUMBAI_DELHI,
        date,
        departureTime: '06:15 AM',
        arrivalTime: '08:30 AM',
        layover: 'non-stop',
        totalFare: fare,
        baseFare: null,
        tax: null
    };
}

function doneResult(date: string, fares: number[]): SessionResult {
    return {
        date,
        state: 'Done',
        records: fares.map(fare => makeRecord(date, fare)),
        cardsFound: fares.length,
        pageTitle: 'MakeMyTrip - Flights',
        reason: null,
        transitions: ['Idle', 'Done']
    };
}

function staticSession(result: SessionResult | Error): RunnableSession {
    return {
        run: async () => {
            if (result instanceof Error) throw result;
            return result;
        }
    };
}

test.describe('AcquisitionOrchestrator', () => {
    let dataDir: string;

    test.beforeEach(() => {
        dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fare-orchestrator-'));
    });

    test.afterEach(() => {
        fs.rmSync(dataDir, { recursive: true, force: true });
    });

    function setup(results: Record<string, SessionResult | Error>, random: () => number = () => 0.5) {
        const config = buildPipelineConfig({ DAYS_TO_SCRAPE: '3', DATA_DIR: dataDir });
        const store = new PartitionStore(config.paths.rawDir);
        const sleeper = recordingSleeper();
        const requested: string[] = [];
        const orchestrator = new AcquisitionOrchestrator(
            config,
            store,
            date => {
                requested.push(date);
                return staticSession(results[date] ?? new Error(`no session scripted for ${date}`));
            },
            { sleep: sleeper.sleep, random, now: () => TODAY }
        );
        return { config, store, sleeper, requested, orchestrator };
    }

    test('targets consecutive dates starting tomorrow', () => {
        const { orchestrator } = setup({});
        expect(orchestrator.getTargetDates()).toEqual(['2026-11-02', '2026-11-03', '2026-11-04']);
    });

    test('saves one partition per date with records', async () => {
        const { store, orchestrator } = setup({
            '2026-11-02': doneResult('2026-11-02', [4100, 4200]),
            '2026-11-03': doneResult('2026-11-03', [3900]),
            '2026-11-04': doneResult('2026-11-04', [5000, 5100, 5200])
        });

        const report = await orchestrator.run();

        expect(report.totals).toEqual({ saved: 3, empty: 0, inconclusive: 0, failed: 0, skipped: 0 });
        expect(report.outcomes.map(o => o.recordCount)).toEqual([2, 1, 3]);
        expect(store.listDates()).toEqual(['2026-11-02', '2026-11-03', '2026-11-04']);
        expect(report.outcomes[0].partitionPath).toBe(path.join(dataDir, 'raw', '2026-11-02.json'));
    });

    test('a second run skips every date that already has a partition', async () => {
        const results = {
            '2026-11-02': doneResult('2026-11-02', [4100]),
            '2026-11-03': doneResult('2026-11-03', [3900]),
            '2026-11-04': doneResult('2026-11-04', [5000])
        };
        await setup(results).orchestrator.run();

        const rerun = setup(results);
        const report = await rerun.orchestrator.run();

        expect(report.totals.skipped).toBe(3);
        expect(report.outcomes.every(o => o.reason === 'partition already exists')).toBe(true);
        expect(rerun.requested).toEqual([]);
        expect(rerun.sleeper.calls).toEqual([]);
    });

    test('one failing date does not stop the others', async () => {
        const { store, orchestrator } = setup({
            '2026-11-02': doneResult('2026-11-02', [4100]),
            '2026-11-03': new Error('browser crashed'),
            '2026-11-04': doneResult('2026-11-04', [5000])
        });

        const report = await orchestrator.run();

        expect(report.outcomes.map(o => o.status)).toEqual(['saved', 'failed', 'saved']);
        expect(report.outcomes[1].reason).toBe('browser crashed');
        expect(store.listDates()).toEqual(['2026-11-02', '2026-11-04']);
    });

    test('maps failed, inconclusive and empty sessions to outcomes without writing files', async () => {
        const { store, orchestrator } = setup({
            '2026-11-02': { ...doneResult('2026-11-02', []), state: 'Failed', reason: 'Blocked: page title mentions "captcha"' },
            '2026-11-03': { ...doneResult('2026-11-03', []), state: 'Inconclusive', reason: 'No card matched' },
            '2026-11-04': { ...doneResult('2026-11-04', []), cardsFound: 4 }
        });

        const report = await orchestrator.run();

        expect(report.outcomes.map(o => [o.status, o.reason])).toEqual([
            ['failed', 'Blocked: page title mentions "captcha"'],
            ['inconclusive', 'No card matched'],
            ['empty', '4 cards, none valid']
        ]);
        expect(store.listDates()).toEqual([]);
    });

    test('waits a bounded random delay between sessions only', async () => {
        const { sleeper, orchestrator } = setup({
            '2026-11-02': doneResult('2026-11-02', [4100]),
            '2026-11-03': doneResult('2026-11-03', [3900]),
            '2026-11-04': doneResult('2026-11-04', [5000])
        });

        await orchestrator.run();

        // standard profile window is 10-20s; random() = 0.5 lands in the middle
        expect(sleeper.calls).toEqual([15000, 15000]);
    });

    test('delays stay inside the configured window', async () => {
        const low = setup({ '2026-11-02': doneResult('2026-11-02', [1]), '2026-11-03': doneResult('2026-11-03', [1]) }, () => 0);
        await low.orchestrator.run();
        fs.rmSync(path.join(dataDir, 'raw'), { recursive: true, force: true });
        const high = setup({ '2026-11-02': doneResult('2026-11-02', [1]), '2026-11-03': doneResult('2026-11-03', [1]) }, () => 1);
        await high.orchestrator.run();

        expect(low.sleeper.calls[0]).toBe(low.config.delayMinMs);
        expect(high.sleeper.calls[0]).toBe(high.config.delayMaxMs);
    });

    test('an unusable output directory ends the run before any session', async () => {
        fs.writeFileSync(path.join(dataDir, 'raw'), 'not a directory');
        const { requested, orchestrator } = setup({});

        await expect(orchestrator.run()).rejects.toBeInstanceOf(StorageError);
        expect(requested).toEqual([]);
    });

    test('formats a boxed run summary', async () => {
        const { orchestrator } = setup({
            '2026-11-02': doneResult('2026-11-02', [4100, 4200]),
            '2026-11-03': new Error('boom'),
            '2026-11-04': doneResult('2026-11-04', [5000, 5100, 5200])
        });

        const text = AcquisitionOrchestrator.formatReport(await orchestrator.run());
        const lines = text.split('\n');

        expect(lines).toContain('Route:                 BOM → DEL');
        expect(lines).toContain('  - Saved:             2');
        expect(lines).toContain('  - Failed:            1');
        expect(lines).toContain('Flights saved:         5');
    });
});
