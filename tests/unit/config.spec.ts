import { test, expect } from '@playwright/test';
import * as path from 'path';
import { buildPipelineConfig } from '../../config';
import { ConfigError } from '../../utils/pipelineErrors';

const CWD = path.resolve('/srv/fares');

test.describe('buildPipelineConfig', () => {
    test('defaults to the standard profile on Mumbai → Delhi', () => {
        const config = buildPipelineConfig({}, CWD);

        expect(config.routeName).toBe('MUMBAI_DELHI');
        expect(config.route).toEqual({ sourceCity: 'Mumbai', destinationCity: 'Delhi', sourceAirport: 'BOM', destinationAirport: 'DEL' });
        expect(config.profileName).toBe('standard');
        expect(config.daysToScrape).toBe(30);
        expect(config.startOffset).toBe(1);
        expect(config.headless).toBe(false);
        expect([config.delayMinMs, config.delayMaxMs]).toEqual([10000, 20000]);
        expect(config.maxCardsPerDate).toBeNull();
        expect(config.paths.rawDir).toBe(path.join(CWD, 'data', 'raw'));
        expect(config.paths.processedDir).toBe(path.join(CWD, 'data', 'processed'));
        expect(config.paths.holidaysFile).toBe(path.join(CWD, 'data', 'holidays-in.json'));
    });

    test('stealth profile slows every wait and caps cards', () => {
        const config = buildPipelineConfig({ SCRAPE_PROFILE: 'stealth', ROUTE: 'DELHI_BANGALORE' }, CWD);

        expect(config.stealth).toBe(true);
        expect(config.maxCardsPerDate).toBe(10);
        expect(config.daysToScrape).toBe(7);
        expect([config.delayMinMs, config.delayMaxMs]).toEqual([45000, 90000]);
        expect(config.session.resultsTimeoutMs).toBe(60000);
        expect(config.route.destinationAirport).toBe('BLR');
    });

    test('environment overrides win over the profile', () => {
        const config = buildPipelineConfig({
            SCRAPE_PROFILE: 'quick',
            DAYS_TO_SCRAPE: '5',
            START_OFFSET: '0',
            HEADLESS: 'true',
            DELAY_MIN_MS: '1000',
            DELAY_MAX_MS: '2000',
            DATA_DIR: 'out'
        }, CWD);

        expect(config.daysToScrape).toBe(5);
        expect(config.startOffset).toBe(0);
        expect(config.headless).toBe(true);
        expect([config.delayMinMs, config.delayMaxMs]).toEqual([1000, 2000]);
        expect(config.paths.rawDir).toBe(path.join(CWD, 'out', 'raw'));
    });

    test('blank variables fall back to defaults', () => {
        const config = buildPipelineConfig({ DAYS_TO_SCRAPE: '', HEADLESS: '  ' }, CWD);
        expect(config.daysToScrape).toBe(30);
        expect(config.headless).toBe(false);
    });

    test('rejects unknown routes and non-numeric values', () => {
        expect(() => buildPipelineConfig({ ROUTE: 'PARIS_LONDON' }, CWD)).toThrow(ConfigError);
        expect(() => buildPipelineConfig({ DAYS_TO_SCRAPE: 'ten' }, CWD)).toThrow(/DAYS_TO_SCRAPE/);
        expect(() => buildPipelineConfig({ HEADLESS: 'yes' }, CWD)).toThrow(/HEADLESS/);
    });

    test('rejects an inverted delay window', () => {
        expect(() => buildPipelineConfig({ DELAY_MIN_MS: '5000', DELAY_MAX_MS: '1000' }, CWD))
            .toThrow('DELAY_MIN_MS (5000) is greater than DELAY_MAX_MS (1000)');
    });

    test('the result is frozen', () => {
        const config = buildPipelineConfig({}, CWD);
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.session)).toBe(true);
        expect(Object.isFrozen(config.paths)).toBe(true);
    });
});
