import { test } from '@playwright/test';
import { loadPipelineConfig } from '../../config';
import { createContextFactory, STEALTH_LAUNCH_ARGS } from '../../utils/01_acquisition.utils';
import { PipelineUtils } from '../../utils/04_pipeline.utils';

/**
 * Scraping run
 *
 * Opens one fresh browser context per date and writes data/raw/<date>.json
 * for every date that produced at least one flight. Dates that already have
 * a file are skipped, so an interrupted run can simply be started again.
 *
 *   npm run scrape
 *   SCRAPE_PROFILE=quick ROUTE=DELHI_MUMBAI npm run scrape
 */
const config = loadPipelineConfig();

test.use({ headless: config.headless, launchOptions: { args: STEALTH_LAUNCH_ARGS } });

test('Scrape flight fares', async ({ browser }) => {
    const pipelineUtils = new PipelineUtils(config);
    pipelineUtils.printPipelineInfo();

    const report = await pipelineUtils.runScrapingPhase(
        createContextFactory(browser, { stealth: config.stealth, navigationTimeoutMs: config.session.navigationTimeoutMs })
    );

    if (report.totals.saved === 0 && report.totals.skipped === 0) {
        console.log('\n⚠️ No data collected. The site may be blocking automated access - try SCRAPE_PROFILE=stealth or HEADLESS=false.');
    }
});
