import { test } from '@playwright/test';
import { loadPipelineConfig } from '../../config';
import { createContextFactory, STEALTH_LAUNCH_ARGS } from '../../utils/01_acquisition.utils';
import { PipelineUtils } from '../../utils/04_pipeline.utils';

/**
 * Scrape, then clean and analyze everything collected so far
 *
 *   npm run pipeline
 */
const config = loadPipelineConfig();

test.use({ headless: config.headless, launchOptions: { args: STEALTH_LAUNCH_ARGS } });

test('Full fare pipeline', async ({ browser }) => {
    const contextFactory = createContextFactory(browser, {
        stealth: config.stealth,
        navigationTimeoutMs: config.session.navigationTimeoutMs
    });

    await new PipelineUtils(config).runAll(contextFactory);
});
