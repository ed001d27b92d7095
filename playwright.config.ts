import { defineConfig } from '@playwright/test';

/**
 * Two projects:
 *   unit - fast specs that never open a browser (npm test)
 *   live - real scraping / processing runs (npm run scrape | process | pipeline)
 */
export default defineConfig({
    fullyParallel: false,
    forbidOnly: !!process.env.CI,
    retries: 0,
    workers: 1,
    projects: [
        {
            name: 'unit',
            testDir: './tests/unit',
            timeout: 30000
        },
        {
            name: 'live',
            testDir: './tests/live',
            // A long crawl is bounded by the per-date waits, not by a global test timeout
            timeout: 0,
            use: {
                trace: 'retain-on-failure'
            }
        }
    ]
});
