import { test } from '@playwright/test';
import { loadPipelineConfig } from '../../config';
import { PipelineUtils } from '../../utils/04_pipeline.utils';

/**
 * Processing run: data/raw/*.json → data/processed/*.json. No browser involved.
 *
 *   npm run process
 */
test('Clean and analyze scraped fares', async () => {
    const pipelineUtils = new PipelineUtils(loadPipelineConfig());
    const summary = pipelineUtils.runProcessingPhase();

    console.log(`\n📁 ${summary.writtenFiles.length} files written`);
});
