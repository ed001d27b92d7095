import { BrowserContextOptions, test, expect } from '@playwright/test';
import {
    ContextLauncher,
    ContextPage,
    LaunchedContext,
    USER_AGENTS,
    VIEWPORTS,
    buildContextOptions,
    buildFingerprint,
    createContextFactory,
    maskAutomationMarkers
} from '../../utils/acquisition/stealthContext';
import { FakePage } from '../helpers/fakePage';

class TimedPage extends FakePage implements ContextPage {
    defaultTimeout: number | null = null;

    public setDefaultTimeout(timeout: number): void {
        this.defaultTimeout = timeout;
    }
}

class RecordingContext implements LaunchedContext {
    readonly options: BrowserContextOptions;
    readonly initScripts: Array<{ script: (extended: boolean) => void; extended: boolean }> = [];
    readonly pages: TimedPage[] = [];
    newPageError: Error | null = null;
    closeCount = 0;

    constructor(options: BrowserContextOptions) {
        this.options = options;
    }

    public async addInitScript(script: (extended: boolean) => void, extended: boolean): Promise<void> {
        this.initScripts.push({ script, extended });
    }

    public async newPage(): Promise<TimedPage> {
        if (this.newPageError) throw this.newPageError;
        const page = new TimedPage();
        this.pages.push(page);
        return page;
    }

    public async close(): Promise<void> {
        this.closeCount++;
    }
}

class RecordingLauncher implements ContextLauncher {
    readonly contexts: RecordingContext[] = [];
    failNewPage: Error | null = null;

    public async newContext(options: BrowserContextOptions): Promise<RecordingContext> {
        const context = new RecordingContext(options);
        context.newPageError = this.failNewPage;
        this.contexts.push(context);
        return context;
    }
}

test.describe('browser fingerprint', () => {
    test('random source picks user agent and viewport', () => {
        const first = buildFingerprint(() => 0);
        const last = buildFingerprint(() => 0.9999);

        expect(first.userAgent).toBe(USER_AGENTS[0]);
        expect(first.viewport).toEqual({ width: 1920, height: 1080 });
        expect(last.userAgent).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
        expect(last.viewport).toEqual(VIEWPORTS[VIEWPORTS.length - 1]);
    });

    test('context options carry the regional locale and headers', () => {
        const options = buildContextOptions(buildFingerprint(() => 0.5));

        expect(options.locale).toBe('en-IN');
        expect(options.timezoneId).toBe('Asia/Kolkata');
        expect(options.colorScheme).toBe('light');
        expect(options.extraHTTPHeaders?.['DNT']).toBe('1');
        expect(options.viewport).toEqual({ width: 1440, height: 900 });
    });
});

test.describe('createContextFactory', () => {
    test('opens a fresh context with its own fingerprint for every date', async () => {
        const launcher = new RecordingLauncher();
        const draws = [0, 0, 0.9999, 0.9999];
        const openContext = createContextFactory(launcher, { stealth: false, navigationTimeoutMs: 60000 }, () => draws.shift() ?? 0);

        const first = await openContext('2026-11-04');
        const second = await openContext('2026-11-05');

        expect(launcher.contexts).toHaveLength(2);
        expect(launcher.contexts[0].options.viewport).toEqual({ width: 1920, height: 1080 });
        expect(launcher.contexts[1].options.viewport).toEqual({ width: 1366, height: 768 });
        expect(first.page).toBe(launcher.contexts[0].pages[0]);
        expect(second.page).toBe(launcher.contexts[1].pages[0]);
        expect(launcher.contexts[0].pages[0].defaultTimeout).toBe(60000);

        await first.close();
        expect(launcher.contexts.map(c => c.closeCount)).toEqual([1, 0]);
    });

    test('passes the stealth flag to the automation masking script', async () => {
        const launcher = new RecordingLauncher();

        await createContextFactory(launcher, { stealth: true, navigationTimeoutMs: 120000 })('2026-11-04');
        await createContextFactory(launcher, { stealth: false, navigationTimeoutMs: 60000 })('2026-11-05');

        expect(launcher.contexts.map(c => c.initScripts.map(i => i.extended))).toEqual([[true], [false]]);
        expect(launcher.contexts[0].initScripts[0].script).toBe(maskAutomationMarkers);
    });

    test('closes the context when the page cannot be created', async () => {
        const launcher = new RecordingLauncher();
        launcher.failNewPage = new Error('Target page, context or browser has been closed');
        const openContext = createContextFactory(launcher, { stealth: false, navigationTimeoutMs: 60000 });

        await expect(openContext('2026-11-04')).rejects.toThrow('Target page, context or browser has been closed');
        expect(launcher.contexts).toHaveLength(1);
        expect(launcher.contexts[0].closeCount).toBe(1);
    });
});
