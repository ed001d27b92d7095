import { PipelineConfig } from '../../config';
import { GeneralUtils, RandomSource, Sleeper } from '../00_general.utils';
import { describeError } from '../pipelineErrors';
import { DateUtils } from './dateUtils';
import {
    ContextFactory,
    FlightRecord,
    ListingPage,
    RouteConfig,
    SessionContext,
    SessionResult,
    SessionState,
    TerminalState
} from './fareTypes';
import { RecordExtractor } from './recordExtractor';
import {
    BLOCK_MARKER_SELECTOR,
    BLOCKED_TITLE_KEYWORDS,
    CARD_STRATEGIES,
    MIN_TITLE_LENGTH,
    POPUPS,
    PopupDefinition,
    RESULTS_READY_SELECTOR,
    SEARCH_QUERY,
    SEARCH_URL_BASE
} from './selectors';

export interface SessionDependencies {
    sleep: Sleeper;
    random: RandomSource;
}

export type PopupOutcome = 'dismissed' | 'absent' | 'stuck';

/**
 * Search URL for one route and date, e.g.
 * .../flight/search?itinerary=BOM-DEL-05/11/2026&tripType=O&...
 */
export function buildSearchUrl(route: RouteConfig, isoDate: string): string {
    const itinerary = `${route.sourceAirport}-${route.destinationAirport}-${DateUtils.formatForSearch(isoDate)}`;
    const query = Object.entries(SEARCH_QUERY).map(([key, value]) => `${key}=${value}`).join('&');
    return `${SEARCH_URL_BASE}?itinerary=${itinerary}&${query}`;
}

/**
 * Date-Scoped Acquisition Session
 *
 * Idle → Navigating → AntiBotCheck → PopupDismissal → AwaitingResults → Extracting → Done
 * with Failed (block page, results timeout, unexpected error) and Inconclusive
 * (no card matched any known container) as the other terminal states.
 *
 * Owns exactly one browser context, which is closed whichever state the session ends in.
 */
export class AcquisitionSession {
    private readonly date: string;
    private readonly config: PipelineConfig;
    private readonly openContext: ContextFactory;
    private readonly extractor: RecordExtractor;
    private readonly deps: SessionDependencies;

    private state: SessionState = 'Idle';
    private readonly transitions: SessionState[] = ['Idle'];
    private pageTitle: string | null = null;
    private used = false;

    constructor(
        date: string,
        config: PipelineConfig,
        openContext: ContextFactory,
        extractor: RecordExtractor = new RecordExtractor(config.route, config.session.fieldTimeoutMs),
        deps: SessionDependencies = { sleep: GeneralUtils.sleep, random: Math.random }
    ) {
        this.date = date;
        this.config = config;
        this.openContext = openContext;
        this.extractor = extractor;
        this.deps = deps;
    }

    public getState(): SessionState {
        return this.state;
    }

    public async run(): Promise<SessionResult> {
        if (this.used) {
            throw new Error(`Session for ${this.date} has already run - create a new session per date`);
        }
        this.used = true;

        let context: SessionContext | null = null;
        try {
            context = await this.openContext(this.date);
            return await this.drive(context.page);
        } catch (error) {
            console.error(`  💥 Session error for ${this.date}:`, error);
            const where = context === null ? 'opening browser context' : this.state;
            return this.finish('Failed', [], 0, `Unexpected error in ${where}: ${describeError(error)}`);
        } finally {
            if (context !== null) {
                await context.close().catch(error => {
                    console.error(`  ❌ Error closing browser context for ${this.date}:`, error);
                });
            }
        }
    }

    private async drive(page: ListingPage): Promise<SessionResult> {
        const timings = this.config.session;

        // === Navigating ===
        this.transition('Navigating');
        const url = buildSearchUrl(this.config.route, this.date);
        console.log(`  🌐 Loading ${url}`);
        await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timings.navigationTimeoutMs });
        await this.humanDelay();

        // === AntiBotCheck ===
        this.transition('AntiBotCheck');
        let blockReason = await this.detectBlock(page);
        if (blockReason) {
            console.log(`  🚫 ${blockReason} - refreshing once`);
            await page.reload({ waitUntil: 'domcontentloaded', timeout: timings.navigationTimeoutMs });
            await this.humanDelay();
            blockReason = await this.detectBlock(page);
            if (blockReason) {
                console.log(`  🚫 Still blocked after refresh: ${blockReason}`);
                return this.finish('Failed', [], 0, `Blocked: ${blockReason}`);
            }
            console.log('  ✅ Block cleared after refresh');
        }

        // === PopupDismissal ===
        this.transition('PopupDismissal');
        for (const popup of POPUPS) {
            const outcome = await this.dismissPopup(page, popup);
            if (outcome === 'dismissed') {
                console.log(`  ✅ Closed popup: ${popup.name}`);
            } else if (outcome === 'stuck') {
                console.log(`  ⚠️ Popup "${popup.name}" visible but could not be closed`);
            }
        }

        // === AwaitingResults ===
        this.transition('AwaitingResults');
        console.log('  ⏳ Waiting for flight results...');
        const resultsShown = await page.locator(RESULTS_READY_SELECTOR).first()
            .waitFor({ state: 'visible', timeout: timings.resultsTimeoutMs })
            .then(() => true, () => false);

        if (!resultsShown) {
            this.pageTitle = await this.readTitle(page);
            console.log(`  ❌ No flight results within ${timings.resultsTimeoutMs / 1000}s (title: "${this.pageTitle}")`);
            return this.finish('Failed', [], 0, `Results did not appear within ${timings.resultsTimeoutMs}ms`);
        }
        await GeneralUtils.randomDelay(timings.settleDelayMinMs, timings.settleDelayMaxMs, 'Letting results settle', this.deps.sleep, this.deps.random);

        // === Extracting ===
        this.transition('Extracting');
        const cards = await this.findCards(page);
        if (cards === null) {
            this.pageTitle = await this.readTitle(page);
            console.log(`  ❓ No cards matched any known selector (title: "${this.pageTitle}") - layout change or undetected block?`);
            return this.finish('Inconclusive', [], 0, `No card matched ${CARD_STRATEGIES.map(s => s.selector).join(' / ')}`);
        }

        const limit = this.config.maxCardsPerDate === null ? cards.count : Math.min(cards.count, this.config.maxCardsPerDate);
        console.log(`  🎯 Found ${cards.count} flight cards via "${cards.selector}"${limit < cards.count ? ` (extracting first ${limit})` : ''}`);

        const records: FlightRecord[] = [];
        const cardList = page.locator(cards.selector);
        for (let i = 0; i < limit; i++) {
            const record = await this.extractor.extract(cardList.nth(i), this.date, i + 1);
            if (record) {
                records.push(record);
            }
            if (timings.cardPauseMaxMs > 0) {
                await this.deps.sleep(Math.round(GeneralUtils.randomBetween(timings.cardPauseMinMs, timings.cardPauseMaxMs, this.deps.random)));
            }
        }

        this.pageTitle = await this.readTitle(page);
        return this.finish('Done', records, cards.count, null);
    }

    private transition(next: SessionState): void {
        this.state = next;
        this.transitions.push(next);
    }

    private finish(state: TerminalState, records: FlightRecord[], cardsFound: number, reason: string | null): SessionResult {
        this.transition(state);
        return {
            date: this.date,
            state,
            records,
            cardsFound,
            pageTitle: this.pageTitle,
            reason,
            transitions: [...this.transitions]
        };
    }

    private async humanDelay(): Promise<void> {
        const { humanDelayMinMs, humanDelayMaxMs } = this.config.session;
        await GeneralUtils.randomDelay(humanDelayMinMs, humanDelayMaxMs, 'Human-like delay', this.deps.sleep, this.deps.random);
    }

    private async readTitle(page: ListingPage): Promise<string> {
        return page.title().catch(() => '');
    }

    /**
     * @returns Why the page looks like a block page, or null when it does not
     */
    private async detectBlock(page: ListingPage): Promise<string | null> {
        const title = await this.readTitle(page);
        this.pageTitle = title;
        console.log(`  📄 Page title: ${title}`);

        const lowered = title.toLowerCase();
        const keyword = BLOCKED_TITLE_KEYWORDS.find(k => lowered.includes(k));
        if (keyword) return `page title mentions "${keyword}"`;
        if (title.length < MIN_TITLE_LENGTH) return `page title too short ("${title}")`;

        if (await page.locator(BLOCK_MARKER_SELECTOR).first().isVisible()) {
            return 'network problem marker visible';
        }
        return null;
    }

    /**
     * Optional-capability polling: a popup that never shows up is the normal case
     */
    private async dismissPopup(page: ListingPage, popup: PopupDefinition): Promise<PopupOutcome> {
        const timeout = this.config.session.popupTimeoutMs;
        const button = page.locator(popup.selector).first();

        const appeared = await button.waitFor({ state: 'visible', timeout }).then(() => true, () => false);
        if (!appeared) return 'absent';

        return button.click({ timeout }).then(
            (): PopupOutcome => 'dismissed',
            (error): PopupOutcome => {
                console.log(`  ⚠️ Click on "${popup.name}" failed: ${describeError(error)}`);
                return 'stuck';
            }
        );
    }

    /**
     * First card strategy with at least one match
     */
    private async findCards(page: ListingPage): Promise<{ selector: string; count: number } | null> {
        for (const strategy of CARD_STRATEGIES) {
            const count = await page.locator(strategy.selector).count();
            if (count > 0) {
                return { selector: strategy.selector, count };
            }
        }
        return null;
    }
}
