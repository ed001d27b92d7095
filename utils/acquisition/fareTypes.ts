// TypeScript interfaces for the fare acquisition pipeline

/**
 * Fixed origin-destination pair for a run
 */
export interface RouteConfig {
    sourceCity: string;                     // e.g., "Mumbai"
    destinationCity: string;                // e.g., "Delhi"
    sourceAirport: string;                  // e.g., "BOM"
    destinationAirport: string;             // e.g., "DEL"
}

/**
 * Flight Record
 * One valid listing card scraped from the search results page
 */
export interface FlightRecord {
    flightNumber: string;                   // "6E 2131", or "Flight-3" when the card shows none
    airlineName: string;
    sourceCity: string;
    destinationCity: string;
    sourceAirport: string;
    destinationAirport: string;
    date: string;                           // ISO date (YYYY-MM-DD) of the search
    departureTime: string;                  // Free-form, e.g., "06:05 AM"
    arrivalTime: string;
    layover: string;                        // "non-stop" unless the card says otherwise
    totalFare: number;                      // Positive integer, currency units
    baseFare: number | null;                // Not shown on the listing page
    tax: number | null;
}

/**
 * Date Partition
 * Everything persisted for one search date (data/raw/<date>.json)
 */
export interface DatePartition {
    date: string;
    route: RouteConfig;
    scrapedAt: string;                      // ISO-8601 timestamp
    records: FlightRecord[];
}

/**
 * Raw row as read back from disk - fares are coerced later by the cleaning stage
 */
export type RawFlightRow = Omit<FlightRecord, 'totalFare'> & {
    totalFare: number | string | null;
};

export interface LoadedPartition {
    date: string;
    route: RouteConfig;
    scrapedAt: string;
    records: RawFlightRow[];
}

export type SessionState =
    | 'Idle'
    | 'Navigating'
    | 'AntiBotCheck'
    | 'PopupDismissal'
    | 'AwaitingResults'
    | 'Extracting'
    | 'Done'
    | 'Failed'
    | 'Inconclusive';

export type TerminalState = Extract<SessionState, 'Done' | 'Failed' | 'Inconclusive'>;

/**
 * What one date-scoped session hands back to the orchestrator
 */
export interface SessionResult {
    date: string;
    state: TerminalState;
    records: FlightRecord[];
    cardsFound: number;
    pageTitle: string | null;
    reason: string | null;                  // Why the session failed / was inconclusive
    transitions: SessionState[];            // Idle -> ... -> terminal state
}

export type DateOutcomeStatus = 'saved' | 'empty' | 'inconclusive' | 'failed' | 'skipped';

export interface DateOutcome {
    date: string;
    status: DateOutcomeStatus;
    recordCount: number;
    reason: string | null;
    partitionPath: string | null;
}

/**
 * Run report for one orchestrator pass over the date range
 */
export interface RunReport {
    startedAt: string;
    finishedAt: string;
    route: RouteConfig;
    outcomes: DateOutcome[];
    totals: Record<DateOutcomeStatus, number>;
}

// ----- Page surface used by the session and extractor -----
// Playwright's Page and Locator satisfy these structurally; tests drive them with an in-process fake.

export interface ElementProbe {
    count(): Promise<number>;
    innerText(options?: { timeout?: number }): Promise<string>;
}

export interface CardScope {
    locator(selector: string): { first(): ElementProbe };
}

export interface ListingLocator extends ElementProbe {
    locator(selector: string): ListingLocator;
    first(): ListingLocator;
    nth(index: number): ListingLocator;
    isVisible(): Promise<boolean>;
    click(options?: { timeout?: number }): Promise<void>;
    waitFor(options?: { state?: 'attached' | 'detached' | 'visible' | 'hidden'; timeout?: number }): Promise<void>;
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface ListingPage {
    goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
    reload(options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
    title(): Promise<string>;
    locator(selector: string): ListingLocator;
}

/**
 * One isolated browser context, owned by exactly one session
 */
export interface SessionContext {
    page: ListingPage;
    close(): Promise<void>;
}

export type ContextFactory = (date: string) => Promise<SessionContext>;
