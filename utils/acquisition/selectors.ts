/**
 * Listing page selectors.
 *
 * The search results markup is unversioned and changes without notice, so every
 * field lists its candidates in priority order: current layout first, then the
 * older "fli-list" layout, then generic price classes seen on other variants.
 */

import { LocatorStrategy } from './fieldLocators';

export const SEARCH_URL_BASE = 'https://www.makemytrip.com/flight/search';

// Fixed query: one-way, one adult, economy, domestic
export const SEARCH_QUERY = {
    tripType: 'O',
    paxType: 'A-1_C-0_I-0',
    intl: 'false',
    cabinClass: 'E',
    lang: 'eng'
} as const;

export const CARD_STRATEGIES: readonly LocatorStrategy[] = [
    { name: 'listing card', selector: 'div.listingCard' },
    { name: 'timing option', selector: 'div.timingOptionOuter' },
    { name: 'legacy list row', selector: 'div.fli-list' }
];

// Page-level wrappers around the result list. They render even when the cards inside
// use a class none of CARD_STRATEGIES knows, which is what makes a session Inconclusive.
export const RESULTS_CONTAINER_STRATEGIES: readonly LocatorStrategy[] = [
    { name: 'listing wrapper', selector: '#listing-id' },
    { name: 'listing outer', selector: 'div.listingOuter' },
    { name: 'cluster content', selector: 'div.clusterContent' }
];

// Results count as rendered once a wrapper or a known card is visible
export const RESULTS_READY_SELECTOR = [...RESULTS_CONTAINER_STRATEGIES, ...CARD_STRATEGIES].map(s => s.selector).join(', ');

export const BLOCK_MARKER_SELECTOR = 'text=NETWORK PROBLEM';
export const BLOCKED_TITLE_KEYWORDS = ['blocked', 'captcha'] as const;
export const MIN_TITLE_LENGTH = 10;

export interface PopupDefinition {
    name: string;
    selector: string;
}

export const POPUPS: readonly PopupDefinition[] = [
    { name: 'flight comparison tutorial', selector: 'button:has-text("GOT IT")' },
    { name: 'generic modal', selector: 'button[data-cy="closeModal"]' },
    { name: 'account overlay', selector: 'li[data-cy="account"]' }
];

export const FIELD_STRATEGIES = {
    airline: [
        { name: 'airline paragraph', selector: 'p.airlineName' },
        { name: 'airline class', selector: '.airlineName' },
        { name: 'legacy airline section', selector: 'span.airlineInfo-sctn .airlineName' }
    ],
    flightNumber: [
        { name: 'flight code paragraph', selector: 'p.fliCode' },
        { name: 'flight code class', selector: '.fliCode' },
        { name: 'legacy flight number', selector: 'span.flightNo' }
    ],
    departureTime: [
        { name: 'left time info', selector: '.timeInfoLeft .flightTimeInfo span' },
        { name: 'left time span', selector: '.timeInfoLeft span' },
        { name: 'legacy depart time', selector: 'div.depart-time' }
    ],
    arrivalTime: [
        { name: 'right time info', selector: '.timeInfoRight .flightTimeInfo span' },
        { name: 'right time span', selector: '.timeInfoRight span' },
        { name: 'legacy reach time', selector: 'div.reach-time' }
    ],
    layover: [
        { name: 'layover paragraph', selector: 'p.flightsLayoverInfo' },
        { name: 'layover class', selector: '.flightsLayoverInfo' },
        { name: 'legacy stops', selector: 'p.flt-stp' }
    ],
    totalFare: [
        { name: 'fare span', selector: 'span.fontSize18.blackFont' },
        { name: 'fare class', selector: '.fontSize18.blackFont' },
        { name: 'legacy fare block', selector: 'div.blackText.fontSize18.blackFont.white-space-no-wrap' },
        { name: 'price class', selector: '.price' },
        { name: 'price data attribute', selector: 'span[data-cy="price"]' },
        { name: 'fare price class', selector: '.fare-price' },
        { name: 'total fare class', selector: '.total-fare' }
    ]
} as const satisfies Record<string, readonly LocatorStrategy[]>;

export type FieldName = keyof typeof FIELD_STRATEGIES;
