/**
 * Central Pipeline Configuration
 *
 * Single source of truth for route, scraping pace and storage locations.
 *
 * The configuration is built ONCE per run and handed to the orchestrator,
 * sessions and processing stages as a frozen value - nothing mutates it later.
 *
 * Usage in code:
 *   import { loadPipelineConfig } from './config';
 *   const config = loadPipelineConfig();
 *   console.log(config.route.sourceAirport);
 *
 * Usage locally:
 *   Create a .env file with your values (see the variable list below)
 *   Example: SCRAPE_PROFILE=quick ROUTE=DELHI_MUMBAI npm run scrape
 *
 * Variables:
 *   ROUTE            MUMBAI_DELHI | DELHI_MUMBAI | MUMBAI_BANGALORE | DELHI_BANGALORE
 *   SCRAPE_PROFILE   standard | quick | automated | stealth
 *   DAYS_TO_SCRAPE   number of consecutive dates
 *   START_OFFSET     first date = today + START_OFFSET (default 1)
 *   HEADLESS         true | false
 *   DELAY_MIN_MS     lower bound of the pause between dates
 *   DELAY_MAX_MS     upper bound of the pause between dates
 *   DATA_DIR         root of raw/ and processed/ (default ./data)
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import { RouteConfig } from './utils/acquisition/fareTypes';
import { ConfigError } from './utils/pipelineErrors';

// ========== ROUTES ==========

export const ROUTES = {
    MUMBAI_DELHI: {
        sourceCity: 'Mumbai',
        destinationCity: 'Delhi',
        sourceAirport: 'BOM',
        destinationAirport: 'DEL'
    },
    DELHI_MUMBAI: {
        sourceCity: 'Delhi',
        destinationCity: 'Mumbai',
        sourceAirport: 'DEL',
        destinationAirport: 'BOM'
    },
    MUMBAI_BANGALORE: {
        sourceCity: 'Mumbai',
        destinationCity: 'Bangalore',
        sourceAirport: 'BOM',
        destinationAirport: 'BLR'
    },
    DELHI_BANGALORE: {
        sourceCity: 'Delhi',
        destinationCity: 'Bangalore',
        sourceAirport: 'DEL',
        destinationAirport: 'BLR'
    }
} as const satisfies Record<string, RouteConfig>;

export type RouteName = keyof typeof ROUTES;

// ========== SCRAPING PROFILES ==========

export interface ScrapeProfile {
    daysToScrape: number;
    headless: boolean;
    delayMinMs: number;                 // Pause between two dates
    delayMaxMs: number;
    stealth: boolean;                   // Slower pacing + broader automation masking
    maxCardsPerDate: number | null;     // null = every card on the page
}

export const SCRAPE_PROFILES = {
    // 30-day analysis
    standard: { daysToScrape: 30, headless: false, delayMinMs: 10000, delayMaxMs: 20000, stealth: false, maxCardsPerDate: null },
    // Only 3 days, for checking selectors
    quick: { daysToScrape: 3, headless: false, delayMinMs: 5000, delayMaxMs: 10000, stealth: false, maxCardsPerDate: null },
    // Unattended runs - may fail on CAPTCHAs
    automated: { daysToScrape: 30, headless: true, delayMinMs: 15000, delayMaxMs: 30000, stealth: false, maxCardsPerDate: null },
    // Ultra-conservative, for when the site has started blocking
    stealth: { daysToScrape: 7, headless: false, delayMinMs: 45000, delayMaxMs: 90000, stealth: true, maxCardsPerDate: 10 }
} as const satisfies Record<string, ScrapeProfile>;

export type ProfileName = keyof typeof SCRAPE_PROFILES;

// ========== SESSION TIMINGS ==========

export interface SessionTimings {
    navigationTimeoutMs: number;
    humanDelayMinMs: number;            // After load, before any interaction
    humanDelayMaxMs: number;
    popupTimeoutMs: number;             // Per popup
    resultsTimeoutMs: number;
    settleDelayMinMs: number;           // After results appear
    settleDelayMaxMs: number;
    fieldTimeoutMs: number;             // Per locator candidate
    cardPauseMinMs: number;             // Between cards, 0 = no pause
    cardPauseMaxMs: number;
}

const STANDARD_TIMINGS: SessionTimings = {
    navigationTimeoutMs: 60000,
    humanDelayMinMs: 5000,
    humanDelayMaxMs: 8000,
    popupTimeoutMs: 3000,
    resultsTimeoutMs: 20000,
    settleDelayMinMs: 2000,
    settleDelayMaxMs: 4000,
    fieldTimeoutMs: 1000,
    cardPauseMinMs: 0,
    cardPauseMaxMs: 0
};

const STEALTH_TIMINGS: SessionTimings = {
    navigationTimeoutMs: 120000,
    humanDelayMinMs: 8000,
    humanDelayMaxMs: 15000,
    popupTimeoutMs: 10000,
    resultsTimeoutMs: 60000,
    settleDelayMinMs: 5000,
    settleDelayMaxMs: 8000,
    fieldTimeoutMs: 1000,
    cardPauseMinMs: 500,
    cardPauseMaxMs: 1500
};

// ========== PIPELINE CONFIG ==========

export interface PipelineConfig {
    readonly routeName: RouteName;
    readonly route: Readonly<RouteConfig>;
    readonly profileName: ProfileName;
    readonly daysToScrape: number;
    readonly startOffset: number;
    readonly headless: boolean;
    readonly delayMinMs: number;
    readonly delayMaxMs: number;
    readonly stealth: boolean;
    readonly maxCardsPerDate: number | null;
    readonly session: Readonly<SessionTimings>;
    readonly paths: Readonly<{
        dataDir: string;
        rawDir: string;
        processedDir: string;
        holidaysFile: string;
    }>;
}

const ROUTE_NAMES = ['MUMBAI_DELHI', 'DELHI_MUMBAI', 'MUMBAI_BANGALORE', 'DELHI_BANGALORE'] as const satisfies readonly RouteName[];
const PROFILE_NAMES = ['standard', 'quick', 'automated', 'stealth'] as const satisfies readonly ProfileName[];

const envSchema = z.object({
    ROUTE: z.enum(ROUTE_NAMES).optional(),
    SCRAPE_PROFILE: z.enum(PROFILE_NAMES).optional(),
    DAYS_TO_SCRAPE: z.coerce.number().int().positive().optional(),
    START_OFFSET: z.coerce.number().int().nonnegative().optional(),
    HEADLESS: z.enum(['true', 'false']).optional(),
    DELAY_MIN_MS: z.coerce.number().int().nonnegative().optional(),
    DELAY_MAX_MS: z.coerce.number().int().nonnegative().optional(),
    DATA_DIR: z.string().optional()
});

type EnvInput = Record<string, string | undefined>;

/**
 * Drops variables that are set but blank (e.g., "DELAY_MIN_MS=" in .env)
 */
function withoutBlankValues(env: EnvInput): EnvInput {
    const cleaned: EnvInput = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }
    return cleaned;
}

/**
 * Builds the frozen configuration from an environment map.
 * Pure: does not read .env or process.env by itself.
 */
export function buildPipelineConfig(env: EnvInput, cwd: string = process.cwd()): PipelineConfig {
    const parsed = envSchema.safeParse(withoutBlankValues(env));
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid pipeline configuration - ${details}`, { cause: parsed.error });
    }
    const values = parsed.data;

    const routeName: RouteName = values.ROUTE ?? 'MUMBAI_DELHI';
    const profileName: ProfileName = values.SCRAPE_PROFILE ?? 'standard';
    const profile: ScrapeProfile = SCRAPE_PROFILES[profileName];

    const delayMinMs = values.DELAY_MIN_MS ?? profile.delayMinMs;
    const delayMaxMs = values.DELAY_MAX_MS ?? profile.delayMaxMs;
    if (delayMinMs > delayMaxMs) {
        throw new ConfigError(`Invalid pipeline configuration - DELAY_MIN_MS (${delayMinMs}) is greater than DELAY_MAX_MS (${delayMaxMs})`);
    }

    const dataDir = path.resolve(cwd, values.DATA_DIR ?? 'data');

    const config: PipelineConfig = {
        routeName,
        route: Object.freeze({ ...ROUTES[routeName] }),
        profileName,
        daysToScrape: values.DAYS_TO_SCRAPE ?? profile.daysToScrape,
        startOffset: values.START_OFFSET ?? 1,
        headless: values.HEADLESS !== undefined ? values.HEADLESS === 'true' : profile.headless,
        delayMinMs,
        delayMaxMs,
        stealth: profile.stealth,
        maxCardsPerDate: profile.maxCardsPerDate,
        session: Object.freeze({ ...(profile.stealth ? STEALTH_TIMINGS : STANDARD_TIMINGS) }),
        paths: Object.freeze({
            dataDir,
            rawDir: path.join(dataDir, 'raw'),
            processedDir: path.join(dataDir, 'processed'),
            holidaysFile: path.resolve(cwd, 'data', 'holidays-in.json')
        })
    };

    return Object.freeze(config);
}

/**
 * Loads .env (without overriding variables that are already set) and builds the configuration
 */
export function loadPipelineConfig(): PipelineConfig {
    dotenv.config();
    return buildPipelineConfig(process.env);
}

/**
 * Print current configuration summary
 */
export function printConfigSummary(config: PipelineConfig): void {
    console.log('Current Pipeline Configuration:');
    console.log(`  Route:          ${config.route.sourceCity} → ${config.route.destinationCity}`);
    console.log(`  Airports:       ${config.route.sourceAirport} → ${config.route.destinationAirport}`);
    console.log(`  Profile:        ${config.profileName}${config.stealth ? ' (stealth)' : ''}`);
    console.log(`  Days to scrape: ${config.daysToScrape} (starting today + ${config.startOffset})`);
    console.log(`  Headless mode:  ${config.headless}`);
    console.log(`  Delay range:    ${config.delayMinMs / 1000}-${config.delayMaxMs / 1000} seconds`);
    console.log(`  Data directory: ${config.paths.dataDir}`);
}
