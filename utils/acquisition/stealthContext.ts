import { BrowserContextOptions } from '@playwright/test';
import { RandomSource } from '../00_general.utils';
import { ContextFactory, ListingPage } from './fareTypes';

/**
 * Browser fingerprint for one date's context.
 * A fresh fingerprint per date keeps anti-bot state from carrying over between sessions.
 */
export interface BrowserFingerprint {
    userAgent: string;
    viewport: { width: number; height: number };
    locale: string;
    timezoneId: string;
    extraHTTPHeaders: Record<string, string>;
}

export const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36'
] as const;

export const VIEWPORTS = [
    { width: 1920, height: 1080 },
    { width: 1536, height: 864 },
    { width: 1440, height: 900 },
    { width: 1366, height: 768 }
] as const;

// Passed to the browser launch by the live specs
export const STEALTH_LAUNCH_ARGS = [
    '--disable-blink-features=AutomationControlled',
    '--disable-dev-shm-usage',
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-extensions'
];

function pickRandom<T>(items: readonly T[], random: RandomSource): T {
    return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

export function buildFingerprint(random: RandomSource = Math.random): BrowserFingerprint {
    const viewport = pickRandom(VIEWPORTS, random);
    return {
        userAgent: pickRandom(USER_AGENTS, random),
        viewport: { width: viewport.width, height: viewport.height },
        locale: 'en-IN',
        timezoneId: 'Asia/Kolkata',
        extraHTTPHeaders: {
            'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
            'Accept-Language': 'en-US,en;q=0.5',
            'DNT': '1',
            'Upgrade-Insecure-Requests': '1'
        }
    };
}

export function buildContextOptions(fingerprint: BrowserFingerprint): BrowserContextOptions {
    return {
        userAgent: fingerprint.userAgent,
        viewport: fingerprint.viewport,
        locale: fingerprint.locale,
        timezoneId: fingerprint.timezoneId,
        extraHTTPHeaders: fingerprint.extraHTTPHeaders,
        colorScheme: 'light'
    };
}

/**
 * Runs inside the page before any site script.
 * Always hides navigator.webdriver; the extended set also fakes plugins, languages and window.chrome.
 */
export function maskAutomationMarkers(extended: boolean): void {
    Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    if (!extended) return;

    Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
    Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
    Object.defineProperty(window, 'chrome', { value: { runtime: {} }, configurable: true });
}

// Playwright's Browser, BrowserContext and Page satisfy these structurally

export interface ContextPage extends ListingPage {
    setDefaultTimeout(timeout: number): void;
}

export interface LaunchedContext {
    addInitScript(script: (extended: boolean) => void, extended: boolean): Promise<void>;
    newPage(): Promise<ContextPage>;
    close(): Promise<void>;
}

export interface ContextLauncher {
    newContext(options: BrowserContextOptions): Promise<LaunchedContext>;
}

/**
 * Context factory over a launched browser: one new context + page per call.
 * The caller owns the returned context and must close it.
 */
export function createContextFactory(
    browser: ContextLauncher,
    options: { stealth: boolean; navigationTimeoutMs: number },
    random: RandomSource = Math.random
): ContextFactory {
    return async (date: string) => {
        const fingerprint = buildFingerprint(random);
        console.log(`  🕵️ New context for ${date}: ${fingerprint.viewport.width}x${fingerprint.viewport.height}, ${fingerprint.locale}, ${fingerprint.timezoneId}`);

        const context = await browser.newContext(buildContextOptions(fingerprint));
        try {
            await context.addInitScript(maskAutomationMarkers, options.stealth);
            const page = await context.newPage();
            page.setDefaultTimeout(options.navigationTimeoutMs);
            return { page, close: () => context.close() };
        } catch (error) {
            await context.close();
            throw error;
        }
    };
}
