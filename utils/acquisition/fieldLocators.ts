import { CardScope } from './fareTypes';

/**
 * One named way of finding a field inside a card
 */
export interface LocatorStrategy {
    name: string;
    selector: string;
}

export type AttemptOutcome = 'matched' | 'missing' | 'empty' | 'unparsable' | 'error';

export interface LocatorAttempt {
    strategy: string;
    selector: string;
    outcome: AttemptOutcome;
    detail?: string;
}

export interface FieldResolution<T> {
    field: string;
    value: T | null;
    winner: string | null;              // Name of the strategy that produced the value
    attempts: LocatorAttempt[];         // Every strategy tried, in order
}

/**
 * Ordered chain of locator strategies for one field.
 * Strategies are evaluated in order and the first one that exists, has text
 * and parses wins; the rest are not touched.
 */
export class FieldLocatorChain<T> {
    readonly field: string;
    readonly strategies: readonly LocatorStrategy[];
    private readonly parse: (raw: string) => T | null;

    constructor(field: string, strategies: readonly LocatorStrategy[], parse: (raw: string) => T | null) {
        if (strategies.length === 0) {
            throw new Error(`Locator chain for "${field}" needs at least one strategy`);
        }
        this.field = field;
        this.strategies = strategies;
        this.parse = parse;
    }

    public async resolve(card: CardScope, timeoutMs: number): Promise<FieldResolution<T>> {
        const attempts: LocatorAttempt[] = [];

        for (const strategy of this.strategies) {
            const attempt: LocatorAttempt = { strategy: strategy.name, selector: strategy.selector, outcome: 'missing' };
            attempts.push(attempt);

            try {
                const element = card.locator(strategy.selector).first();
                if (await element.count() === 0) continue;

                const raw = (await element.innerText({ timeout: timeoutMs })).trim();
                if (raw === '') {
                    attempt.outcome = 'empty';
                    continue;
                }

                const value = this.parse(raw);
                if (value === null) {
                    attempt.outcome = 'unparsable';
                    attempt.detail = raw;
                    continue;
                }

                attempt.outcome = 'matched';
                return { field: this.field, value, winner: strategy.name, attempts };
            } catch (error) {
                // Detached or slow element: this candidate failed, the next one may still work
                attempt.outcome = 'error';
                attempt.detail = error instanceof Error ? error.message.split('\n')[0] : String(error);
            }
        }

        return { field: this.field, value: null, winner: null, attempts };
    }
}

export function textValue(raw: string): string | null {
    const trimmed = raw.trim();
    return trimmed === '' ? null : trimmed;
}

/**
 * Strips every non-digit ("₹ 4,523" → 4523). No digits, or zero, is not a fare.
 */
export function parseFare(raw: string): number | null {
    const digits = raw.replace(/\D/g, '');
    if (digits === '') return null;
    const fare = parseInt(digits, 10);
    return Number.isSafeInteger(fare) && fare > 0 ? fare : null;
}

export function summarizeAttempts(resolution: FieldResolution<unknown>): string {
    return resolution.attempts
        .map(a => `${a.selector} → ${a.outcome}${a.detail ? ` ("${a.detail}")` : ''}`)
        .join(' | ');
}
