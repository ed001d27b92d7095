import { CardScope, FlightRecord, RouteConfig } from './fareTypes';
import { FieldLocatorChain, FieldResolution, parseFare, summarizeAttempts, textValue } from './fieldLocators';
import { FIELD_STRATEGIES } from './selectors';

export interface ExtractorChains {
    airline: FieldLocatorChain<string>;
    flightNumber: FieldLocatorChain<string>;
    departureTime: FieldLocatorChain<string>;
    arrivalTime: FieldLocatorChain<string>;
    layover: FieldLocatorChain<string>;
    totalFare: FieldLocatorChain<number>;
}

export function createDefaultChains(): ExtractorChains {
    return {
        airline: new FieldLocatorChain('airline', FIELD_STRATEGIES.airline, textValue),
        flightNumber: new FieldLocatorChain('flight number', FIELD_STRATEGIES.flightNumber, textValue),
        departureTime: new FieldLocatorChain('departure time', FIELD_STRATEGIES.departureTime, textValue),
        arrivalTime: new FieldLocatorChain('arrival time', FIELD_STRATEGIES.arrivalTime, textValue),
        layover: new FieldLocatorChain('layover', FIELD_STRATEGIES.layover, textValue),
        totalFare: new FieldLocatorChain('fare', FIELD_STRATEGIES.totalFare, parseFare)
    };
}

export const DEFAULT_LAYOVER = 'non-stop';
export const UNKNOWN_TIME = 'Unknown';

/**
 * Turns one rendered result card into a FlightRecord.
 * Failures are per card: a broken card is logged and skipped, never thrown.
 */
export class RecordExtractor {
    private readonly route: RouteConfig;
    private readonly chains: ExtractorChains;
    private readonly fieldTimeoutMs: number;

    constructor(route: RouteConfig, fieldTimeoutMs: number = 1000, chains: ExtractorChains = createDefaultChains()) {
        this.route = route;
        this.fieldTimeoutMs = fieldTimeoutMs;
        this.chains = chains;
    }

    /**
     * @param card - Card container (Playwright Locator or anything with the same shape)
     * @param date - ISO search date the card belongs to
     * @param position - 1-based card position, used for the placeholder flight number
     * @returns A valid record, or null when airline or fare could not be read
     */
    public async extract(card: CardScope, date: string, position: number): Promise<FlightRecord | null> {
        try {
            const airline = await this.chains.airline.resolve(card, this.fieldTimeoutMs);
            const totalFare = await this.chains.totalFare.resolve(card, this.fieldTimeoutMs);

            if (airline.value === null || totalFare.value === null) {
                this.reportMissing(position, [airline, totalFare]);
                return null;
            }

            const flightNumber = await this.chains.flightNumber.resolve(card, this.fieldTimeoutMs);
            const departureTime = await this.chains.departureTime.resolve(card, this.fieldTimeoutMs);
            const arrivalTime = await this.chains.arrivalTime.resolve(card, this.fieldTimeoutMs);
            const layover = await this.chains.layover.resolve(card, this.fieldTimeoutMs);

            const record: FlightRecord = {
                flightNumber: flightNumber.value ?? `Flight-${position}`,
                airlineName: airline.value,
                sourceCity: this.route.sourceCity,
                destinationCity: this.route.destinationCity,
                sourceAirport: this.route.sourceAirport,
                destinationAirport: this.route.destinationAirport,
                date,
                departureTime: departureTime.value ?? UNKNOWN_TIME,
                arrivalTime: arrivalTime.value ?? UNKNOWN_TIME,
                layover: layover.value ?? DEFAULT_LAYOVER,
                totalFare: totalFare.value,
                baseFare: null,
                tax: null
            };

            console.log(`    ✅ ${flightNumber.value ?? 'N/A'} | ${record.airlineName} | ${departureTime.value ?? 'N/A'}-${arrivalTime.value ?? 'N/A'} | ₹${record.totalFare}`);
            return record;
        } catch (error) {
            console.log(`    ⚠️ Could not extract flight ${position}: ${error instanceof Error ? error.message : String(error)}`);
            return null;
        }
    }

    private reportMissing(position: number, resolutions: FieldResolution<unknown>[]): void {
        const missing = resolutions
            .filter(r => r.value === null)
            .map(r => `${r.field} [${summarizeAttempts(r)}]`);
        console.log(`    ⚠️ Missing essential data for flight ${position}: ${missing.join('; ')}`);
    }
}
