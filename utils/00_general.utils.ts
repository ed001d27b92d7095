export type RandomSource = () => number;
export type Sleeper = (ms: number) => Promise<void>;

/**
 * Timing helpers shared by every phase.
 * All pacing goes through here so tests can swap in a recording sleeper.
 */
export class GeneralUtils {
    public static async sleep(ms: number) {
        return new Promise<void>(resolve => setTimeout(resolve, ms));
    }

    /**
     * Uniform random value in [min, max]
     */
    public static randomBetween(min: number, max: number, random: RandomSource = Math.random): number {
        if (max < min) {
            throw new RangeError(`Invalid delay window: min ${min} > max ${max}`);
        }
        return min + random() * (max - min);
    }

    /**
     * Sleeps a uniform random duration in [minMs, maxMs] and returns the chosen duration
     */
    public static async randomDelay(
        minMs: number,
        maxMs: number,
        label: string,
        sleep: Sleeper = GeneralUtils.sleep,
        random: RandomSource = Math.random
    ): Promise<number> {
        const delayMs = Math.round(GeneralUtils.randomBetween(minMs, maxMs, random));
        console.log(`  😴 ${label}: ${(delayMs / 1000).toFixed(1)}s`);
        await sleep(delayMs);
        return delayMs;
    }
}
