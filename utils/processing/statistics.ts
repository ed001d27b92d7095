/**
 * Descriptive statistics over plain number arrays.
 * Every function expects a non-empty input unless stated otherwise.
 */
export class StatisticsUtils {
    public static mean(values: number[]): number {
        this.requireValues(values, 'mean');
        return values.reduce((sum, value) => sum + value, 0) / values.length;
    }

    /**
     * Quantile with linear interpolation between closest ranks
     * @param q - 0..1
     */
    public static quantile(values: number[], q: number): number {
        this.requireValues(values, 'quantile');
        if (q < 0 || q > 1) {
            throw new RangeError(`Quantile must be within [0, 1], got ${q}`);
        }
        const sorted = [...values].sort((a, b) => a - b);
        const position = (sorted.length - 1) * q;
        const lower = Math.floor(position);
        const upper = Math.ceil(position);
        return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
    }

    public static median(values: number[]): number {
        return this.quantile(values, 0.5);
    }

    /**
     * Symmetric trimmed mean: drops floor(proportion * n) values at each end.
     * Below `minSamples` values the plain mean is returned.
     */
    public static trimmedMean(values: number[], proportion: number = 0.1, minSamples: number = 5): number {
        this.requireValues(values, 'trimmedMean');
        if (values.length < minSamples) {
            return this.mean(values);
        }
        const cut = Math.floor(proportion * values.length);
        const sorted = [...values].sort((a, b) => a - b);
        return this.mean(sorted.slice(cut, sorted.length - cut));
    }

    /**
     * Sample standard deviation (n - 1 denominator); null below two values
     */
    public static sampleStdDev(values: number[]): number | null {
        if (values.length < 2) return null;
        const avg = this.mean(values);
        const squared = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
        return Math.sqrt(squared / (values.length - 1));
    }

    /**
     * Tukey fences [Q1 - k*IQR, Q3 + k*IQR]
     */
    public static iqrBounds(values: number[], k: number = 1.5): { lower: number; upper: number } {
        const q1 = this.quantile(values, 0.25);
        const q3 = this.quantile(values, 0.75);
        const iqr = q3 - q1;
        return { lower: q1 - k * iqr, upper: q3 + k * iqr };
    }

    public static round(value: number, decimals: number = 2): number {
        const factor = 10 ** decimals;
        return Math.round(value * factor) / factor;
    }

    private static requireValues(values: number[], operation: string): void {
        if (values.length === 0) {
            throw new RangeError(`${operation} of an empty series`);
        }
    }
}
