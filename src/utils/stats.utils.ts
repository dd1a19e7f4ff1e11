/**
 * Numeric Aggregation Utilities
 *
 * Every helper returns undefined for an empty input instead of NaN.
 */

export function sum(values: readonly number[]): number {
    return values.reduce((s, x) => s + x, 0);
}

export function mean(values: readonly number[]): number | undefined {
    return values.length > 0 ? sum(values) / values.length : undefined;
}

/**
 * Quantile of an ascending array by linear interpolation between closest ranks
 */
export function quantileSorted(sorted: readonly number[], q: number): number | undefined {
    if (sorted.length === 0) return undefined;
    const position = (sorted.length - 1) * q;
    const lower = Math.floor(position);
    const upper = Math.ceil(position);
    return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number | undefined {
    return quantileSorted([...values].sort((a, b) => a - b), 0.5);
}

/**
 * Keeps the values that are actual measurements
 */
export function present(values: ReadonlyArray<number | null | undefined>): number[] {
    return values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
}

/**
 * Increments a counter keyed by string
 */
export function increment(counter: Map<string, number>, key: string, by = 1): void {
    counter.set(key, (counter.get(key) ?? 0) + by);
}

/**
 * Starts a counter with the given keys at zero, in order
 */
export function zeroCounter(keys: readonly string[] = []): Map<string, number> {
    return new Map(keys.map(key => [key, 0]));
}

/**
 * Plain record from entries keyed by input data. `Object.fromEntries` defines
 * own properties, so names such as `__proto__` or `constructor` stay ordinary keys.
 */
export function toRecord<V>(entries: Iterable<readonly [string, V]>): Record<string, V> {
    return Object.fromEntries(entries);
}
