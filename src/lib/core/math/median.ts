/**
 * Median utilities - used where a single outlier must not drag the estimate
 */

/**
 * Median of a list of numbers. For an even count, the mean of the two middle values.
 * Returns NaN for an empty list.
 */
export function median(values: readonly number[]): number {
    if (values.length === 0) return NaN

    const sorted = [...values].sort((a, b) => a - b)
    const mid = Math.floor(sorted.length / 2)

    if (sorted.length % 2 === 1) {
        return sorted[mid]
    }
    return (sorted[mid - 1] + sorted[mid]) / 2
}

/**
 * Largest relative distance of any value from a reference value.
 * Returns 0 for an empty list or a zero reference.
 */
export function maxRelativeDeviation(values: readonly number[], reference: number): number {
    if (values.length === 0 || reference === 0) return 0

    let max = 0
    for (const value of values) {
        const deviation = Math.abs(value - reference) / Math.abs(reference)
        if (deviation > max) max = deviation
    }
    return max
}
