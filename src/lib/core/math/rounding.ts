/**
 * Pixel rounding
 */

/**
 * Round to the nearest integer, with halves rounded away from zero
 * (2.5 -> 3, -2.5 -> -3). Never returns -0.
 *
 * Math.round rounds halves towards +Infinity, which would shift negative
 * virtual-desktop coordinates by one pixel.
 */
export function roundHalfAwayFromZero(value: number): number {
    const rounded = Math.sign(value) * Math.round(Math.abs(value))
    return rounded === 0 ? 0 : rounded
}
