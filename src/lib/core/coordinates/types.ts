/**
 * Coordinate Types - Branded types for compile-time coordinate space safety
 *
 * This module provides branded types to prevent mixing coordinate spaces:
 * - PhysicalPoint: device pixels, as consumed by pointer/input APIs
 * - LogicalPoint: DPI-scaled units, as reported by window/layout APIs
 *
 * Usage:
 *   const logical = logicalPoint(1332, 740)
 *   const physical = logicalToPhysical(logical, calibration)
 *   // TypeScript will error if you pass PhysicalPoint where LogicalPoint is expected
 */

import type { PixelPoint } from '../../../types/calibration'

declare const PhysicalBrand: unique symbol
declare const LogicalBrand: unique symbol

/**
 * Point in device pixel space.
 */
export type PhysicalPoint = {
    readonly x: number
    readonly y: number
    readonly [PhysicalBrand]: never
}

/**
 * Point in DPI-scaled logical space.
 */
export type LogicalPoint = {
    readonly x: number
    readonly y: number
    readonly [LogicalBrand]: never
}

export function physicalPoint(x: number, y: number): PhysicalPoint {
    return { x, y } as unknown as PhysicalPoint
}

export function logicalPoint(x: number, y: number): LogicalPoint {
    return { x, y } as unknown as LogicalPoint
}

/**
 * Extract raw coordinates from a branded point.
 */
export function rawPoint(point: PhysicalPoint | LogicalPoint): PixelPoint {
    return { x: point.x, y: point.y }
}
