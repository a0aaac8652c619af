/**
 * Coordinate Conversions - apply a calibration to move a point between spaces
 *
 *   physical = logical * scale + offset
 *   logical  = (physical - offset) / scale
 *
 * Both spaces are discrete pixel grids, so results are rounded half away from zero.
 */

import { CoordinateSpace } from '../../../types/calibration'
import type { CalibrationTransform, PixelPoint } from '../../../types/calibration'
import { CalibrationError, CalibrationErrorCode } from '../../calibration/errors'
import { roundHalfAwayFromZero } from '../math'
import type { LogicalPoint, PhysicalPoint } from './types'
import { logicalPoint, physicalPoint, rawPoint } from './types'

function assertUsableTransform(transform: CalibrationTransform): void {
    const scales = [transform.scaleX, transform.scaleY]
    if (scales.some(scale => !Number.isFinite(scale) || scale <= 0)) {
        throw new CalibrationError(
            CalibrationErrorCode.DegenerateEstimate,
            `Calibration scale must be positive (got ${transform.scaleX}, ${transform.scaleY})`
        )
    }
    if (!Number.isFinite(transform.offsetX) || !Number.isFinite(transform.offsetY)) {
        throw new CalibrationError(
            CalibrationErrorCode.DegenerateEstimate,
            `Calibration offset must be finite (got ${transform.offsetX}, ${transform.offsetY})`
        )
    }
}

function assertFinitePoint(point: PixelPoint): void {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
        throw new CalibrationError(
            CalibrationErrorCode.InvalidRequest,
            `Coordinates must be finite numbers (got ${point.x}, ${point.y})`
        )
    }
}

/**
 * Convert a logical point to physical pixels.
 */
export function logicalToPhysical(point: LogicalPoint, transform: CalibrationTransform): PhysicalPoint {
    assertUsableTransform(transform)
    return physicalPoint(
        roundHalfAwayFromZero(point.x * transform.scaleX + transform.offsetX),
        roundHalfAwayFromZero(point.y * transform.scaleY + transform.offsetY)
    )
}

/**
 * Convert a physical point to logical units.
 */
export function physicalToLogical(point: PhysicalPoint, transform: CalibrationTransform): LogicalPoint {
    assertUsableTransform(transform)
    return logicalPoint(
        roundHalfAwayFromZero((point.x - transform.offsetX) / transform.scaleX),
        roundHalfAwayFromZero((point.y - transform.offsetY) / transform.scaleY)
    )
}

/**
 * Convert raw (unbranded) coordinates between two named spaces.
 *
 * Same-space requests are still validated against the calibration and
 * return the input unchanged.
 */
export function convertPoint(
    point: PixelPoint,
    from: CoordinateSpace,
    to: CoordinateSpace,
    transform: CalibrationTransform
): PixelPoint {
    assertFinitePoint(point)
    assertUsableTransform(transform)

    if (from === to) {
        return { x: point.x, y: point.y }
    }

    if (from === CoordinateSpace.Logical) {
        return rawPoint(logicalToPhysical(logicalPoint(point.x, point.y), transform))
    }
    return rawPoint(physicalToLogical(physicalPoint(point.x, point.y), transform))
}
