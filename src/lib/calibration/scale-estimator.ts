/**
 * Scale Estimator - derives scale and offset from paired physical/logical observations.
 *
 * Each axis is estimated independently:
 *   ratio_i  = physical_i / logical_i
 *   scale    = median(ratio_i)
 *   offset_i = physical_i - scale * logical_i
 *   offset   = median(offset_i)
 *
 * The median keeps one misread landmark from dragging the estimate.
 * Offset is ~0 on a single monitor and non-zero when the points sit on a
 * secondary monitor whose virtual-desktop origin is translated.
 */

import { median, maxRelativeDeviation } from '../core/math'
import { ConsistencyPolicy } from '../../types/calibration'
import type { CalibrationPoint, ScaleEstimate } from '../../types/calibration'
import { CalibrationError, CalibrationErrorCode } from './errors'

export const MIN_CALIBRATION_POINTS = 2

/** Max relative deviation of a per-point ratio from the median before the run is flagged. */
export const CONSISTENCY_THRESHOLD = 0.02

// Absorbs binary floating-point noise so a deviation of exactly 2% stays un-flagged
const CONSISTENCY_EPSILON = 1e-9

export interface EstimateOptions {
  consistencyPolicy?: ConsistencyPolicy
  consistencyThreshold?: number
}

type Axis = 'x' | 'y'

interface AxisEstimate {
  scale: number
  offset: number
  spread: number
}

function describePoint(point: CalibrationPoint, index: number): string {
  return point.label ? `point ${index} (${point.label})` : `point ${index}`
}

function assertUsablePoint(point: CalibrationPoint, index: number): void {
  const coords: Array<[string, number]> = [
    ['physical_x', point.physicalX],
    ['physical_y', point.physicalY],
    ['logical_x', point.logicalX],
    ['logical_y', point.logicalY]
  ]
  for (const [name, value] of coords) {
    if (!Number.isFinite(value)) {
      throw new CalibrationError(
        CalibrationErrorCode.InvalidPoint,
        `${describePoint(point, index)}: ${name} must be a finite number`
      )
    }
  }

  if (point.logicalX <= 0 || point.logicalY <= 0) {
    throw new CalibrationError(
      CalibrationErrorCode.InvalidPoint,
      `${describePoint(point, index)}: logical coordinates must be positive (got ${point.logicalX}, ${point.logicalY})`
    )
  }
}

function estimateAxis(points: readonly CalibrationPoint[], axis: Axis): AxisEstimate {
  const physical = (p: CalibrationPoint) => (axis === 'x' ? p.physicalX : p.physicalY)
  const logical = (p: CalibrationPoint) => (axis === 'x' ? p.logicalX : p.logicalY)

  const ratios = points.map(p => physical(p) / logical(p))
  const scale = median(ratios)

  if (!Number.isFinite(scale) || scale <= 0) {
    throw new CalibrationError(
      CalibrationErrorCode.DegenerateEstimate,
      `Computed ${axis} scale ${scale} is not positive`
    )
  }

  const offsets = points.map(p => physical(p) - scale * logical(p))

  return {
    scale,
    offset: median(offsets),
    spread: maxRelativeDeviation(ratios, scale)
  }
}

/**
 * Estimate scale and offset from two or more calibration points.
 * Pure: never touches persisted state.
 */
export function estimateScale(
  points: readonly CalibrationPoint[],
  options: EstimateOptions = {}
): ScaleEstimate {
  if (points.length < MIN_CALIBRATION_POINTS) {
    throw new CalibrationError(
      CalibrationErrorCode.InsufficientPoints,
      `Need at least ${MIN_CALIBRATION_POINTS} calibration points, got ${points.length}`
    )
  }

  points.forEach(assertUsablePoint)

  const x = estimateAxis(points, 'x')
  const y = estimateAxis(points, 'y')

  const threshold = options.consistencyThreshold ?? CONSISTENCY_THRESHOLD
  const consistencyWarning = exceedsThreshold(x.spread, threshold) || exceedsThreshold(y.spread, threshold)

  if (consistencyWarning && options.consistencyPolicy === ConsistencyPolicy.Reject) {
    throw new CalibrationError(
      CalibrationErrorCode.InconsistentEstimate,
      `Calibration points disagree (spread x=${x.spread.toFixed(4)}, y=${y.spread.toFixed(4)}); re-measure the landmarks`
    )
  }

  return {
    scaleX: x.scale,
    scaleY: y.scale,
    offsetX: x.offset,
    offsetY: y.offset,
    consistencyWarning,
    spreadX: x.spread,
    spreadY: y.spread
  }
}

export function exceedsThreshold(spread: number, threshold: number = CONSISTENCY_THRESHOLD): boolean {
  return spread - threshold > CONSISTENCY_EPSILON
}
