/**
 * Calibration domain types
 *
 * Physical = device pixels (pointer/input APIs).
 * Logical  = DPI-scaled units (window/layout APIs, screen captures).
 * Per axis: physical = logical * scale + offset
 */

export enum CoordinateSpace {
  Physical = 'physical',
  Logical = 'logical'
}

export enum CalibrationStatus {
  Uncalibrated = 'uncalibrated',
  Calibrated = 'calibrated',
  Verified = 'verified'
}

export enum ConsistencyPolicy {
  // Inconsistent points still produce a calibration, flagged with a warning
  Advisory = 'advisory',
  Reject = 'reject'
}

export interface CalibrationPoint {
  readonly physicalX: number
  readonly physicalY: number
  readonly logicalX: number
  readonly logicalY: number
  readonly label?: string
}

/** The part of a calibration needed to map a point between spaces. */
export interface CalibrationTransform {
  readonly scaleX: number
  readonly scaleY: number
  readonly offsetX: number
  readonly offsetY: number
}

export interface ScaleEstimate extends CalibrationTransform {
  readonly consistencyWarning: boolean
  // Max relative deviation of a per-point ratio from the median, per axis
  readonly spreadX: number
  readonly spreadY: number
}

export interface CalibrationState extends ScaleEstimate {
  readonly computedAt: string
  readonly verified: boolean
  readonly verifiedAt?: string
  readonly verificationNotes?: string
  readonly sampleCount: number
  readonly points: readonly CalibrationPoint[]
}

export interface PixelPoint {
  readonly x: number
  readonly y: number
}

export interface ConversionRequest extends PixelPoint {
  readonly from: CoordinateSpace
  readonly to: CoordinateSpace
}

export interface ConversionResult extends PixelPoint {
  readonly from: CoordinateSpace
  readonly to: CoordinateSpace
  readonly source: PixelPoint
}

export interface CalibrateSummary extends ScaleEstimate {
  readonly status: CalibrationStatus
  readonly sampleCount: number
  readonly computedAt: string
}

export interface VerificationSummary {
  readonly status: CalibrationStatus
  readonly verified: boolean
  readonly verifiedAt?: string
  readonly scaleX: number
  readonly scaleY: number
  readonly message: string
}

export interface CalibrationSnapshot {
  readonly state: CalibrationState
  readonly status: CalibrationStatus
  readonly stale: boolean
}

export type CalibrationHealthStatus = 'missing' | 'stale' | 'unverified' | 'inconsistent' | 'ok'

export interface CalibrationHealth {
  status: CalibrationHealthStatus
  message: string
  actionNeeded: boolean
  scaleX?: number
  scaleY?: number
  ageDays?: number
}
