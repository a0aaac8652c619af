/**
 * Verification Tracker - calibration lifecycle as an explicit state machine.
 *
 *   uncalibrated --calibrate--> calibrated --verifySucceeded--> verified
 *   any calibration --calibrate--> calibrated (a fresh calibration is never verified)
 *
 * Staleness is derived from computedAt and never blocks conversion.
 */

import { produce } from 'immer'
import { differenceInMilliseconds, isValid, parseISO } from 'date-fns'
import { CalibrationStatus } from '../../types/calibration'
import type { CalibrationPoint, CalibrationState, ScaleEstimate } from '../../types/calibration'
import { notCalibrated } from './errors'

export enum CalibrationEvent {
  Calibrate = 'calibrate',
  VerifySucceeded = 'verifySucceeded',
  VerifyFailed = 'verifyFailed'
}

type TransitionTable = Readonly<Record<CalibrationStatus, Readonly<Record<CalibrationEvent, CalibrationStatus | null>>>>

// null = event not allowed in that state
export const TRANSITIONS: TransitionTable = {
  [CalibrationStatus.Uncalibrated]: {
    [CalibrationEvent.Calibrate]: CalibrationStatus.Calibrated,
    [CalibrationEvent.VerifySucceeded]: null,
    [CalibrationEvent.VerifyFailed]: null
  },
  [CalibrationStatus.Calibrated]: {
    [CalibrationEvent.Calibrate]: CalibrationStatus.Calibrated,
    [CalibrationEvent.VerifySucceeded]: CalibrationStatus.Verified,
    [CalibrationEvent.VerifyFailed]: CalibrationStatus.Calibrated
  },
  [CalibrationStatus.Verified]: {
    [CalibrationEvent.Calibrate]: CalibrationStatus.Calibrated,
    [CalibrationEvent.VerifySucceeded]: CalibrationStatus.Verified,
    // A missed landing check withdraws an earlier verification
    [CalibrationEvent.VerifyFailed]: CalibrationStatus.Calibrated
  }
}

export const DEFAULT_STALENESS_DAYS = 7
export const DAY_MS = 24 * 60 * 60 * 1000

export function nextStatus(status: CalibrationStatus, event: CalibrationEvent): CalibrationStatus {
  const next = TRANSITIONS[status][event]
  if (next === null) {
    throw notCalibrated()
  }
  return next
}

export function statusOf(state: CalibrationState | null): CalibrationStatus {
  if (!state) return CalibrationStatus.Uncalibrated
  return state.verified ? CalibrationStatus.Verified : CalibrationStatus.Calibrated
}

/**
 * Build the record produced by a successful calibrate call. Always unverified.
 */
export function startCalibration(
  estimate: ScaleEstimate,
  points: readonly CalibrationPoint[],
  now: Date,
  previous: CalibrationState | null
): CalibrationState {
  nextStatus(statusOf(previous), CalibrationEvent.Calibrate)

  return {
    scaleX: estimate.scaleX,
    scaleY: estimate.scaleY,
    offsetX: estimate.offsetX,
    offsetY: estimate.offsetY,
    consistencyWarning: estimate.consistencyWarning,
    spreadX: estimate.spreadX,
    spreadY: estimate.spreadY,
    computedAt: now.toISOString(),
    verified: false,
    sampleCount: points.length,
    points: points.map(point => ({ ...point }))
  }
}

/**
 * Apply a verification attempt. Returns the same object when nothing changes.
 */
export function applyVerification(
  state: CalibrationState | null,
  success: boolean,
  now: Date,
  notes?: string
): CalibrationState {
  if (!state) throw notCalibrated()

  const event = success ? CalibrationEvent.VerifySucceeded : CalibrationEvent.VerifyFailed
  const next = nextStatus(statusOf(state), event)

  return produce(state, draft => {
    if (next === CalibrationStatus.Verified) {
      draft.verified = true
      draft.verifiedAt = now.toISOString()
    } else if (draft.verified) {
      draft.verified = false
      delete draft.verifiedAt
    }

    if (notes !== undefined && notes !== draft.verificationNotes) {
      draft.verificationNotes = notes
    }
  })
}

export function calibrationAgeMs(state: CalibrationState, now: Date): number {
  const computedAt = parseISO(state.computedAt)
  if (!isValid(computedAt)) return Number.POSITIVE_INFINITY
  return differenceInMilliseconds(now, computedAt)
}

export function isStale(state: CalibrationState, now: Date, thresholdMs: number = DEFAULT_STALENESS_DAYS * DAY_MS): boolean {
  return calibrationAgeMs(state, now) > thresholdMs
}
