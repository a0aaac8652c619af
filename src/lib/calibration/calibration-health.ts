/**
 * Calibration health - summary read by environment diagnostics.
 * Checks run in order: missing, stale, unverified, inconsistent, ok.
 */

import { differenceInDays, formatDistanceStrict, parseISO } from 'date-fns'
import type { CalibrationHealth, CalibrationState } from '../../types/calibration'
import { DAY_MS, DEFAULT_STALENESS_DAYS, isStale } from './verification-tracker'

export function assessCalibrationHealth(
  state: CalibrationState | null,
  now: Date,
  thresholdMs: number = DEFAULT_STALENESS_DAYS * DAY_MS
): CalibrationHealth {
  if (!state) {
    return {
      status: 'missing',
      message: "No calibration data. Run the 'calibrate' operation.",
      actionNeeded: true
    }
  }

  const scales = { scaleX: state.scaleX, scaleY: state.scaleY }

  if (isStale(state, now, thresholdMs)) {
    const computedAt = parseISO(state.computedAt)
    const ageDays = differenceInDays(now, computedAt)
    const age = Number.isNaN(ageDays) ? 'of unknown age' : `${formatDistanceStrict(computedAt, now)} old`
    return {
      status: 'stale',
      message: `Calibration is ${age}. Consider re-calibrating.`,
      actionNeeded: true,
      ageDays: Number.isNaN(ageDays) ? undefined : ageDays,
      ...scales
    }
  }

  if (!state.verified) {
    return {
      status: 'unverified',
      message: 'Calibration computed but not verified. Move to a known landmark and report the result.',
      actionNeeded: true,
      ...scales
    }
  }

  if (state.consistencyWarning) {
    return {
      status: 'inconsistent',
      message: `Calibration points disagree (spread: x=${state.spreadX.toFixed(4)}, y=${state.spreadY.toFixed(4)}). Re-calibrate with better points.`,
      actionNeeded: true,
      ...scales
    }
  }

  return {
    status: 'ok',
    message: `Calibration valid. Scale: ${state.scaleX}x / ${state.scaleY}y`,
    actionNeeded: false,
    ...scales
  }
}
