import { describe, it, expect } from '@jest/globals'
import {
  applyVerification,
  CalibrationEvent,
  DAY_MS,
  isStale,
  nextStatus,
  startCalibration,
  statusOf,
  TRANSITIONS
} from '@/lib/calibration/verification-tracker'
import { CalibrationErrorCode } from '@/lib/calibration/errors'
import { CalibrationStatus } from '@/types/calibration'
import { catchCalibrationError, EXACT_150_POINTS, makeState } from '../helpers/calibration-test-helpers'

const NOW = new Date('2026-01-02T03:04:05.000Z')

describe('verification tracker', () => {
  describe('transition table', () => {
    it('only enters calibrated through calibrate', () => {
      expect(TRANSITIONS[CalibrationStatus.Uncalibrated]).toEqual({
        [CalibrationEvent.Calibrate]: CalibrationStatus.Calibrated,
        [CalibrationEvent.VerifySucceeded]: null,
        [CalibrationEvent.VerifyFailed]: null
      })
    })

    it('demotes any calibration to unverified on calibrate', () => {
      expect(nextStatus(CalibrationStatus.Calibrated, CalibrationEvent.Calibrate)).toBe(CalibrationStatus.Calibrated)
      expect(nextStatus(CalibrationStatus.Verified, CalibrationEvent.Calibrate)).toBe(CalibrationStatus.Calibrated)
    })

    it('verifies only on success', () => {
      expect(nextStatus(CalibrationStatus.Calibrated, CalibrationEvent.VerifySucceeded)).toBe(CalibrationStatus.Verified)
      expect(nextStatus(CalibrationStatus.Calibrated, CalibrationEvent.VerifyFailed)).toBe(CalibrationStatus.Calibrated)
    })

    it('rejects verification before any calibration', () => {
      const error = catchCalibrationError(() => nextStatus(CalibrationStatus.Uncalibrated, CalibrationEvent.VerifySucceeded))
      expect(error.code).toBe(CalibrationErrorCode.NotCalibrated)
    })
  })

  describe('statusOf', () => {
    it('derives the status from the record', () => {
      expect(statusOf(null)).toBe(CalibrationStatus.Uncalibrated)
      expect(statusOf(makeState())).toBe(CalibrationStatus.Calibrated)
      expect(statusOf(makeState({ verified: true, verifiedAt: NOW.toISOString() }))).toBe(CalibrationStatus.Verified)
    })
  })

  describe('startCalibration', () => {
    it('builds an unverified record from the estimate', () => {
      const state = startCalibration(
        { scaleX: 1.5, scaleY: 1.5, offsetX: 0, offsetY: 0, consistencyWarning: false, spreadX: 0, spreadY: 0 },
        EXACT_150_POINTS,
        NOW,
        null
      )

      expect(state).toEqual({
        scaleX: 1.5,
        scaleY: 1.5,
        offsetX: 0,
        offsetY: 0,
        consistencyWarning: false,
        spreadX: 0,
        spreadY: 0,
        computedAt: '2026-01-02T03:04:05.000Z',
        verified: false,
        sampleCount: 2,
        points: EXACT_150_POINTS
      })
      expect(state.points).not.toBe(EXACT_150_POINTS)
    })

    it('drops an earlier verification', () => {
      const previous = makeState({ verified: true, verifiedAt: '2026-01-01T00:00:00.000Z' })
      const state = startCalibration(previous, EXACT_150_POINTS, NOW, previous)

      expect(state.verified).toBe(false)
      expect('verifiedAt' in state).toBe(false)
    })
  })

  describe('applyVerification', () => {
    it('marks a calibration verified on success', () => {
      const state = makeState()
      const verified = applyVerification(state, true, NOW, 'landed on minimize')

      expect(verified.verified).toBe(true)
      expect(verified.verifiedAt).toBe('2026-01-02T03:04:05.000Z')
      expect(verified.verificationNotes).toBe('landed on minimize')
      expect(state.verified).toBe(false)
      expect(state.verifiedAt).toBeUndefined()
    })

    it('leaves an unverified calibration untouched on failure', () => {
      const state = makeState()
      expect(applyVerification(state, false, NOW)).toBe(state)
    })

    it('withdraws an earlier verification on failure', () => {
      const state = makeState({ verified: true, verifiedAt: '2026-01-01T00:00:00.000Z' })
      const failed = applyVerification(state, false, NOW, 'cursor landed 40px left')

      expect(failed.verified).toBe(false)
      expect('verifiedAt' in failed).toBe(false)
      expect(failed.verificationNotes).toBe('cursor landed 40px left')
      expect(statusOf(failed)).toBe(CalibrationStatus.Calibrated)
    })

    it('fails without a calibration', () => {
      const error = catchCalibrationError(() => applyVerification(null, true, NOW))
      expect(error.code).toBe(CalibrationErrorCode.NotCalibrated)
    })
  })

  describe('isStale', () => {
    const state = makeState({ computedAt: '2026-01-01T00:00:00.000Z' })

    it('is fresh at exactly the threshold', () => {
      expect(isStale(state, new Date('2026-01-08T00:00:00.000Z'), 7 * DAY_MS)).toBe(false)
    })

    it('is stale past the threshold', () => {
      expect(isStale(state, new Date('2026-01-08T00:00:00.001Z'), 7 * DAY_MS)).toBe(true)
    })

    it('uses a 7 day threshold by default', () => {
      expect(isStale(state, new Date('2026-01-07T23:00:00.000Z'))).toBe(false)
      expect(isStale(state, new Date('2026-01-09T00:00:00.000Z'))).toBe(true)
    })

    it('treats an unreadable timestamp as stale', () => {
      expect(isStale(makeState({ computedAt: 'not a date' }), NOW)).toBe(true)
    })
  })
})
