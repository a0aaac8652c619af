/**
 * Calibration Service - the public calibration operations.
 *
 * Every operation resolves to an OperationResult; failures come back as
 * `{ success: false, error: { code, message } }` and are never thrown.
 */

import { CalibrationStatus, ConsistencyPolicy } from '../../types/calibration'
import type {
  CalibrateSummary,
  CalibrationHealth,
  CalibrationPoint,
  CalibrationSnapshot,
  CalibrationState,
  ConversionRequest,
  ConversionResult,
  VerificationSummary
} from '../../types/calibration'
import type { CalibrationStore } from '../storage/calibration-store'
import { convertPoint } from '../core/coordinates'
import { createLogger } from '../utils/logger'
import type { CalibrationLogger } from '../utils/logger'
import { CalibrationErrorCode, fail, isCalibrationError, notCalibrated, ok } from './errors'
import type { OperationResult } from './errors'
import { estimateScale } from './scale-estimator'
import { applyVerification, DAY_MS, DEFAULT_STALENESS_DAYS, isStale, startCalibration, statusOf } from './verification-tracker'
import { assessCalibrationHealth } from './calibration-health'
import { LANDMARKS } from './landmarks'
import type { Landmark } from './landmarks'

export interface CalibrationServiceOptions {
  stalenessThresholdMs?: number
  consistencyPolicy?: ConsistencyPolicy
  now?: () => Date
  logger?: CalibrationLogger
}

export class CalibrationService {
  private readonly stalenessThresholdMs: number
  private readonly consistencyPolicy: ConsistencyPolicy
  private readonly now: () => Date
  private readonly logger: CalibrationLogger

  constructor(private readonly store: CalibrationStore, options: CalibrationServiceOptions = {}) {
    this.stalenessThresholdMs = options.stalenessThresholdMs ?? DEFAULT_STALENESS_DAYS * DAY_MS
    this.consistencyPolicy = options.consistencyPolicy ?? ConsistencyPolicy.Advisory
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? createLogger('CalibrationService')
  }

  /**
   * Estimate scale/offset from the points and persist a fresh, unverified calibration.
   */
  async calibrate(points: readonly CalibrationPoint[]): Promise<OperationResult<CalibrateSummary>> {
    return this.run('calibrate', async () => {
      const estimate = estimateScale(points, { consistencyPolicy: this.consistencyPolicy })
      const now = this.now()
      const state = await this.store.update(current => startCalibration(estimate, points, now, current), {
        replaceCorrupt: true
      })

      if (state.consistencyWarning) {
        this.logger.warn(
          `Calibration points disagree (spread x=${state.spreadX.toFixed(4)}, y=${state.spreadY.toFixed(4)}); saved with consistency warning`
        )
      }
      this.logger.info(`Calibrated from ${state.sampleCount} points: scale ${state.scaleX} x ${state.scaleY}`)

      return {
        status: CalibrationStatus.Calibrated,
        scaleX: state.scaleX,
        scaleY: state.scaleY,
        offsetX: state.offsetX,
        offsetY: state.offsetY,
        consistencyWarning: state.consistencyWarning,
        spreadX: state.spreadX,
        spreadY: state.spreadY,
        sampleCount: state.sampleCount,
        computedAt: state.computedAt
      }
    })
  }

  /**
   * Record whether a move to a known landmark landed where expected.
   */
  async calibrateVerify(success: boolean, notes?: string): Promise<OperationResult<VerificationSummary>> {
    return this.run('calibrate_verify', async () => {
      const now = this.now()
      const state = await this.store.updateExisting(current => applyVerification(current, success, now, notes))
      const status = statusOf(state)

      const outcome = success ? 'verified' : 'failed verification'
      const message = `Calibration ${outcome}.` + (notes ? ` Notes: ${notes}` : '')
      this.logger.info(message)

      return {
        status,
        verified: state.verified,
        ...(state.verifiedAt !== undefined ? { verifiedAt: state.verifiedAt } : {}),
        scaleX: state.scaleX,
        scaleY: state.scaleY,
        message
      }
    })
  }

  async getCalibration(): Promise<OperationResult<CalibrationSnapshot>> {
    return this.run('get_calibration', async () => {
      const state = await this.requireState()
      return {
        state,
        status: statusOf(state),
        stale: isStale(state, this.now(), this.stalenessThresholdMs)
      }
    })
  }

  /**
   * Map a point between physical and logical space. Staleness never blocks this.
   */
  async convertCoordinates(request: ConversionRequest): Promise<OperationResult<ConversionResult>> {
    return this.run('convert_coordinates', async () => {
      const state = await this.requireState()
      const converted = convertPoint({ x: request.x, y: request.y }, request.from, request.to, state)
      return {
        x: converted.x,
        y: converted.y,
        from: request.from,
        to: request.to,
        source: { x: request.x, y: request.y }
      }
    })
  }

  async isStale(now: Date = this.now()): Promise<OperationResult<boolean>> {
    return this.run('is_stale', async () => {
      const state = await this.requireState()
      return isStale(state, now, this.stalenessThresholdMs)
    })
  }

  /**
   * Health summary for environment diagnostics. A missing calibration is a
   * report, not an error; an unreadable record is.
   */
  async checkHealth(now: Date = this.now()): Promise<OperationResult<CalibrationHealth>> {
    return this.run('calibration_health', async () => {
      const state = await this.store.load()
      return assessCalibrationHealth(state, now, this.stalenessThresholdMs)
    })
  }

  listLandmarks(): Landmark[] {
    return Object.values(LANDMARKS)
  }

  private async requireState(): Promise<CalibrationState> {
    const state = await this.store.load()
    if (!state) throw notCalibrated()
    return state
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return ok(await fn())
    } catch (error) {
      if (!isCalibrationError(error)) {
        this.logger.error(`${operation} failed unexpectedly:`, error)
        throw error
      }

      if (error.code === CalibrationErrorCode.PersistenceIOError || error.code === CalibrationErrorCode.CorruptState) {
        this.logger.error(`${operation}: ${error.message}`)
      } else {
        this.logger.debug(`${operation}: ${error.code} - ${error.message}`)
      }
      return fail(error)
    }
  }
}
