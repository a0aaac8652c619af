import { CalibrationStore } from '../src/lib/storage/calibration-store'
import { CalibrationService } from '../src/lib/calibration/calibration-service'
import type { CalibrationServiceOptions } from '../src/lib/calibration/calibration-service'
import { loadConfig } from './config'
import type { CalibrationConfig } from './config'

export { CalibrationService } from '../src/lib/calibration/calibration-service'
export { CalibrationStore } from '../src/lib/storage/calibration-store'
export { estimateScale, CONSISTENCY_THRESHOLD, MIN_CALIBRATION_POINTS } from '../src/lib/calibration/scale-estimator'
export { convertPoint, logicalToPhysical, physicalToLogical, logicalPoint, physicalPoint } from '../src/lib/core/coordinates'
export { isStale, statusOf, TRANSITIONS, CalibrationEvent } from '../src/lib/calibration/verification-tracker'
export { assessCalibrationHealth } from '../src/lib/calibration/calibration-health'
export { parseCalibrateArgs, parseVerifyArgs, parseConvertArgs } from '../src/lib/calibration/schemas'
export { CalibrationError, CalibrationErrorCode } from '../src/lib/calibration/errors'
export type { OperationResult, OperationError } from '../src/lib/calibration/errors'
export { LANDMARKS, describeLandmark } from '../src/lib/calibration/landmarks'
export * from '../src/types'
export { loadConfig } from './config'
export type { CalibrationConfig } from './config'

/**
 * Wire a service to the machine's calibration file.
 */
export function createCalibrationService(
  config: CalibrationConfig = loadConfig(),
  options: Pick<CalibrationServiceOptions, 'now' | 'logger'> = {}
): CalibrationService {
  const store = new CalibrationStore(config.stateFilePath, { logger: options.logger })
  return new CalibrationService(store, {
    ...options,
    stalenessThresholdMs: config.stalenessThresholdMs,
    consistencyPolicy: config.consistencyPolicy
  })
}
