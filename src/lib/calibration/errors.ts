/**
 * Calibration error taxonomy.
 *
 * Consistency warnings and staleness are flags on successful results, not errors.
 */

export enum CalibrationErrorCode {
  InsufficientPoints = 'InsufficientPoints',
  InvalidPoint = 'InvalidPoint',
  DegenerateEstimate = 'DegenerateEstimate',
  InconsistentEstimate = 'InconsistentEstimate',
  NotCalibrated = 'NotCalibrated',
  CorruptState = 'CorruptState',
  PersistenceIOError = 'PersistenceIOError',
  InvalidRequest = 'InvalidRequest'
}

export class CalibrationError extends Error {
  readonly code: CalibrationErrorCode

  constructor(code: CalibrationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CalibrationError'
    this.code = code
  }
}

export function isCalibrationError(error: unknown): error is CalibrationError {
  return error instanceof CalibrationError
}

export function notCalibrated(): CalibrationError {
  return new CalibrationError(
    CalibrationErrorCode.NotCalibrated,
    "Not calibrated - run 'calibrate' with at least 2 points first"
  )
}

export interface OperationError {
  code: CalibrationErrorCode
  message: string
}

export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; error: OperationError }

export function ok<T>(data: T): OperationResult<T> {
  return { success: true, data }
}

export function fail<T>(error: CalibrationError): OperationResult<T> {
  return { success: false, error: { code: error.code, message: error.message } }
}
