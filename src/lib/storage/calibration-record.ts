/**
 * On-disk calibration record: snake_case JSON with a schema version.
 */

import { z } from 'zod'
import type { CalibrationState } from '../../types/calibration'
import { CalibrationError, CalibrationErrorCode } from '../calibration/errors'
import { MIN_CALIBRATION_POINTS } from '../calibration/scale-estimator'
import { calibrationPointSchema, formatIssues, pointFromPayload, pointToPayload } from '../calibration/schemas'
import { CURRENT_RECORD_VERSION } from '../../shared/migrations'

const timestamp = z.string().datetime({ offset: true })

export const calibrationRecordSchema = z
  .object({
    schema_version: z.literal(CURRENT_RECORD_VERSION),
    scale_x: z.number().finite().positive(),
    scale_y: z.number().finite().positive(),
    offset_x: z.number().finite(),
    offset_y: z.number().finite(),
    computed_at: timestamp,
    verified: z.boolean(),
    verified_at: timestamp.optional(),
    verification_notes: z.string().optional(),
    consistency_warning: z.boolean(),
    spread_x: z.number().finite().nonnegative(),
    spread_y: z.number().finite().nonnegative(),
    sample_count: z.number().int().min(MIN_CALIBRATION_POINTS),
    points: z.array(calibrationPointSchema)
  })
  .superRefine((record, ctx) => {
    if (record.sample_count !== record.points.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sample_count'],
        message: `sample_count ${record.sample_count} does not match ${record.points.length} points`
      })
    }
    if (record.verified !== (record.verified_at !== undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['verified_at'],
        message: 'verified_at must be present exactly when verified is true'
      })
    }
  })

export type CalibrationRecord = z.infer<typeof calibrationRecordSchema>

export function toRecord(state: CalibrationState): CalibrationRecord {
  return {
    schema_version: CURRENT_RECORD_VERSION,
    scale_x: state.scaleX,
    scale_y: state.scaleY,
    offset_x: state.offsetX,
    offset_y: state.offsetY,
    computed_at: state.computedAt,
    verified: state.verified,
    ...(state.verifiedAt !== undefined ? { verified_at: state.verifiedAt } : {}),
    ...(state.verificationNotes !== undefined ? { verification_notes: state.verificationNotes } : {}),
    consistency_warning: state.consistencyWarning,
    spread_x: state.spreadX,
    spread_y: state.spreadY,
    sample_count: state.sampleCount,
    points: state.points.map(pointToPayload)
  }
}

export function fromRecord(record: CalibrationRecord): CalibrationState {
  return {
    scaleX: record.scale_x,
    scaleY: record.scale_y,
    offsetX: record.offset_x,
    offsetY: record.offset_y,
    computedAt: record.computed_at,
    verified: record.verified,
    ...(record.verified_at !== undefined ? { verifiedAt: record.verified_at } : {}),
    ...(record.verification_notes !== undefined ? { verificationNotes: record.verification_notes } : {}),
    consistencyWarning: record.consistency_warning,
    spreadX: record.spread_x,
    spreadY: record.spread_y,
    sampleCount: record.sample_count,
    points: record.points.map(pointFromPayload)
  }
}

/**
 * Validate an unknown value as a current-version record.
 * Throws CorruptState with the offending fields.
 */
export function parseRecord(value: unknown, source: string): CalibrationState {
  const parsed = calibrationRecordSchema.safeParse(value)
  if (!parsed.success) {
    throw new CalibrationError(
      CalibrationErrorCode.CorruptState,
      `Calibration record at ${source} is malformed: ${formatIssues(parsed.error)}`
    )
  }
  return fromRecord(parsed.data)
}

/**
 * Refuse to persist a state that breaks a record invariant.
 */
export function assertPersistable(state: CalibrationState): CalibrationRecord {
  const record = toRecord(state)
  const parsed = calibrationRecordSchema.safeParse(record)
  if (!parsed.success) {
    throw new CalibrationError(
      CalibrationErrorCode.DegenerateEstimate,
      `Refusing to persist invalid calibration: ${formatIssues(parsed.error)}`
    )
  }
  return parsed.data
}
