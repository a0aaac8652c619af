/**
 * Migration 001: Versioned calibration record
 *
 * The unversioned layout stored `calibrated`, `calibrated_at` and `consistent`,
 * and stamped `verified_at` on failed verifications as well.
 */

import type { Migration, RawCalibrationRecord } from '../index'

function withDefault(value: unknown, fallback: number): unknown {
  return value === undefined || value === null ? fallback : value
}

export const migration001: Migration = {
  version: 1,
  name: 'versioned_calibration_record',
  description: 'Rename calibrated_at/consistent, add sample_count, drop verified_at from unverified records',

  migrate: (record: RawCalibrationRecord): RawCalibrationRecord | null => {
    if (record.calibrated === false) return null

    const points = Array.isArray(record.points) ? record.points : []
    const verified = record.verified === true

    const next: RawCalibrationRecord = {
      schema_version: 1,
      scale_x: record.scale_x,
      scale_y: record.scale_y,
      offset_x: withDefault(record.offset_x, 0),
      offset_y: withDefault(record.offset_y, 0),
      computed_at: record.computed_at ?? record.calibrated_at,
      verified,
      consistency_warning: record.consistency_warning === true || record.consistent === false,
      spread_x: withDefault(record.spread_x, 0),
      spread_y: withDefault(record.spread_y, 0),
      sample_count: points.length,
      points
    }

    if (verified && record.verified_at !== undefined) {
      next.verified_at = record.verified_at
    }
    if (typeof record.verification_notes === 'string' && record.verification_notes.length > 0) {
      next.verification_notes = record.verification_notes
    }

    return next
  }
}
