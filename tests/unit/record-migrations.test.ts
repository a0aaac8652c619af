import { describe, it, expect } from '@jest/globals'
import { CURRENT_RECORD_VERSION, getRecordVersion, migrateRecord, UnsupportedRecordVersionError } from '@/shared/migrations'
import { migration001 } from '@/shared/migrations/migrations/001_versioned_calibration_record'

describe('calibration record migrations', () => {
  it('treats an unversioned record as version 0', () => {
    expect(getRecordVersion({ calibrated: true })).toBe(0)
    expect(getRecordVersion({ schema_version: 1 })).toBe(1)
    expect(CURRENT_RECORD_VERSION).toBe(1)
  })

  it('leaves a current record alone', () => {
    const record = { schema_version: 1, scale_x: 1.5 }
    const outcome = migrateRecord(record)

    expect(outcome.applied).toEqual([])
    expect(outcome.record).toBe(record)
  })

  it('lifts an unversioned record to version 1', () => {
    const outcome = migrateRecord({
      calibrated: true,
      scale_x: 1.25,
      scale_y: 1.25,
      points: [{ physical_x: 125, physical_y: 125, logical_x: 100, logical_y: 100 }],
      calibrated_at: '2025-06-01T12:00:00+00:00',
      verified: true,
      verified_at: '2025-06-01T12:05:00+00:00',
      verification_notes: '',
      consistent: true
    })

    expect(outcome.applied).toEqual(['001_versioned_calibration_record'])
    expect(outcome.record).toEqual({
      schema_version: 1,
      scale_x: 1.25,
      scale_y: 1.25,
      offset_x: 0,
      offset_y: 0,
      computed_at: '2025-06-01T12:00:00+00:00',
      verified: true,
      verified_at: '2025-06-01T12:05:00+00:00',
      consistency_warning: false,
      spread_x: 0,
      spread_y: 0,
      sample_count: 1,
      points: [{ physical_x: 125, physical_y: 125, logical_x: 100, logical_y: 100 }]
    })
  })

  it('maps an uncalibrated record to no calibration', () => {
    expect(migration001.migrate({ calibrated: false })).toBeNull()
    expect(migrateRecord({ calibrated: false }).record).toBeNull()
  })

  it('refuses records from a newer version', () => {
    expect(() => migrateRecord({ schema_version: 2 })).toThrow(UnsupportedRecordVersionError)
  })
})
