/**
 * Persisted calibration record migrations.
 *
 * Records carry `schema_version`. Records without one predate versioning and
 * are treated as version 0. Each migration lifts a record to its `version`.
 */

import { migration001 } from './migrations/001_versioned_calibration_record'

export type RawCalibrationRecord = Record<string, unknown>

export interface Migration {
  version: number
  name: string
  description: string
  // null = the record holds no calibration
  migrate: (record: RawCalibrationRecord) => RawCalibrationRecord | null
}

export const migrations: readonly Migration[] = [migration001]

export const CURRENT_RECORD_VERSION = migrations.reduce((max, m) => Math.max(max, m.version), 0)

export interface MigrationOutcome {
  record: RawCalibrationRecord | null
  applied: string[]
}

export class UnsupportedRecordVersionError extends Error {
  readonly version: number

  constructor(version: number) {
    super(`Calibration record version ${version} is newer than supported version ${CURRENT_RECORD_VERSION}`)
    this.name = 'UnsupportedRecordVersionError'
    this.version = version
  }
}

export function getRecordVersion(record: RawCalibrationRecord): number {
  const version = record.schema_version
  return typeof version === 'number' && Number.isInteger(version) ? version : 0
}

export function migrateRecord(record: RawCalibrationRecord): MigrationOutcome {
  const version = getRecordVersion(record)
  if (version > CURRENT_RECORD_VERSION) {
    throw new UnsupportedRecordVersionError(version)
  }

  const applied: string[] = []
  let current: RawCalibrationRecord | null = record

  for (const migration of migrations) {
    if (!current) break
    if (migration.version <= version) continue
    current = migration.migrate(current)
    applied.push(`${String(migration.version).padStart(3, '0')}_${migration.name}`)
  }

  return { record: current, applied }
}
