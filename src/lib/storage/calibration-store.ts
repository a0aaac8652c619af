/**
 * Durable owner of the machine's single calibration record.
 *
 * Reads are lock-free. Writes are serialized through a promise-chain lock within
 * this instance and a lock file shared by every store on the same path, and
 * land via write-to-temp + rename, so a reader never sees a half-written file.
 */

import * as fs from 'fs/promises'
import * as path from 'path'
import { randomUUID } from 'crypto'
import { lock } from 'proper-lockfile'
import type { CalibrationState } from '../../types/calibration'
import { CalibrationError, CalibrationErrorCode, isCalibrationError, notCalibrated } from '../calibration/errors'
import { migrateRecord, UnsupportedRecordVersionError } from '../../shared/migrations'
import type { MigrationOutcome, RawCalibrationRecord } from '../../shared/migrations'
import { assertPersistable, parseRecord } from './calibration-record'
import { createLogger } from '../utils/logger'
import type { CalibrationLogger } from '../utils/logger'

export const CALIBRATION_FILE_NAME = 'calibration.json'

export interface CalibrationStoreOptions {
  logger?: CalibrationLogger
}

export interface UpdateOptions {
  /** Treat an unreadable record as absent instead of failing with CorruptState. */
  replaceCorrupt?: boolean
}

// Lock file retries: a competing writer holds it for one write at most.
const LOCK_RETRIES = { retries: 40, factor: 1.3, minTimeout: 10, maxTimeout: 250 }

// fs errors raised in another realm (e.g. a test sandbox) fail `instanceof Error`.
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

function isRawRecord(value: unknown): value is RawCalibrationRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function ioError(action: string, filePath: string, error: unknown): CalibrationError {
  const reason = isErrnoException(error) && typeof error.message === 'string' ? error.message : String(error)
  return new CalibrationError(
    CalibrationErrorCode.PersistenceIOError,
    `Failed to ${action} calibration record at ${filePath}: ${reason}`,
    { cause: error }
  )
}

export class CalibrationStore {
  private writeMutex: Promise<void> = Promise.resolve()
  private readonly logger: CalibrationLogger

  constructor(readonly filePath: string, options: CalibrationStoreOptions = {}) {
    this.logger = options.logger ?? createLogger('CalibrationStore')
  }

  /**
   * Read the persisted calibration. null means none has been recorded yet.
   */
  async load(): Promise<CalibrationState | null> {
    let text: string
    try {
      text = await fs.readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null
      }
      throw ioError('read', this.filePath, error)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new CalibrationError(
        CalibrationErrorCode.CorruptState,
        `Calibration record at ${this.filePath} is not valid JSON`,
        { cause: error }
      )
    }

    if (!isRawRecord(parsed)) {
      throw new CalibrationError(
        CalibrationErrorCode.CorruptState,
        `Calibration record at ${this.filePath} is not a JSON object`
      )
    }

    let outcome: MigrationOutcome
    try {
      outcome = migrateRecord(parsed)
    } catch (error) {
      if (error instanceof UnsupportedRecordVersionError) {
        throw new CalibrationError(CalibrationErrorCode.CorruptState, error.message, { cause: error })
      }
      throw error
    }

    if (outcome.applied.length > 0) {
      this.logger.info(`Migrated calibration record: ${outcome.applied.join(', ')}`)
    }
    if (!outcome.record) {
      return null
    }

    return parseRecord(outcome.record, this.filePath)
  }

  /**
   * Replace the persisted record with `state`.
   */
  async save(state: CalibrationState): Promise<void> {
    await this.withWriteLock(() => this.writeAtomically(state))
  }

  /**
   * Load, transform and save under the write lock.
   * When `fn` returns the state it was given, nothing is written.
   */
  async update(
    fn: (current: CalibrationState | null) => CalibrationState,
    options: UpdateOptions = {}
  ): Promise<CalibrationState> {
    return this.withWriteLock(async () => {
      const current = options.replaceCorrupt ? await this.loadOrDiscardCorrupt() : await this.load()
      const next = fn(current)
      if (next !== current) {
        await this.writeAtomically(next)
      }
      return next
    })
  }

  /**
   * Like `update`, but fails with NotCalibrated when no record exists.
   */
  async updateExisting(fn: (current: CalibrationState) => CalibrationState): Promise<CalibrationState> {
    return this.update(current => {
      if (!current) throw notCalibrated()
      return fn(current)
    })
  }

  private async loadOrDiscardCorrupt(): Promise<CalibrationState | null> {
    try {
      return await this.load()
    } catch (error) {
      if (!isCalibrationError(error) || error.code !== CalibrationErrorCode.CorruptState) throw error
      this.logger.warn(`Replacing unreadable calibration record: ${error.message}`)
      return null
    }
  }

  private withWriteLock<T>(operation: () => Promise<T>): Promise<T> {
    const locked = () => this.withFileLock(operation)
    const next = this.writeMutex.then(locked, locked)
    this.writeMutex = next.then(
      () => {},
      () => {}
    )
    return next
  }

  private async withFileLock<T>(operation: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      release = await lock(this.filePath, {
        realpath: false,
        retries: LOCK_RETRIES,
        onCompromised: error => this.logger.warn(`Lock on ${this.filePath} was compromised:`, error)
      })
    } catch (error) {
      throw ioError('lock', this.filePath, error)
    }

    try {
      return await operation()
    } finally {
      try {
        await release()
      } catch (error) {
        this.logger.warn(`Could not release lock on ${this.filePath}:`, error)
      }
    }
  }

  private async writeAtomically(state: CalibrationState): Promise<void> {
    const record = assertPersistable(state)
    const directory = path.dirname(this.filePath)
    const tempPath = path.join(directory, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`)

    try {
      const handle = await fs.open(tempPath, 'w')
      try {
        await handle.writeFile(`${JSON.stringify(record, null, 2)}\n`, 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await fs.rename(tempPath, this.filePath)
    } catch (error) {
      await this.discardTempFile(tempPath)
      if (isCalibrationError(error)) throw error
      throw ioError('write', this.filePath, error)
    }

    this.logger.debug(`Saved calibration record (${record.sample_count} points) to ${this.filePath}`)
  }

  private async discardTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true })
    } catch (error) {
      this.logger.warn(`Could not remove temporary file ${tempPath}:`, error)
    }
  }
}
