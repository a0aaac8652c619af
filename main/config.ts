import * as path from 'path'
import * as os from 'os'
import { ConsistencyPolicy } from '../src/types/calibration'
import { CALIBRATION_FILE_NAME } from '../src/lib/storage/calibration-store'
import { DAY_MS, DEFAULT_STALENESS_DAYS } from '../src/lib/calibration/verification-tracker'
import { logger } from '../src/lib/utils/logger'

export interface CalibrationConfig {
  stateFilePath: string
  stalenessThresholdMs: number
  consistencyPolicy: ConsistencyPolicy
}

type Env = Record<string, string | undefined>

export function getStateDirectory(env: Env = process.env): string {
  const configured = env.DPI_CALIBRATION_STATE_DIR?.trim()
  if (configured) return path.resolve(configured)
  return path.join(os.homedir(), '.dpi-calibration')
}

export function getStalenessThresholdMs(env: Env = process.env): number {
  const raw = env.DPI_CALIBRATION_STALE_DAYS
  if (raw === undefined || raw.trim() === '') return DEFAULT_STALENESS_DAYS * DAY_MS

  const days = Number.parseFloat(raw)
  if (!Number.isFinite(days) || days <= 0) {
    logger.warn(`Ignoring DPI_CALIBRATION_STALE_DAYS=${raw}; using ${DEFAULT_STALENESS_DAYS} days`)
    return DEFAULT_STALENESS_DAYS * DAY_MS
  }
  return days * DAY_MS
}

export function getConsistencyPolicy(env: Env = process.env): ConsistencyPolicy {
  const raw = env.DPI_CALIBRATION_CONSISTENCY_POLICY?.trim().toLowerCase()
  if (!raw) return ConsistencyPolicy.Advisory

  const policy = Object.values(ConsistencyPolicy).find(value => value === raw)
  if (policy) return policy

  logger.warn(`Ignoring DPI_CALIBRATION_CONSISTENCY_POLICY=${raw}; using ${ConsistencyPolicy.Advisory}`)
  return ConsistencyPolicy.Advisory
}

export function loadConfig(env: Env = process.env): CalibrationConfig {
  return {
    stateFilePath: path.join(getStateDirectory(env), CALIBRATION_FILE_NAME),
    stalenessThresholdMs: getStalenessThresholdMs(env),
    consistencyPolicy: getConsistencyPolicy(env)
  }
}
