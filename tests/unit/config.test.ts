import { describe, it, expect, afterEach, jest } from '@jest/globals'
import * as os from 'os'
import * as path from 'path'
import { getConsistencyPolicy, getStalenessThresholdMs, loadConfig } from '../../main/config'
import { DAY_MS } from '@/lib/calibration/verification-tracker'
import { ConsistencyPolicy } from '@/types/calibration'

describe('calibration config', () => {
  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('defaults to a file under the home directory, 7 days, advisory', () => {
    expect(loadConfig({})).toEqual({
      stateFilePath: path.join(os.homedir(), '.dpi-calibration', 'calibration.json'),
      stalenessThresholdMs: 7 * DAY_MS,
      consistencyPolicy: ConsistencyPolicy.Advisory
    })
  })

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({
        DPI_CALIBRATION_STATE_DIR: '/var/lib/calibration',
        DPI_CALIBRATION_STALE_DAYS: '2',
        DPI_CALIBRATION_CONSISTENCY_POLICY: 'REJECT'
      })
    ).toEqual({
      stateFilePath: path.join(path.resolve('/var/lib/calibration'), 'calibration.json'),
      stalenessThresholdMs: 2 * DAY_MS,
      consistencyPolicy: ConsistencyPolicy.Reject
    })
  })

  it('falls back to the default threshold for unusable values', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
    expect(getStalenessThresholdMs({ DPI_CALIBRATION_STALE_DAYS: 'soon' })).toBe(7 * DAY_MS)
    expect(getStalenessThresholdMs({ DPI_CALIBRATION_STALE_DAYS: '-1' })).toBe(7 * DAY_MS)
    expect(warnSpy).toHaveBeenCalledTimes(2)
  })

  it('falls back to the advisory policy for unknown values', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {})
    expect(getConsistencyPolicy({ DPI_CALIBRATION_CONSISTENCY_POLICY: 'strict' })).toBe(ConsistencyPolicy.Advisory)
    expect(warnSpy).toHaveBeenCalledTimes(1)
  })
})
