import { describe, it, expect } from '@jest/globals'
import { describeLandmark, isLandmarkId, LANDMARKS } from '@/lib/calibration/landmarks'

describe('landmarks', () => {
  it('describes a known landmark', () => {
    expect(describeLandmark('datetime')).toEqual({
      id: 'datetime',
      description: 'Date/time display (bottom-right corner of the taskbar)',
      region: 'bottom-right'
    })
  })

  it('returns null for an unknown id', () => {
    expect(describeLandmark('close_button')).toBeNull()
  })

  it('does not treat inherited object keys as landmarks', () => {
    expect(isLandmarkId('toString')).toBe(false)
    expect(describeLandmark('constructor')).toBeNull()
  })

  it('keys every landmark by its own id', () => {
    for (const [key, landmark] of Object.entries(LANDMARKS)) {
      expect(landmark.id).toBe(key)
    }
  })
})
