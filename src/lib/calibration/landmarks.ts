/**
 * Landmarks that are easy to locate in both coordinate spaces.
 * Spread points across the screen: ratios from points near the origin are
 * dominated by rounding.
 */

export type LandmarkId = 'start_button' | 'datetime' | 'minimize'

export type ScreenRegion = 'bottom-left' | 'bottom-right' | 'upper-right'

export interface Landmark {
  id: LandmarkId
  description: string
  region: ScreenRegion
}

export const LANDMARKS: Readonly<Record<LandmarkId, Landmark>> = {
  start_button: {
    id: 'start_button',
    description: 'Start button (bottom-left corner of the taskbar)',
    region: 'bottom-left'
  },
  datetime: {
    id: 'datetime',
    description: 'Date/time display (bottom-right corner of the taskbar)',
    region: 'bottom-right'
  },
  minimize: {
    id: 'minimize',
    description: 'Minimize button of any open window (leftmost of minimize/maximize/close)',
    region: 'upper-right'
  }
}

export function isLandmarkId(value: string): value is LandmarkId {
  return Object.prototype.hasOwnProperty.call(LANDMARKS, value)
}

export function describeLandmark(id: string): Landmark | null {
  return isLandmarkId(id) ? LANDMARKS[id] : null
}
