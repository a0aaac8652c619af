export { median, maxRelativeDeviation } from './median'
export { roundHalfAwayFromZero } from './rounding'
