export type { PhysicalPoint, LogicalPoint } from './types'
export { physicalPoint, logicalPoint, rawPoint } from './types'
export { logicalToPhysical, physicalToLogical, convertPoint } from './conversions'
