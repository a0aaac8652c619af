/**
 * Boundary validation for operation arguments.
 *
 * Agents send loosely typed JSON (snake_case, as in the tool schemas).
 * These parsers turn it into the strict domain types before anything runs.
 */

import { z } from 'zod'
import { CoordinateSpace } from '../../types/calibration'
import type { CalibrationPoint, ConversionRequest } from '../../types/calibration'
import { CalibrationError, CalibrationErrorCode } from './errors'

const coordinate = z.number().finite()

export const calibrationPointSchema = z.object({
  physical_x: coordinate,
  physical_y: coordinate,
  logical_x: coordinate,
  logical_y: coordinate,
  label: z.string().optional()
})

export type CalibrationPointPayload = z.infer<typeof calibrationPointSchema>

export const calibrateArgsSchema = z.object({
  points: z.array(calibrationPointSchema)
})

export const verifyArgsSchema = z.object({
  success: z.boolean(),
  notes: z.string().optional()
})

export const convertArgsSchema = z.object({
  x: coordinate,
  y: coordinate,
  from_system: z.nativeEnum(CoordinateSpace),
  to_system: z.nativeEnum(CoordinateSpace)
})

export interface VerifyArgs {
  success: boolean
  notes?: string
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

function invalidRequest(error: z.ZodError): CalibrationError {
  const pointIssue = error.issues.some(issue => issue.path[0] === 'points' && issue.path.length > 1)
  return new CalibrationError(
    pointIssue ? CalibrationErrorCode.InvalidPoint : CalibrationErrorCode.InvalidRequest,
    formatIssues(error)
  )
}

export function pointFromPayload(payload: CalibrationPointPayload): CalibrationPoint {
  return {
    physicalX: payload.physical_x,
    physicalY: payload.physical_y,
    logicalX: payload.logical_x,
    logicalY: payload.logical_y,
    ...(payload.label !== undefined ? { label: payload.label } : {})
  }
}

export function pointToPayload(point: CalibrationPoint): CalibrationPointPayload {
  return {
    physical_x: point.physicalX,
    physical_y: point.physicalY,
    logical_x: point.logicalX,
    logical_y: point.logicalY,
    ...(point.label !== undefined ? { label: point.label } : {})
  }
}

export function parseCalibrateArgs(raw: unknown): CalibrationPoint[] {
  const parsed = calibrateArgsSchema.safeParse(raw)
  if (!parsed.success) throw invalidRequest(parsed.error)
  return parsed.data.points.map(pointFromPayload)
}

export function parseVerifyArgs(raw: unknown): VerifyArgs {
  const parsed = verifyArgsSchema.safeParse(raw)
  if (!parsed.success) throw invalidRequest(parsed.error)
  return parsed.data
}

export function parseConvertArgs(raw: unknown): ConversionRequest {
  const parsed = convertArgsSchema.safeParse(raw)
  if (!parsed.success) throw invalidRequest(parsed.error)
  return {
    x: parsed.data.x,
    y: parsed.data.y,
    from: parsed.data.from_system,
    to: parsed.data.to_system
  }
}
