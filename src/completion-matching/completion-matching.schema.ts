import { z } from 'zod'
import { ValidationError } from '../common/errors'
import type { ActivityRecord } from './completion-matching.types'

const optionalMetric = z.number().finite().nonnegative().nullable().optional().catch(null)

export const activityRecordSchema = z
  .object({
    activityId: z.union([z.string().min(1), z.number().int()]).transform(String),
    startTimeLocal: z.string(),
    activityType: z.string().default(''),
    name: z.string().nullable().optional(),
    durationSec: optionalMetric,
    calories: optionalMetric,
    avgHr: optionalMetric,
    distanceM: optionalMetric,
  })
  .transform(
    (a): ActivityRecord => ({
      activityId: a.activityId,
      startTimeLocal: a.startTimeLocal,
      activityType: a.activityType,
      name: a.name ?? null,
      durationSec: a.durationSec ?? null,
      calories: a.calories ?? null,
      avgHr: a.avgHr ?? null,
      distanceM: a.distanceM ?? null,
    }),
  )

export const activityWindowSchema = z.array(activityRecordSchema)

export function parseActivityWindow(raw: unknown): ActivityRecord[] {
  const parsed = activityWindowSchema.safeParse(raw)
  if (!parsed.success) {
    throw ValidationError.fromZod('Activity window', parsed.error)
  }
  return parsed.data
}
