import { z } from 'zod'
import { parseDateKey, toDateKey } from '../plan-materializer/plan-calendar'

// Round-trips through Date so rolled-over days such as 2024-02-30 are rejected.
export const dateKeySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((v) => {
    const parsed = parseDateKey(v)
    return !Number.isNaN(parsed.getTime()) && toDateKey(parsed) === v
  }, 'not a calendar date')

// Telemetry is unreliable: a field of the wrong type is dropped, never rejected.
const lenientNumber = z.number().nullable().optional().catch(null)

export const biometricReadingSchema = z.object({
  date: dateKeySchema.optional().catch(undefined),
  energyReserve: lenientNumber,
  sleepQuality: lenientNumber,
  hrvStatus: z.string().nullable().optional().catch(null),
  restingHr: lenientNumber,
  stress: lenientNumber,
})

export const todayReadinessRequestSchema = z
  .object({
    today: biometricReadingSchema.catch({}),
    yesterday: biometricReadingSchema.optional().catch(undefined),
  })
  .catch({ today: {} })

export type TodayReadinessRequest = z.infer<typeof todayReadinessRequestSchema>

const percent = z.number().min(0).max(100)

// What the adjustment engine needs from a snapshot produced earlier by the evaluator.
export const readinessSnapshotInputSchema = z.object({
  asOfDate: dateKeySchema.optional(),
  score: percent,
  energyReserve: percent.nullable().optional(),
  sleepQuality: percent.nullable().optional(),
  stress: percent.nullable().optional(),
  hrvStatus: z.enum(['balanced', 'unbalanced', 'unknown']).optional(),
  directive: z.enum(['proceed', 'reduce', 'rest']).optional(),
})

export type ReadinessSnapshotInput = z.infer<typeof readinessSnapshotInputSchema>
