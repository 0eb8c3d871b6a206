import { z } from 'zod'
import { ValidationError } from '../common/errors'
import type { PlanStep } from '../task-store/task-store.types'
import type { PlanDayEntry, PlanDocument, PlanWeek, SupplementaryItem } from './plan-document.types'

// Generated content is loose: a scalar of the wrong type is dropped rather than failing the document.
const text = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .nullable()
  .optional()
  .catch(null)

const minutes = z
  .union([z.number(), z.string()])
  .transform((v) => (typeof v === 'number' ? v : v.trim() === '' ? Number.NaN : Number(v)))
  .pipe(z.number().finite().nonnegative())
  .nullable()
  .optional()
  .catch(null)

const steps = z.array(z.record(z.unknown())).nullable().optional().catch(null)

function firstText(...values: Array<string | null | undefined>): string | null {
  for (const v of values) {
    if (v) return v
  }
  return null
}

function firstNumber(...values: Array<number | null | undefined>): number | null {
  for (const v of values) {
    if (typeof v === 'number') return v
  }
  return null
}

function firstNonEmpty<T>(...lists: Array<T[] | null | undefined>): T[] {
  for (const list of lists) {
    if (list && list.length > 0) return list
  }
  return []
}

function nonEmptyOrNull<T>(list: T[]): T[] | null {
  return list.length > 0 ? list : null
}

const supplementaryItemSchema = z.union([
  z
    .string()
    .trim()
    .min(1)
    .transform((title): SupplementaryItem => ({ title, durationMin: null, notes: null })),
  z
    .object({
      title: text,
      name: text,
      activity: text,
      type: text,
      duration: minutes,
      duration_minutes: minutes,
      timing: text,
      notes: text,
      description: text,
    })
    .transform(
      (s): SupplementaryItem => ({
        title: firstText(s.title, s.name, s.activity, s.type) ?? 'Supplementary',
        durationMin: firstNumber(s.duration, s.duration_minutes),
        notes: [s.timing, firstText(s.notes, s.description)].filter(Boolean).join(' - ') || null,
      }),
    ),
])

// A single object or a list; unusable items are dropped one by one.
const supplementarySchema = z.unknown().transform((raw): SupplementaryItem[] => {
  const items: unknown[] = Array.isArray(raw) ? raw : raw === null || raw === undefined ? [] : [raw]
  return items.flatMap((item) => {
    const parsed = supplementaryItemSchema.safeParse(item)
    return parsed.success ? [parsed.data] : []
  })
})

export const planDayEntrySchema = z
  .object({
    day_label: text,
    day: text,
    title: text,
    name: text,
    category: text,
    type: text,
    workout_type: text,
    duration: minutes,
    duration_minutes: minutes,
    total_duration_minutes: minutes,
    intensity: text,
    description: text,
    rationale: text,
    target_heart_rate: text,
    target_hr_zone: text,
    hr_zone: text,
    target_hr_bpm: text,
    steps,
    exercises: steps,
    supplementary: supplementarySchema,
  })
  .transform(
    (d): PlanDayEntry => ({
      dayLabel: firstText(d.day_label, d.day),
      title: firstText(d.title, d.name),
      category: firstText(d.category, d.type, d.workout_type),
      durationMin: firstNumber(d.duration, d.duration_minutes, d.total_duration_minutes),
      intensity: firstText(d.intensity),
      description: firstText(d.description, d.rationale),
      targetHeartRate: firstText(d.target_heart_rate, d.target_hr_zone, d.hr_zone, d.target_hr_bpm),
      steps: nonEmptyOrNull(firstNonEmpty<PlanStep>(d.steps, d.exercises)),
      supplementary: d.supplementary,
    }),
  )

const dayListSchema = z.array(planDayEntrySchema).optional()

const planWeekSchema = z
  .object({
    days: dayListSchema,
    workouts: dayListSchema,
    daily_workouts: dayListSchema,
  })
  .transform((w): PlanWeek => ({ days: firstNonEmpty(w.days, w.workouts, w.daily_workouts) }))

export const planDocumentSchema = z
  .object({
    days: dayListSchema,
    workouts: dayListSchema,
    daily_workouts: dayListSchema,
    weeks: z.array(planWeekSchema).optional(),
    weekly_plans: z.array(planWeekSchema).optional(),
    plan_name: text,
    primary_goal: text,
  })
  .transform((d): PlanDocument => {
    const meta = { planName: firstText(d.plan_name), primaryGoal: firstText(d.primary_goal) }
    const days = firstNonEmpty(d.days, d.workouts, d.daily_workouts)
    if (days.length > 0) {
      return { kind: 'single-week', days, ...meta }
    }
    const weeks = firstNonEmpty(d.weeks, d.weekly_plans)
    if (weeks.length > 0) {
      return { kind: 'multi-week-block', weeks, ...meta }
    }
    return { kind: 'single-week', days: [], ...meta }
  })

export function parsePlanDocument(raw: unknown): PlanDocument {
  const parsed = planDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    throw ValidationError.fromZod('Plan document', parsed.error)
  }
  return parsed.data
}
