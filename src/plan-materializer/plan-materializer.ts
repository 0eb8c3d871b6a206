import { createHash } from 'crypto'
import stringify from 'fast-json-stable-stringify'
import { ValidationError } from '../common/errors'
import type { IntensityTier, PlanDraft, PlanShape, TaskDraft } from '../task-store/task-store.types'
import { addDays, weekStartOf, weekdayOffset } from './plan-calendar'
import type { PlanDayEntry, PlanDocument } from './plan-document.types'

export const DEFAULT_PLAN_NAME = 'Training plan'
export const DEFAULT_GOAL = 'General Fitness'

const INTENSITY_ALIASES: Record<string, IntensityTier> = {
  low: 'low',
  easy: 'low',
  recovery: 'low',
  moderate: 'moderate',
  medium: 'moderate',
  high: 'high',
  hard: 'high',
}

export type MaterializedPlan = {
  plan: PlanDraft
  tasks: TaskDraft[]
  warnings: string[]
}

export function documentHash(document: unknown): string {
  return createHash('sha256').update(stringify(document)).digest('hex')
}

export function normalizeIntensity(raw: string | null): IntensityTier | null {
  if (raw === null) return 'moderate'
  return INTENSITY_ALIASES[raw.trim().toLowerCase()] ?? null
}

/**
 * Day lists per week, in order, for the requested shape. A single-week request
 * over a block keeps only the first week; a block request over a flat list is
 * a one-week block.
 */
export function weeksForShape(document: PlanDocument, shape: PlanShape): PlanDayEntry[][] {
  if (document.kind === 'single-week') return [document.days]
  if (shape === 'single-week') return [document.weeks[0]?.days ?? []]
  return document.weeks.map((w) => w.days)
}

/**
 * Turns weekday-labeled entries into dated task drafts, starting from the
 * Monday of the anchor's week. Pure: nothing is persisted here.
 */
export function materializeDocument(
  document: PlanDocument,
  rawDocument: unknown,
  shape: PlanShape,
  anchorDate: string,
  overrides: { name?: string; goal?: string } = {},
): MaterializedPlan {
  const weeks = weeksForShape(document, shape)
  const entryCount = weeks.reduce((n, days) => n + days.length, 0)
  if (entryCount === 0) {
    throw new ValidationError('Plan document has no day entries')
  }

  const warnings: string[] = []
  const tasks: TaskDraft[] = []
  const slotsUsed = new Map<string, number>()
  const takeSlot = (date: string): number => {
    const slot = slotsUsed.get(date) ?? 0
    slotsUsed.set(date, slot + 1)
    return slot
  }

  const startDate = weekStartOf(anchorDate)

  weeks.forEach((days, weekIndex) => {
    const monday = addDays(startDate, 7 * weekIndex)

    for (const entry of days) {
      const offset = weekdayOffset(entry.dayLabel)
      if (offset === null) {
        const label = entry.dayLabel === null ? 'missing day label' : `unrecognized day label "${entry.dayLabel}"`
        warnings.push(`Week ${weekIndex + 1}: ${label}, scheduled on Monday`)
      }
      const scheduledDate = addDays(monday, offset ?? 0)

      let intensity = normalizeIntensity(entry.intensity)
      if (intensity === null) {
        warnings.push(`${scheduledDate}: unknown intensity "${entry.intensity}", using moderate`)
        intensity = 'moderate'
      }

      tasks.push({
        scheduledDate,
        slot: takeSlot(scheduledDate),
        category: entry.category ?? 'other',
        title: entry.title ?? 'Workout',
        description: entry.description,
        plannedDurationMin: entry.durationMin === null ? null : Math.round(entry.durationMin),
        intensity,
        targetHeartRate: entry.targetHeartRate,
        steps: entry.steps,
      })

      for (const item of entry.supplementary) {
        tasks.push({
          scheduledDate,
          slot: takeSlot(scheduledDate),
          category: 'supplementary',
          title: item.title,
          description: item.notes,
          plannedDurationMin: item.durationMin === null ? null : Math.round(item.durationMin),
          intensity: 'low',
          targetHeartRate: null,
          steps: null,
        })
      }
    }
  })

  return {
    plan: {
      name: overrides.name ?? document.planName ?? DEFAULT_PLAN_NAME,
      shape,
      startDate,
      endDate: addDays(startDate, 7 * weeks.length - 1),
      goal: overrides.goal ?? document.primaryGoal ?? DEFAULT_GOAL,
      document: rawDocument,
      documentHash: documentHash(rawDocument),
    },
    tasks,
    warnings,
  }
}
