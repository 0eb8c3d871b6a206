import type { PlanShape, PlanStep } from '../task-store/task-store.types'

export type SupplementaryItem = {
  title: string
  durationMin: number | null
  notes: string | null
}

/** One day-labeled workout as read from a plan document. */
export type PlanDayEntry = {
  dayLabel: string | null
  title: string | null
  category: string | null
  durationMin: number | null
  intensity: string | null
  description: string | null
  targetHeartRate: string | null
  steps: PlanStep[] | null
  supplementary: SupplementaryItem[]
}

export type PlanWeek = {
  days: PlanDayEntry[]
}

type DocumentMeta = {
  planName: string | null
  primaryGoal: string | null
}

export type SingleWeekDocument = DocumentMeta & {
  kind: 'single-week'
  days: PlanDayEntry[]
}

export type MultiWeekDocument = DocumentMeta & {
  kind: 'multi-week-block'
  weeks: PlanWeek[]
}

export type PlanDocument = SingleWeekDocument | MultiWeekDocument

export type MaterializeOptions = {
  anchorDate?: string
  name?: string
  goal?: string
}

export type MaterializeResult = {
  planId: number
  shape: PlanShape
  startDate: string
  endDate: string
  taskCount: number
  warnings: string[]
}
