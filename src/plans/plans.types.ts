import type { Plan, PlanShape, ScheduledTask } from '../task-store/task-store.types'

export type PlanSummary = Omit<Plan, 'document'> & {
  progressPct: number
}

export type PlanDetails = {
  plan: Plan & { progressPct: number }
  tasks: ScheduledTask[]
}

export type GeneratePlanRequest = {
  shape: PlanShape
  goal: string
  weeks?: number
  daysPerWeek?: number
  anchorDate?: string
  name?: string
  readiness?: unknown
}
