import type { ScheduledTask, TaskEffort } from '../task-store/task-store.types'

export const DEFAULT_LISTING_DAYS = 7
export const MAX_LISTING_DAYS = 90

export type ManualCompletionInput = {
  actualDurationMin?: number | null
  actualEffort?: Partial<TaskEffort> | null
  linkedActivityId?: string | null
  note?: string | null
}

export type TaskListingQuery = {
  from?: string
  to?: string
  days?: number
  planId?: number
}

export type TaskListing = {
  from: string
  to: string
  total: number
  tasks: ScheduledTask[]
}

export type CompletionOutcome = {
  task: ScheduledTask
  alreadyCompleted: boolean
}
