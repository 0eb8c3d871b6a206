// A recorded activity as delivered by the activity-history provider.
export type ActivityRecord = {
  activityId: string
  startTimeLocal: string // ISO local timestamp, e.g. 2024-06-03T07:15:00
  activityType: string
  name: string | null
  durationSec: number | null
  calories: number | null
  avgHr: number | null
  distanceM: number | null
}

export type WindowActivity = ActivityRecord & {
  date: string // YYYY-MM-DD
}

export type TaskMatch = {
  taskId: number
  taskTitle: string
  scheduledDate: string
  activityId: string
  activityName: string | null
  activityType: string
}

export type ReconcileResult = {
  planId: number
  matchedCount: number
  skipped: number
  matches: TaskMatch[]
}

export type ReconcileAllResult = {
  matchedCount: number
  plans: ReconcileResult[]
}
