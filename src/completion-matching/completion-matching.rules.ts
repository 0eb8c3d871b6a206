import { dateKeySchema } from '../readiness/readiness.schema'
import type { ScheduledTask, TaskCompletion } from '../task-store/task-store.types'
import type { ActivityRecord, WindowActivity } from './completion-matching.types'

export const ENDURANCE_CATEGORIES = new Set([
  'endurance',
  'easy_run',
  'long_run',
  'tempo',
  'interval',
  'recovery',
  'run',
  'running',
])

export const STRENGTH_CATEGORIES = new Set(['strength'])

const ENDURANCE_ACTIVITY_MARKERS = ['running', 'treadmill']
const STRENGTH_ACTIVITY_MARKERS = ['strength', 'hiit']

export function isRestCategory(category: string): boolean {
  return category.trim().toLowerCase() === 'rest'
}

/**
 * Coarse category/activity compatibility. Categories outside the known
 * families accept any activity on the same day.
 */
export function isCompatible(category: string, activityType: string): boolean {
  const c = category.trim().toLowerCase()
  const type = activityType.toLowerCase()

  if (c === 'rest') return false
  if (ENDURANCE_CATEGORIES.has(c)) return ENDURANCE_ACTIVITY_MARKERS.some((m) => type.includes(m))
  if (STRENGTH_CATEGORIES.has(c)) return STRENGTH_ACTIVITY_MARKERS.some((m) => type.includes(m))
  return true
}

export function activityDate(activity: ActivityRecord): string | null {
  const parsed = dateKeySchema.safeParse(activity.startTimeLocal.slice(0, 10))
  return parsed.success ? parsed.data : null
}

/**
 * Dated activities, most recent first. Entries whose start time has no
 * readable date are dropped.
 */
export function prepareWindow(activities: ActivityRecord[]): WindowActivity[] {
  const dated: WindowActivity[] = []
  for (const activity of activities) {
    const date = activityDate(activity)
    if (date !== null) dated.push({ ...activity, date })
  }
  return dated
    .sort((a, b) => (a.startTimeLocal < b.startTimeLocal ? 1 : a.startTimeLocal > b.startTimeLocal ? -1 : 0))
}

export function findMatch(
  task: ScheduledTask,
  window: WindowActivity[],
  used: ReadonlySet<string>,
): WindowActivity | null {
  if (task.isCompleted || isRestCategory(task.category)) return null
  return (
    window.find(
      (a) => !used.has(a.activityId) && a.date === task.scheduledDate && isCompatible(task.category, a.activityType),
    ) ?? null
  )
}

export function completionFromActivity(activity: WindowActivity, completedAt: Date): TaskCompletion {
  return {
    completedAt,
    linkedActivityId: activity.activityId,
    actualDurationMin: activity.durationSec === null ? null : Math.round(activity.durationSec / 60),
    actualEffort: {
      calories: activity.calories,
      avgHr: activity.avgHr,
      distanceKm: activity.distanceM === null ? null : Math.round(activity.distanceM / 10) / 100,
    },
  }
}
