export type PlanShape = 'single-week' | 'multi-week-block'

export type IntensityTier = 'low' | 'moderate' | 'high'

// Structured workout steps are carried through opaquely.
export type PlanStep = Record<string, unknown>

export type TaskEffort = {
  calories: number | null
  avgHr: number | null
  distanceKm: number | null
}

export type TaskAdjustment = {
  originalDurationMin: number | null
  originalIntensity: IntensityTier
  factor: number
  reason: string
  adjustedAt: string
}

export type Plan = {
  id: number
  name: string
  shape: PlanShape
  startDate: string
  endDate: string
  goal: string
  document: unknown
  documentHash: string
  isActive: boolean
  totalTasks: number
  completedTasks: number
  createdAt: Date
  updatedAt: Date
}

export type ScheduledTask = {
  id: number
  planId: number
  scheduledDate: string // YYYY-MM-DD
  slot: number
  category: string
  title: string
  description: string | null
  plannedDurationMin: number | null
  intensity: IntensityTier
  targetHeartRate: string | null
  steps: PlanStep[] | null
  isCompleted: boolean
  completedAt: Date | null
  linkedActivityId: string | null
  actualDurationMin: number | null
  actualEffort: TaskEffort | null
  note: string | null
  adjustment: TaskAdjustment | null
  createdAt: Date
  updatedAt: Date
}

export type PlanDraft = Pick<Plan, 'name' | 'shape' | 'startDate' | 'endDate' | 'goal' | 'document' | 'documentHash'>

export type TaskDraft = Pick<
  ScheduledTask,
  | 'scheduledDate'
  | 'slot'
  | 'category'
  | 'title'
  | 'description'
  | 'plannedDurationMin'
  | 'intensity'
  | 'targetHeartRate'
  | 'steps'
>

export type TaskCompletion = {
  completedAt: Date
  linkedActivityId: string | null
  actualDurationMin: number | null
  actualEffort: TaskEffort | null
  note?: string | null
}

export type TaskLoadPatch = {
  plannedDurationMin: number | null
  intensity: IntensityTier
  adjustment: TaskAdjustment
}

export type TaskQuery = {
  planId?: number
  from?: string
  to?: string
  incompleteOnly?: boolean
}
