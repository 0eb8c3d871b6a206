import type { IntensityTier } from '../task-store/task-store.types'

export type AdjustmentMode = 'auto' | 'manual-increase' | 'manual-decrease' | 'add-recovery'

export const ADJUSTMENT_MODES: AdjustmentMode[] = ['auto', 'manual-increase', 'manual-decrease', 'add-recovery']

export type LoadDirective = {
  factor: number
  needsMoreRecovery: boolean
  rationale: string[]
}

export type TaskAdjustmentSummary = {
  taskId: number
  durationMin: { from: number | null; to: number | null }
  intensity: { from: IntensityTier; to: IntensityTier }
}

export type AdjustmentResult = {
  planId: number
  mode: AdjustmentMode
  factor: number
  rationale: string[]
  adjustedCount: number
  skipped: number
  adjustments: TaskAdjustmentSummary[]
}
