import type { ReadinessSnapshotInput } from '../readiness/readiness.schema'
import type { ScheduledTask, TaskLoadPatch } from '../task-store/task-store.types'
import type { AdjustmentMode, LoadDirective } from './plan-adjustments.types'

export const MANUAL_INCREASE_FACTOR = 1.15
export const MANUAL_DECREASE_FACTOR = 0.8

function roundFactor(factor: number): number {
  return Math.round(factor * 10000) / 10000
}

/**
 * Composes the load factor for `auto` mode. Unlike the readiness directive,
 * every applicable rule contributes.
 */
export function deriveAutoDirective(readiness: ReadinessSnapshotInput): LoadDirective {
  let factor = 1
  let needsMoreRecovery = false
  const rationale: string[] = []

  const score = readiness.score
  if (score < 50) {
    factor *= 0.7
    rationale.push(`Readiness low (${score}) - reducing load 30%`)
  } else if (score < 70) {
    factor *= 0.85
    rationale.push(`Readiness moderate (${score}) - reducing load 15%`)
  } else if (score > 85) {
    factor *= 1.1
    rationale.push(`Readiness high (${score}) - increasing load 10%`)
  }

  const sleep = readiness.sleepQuality
  if (sleep !== null && sleep !== undefined && sleep < 50) {
    factor *= 0.9
    needsMoreRecovery = true
    rationale.push(`Sleep quality low (${sleep}) - prioritizing recovery`)
  }

  const stress = readiness.stress
  if (stress !== null && stress !== undefined && stress > 60) {
    factor *= 0.85
    rationale.push(`High stress (${stress}) - favoring easier sessions`)
  }

  return { factor: roundFactor(factor), needsMoreRecovery, rationale }
}

export function deriveDirective(mode: AdjustmentMode, readiness: ReadinessSnapshotInput | null): LoadDirective {
  switch (mode) {
    case 'auto':
      return readiness ? deriveAutoDirective(readiness) : { factor: 1, needsMoreRecovery: false, rationale: [] }
    case 'manual-increase':
      return { factor: MANUAL_INCREASE_FACTOR, needsMoreRecovery: false, rationale: ['Manual increase in load'] }
    case 'manual-decrease':
      return { factor: MANUAL_DECREASE_FACTOR, needsMoreRecovery: false, rationale: ['Manual decrease in load'] }
    case 'add-recovery':
      return { factor: 1, needsMoreRecovery: true, rationale: ['Added recovery emphasis'] }
  }
}

/**
 * The rewrite for one task, or null when nothing would change. Completed
 * tasks are never rewritten. The first recorded originals survive repeated
 * adjustments.
 */
export function planTaskAdjustment(
  task: ScheduledTask,
  directive: LoadDirective,
  adjustedAt: Date,
): TaskLoadPatch | null {
  if (task.isCompleted) return null

  const intensity = directive.needsMoreRecovery && task.intensity === 'high' ? 'moderate' : task.intensity
  const plannedDurationMin =
    task.plannedDurationMin === null ? null : Math.round(task.plannedDurationMin * directive.factor)

  if (intensity === task.intensity && plannedDurationMin === task.plannedDurationMin) return null

  return {
    plannedDurationMin,
    intensity,
    adjustment: {
      originalDurationMin: task.adjustment ? task.adjustment.originalDurationMin : task.plannedDurationMin,
      originalIntensity: task.adjustment ? task.adjustment.originalIntensity : task.intensity,
      factor: directive.factor,
      reason: directive.rationale.join('; '),
      adjustedAt: adjustedAt.toISOString(),
    },
  }
}
