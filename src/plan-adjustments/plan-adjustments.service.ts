import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { NotFoundError, ValidationError } from '../common/errors'
import { readinessSnapshotInputSchema, type ReadinessSnapshotInput } from '../readiness/readiness.schema'
import { TASK_STORE, type TaskStore } from '../task-store/task-store'
import { deriveDirective, planTaskAdjustment } from './plan-adjustments.rules'
import type { AdjustmentMode, AdjustmentResult, TaskAdjustmentSummary } from './plan-adjustments.types'

@Injectable()
export class PlanAdjustmentsService {
  private readonly logger = new Logger(PlanAdjustmentsService.name)

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async adjustPlan(planId: number, readiness: unknown, mode: AdjustmentMode): Promise<AdjustmentResult> {
    const plan = await this.store.findPlan(planId)
    if (!plan) throw new NotFoundError('Plan', planId)

    const snapshot = this.parseReadiness(readiness, mode)

    const tasks = await this.store.listTasks({ planId, incompleteOnly: true })
    if (tasks.length === 0) {
      return {
        planId,
        mode,
        factor: 1,
        rationale: ['All tasks are already completed'],
        adjustedCount: 0,
        skipped: 0,
        adjustments: [],
      }
    }

    const directive = deriveDirective(mode, snapshot)
    const adjustedAt = this.clock.now()
    const adjustments: TaskAdjustmentSummary[] = []
    let skipped = 0

    for (const task of tasks) {
      try {
        const patch = planTaskAdjustment(task, directive, adjustedAt)
        if (!patch) continue

        // Re-checked at write time: a task completed since it was listed is left alone.
        const updated = await this.store.updateIncompleteTask(task.id, patch)
        if (!updated) {
          this.logger.warn(`Task ${task.id} was completed before its adjustment could be written`)
          continue
        }

        adjustments.push({
          taskId: task.id,
          durationMin: { from: task.plannedDurationMin, to: updated.plannedDurationMin },
          intensity: { from: task.intensity, to: updated.intensity },
        })
      } catch (err) {
        skipped++
        this.logger.warn(
          `Skipping task ${task.id} of plan ${planId} during adjustment: ${err instanceof Error ? err.message : String(err)}`,
        )
      }
    }

    this.logger.log(
      `Adjusted plan ${planId} (${mode}, factor ${directive.factor}): ${adjustments.length} tasks changed, ${skipped} skipped`,
    )

    return {
      planId,
      mode,
      factor: directive.factor,
      rationale: directive.rationale,
      adjustedCount: adjustments.length,
      skipped,
      adjustments,
    }
  }

  private parseReadiness(raw: unknown, mode: AdjustmentMode): ReadinessSnapshotInput | null {
    if (raw === undefined || raw === null) {
      if (mode === 'auto') {
        throw new ValidationError('A readiness snapshot is required for auto adjustment')
      }
      return null
    }
    const parsed = readinessSnapshotInputSchema.safeParse(raw)
    if (!parsed.success) {
      throw ValidationError.fromZod('Readiness snapshot', parsed.error)
    }
    return parsed.data
  }
}
