import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { ValidationError } from '../common/errors'
import { dateKeySchema } from '../readiness/readiness.schema'
import { TASK_STORE, type TaskStore } from '../task-store/task-store'
import type { PlanShape } from '../task-store/task-store.types'
import { toDateKey } from './plan-calendar'
import { parsePlanDocument } from './plan-document.schema'
import type { MaterializeOptions, MaterializeResult } from './plan-document.types'
import { materializeDocument } from './plan-materializer'

@Injectable()
export class PlanMaterializerService {
  private readonly logger = new Logger(PlanMaterializerService.name)

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Validates the document, dates every entry and persists the plan together
   * with all of its tasks. Always creates a new plan; superseded plans are
   * left for the caller to deactivate.
   */
  async materializePlan(
    document: unknown,
    shape: PlanShape,
    options: MaterializeOptions = {},
  ): Promise<MaterializeResult> {
    const anchorDate = this.resolveAnchor(options.anchorDate)
    const parsed = parsePlanDocument(document)

    const { plan, tasks, warnings } = materializeDocument(parsed, document, shape, anchorDate, {
      name: options.name,
      goal: options.goal,
    })
    for (const warning of warnings) {
      this.logger.warn(warning)
    }

    const created = await this.store.createPlanWithTasks(plan, tasks)
    this.logger.log(
      `Materialized plan ${created.plan.id} (${shape}) ${plan.startDate}..${plan.endDate} with ${tasks.length} tasks`,
    )

    return {
      planId: created.plan.id,
      shape,
      startDate: plan.startDate,
      endDate: plan.endDate,
      taskCount: created.tasks.length,
      warnings,
    }
  }

  private resolveAnchor(anchorDate: string | undefined): string {
    if (anchorDate === undefined) return toDateKey(this.clock.now())
    const parsed = dateKeySchema.safeParse(anchorDate)
    if (!parsed.success) {
      throw ValidationError.fromZod('Anchor date', parsed.error)
    }
    return parsed.data
  }
}
