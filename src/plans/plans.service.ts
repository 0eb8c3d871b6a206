import { Inject, Injectable, Logger } from '@nestjs/common'
import { NotFoundError, ValidationError } from '../common/errors'
import { PlanContentService } from '../plan-content/plan-content.service'
import type { MaterializeResult } from '../plan-materializer/plan-document.types'
import { PlanMaterializerService } from '../plan-materializer/plan-materializer.service'
import { readinessSnapshotInputSchema, type ReadinessSnapshotInput } from '../readiness/readiness.schema'
import { TASK_STORE, type TaskStore } from '../task-store/task-store'
import type { Plan } from '../task-store/task-store.types'
import type { GeneratePlanRequest, PlanDetails, PlanSummary } from './plans.types'

export function progressPct(plan: Pick<Plan, 'totalTasks' | 'completedTasks'>): number {
  return plan.totalTasks === 0 ? 0 : Math.round((plan.completedTasks / plan.totalTasks) * 100)
}

function toSummary(plan: Plan): PlanSummary {
  const { document: _document, ...rest } = plan
  return { ...rest, progressPct: progressPct(plan) }
}

@Injectable()
export class PlansService {
  private readonly logger = new Logger(PlansService.name)

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    private readonly materializer: PlanMaterializerService,
    private readonly planContent: PlanContentService,
  ) {}

  async listPlans(opts: { activeOnly?: boolean } = {}): Promise<PlanSummary[]> {
    const plans = await this.store.listPlans(opts)
    return plans.map(toSummary)
  }

  async getPlanDetails(planId: number): Promise<PlanDetails> {
    const plan = await this.store.findPlan(planId)
    if (!plan) throw new NotFoundError('Plan', planId)
    const tasks = await this.store.listTasks({ planId })
    return { plan: { ...plan, progressPct: progressPct(plan) }, tasks }
  }

  async deactivatePlan(planId: number): Promise<PlanSummary> {
    const plan = await this.store.setPlanActive(planId, false)
    if (!plan) throw new NotFoundError('Plan', planId)
    this.logger.log(`Plan ${planId} deactivated`)
    return toSummary(plan)
  }

  async deletePlan(planId: number): Promise<{ planId: number; deleted: true }> {
    const deleted = await this.store.deletePlan(planId)
    if (!deleted) throw new NotFoundError('Plan', planId)
    this.logger.log(`Plan ${planId} deleted with its tasks`)
    return { planId, deleted: true }
  }

  /** Requests a document from the content provider and materializes it as a new plan. */
  async generatePlan(request: GeneratePlanRequest): Promise<MaterializeResult> {
    const document = await this.planContent.requestDocument({
      shape: request.shape,
      goal: request.goal,
      weeks: request.weeks,
      daysPerWeek: request.daysPerWeek,
      readiness: this.parseReadiness(request.readiness),
    })
    return this.materializer.materializePlan(document, request.shape, {
      anchorDate: request.anchorDate,
      name: request.name,
      goal: request.goal,
    })
  }

  private parseReadiness(raw: unknown): ReadinessSnapshotInput | undefined {
    if (raw === undefined || raw === null) return undefined
    const parsed = readinessSnapshotInputSchema.safeParse(raw)
    if (!parsed.success) throw ValidationError.fromZod('Readiness snapshot', parsed.error)
    return parsed.data
  }
}
