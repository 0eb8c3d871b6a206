import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { NotFoundError } from '../common/errors'
import { TASK_STORE, type TaskStore } from '../task-store/task-store'
import type { Plan } from '../task-store/task-store.types'
import { parseActivityWindow } from './completion-matching.schema'
import { completionFromActivity, findMatch, prepareWindow } from './completion-matching.rules'
import type { ActivityRecord, ReconcileAllResult, ReconcileResult, TaskMatch } from './completion-matching.types'

@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name)

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async reconcileActivities(planId: number, activityWindow: unknown): Promise<ReconcileResult> {
    const plan = await this.store.findPlan(planId)
    if (!plan) throw new NotFoundError('Plan', planId)

    const activities = parseActivityWindow(activityWindow)
    return this.reconcilePlan(plan, activities, await this.usedActivityIds())
  }

  /**
   * Runs matching across every active plan, newest first. An activity credited
   * to a task in one plan is not offered to the plans after it.
   */
  async reconcileActivePlans(activityWindow: unknown): Promise<ReconcileAllResult> {
    const activities = parseActivityWindow(activityWindow)
    const plans = await this.store.listPlans({ activeOnly: true })

    const used = await this.usedActivityIds()
    const results: ReconcileResult[] = []
    for (const plan of plans) {
      results.push(await this.reconcilePlan(plan, activities, used))
    }

    return {
      matchedCount: results.reduce((n, r) => n + r.matchedCount, 0),
      plans: results,
    }
  }

  private async reconcilePlan(plan: Plan, activities: ActivityRecord[], used: Set<string>): Promise<ReconcileResult> {
    const tasks = await this.store.listTasks({ planId: plan.id })
    const window = prepareWindow(activities)
    const matches: TaskMatch[] = []
    let skipped = 0

    for (const task of tasks) {
      if (task.isCompleted) continue
      try {
        const activity = findMatch(task, window, used)
        if (!activity) continue

        const outcome = await this.store.completeTask(task.id, completionFromActivity(activity, this.clock.now()))
        if (!outcome?.changed) continue

        used.add(activity.activityId)
        matches.push({
          taskId: task.id,
          taskTitle: task.title,
          scheduledDate: task.scheduledDate,
          activityId: activity.activityId,
          activityName: activity.name,
          activityType: activity.activityType,
        })
      } catch (err) {
        skipped++
        this.logger.warn(
          `Skipping task ${task.id} of plan ${plan.id} during reconciliation: ${err instanceof Error ? err.message : String(err)}`,
        )
      }
    }

    this.logger.log(`Reconciled plan ${plan.id}: ${matches.length} matched, ${skipped} skipped`)
    return { planId: plan.id, matchedCount: matches.length, skipped, matches }
  }

  // An activity already credited anywhere is never credited again.
  private async usedActivityIds(): Promise<Set<string>> {
    return new Set(await this.store.linkedActivityIds())
  }
}
