import type { Clock } from '../common/clock'
import { SystemClock } from '../common/clock'
import { compareDateKeys } from '../plan-materializer/plan-calendar'
import type { TaskStore } from './task-store'
import type {
  Plan,
  PlanDraft,
  ScheduledTask,
  TaskCompletion,
  TaskDraft,
  TaskLoadPatch,
  TaskQuery,
} from './task-store.types'

/**
 * Single-process store. Every call runs to completion without yielding between
 * reads and writes, so each operation is atomic with respect to the others.
 */
export class InMemoryTaskStore implements TaskStore {
  private plans = new Map<number, Plan>()
  private tasks = new Map<number, ScheduledTask>()
  private nextPlanId = 1
  private nextTaskId = 1

  constructor(private readonly clock: Clock = new SystemClock()) {}

  async createPlanWithTasks(draft: PlanDraft, drafts: TaskDraft[]): Promise<{ plan: Plan; tasks: ScheduledTask[] }> {
    const seen = new Set<string>()
    for (const t of drafts) {
      const key = `${t.scheduledDate}#${t.slot}`
      if (seen.has(key)) {
        throw new Error(`Duplicate task slot ${key} in plan draft`)
      }
      seen.add(key)
    }

    const now = this.clock.now()
    const plan: Plan = {
      ...draft,
      id: this.nextPlanId++,
      isActive: true,
      totalTasks: drafts.length,
      completedTasks: 0,
      createdAt: now,
      updatedAt: now,
    }

    const created = drafts.map<ScheduledTask>((t) => ({
      ...t,
      id: this.nextTaskId++,
      planId: plan.id,
      isCompleted: false,
      completedAt: null,
      linkedActivityId: null,
      actualDurationMin: null,
      actualEffort: null,
      note: null,
      adjustment: null,
      createdAt: now,
      updatedAt: now,
    }))

    this.plans.set(plan.id, plan)
    for (const t of created) this.tasks.set(t.id, t)

    return { plan: structuredClone(plan), tasks: created.map((t) => structuredClone(t)) }
  }

  async findPlan(planId: number): Promise<Plan | null> {
    const plan = this.plans.get(planId)
    return plan ? structuredClone(plan) : null
  }

  async listPlans(opts?: { activeOnly?: boolean }): Promise<Plan[]> {
    return [...this.plans.values()]
      .filter((p) => !opts?.activeOnly || p.isActive)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((p) => structuredClone(p))
  }

  async setPlanActive(planId: number, isActive: boolean): Promise<Plan | null> {
    const plan = this.plans.get(planId)
    if (!plan) return null
    plan.isActive = isActive
    plan.updatedAt = this.clock.now()
    return structuredClone(plan)
  }

  async deletePlan(planId: number): Promise<boolean> {
    if (!this.plans.delete(planId)) return false
    for (const [id, task] of this.tasks) {
      if (task.planId === planId) this.tasks.delete(id)
    }
    return true
  }

  async findTask(taskId: number): Promise<ScheduledTask | null> {
    const task = this.tasks.get(taskId)
    return task ? structuredClone(task) : null
  }

  async listTasks(query: TaskQuery): Promise<ScheduledTask[]> {
    return [...this.tasks.values()]
      .filter((t) => query.planId === undefined || t.planId === query.planId)
      .filter((t) => query.from === undefined || compareDateKeys(t.scheduledDate, query.from) >= 0)
      .filter((t) => query.to === undefined || compareDateKeys(t.scheduledDate, query.to) <= 0)
      .filter((t) => !query.incompleteOnly || !t.isCompleted)
      .sort((a, b) => compareDateKeys(a.scheduledDate, b.scheduledDate) || a.slot - b.slot || a.id - b.id)
      .map((t) => structuredClone(t))
  }

  async linkedActivityIds(): Promise<string[]> {
    const ids = new Set<string>()
    for (const task of this.tasks.values()) {
      if (task.linkedActivityId !== null) ids.add(task.linkedActivityId)
    }
    return [...ids]
  }

  async completeTask(
    taskId: number,
    completion: TaskCompletion,
  ): Promise<{ task: ScheduledTask; changed: boolean } | null> {
    const task = this.tasks.get(taskId)
    if (!task) return null
    if (task.isCompleted) return { task: structuredClone(task), changed: false }

    task.isCompleted = true
    task.completedAt = completion.completedAt
    task.linkedActivityId = completion.linkedActivityId
    task.actualDurationMin = completion.actualDurationMin
    task.actualEffort = completion.actualEffort
    if (completion.note !== undefined) task.note = completion.note
    task.updatedAt = this.clock.now()

    const plan = this.plans.get(task.planId)
    if (plan) {
      plan.completedTasks = Math.min(plan.totalTasks, plan.completedTasks + 1)
      plan.updatedAt = task.updatedAt
    }

    return { task: structuredClone(task), changed: true }
  }

  async updateIncompleteTask(taskId: number, patch: TaskLoadPatch): Promise<ScheduledTask | null> {
    const task = this.tasks.get(taskId)
    if (!task || task.isCompleted) return null

    task.plannedDurationMin = patch.plannedDurationMin
    task.intensity = patch.intensity
    task.adjustment = patch.adjustment
    task.updatedAt = this.clock.now()
    return structuredClone(task)
  }

  async updateTaskNote(taskId: number, note: string | null): Promise<ScheduledTask | null> {
    const task = this.tasks.get(taskId)
    if (!task) return null
    task.note = note
    task.updatedAt = this.clock.now()
    return structuredClone(task)
  }
}
