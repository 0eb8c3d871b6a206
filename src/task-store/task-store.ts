import type {
  Plan,
  PlanDraft,
  ScheduledTask,
  TaskCompletion,
  TaskDraft,
  TaskLoadPatch,
  TaskQuery,
} from './task-store.types'

export const TASK_STORE = Symbol('TASK_STORE')

/**
 * Persistence contract for plans and their scheduled tasks.
 *
 * Multi-row writes are atomic: a plan becomes visible together with all of
 * its tasks, and a completion updates the task and the plan counter as one unit.
 */
export interface TaskStore {
  createPlanWithTasks(plan: PlanDraft, tasks: TaskDraft[]): Promise<{ plan: Plan; tasks: ScheduledTask[] }>

  findPlan(planId: number): Promise<Plan | null>

  listPlans(opts?: { activeOnly?: boolean }): Promise<Plan[]>

  setPlanActive(planId: number, isActive: boolean): Promise<Plan | null>

  /** Removes the plan and its tasks. Returns false for an unknown id. */
  deletePlan(planId: number): Promise<boolean>

  findTask(taskId: number): Promise<ScheduledTask | null>

  /**
   * Ordered by scheduled date, then slot. A stored row that cannot be read is
   * logged and left out.
   */
  listTasks(query: TaskQuery): Promise<ScheduledTask[]>

  /** Activity ids already credited to a task of any plan. */
  linkedActivityIds(): Promise<string[]>

  /**
   * Marks an incomplete task complete and bumps the plan's completed counter.
   * An already-complete task is returned untouched with changed=false.
   */
  completeTask(taskId: number, completion: TaskCompletion): Promise<{ task: ScheduledTask; changed: boolean } | null>

  /**
   * Rewrites duration/intensity only while the task is still incomplete;
   * returns null when the task is missing or was completed in the meantime.
   */
  updateIncompleteTask(taskId: number, patch: TaskLoadPatch): Promise<ScheduledTask | null>

  updateTaskNote(taskId: number, note: string | null): Promise<ScheduledTask | null>
}
