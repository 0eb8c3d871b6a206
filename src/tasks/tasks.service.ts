import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { NotFoundError, ValidationError } from '../common/errors'
import { addDays, compareDateKeys, parseDateKey, toDateKey } from '../plan-materializer/plan-calendar'
import { dateKeySchema } from '../readiness/readiness.schema'
import { TASK_STORE, type TaskStore } from '../task-store/task-store'
import type { ScheduledTask, TaskEffort } from '../task-store/task-store.types'
import {
  DEFAULT_LISTING_DAYS,
  MAX_LISTING_DAYS,
  type CompletionOutcome,
  type ManualCompletionInput,
  type TaskListing,
  type TaskListingQuery,
} from './tasks.types'

const MS_PER_DAY = 24 * 60 * 60 * 1000

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name)

  constructor(
    @Inject(TASK_STORE) private readonly store: TaskStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getTask(taskId: number): Promise<ScheduledTask> {
    const task = await this.store.findTask(taskId)
    if (!task) throw new NotFoundError('Task', taskId)
    return task
  }

  /**
   * Tasks between `from` and `to` inclusive. Without `to` the window is
   * `days` long (7 by default); no window may exceed 90 days.
   */
  async listTasks(query: TaskListingQuery = {}): Promise<TaskListing> {
    const from = query.from === undefined ? toDateKey(this.clock.now()) : this.dateKey('from', query.from)

    const days = query.days ?? DEFAULT_LISTING_DAYS
    if (!Number.isInteger(days) || days < 1 || days > MAX_LISTING_DAYS) {
      throw new ValidationError(`days must be an integer between 1 and ${MAX_LISTING_DAYS}`)
    }
    const to = query.to === undefined ? addDays(from, days) : this.dateKey('to', query.to)

    if (compareDateKeys(to, from) < 0) {
      throw new ValidationError(`Range end ${to} is before its start ${from}`)
    }
    const span = (parseDateKey(to).getTime() - parseDateKey(from).getTime()) / MS_PER_DAY
    if (span > MAX_LISTING_DAYS) {
      throw new ValidationError(`Range ${from}..${to} exceeds ${MAX_LISTING_DAYS} days`)
    }

    const tasks = await this.store.listTasks({ from, to, planId: query.planId })
    return { from, to, total: tasks.length, tasks }
  }

  /**
   * Marks a task complete without a matched activity. Completing an already
   * completed task returns it unchanged.
   */
  async completeTaskManually(taskId: number, actual: ManualCompletionInput = {}): Promise<CompletionOutcome> {
    const outcome = await this.store.completeTask(taskId, {
      completedAt: this.clock.now(),
      linkedActivityId: actual.linkedActivityId ?? null,
      actualDurationMin: actual.actualDurationMin ?? null,
      actualEffort: this.effort(actual.actualEffort),
      ...(actual.note !== undefined ? { note: actual.note } : {}),
    })
    if (!outcome) throw new NotFoundError('Task', taskId)

    if (outcome.changed) {
      this.logger.log(`Task ${taskId} of plan ${outcome.task.planId} completed manually`)
    }
    return { task: outcome.task, alreadyCompleted: !outcome.changed }
  }

  async updateTaskNote(taskId: number, note: string | null): Promise<ScheduledTask> {
    const task = await this.store.updateTaskNote(taskId, note === null || note.trim() === '' ? null : note)
    if (!task) throw new NotFoundError('Task', taskId)
    return task
  }

  private dateKey(field: string, value: string): string {
    const parsed = dateKeySchema.safeParse(value)
    if (!parsed.success) throw ValidationError.fromZod(field, parsed.error)
    return parsed.data
  }

  private effort(raw: Partial<TaskEffort> | null | undefined): TaskEffort | null {
    if (!raw) return null
    const effort: TaskEffort = {
      calories: raw.calories ?? null,
      avgHr: raw.avgHr ?? null,
      distanceKm: raw.distanceKm ?? null,
    }
    return effort.calories === null && effort.avgHr === null && effort.distanceKm === null ? null : effort
  }
}
