import { Logger, OnModuleDestroy } from '@nestjs/common'
import { readFile } from 'fs/promises'
import { join } from 'path'
import type { QueryResult, QueryResultRow } from 'pg'
import { z } from 'zod'
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

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>
}

export interface PgPoolClient extends PgQueryable {
  release(): void
}

/** The subset of `pg.Pool` the store relies on. */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgPoolClient>
  end(): Promise<void>
}

const SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'schema.sql')

const PLAN_COLUMNS = `id, name, shape, start_date::text AS start_date, end_date::text AS end_date, goal,
  document, document_hash, is_active, total_tasks, completed_tasks, created_at, updated_at`

const TASK_COLUMNS = `id, plan_id, scheduled_date::text AS scheduled_date, slot, category, title, description,
  planned_duration_min, intensity, target_heart_rate, steps, is_completed, completed_at, linked_activity_id,
  actual_duration_min, actual_effort, note, adjustment, created_at, updated_at`

const intensitySchema = z.enum(['low', 'moderate', 'high'])

const planRowSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    shape: z.enum(['single-week', 'multi-week-block']),
    start_date: z.string(),
    end_date: z.string(),
    goal: z.string(),
    document: z.unknown(),
    document_hash: z.string(),
    is_active: z.boolean(),
    total_tasks: z.number().int(),
    completed_tasks: z.number().int(),
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (r): Plan => ({
      id: r.id,
      name: r.name,
      shape: r.shape,
      startDate: r.start_date,
      endDate: r.end_date,
      goal: r.goal,
      document: r.document,
      documentHash: r.document_hash,
      isActive: r.is_active,
      totalTasks: r.total_tasks,
      completedTasks: r.completed_tasks,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }),
  )

const taskRowSchema = z
  .object({
    id: z.number().int(),
    plan_id: z.number().int(),
    scheduled_date: z.string(),
    slot: z.number().int(),
    category: z.string(),
    title: z.string(),
    description: z.string().nullable(),
    planned_duration_min: z.number().int().nullable(),
    intensity: intensitySchema,
    target_heart_rate: z.string().nullable(),
    steps: z.array(z.record(z.unknown())).nullable(),
    is_completed: z.boolean(),
    completed_at: z.date().nullable(),
    linked_activity_id: z.string().nullable(),
    actual_duration_min: z.number().int().nullable(),
    actual_effort: z
      .object({
        calories: z.number().nullable(),
        avgHr: z.number().nullable(),
        distanceKm: z.number().nullable(),
      })
      .nullable(),
    note: z.string().nullable(),
    adjustment: z
      .object({
        originalDurationMin: z.number().nullable(),
        originalIntensity: intensitySchema,
        factor: z.number(),
        reason: z.string(),
        adjustedAt: z.string(),
      })
      .nullable(),
    created_at: z.date(),
    updated_at: z.date(),
  })
  .transform(
    (r): ScheduledTask => ({
      id: r.id,
      planId: r.plan_id,
      scheduledDate: r.scheduled_date,
      slot: r.slot,
      category: r.category,
      title: r.title,
      description: r.description,
      plannedDurationMin: r.planned_duration_min,
      intensity: r.intensity,
      targetHeartRate: r.target_heart_rate,
      steps: r.steps,
      isCompleted: r.is_completed,
      completedAt: r.completed_at,
      linkedActivityId: r.linked_activity_id,
      actualDurationMin: r.actual_duration_min,
      actualEffort: r.actual_effort,
      note: r.note,
      adjustment: r.adjustment,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }),
  )

// pg would send a JS array as a Postgres array literal, so jsonb values go over the wire as text.
function jsonb(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value)
}

function toPlan(row: unknown): Plan {
  return planRowSchema.parse(row)
}

function toTask(row: unknown): ScheduledTask {
  return taskRowSchema.parse(row)
}

export class PgTaskStore implements TaskStore, OnModuleDestroy {
  private readonly logger = new Logger(PgTaskStore.name)

  constructor(private readonly pool: PgPool) {}

  async migrate(): Promise<void> {
    const ddl = await readFile(SCHEMA_PATH, 'utf8')
    await this.pool.query(ddl)
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end()
  }

  async createPlanWithTasks(draft: PlanDraft, drafts: TaskDraft[]): Promise<{ plan: Plan; tasks: ScheduledTask[] }> {
    return this.inTransaction(async (client) => {
      const planResult = await client.query(
        `INSERT INTO training_plan (name, shape, start_date, end_date, goal, document, document_hash, total_tasks)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${PLAN_COLUMNS}`,
        [
          draft.name,
          draft.shape,
          draft.startDate,
          draft.endDate,
          draft.goal,
          jsonb(draft.document),
          draft.documentHash,
          drafts.length,
        ],
      )
      const plan = toPlan(planResult.rows[0])
      if (drafts.length === 0) return { plan, tasks: [] }

      const values: unknown[] = []
      const tuples = drafts.map((t) => {
        const base = values.length
        values.push(
          plan.id,
          t.scheduledDate,
          t.slot,
          t.category,
          t.title,
          t.description,
          t.plannedDurationMin,
          t.intensity,
          t.targetHeartRate,
          jsonb(t.steps),
        )
        const placeholders = Array.from({ length: 10 }, (_, i) => `$${base + i + 1}`)
        return `(${placeholders.join(', ')})`
      })

      const taskResult = await client.query(
        `INSERT INTO scheduled_task (plan_id, scheduled_date, slot, category, title, description,
           planned_duration_min, intensity, target_heart_rate, steps)
         VALUES ${tuples.join(', ')}
         RETURNING ${TASK_COLUMNS}`,
        values,
      )
      const tasks = taskResult.rows
        .map(toTask)
        .sort((a, b) => a.scheduledDate.localeCompare(b.scheduledDate) || a.slot - b.slot)

      return { plan, tasks }
    })
  }

  async findPlan(planId: number): Promise<Plan | null> {
    const result = await this.pool.query(`SELECT ${PLAN_COLUMNS} FROM training_plan WHERE id = $1`, [planId])
    const row = result.rows[0]
    return row ? toPlan(row) : null
  }

  async listPlans(opts?: { activeOnly?: boolean }): Promise<Plan[]> {
    const where = opts?.activeOnly ? 'WHERE is_active = true' : ''
    const result = await this.pool.query(
      `SELECT ${PLAN_COLUMNS} FROM training_plan ${where} ORDER BY created_at DESC, id DESC`,
    )
    return result.rows.map(toPlan)
  }

  async setPlanActive(planId: number, isActive: boolean): Promise<Plan | null> {
    const result = await this.pool.query(
      `UPDATE training_plan SET is_active = $2, updated_at = now() WHERE id = $1 RETURNING ${PLAN_COLUMNS}`,
      [planId, isActive],
    )
    const row = result.rows[0]
    return row ? toPlan(row) : null
  }

  async deletePlan(planId: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM training_plan WHERE id = $1', [planId])
    return (result.rowCount ?? 0) > 0
  }

  async findTask(taskId: number): Promise<ScheduledTask | null> {
    return this.selectTask(this.pool, taskId)
  }

  async listTasks(query: TaskQuery): Promise<ScheduledTask[]> {
    const conditions: string[] = []
    const values: unknown[] = []
    const add = (sql: string, value: unknown) => {
      values.push(value)
      conditions.push(sql.replace('?', `$${values.length}`))
    }

    if (query.planId !== undefined) add('plan_id = ?', query.planId)
    if (query.from !== undefined) add('scheduled_date >= ?', query.from)
    if (query.to !== undefined) add('scheduled_date <= ?', query.to)
    if (query.incompleteOnly) conditions.push('is_completed = false')

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : ''
    const result = await this.pool.query(
      `SELECT ${TASK_COLUMNS} FROM scheduled_task ${where} ORDER BY scheduled_date, slot, id`,
      values,
    )
    return result.rows.flatMap((row) => {
      const parsed = taskRowSchema.safeParse(row)
      if (parsed.success) return [parsed.data]
      const issue = parsed.error.issues[0]
      this.logger.warn(
        `Skipping unreadable task row ${String(row.id)}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      )
      return []
    })
  }

  async linkedActivityIds(): Promise<string[]> {
    const result = await this.pool.query(
      'SELECT DISTINCT linked_activity_id FROM scheduled_task WHERE linked_activity_id IS NOT NULL',
    )
    return result.rows.flatMap((row) => (typeof row.linked_activity_id === 'string' ? [row.linked_activity_id] : []))
  }

  async completeTask(
    taskId: number,
    completion: TaskCompletion,
  ): Promise<{ task: ScheduledTask; changed: boolean } | null> {
    return this.inTransaction(async (client) => {
      const updated = await client.query(
        `UPDATE scheduled_task
            SET is_completed = true,
                completed_at = $2,
                linked_activity_id = $3,
                actual_duration_min = $4,
                actual_effort = $5,
                note = CASE WHEN $6::boolean THEN $7 ELSE note END,
                updated_at = now()
          WHERE id = $1 AND is_completed = false
          RETURNING ${TASK_COLUMNS}`,
        [
          taskId,
          completion.completedAt,
          completion.linkedActivityId,
          completion.actualDurationMin,
          jsonb(completion.actualEffort),
          completion.note !== undefined,
          completion.note ?? null,
        ],
      )

      const row = updated.rows[0]
      if (!row) {
        const existing = await this.selectTask(client, taskId)
        return existing ? { task: existing, changed: false } : null
      }

      const task = toTask(row)
      await client.query(
        `UPDATE training_plan
            SET completed_tasks = LEAST(total_tasks, completed_tasks + 1), updated_at = now()
          WHERE id = $1`,
        [task.planId],
      )
      return { task, changed: true }
    })
  }

  async updateIncompleteTask(taskId: number, patch: TaskLoadPatch): Promise<ScheduledTask | null> {
    const result = await this.pool.query(
      `UPDATE scheduled_task
          SET planned_duration_min = $2, intensity = $3, adjustment = $4, updated_at = now()
        WHERE id = $1 AND is_completed = false
        RETURNING ${TASK_COLUMNS}`,
      [taskId, patch.plannedDurationMin, patch.intensity, jsonb(patch.adjustment)],
    )
    const row = result.rows[0]
    return row ? toTask(row) : null
  }

  async updateTaskNote(taskId: number, note: string | null): Promise<ScheduledTask | null> {
    const result = await this.pool.query(
      `UPDATE scheduled_task SET note = $2, updated_at = now() WHERE id = $1 RETURNING ${TASK_COLUMNS}`,
      [taskId, note],
    )
    const row = result.rows[0]
    return row ? toTask(row) : null
  }

  private async selectTask(db: PgQueryable, taskId: number): Promise<ScheduledTask | null> {
    const result = await db.query(`SELECT ${TASK_COLUMNS} FROM scheduled_task WHERE id = $1`, [taskId])
    const row = result.rows[0]
    return row ? toTask(row) : null
  }

  private async inTransaction<T>(work: (client: PgPoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect()
    try {
      await client.query('BEGIN')
      const result = await work(client)
      await client.query('COMMIT')
      return result
    } catch (err) {
      try {
        await client.query('ROLLBACK')
      } catch (rollbackErr) {
        this.logger.error(`Rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`)
      }
      throw err
    } finally {
      client.release()
    }
  }
}
