import { FixedClock } from '../src/common/clock'
import { NotFoundError, ValidationError } from '../src/common/errors'
import { PlanAdjustmentsService } from '../src/plan-adjustments/plan-adjustments.service'
import { InMemoryTaskStore } from '../src/task-store/in-memory-task.store'
import type { TaskDraft } from '../src/task-store/task-store.types'

const draft = (overrides: Partial<TaskDraft>): TaskDraft => ({
  scheduledDate: '2024-06-06',
  slot: 0,
  category: 'endurance',
  title: 'Task',
  description: null,
  plannedDurationMin: 45,
  intensity: 'moderate',
  targetHeartRate: null,
  steps: null,
  ...overrides,
})

const planDraft = {
  name: 'Week 23',
  shape: 'single-week' as const,
  startDate: '2024-06-03',
  endDate: '2024-06-09',
  goal: 'General Fitness',
  document: {},
  documentHash: '0'.repeat(64),
}

describe('PlanAdjustmentsService', () => {
  let clock: FixedClock
  let store: InMemoryTaskStore
  let service: PlanAdjustmentsService

  beforeEach(() => {
    clock = new FixedClock(new Date('2024-06-05T06:00:00.000Z'))
    store = new InMemoryTaskStore(clock)
    service = new PlanAdjustmentsService(store, clock)
  })

  it('de-rates remaining tasks for low readiness and poor sleep', async () => {
    const { plan, tasks } = await store.createPlanWithTasks(planDraft, [
      draft({ title: 'Intervals', slot: 0, plannedDurationMin: 60, intensity: 'high' }),
      draft({ title: 'Recovery jog', slot: 1, plannedDurationMin: 30, intensity: 'low' }),
    ])
    const [high, low] = tasks
    if (!high || !low) throw new Error('expected two tasks')

    const result = await service.adjustPlan(plan.id, { score: 40, sleepQuality: 30 }, 'auto')

    expect(result).toEqual({
      planId: plan.id,
      mode: 'auto',
      factor: 0.63,
      rationale: ['Readiness low (40) - reducing load 30%', 'Sleep quality low (30) - prioritizing recovery'],
      adjustedCount: 2,
      skipped: 0,
      adjustments: [
        { taskId: high.id, durationMin: { from: 60, to: 38 }, intensity: { from: 'high', to: 'moderate' } },
        { taskId: low.id, durationMin: { from: 30, to: 19 }, intensity: { from: 'low', to: 'low' } },
      ],
    })
    expect((await store.findTask(high.id))?.adjustment).toEqual({
      originalDurationMin: 60,
      originalIntensity: 'high',
      factor: 0.63,
      reason: 'Readiness low (40) - reducing load 30%; Sleep quality low (30) - prioritizing recovery',
      adjustedAt: '2024-06-05T06:00:00.000Z',
    })
  })

  it('never modifies a completed task', async () => {
    const { plan, tasks } = await store.createPlanWithTasks(planDraft, [
      draft({ title: 'Done', scheduledDate: '2024-06-04', plannedDurationMin: 50, intensity: 'high' }),
      draft({ title: 'Next', scheduledDate: '2024-06-06', plannedDurationMin: 50, intensity: 'high' }),
    ])
    const [done] = tasks
    if (!done) throw new Error('expected a task')
    await store.completeTask(done.id, {
      completedAt: clock.now(),
      linkedActivityId: null,
      actualDurationMin: 50,
      actualEffort: null,
    })

    const result = await service.adjustPlan(plan.id, { score: 40, sleepQuality: 30 }, 'auto')

    expect(result.adjustments.map((a) => a.taskId)).not.toContain(done.id)
    expect(await store.findTask(done.id)).toMatchObject({ plannedDurationMin: 50, intensity: 'high', adjustment: null })
  })

  it('skips a task that completes while the adjustment runs', async () => {
    const { plan, tasks } = await store.createPlanWithTasks(planDraft, [draft({ plannedDurationMin: 40 })])
    const [only] = tasks
    if (!only) throw new Error('expected a task')

    const updateIncompleteTask = store.updateIncompleteTask.bind(store)
    jest.spyOn(store, 'updateIncompleteTask').mockImplementation(async (taskId, patch) => {
      await store.completeTask(taskId, {
        completedAt: clock.now(),
        linkedActivityId: 'late',
        actualDurationMin: 40,
        actualEffort: null,
      })
      return updateIncompleteTask(taskId, patch)
    })

    const result = await service.adjustPlan(plan.id, null, 'manual-decrease')

    expect(result.adjustedCount).toBe(0)
    expect(result.skipped).toBe(0)
    expect(await store.findTask(only.id)).toMatchObject({ isCompleted: true, plannedDurationMin: 40 })
  })

  it('applies the manual factors without readiness', async () => {
    const { plan } = await store.createPlanWithTasks(planDraft, [draft({ plannedDurationMin: 40 })])

    const up = await service.adjustPlan(plan.id, undefined, 'manual-increase')
    expect(up.factor).toBe(1.15)
    expect(up.adjustments[0]?.durationMin).toEqual({ from: 40, to: 46 })
  })

  it('downgrades high sessions on add-recovery without touching durations', async () => {
    const { plan } = await store.createPlanWithTasks(planDraft, [
      draft({ slot: 0, intensity: 'high', plannedDurationMin: 60 }),
      draft({ slot: 1, intensity: 'moderate', plannedDurationMin: 30 }),
    ])

    const result = await service.adjustPlan(plan.id, undefined, 'add-recovery')

    expect(result.adjustedCount).toBe(1)
    expect(result.adjustments[0]).toMatchObject({ durationMin: { from: 60, to: 60 }, intensity: { from: 'high', to: 'moderate' } })
  })

  it('reports zero adjustments when everything is complete', async () => {
    const { plan, tasks } = await store.createPlanWithTasks(planDraft, [draft({})])
    const [only] = tasks
    if (!only) throw new Error('expected a task')
    await store.completeTask(only.id, { completedAt: clock.now(), linkedActivityId: null, actualDurationMin: null, actualEffort: null })

    const result = await service.adjustPlan(plan.id, { score: 30 }, 'auto')

    expect(result).toEqual({
      planId: plan.id,
      mode: 'auto',
      factor: 1,
      rationale: ['All tasks are already completed'],
      adjustedCount: 0,
      skipped: 0,
      adjustments: [],
    })
  })

  it('rejects unknown plans and auto mode without a readiness snapshot', async () => {
    await expect(service.adjustPlan(99, { score: 50 }, 'auto')).rejects.toBeInstanceOf(NotFoundError)

    const { plan } = await store.createPlanWithTasks(planDraft, [draft({})])
    await expect(service.adjustPlan(plan.id, undefined, 'auto')).rejects.toBeInstanceOf(ValidationError)
    await expect(service.adjustPlan(plan.id, { score: 140 }, 'auto')).rejects.toThrow('Readiness snapshot is invalid')
  })
})
