import 'reflect-metadata'
import { ServiceUnavailableException } from '@nestjs/common'
import { Test, type TestingModule } from '@nestjs/testing'
import { AppController } from '../src/app.controller'
import { AppModule } from '../src/app.module'
import { CLOCK, FixedClock } from '../src/common/clock'
import { APP_CONFIG, type AppConfig } from '../src/config/app-config'
import { PlansController } from '../src/plans/plans.controller'
import { ReadinessController } from '../src/readiness/readiness.controller'
import { TasksController } from '../src/tasks/tasks.controller'

const config: AppConfig = {
  port: 3000,
  corsOrigin: 'http://localhost:5173',
  database: null,
  planContent: { provider: 'none' },
}

describe('AppModule (in-memory store)', () => {
  let module: TestingModule
  let plans: PlansController
  let tasks: TasksController
  let readiness: ReadinessController

  beforeAll(async () => {
    module = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(APP_CONFIG)
      .useValue(config)
      .overrideProvider(CLOCK)
      .useValue(new FixedClock(new Date('2024-06-04T20:00:00.000Z')))
      .compile()

    plans = module.get(PlansController)
    tasks = module.get(TasksController)
    readiness = module.get(ReadinessController)
  })

  afterAll(async () => {
    await module.close()
  })

  it('runs a plan from materialization through reconciliation and adjustment', async () => {
    const created = await plans.materialize({
      shape: 'single-week',
      document: {
        plan_name: 'Week 23',
        days: [
          { day_label: 'Monday', title: 'Easy run', category: 'easy_run', duration: 45, intensity: 'low' },
          { day_label: 'Tuesday', title: 'Rest', category: 'rest' },
          { day_label: 'Thursday', title: 'Intervals', category: 'interval', duration: 60, intensity: 'high' },
        ],
      },
    })
    expect(created).toMatchObject({ startDate: '2024-06-03', endDate: '2024-06-09', taskCount: 3 })

    const listing = await tasks.list({ from: '2024-06-03', days: 7 })
    expect(listing.tasks.map((t) => [t.scheduledDate, t.title])).toEqual([
      ['2024-06-03', 'Easy run'],
      ['2024-06-04', 'Rest'],
      ['2024-06-06', 'Intervals'],
    ])

    const reconciled = await plans.reconcile(created.planId, {
      activities: [
        {
          activityId: 9001,
          startTimeLocal: '2024-06-03T07:15:00',
          activityType: 'running',
          durationSec: 2730,
          distanceM: 8045,
        },
      ],
    })
    expect(reconciled.matchedCount).toBe(1)

    const adjusted = await plans.adjust(created.planId, { mode: 'auto', readiness: { score: 40, sleepQuality: 30 } })
    expect(adjusted.factor).toBe(0.63)
    expect(adjusted.adjustments).toEqual([
      { taskId: 3, durationMin: { from: 60, to: 38 }, intensity: { from: 'high', to: 'moderate' } },
    ])

    const details = await plans.details(created.planId)
    expect(details.plan).toMatchObject({ completedTasks: 1, totalTasks: 3, progressPct: 33 })
  })

  it('reports which store and content provider are wired', () => {
    expect(module.get(AppController).getRoot()).toEqual({
      status: 'ok',
      service: 'Training Schedule API',
      taskStore: 'memory',
      planContentProvider: 'none',
    })
  })

  it('evaluates readiness against the injected clock', () => {
    const snapshot = readiness.getToday({ today: { sleepQuality: 82 } })
    expect(snapshot).toMatchObject({ asOfDate: '2024-06-04', score: 80, directive: 'proceed' })
  })

  it('reports plan generation as unavailable without a provider', async () => {
    await expect(plans.generate({ shape: 'single-week', goal: '10k' })).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    )
  })
})
