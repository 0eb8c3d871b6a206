import { BadGatewayException } from '@nestjs/common'
import { FixedClock } from '../src/common/clock'
import { NotFoundError, ValidationError } from '../src/common/errors'
import { PlanContentService } from '../src/plan-content/plan-content.service'
import type { PlanContentClient } from '../src/plan-content/plan-content.types'
import { PlanMaterializerService } from '../src/plan-materializer/plan-materializer.service'
import { PlansService, progressPct } from '../src/plans/plans.service'
import { InMemoryTaskStore } from '../src/task-store/in-memory-task.store'

class ScriptedClient implements PlanContentClient {
  readonly provider = 'scripted'
  readonly calls: Array<{ instructions: string; input: string }> = []

  constructor(private readonly output: string) {}

  async generate(instructions: string, input: string): Promise<string> {
    this.calls.push({ instructions, input })
    return this.output
  }
}

const weekDocument = {
  plan_name: 'Base week',
  primary_goal: '10k',
  days: [
    { day_label: 'Monday', title: 'Easy run', category: 'easy_run', duration: 40, intensity: 'low' },
    { day_label: 'Wednesday', title: 'Intervals', category: 'interval', duration: 50, intensity: 'high' },
    { day_label: 'Sunday', title: 'Long run', category: 'long_run', duration: 90, intensity: 'moderate' },
  ],
}

describe('PlansService', () => {
  let clock: FixedClock
  let store: InMemoryTaskStore
  let materializer: PlanMaterializerService

  const build = (client: PlanContentClient) =>
    new PlansService(store, materializer, new PlanContentService(client))

  beforeEach(() => {
    clock = new FixedClock(new Date('2024-06-05T08:00:00.000Z'))
    store = new InMemoryTaskStore(clock)
    materializer = new PlanMaterializerService(store, clock)
  })

  it('progressPct rounds and handles empty plans', () => {
    expect(progressPct({ totalTasks: 3, completedTasks: 1 })).toBe(33)
    expect(progressPct({ totalTasks: 3, completedTasks: 2 })).toBe(67)
    expect(progressPct({ totalTasks: 0, completedTasks: 0 })).toBe(0)
  })

  it('lists plans newest first without their documents', async () => {
    const service = build(new ScriptedClient('{}'))
    const first = await materializer.materializePlan(weekDocument, 'single-week')
    clock.set(new Date('2024-06-06T08:00:00.000Z'))
    const second = await materializer.materializePlan(weekDocument, 'single-week', { name: 'Second' })

    const plans = await service.listPlans()

    expect(plans.map((p) => [p.id, p.name])).toEqual([
      [second.planId, 'Second'],
      [first.planId, 'Base week'],
    ])
    expect(plans[0]).not.toHaveProperty('document')
    expect(plans[0]?.progressPct).toBe(0)
  })

  it('returns details with tasks and progress', async () => {
    const service = build(new ScriptedClient('{}'))
    const { planId } = await materializer.materializePlan(weekDocument, 'single-week')
    const [monday] = await store.listTasks({ planId })
    if (!monday) throw new Error('expected a task')
    await store.completeTask(monday.id, {
      completedAt: clock.now(),
      linkedActivityId: null,
      actualDurationMin: 40,
      actualEffort: null,
    })

    const details = await service.getPlanDetails(planId)

    expect(details.plan).toMatchObject({ id: planId, totalTasks: 3, completedTasks: 1, progressPct: 33 })
    expect(details.plan.document).toEqual(weekDocument)
    expect(details.tasks.map((t) => [t.scheduledDate, t.title])).toEqual([
      ['2024-06-03', 'Easy run'],
      ['2024-06-05', 'Intervals'],
      ['2024-06-09', 'Long run'],
    ])
  })

  it('deactivates and deletes plans', async () => {
    const service = build(new ScriptedClient('{}'))
    const { planId } = await materializer.materializePlan(weekDocument, 'single-week')

    expect((await service.deactivatePlan(planId)).isActive).toBe(false)
    expect(await service.listPlans({ activeOnly: true })).toEqual([])

    expect(await service.deletePlan(planId)).toEqual({ planId, deleted: true })
    expect(await store.listTasks({ planId })).toEqual([])
    await expect(service.getPlanDetails(planId)).rejects.toBeInstanceOf(NotFoundError)
    await expect(service.deletePlan(planId)).rejects.toBeInstanceOf(NotFoundError)
    await expect(service.deactivatePlan(planId)).rejects.toBeInstanceOf(NotFoundError)
  })

  describe('generatePlan', () => {
    it('materializes the generated document', async () => {
      const client = new ScriptedClient('```json\n' + JSON.stringify(weekDocument) + '\n```')
      const service = build(client)

      const result = await service.generatePlan({
        shape: 'single-week',
        goal: '10k',
        daysPerWeek: 3,
        readiness: { score: 82 },
      })

      expect(result).toEqual({
        planId: 1,
        shape: 'single-week',
        startDate: '2024-06-03',
        endDate: '2024-06-09',
        taskCount: 3,
        warnings: [],
      })
      expect(JSON.parse(client.calls[0]?.input ?? '')).toEqual({
        shape: 'single-week',
        goal: '10k',
        weeks: 1,
        daysPerWeek: 3,
        readiness: { score: 82 },
      })
      expect(client.calls[0]?.instructions).toContain('Write a 1-week training plan for the goal "10k" with 3 training days per week.')
      expect(await store.findPlan(1)).toMatchObject({ name: 'Base week', goal: '10k' })
    })

    it('rejects an invalid readiness snapshot before calling the provider', async () => {
      const client = new ScriptedClient('{}')
      const service = build(client)

      await expect(
        service.generatePlan({ shape: 'single-week', goal: '10k', readiness: { score: 'high' } }),
      ).rejects.toBeInstanceOf(ValidationError)
      expect(client.calls).toHaveLength(0)
    })

    it('persists nothing when the provider output is unusable', async () => {
      const service = build(new ScriptedClient('Sorry, I cannot help with that.'))

      await expect(service.generatePlan({ shape: 'multi-week-block', goal: 'Marathon' })).rejects.toBeInstanceOf(
        BadGatewayException,
      )
      expect(await store.listPlans()).toEqual([])
    })

    it('persists nothing when the generated document has no entries', async () => {
      const service = build(new ScriptedClient('{"plan_name":"Empty","days":[]}'))

      await expect(service.generatePlan({ shape: 'single-week', goal: '5k' })).rejects.toThrow(
        'Plan document has no day entries',
      )
      expect(await store.listPlans()).toEqual([])
    })
  })
})
