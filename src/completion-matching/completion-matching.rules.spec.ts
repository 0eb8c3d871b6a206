import type { ScheduledTask } from '../task-store/task-store.types'
import {
  completionFromActivity,
  findMatch,
  isCompatible,
  prepareWindow,
} from './completion-matching.rules'
import type { ActivityRecord } from './completion-matching.types'

const activity = (overrides?: Partial<ActivityRecord>): ActivityRecord => ({
  activityId: 'a-1',
  startTimeLocal: '2024-06-03T07:15:00',
  activityType: 'running',
  name: 'Morning Run',
  durationSec: 2730,
  calories: 410,
  avgHr: 142,
  distanceM: 8045,
  ...overrides,
})

const task = (overrides?: Partial<ScheduledTask>): ScheduledTask => ({
  id: 1,
  planId: 1,
  scheduledDate: '2024-06-03',
  slot: 0,
  category: 'endurance',
  title: 'Easy run',
  description: null,
  plannedDurationMin: 45,
  intensity: 'low',
  targetHeartRate: null,
  steps: null,
  isCompleted: false,
  completedAt: null,
  linkedActivityId: null,
  actualDurationMin: null,
  actualEffort: null,
  note: null,
  adjustment: null,
  createdAt: new Date('2024-06-01T00:00:00.000Z'),
  updatedAt: new Date('2024-06-01T00:00:00.000Z'),
  ...overrides,
})

describe('CompletionMatchingRules', () => {
  describe('isCompatible', () => {
    it.each([
      ['endurance', 'running', true],
      ['long_run', 'treadmill_running', true],
      ['Tempo', 'trail_running', true],
      ['easy_run', 'cycling', false],
      ['strength', 'strength_training', true],
      ['strength', 'hiit', true],
      ['strength', 'running', false],
      ['rest', 'running', false],
      ['mobility', 'yoga', true],
      ['supplementary', 'breathwork', true],
    ])('%s vs %s -> %p', (category, type, expected) => {
      expect(isCompatible(category, type)).toBe(expected)
    })
  })

  describe('prepareWindow', () => {
    it('sorts most recent first, drops undated entries and keeps the rest', () => {
      const window = prepareWindow(
        [
          activity({ activityId: 'old', startTimeLocal: '2024-06-01T08:00:00' }),
          activity({ activityId: 'bad', startTimeLocal: 'yesterday' }),
          activity({ activityId: 'new', startTimeLocal: '2024-06-04T18:30:00' }),
          activity({ activityId: 'mid', startTimeLocal: '2024-06-03T07:15:00' }),
        ],
      )

      expect(window.map((a) => [a.activityId, a.date])).toEqual([
        ['new', '2024-06-04'],
        ['mid', '2024-06-03'],
        ['old', '2024-06-01'],
      ])
    })
  })

  describe('findMatch', () => {
    it('matches the endurance task and never the rest day', () => {
      const window = prepareWindow([activity()])

      expect(findMatch(task(), window, new Set())?.activityId).toBe('a-1')
      expect(findMatch(task({ category: 'rest', scheduledDate: '2024-06-04' }), window, new Set())).toBeNull()
      expect(findMatch(task({ category: 'rest' }), window, new Set())).toBeNull()
    })

    it('requires the exact calendar day', () => {
      const window = prepareWindow([activity({ startTimeLocal: '2024-06-02T23:59:00' })])
      expect(findMatch(task(), window, new Set())).toBeNull()
    })

    it('skips activities already used and completed tasks', () => {
      const window = prepareWindow([activity()])
      expect(findMatch(task(), window, new Set(['a-1']))).toBeNull()
      expect(findMatch(task({ isCompleted: true }), window, new Set())).toBeNull()
    })

    it('takes the most recent compatible activity of the day first', () => {
      const window = prepareWindow(
        [
          activity({ activityId: 'am', startTimeLocal: '2024-06-03T06:00:00' }),
          activity({ activityId: 'pm', startTimeLocal: '2024-06-03T19:00:00' }),
        ],
      )
      expect(findMatch(task(), window, new Set())?.activityId).toBe('pm')
    })
  })

  describe('completionFromActivity', () => {
    it('converts reported values into actuals', () => {
      const [dated] = prepareWindow([activity()])
      if (!dated) throw new Error('expected a dated activity')
      const completedAt = new Date('2024-06-03T20:00:00.000Z')

      expect(completionFromActivity(dated, completedAt)).toEqual({
        completedAt,
        linkedActivityId: 'a-1',
        actualDurationMin: 46,
        actualEffort: { calories: 410, avgHr: 142, distanceKm: 8.05 },
      })
    })

    it('keeps missing metrics as null', () => {
      const [dated] = prepareWindow([activity({ durationSec: null, distanceM: null, calories: null })])
      if (!dated) throw new Error('expected a dated activity')

      const completion = completionFromActivity(dated, new Date('2024-06-03T20:00:00.000Z'))
      expect(completion.actualDurationMin).toBeNull()
      expect(completion.actualEffort).toEqual({ calories: null, avgHr: 142, distanceKm: null })
    })
  })
})
