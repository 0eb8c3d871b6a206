import { FixedClock } from '../src/common/clock'
import { ReadinessService } from '../src/readiness/readiness.service'

describe('ReadinessService', () => {
  const clock = new FixedClock(new Date('2024-06-05T06:30:00.000Z'))
  const service = new ReadinessService(clock)

  it('returns a neutral snapshot for an empty payload', () => {
    const snapshot = service.getTodayReadiness(undefined)

    expect(snapshot).toEqual({
      asOfDate: '2024-06-05',
      energyReserve: null,
      sleepQuality: null,
      hrvStatus: 'unknown',
      restingHr: null,
      stress: null,
      score: 70,
      directive: 'proceed',
      reason: null,
      shouldRest: false,
      shouldReduceIntensity: false,
      sources: {},
    })
  })

  it('uses last night from yesterday when today has no sleep score', () => {
    const snapshot = service.getTodayReadiness({
      today: { energyReserve: 72, hrvStatus: 'UNBALANCED', stress: 30 },
      yesterday: { sleepQuality: 35 },
    })

    expect(snapshot.sleepQuality).toBe(35)
    expect(snapshot.sources.sleepQuality).toBe('yesterday')
    expect(snapshot.directive).toBe('rest')
    expect(snapshot.reason).toBe('Sleep quality poor (35)')
    // 70 + 15 - 15 + 0
    expect(snapshot.score).toBe(70)
  })

  it('ignores fields of the wrong type instead of failing', () => {
    const snapshot = service.getTodayReadiness({
      today: { date: '2024-06-05', energyReserve: 'high', sleepQuality: 82, hrvStatus: 7 },
    })

    expect(snapshot.energyReserve).toBeNull()
    expect(snapshot.sleepQuality).toBe(82)
    expect(snapshot.hrvStatus).toBe('unknown')
    expect(snapshot.score).toBe(80)
  })

  it('never throws on garbage input', () => {
    expect(service.getTodayReadiness('garbage').directive).toBe('proceed')
    expect(service.getTodayReadiness({ today: 5 }).score).toBe(70)
  })
})
