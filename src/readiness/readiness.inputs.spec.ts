import { normalizeHrvStatus, resolveReadinessInputs } from './readiness.inputs'

describe('resolveReadinessInputs', () => {
  it('falls back to yesterday for energy, sleep and resting HR only', () => {
    const { inputs, discarded } = resolveReadinessInputs(
      { date: '2024-06-05', hrvStatus: 'BALANCED' },
      { date: '2024-06-04', energyReserve: 62, sleepQuality: 81, restingHr: 48, stress: 30, hrvStatus: 'LOW' },
    )

    expect(inputs.energyReserve).toEqual({ kind: 'present', value: 62, from: 'yesterday' })
    expect(inputs.sleepQuality).toEqual({ kind: 'present', value: 81, from: 'yesterday' })
    expect(inputs.restingHr).toEqual({ kind: 'present', value: 48, from: 'yesterday' })
    expect(inputs.stress).toEqual({ kind: 'absent' })
    expect(inputs.hrvStatus).toEqual({ kind: 'present', value: 'balanced', from: 'today' })
    expect(discarded).toEqual([])
  })

  it('prefers today when both days carry a value', () => {
    const { inputs } = resolveReadinessInputs(
      { date: '2024-06-05', energyReserve: 40 },
      { date: '2024-06-04', energyReserve: 90 },
    )
    expect(inputs.energyReserve).toEqual({ kind: 'present', value: 40, from: 'today' })
  })

  it('treats out-of-range values as absent and records them', () => {
    const { inputs, discarded } = resolveReadinessInputs({ date: '2024-06-05', sleepQuality: 140, restingHr: 0 })

    expect(inputs.sleepQuality).toEqual({ kind: 'absent' })
    expect(inputs.restingHr).toEqual({ kind: 'absent' })
    expect(discarded).toEqual(['today.sleepQuality=140', 'today.restingHr=0'])
  })
})

describe('normalizeHrvStatus', () => {
  it.each([
    ['BALANCED', 'balanced'],
    ['high', 'balanced'],
    ['Unbalanced', 'unbalanced'],
    ['LOW', 'unbalanced'],
    ['poor', 'unbalanced'],
    ['NO_STATUS', 'unknown'],
    [null, 'unknown'],
  ])('maps %p to %p', (raw, expected) => {
    expect(normalizeHrvStatus(raw)).toBe(expected)
  })
})
