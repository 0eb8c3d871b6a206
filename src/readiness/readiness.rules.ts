import type { ReadinessDirective, ReadinessInputs, ReadinessSnapshot, Signal } from './readiness.types'

export const READINESS_BASELINE = 70

const valueOf = <T>(signal: Signal<T>): T | null => (signal.kind === 'present' ? signal.value : null)

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

export function energyReserveDelta(energy: number): number {
  if (energy >= 70) return 15
  if (energy >= 50) return 5
  if (energy < 30) return -20
  return -10
}

export function sleepQualityDelta(sleep: number): number {
  if (sleep >= 80) return 10
  if (sleep >= 60) return 5
  if (sleep < 40) return -15
  return 0
}

export function stressDelta(stress: number): number {
  if (stress < 25) return 5
  if (stress > 60) return -10
  return 0
}

export function computeReadinessScore(inputs: ReadinessInputs): number {
  let score = READINESS_BASELINE

  const energy = valueOf(inputs.energyReserve)
  if (energy !== null) score += energyReserveDelta(energy)

  const sleep = valueOf(inputs.sleepQuality)
  if (sleep !== null) score += sleepQualityDelta(sleep)

  const stress = valueOf(inputs.stress)
  if (stress !== null) score += stressDelta(stress)

  return clamp(score, 0, 100)
}

/**
 * First match wins. Energy and sleep are hard overrides: one bad night is not
 * averaged away by the other signals.
 */
export function decideDirective(
  inputs: ReadinessInputs,
  score: number,
): { directive: ReadinessDirective; reason: string | null } {
  const energy = valueOf(inputs.energyReserve)
  const sleep = valueOf(inputs.sleepQuality)

  const restReasons: string[] = []
  if (energy !== null && energy < 30) restReasons.push(`Energy reserve critically low (${energy})`)
  if (sleep !== null && sleep < 40) restReasons.push(`Sleep quality poor (${sleep})`)
  if (restReasons.length > 0) {
    return { directive: 'rest', reason: restReasons.join('; ') }
  }

  if (valueOf(inputs.hrvStatus) === 'unbalanced') {
    return { directive: 'reduce', reason: 'HRV status unbalanced' }
  }

  if (score < 50) {
    return { directive: 'reduce', reason: `Readiness score low (${score})` }
  }

  return { directive: 'proceed', reason: null }
}

export function evaluateReadiness(inputs: ReadinessInputs): ReadinessSnapshot {
  const score = computeReadinessScore(inputs)
  const { directive, reason } = decideDirective(inputs, score)

  const sources: ReadinessSnapshot['sources'] = {}
  for (const key of ['energyReserve', 'sleepQuality', 'hrvStatus', 'restingHr', 'stress'] as const) {
    const signal = inputs[key]
    if (signal.kind === 'present') sources[key] = signal.from
  }

  return {
    asOfDate: inputs.asOfDate,
    energyReserve: valueOf(inputs.energyReserve),
    sleepQuality: valueOf(inputs.sleepQuality),
    hrvStatus: valueOf(inputs.hrvStatus) ?? 'unknown',
    restingHr: valueOf(inputs.restingHr),
    stress: valueOf(inputs.stress),
    score,
    directive,
    reason,
    shouldRest: directive === 'rest',
    shouldReduceIntensity: directive !== 'proceed',
    sources,
  }
}
