import type { BiometricReading, HrvStatus, ReadinessInputs, Signal, SignalSource } from './readiness.types'

export type ResolvedReadinessInputs = {
  inputs: ReadinessInputs
  // values that were delivered but could not be used (out of range, not a number)
  discarded: string[]
}

type PercentField = 'energyReserve' | 'sleepQuality' | 'stress'

const absent = <T>(): Signal<T> => ({ kind: 'absent' })

export function normalizeHrvStatus(raw: string | null | undefined): HrvStatus {
  if (typeof raw !== 'string') return 'unknown'
  const key = raw.trim().toLowerCase()
  if (key === 'balanced' || key === 'high') return 'balanced'
  if (key === 'unbalanced' || key === 'low' || key === 'poor') return 'unbalanced'
  return 'unknown'
}

function readNumber(
  reading: BiometricReading | undefined,
  field: PercentField | 'restingHr',
  from: SignalSource,
  discarded: string[],
): Signal<number> {
  const raw = reading?.[field]
  if (raw === undefined || raw === null) return absent()

  const isPercent = field !== 'restingHr'
  const valid = Number.isFinite(raw) && (isPercent ? raw >= 0 && raw <= 100 : raw > 0)
  if (!valid) {
    discarded.push(`${from}.${field}=${raw}`)
    return absent()
  }
  return { kind: 'present', value: raw, from }
}

/**
 * Energy reserve, sleep quality and resting HR fall back to yesterday's reading
 * (last night's sleep is often filed under the previous day). HRV status and
 * stress are only meaningful for today.
 */
export function resolveReadinessInputs(today: BiometricReading, yesterday?: BiometricReading): ResolvedReadinessInputs {
  const discarded: string[] = []

  const fromBoth = (field: PercentField | 'restingHr'): Signal<number> => {
    const current = readNumber(today, field, 'today', discarded)
    return current.kind === 'present' ? current : readNumber(yesterday, field, 'yesterday', discarded)
  }

  const hrv = normalizeHrvStatus(today.hrvStatus)

  return {
    inputs: {
      asOfDate: today.date,
      energyReserve: fromBoth('energyReserve'),
      sleepQuality: fromBoth('sleepQuality'),
      restingHr: fromBoth('restingHr'),
      stress: readNumber(today, 'stress', 'today', discarded),
      hrvStatus: hrv === 'unknown' ? absent() : { kind: 'present', value: hrv, from: 'today' },
    },
    discarded,
  }
}
