export type HrvStatus = 'balanced' | 'unbalanced' | 'unknown'

export type ReadinessDirective = 'proceed' | 'reduce' | 'rest'

export type SignalSource = 'today' | 'yesterday'

// One day of telemetry as delivered by the biometric provider; every field may be missing.
export type BiometricReading = {
  date: string // YYYY-MM-DD
  energyReserve?: number | null
  sleepQuality?: number | null
  hrvStatus?: string | null
  restingHr?: number | null
  stress?: number | null
}

export type Signal<T> = { kind: 'present'; value: T; from: SignalSource } | { kind: 'absent' }

export type ReadinessInputs = {
  asOfDate: string
  energyReserve: Signal<number>
  sleepQuality: Signal<number>
  hrvStatus: Signal<HrvStatus>
  restingHr: Signal<number>
  stress: Signal<number>
}

export type ReadinessSnapshot = {
  asOfDate: string
  energyReserve: number | null
  sleepQuality: number | null
  hrvStatus: HrvStatus
  restingHr: number | null
  stress: number | null
  score: number
  directive: ReadinessDirective
  reason: string | null
  shouldRest: boolean
  shouldReduceIntensity: boolean
  sources: Partial<Record<'energyReserve' | 'sleepQuality' | 'hrvStatus' | 'restingHr' | 'stress', SignalSource>>
}
