import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../common/clock'
import { toDateKey, addDays } from '../plan-materializer/plan-calendar'
import { resolveReadinessInputs } from './readiness.inputs'
import { evaluateReadiness } from './readiness.rules'
import { todayReadinessRequestSchema } from './readiness.schema'
import type { BiometricReading, ReadinessSnapshot } from './readiness.types'

@Injectable()
export class ReadinessService {
  private readonly logger = new Logger(ReadinessService.name)

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  /**
   * Best-effort verdict for today. Never throws: anything unusable in the
   * payload is treated as a missing signal.
   */
  getTodayReadiness(payload: unknown): ReadinessSnapshot {
    const request = todayReadinessRequestSchema.parse(payload)

    const todayKey = request.today.date ?? toDateKey(this.clock.now())
    const today: BiometricReading = { ...request.today, date: todayKey }
    const yesterday: BiometricReading | undefined = request.yesterday
      ? { ...request.yesterday, date: request.yesterday.date ?? addDays(todayKey, -1) }
      : undefined

    return this.evaluate(today, yesterday)
  }

  evaluate(today: BiometricReading, yesterday?: BiometricReading): ReadinessSnapshot {
    const { inputs, discarded } = resolveReadinessInputs(today, yesterday)
    if (discarded.length > 0) {
      this.logger.warn(`Ignoring unusable biometric values for ${today.date}: ${discarded.join(', ')}`)
    }
    return evaluateReadiness(inputs)
  }
}
