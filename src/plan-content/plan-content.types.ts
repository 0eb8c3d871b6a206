import type { ReadinessSnapshotInput } from '../readiness/readiness.schema'
import type { PlanShape } from '../task-store/task-store.types'

export const PLAN_CONTENT_CLIENT = Symbol('PLAN_CONTENT_CLIENT')

/** Text-generation collaborator that authors plan documents. */
export interface PlanContentClient {
  readonly provider: string
  generate(instructions: string, input: string): Promise<string>
}

export type PlanContentRequest = {
  shape: PlanShape
  goal: string
  weeks?: number
  daysPerWeek?: number
  readiness?: ReadinessSnapshotInput
}
