import { BadGatewayException, Inject, Injectable, Logger } from '@nestjs/common'
import { PLAN_CONTENT_CLIENT, type PlanContentClient, type PlanContentRequest } from './plan-content.types'

const DOCUMENT_FORMAT =
  'Return ONLY valid JSON (no markdown, no surrounding text). ' +
  'Single week: {"plan_name":string,"primary_goal":string,"days":[DAY]}. ' +
  'Multi-week block: {"plan_name":string,"primary_goal":string,"weeks":[{"days":[DAY]}]}. ' +
  'DAY = {"day_label":"Monday".."Sunday","title":string,"category":"easy_run"|"long_run"|"tempo"|"interval"|"recovery"|"strength"|"rest"|"other",' +
  '"duration":minutes,"intensity":"low"|"moderate"|"high","description":string,' +
  '"steps"?:[{"type":string,"duration_minutes"?:number,"distance_km"?:number,"target_pace_min"?:string,"target_pace_max"?:string,"target_hr"?:string}],' +
  '"supplementary"?:[{"title":string,"duration_minutes":number,"notes":string}]}. ' +
  'Every week lists all seven days; rest days use category "rest".'

export function stripMarkdownFences(raw: string): string {
  const trimmed = raw.trim()
  if (!trimmed.startsWith('```')) return trimmed
  return trimmed.replace(/^```[a-zA-Z]*\n?/, '').replace(/```$/, '').trim()
}

@Injectable()
export class PlanContentService {
  private readonly logger = new Logger(PlanContentService.name)

  constructor(@Inject(PLAN_CONTENT_CLIENT) private readonly client: PlanContentClient) {}

  /**
   * Asks the configured provider for a plan document. The result is untrusted
   * JSON and still has to pass the materialization boundary.
   */
  async requestDocument(request: PlanContentRequest): Promise<Record<string, unknown>> {
    const weeks = request.shape === 'single-week' ? 1 : request.weeks ?? 4
    const instructions =
      `Write a ${weeks}-week training plan for the goal "${request.goal}"` +
      (request.daysPerWeek ? ` with ${request.daysPerWeek} training days per week` : '') +
      '. If a readiness snapshot is given, keep the first days consistent with it. ' +
      DOCUMENT_FORMAT

    const input = JSON.stringify({
      shape: request.shape,
      goal: request.goal,
      weeks,
      ...(request.daysPerWeek ? { daysPerWeek: request.daysPerWeek } : {}),
      ...(request.readiness ? { readiness: request.readiness } : {}),
    })

    const output = await this.client.generate(instructions, input)
    if (output.trim().length === 0) {
      throw new BadGatewayException('Plan content provider returned no text')
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(stripMarkdownFences(output))
    } catch {
      throw new BadGatewayException('Plan content provider returned non-JSON content')
    }

    if (!isRecord(parsed)) {
      throw new BadGatewayException('Plan content provider returned JSON that is not an object')
    }

    this.logger.log(`Received ${request.shape} plan document from ${this.client.provider}`)
    return parsed
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
