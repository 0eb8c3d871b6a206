import { ServiceUnavailableException } from '@nestjs/common'
import OpenAI from 'openai'
import type { PlanContentClient } from './plan-content.types'

export class OpenAiPlanContentClient implements PlanContentClient {
  readonly provider = 'openai'
  private readonly client: OpenAI

  constructor(private readonly options: { apiKey: string; model: string; maxOutputTokens: number }) {
    this.client = new OpenAI({ apiKey: options.apiKey })
  }

  async generate(instructions: string, input: string): Promise<string> {
    const response = await this.client.responses.create({
      model: this.options.model,
      instructions,
      input,
      max_output_tokens: this.options.maxOutputTokens,
    })
    return response.output_text
  }
}

export class DisabledPlanContentClient implements PlanContentClient {
  readonly provider = 'none'

  async generate(): Promise<string> {
    throw new ServiceUnavailableException('No plan content provider is configured (PLAN_CONTENT_PROVIDER=none)')
  }
}
