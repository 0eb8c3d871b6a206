import { Module } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { DisabledPlanContentClient, OpenAiPlanContentClient } from './plan-content.clients'
import { PlanContentService } from './plan-content.service'
import { PLAN_CONTENT_CLIENT, type PlanContentClient } from './plan-content.types'

@Module({
  providers: [
    {
      provide: PLAN_CONTENT_CLIENT,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig): PlanContentClient =>
        config.planContent.provider === 'openai'
          ? new OpenAiPlanContentClient(config.planContent)
          : new DisabledPlanContentClient(),
    },
    PlanContentService,
  ],
  exports: [PlanContentService],
})
export class PlanContentModule {}
