import { Module } from '@nestjs/common'
import { CompletionMatchingModule } from '../completion-matching/completion-matching.module'
import { PlanAdjustmentsModule } from '../plan-adjustments/plan-adjustments.module'
import { PlanContentModule } from '../plan-content/plan-content.module'
import { PlanMaterializerModule } from '../plan-materializer/plan-materializer.module'
import { PlansController } from './plans.controller'
import { PlansService } from './plans.service'

@Module({
  imports: [PlanMaterializerModule, PlanContentModule, CompletionMatchingModule, PlanAdjustmentsModule],
  controllers: [PlansController],
  providers: [PlansService],
  exports: [PlansService],
})
export class PlansModule {}
