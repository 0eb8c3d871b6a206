import { Module } from '@nestjs/common'
import { PlanAdjustmentsService } from './plan-adjustments.service'

@Module({
  providers: [PlanAdjustmentsService],
  exports: [PlanAdjustmentsService],
})
export class PlanAdjustmentsModule {}
