import { Module } from '@nestjs/common'
import { PlanMaterializerService } from './plan-materializer.service'

@Module({
  providers: [PlanMaterializerService],
  exports: [PlanMaterializerService],
})
export class PlanMaterializerModule {}
