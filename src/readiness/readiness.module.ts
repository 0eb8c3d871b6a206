import { Module } from '@nestjs/common'
import { ReadinessController } from './readiness.controller'
import { ReadinessService } from './readiness.service'

@Module({
  providers: [ReadinessService],
  controllers: [ReadinessController],
  exports: [ReadinessService],
})
export class ReadinessModule {}
