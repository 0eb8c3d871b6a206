import { Body, Controller, HttpCode, Post } from '@nestjs/common'
import { ReadinessService } from './readiness.service'

@Controller('readiness')
export class ReadinessController {
  constructor(private readonly readinessService: ReadinessService) {}

  @Post('today')
  @HttpCode(200)
  getToday(@Body() body: unknown) {
    return this.readinessService.getTodayReadiness(body)
  }
}
