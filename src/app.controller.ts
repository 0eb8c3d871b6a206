import { Controller, Get, Inject } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from './config/app-config'

@Controller()
export class AppController {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  @Get()
  getRoot() {
    return {
      status: 'ok',
      service: 'Training Schedule API',
      taskStore: this.config.database ? 'postgres' : 'memory',
      planContentProvider: this.config.planContent.provider,
    }
  }

  @Get('health')
  health() {
    return { status: 'ok' }
  }
}
