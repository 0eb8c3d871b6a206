import { Global, Module } from '@nestjs/common'
import { APP_CONFIG, loadAppConfig } from '../config/app-config'
import { CLOCK, SystemClock } from './clock'

@Global()
@Module({
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: APP_CONFIG, useFactory: () => loadAppConfig() },
  ],
  exports: [CLOCK, APP_CONFIG],
})
export class CommonModule {}
