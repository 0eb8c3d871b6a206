import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { CommonModule } from './common/common.module'
import { PlansModule } from './plans/plans.module'
import { ReadinessModule } from './readiness/readiness.module'
import { TaskStoreModule } from './task-store/task-store.module'
import { TasksModule } from './tasks/tasks.module'

@Module({
  imports: [CommonModule, TaskStoreModule, ReadinessModule, PlansModule, TasksModule],
  controllers: [AppController],
})
export class AppModule {}
