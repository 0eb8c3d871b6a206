import { Global, Logger, Module } from '@nestjs/common'
import { Pool } from 'pg'
import { CLOCK, Clock } from '../common/clock'
import { APP_CONFIG, AppConfig } from '../config/app-config'
import { InMemoryTaskStore } from './in-memory-task.store'
import { PgTaskStore } from './pg-task.store'
import { TASK_STORE, TaskStore } from './task-store'

export function createPgPool(database: { url: string; sslNoVerify: boolean }): Pool {
  if (!database.sslNoVerify) {
    return new Pool({ connectionString: database.url })
  }
  // sslmode in the URL would override the relaxed ssl option below.
  const url = new URL(database.url)
  url.searchParams.delete('sslmode')
  url.searchParams.delete('sslrootcert')
  return new Pool({ connectionString: url.toString(), ssl: { rejectUnauthorized: false } })
}

@Global()
@Module({
  providers: [
    {
      provide: TASK_STORE,
      inject: [APP_CONFIG, CLOCK],
      useFactory: async (config: AppConfig, clock: Clock): Promise<TaskStore> => {
        const logger = new Logger('TaskStoreModule')
        if (!config.database) {
          logger.warn('DATABASE_URL not set; plans and tasks are kept in memory')
          return new InMemoryTaskStore(clock)
        }
        const store = new PgTaskStore(createPgPool(config.database))
        await store.migrate()
        logger.log('PostgreSQL task store ready')
        return store
      },
    },
  ],
  exports: [TASK_STORE],
})
export class TaskStoreModule {}
