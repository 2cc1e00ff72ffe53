import { applySchema, warmupDatabase, type SqlExecutor } from '@tidemark/db'
import { loggers } from '../../config/logger.js'

const log = loggers.cli.child('migrate')

export async function runMigrateCommand(db: SqlExecutor): Promise<number> {
  if (!(await warmupDatabase(db))) {
    log.error('Database unreachable')
    return 1
  }
  await applySchema(db)
  return 0
}
