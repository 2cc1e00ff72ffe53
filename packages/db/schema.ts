import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { createLogger } from '@tidemark/logger'
import type { SqlExecutor } from './client.js'

const log = createLogger('db').child('schema')

export const SCHEMA_PATH = fileURLToPath(new URL('./sql/schema.sql', import.meta.url))

/**
 * Apply sql/schema.sql. The file only holds IF NOT EXISTS statements, so this is safe to repeat.
 */
export async function applySchema(db: SqlExecutor, schemaPath = SCHEMA_PATH): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8')
  log.info('Applying schema', { schemaPath })
  await db.query(sql)
  log.info('Schema applied')
}
