export { createPool, getPoolConfig, warmupDatabase } from './client.js'
export type { SqlExecutor } from './client.js'
export { applySchema, SCHEMA_PATH } from './schema.js'
