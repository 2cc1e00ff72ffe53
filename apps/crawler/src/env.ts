/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/crawler/.env.local outside production; production workers get
 * their environment from the machine image.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'
import { dirname, resolve } from 'node:path'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
