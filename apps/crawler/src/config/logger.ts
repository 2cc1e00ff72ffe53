/**
 * Crawler Logger Configuration
 *
 * Pre-configured loggers for crawler components
 */

import { createLogger } from '@tidemark/logger'

export const logger = createLogger('crawler')

export const loggers = {
  orchestrator: logger.child('orchestrator'),
  ledger: logger.child('ledger'),
  writer: logger.child('writer'),
  fanout: logger.child('fanout'),
  render: logger.child('render'),
  strategy: logger.child('strategy'),
  cli: logger.child('cli'),
}
