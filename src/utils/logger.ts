// File: src/utils/logger.ts
// Diagnostic logging, kept on stderr so stdout only carries results

import pino, { Logger } from 'pino'
import pinoPretty from 'pino-pretty'

export function createLogger(level = 'warn'): Logger {
  return pino({ level }, pinoPretty({ sync: true, destination: 2 }))
}

export const logger = createLogger()

/**
 * Switch between the quiet default (warnings and errors) and debug output
 */
export function setVerbose(verbose: boolean): void {
  logger.level = verbose ? 'debug' : 'warn'
}
