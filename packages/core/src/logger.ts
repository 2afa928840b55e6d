import pino from 'pino'
import type { Logger } from 'pino'

export type { Logger }

/**
 * Default logger. Level comes from GATEWIRE_LOG_LEVEL, else 'warn'.
 */
export function createLogger(level: string = process.env.GATEWIRE_LOG_LEVEL ?? 'warn'): Logger {
  return pino({ name: 'gatewire', level })
}
