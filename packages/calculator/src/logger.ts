import pino, { type Logger } from 'pino'
import type { LogLevel } from './config.ts'

export type { Logger }

// stdout carries results, so diagnostics go to stderr
export function createLogger(options: { level: LogLevel }): Logger {
	return pino({ name: 'safe-calc', level: options.level }, pino.destination({ dest: 2, sync: true }))
}
