import { DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from '@safe-arith/expr-tree'
import { z } from 'zod'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const EnvSchema = z.object({
	LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
	SAFE_CALC_MAX_DEPTH: z.coerce
		.number()
		.int()
		.positive()
		.max(MAX_DEPTH_LIMIT)
		.default(DEFAULT_MAX_DEPTH),
})

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Config {
	readonly logLevel: LogLevel
	readonly maxDepth: number
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const parsed = EnvSchema.safeParse(env)
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
			.join('; ')
		throw new ConfigError(`Invalid configuration: ${details}`)
	}

	return {
		logLevel: parsed.data.LOG_LEVEL,
		maxDepth: parsed.data.SAFE_CALC_MAX_DEPTH,
	}
}
