import { isEvaluationError } from '@safe-arith/expr-tree'
import { Calculator } from './calculator.ts'
import { type Config, ConfigError, loadConfig } from './config.ts'
import { createLogger, type Logger } from './logger.ts'

export const USAGE = "Usage: safe-calc '<expression>'"

export const ExitCode = {
	Success: 0,
	Failure: 1,
	Usage: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export interface CliIO {
	readonly stdout: (line: string) => void
	readonly stderr: (line: string) => void
	readonly env: Record<string, string | undefined>
	/** Defaults to a stderr logger at the configured level */
	readonly logger?: Logger
}

const processIO: CliIO = {
	stdout: (line) => process.stdout.write(`${line}\n`),
	stderr: (line) => process.stderr.write(`${line}\n`),
	env: process.env,
}

/**
 * Render a result the way a float is conventionally printed:
 * integral values keep one decimal and non-finite values use short names.
 */
export function formatResult(value: number): string {
	if (Number.isNaN(value)) {
		return 'nan'
	}
	if (value === Number.POSITIVE_INFINITY) {
		return 'inf'
	}
	if (value === Number.NEGATIVE_INFINITY) {
		return '-inf'
	}
	if (Object.is(value, -0)) {
		return '-0.0'
	}
	if (Number.isInteger(value) && Math.abs(value) < 1e16) {
		return value.toFixed(1)
	}
	return String(value)
}

/**
 * Evaluate the single expression in `args` and report the outcome.
 * Returns the process exit code instead of exiting.
 */
export function runCli(args: readonly string[], io: Partial<CliIO> = {}): ExitCode {
	const { stdout, stderr, env } = { ...processIO, ...io }

	const [expression] = args
	if (args.length !== 1 || expression === undefined) {
		stderr(USAGE)
		return ExitCode.Usage
	}

	let config: Config
	try {
		config = loadConfig(env)
	} catch (error) {
		if (error instanceof ConfigError) {
			stderr(`Error: ${error.message}`)
			return ExitCode.Failure
		}
		throw error
	}

	const logger = io.logger ?? createLogger({ level: config.logLevel })
	const calculator = new Calculator({ maxDepth: config.maxDepth })

	logger.debug({ expression }, 'evaluating expression')
	try {
		const result = calculator.evaluate(expression)
		logger.debug({ result }, 'evaluation finished')
		stdout(formatResult(result))
		return ExitCode.Success
	} catch (error) {
		const kind = isEvaluationError(error) ? error.kind : 'internal'
		logger.debug({ kind, err: error }, 'evaluation failed')
		stderr(`Error: ${error instanceof Error ? error.message : String(error)}`)
		return ExitCode.Failure
	}
}
