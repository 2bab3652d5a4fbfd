/**
 * safe-calc - arithmetic calculator backed by an allow-listed expression evaluator
 */

export {
	DivisionByZeroError,
	DomainError,
	EvaluationError,
	type EvaluationErrorKind,
	ExpressionSyntaxError,
	isEvaluationError,
	UnsupportedExpressionError,
} from '@safe-arith/expr-tree'
export { Calculator, type CalculatorOptions, calculator } from './calculator.ts'
export { type CliIO, ExitCode, formatResult, runCli, USAGE } from './cli.ts'
export { type Config, ConfigError, LOG_LEVELS, type LogLevel, loadConfig } from './config.ts'
export { createLogger, type Logger } from './logger.ts'
