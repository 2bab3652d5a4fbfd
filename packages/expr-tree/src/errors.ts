export type EvaluationErrorKind = 'division-by-zero' | 'domain' | 'syntax' | 'unsupported'

/**
 * Base class for every failure raised while computing a value.
 * `kind` lets callers branch without `instanceof` chains.
 */
export abstract class EvaluationError extends Error {
	abstract readonly kind: EvaluationErrorKind
}

export class DivisionByZeroError extends EvaluationError {
	readonly kind = 'division-by-zero'

	constructor(message = 'division by zero') {
		super(message)
		this.name = 'DivisionByZeroError'
	}
}

export class DomainError extends EvaluationError {
	readonly kind = 'domain'

	constructor(message: string) {
		super(message)
		this.name = 'DomainError'
	}
}

export class ExpressionSyntaxError extends EvaluationError {
	readonly kind = 'syntax'
	/** Offset into the source string where parsing stopped. */
	readonly position: number

	constructor(message: string, position: number) {
		super(`${message} at position ${position}`)
		this.name = 'ExpressionSyntaxError'
		this.position = position
	}
}

export class UnsupportedExpressionError extends EvaluationError {
	readonly kind = 'unsupported'
	/** The node kind or operator symbol that fell outside the allow-list. */
	readonly construct: string

	constructor(message: string, construct: string) {
		super(message)
		this.name = 'UnsupportedExpressionError'
		this.construct = construct
	}
}

export function isEvaluationError(value: unknown): value is EvaluationError {
	return value instanceof EvaluationError
}
