import {
	type EvaluateOptions,
	evaluate,
	floorDivide,
	modulo,
	power,
	squareRoot,
	trueDivide,
} from '@safe-arith/expr-tree'

export type CalculatorOptions = EvaluateOptions

/**
 * Stateless arithmetic service. Every method is pure; the options only bound
 * how deep an evaluated expression may nest.
 *
 * @example
 * ```ts
 * const calc = new Calculator()
 * calc.divide(7, 2) // 3.5
 * calc.evaluate('2 ** 10') // 1024
 * ```
 */
export class Calculator {
	readonly options: Readonly<CalculatorOptions>

	constructor(options: CalculatorOptions = {}) {
		this.options = { ...options }
	}

	add(a: number, b: number): number {
		return a + b
	}

	subtract(a: number, b: number): number {
		return a - b
	}

	multiply(a: number, b: number): number {
		return a * b
	}

	/**
	 * True division. Throws `DivisionByZeroError` when `b` is zero.
	 */
	divide(a: number, b: number): number {
		return trueDivide(a, b)
	}

	/**
	 * Division rounded toward negative infinity, matching the `//` operator.
	 */
	floorDivide(a: number, b: number): number {
		return floorDivide(a, b)
	}

	/**
	 * Remainder with the sign of the divisor, matching the `%` operator.
	 */
	modulo(a: number, b: number): number {
		return modulo(a, b)
	}

	/**
	 * Throws `DomainError` when the real result does not exist or overflows,
	 * and `DivisionByZeroError` for zero raised to a negative power.
	 */
	power(base: number, exponent: number): number {
		return power(base, exponent)
	}

	sqrt(a: number): number {
		return squareRoot(a)
	}

	evaluate(expression: string): number {
		return evaluate(expression, this.options)
	}
}

export const calculator = new Calculator()
