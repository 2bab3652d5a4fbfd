import { UnsupportedExpressionError } from './errors.ts'
import type { ExpressionNode } from './nodes.ts'
import { floorDivide, modulo, power, trueDivide } from './operators.ts'
import { parseSyntax } from './parser.ts'
import { restrict } from './restrict.ts'
import type { BinaryOperator, EvaluateOptions } from './types.ts'

function applyBinary(operator: BinaryOperator, left: number, right: number): number {
	switch (operator) {
		case 'add':
			return left + right
		case 'subtract':
			return left - right
		case 'multiply':
			return left * right
		case 'divide':
			return trueDivide(left, right)
		case 'power':
			return power(left, right)
		case 'floor-divide':
			return floorDivide(left, right)
		case 'modulo':
			return modulo(left, right)
		default: {
			const unknown: never = operator
			throw new UnsupportedExpressionError(`Unsupported operator: ${unknown}`, String(unknown))
		}
	}
}

/**
 * Walk a restricted tree. Operands are evaluated left to right before their
 * operator is applied, so the leftmost failing operation is the one that throws.
 */
export function evaluateNode(node: ExpressionNode): number {
	switch (node.kind) {
		case 'number':
			return node.value

		case 'unary': {
			const operand = evaluateNode(node.operand)
			switch (node.operator) {
				case 'plus':
					return operand
				case 'minus':
					return -operand
				default: {
					const unknown: never = node.operator
					throw new UnsupportedExpressionError(
						`Unsupported unary operator: ${unknown}`,
						String(unknown),
					)
				}
			}
		}

		case 'binary': {
			const left = evaluateNode(node.left)
			const right = evaluateNode(node.right)
			return applyBinary(node.operator, left, right)
		}

		default: {
			const unknown: never = node
			throw new UnsupportedExpressionError(
				`Unsupported expression element: ${typeof unknown}`,
				typeof unknown,
			)
		}
	}
}

/**
 * Parse a single arithmetic expression into its restricted tree.
 * Throws `ExpressionSyntaxError` for malformed input and `UnsupportedExpressionError`
 * for anything beyond numeric literals, unary `+`/`-` and `+ - * / ** // %`.
 */
export function parse(source: string, options: EvaluateOptions = {}): ExpressionNode {
	if (typeof source !== 'string') {
		throw new TypeError('Expression source must be a string')
	}
	return restrict(parseSyntax(source), options)
}

/**
 * Evaluate an arithmetic expression without handing it to a code executor.
 *
 * @example
 * ```ts
 * evaluate('2 + 3 * 4 - 1/2') // 13.5
 * evaluate('7 // 2') // 3
 * evaluate("__import__('os')") // throws UnsupportedExpressionError
 * ```
 */
export function evaluate(source: string, options: EvaluateOptions = {}): number {
	const result: unknown = evaluateNode(parse(source, options))
	if (typeof result !== 'number') {
		throw new UnsupportedExpressionError(
			'expression did not produce a numeric result',
			typeof result,
		)
	}
	return result
}
