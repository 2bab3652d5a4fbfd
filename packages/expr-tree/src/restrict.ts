import { ExpressionSyntaxError, UnsupportedExpressionError } from './errors.ts'
import { BinaryOperation, type ExpressionNode, NumberLiteral, UnaryOperation } from './nodes.ts'
import type { BinarySymbol, SyntaxNode, UnarySymbol } from './syntax.ts'
import {
	type BinaryOperator,
	DEFAULT_MAX_DEPTH,
	type EvaluateOptions,
	MAX_DEPTH_LIMIT,
	type UnaryOperator,
} from './types.ts'

function unsupportedUnary(symbol: string): never {
	throw new UnsupportedExpressionError(`Unsupported unary operator: ${symbol}`, symbol)
}

function unsupportedBinary(symbol: string): never {
	throw new UnsupportedExpressionError(`Unsupported operator: ${symbol}`, symbol)
}

function unsupportedElement(kind: string): never {
	throw new UnsupportedExpressionError(`Unsupported expression element: ${kind}`, kind)
}

function toUnaryOperator(symbol: UnarySymbol): UnaryOperator {
	switch (symbol) {
		case '+':
			return 'plus'
		case '-':
			return 'minus'
		case '~':
			return unsupportedUnary(symbol)
		default: {
			const unknown: never = symbol
			return unsupportedUnary(String(unknown))
		}
	}
}

function toBinaryOperator(symbol: BinarySymbol): BinaryOperator {
	switch (symbol) {
		case '+':
			return 'add'
		case '-':
			return 'subtract'
		case '*':
			return 'multiply'
		case '/':
			return 'divide'
		case '**':
			return 'power'
		case '//':
			return 'floor-divide'
		case '%':
			return 'modulo'
		case '@':
		case '<<':
		case '>>':
		case '&':
		case '|':
		case '^':
			return unsupportedBinary(symbol)
		default: {
			const unknown: never = symbol
			return unsupportedBinary(String(unknown))
		}
	}
}

function restrictNode(node: SyntaxNode, depth: number, maxDepth: number): ExpressionNode {
	if (depth > maxDepth) {
		throw new ExpressionSyntaxError('expression is nested too deeply', node.start)
	}

	switch (node.kind) {
		case 'number':
			return new NumberLiteral(node.value)

		case 'unary': {
			const operand = restrictNode(node.operand, depth + 1, maxDepth)
			return new UnaryOperation(toUnaryOperator(node.operator), operand)
		}

		case 'binary': {
			const left = restrictNode(node.left, depth + 1, maxDepth)
			const right = restrictNode(node.right, depth + 1, maxDepth)
			return new BinaryOperation(toBinaryOperator(node.operator), left, right)
		}

		case 'imaginary':
		case 'constant':
		case 'string':
			throw new UnsupportedExpressionError(
				`Only numeric constants are allowed, got ${node.kind}`,
				node.kind,
			)

		case 'name':
		case 'boolean':
		case 'not':
		case 'compare':
		case 'conditional':
		case 'lambda':
		case 'call':
		case 'attribute':
		case 'subscript':
		case 'slice':
		case 'starred':
		case 'tuple':
		case 'list':
		case 'set':
		case 'dict':
		case 'comprehension':
		case 'named':
			return unsupportedElement(node.kind)

		default: {
			// Reached only by objects that did not come from the parser
			const unknown: never = node
			return unsupportedElement(typeof unknown)
		}
	}
}

/**
 * Map a syntax tree onto the allow-listed expression tree.
 * Children are checked before their parent's operator, left before right, so the
 * first offending construct in reading order is the one reported.
 */
export function restrict(syntax: SyntaxNode, options: EvaluateOptions = {}): ExpressionNode {
	const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
	if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_DEPTH_LIMIT) {
		throw new TypeError(`maxDepth must be a positive integer no greater than ${MAX_DEPTH_LIMIT}`)
	}
	return restrictNode(syntax, 1, maxDepth)
}
