import type { BinaryOperator, UnaryOperator } from './types.ts'

const UNARY_SYMBOLS: Record<UnaryOperator, string> = {
	plus: '+',
	minus: '-',
}

const BINARY_SYMBOLS: Record<BinaryOperator, string> = {
	add: '+',
	subtract: '-',
	multiply: '*',
	divide: '/',
	power: '**',
	'floor-divide': '//',
	modulo: '%',
}

export class NumberLiteral {
	readonly kind = 'number'
	readonly value: number

	constructor(value: number) {
		this.value = value
	}

	serialize(): string {
		return String(this.value)
	}
}

export class UnaryOperation {
	readonly kind = 'unary'
	readonly operator: UnaryOperator
	readonly operand: ExpressionNode

	constructor(operator: UnaryOperator, operand: ExpressionNode) {
		this.operator = operator
		this.operand = operand
	}

	serialize(): string {
		return `${UNARY_SYMBOLS[this.operator]}${this.operand.serialize()}`
	}
}

export class BinaryOperation {
	readonly kind = 'binary'
	readonly operator: BinaryOperator
	readonly left: ExpressionNode
	readonly right: ExpressionNode

	constructor(operator: BinaryOperator, left: ExpressionNode, right: ExpressionNode) {
		this.operator = operator
		this.left = left
		this.right = right
	}

	// Fully parenthesized so the grouping chosen by the parser is visible
	serialize(): string {
		return `(${this.left.serialize()} ${BINARY_SYMBOLS[this.operator]} ${this.right.serialize()})`
	}
}

/**
 * Restricted expression tree. These three variants are the only shapes the
 * evaluator will ever walk.
 */
export type ExpressionNode = NumberLiteral | UnaryOperation | BinaryOperation
