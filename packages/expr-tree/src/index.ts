// Errors
export {
	DivisionByZeroError,
	DomainError,
	EvaluationError,
	type EvaluationErrorKind,
	ExpressionSyntaxError,
	isEvaluationError,
	UnsupportedExpressionError,
} from './errors.ts'
// Evaluation
export { evaluate, evaluateNode, parse } from './evaluate.ts'
// Tree
export { BinaryOperation, type ExpressionNode, NumberLiteral, UnaryOperation } from './nodes.ts'
// Numeric operators shared with callers that compute directly
export { floorDivide, modulo, power, squareRoot, trueDivide } from './operators.ts'
export { MAX_NESTING, parseSyntax } from './parser.ts'
export { restrict } from './restrict.ts'
export type { SyntaxKind, SyntaxNode } from './syntax.ts'
export type { Token, TokenType } from './tokenizer.ts'
export { tokenize } from './tokenizer.ts'
export {
	type BinaryOperator,
	DEFAULT_MAX_DEPTH,
	type EvaluateOptions,
	MAX_DEPTH_LIMIT,
	type UnaryOperator,
} from './types.ts'
