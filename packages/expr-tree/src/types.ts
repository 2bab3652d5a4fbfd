/**
 * Options accepted by `parse`, `restrict` and `evaluate`
 */
export type EvaluateOptions = {
	/**
	 * Deepest restricted tree accepted before evaluation is refused.
	 * Guards the recursive walk against stack exhaustion on pathological input.
	 * At most `MAX_DEPTH_LIMIT`.
	 * @default 1000
	 */
	maxDepth?: number
}

export const DEFAULT_MAX_DEPTH = 1000

/** Largest `maxDepth` the recursive restriction and evaluation walks are run with */
export const MAX_DEPTH_LIMIT = 2000

export type UnaryOperator = 'plus' | 'minus'

export type BinaryOperator =
	| 'add'
	| 'subtract'
	| 'multiply'
	| 'divide'
	| 'power'
	| 'floor-divide'
	| 'modulo'
