import { ExpressionSyntaxError } from './errors.ts'
import type {
	Argument,
	BinarySymbol,
	CompareSymbol,
	ComprehensionClause,
	ComprehensionSyntax,
	DictEntry,
	SyntaxNode,
	UnarySymbol,
} from './syntax.ts'
import { numericValue, type Token, tokenize } from './tokenizer.ts'

/**
 * How deeply brackets and prefix operators may nest before parsing gives up.
 * Each level costs a full descent through the precedence chain, so this sits well
 * below what the call stack can take.
 */
export const MAX_NESTING = 200

const UNARY_OPERATORS: readonly UnarySymbol[] = ['+', '-', '~']
const COMPARE_OPERATORS = ['<', '>', '==', '>=', '<=', '!='] as const

const ASSIGNMENT_OPERATORS: ReadonlySet<string> = new Set([
	'=',
	'+=',
	'-=',
	'*=',
	'/=',
	'//=',
	'%=',
	'**=',
	'@=',
	'&=',
	'|=',
	'^=',
	'<<=',
	'>>=',
])

const EXPRESSION_KEYWORDS: ReadonlySet<string> = new Set(['True', 'False', 'None', 'not', 'lambda'])
const EXPRESSION_OPERATORS: ReadonlySet<string> = new Set([
	'(',
	'[',
	'{',
	'-',
	'+',
	'~',
	'*',
	'...',
])

/**
 * Recursive-descent parser over the token stream.
 *
 * Grammar, loosest binding first:
 *   expressions  = star_expr (',' star_expr)* [',']
 *   expression   = 'lambda' params ':' expression | disjunction ['if' disjunction 'else' expression]
 *   disjunction  = conjunction ('or' conjunction)*
 *   conjunction  = inversion ('and' inversion)*
 *   inversion    = 'not' inversion | comparison
 *   comparison   = bitwise_or (compare_op bitwise_or)*
 *   bitwise_or   = bitwise_xor ('|' bitwise_xor)*
 *   bitwise_xor  = bitwise_and ('^' bitwise_and)*
 *   bitwise_and  = shift ('&' shift)*
 *   shift        = sum (('<<' | '>>') sum)*
 *   sum          = term (('+' | '-') term)*
 *   term         = factor (('*' | '/' | '//' | '%' | '@') factor)*
 *   factor       = ('+' | '-' | '~') factor | power
 *   power        = primary ['**' factor]
 *   primary      = atom ('.' NAME | '(' args ')' | '[' slices ']')*
 *   atom         = NUMBER | STRING+ | NAME | True | False | None | '...'
 *                | '(' ... ')' | '[' ... ']' | '{' ... '}'
 */
class Parser {
	private readonly tokens: readonly Token[]
	private index = 0
	private nesting = 0

	constructor(tokens: readonly Token[]) {
		this.tokens = tokens
	}

	parse(): SyntaxNode {
		this.skipNewlines()
		if (this.peek().type === 'end') {
			throw new ExpressionSyntaxError('empty expression', this.peek().start)
		}

		const node = this.parseExpressionList()
		const lineBreak = this.skipNewlines()
		const token = this.peek()

		if (token.type === 'end') {
			return node
		}
		if (lineBreak || this.isOperator(';', token)) {
			throw new ExpressionSyntaxError('multiple statements are not allowed', token.start)
		}
		if (token.type === 'operator' && ASSIGNMENT_OPERATORS.has(token.value)) {
			throw new ExpressionSyntaxError('assignment is not allowed in an expression', token.start)
		}
		throw this.unexpected(token)
	}

	// Token helpers

	private peek(offset = 0): Token {
		const token = this.tokens[this.index + offset] ?? this.tokens.at(-1)
		if (!token) {
			throw new ExpressionSyntaxError('empty token stream', 0)
		}
		return token
	}

	private advance(): Token {
		const token = this.peek()
		if (token.type !== 'end') {
			this.index++
		}
		return token
	}

	private skipNewlines(): boolean {
		let skipped = false
		while (this.peek().type === 'newline') {
			this.advance()
			skipped = true
		}
		return skipped
	}

	private isOperator(value: string, token = this.peek()): boolean {
		return token.type === 'operator' && token.value === value
	}

	private isKeyword(value: string, token = this.peek()): boolean {
		return token.type === 'keyword' && token.value === value
	}

	private eatOperator(value: string): boolean {
		if (!this.isOperator(value)) {
			return false
		}
		this.advance()
		return true
	}

	private eatKeyword(value: string): boolean {
		if (!this.isKeyword(value)) {
			return false
		}
		this.advance()
		return true
	}

	private expectOperator(value: string): void {
		if (!this.eatOperator(value)) {
			throw this.unexpected(this.peek(), `expected '${value}'`)
		}
	}

	private expectKeyword(value: string): void {
		if (!this.eatKeyword(value)) {
			throw this.unexpected(this.peek(), `expected '${value}'`)
		}
	}

	private expectName(): string {
		const token = this.peek()
		if (token.type !== 'name') {
			throw this.unexpected(token, 'expected a name')
		}
		this.advance()
		return token.value
	}

	private matchOperator<T extends string>(operators: readonly T[]): T | undefined {
		const token = this.peek()
		if (token.type !== 'operator') {
			return undefined
		}
		const operator = operators.find((op) => op === token.value)
		if (operator !== undefined) {
			this.advance()
		}
		return operator
	}

	private startsExpression(token = this.peek()): boolean {
		switch (token.type) {
			case 'number':
			case 'imaginary':
			case 'string':
			case 'name':
				return true
			case 'keyword':
				return EXPRESSION_KEYWORDS.has(token.value)
			case 'operator':
				return EXPRESSION_OPERATORS.has(token.value)
			default:
				return false
		}
	}

	private unexpected(token: Token, expectation?: string): ExpressionSyntaxError {
		const suffix = expectation ? ` (${expectation})` : ''
		if (token.type === 'end') {
			return new ExpressionSyntaxError(`unexpected end of expression${suffix}`, token.start)
		}
		if (token.type === 'newline') {
			return new ExpressionSyntaxError(`unexpected line break${suffix}`, token.start)
		}
		return new ExpressionSyntaxError(`unexpected token '${token.value}'${suffix}`, token.start)
	}

	private nested(parse: () => SyntaxNode): SyntaxNode {
		if (this.nesting >= MAX_NESTING) {
			throw new ExpressionSyntaxError('expression is nested too deeply', this.peek().start)
		}
		this.nesting++
		try {
			return parse()
		} finally {
			this.nesting--
		}
	}

	// Expressions

	private parseExpressionList(): SyntaxNode {
		const start = this.peek().start
		const first = this.parseStarOrExpression()
		if (!this.isOperator(',')) {
			if (first.kind === 'starred') {
				throw new ExpressionSyntaxError('starred expression is not allowed here', start)
			}
			return first
		}

		const elements = [first]
		while (this.eatOperator(',')) {
			if (!this.startsExpression()) {
				break
			}
			elements.push(this.parseStarOrExpression())
		}
		return { kind: 'tuple', elements, start }
	}

	private parseStarOrExpression(): SyntaxNode {
		const start = this.peek().start
		if (this.eatOperator('*')) {
			return { kind: 'starred', value: this.nested(() => this.parseBitwiseOr()), start }
		}
		return this.parseExpression()
	}

	private parseStarOrNamed(): SyntaxNode {
		const start = this.peek().start
		if (this.eatOperator('*')) {
			return { kind: 'starred', value: this.nested(() => this.parseBitwiseOr()), start }
		}
		return this.parseNamedExpression()
	}

	private parseNamedExpression(): SyntaxNode {
		const token = this.peek()
		if (token.type === 'name' && this.isOperator(':=', this.peek(1))) {
			this.advance()
			this.advance()
			return { kind: 'named', target: token.value, value: this.parseExpression(), start: token.start }
		}
		return this.parseExpression()
	}

	private parseExpression(): SyntaxNode {
		return this.nested(() => {
			const start = this.peek().start
			if (this.eatKeyword('lambda')) {
				return this.parseLambda(start)
			}

			const body = this.parseDisjunction()
			if (!this.eatKeyword('if')) {
				return body
			}
			const test = this.parseDisjunction()
			this.expectKeyword('else')
			const orelse = this.parseExpression()
			return { kind: 'conditional', test, body, orelse, start }
		})
	}

	private parseLambda(start: number): SyntaxNode {
		const parameters: string[] = []
		while (!this.isOperator(':')) {
			if (this.eatOperator('**') || this.eatOperator('*')) {
				if (this.peek().type === 'name') {
					parameters.push(this.expectName())
				}
			} else if (!this.eatOperator('/')) {
				parameters.push(this.expectName())
				if (this.eatOperator('=')) {
					this.parseExpression()
				}
			}
			if (!this.eatOperator(',')) {
				break
			}
		}
		this.expectOperator(':')
		return { kind: 'lambda', parameters, body: this.parseExpression(), start }
	}

	private parseDisjunction(): SyntaxNode {
		const start = this.peek().start
		const first = this.parseConjunction()
		if (!this.isKeyword('or')) {
			return first
		}
		const values = [first]
		while (this.eatKeyword('or')) {
			values.push(this.parseConjunction())
		}
		return { kind: 'boolean', operator: 'or', values, start }
	}

	private parseConjunction(): SyntaxNode {
		const start = this.peek().start
		const first = this.parseInversion()
		if (!this.isKeyword('and')) {
			return first
		}
		const values = [first]
		while (this.eatKeyword('and')) {
			values.push(this.parseInversion())
		}
		return { kind: 'boolean', operator: 'and', values, start }
	}

	private parseInversion(): SyntaxNode {
		const start = this.peek().start
		if (!this.eatKeyword('not')) {
			return this.parseComparison()
		}
		return this.nested(() => ({ kind: 'not', operand: this.parseInversion(), start }))
	}

	private parseComparison(): SyntaxNode {
		const start = this.peek().start
		const left = this.parseBitwiseOr()
		const operators: CompareSymbol[] = []
		const comparators: SyntaxNode[] = []

		let operator = this.matchCompareOperator()
		while (operator !== undefined) {
			operators.push(operator)
			comparators.push(this.parseBitwiseOr())
			operator = this.matchCompareOperator()
		}

		if (operators.length === 0) {
			return left
		}
		return { kind: 'compare', left, operators, comparators, start }
	}

	private matchCompareOperator(): CompareSymbol | undefined {
		const symbol = this.matchOperator(COMPARE_OPERATORS)
		if (symbol !== undefined) {
			return symbol
		}
		if (this.eatKeyword('in')) {
			return 'in'
		}
		if (this.isKeyword('not') && this.isKeyword('in', this.peek(1))) {
			this.advance()
			this.advance()
			return 'not in'
		}
		if (this.eatKeyword('is')) {
			return this.eatKeyword('not') ? 'is not' : 'is'
		}
		return undefined
	}

	private parseBinaryLevel<T extends BinarySymbol>(
		operators: readonly T[],
		operand: () => SyntaxNode,
	): SyntaxNode {
		const start = this.peek().start
		let left = operand()
		let operator = this.matchOperator(operators)
		while (operator !== undefined) {
			left = { kind: 'binary', operator, left, right: operand(), start }
			operator = this.matchOperator(operators)
		}
		return left
	}

	private parseBitwiseOr(): SyntaxNode {
		return this.parseBinaryLevel(['|'], () => this.parseBitwiseXor())
	}

	private parseBitwiseXor(): SyntaxNode {
		return this.parseBinaryLevel(['^'], () => this.parseBitwiseAnd())
	}

	private parseBitwiseAnd(): SyntaxNode {
		return this.parseBinaryLevel(['&'], () => this.parseShift())
	}

	private parseShift(): SyntaxNode {
		return this.parseBinaryLevel(['<<', '>>'], () => this.parseSum())
	}

	private parseSum(): SyntaxNode {
		return this.parseBinaryLevel(['+', '-'], () => this.parseTerm())
	}

	private parseTerm(): SyntaxNode {
		return this.parseBinaryLevel(['*', '/', '//', '%', '@'], () => this.parseFactor())
	}

	private parseFactor(): SyntaxNode {
		const start = this.peek().start
		const operator = this.matchOperator(UNARY_OPERATORS)
		if (operator === undefined) {
			return this.parsePower()
		}
		return this.nested(() => ({ kind: 'unary', operator, operand: this.parseFactor(), start }))
	}

	private parsePower(): SyntaxNode {
		const start = this.peek().start
		const base = this.parsePrimary()
		if (!this.eatOperator('**')) {
			return base
		}
		// Right-associative, and the exponent may carry its own sign: 2 ** -1
		return this.nested(() => ({
			kind: 'binary',
			operator: '**',
			left: base,
			right: this.parseFactor(),
			start,
		}))
	}

	private parsePrimary(): SyntaxNode {
		const start = this.peek().start
		let node = this.parseAtom()
		for (;;) {
			if (this.eatOperator('.')) {
				node = { kind: 'attribute', object: node, name: this.expectName(), start }
			} else if (this.eatOperator('(')) {
				node = { kind: 'call', callee: node, args: this.parseArguments(), start }
			} else if (this.eatOperator('[')) {
				node = { kind: 'subscript', object: node, index: this.parseSlices(), start }
				this.expectOperator(']')
			} else {
				return node
			}
		}
	}

	private parseArguments(): Argument[] {
		const args: Argument[] = []
		while (!this.isOperator(')')) {
			if (this.eatOperator('**')) {
				args.push({ name: null, value: this.parseExpression() })
			} else if (this.peek().type === 'name' && this.isOperator('=', this.peek(1))) {
				const name = this.expectName()
				this.advance()
				args.push({ name, value: this.parseExpression() })
			} else {
				const start = this.peek().start
				const value = this.parseStarOrNamed()
				args.push({
					name: null,
					value: this.isKeyword('for')
						? this.parseComprehension('generator', value, null, start)
						: value,
				})
			}
			if (!this.eatOperator(',')) {
				break
			}
		}
		this.expectOperator(')')
		return args
	}

	private parseSlices(): SyntaxNode {
		const start = this.peek().start
		const first = this.parseSlice()
		if (!this.isOperator(',')) {
			return first
		}
		const elements = [first]
		while (this.eatOperator(',')) {
			if (this.isOperator(']')) {
				break
			}
			elements.push(this.parseSlice())
		}
		return { kind: 'tuple', elements, start }
	}

	private parseSlice(): SyntaxNode {
		const start = this.peek().start
		let lower: SyntaxNode | null = null
		if (!this.isOperator(':')) {
			lower = this.parseStarOrNamed()
			if (!this.isOperator(':')) {
				return lower
			}
		}
		this.expectOperator(':')
		const upper = this.startsSliceBound() ? this.parseExpression() : null
		let step: SyntaxNode | null = null
		if (this.eatOperator(':') && this.startsSliceBound()) {
			step = this.parseExpression()
		}
		return { kind: 'slice', lower, upper, step, start }
	}

	private startsSliceBound(): boolean {
		return !(this.isOperator(':') || this.isOperator(',') || this.isOperator(']'))
	}

	// Atoms and displays

	private parseAtom(): SyntaxNode {
		const token = this.peek()
		const start = token.start

		switch (token.type) {
			case 'number':
				this.advance()
				return { kind: 'number', value: numericValue(token.value), start }
			case 'imaginary':
				this.advance()
				return { kind: 'imaginary', text: token.value, start }
			case 'string': {
				// Adjacent string literals concatenate
				let text = ''
				while (this.peek().type === 'string') {
					text += this.advance().value
				}
				return { kind: 'string', text, start }
			}
			case 'name':
				this.advance()
				return { kind: 'name', id: token.value, start }
			case 'keyword':
				if (token.value === 'True' || token.value === 'False' || token.value === 'None') {
					this.advance()
					return { kind: 'constant', value: token.value, start }
				}
				throw this.unexpected(token)
			case 'operator':
				if (token.value === '...') {
					this.advance()
					return { kind: 'constant', value: '...', start }
				}
				if (token.value === '(') {
					this.advance()
					return this.parseParenthesized(start)
				}
				if (token.value === '[') {
					this.advance()
					return this.parseList(start)
				}
				if (token.value === '{') {
					this.advance()
					return this.parseBraced(start)
				}
				throw this.unexpected(token)
			default:
				throw this.unexpected(token)
		}
	}

	private parseSequenceTail(first: SyntaxNode, closer: string): SyntaxNode[] {
		const elements = [first]
		while (this.eatOperator(',')) {
			if (this.isOperator(closer)) {
				break
			}
			elements.push(this.parseStarOrNamed())
		}
		return elements
	}

	private parseParenthesized(start: number): SyntaxNode {
		if (this.eatOperator(')')) {
			return { kind: 'tuple', elements: [], start }
		}

		const first = this.parseStarOrNamed()
		if (this.isKeyword('for')) {
			const generator = this.parseComprehension('generator', first, null, start)
			this.expectOperator(')')
			return generator
		}
		if (!this.isOperator(',')) {
			this.expectOperator(')')
			return first
		}

		const elements = this.parseSequenceTail(first, ')')
		this.expectOperator(')')
		return { kind: 'tuple', elements, start }
	}

	private parseList(start: number): SyntaxNode {
		if (this.eatOperator(']')) {
			return { kind: 'list', elements: [], start }
		}

		const first = this.parseStarOrNamed()
		if (this.isKeyword('for')) {
			const comprehension = this.parseComprehension('list', first, null, start)
			this.expectOperator(']')
			return comprehension
		}

		const elements = this.parseSequenceTail(first, ']')
		this.expectOperator(']')
		return { kind: 'list', elements, start }
	}

	private parseBraced(start: number): SyntaxNode {
		if (this.eatOperator('}')) {
			return { kind: 'dict', entries: [], start }
		}
		if (this.eatOperator('**')) {
			return this.parseDictTail([{ key: null, value: this.nested(() => this.parseBitwiseOr()) }], start)
		}

		const first = this.parseStarOrNamed()
		if (this.eatOperator(':')) {
			const value = this.parseExpression()
			if (this.isKeyword('for')) {
				const comprehension = this.parseComprehension('dict', first, value, start)
				this.expectOperator('}')
				return comprehension
			}
			return this.parseDictTail([{ key: first, value }], start)
		}

		if (this.isKeyword('for')) {
			const comprehension = this.parseComprehension('set', first, null, start)
			this.expectOperator('}')
			return comprehension
		}

		const elements = this.parseSequenceTail(first, '}')
		this.expectOperator('}')
		return { kind: 'set', elements, start }
	}

	private parseDictTail(entries: DictEntry[], start: number): SyntaxNode {
		while (this.eatOperator(',')) {
			if (this.isOperator('}')) {
				break
			}
			if (this.eatOperator('**')) {
				entries.push({ key: null, value: this.nested(() => this.parseBitwiseOr()) })
			} else {
				const key = this.parseExpression()
				this.expectOperator(':')
				entries.push({ key, value: this.parseExpression() })
			}
		}
		this.expectOperator('}')
		return { kind: 'dict', entries, start }
	}

	private parseComprehension(
		container: ComprehensionSyntax['container'],
		element: SyntaxNode,
		value: SyntaxNode | null,
		start: number,
	): SyntaxNode {
		const clauses: ComprehensionClause[] = []
		while (this.eatKeyword('for')) {
			const target = this.parseTargetList()
			this.expectKeyword('in')
			const iterable = this.parseDisjunction()
			const conditions: SyntaxNode[] = []
			while (this.eatKeyword('if')) {
				conditions.push(this.parseDisjunction())
			}
			clauses.push({ target, iterable, conditions })
		}
		return { kind: 'comprehension', container, element, value, clauses, start }
	}

	private parseTargetList(): SyntaxNode {
		const start = this.peek().start
		const first = this.parseTarget()
		if (!this.isOperator(',')) {
			return first
		}
		const elements = [first]
		while (this.eatOperator(',')) {
			if (this.isKeyword('in')) {
				break
			}
			elements.push(this.parseTarget())
		}
		return { kind: 'tuple', elements, start }
	}

	private parseTarget(): SyntaxNode {
		const start = this.peek().start
		if (this.eatOperator('*')) {
			return { kind: 'starred', value: this.nested(() => this.parseBitwiseOr()), start }
		}
		return this.parseBitwiseOr()
	}
}

/**
 * Parse a single expression into an unrestricted syntax tree.
 * Statements, assignments and trailing input are syntax errors.
 */
export function parseSyntax(source: string): SyntaxNode {
	return new Parser(tokenize(source)).parse()
}
