import { ExpressionSyntaxError } from './errors.ts'

export type TokenType =
	| 'number'
	| 'imaginary'
	| 'string'
	| 'name'
	| 'keyword'
	| 'operator'
	| 'newline'
	| 'end'

export interface Token {
	readonly type: TokenType
	readonly value: string
	readonly start: number
	readonly end: number
}

export const KEYWORDS: ReadonlySet<string> = new Set([
	'False',
	'None',
	'True',
	'and',
	'as',
	'assert',
	'async',
	'await',
	'break',
	'class',
	'continue',
	'def',
	'del',
	'elif',
	'else',
	'except',
	'finally',
	'for',
	'from',
	'global',
	'if',
	'import',
	'in',
	'is',
	'lambda',
	'nonlocal',
	'not',
	'or',
	'pass',
	'raise',
	'return',
	'try',
	'while',
	'with',
	'yield',
])

// Longest first so that the first prefix match wins
const OPERATORS = [
	'**=',
	'//=',
	'>>=',
	'<<=',
	'...',
	'->',
	':=',
	'**',
	'//',
	'<<',
	'>>',
	'<=',
	'>=',
	'==',
	'!=',
	'+=',
	'-=',
	'*=',
	'/=',
	'%=',
	'&=',
	'|=',
	'^=',
	'@=',
	'+',
	'-',
	'*',
	'/',
	'%',
	'@',
	'&',
	'|',
	'^',
	'~',
	'<',
	'>',
	'(',
	')',
	'[',
	']',
	'{',
	'}',
	',',
	':',
	'.',
	';',
	'=',
] as const

const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' }

const radixIntegerRe = /0(?:[xX](?:_?[0-9a-fA-F])+|[oO](?:_?[0-7])+|[bB](?:_?[01])+)/y
const radixPrefixRe = /0[xXoObB]/y
const decimalRe =
	/(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?/y
const stringStartRe = /(?:[rR][bBfF]?|[bBfF][rR]?|[uU])?('''|"""|'|")/y
const nameRe = /[\p{ID_Start}_][\p{ID_Continue}]*/uy
const identifierCharRe = /[\p{ID_Continue}]/u
const nonZeroDigitRe = /[1-9]/

function matchAt(re: RegExp, source: string, position: number): RegExpExecArray | null {
	re.lastIndex = position
	return re.exec(source)
}

/**
 * Numeric value of a `number` token.
 * Integers beyond 2^53 lose precision; every value is an IEEE double.
 */
export function numericValue(text: string): number {
	return Number(text.replaceAll('_', ''))
}

function isDecimalInteger(text: string): boolean {
	return !/[.eE]/.test(text)
}

class Tokenizer {
	private readonly source: string
	private position = 0
	private readonly tokens: Token[] = []
	private readonly brackets: { char: string; position: number }[] = []

	constructor(source: string) {
		this.source = source
	}

	tokenize(): Token[] {
		while (this.position < this.source.length) {
			this.next()
		}

		const unclosed = this.brackets.at(-1)
		if (unclosed) {
			throw new ExpressionSyntaxError(`'${unclosed.char}' was never closed`, unclosed.position)
		}

		this.push('end', '', this.position)
		return this.tokens
	}

	private push(type: TokenType, value: string, start: number): void {
		this.tokens.push({ type, value, start, end: start + value.length })
	}

	private next(): void {
		const source = this.source
		const start = this.position
		const char = source.charAt(start)

		if (char === ' ' || char === '\t' || char === '\f') {
			this.position++
			return
		}

		if (char === '\n' || char === '\r') {
			const length = char === '\r' && source.charAt(start + 1) === '\n' ? 2 : 1
			this.position += length
			// Line breaks inside brackets are insignificant
			if (this.brackets.length === 0 && this.tokens.at(-1)?.type !== 'newline') {
				this.push('newline', source.slice(start, start + length), start)
			}
			return
		}

		if (char === '#') {
			while (this.position < source.length && !/[\r\n]/.test(source.charAt(this.position))) {
				this.position++
			}
			return
		}

		if (char === '\\') {
			const following = source.slice(start + 1, start + 3)
			if (following.startsWith('\n') || following.startsWith('\r')) {
				this.position += following === '\r\n' ? 3 : 2
				return
			}
			throw new ExpressionSyntaxError('unexpected character after line continuation', start)
		}

		if (/\d/.test(char) || (char === '.' && /\d/.test(source.charAt(start + 1)))) {
			this.readNumber(start)
			return
		}

		const stringStart = matchAt(stringStartRe, source, start)
		if (stringStart) {
			this.readString(start, stringStart[0].length, stringStart[1] ?? '')
			return
		}

		const name = matchAt(nameRe, source, start)
		if (name) {
			const value = name[0]
			this.push(KEYWORDS.has(value) ? 'keyword' : 'name', value, start)
			this.position += value.length
			return
		}

		const operator = OPERATORS.find((op) => source.startsWith(op, start))
		if (operator) {
			this.trackBracket(operator, start)
			this.push('operator', operator, start)
			this.position += operator.length
			return
		}

		throw new ExpressionSyntaxError(`invalid character '${char}'`, start)
	}

	private trackBracket(operator: string, start: number): void {
		if (operator === '(' || operator === '[' || operator === '{') {
			this.brackets.push({ char: operator, position: start })
			return
		}

		const opener = CLOSERS[operator]
		if (opener === undefined) {
			return
		}

		const open = this.brackets.pop()
		if (!open) {
			throw new ExpressionSyntaxError(`unmatched '${operator}'`, start)
		}
		if (open.char !== opener) {
			throw new ExpressionSyntaxError(
				`closing '${operator}' does not match opening '${open.char}'`,
				start,
			)
		}
	}

	private readNumber(start: number): void {
		const source = this.source
		const radix = matchAt(radixIntegerRe, source, start)
		let text: string

		if (radix) {
			text = radix[0]
		} else if (matchAt(radixPrefixRe, source, start)) {
			throw new ExpressionSyntaxError('invalid integer literal', start)
		} else {
			text = matchAt(decimalRe, source, start)?.[0] ?? ''
			if (isDecimalInteger(text) && text.startsWith('0') && nonZeroDigitRe.test(text)) {
				throw new ExpressionSyntaxError(
					'leading zeros in decimal integer literals are not permitted',
					start,
				)
			}
		}

		let type: TokenType = 'number'
		const suffix = source.charAt(start + text.length)
		if (!radix && (suffix === 'j' || suffix === 'J')) {
			type = 'imaginary'
			text += suffix
		}

		if (identifierCharRe.test(source.charAt(start + text.length))) {
			throw new ExpressionSyntaxError('invalid numeric literal', start)
		}

		this.push(type, text, start)
		this.position += text.length
	}

	private readString(start: number, prefixLength: number, quote: string): void {
		const source = this.source
		const triple = quote.length === 3
		let position = start + prefixLength

		while (position < source.length) {
			const char = source.charAt(position)
			if (char === '\\') {
				position += 2
				continue
			}
			if (source.startsWith(quote, position)) {
				const end = position + quote.length
				this.push('string', source.slice(start, end), start)
				this.position = end
				return
			}
			if (!triple && (char === '\n' || char === '\r')) {
				break
			}
			position++
		}

		throw new ExpressionSyntaxError('unterminated string literal', start)
	}
}

export function tokenize(source: string): Token[] {
	return new Tokenizer(source).tokenize()
}
