import { describe, expect, it } from 'vitest'
import { ExpressionSyntaxError } from '../src/index.ts'
import { numericValue, tokenize } from '../src/tokenizer.ts'

function shape(source: string) {
	return tokenize(source).map((token) => [token.type, token.value])
}

function syntaxError(source: string): ExpressionSyntaxError {
	try {
		tokenize(source)
	} catch (error) {
		if (error instanceof ExpressionSyntaxError) {
			return error
		}
		throw error
	}
	throw new Error(`expected '${source}' to be rejected`)
}

describe('tokenizer', () => {
	describe('numbers', () => {
		it('splits a simple sum', () => {
			expect(shape('2 + 3')).toEqual([
				['number', '2'],
				['operator', '+'],
				['number', '3'],
				['end', ''],
			])
		})

		it('reads every literal form', () => {
			const values = ['0x1F', '0o17', '0b101', '1_000', '.5', '5.', '1e3', '1.e2', '2.5E-1'].map(
				(source) => {
					const [token] = tokenize(source)
					expect(token?.type).toBe('number')
					return numericValue(token?.value ?? '')
				},
			)
			expect(values).toEqual([31, 15, 5, 1000, 0.5, 5, 1000, 100, 0.25])
		})

		it('allows zero with leading zeros', () => {
			expect(shape('00')).toEqual([
				['number', '00'],
				['end', ''],
			])
		})

		it('marks imaginary literals', () => {
			expect(shape('2j')).toEqual([
				['imaginary', '2j'],
				['end', ''],
			])
		})

		it('rejects malformed literals', () => {
			expect(syntaxError('01').message).toBe(
				'leading zeros in decimal integer literals are not permitted at position 0',
			)
			expect(syntaxError('1abc').message).toBe('invalid numeric literal at position 0')
			expect(syntaxError('1_').message).toBe('invalid numeric literal at position 0')
			expect(syntaxError('0x').message).toBe('invalid integer literal at position 0')
		})
	})

	describe('operators', () => {
		it('prefers the longest operator', () => {
			expect(shape('2**3//4')).toEqual([
				['number', '2'],
				['operator', '**'],
				['number', '3'],
				['operator', '//'],
				['number', '4'],
				['end', ''],
			])
		})

		it('reports stray characters with their offset', () => {
			const error = syntaxError('1 + $')
			expect(error.message).toBe("invalid character '$' at position 4")
			expect(error.position).toBe(4)
		})
	})

	describe('names and strings', () => {
		it('separates keywords from names', () => {
			expect(shape('lambda foo')).toEqual([
				['keyword', 'lambda'],
				['name', 'foo'],
				['end', ''],
			])
		})

		it('reads quoted and prefixed strings', () => {
			expect(shape(`"a" 'b' rb'c' """d"""`)).toEqual([
				['string', '"a"'],
				['string', "'b'"],
				['string', "rb'c'"],
				['string', '"""d"""'],
				['end', ''],
			])
		})

		it('keeps escaped quotes inside a string', () => {
			expect(shape(String.raw`'it\'s'`)).toEqual([
				['string', String.raw`'it\'s'`],
				['end', ''],
			])
		})

		it('rejects unterminated strings', () => {
			expect(syntaxError("'abc").message).toBe('unterminated string literal at position 0')
			expect(syntaxError("'abc\n'").message).toBe('unterminated string literal at position 0')
		})
	})

	describe('layout', () => {
		it('ignores line breaks inside brackets', () => {
			expect(shape('(1\n+ 2)').map(([type]) => type)).toEqual([
				'operator',
				'number',
				'operator',
				'number',
				'operator',
				'end',
			])
		})

		it('emits a single newline token between lines', () => {
			expect(shape('1\n\n2')).toEqual([
				['number', '1'],
				['newline', '\n'],
				['number', '2'],
				['end', ''],
			])
		})

		it('skips comments and line continuations', () => {
			expect(shape('1 + \\\n 2 # trailing note')).toEqual([
				['number', '1'],
				['operator', '+'],
				['number', '2'],
				['end', ''],
			])
		})
	})

	describe('brackets', () => {
		it('rejects an unmatched closer', () => {
			expect(syntaxError('1)').message).toBe("unmatched ')' at position 1")
		})

		it('rejects mismatched pairs', () => {
			expect(syntaxError('(]').message).toBe(
				"closing ']' does not match opening '(' at position 1",
			)
		})

		it('rejects an opener that is never closed', () => {
			const error = syntaxError('2 * (1 + 3')
			expect(error.message).toBe("'(' was never closed at position 4")
			expect(error.position).toBe(4)
		})
	})
})
