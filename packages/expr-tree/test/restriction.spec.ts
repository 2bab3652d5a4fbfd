import { afterEach, describe, expect, it, vi } from 'vitest'
import {
	EvaluationError,
	evaluate,
	ExpressionSyntaxError,
	UnsupportedExpressionError,
} from '../src/index.ts'

function rejection(source: string): UnsupportedExpressionError {
	try {
		evaluate(source)
	} catch (error) {
		if (error instanceof UnsupportedExpressionError) {
			return error
		}
		throw error
	}
	throw new Error(`expected '${source}' to be rejected`)
}

describe('restriction', () => {
	afterEach(() => {
		vi.unstubAllGlobals()
	})

	it('rejects the import-and-call payload without running it', () => {
		const error = rejection("__import__('os').system('echo no')")
		expect(error.construct).toBe('call')
		expect(error.message).toBe('Unsupported expression element: call')
		expect(error.kind).toBe('unsupported')
		expect(error).toBeInstanceOf(EvaluationError)
	})

	it('never calls functions reachable from the global scope', () => {
		const probe = vi.fn(() => 42)
		vi.stubGlobal('probe', probe)

		expect(() => evaluate('probe()')).toThrow(UnsupportedExpressionError)
		expect(() => evaluate('globalThis.probe()')).toThrow(UnsupportedExpressionError)
		expect(probe).not.toHaveBeenCalled()
	})

	describe('disallowed elements', () => {
		it.each([
			['x', 'name'],
			['abs(-1)', 'call'],
			['(1).real', 'attribute'],
			['[1, 2][0]', 'subscript'],
			['1 < 2', 'compare'],
			['1 and 2', 'boolean'],
			['not 1', 'not'],
			['1 if 1 else 2', 'conditional'],
			['lambda: 1', 'lambda'],
			['[1]', 'list'],
			['(1, 2)', 'tuple'],
			['{1}', 'set'],
			['{1: 2}', 'dict'],
			['[x for x in y]', 'comprehension'],
			['(y := 1)', 'named'],
		])('rejects %s as %s', (source, construct) => {
			const error = rejection(source)
			expect(error.construct).toBe(construct)
			expect(error.message).toBe(`Unsupported expression element: ${construct}`)
		})
	})

	describe('non-numeric literals', () => {
		it.each([
			["'text'", 'string'],
			['True + 1', 'constant'],
			['None', 'constant'],
			['...', 'constant'],
			['2j * 2', 'imaginary'],
		])('rejects %s', (source, construct) => {
			const error = rejection(source)
			expect(error.construct).toBe(construct)
			expect(error.message).toBe(`Only numeric constants are allowed, got ${construct}`)
		})
	})

	describe('operators outside the allow-list', () => {
		it.each([['<<'], ['>>'], ['&'], ['|'], ['^'], ['@']])('rejects binary %s', (symbol) => {
			const error = rejection(`6 ${symbol} 3`)
			expect(error.construct).toBe(symbol)
			expect(error.message).toBe(`Unsupported operator: ${symbol}`)
		})

		it('rejects bitwise inversion', () => {
			const error = rejection('~1')
			expect(error.construct).toBe('~')
			expect(error.message).toBe('Unsupported unary operator: ~')
		})
	})

	describe('reporting order', () => {
		it('reports the leftmost offending operand first', () => {
			expect(rejection('x + y()').construct).toBe('name')
			expect(rejection('1 + y() + x').construct).toBe('call')
		})

		it('checks operands before their operator', () => {
			expect(rejection('~x').construct).toBe('name')
			expect(rejection("1 << 'a'").construct).toBe('string')
		})

		it('rejects before evaluating anything', () => {
			expect(rejection('1/0 + x').construct).toBe('name')
		})
	})

	it('keeps syntax errors distinct from disallowed constructs', () => {
		expect(() => evaluate('import os')).toThrow(ExpressionSyntaxError)
		expect(() => evaluate('x = 1')).toThrow(ExpressionSyntaxError)
	})
})
