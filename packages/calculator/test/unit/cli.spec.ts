import pino from 'pino'
import { describe, expect, it } from 'vitest'
import { ExitCode, formatResult, runCli, USAGE } from '../../src/index.ts'

function run(args: string[], env: Record<string, string | undefined> = {}) {
	const out: string[] = []
	const err: string[] = []
	const code = runCli(args, {
		stdout: (line) => out.push(line),
		stderr: (line) => err.push(line),
		env,
		logger: pino({ level: 'silent' }),
	})
	return { code, out, err }
}

describe('runCli', () => {
	describe('success', () => {
		it.each([
			['2 + 3 * 4 - 1/2', '13.5'],
			['2 ** 10', '1024.0'],
			['7 // 2', '3.0'],
			['5 % 3', '2.0'],
			['-0.0', '-0.0'],
			['-0', '-0.0'],
		])('prints %s as %s', (expression, printed) => {
			expect(run([expression])).toEqual({ code: ExitCode.Success, out: [printed], err: [] })
		})
	})

	describe('usage', () => {
		it('requires an expression', () => {
			expect(run([])).toEqual({ code: ExitCode.Usage, out: [], err: [USAGE] })
		})

		it('refuses more than one argument', () => {
			expect(run(['1', '2'])).toEqual({ code: ExitCode.Usage, out: [], err: [USAGE] })
		})
	})

	describe('failures', () => {
		it.each([
			['1/0', 'Error: division by zero'],
			["__import__('os').system('echo no')", 'Error: Unsupported expression element: call'],
			['1 +', 'Error: unexpected end of expression at position 3'],
			['(-1) ** 0.5', 'Error: negative number cannot be raised to a fractional power'],
		])('reports %s', (expression, message) => {
			expect(run([expression])).toEqual({ code: ExitCode.Failure, out: [], err: [message] })
		})

		it('applies SAFE_CALC_MAX_DEPTH', () => {
			expect(run(['1 + 1 + 1'], { SAFE_CALC_MAX_DEPTH: '2' })).toEqual({
				code: ExitCode.Failure,
				out: [],
				err: ['Error: expression is nested too deeply at position 0'],
			})
			expect(run(['1 + 1 + 1'], { SAFE_CALC_MAX_DEPTH: '3' }).out).toEqual(['3.0'])
		})

		it('reports invalid configuration before evaluating', () => {
			const { code, out, err } = run(['1 + 1'], { LOG_LEVEL: 'loud' })
			expect(code).toBe(ExitCode.Failure)
			expect(out).toEqual([])
			expect(err).toHaveLength(1)
			expect(err[0]).toMatch(/^Error: Invalid configuration: LOG_LEVEL: /)
		})
	})

	describe('logging', () => {
		function runLogged(expression: string) {
			const lines: string[] = []
			const logger = pino({ level: 'debug' }, { write: (msg: string) => lines.push(msg) })
			const code = runCli([expression], { stdout: () => {}, stderr: () => {}, env: {}, logger })
			return { code, entries: lines.map((line) => JSON.parse(line)) }
		}

		it('traces a successful evaluation', () => {
			const { code, entries } = runLogged('1 + 1')
			expect(code).toBe(ExitCode.Success)
			expect(entries.map((entry) => entry.msg)).toEqual(['evaluating expression', 'evaluation finished'])
			expect(entries[0].expression).toBe('1 + 1')
			expect(entries[1].result).toBe(2)
		})

		it('records the kind of failure', () => {
			const { entries } = runLogged('1/0')
			expect(entries.map((entry) => entry.msg)).toEqual(['evaluating expression', 'evaluation failed'])
			expect(entries[1].kind).toBe('division-by-zero')
		})
	})
})

describe('formatResult', () => {
	it.each([
		[13.5, '13.5'],
		[1024, '1024.0'],
		[-3, '-3.0'],
		[0, '0.0'],
		[-0, '-0.0'],
		[0.1 + 0.2, '0.30000000000000004'],
		[1e21, '1e+21'],
		[Number.NaN, 'nan'],
		[Number.POSITIVE_INFINITY, 'inf'],
		[Number.NEGATIVE_INFINITY, '-inf'],
	])('formats %s as %s', (value, printed) => {
		expect(formatResult(value)).toBe(printed)
	})
})
