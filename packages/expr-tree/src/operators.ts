import { DivisionByZeroError, DomainError } from './errors.ts'

function copySignOfZero(sign: number): number {
	return sign < 0 || Object.is(sign, -0) ? -0 : 0
}

function assertNonZeroDivisor(divisor: number, message: string): void {
	if (divisor === 0) {
		throw new DivisionByZeroError(message)
	}
}

/**
 * Quotient and remainder of floored division.
 * The remainder takes the sign of the divisor and the quotient is rounded so that
 * `quotient * b + remainder` lands on `a` as closely as doubles allow.
 */
function floorDivMod(a: number, b: number): [quotient: number, remainder: number] {
	let remainder = a % b
	let quotient = (a - remainder) / b

	if (remainder !== 0) {
		if ((b < 0) !== (remainder < 0)) {
			remainder += b
			quotient -= 1
		}
	} else {
		remainder = copySignOfZero(b)
	}

	if (quotient !== 0) {
		let floored = Math.floor(quotient)
		if (quotient - floored > 0.5) {
			floored += 1
		}
		return [floored, remainder]
	}

	return [copySignOfZero(a / b), remainder]
}

export function trueDivide(a: number, b: number): number {
	assertNonZeroDivisor(b, 'division by zero')
	return a / b
}

export function floorDivide(a: number, b: number): number {
	assertNonZeroDivisor(b, 'integer division or modulo by zero')
	return floorDivMod(a, b)[0]
}

export function modulo(a: number, b: number): number {
	assertNonZeroDivisor(b, 'integer division or modulo by zero')
	return floorDivMod(a, b)[1]
}

export function power(base: number, exponent: number): number {
	if (base === 1) {
		return 1
	}
	if (!Number.isFinite(exponent) && !Number.isNaN(exponent) && !Number.isNaN(base)) {
		// limits of |base| ** ±Infinity, including the cases where Math.pow gives NaN
		const magnitude = Math.abs(base)
		if (magnitude === 1) {
			return 1
		}
		return (exponent > 0) === (magnitude > 1) ? Number.POSITIVE_INFINITY : 0
	}
	if (base === 0 && exponent < 0) {
		throw new DivisionByZeroError('zero cannot be raised to a negative power')
	}

	const finiteOperands = Number.isFinite(base) && Number.isFinite(exponent)
	if (finiteOperands && base < 0 && !Number.isInteger(exponent)) {
		throw new DomainError('negative number cannot be raised to a fractional power')
	}

	const result = base ** exponent
	if (finiteOperands && !Number.isFinite(result)) {
		throw new DomainError('numeric result out of range')
	}
	return result
}

export function squareRoot(value: number): number {
	if (value < 0) {
		throw new DomainError('square root of negative number')
	}
	return Math.sqrt(value)
}
