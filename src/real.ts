import rational from '@isopodlabs/maths/rational';
import real from '@isopodlabs/maths/real';

// exact values held by constants; booleans are 1 and 0
export type Real = rational;

export function makeRat(n: number | rational): rational {
	if (typeof n !== 'number')
		return n;

	if (Number.isInteger(n))
		return rational(n);

	if (Number.isFinite(n)) {
		const d = real.denominator(n, 1e6, 1e-8);
		if (d < 1e6)
			return rational(Math.round(n * d), d);
	}
	throw new Error(`Cannot convert ${n} to rational`);
}

export function compareReal(a: rational, b: rational): number {
	return a.sub(b).sign();
}

export function isTrue(r?: rational): boolean {
	return !!r && !r.is0();
}

export function isFalse(r?: rational): boolean {
	return !!r && r.is0();
}

function intPow(value: number, n: number): number | undefined {
	const r = value ** n;
	return Number.isSafeInteger(r) ? r : undefined;
}

function intRoot(value: number, n: number): number | undefined {
	const r = Math.round(value ** (1 / n));
	return r ** n === value ? r : undefined;
}

/**
 * Exact base^exp, or undefined when the result is not rational (or would overflow),
 * in which case callers keep the power symbolic.
 */
export function realPow(base: rational, exp: rational): rational | undefined {
	if (exp.is0())
		return rational(1);

	if (!exp.isInteger()) {
		// only perfect roots: value = i^d => value^(n/d) = i^n
		const d		= exp.den;
		const neg	= base.sign() < 0;
		if (neg && !(d & 1))
			return;
		const num	= intRoot(Math.abs(base.num), d);
		const den	= intRoot(base.den, d);
		if (num === undefined || den === undefined)
			return;
		return realPow(rational(neg ? -num : num, den), rational(exp.num));
	}

	const n = exp.num;
	if (n < 0 && base.is0())
		return;

	const num = intPow(base.num, Math.abs(n));
	const den = intPow(base.den, Math.abs(n));
	if (num === undefined || den === undefined)
		return;

	// keep the sign on the numerator
	return n < 0 ? rational(Math.sign(num) * den, Math.abs(num)) : rational(num, den);
}
