import { describe, it, expect } from 'vitest';
import rational from '@isopodlabs/maths/rational';
import { makeRat, compareReal, realPow, isTrue, isFalse } from '../src/real';

function same(a: rational | undefined, b: rational) {
	return !!a && a.eq(b);
}

describe('makeRat', () => {
	it('converts integers exactly', () => {
		expect(same(makeRat(7), rational(7))).toBe(true);
		expect(same(makeRat(-3), rational(-3))).toBe(true);
	});

	it('passes rationals through', () => {
		const r = rational(2, 3);
		expect(makeRat(r)).toBe(r);
	});

	it('rejects non-finite numbers', () => {
		expect(() => makeRat(NaN)).toThrow('Cannot convert NaN to rational');
		expect(() => makeRat(Infinity)).toThrow('Cannot convert Infinity to rational');
	});
});

describe('compareReal', () => {
	it('orders exactly', () => {
		expect(compareReal(rational(1, 3), rational(1, 2))).toBe(-1);
		expect(compareReal(rational(2, 4), rational(1, 2))).toBe(0);
		expect(compareReal(rational(3), rational(-3))).toBe(1);
	});
});

describe('realPow', () => {
	it('raises to integer powers', () => {
		expect(same(realPow(rational(2), rational(10)), rational(1024))).toBe(true);
		expect(same(realPow(rational(2, 3), rational(2)), rational(4, 9))).toBe(true);
		expect(same(realPow(rational(-2), rational(3)), rational(-8))).toBe(true);
	});

	it('takes reciprocals for negative powers', () => {
		expect(same(realPow(rational(2), rational(-2)), rational(1, 4))).toBe(true);
		expect(same(realPow(rational(-2), rational(-1)), rational(-1, 2))).toBe(true);
	});

	it('gives one for a zero exponent', () => {
		expect(same(realPow(rational(5), rational(0)), rational(1))).toBe(true);
	});

	it('takes exact roots only', () => {
		expect(same(realPow(rational(4, 9), rational(1, 2)), rational(2, 3))).toBe(true);
		expect(same(realPow(rational(8), rational(2, 3)), rational(4))).toBe(true);
		expect(same(realPow(rational(-8), rational(1, 3)), rational(-2))).toBe(true);
		expect(realPow(rational(2), rational(1, 2))).toBeUndefined();
		expect(realPow(rational(-4), rational(1, 2))).toBeUndefined();
	});

	it('gives up on division by zero and overflow', () => {
		expect(realPow(rational(0), rational(-1))).toBeUndefined();
		expect(realPow(rational(10), rational(400))).toBeUndefined();
	});
});

describe('truth values', () => {
	it('treats nonzero as true', () => {
		expect(isTrue(rational(2))).toBe(true);
		expect(isFalse(rational(0))).toBe(true);
		expect(isTrue(undefined)).toBe(false);
		expect(isFalse(undefined)).toBe(false);
	});
});
