import rational from '@isopodlabs/maths/rational';
import { symbolic, constant, sum, product, power, termsOf, factorsOf } from './symbolic';
import { realPow } from './real';

export function accumulate<K>(map: Map<K, rational>, key: K, value: rational) {
	const prev = map.get(key);
	map.set(key, prev ? prev.add(value) : value);
}

// terms are already rewritten and flattened
export function combineTerms(terms: Iterable<symbolic>): symbolic {
	const coefficients = new Map<symbolic, rational>();
	let c = rational(0);

	for (const t of terms) {
		if (t.kind === 'const') {
			c = c.add(t.value);
			continue;
		}
		// split off the first constant factor by position, so equal constants elsewhere stay in the key
		const factors	= factorsOf(t);
		const i			= factors.findIndex(f => f.kind === 'const');
		const coef		= factors[i];
		if (coef?.kind === 'const')
			accumulate(coefficients, product(factors.filter((_, j) => j !== i)), coef.value);
		else
			accumulate(coefficients, t, rational(1));
	}

	if (!c.is0())
		accumulate(coefficients, constant(c), rational(1));

	const result: symbolic[] = [];
	for (const [term, coef] of coefficients) {
		if (!coef.is0())
			result.push(coef.is1() ? term : product([constant(coef), term]));
	}
	return sum(result);
}

// factors are already rewritten and flattened
export function combineFactors(factors: Iterable<symbolic>): symbolic {
	const exponents = new Map<symbolic, rational>();
	let c = rational(1);

	for (const f of factors) {
		if (f.kind === 'const')
			c = c.mul(f.value);
		else if (f.kind === 'pow' && f.exponent.kind === 'const')
			accumulate(exponents, f.base, f.exponent.value);
		else
			accumulate(exponents, f, rational(1));
	}

	// fold constant bases whose power is exact, e.g. 2^(1/2) * 2^(1/2)
	for (const [base, exp] of exponents) {
		if (base.kind === 'const') {
			const r = realPow(base.value, exp);
			if (r) {
				c = c.mul(r);
				exponents.delete(base);
			}
		}
	}

	if (c.is0())
		return symbolic.zero;

	// the coefficient never joins the exponent map, so c * c^(1/2) stays as it is
	let coefficient = c;
	if (!c.is1()) {
		const distribute = [...exponents].find(([base, exp]) => base.kind === 'add' && exp.abs().is1());
		if (distribute) {
			const [base, exp] = distribute;
			const scale = constant(exp.sign() > 0 ? c : c.recip());
			exponents.delete(base);
			accumulate(exponents, sum(termsOf(base).map(t => combineFactors([scale, ...factorsOf(t)]))), exp);
			coefficient = rational(1);
		}
	}

	const result: symbolic[] = [constant(coefficient)];
	for (const [base, exp] of exponents) {
		if (exp.is0())
			continue;
		if (exp.is1())
			result.push(base);
		else if (base.kind === 'pow')	// (x^y)^2 => x^(2*y)
			result.push(power(base.base, combineFactors([constant(exp), ...factorsOf(base.exponent)])));
		else
			result.push(power(base, constant(exp)));
	}
	return product(result);
}
