import { describe, it, expect } from 'vitest';
import rational from '@isopodlabs/maths/rational';
import { symbolic, callable, CallResult, call, binary, set, arrow } from '../src/symbolic';
import type { Callable } from '../src/symbolic';
import { EvaluateVisitor, evaluate, evaluateAt, evaluateWithFaults } from '../src/evaluate';

const x = symbolic.variable('x');
const y = symbolic.variable('y');
const n = (i: number) => symbolic.from(i);

describe('constant folding', () => {
	it('folds arithmetic on constants', () => {
		expect(evaluate(n(2).add(3))).toBe(n(5));
		expect(evaluate(n(2).mul(3))).toBe(n(6));
		expect(evaluate(n(2).pow(3))).toBe(n(8));
		expect(evaluate(n(2).sub(3))).toBe(n(-1));
	});

	it('folds exact roots and keeps the rest symbolic', () => {
		expect(evaluate(n(4).pow(rational(1, 2)))).toBe(n(2));
		expect(evaluate(n(2).pow(rational(1, 2)))).toBe(n(2).pow(rational(1, 2)));
	});

	it('folds products of roots', () => {
		const root2 = n(2).pow(rational(1, 2));
		expect(evaluate(root2.mul(root2).mul(3))).toBe(n(6));
	});
});

describe('like terms and factors', () => {
	it('combines like terms', () => {
		expect(evaluate(x.add(x))).toBe(x.mul(2));
		expect(evaluate(x.add(x.mul(2)).add(3))).toBe(x.mul(3).add(3));
		expect(evaluate(x.sub(x))).toBe(symbolic.zero);
	});

	it('combines like factors', () => {
		expect(evaluate(x.mul(x))).toBe(x.pow(2));
		expect(evaluate(x.pow(2).mul(x.pow(-2)))).toBe(symbolic.one);
		expect(evaluate(x.div(x))).toBe(symbolic.one);
	});

	it('distributes a constant over a sum', () => {
		expect(evaluate(n(2).mul(x.add(y)))).toBe(x.mul(2).add(y.mul(2)));
	});

	it('prints the canonical form', () => {
		expect(evaluate(x.add(x.mul(2)).add(3)).toString()).toBe('3 * x + 3');
		expect(evaluate(x.sub(2)).toString()).toBe('x - 2');
	});
});

describe('power identities', () => {
	it('simplifies trivial exponents and bases', () => {
		expect(evaluate(x.pow(0))).toBe(symbolic.one);
		expect(evaluate(x.pow(1))).toBe(x);
		expect(evaluate(n(1).pow(x))).toBe(symbolic.one);
		expect(evaluate(n(0).pow(x))).toBe(symbolic.zero);
	});

	it('folds 0^0 to 0', () => {
		expect(evaluate(n(0).pow(0))).toBe(symbolic.zero);
	});

	it('splits powers of products', () => {
		expect(evaluate(x.mul(y).pow(2))).toBe(x.pow(2).mul(y.pow(2)));
	});

	it('gives one form for sums and products of roots', () => {
		const root2 = n(2).pow(rational(1, 2));
		expect(evaluate(root2.add(root2))).toBe(root2.mul(2));
		expect(evaluate(n(2).mul(root2))).toBe(root2.mul(2));
		expect(evaluate(root2.mul(2).compare('=', root2.add(root2)))).toBe(symbolic.true);
	});

	it('gives one form for squares of symbolic powers', () => {
		expect(evaluate(x.pow(y).mul(x.pow(y)))).toBe(x.pow(y.mul(2)));
		expect(evaluate(x.pow(y).pow(2))).toBe(x.pow(y.mul(2)));
	});

	it('multiplies nested exponents', () => {
		expect(evaluate(x.pow(2).pow(3))).toBe(x.pow(6));
		expect(evaluate(x.pow(2).pow(rational(1, 2)))).toBe(x);
	});
});

describe('idempotence', () => {
	it('leaves canonical forms unchanged', () => {
		const exprs = [
			x.add(x.mul(2)).add(3),
			n(2).mul(x.add(y)),
			x.mul(y).pow(2).mul(x),
			n(2).pow(rational(1, 2)).mul(3),
			x.less(y).and(y.less(3)),
			n(2).pow(rational(1, 2)).add(n(2).pow(rational(1, 2))),
			n(2).mul(n(2).pow(rational(1, 2))),
			x.pow(y).mul(x.pow(y)),
			x.pow(y).mul(x.pow(y)).mul(x),
		];
		for (const e of exprs) {
			const once = evaluate(e);
			expect(evaluate(once)).toBe(once);
		}
	});
});

describe('relations and logic', () => {
	it('compares constants in the right direction', () => {
		expect(evaluate(n(3).less(5))).toBe(symbolic.true);
		expect(evaluate(n(5).less(3))).toBe(symbolic.false);
		expect(evaluate(n(5).greater(3))).toBe(symbolic.true);
		expect(evaluate(n(3).greater(5))).toBe(symbolic.false);
		expect(evaluate(n(3).compare('<=', 3))).toBe(symbolic.true);
		expect(evaluate(n(4).compare('<=', 3))).toBe(symbolic.false);
		expect(evaluate(n(3).compare('>=', 3))).toBe(symbolic.true);
		expect(evaluate(n(2).compare('>=', 3))).toBe(symbolic.false);
		expect(evaluate(n(3).compare('=', 3))).toBe(symbolic.true);
		expect(evaluate(n(3).compare('!=', 3))).toBe(symbolic.false);
	});

	it('compares after folding', () => {
		expect(evaluate(n(1).add(2).compare('=', 3))).toBe(symbolic.true);
		expect(evaluate(symbolic.from(rational(1, 3)).less(rational(1, 2)))).toBe(symbolic.true);
	});

	it('folds identical sides', () => {
		expect(evaluate(x.add(y).compare('=', y.add(x)))).toBe(symbolic.true);
		expect(evaluate(x.compare('!=', x))).toBe(symbolic.false);
	});

	it('leaves unknown relations alone', () => {
		const e = x.less(y);
		expect(evaluate(e)).toBe(e);
		expect(evaluate(x.compare('=', y))).toBe(x.compare('=', y));
	});

	it('folds && and ||', () => {
		const t = symbolic.true, f = symbolic.false;
		expect(evaluate(x.and(f))).toBe(f);
		expect(evaluate(t.and(t))).toBe(t);
		expect(evaluate(x.and(t))).toBe(x.and(t));
		expect(evaluate(x.or(t))).toBe(t);
		expect(evaluate(f.or(f))).toBe(f);
		expect(evaluate(x.or(f))).toBe(x.or(f));
	});

	it('folds !', () => {
		expect(evaluate(symbolic.false.not())).toBe(symbolic.true);
		expect(evaluate(n(2).not())).toBe(symbolic.false);
		expect(evaluate(n(1).less(2).not())).toBe(symbolic.false);
		expect(evaluate(x.not())).toBe(x.not());
	});
});

describe('calls', () => {
	const square	= callable('square', ([a]) => CallResult.ok(a.mul(a)), args => args.length === 1);
	const broken	= callable('broken', () => CallResult.fail('domain error'));
	const unknown	= callable('unknown', () => CallResult.ok());

	it('replaces a call with its simplified result', () => {
		expect(evaluate(call(square, [n(3)]))).toBe(n(9));
		expect(evaluate(call(square, [x.add(x)]))).toBe(x.pow(2).mul(4));
	});

	it('leaves calls that cannot be made unevaluated', () => {
		const e = call(square, [x, y]);
		expect(evaluate(e)).toBe(e);
		expect(evaluate(call(unknown, [x]))).toBe(call(unknown, [x]));
	});

	it('records a fault per failing call and keeps going', () => {
		const e = call(broken, [x]).add(call(broken, [y])).add(n(1).add(1));
		const { value, faults } = evaluateWithFaults(e);

		expect(value).toBe(call(broken, [x]).add(call(broken, [y])).add(2));
		expect(faults).toHaveLength(2);
		expect(faults.map(f => f.node)).toEqual([call(broken, [x]), call(broken, [y])]);
		expect(faults[0].error.message).toBe('domain error');
	});

	it('records a repeated call once', () => {
		const f = call(broken, [x]);
		const { value, faults } = evaluateWithFaults(f.add(f));
		expect(value).toBe(f.mul(2));
		expect(faults).toHaveLength(1);
	});

	it('stops when a call returns itself', () => {
		const next: Callable = {
			name:		'next',
			canCall:	() => true,
			call:		args => CallResult.ok(call(next, args).add(1)),
		};
		expect(evaluate(call(next, [x]))).toBe(call(next, [x]).add(1));
	});

	it('stops one step later when the arguments change first', () => {
		const next: Callable = {
			name:		'next',
			canCall:	() => true,
			call:		args => CallResult.ok(call(next, args).add(1)),
		};
		// next(1 + 1) becomes next(2), which is a new node and is expanded once
		expect(evaluate(call(next, [n(1).add(1)]))).toBe(call(next, [n(2)]).add(2));
	});

	it('evaluates arguments before calling', () => {
		const args = [x.sub(x)];
		expect(evaluate(call(square, args))).toBe(symbolic.zero);
	});
});

describe('bindings', () => {
	it('substitutes before simplifying', () => {
		expect(evaluate(x.mul(y), { x: 2, y: 3 })).toBe(n(6));
		expect(evaluate(x.add(y), new Map([[x, y]]))).toBe(y.mul(2));
		expect(evaluate(x.add(1), [arrow(x, n(4))])).toBe(n(5));
	});

	it('evaluates at a point', () => {
		expect(evaluate(x.pow(2), x, 3)).toBe(n(9));
		expect(evaluateAt(x.add(y), x, y)).toBe(y.mul(2));
	});

	it('shares one visitor across a batch', () => {
		expect(evaluate([x.add(x), x.mul(x)], { x: 3 })).toEqual([n(6), n(9)]);
	});

	it('rejects bindings that are not arrows', () => {
		expect(() => evaluate(x, [y])).toThrow('bindings must be arrows');
	});

	it('applies := with a set of arrows', () => {
		const e = binary(':=', x.add(y), set([arrow(x, n(2)), arrow(y, n(3))]));
		expect(evaluate(e)).toBe(n(5));
		expect(evaluate(binary(':=', x.add(y), arrow(x, n(2))))).toBe(y.add(2));
	});

	it('records a fault for := without arrows', () => {
		const e = binary(':=', x, y);
		const { value, faults } = evaluateWithFaults(e);
		expect(value).toBe(e);
		expect(faults).toHaveLength(1);
		expect(faults[0].node).toBe(e);
	});
});

describe('EvaluateVisitor', () => {
	it('accumulates faults across visits', () => {
		const broken	= callable('broken', () => CallResult.fail(new Error('no')));
		const v			= new EvaluateVisitor();
		v.visit(call(broken, [x]));
		v.visit(call(broken, [y]));
		expect(v.faults).toHaveLength(2);
	});
});
