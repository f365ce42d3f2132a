import type rational from '@isopodlabs/maths/rational';
import {
	symbolic, Substitutions, CompareOp, bool, constant, power, product, binary, unary,
	termsOf, factorsOf, toSubstitution, isSymbolic, isSymbolicArray, asSymbolic,
	symbolicAdd, symbolicMul, symbolicPow, symbolicBinary, symbolicUnary, symbolicCall,
} from './symbolic';
import { CachedRecursiveVisitor } from './visitor';
import { combineTerms, combineFactors } from './collect';
import { compareReal, realPow, isTrue, isFalse } from './real';

export interface EvaluateFault {
	node:	symbolic;
	error:	Error;
}

function asReal(x: symbolic): rational | undefined {
	return x.kind === 'const' ? x.value : undefined;
}

function compareConstants(op: CompareOp, a: rational, b: rational): boolean {
	const c = compareReal(a, b);
	switch (op) {
		case '=':	return c === 0;
		case '!=':	return c !== 0;
		case '<':	return c < 0;
		case '<=':	return c <= 0;
		case '>':	return c > 0;
		case '>=':	return c >= 0;
	}
}

function isCompare(op: string): op is CompareOp {
	return op === '=' || op === '!=' || op === '<' || op === '<=' || op === '>' || op === '>=';
}

//-----------------------------------------------------------------------------
// EvaluateVisitor
//	constant folding, like terms and factors, power identities, calls, relations and logic
//-----------------------------------------------------------------------------

export class EvaluateVisitor extends CachedRecursiveVisitor {
	private _faults: EvaluateFault[] = [];

	get faults(): readonly EvaluateFault[] {
		return this._faults;
	}

	protected fault(node: symbolic, error: Error) {
		CachedRecursiveVisitor.log(() => `fault in ${node}: ${error.message}`)();
		this._faults.push({ node, error });
	}

	visitAdd(node: symbolicAdd): symbolic {
		return combineTerms(node.terms.flatMap(t => termsOf(this.visit(t))));
	}

	visitMul(node: symbolicMul): symbolic {
		return combineFactors(node.factors.flatMap(f => factorsOf(this.visit(f))));
	}

	visitPow(node: symbolicPow): symbolic {
		let base = this.visit(node.base);

		// (x*y)^z => x^z * y^z
		if (base.kind === 'mul')
			return this.visit(product(base.factors.map(f => power(f, node.exponent))));

		let exponent = this.visit(node.exponent);

		// (x^y)^z => x^(y*z)
		if (base.kind === 'pow') {
			exponent	= this.visit(product([exponent, base.exponent]));
			base		= base.base;
		}

		// 0^x is 0 even for x = 0
		const b = asReal(base);
		if (b?.is0() || b?.is1())
			return base;

		const e = asReal(exponent);
		if (e?.is0())
			return symbolic.one;
		if (e?.is1())
			return base;

		if (b && e) {
			const r = realPow(b, e);
			if (r)
				return constant(r);
		}
		return power(base, exponent);
	}

	visitCall(node: symbolicCall): symbolic {
		const visited = super.visitCall(node);
		if (visited.kind !== 'call')
			return visited;

		const { target, args } = visited;
		if (!target.canCall(args))
			return visited;

		const result = target.call(args);
		if (!result.ok) {
			this.fault(visited, result.error);
			return visited;
		}
		return result.value ? this.visit(result.value) : visited;
	}

	visitBinary(node: symbolicBinary): symbolic {
		const left	= this.visit(node.left);
		const right	= this.visit(node.right);

		if (node.op === ':=') {
			const map = toSubstitution(right);
			if (!map) {
				this.fault(node, new Error(`not a substitution: ${right}`));
				return binary(node.op, left, right);
			}
			return this.visit(left.substitute(map));
		}

		const l = asReal(left);
		const r = asReal(right);

		if (l && r && isCompare(node.op))
			return bool(compareConstants(node.op, l, r));

		switch (node.op) {
			case '&&':
				if (isFalse(l) || isFalse(r))
					return bool(false);
				if (isTrue(l) && isTrue(r))
					return bool(true);
				break;

			case '||':
				if (isTrue(l) || isTrue(r))
					return bool(true);
				if (isFalse(l) && isFalse(r))
					return bool(false);
				break;

			case '=':
				if (left === right)
					return bool(true);
				break;

			case '!=':
				if (left === right)
					return bool(false);
				break;
		}

		return left === node.left && right === node.right ? node : binary(node.op, left, right);
	}

	visitUnary(node: symbolicUnary): symbolic {
		const arg	= this.visit(node.arg);
		const c		= asReal(arg);
		if (isTrue(c))
			return bool(false);
		if (isFalse(c))
			return bool(true);
		return arg === node.arg ? node : unary(node.op, arg);
	}
}

//-----------------------------------------------------------------------------
// entry points
//-----------------------------------------------------------------------------

function substituteAll(exprs: readonly symbolic[], bindings?: Substitutions) {
	if (!bindings)
		return exprs;
	const map = toSubstitution(bindings);
	if (!map)
		throw new Error('bindings must be arrows');
	return exprs.map(e => e.substitute(map));
}

/**
 * Simplify an expression, or a batch of expressions sharing one cache.
 * Bindings are substituted before simplifying.
 */
export function evaluate(expr: symbolic, bindings?: Substitutions): symbolic;
export function evaluate(expr: readonly symbolic[], bindings?: Substitutions): symbolic[];
export function evaluate(expr: symbolic, x: symbolic, x0: symbolic | number): symbolic;
export function evaluate(expr: symbolic | readonly symbolic[], bindings?: Substitutions, x0?: symbolic | number): symbolic | symbolic[] {
	if (x0 !== undefined && bindings && isSymbolic(bindings))
		bindings = new Map([[bindings, asSymbolic(x0)]]);
	return evaluateWithFaults(expr, bindings).value;
}

// f at x = x0
export function evaluateAt(f: symbolic, x: symbolic, x0: symbolic | number): symbolic {
	return evaluate(f, x, x0);
}

export function evaluateWithFaults(expr: symbolic, bindings?: Substitutions): { value: symbolic, faults: readonly EvaluateFault[] };
export function evaluateWithFaults(expr: readonly symbolic[], bindings?: Substitutions): { value: symbolic[], faults: readonly EvaluateFault[] };
export function evaluateWithFaults(expr: symbolic | readonly symbolic[], bindings?: Substitutions): { value: symbolic | symbolic[], faults: readonly EvaluateFault[] };
export function evaluateWithFaults(expr: symbolic | readonly symbolic[], bindings?: Substitutions) {
	const visitor = new EvaluateVisitor();
	if (isSymbolicArray(expr))
		return { value: substituteAll(expr, bindings).map(e => visitor.visit(e)), faults: visitor.faults };
	return { value: visitor.visit(substituteAll([expr], bindings)[0]), faults: visitor.faults };
}
