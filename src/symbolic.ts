/* eslint-disable no-restricted-syntax */
import { compare } from '@isopodlabs/maths/core';
import rational from '@isopodlabs/maths/rational';
import { toSuperscript } from '@isopodlabs/maths/string';
import { makeRat } from './real';

// invariants:
// - all symbolic instances are interned and unique by id
// - symbolic instances are immutable
// - symbolic instances with same id are structurally equal
//	- Additive / Multiplicative:
//		- nested sums (products) are flattened into their parent
//		- identity elements are dropped (0 in sums, 1 in products); a 0 factor makes the product 0
//		- terms are in canonical order: constants last in sums, first in products, otherwise by id
//		- like terms are *not* combined - that is collect.ts's job
//	- Sets:
//		- members are unique and ordered by id

class Interner<T extends object> {
	private table = new Map<string, WeakRef<T>>();
	private finalizer: FinalizationRegistry<string>;

	constructor() {
		this.finalizer = new FinalizationRegistry((key: string) => {
			const ref = this.table.get(key);
			if (ref && !ref.deref())
				this.table.delete(key);
		});
	}

	intern<U extends T>(key: string, factory: (key: string) => U): U {
		return (this.get(key) || this.set(key, factory(key))) as U;
	}

	get(key: string): T | undefined {
		return this.table.get(key)?.deref();
	}

	set(key: string, value: T): T {
		this.table.set(key, new WeakRef(value));
		this.finalizer.register(value, key);
		return value;
	}
}

export type Kind		= 'const' | 'var' | 'add' | 'mul' | 'pow' | 'binary' | 'unary' | 'call' | 'set' | 'arrow';
export type CompareOp	= '=' | '!=' | '<' | '<=' | '>' | '>=';
export type BinaryOp	= CompareOp | '&&' | '||' | ':=';
export type UnaryOp		= '!';

export type Substitution	= ReadonlyMap<symbolic, symbolic>;
export type Bindings		= Record<string, symbolic | number>;
export type Substitutions	= Substitution | Bindings | readonly symbolic[] | symbolic;

type param = number | rational | symbolic;

const StringifyOptionsDefault = {
	parentheses:	'minimal' as 'minimal' | 'always' | 'never',
	superPower: 	false,
	mulChar:		' * ',
	divChar:		' / ',
	addChar:		' + ',
	subChar:		' - ',
	printConst:		(n: rational) => n.den === 1 ? `${n.num}` : `${n.num}/${n.den}`,
};

export type StringifyOptions = typeof StringifyOptionsDefault;

// wrap compound operands; under 'always' anything that isn't a leaf
function maybeParentheses(x: symbolic, opts: StringifyOptions, strict = false) {
	const s = x._toString(opts);
	switch (opts.parentheses) {
		case 'never':
			return s;
		case 'always':
			return x.kind === 'var' || (x.kind === 'const' && x.value.isInteger() && x.value.sign() >= 0) ? s : `(${s})`;
		default:
			return x.kind === 'add' || x.kind === 'binary' || x.kind === 'arrow'
				|| (strict && (x.kind === 'mul' || x.kind === 'pow' || (x.kind === 'const' && !(x.value.isInteger() && x.value.sign() >= 0))))
				? `(${s})` : s;
	}
}

function printPower(base: symbolic, exp: symbolic, opts: StringifyOptions) {
	const s = maybeParentheses(base, opts, true);
	if (exp.kind === 'const' && opts.superPower)
		return `${s}${toSuperscript(opts.printConst(exp.value))}`;
	return `${s}^${maybeParentheses(exp, opts, true)}`;
}

function printProduct(num: rational, factors: readonly symbolic[], opts: StringifyOptions) {
	const numer: string[] = [];
	const denom: string[] = [];

	for (const f of factors) {
		if (f.kind === 'pow' && f.exponent.kind === 'const' && f.exponent.value.sign() < 0) {
			const pow = f.exponent.value.neg();
			denom.push(pow.is1() ? maybeParentheses(f.base, opts, true) : printPower(f.base, symbolicConstant.create(pow), opts));
		} else {
			numer.push(maybeParentheses(f, opts));
		}
	}

	if (!num.is1()) {
		if (num.eq(rational(-1)) && numer.length)
			numer[0] = `-${numer[0]}`;
		else
			numer.unshift(opts.printConst(num));
	}

	return (numer.length ? numer.join(opts.mulChar) : '1') + denom.map(d => opts.divChar + d).join('');
}

// split off a leading minus sign so sums can print 'a - b'
function printSigned(x: symbolic, opts: StringifyOptions): [boolean, string] {
	if (x.kind === 'const' && x.value.sign() < 0)
		return [true, opts.printConst(x.value.neg())];

	if (x.kind === 'mul') {
		const [first, ...rest] = x.factors;
		if (first.kind === 'const' && first.value.sign() < 0)
			return [true, printProduct(first.value.neg(), rest, opts)];
	}
	return [false, x._toString(opts)];
}

function canonicalOrder(items: symbolic[], constFirst: boolean): symbolic[] {
	return items.sort((a, b) => {
		const ca = a.kind === 'const';
		if (ca !== (b.kind === 'const'))
			return ca === constFirst ? -1 : 1;
		return compare(a.id, b.id);
	});
}

function ids(items: readonly symbolic[]) {
	return items.map(i => i.id).join(',');
}

//-----------------------------------------------------------------------------
// symbolicBase
//-----------------------------------------------------------------------------

export abstract class symbolicBase {
	static interner		= new Interner<symbolicBase>();
	static defStringify = StringifyOptionsDefault;

	static setDefaultStringifyOptions(opts: Partial<StringifyOptions>) {
		this.defStringify = { ...this.defStringify, ...opts };
	}

	abstract readonly kind: Kind;

	constructor(public readonly id: string) {}

	is<K extends Kind>(kind: K): this is Extract<symbolic, { kind: K }> {
		return this.kind === kind;
	}

	eq(b: symbolicBase): boolean	{ return this === b; }

	// exact zero test: only the constant 0 is provably zero
	isZero(): boolean				{ return this.id === zero.id; }

	add(this: symbolic, b: param): symbolic	{ return sum([this, asSymbolic(b)]); }
	sub(this: symbolic, b: param): symbolic	{ return sum([this, product([minusOne, asSymbolic(b)])]); }
	mul(this: symbolic, b: param): symbolic	{ return product([this, asSymbolic(b)]); }
	div(this: symbolic, b: param): symbolic	{ return product([this, power(asSymbolic(b), minusOne)]); }
	pow(this: symbolic, b: param): symbolic	{ return power(this, asSymbolic(b)); }
	neg(this: symbolic): symbolic			{ return product([minusOne, this]); }
	recip(this: symbolic): symbolic			{ return power(this, minusOne); }

	compare(this: symbolic, op: CompareOp, b: param): symbolic	{ return binary(op, this, asSymbolic(b)); }
	less(this: symbolic, b: param): symbolic					{ return binary('<', this, asSymbolic(b)); }
	greater(this: symbolic, b: param): symbolic					{ return binary('>', this, asSymbolic(b)); }
	and(this: symbolic, b: symbolic): symbolic					{ return binary('&&', this, b); }
	or(this: symbolic, b: symbolic): symbolic					{ return binary('||', this, b); }
	not(this: symbolic): symbolic								{ return unary('!', this); }

	// replacements are looked up before descending, so whole subtrees can be substituted
	substitute(this: symbolic, map: Substitution): symbolic {
		return map.get(this) ?? this._substitute(map);
	}

	abstract _substitute(map: Substitution):	symbolic;
	abstract _toString(opts: StringifyOptions):	string;
	toString(opts?: Partial<StringifyOptions>):	string	{ return this._toString({ ...symbolicBase.defStringify, ...opts }); }
	[Symbol.for("debug.description")]():		string	{ return this.toString({}); }
}

//-----------------------------------------------------------------------------
// constant
//-----------------------------------------------------------------------------

export class symbolicConstant extends symbolicBase {
	readonly kind = 'const';

	static create(value: rational) {
		return this.interner.intern(`c:${value.num}${value.den === 1 ? '' : `/${value.den}`}`, id => new symbolicConstant(id, value));
	}

	constructor(id: string, public readonly value: rational) {
		super(id);
	}

	_substitute(_map: Substitution): symbolic	{ return this; }
	_toString(opts: StringifyOptions): string	{ return opts.printConst(this.value); }
}

//-----------------------------------------------------------------------------
// variable
//-----------------------------------------------------------------------------

export class symbolicVariable extends symbolicBase {
	readonly kind = 'var';

	static create(name: string) {
		return this.interner.intern(`v:${name}`, id => new symbolicVariable(id, name));
	}

	constructor(id: string, public readonly name: string) {
		super(id);
	}

	_substitute(_map: Substitution): symbolic	{ return this; }
	_toString(_opts: StringifyOptions): string	{ return this.name; }
}

//-----------------------------------------------------------------------------
// add
//-----------------------------------------------------------------------------

export class symbolicAdd extends symbolicBase {
	readonly kind = 'add';

	static create(terms: readonly symbolic[]) {
		if (terms.length < 2)
			throw new Error('not enough terms in additive expression');
		return this.interner.intern(`a(${ids(terms)})`, id => new symbolicAdd(id, terms));
	}

	constructor(id: string, public readonly terms: readonly symbolic[]) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return sum(this.terms.map(i => i.substitute(map)));
	}

	_toString(opts: StringifyOptions): string {
		return this.terms.map((t, j) => {
			const [neg, s] = printSigned(t, opts);
			return (j === 0 ? (neg ? '-' : '') : (neg ? opts.subChar : opts.addChar)) + s;
		}).join('');
	}
}

//-----------------------------------------------------------------------------
// mul
//-----------------------------------------------------------------------------

export class symbolicMul extends symbolicBase {
	readonly kind = 'mul';

	static create(factors: readonly symbolic[]) {
		if (factors.length < 2)
			throw new Error('not enough factors in multiplicative expression');
		return this.interner.intern(`m(${ids(factors)})`, id => new symbolicMul(id, factors));
	}

	constructor(id: string, public readonly factors: readonly symbolic[]) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return product(this.factors.map(f => f.substitute(map)));
	}

	_toString(opts: StringifyOptions): string {
		const [first, ...rest] = this.factors;
		return first.kind === 'const'
			? printProduct(first.value, rest, opts)
			: printProduct(rational(1), this.factors, opts);
	}
}

//-----------------------------------------------------------------------------
// pow
//-----------------------------------------------------------------------------

export class symbolicPow extends symbolicBase {
	readonly kind = 'pow';

	static create(base: symbolic, exponent: symbolic) {
		return this.interner.intern(`p(${base.id},${exponent.id})`, id => new symbolicPow(id, base, exponent));
	}

	constructor(id: string, public readonly base: symbolic, public readonly exponent: symbolic) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return power(this.base.substitute(map), this.exponent.substitute(map));
	}

	_toString(opts: StringifyOptions): string {
		return printPower(this.base, this.exponent, opts);
	}
}

//-----------------------------------------------------------------------------
// relational and logical operators
//-----------------------------------------------------------------------------

export class symbolicBinary extends symbolicBase {
	readonly kind = 'binary';

	static create(op: BinaryOp, left: symbolic, right: symbolic) {
		return this.interner.intern(`b${op}(${left.id},${right.id})`, id => new symbolicBinary(id, op, left, right));
	}

	constructor(id: string, public readonly op: BinaryOp, public readonly left: symbolic, public readonly right: symbolic) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return binary(this.op, this.left.substitute(map), this.right.substitute(map));
	}

	_toString(opts: StringifyOptions): string {
		return `${maybeParentheses(this.left, opts)} ${this.op} ${maybeParentheses(this.right, opts)}`;
	}
}

export class symbolicUnary extends symbolicBase {
	readonly kind = 'unary';

	static create(op: UnaryOp, arg: symbolic) {
		return this.interner.intern(`u${op}(${arg.id})`, id => new symbolicUnary(id, op, arg));
	}

	constructor(id: string, public readonly op: UnaryOp, public readonly arg: symbolic) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return unary(this.op, this.arg.substitute(map));
	}

	_toString(opts: StringifyOptions): string {
		return `${this.op}${maybeParentheses(this.arg, opts, true)}`;
	}
}

//-----------------------------------------------------------------------------
// call
//-----------------------------------------------------------------------------

export type CallResult = { ok: true, value?: symbolic } | { ok: false, error: Error };

export const CallResult = {
	ok:		(value?: symbolic): CallResult => ({ ok: true, value }),
	fail:	(error: Error | string): CallResult => ({ ok: false, error: typeof error === 'string' ? new Error(error) : error }),
};

// a possibly partial function
export interface Callable {
	readonly name: string;
	canCall(args: readonly symbolic[]): boolean;
	call(args: readonly symbolic[]): CallResult;
}

export function callable(name: string, call: (args: readonly symbolic[]) => CallResult, canCall = (_args: readonly symbolic[]) => true): Callable {
	return { name, call, canCall };
}

// distinct targets with the same name must not share call nodes
const targetIds = new WeakMap<Callable, number>();
let nextTargetId = 0;

function targetId(target: Callable) {
	let id = targetIds.get(target);
	if (id === undefined)
		targetIds.set(target, id = nextTargetId++);
	return id;
}

export class symbolicCall extends symbolicBase {
	readonly kind = 'call';

	static create(target: Callable, args: readonly symbolic[]) {
		return this.interner.intern(`f${targetId(target)}:${target.name}(${ids(args)})`, id => new symbolicCall(id, target, args));
	}

	constructor(id: string, public readonly target: Callable, public readonly args: readonly symbolic[]) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return call(this.target, this.args.map(a => a.substitute(map)));
	}

	_toString(opts: StringifyOptions): string {
		return `${this.target.name}(${this.args.map(a => a._toString(opts)).join(', ')})`;
	}
}

//-----------------------------------------------------------------------------
// set and arrow (substitution maps are sets of arrows)
//-----------------------------------------------------------------------------

export class symbolicSet extends symbolicBase {
	readonly kind = 'set';

	static create(members: readonly symbolic[]) {
		return this.interner.intern(`s(${ids(members)})`, id => new symbolicSet(id, members));
	}

	constructor(id: string, public readonly members: readonly symbolic[]) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return set(this.members.map(m => m.substitute(map)));
	}

	_toString(opts: StringifyOptions): string {
		return `{${this.members.map(m => m._toString(opts)).join(', ')}}`;
	}
}

export class symbolicArrow extends symbolicBase {
	readonly kind = 'arrow';

	static create(left: symbolic, right: symbolic) {
		return this.interner.intern(`r(${left.id},${right.id})`, id => new symbolicArrow(id, left, right));
	}

	constructor(id: string, public readonly left: symbolic, public readonly right: symbolic) {
		super(id);
	}

	_substitute(map: Substitution): symbolic {
		return arrow(this.left.substitute(map), this.right.substitute(map));
	}

	_toString(opts: StringifyOptions): string {
		return `${maybeParentheses(this.left, opts)} -> ${maybeParentheses(this.right, opts)}`;
	}
}

//-----------------------------------------------------------------------------
// symbolic
//-----------------------------------------------------------------------------

export type symbolic =
	| symbolicConstant
	| symbolicVariable
	| symbolicAdd
	| symbolicMul
	| symbolicPow
	| symbolicBinary
	| symbolicUnary
	| symbolicCall
	| symbolicSet
	| symbolicArrow;

export function constant(value: rational): symbolicConstant {
	return symbolicConstant.create(value);
}

export function variable(name: string): symbolicVariable {
	return symbolicVariable.create(name);
}

export function bool(b: boolean): symbolicConstant {
	return b ? one : zero;
}

export function asSymbolic(i: param): symbolic {
	if (typeof i === 'number')
		return constant(makeRat(i));
	return i instanceof symbolicBase ? i : constant(i);
}

export function sum(terms: Iterable<symbolic>): symbolic {
	const flat: symbolic[] = [];
	for (const t of terms) {
		if (t.kind === 'add')
			flat.push(...t.terms);
		else if (!t.isZero())
			flat.push(t);
	}
	return	flat.length === 0 ? zero
		:	flat.length === 1 ? flat[0]
		:	symbolicAdd.create(canonicalOrder(flat, false));
}

export function product(factors: Iterable<symbolic>): symbolic {
	const flat: symbolic[] = [];
	for (const f of factors) {
		if (f.kind === 'mul') {
			flat.push(...f.factors);
		} else if (f.kind === 'const') {
			if (f.value.is0())
				return zero;
			if (!f.value.is1())
				flat.push(f);
		} else {
			flat.push(f);
		}
	}
	return	flat.length === 0 ? one
		:	flat.length === 1 ? flat[0]
		:	symbolicMul.create(canonicalOrder(flat, true));
}

export function power(base: symbolic, exponent: symbolic): symbolic {
	return exponent.kind === 'const' && exponent.value.is1() ? base : symbolicPow.create(base, exponent);
}

export function binary(op: BinaryOp, left: symbolic, right: symbolic): symbolicBinary {
	return symbolicBinary.create(op, left, right);
}

export function unary(op: UnaryOp, arg: symbolic): symbolicUnary {
	return symbolicUnary.create(op, arg);
}

export function call(target: Callable, args: readonly symbolic[]): symbolicCall {
	return symbolicCall.create(target, args);
}

export function set(members: Iterable<symbolic>): symbolicSet {
	return symbolicSet.create([...new Set(members)].sort((a, b) => compare(a.id, b.id)));
}

export function arrow(left: symbolic, right: symbolic): symbolicArrow {
	return symbolicArrow.create(left, right);
}

// flattened additive terms of x; inverse of sum
export function termsOf(x: symbolic): readonly symbolic[] {
	return x.kind === 'add' ? x.terms : [x];
}

// flattened multiplicative factors of x; inverse of product
export function factorsOf(x: symbolic): readonly symbolic[] {
	return x.kind === 'mul' ? x.factors : [x];
}

export function membersOf(x: symbolic): readonly symbolic[] {
	return x.kind === 'set' ? x.members : [x];
}

export function isSymbolic(x: unknown): x is symbolic {
	return x instanceof symbolicBase;
}

export function isSymbolicArray(x: unknown): x is readonly symbolic[] {
	return Array.isArray(x);
}

function isSubstitution(x: Substitutions): x is Substitution {
	return x instanceof Map;
}

function arrowsToMap(items: readonly symbolic[]): Substitution | undefined {
	const map = new Map<symbolic, symbolic>();
	for (const i of items) {
		if (i.kind !== 'arrow')
			return;
		map.set(i.left, i.right);
	}
	return map;
}

/**
 * Normalise the accepted forms of bindings to a map from expression to replacement.
 * Returns undefined if a list, set or single expression contains anything but arrows.
 * Records are keyed by variable name.
 */
export function toSubstitution(s: Substitutions): Substitution | undefined {
	if (isSymbolic(s))
		return arrowsToMap(membersOf(s));
	if (isSubstitution(s))
		return s;
	if (isSymbolicArray(s))
		return arrowsToMap(s);
	return new Map(Object.entries(s).map(([name, value]): [symbolic, symbolic] => [variable(name), asSymbolic(value)]));
}

const zero		= symbolicConstant.create(rational(0));
const one		= symbolicConstant.create(rational(1));
const minusOne	= symbolicConstant.create(rational(-1));

export const symbolic = {
	from(i: number | rational | boolean): symbolic {
		return typeof i === 'boolean' ? bool(i) : asSymbolic(i);
	},
	variable,
	constant,
	bool,
	sum,
	product,
	power,
	binary,
	unary,
	call,
	set,
	arrow,
	callable,

	get zero():		symbolic	{ return zero; },
	get one():		symbolic	{ return one; },
	get true():		symbolic	{ return one; },
	get false():	symbolic	{ return zero; },
};
