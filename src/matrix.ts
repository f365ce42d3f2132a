import { symbolic, Substitutions, asSymbolic } from './symbolic';
import { EvaluateVisitor, evaluate } from './evaluate';
import type rational from '@isopodlabs/maths/rational';

export type MatrixFault = 'dimension' | 'not-square' | 'exponent' | 'singular' | 'not-vector';

export class MatrixError extends Error {
	constructor(public readonly reason: MatrixFault, message: string) {
		super(message);
		this.name = 'MatrixError';
	}
}

type scalar = number | rational | symbolic;

//-----------------------------------------------------------------------------
// Matrix
//	dense grid of expressions; arithmetic returns new simplified matrices
//-----------------------------------------------------------------------------

export class Matrix {
	private rows: symbolic[][];

	constructor(public readonly m: number, public readonly n: number) {
		this.rows = Array.from({ length: m }, () => Array.from({ length: n }, () => symbolic.zero));
	}

	static identity(n: number) {
		const r = new Matrix(n, n);
		for (let i = 0; i < n; i++)
			r.rows[i][i] = symbolic.one;
		return r;
	}

	static from(rows: readonly (readonly scalar[])[]) {
		const n = rows[0]?.length ?? 0;
		if (rows.some(row => row.length !== n))
			throw new MatrixError('dimension', 'rows have different lengths');
		const r = new Matrix(rows.length, n);
		r.rows = rows.map(row => row.map(asSymbolic));
		return r;
	}

	clone() {
		return this.map(x => x);
	}

	private check(i: number, j: number) {
		if (!(i >= 0 && i < this.m && j >= 0 && j < this.n))
			throw new Error(`index [${i}, ${j}] out of range for ${this.m}x${this.n} matrix`);
	}

	at(i: number, j: number): symbolic {
		this.check(i, j);
		return this.rows[i][j];
	}

	set(i: number, j: number, v: scalar) {
		this.check(i, j);
		this.rows[i][j] = asSymbolic(v);
	}

	// vectors only: a 1xN or Nx1 matrix
	private vectorIndex(i: number): [number, number] {
		if (this.m === 1)
			return [0, i];
		if (this.n === 1)
			return [i, 0];
		throw new MatrixError('not-vector', 'matrix is not a vector');
	}

	element(i: number): symbolic {
		return this.at(...this.vectorIndex(i));
	}

	setElement(i: number, v: scalar) {
		this.set(...this.vectorIndex(i), v);
	}

	private map(f: (x: symbolic, i: number, j: number) => symbolic) {
		const r = new Matrix(this.m, this.n);
		r.rows = this.rows.map((row, i) => row.map((x, j) => f(x, i, j)));
		return r;
	}

	// new matrix with every entry simplified, sharing one visitor
	private simplified(f: (x: symbolic, i: number, j: number) => symbolic) {
		const visitor = new EvaluateVisitor();
		return this.map((x, i, j) => visitor.visit(f(x, i, j)));
	}

	private sameShape(b: Matrix) {
		if (this.m !== b.m || this.n !== b.n)
			throw new MatrixError('dimension', `cannot combine ${this.m}x${this.n} and ${b.m}x${b.n} matrices`);
		return b.rows;
	}

	add(b: Matrix | scalar): Matrix {
		if (b instanceof Matrix) {
			const rows = this.sameShape(b);
			return this.simplified((x, i, j) => x.add(rows[i][j]));
		}
		const s = asSymbolic(b);
		return this.simplified(x => x.add(s));
	}

	sub(b: Matrix | scalar): Matrix {
		if (b instanceof Matrix) {
			const rows = this.sameShape(b);
			return this.simplified((x, i, j) => x.sub(rows[i][j]));
		}
		const s = asSymbolic(b);
		return this.simplified(x => x.sub(s));
	}

	// scalar - this
	rsub(a: scalar): Matrix {
		const s = asSymbolic(a);
		return this.simplified(x => s.sub(x));
	}

	mul(b: Matrix | scalar): Matrix {
		if (!(b instanceof Matrix)) {
			const s = asSymbolic(b);
			return this.simplified(x => x.mul(s));
		}

		if (this.n !== b.m)
			throw new MatrixError('dimension', `cannot multiply ${this.m}x${this.n} by ${b.m}x${b.n} matrix`);

		const rows = b.rows;
		return new Matrix(this.m, b.n).simplified((_, i, j) => symbolic.sum(this.rows[i].map((x, k) => x.mul(rows[k][j]))));
	}

	neg(): Matrix {
		return this.simplified(x => x.neg());
	}

	pow(k: number): Matrix {
		if (this.m !== this.n)
			throw new MatrixError('not-square', `cannot raise ${this.m}x${this.n} matrix to a power`);
		if (k < 0)
			return Matrix.invert(this).pow(-k);
		if (k !== 1)
			throw new MatrixError('exponent', `unsupported matrix exponent ${k}`);
		return this.clone();
	}

	inverse(): Matrix {
		return this.pow(-1);
	}

	evaluate(bindings?: Substitutions): Matrix {
		const values = evaluate(this.rows.flat(), bindings);
		return this.map((_, i, j) => values[i * this.n + j]);
	}

	eq(b: Matrix): boolean {
		return this.m === b.m && this.n === b.n && this.rows.every((row, i) => row.every((x, j) => x === b.rows[i][j]));
	}

	toString() {
		return `[${this.rows.map(row => `[${row.map(x => x.toString()).join(', ')}]`).join(', ')}]`;
	}

	//-----------------------------------------------------------------------------
	// Gauss-Jordan elimination: [A I] ~ [I A^-1]
	//	works on copies it owns; the caller's matrix is never touched
	//-----------------------------------------------------------------------------

	private static invert(a: Matrix): Matrix {
		const n			= a.n;
		const visitor	= new EvaluateVisitor();
		const work		= a.map(x => visitor.visit(x));
		const inv		= Matrix.identity(n);

		for (let i = 0; i < n; i++) {
			let p = i;
			while (p < n && work.rows[p][i].isZero())
				++p;
			if (p === n)
				throw new MatrixError('singular', 'matrix is singular');

			Matrix.swapRows(work, i, p);
			Matrix.swapRows(inv, i, p);

			const s = visitor.visit(work.rows[i][i].recip());
			Matrix.scaleRow(work, i, s, visitor);
			Matrix.scaleRow(inv, i, s, visitor);

			for (let r = 0; r < n; r++) {
				if (r !== i) {
					const f = visitor.visit(work.rows[r][i].neg());
					Matrix.scaleAddRow(work, i, f, r, visitor);
					Matrix.scaleAddRow(inv, i, f, r, visitor);
				}
			}
		}
		return inv;
	}

	private static swapRows(a: Matrix, i1: number, i2: number) {
		if (i1 !== i2)
			[a.rows[i1], a.rows[i2]] = [a.rows[i2], a.rows[i1]];
	}

	private static scaleRow(a: Matrix, i: number, s: symbolic, visitor: EvaluateVisitor) {
		a.rows[i] = a.rows[i].map(x => visitor.visit(x.mul(s)));
	}

	// row i2 += row i1 * s
	private static scaleAddRow(a: Matrix, i1: number, s: symbolic, i2: number, visitor: EvaluateVisitor) {
		const src = a.rows[i1];
		a.rows[i2] = a.rows[i2].map((x, j) => visitor.visit(x.add(src[j].mul(s))));
	}
}
