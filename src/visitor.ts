import {
	symbolic, sum, product, power, binary, unary, call, set, arrow,
	symbolicConstant, symbolicVariable, symbolicAdd, symbolicMul, symbolicPow,
	symbolicBinary, symbolicUnary, symbolicCall, symbolicSet, symbolicArrow,
} from './symbolic';

// visit each item, returning the original array if nothing changed
export function visitAll(items: readonly symbolic[], visit: (i: symbolic) => symbolic): readonly symbolic[] {
	let changed = false;
	const result = items.map(i => {
		const v = visit(i);
		if (v !== i)
			changed = true;
		return v;
	});
	return changed ? result : items;
}

//-----------------------------------------------------------------------------
// CachedRecursiveVisitor
//	bottom-up rewrite; each node is rewritten at most once per visitor
//	a node reached again while it is still being rewritten is returned as-is
//-----------------------------------------------------------------------------

export class CachedRecursiveVisitor {
	static depth	= 0;
	static logging	= false;

	static setLogging(enabled: boolean) {
		this.logging = enabled;
	}

	// auto-indent/outdent: call the returned function when the nested work is done
	static log(log: () => string) {
		if (this.logging) {
			console.log('  '.repeat(this.depth++) + log());
			return () => { this.depth--; };
		}
		return () => {};
	}

	private cache		= new Map<symbolic, symbolic>();
	private visiting	= new Set<symbolic>();

	visit(node: symbolic): symbolic {
		const cached = this.cache.get(node);
		if (cached)
			return cached;

		if (this.visiting.has(node))
			return this.revisit(node);

		const outdent = CachedRecursiveVisitor.log(() => `visit ${node}`);
		this.visiting.add(node);
		try {
			const result = this.dispatch(node);
			this.cache.set(node, result);
			if (result !== node)
				CachedRecursiveVisitor.log(() => `=> ${result}`)();
			return result;
		} finally {
			this.visiting.delete(node);
			outdent();
		}
	}

	revisit(node: symbolic): symbolic {
		return node;
	}

	protected dispatch(node: symbolic): symbolic {
		switch (node.kind) {
			case 'const':	return this.visitConst(node);
			case 'var':		return this.visitVar(node);
			case 'add':		return this.visitAdd(node);
			case 'mul':		return this.visitMul(node);
			case 'pow':		return this.visitPow(node);
			case 'binary':	return this.visitBinary(node);
			case 'unary':	return this.visitUnary(node);
			case 'call':	return this.visitCall(node);
			case 'set':		return this.visitSet(node);
			case 'arrow':	return this.visitArrow(node);
			default: {
				const unknown: never = node;
				throw new Error(`unknown node ${unknown}`);
			}
		}
	}

	protected visitAll(items: readonly symbolic[]) {
		return visitAll(items, i => this.visit(i));
	}

	visitConst(node: symbolicConstant): symbolic {
		return node;
	}

	visitVar(node: symbolicVariable): symbolic {
		return node;
	}

	visitAdd(node: symbolicAdd): symbolic {
		const terms = this.visitAll(node.terms);
		return terms === node.terms ? node : sum(terms);
	}

	visitMul(node: symbolicMul): symbolic {
		const factors = this.visitAll(node.factors);
		return factors === node.factors ? node : product(factors);
	}

	visitPow(node: symbolicPow): symbolic {
		const base		= this.visit(node.base);
		const exponent	= this.visit(node.exponent);
		return base === node.base && exponent === node.exponent ? node : power(base, exponent);
	}

	visitBinary(node: symbolicBinary): symbolic {
		const left	= this.visit(node.left);
		const right	= this.visit(node.right);
		return left === node.left && right === node.right ? node : binary(node.op, left, right);
	}

	visitUnary(node: symbolicUnary): symbolic {
		const arg = this.visit(node.arg);
		return arg === node.arg ? node : unary(node.op, arg);
	}

	visitCall(node: symbolicCall): symbolic {
		const args = this.visitAll(node.args);
		return args === node.args ? node : call(node.target, args);
	}

	visitSet(node: symbolicSet): symbolic {
		const members = this.visitAll(node.members);
		return members === node.members ? node : set(members);
	}

	visitArrow(node: symbolicArrow): symbolic {
		const left	= this.visit(node.left);
		const right	= this.visit(node.right);
		return left === node.left && right === node.right ? node : arrow(left, right);
	}
}
