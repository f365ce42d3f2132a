export {
	symbolic, symbolicBase, callable, CallResult,
	symbolicConstant, symbolicVariable, symbolicAdd, symbolicMul, symbolicPow,
	symbolicBinary, symbolicUnary, symbolicCall, symbolicSet, symbolicArrow,
	constant, variable, bool, sum, product, power, binary, unary, call, set, arrow,
	asSymbolic, isSymbolic, termsOf, factorsOf, membersOf, toSubstitution,
} from './symbolic';
export type {
	Kind, CompareOp, BinaryOp, UnaryOp, Callable, Substitution, Substitutions, Bindings, StringifyOptions,
} from './symbolic';
export { CachedRecursiveVisitor } from './visitor';
export { accumulate, combineTerms, combineFactors } from './collect';
export { EvaluateVisitor, evaluate, evaluateAt, evaluateWithFaults } from './evaluate';
export type { EvaluateFault } from './evaluate';
export { Matrix, MatrixError } from './matrix';
export type { MatrixFault } from './matrix';
export { makeRat, compareReal, realPow } from './real';
export type { Real } from './real';
