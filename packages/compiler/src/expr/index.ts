export { type ArgumentParser, parseCall, splitArguments } from './calls.ts'
export {
	type CompiledCall,
	CompiledExpression,
	type CompiledToken,
	compileExpression,
	compileExpressionSource,
	type ExpressionSourceOptions,
	type ExpressionSourceResult,
} from './compiled.ts'
export { type CallInvoker, evaluatePostfix } from './evaluate.ts'
export {
	APPROX_EPSILON,
	Associativity,
	applyBinary,
	applyUnary,
	arity,
	associativity,
	category,
	FALSE,
	fromBool,
	isTruthy,
	type OperatorCategory,
	precedence,
	signedMod,
	TRUE,
} from './operators.ts'
export { toPostfix } from './postfix.ts'
export { type NameResolver, scopeResolver } from './resolve.ts'
export {
	Bindings,
	bindIntrinsics,
	type CallValue,
	invoke,
	type RuntimeFunction,
	type RuntimeScope,
} from './runtime.ts'
export { type CallBuilder, toExprTokens } from './tokenize.ts'
export type { ExprToken, ExprTokenKind, PostfixToken } from './tokens.ts'
