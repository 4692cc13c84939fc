export {
	type DefinedFunction,
	type FunctionInfo,
	type FunctionParam,
	FunctionStore,
	type IntrinsicFunction,
	paramsOf,
	type Resolution,
} from './functions.ts'
export {
	declareIntrinsics,
	type IntrinsicSpec,
	intrinsicKey,
	STANDARD_INTRINSICS,
} from './intrinsics.ts'
export { type SymbolEntry, type SymbolLookup, TypeTable } from './table.ts'
export {
	type BlockKey,
	BooleanType,
	functionType,
	IndeterminateType,
	NumberType,
	ROOT_BLOCK,
	type Type,
	type TypeKind,
	typeName,
	unify,
} from './types.ts'
