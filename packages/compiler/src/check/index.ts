export { check } from './checker.ts'
export {
	DEFAULT_ENTRY_POINT,
	type EntryPoint,
	type EntryPointSignature,
	formatSignature,
	resolveEntryPoint,
} from './entry.ts'
export { type CheckerState, createState } from './state.ts'
export {
	binaryResultType,
	blockTypeFor,
	type CheckResult,
	unaryResultType,
} from './types.ts'
