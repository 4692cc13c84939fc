/**
 * Built-in numeric functions available to every compilation.
 * They have no source, so each one gets a synthetic block key below the root.
 */

import type { CompilationContext } from '../core/context.ts'
import { node, startPos } from '../core/position.ts'
import { type BlockKey, functionType, NumberType, ROOT_BLOCK } from './types.ts'

export interface IntrinsicSpec {
	readonly name: string
	readonly params: readonly string[]
	/** Arguments arrive in parameter order */
	readonly apply: (args: readonly number[]) => number
}

export const STANDARD_INTRINSICS: readonly IntrinsicSpec[] = [
	{ apply: ([x = 0]) => Math.sin(x), name: 'sin', params: ['x'] },
	{ apply: ([x = 0]) => Math.cos(x), name: 'cos', params: ['x'] },
	{ apply: ([x = 0]) => Math.tan(x), name: 'tan', params: ['x'] },
	{ apply: ([x = 0]) => Math.abs(x), name: 'abs', params: ['x'] },
	{ apply: ([x = 0]) => Math.sqrt(x), name: 'sqrt', params: ['x'] },
	{ apply: ([x = 0]) => Math.floor(x), name: 'floor', params: ['x'] },
	{ apply: ([x = 0]) => Math.ceil(x), name: 'ceil', params: ['x'] },
	{ apply: ([a = 0, b = 0]) => Math.min(a, b), name: 'min', params: ['a', 'b'] },
	{ apply: ([a = 0, b = 0]) => Math.max(a, b), name: 'max', params: ['a', 'b'] },
]

/** Block key of the i-th intrinsic. */
export function intrinsicKey(index: number): BlockKey {
	return ROOT_BLOCK - 1 - index
}

/**
 * Declare intrinsics in the root block. Must run before parsing so calls
 * to them resolve; a later source definition with the same name replaces them.
 */
export function declareIntrinsics(
	context: CompilationContext,
	intrinsics: readonly IntrinsicSpec[] = STANDARD_INTRINSICS
): void {
	intrinsics.forEach((spec, index) => {
		const ident = context.identifiers.intern(spec.name)
		const key = intrinsicKey(index)
		const symbol = context.types.setType(node(ident, startPos()), functionType(ident, key))
		context.functions.addIntrinsic({
			key,
			kind: 'intrinsic',
			params: spec.params.map((param) => context.identifiers.intern(param)),
			returns: NumberType,
			symbol,
		})
	})
}
