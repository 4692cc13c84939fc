/**
 * Entry point lookup: the root-level function a backend will call.
 */

import type { CompilationContext } from '../core/context.ts'
import { type DefinedFunction, paramsOf } from '../scope/functions.ts'
import { ROOT_BLOCK, type TypeKind, typeName } from '../scope/types.ts'
import { functionFor } from './funcs.ts'

export interface EntryPointSignature {
	readonly name: string
	readonly params: readonly TypeKind[]
	readonly returns: TypeKind
}

/** A function of time producing one sample. */
export const DEFAULT_ENTRY_POINT: EntryPointSignature = {
	name: 'main',
	params: ['Number'],
	returns: 'Number',
}

export interface EntryPoint {
	readonly signature: EntryPointSignature
	readonly function: DefinedFunction
}

export function formatSignature(params: readonly string[], returns: string): string {
	return `fn(${params.join(', ')}) -> ${returns}`
}

/**
 * Find the entry point among root-level definitions and compare its
 * signature. Runs after checking, so return types are already resolved.
 */
export function resolveEntryPoint(
	context: CompilationContext,
	signature: EntryPointSignature = DEFAULT_ENTRY_POINT
): EntryPoint | null {
	const { name } = signature
	const ident = context.identifiers.lookup(name)
	const symbol = context.types.symbolsIn(ROOT_BLOCK).find((s) => s.ident === ident)
	if (!symbol) {
		context.emit('SWENTRY001', undefined, { name })
		return null
	}

	const expected = formatSignature(signature.params, signature.returns)
	const info = functionFor(symbol, context)
	if (info?.kind !== 'defined') {
		const found = symbol.type ? typeName(symbol.type) : 'unknown'
		context.emit('SWENTRY002', symbol.pos, { expected, found, name })
		return null
	}
	// Already reported by the checker
	if (info.resolution.state !== 'resolved') return null

	const params = paramsOf(info).map(() => 'Number')
	const found = formatSignature(params, typeName(info.resolution.returns))
	if (found !== expected) {
		context.emit('SWENTRY002', symbol.pos, { expected, found, name })
		return null
	}
	return { function: info, signature }
}
