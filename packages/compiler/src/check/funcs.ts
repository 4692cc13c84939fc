/**
 * Lazy, memoized return-type resolution for defined functions.
 *
 * A function is resolved the first time it is called or reached as an item.
 * Its body is checked inside the scope chain it was declared in plus its
 * parameter block. A call that arrives while that parameter block is already
 * open is recursion: it yields Indeterminate, which unifies with anything,
 * so the non-recursive branches decide the type.
 */

import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import type { DefinedFunction, FunctionInfo } from '../scope/functions.ts'
import type { SymbolEntry } from '../scope/table.ts'
import { functionType, IndeterminateType, type Type } from '../scope/types.ts'
import { checkStatement } from './expressions.ts'
import type { CheckerState } from './state.ts'

/** The function a symbol currently names, if any. */
export function functionFor(
	symbol: SymbolEntry,
	context: CompilationContext
): FunctionInfo | undefined {
	if (symbol.type?.kind === 'Function') return context.functions.get(symbol.type.block)
	// While its own body is checked a function's symbol is Indeterminate
	return context.functions.forSymbol(symbol)
}

export function resolveFunction(
	info: DefinedFunction,
	state: CheckerState,
	context: CompilationContext
): Type | null {
	switch (info.resolution.state) {
		case 'resolved':
			return info.resolution.returns
		case 'failed':
			return null
		case 'resolving':
			return IndeterminateType
		case 'unresolved':
			break
	}
	if (context.types.hasScopeCycle(info.key)) return IndeterminateType

	const { def, symbol } = info
	if (!def) throw new InternalCompilerError(`function at ${info.key} was never defined`)

	info.resolution = { state: 'resolving' }
	const declared = symbol.type ?? functionType(def.ident.item, def.key)
	context.types.resolve(symbol, IndeterminateType)
	context.types.enterScope([...symbol.scope, info.key])

	let returns: Type | null
	try {
		returns = checkStatement(def.body, state, context)
	} finally {
		context.types.leaveBlock()
		context.types.resolve(symbol, declared)
	}

	if (returns?.kind === 'Indeterminate') {
		context.emit('SWTYPE004', def.ident.pos, { name: context.name(def.ident.item) })
		returns = null
	}
	info.resolution = returns ? { returns, state: 'resolved' } : { state: 'failed' }
	return returns
}
