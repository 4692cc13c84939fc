/**
 * Name resolution for identifiers met inside expressions.
 *
 * Resolution is single-pass: a callee must already be declared as a function
 * where the call appears. Kept behind an interface so a pass that collects
 * every signature first can be swapped in without touching the parsers.
 */

import type { CompilationContext } from '../core/context.ts'
import type { Identifier } from '../core/identifiers.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import type { Node } from '../core/position.ts'
import type { SymbolLookup } from '../scope/table.ts'

export interface NameResolver {
	resolveCallee(ident: Node<Identifier>): Outcome<SymbolLookup>
	resolveVariable(ident: Node<Identifier>): Outcome<SymbolLookup>
}

/** Resolves against the scope currently open in the context's type table. */
export function scopeResolver(context: CompilationContext): NameResolver {
	return {
		resolveCallee(ident) {
			const found = context.types.getSymbol(ident.item)
			if (!found || found.symbol.type?.kind !== 'Function') {
				return failure('SWPARSE004', ident.pos, { name: context.name(ident.item) })
			}
			return success(found)
		},
		resolveVariable(ident) {
			const found = context.types.getSymbol(ident.item)
			if (!found) {
				return failure('SWPARSE005', ident.pos, { name: context.name(ident.item) })
			}
			return success(found)
		},
	}
}
