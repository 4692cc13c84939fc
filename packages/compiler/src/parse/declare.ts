import type { CompilationContext } from '../core/context.ts'
import type { Identifier } from '../core/identifiers.ts'
import type { Node } from '../core/position.ts'
import type { SymbolEntry } from '../scope/table.ts'
import type { Type } from '../scope/types.ts'

/** Declare a name in the innermost block, warning when it hides an outer one. */
export function declare(
	context: CompilationContext,
	ident: Node<Identifier>,
	type: Type | undefined
): SymbolEntry {
	const outer = context.types.getSymbol(ident.item)
	if (outer && outer.depth > 0) {
		context.emit('SWPARSE020', ident.pos, { name: context.name(ident.item) })
	}
	return context.types.setType(ident, type)
}
