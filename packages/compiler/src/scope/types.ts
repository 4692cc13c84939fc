/**
 * Types assigned to symbols by the parser and the checker.
 */

import type { Identifier } from '../core/identifiers.ts'

/**
 * Source offset of the bracket that opens a lexical block.
 * `{` for blocks, `[` for a function's parameter block.
 */
export type BlockKey = number

/** The outermost block; it has no bracket in the source. */
export const ROOT_BLOCK: BlockKey = -1

export type Type =
	| { readonly kind: 'Number' }
	| { readonly kind: 'Boolean' }
	/** A function, identified by its name and the block its parameters live in */
	| { readonly kind: 'Function'; readonly ident: Identifier; readonly block: BlockKey }
	/**
	 * Placeholder for a function whose return type is still being computed
	 * because its body calls it again. Never a final type.
	 */
	| { readonly kind: 'Indeterminate' }

export type TypeKind = Type['kind']

export const NumberType: Type = { kind: 'Number' }
export const BooleanType: Type = { kind: 'Boolean' }
export const IndeterminateType: Type = { kind: 'Indeterminate' }

export function functionType(ident: Identifier, block: BlockKey): Type {
	return { block, ident, kind: 'Function' }
}

export function typeName(type: Type): string {
	return type.kind
}

/**
 * Combine two types that must agree. Indeterminate defers to the other side.
 * Returns null when they conflict.
 */
export function unify(a: Type, b: Type): Type | null {
	if (a.kind === 'Indeterminate') return b
	if (b.kind === 'Indeterminate') return a
	if (a.kind === 'Function' && b.kind === 'Function') {
		return a.block === b.block ? a : null
	}
	return a.kind === b.kind ? a : null
}
