/**
 * Function registry shared by the parser (which declares functions) and the
 * checker (which resolves their return types).
 */

import type { Identifier } from '../core/identifiers.ts'
import type { FunctionDef } from '../core/nodes.ts'
import type { SymbolEntry } from './table.ts'
import type { BlockKey, Type } from './types.ts'

export type Resolution =
	| { readonly state: 'unresolved' }
	| { readonly state: 'resolving' }
	| { readonly state: 'resolved'; readonly returns: Type }
	| { readonly state: 'failed' }

/** A function written in the source. */
export interface DefinedFunction {
	readonly kind: 'defined'
	readonly key: BlockKey
	readonly symbol: SymbolEntry
	/** Null until the parser finishes the definition */
	def: FunctionDef | null
	resolution: Resolution
}

/** A built-in numeric function with no source. */
export interface IntrinsicFunction {
	readonly kind: 'intrinsic'
	readonly key: BlockKey
	readonly symbol: SymbolEntry
	readonly params: readonly Identifier[]
	readonly returns: Type
}

export type FunctionInfo = DefinedFunction | IntrinsicFunction

export interface FunctionParam {
	readonly ident: Identifier
	readonly hasDefault: boolean
}

export function paramsOf(info: FunctionInfo): FunctionParam[] {
	if (info.kind === 'intrinsic') {
		return info.params.map((ident) => ({ hasDefault: false, ident }))
	}
	return (info.def?.args ?? []).map((arg) => ({
		hasDefault: arg.default !== undefined,
		ident: arg.ident.item,
	}))
}

export class FunctionStore {
	private readonly byKey: Map<BlockKey, FunctionInfo> = new Map()
	private readonly bySymbol: Map<SymbolEntry, FunctionInfo> = new Map()

	/** Register a function whose body is about to be parsed. */
	declare(key: BlockKey, symbol: SymbolEntry): DefinedFunction {
		const info: DefinedFunction = {
			def: null,
			key,
			kind: 'defined',
			resolution: { state: 'unresolved' },
			symbol,
		}
		this.add(info)
		return info
	}

	/** Attach the finished definition. */
	define(def: FunctionDef): void {
		const info = this.byKey.get(def.key)
		if (info?.kind === 'defined') info.def = def
	}

	addIntrinsic(info: IntrinsicFunction): void {
		this.add(info)
	}

	get(key: BlockKey): FunctionInfo | undefined {
		return this.byKey.get(key)
	}

	/** The function most recently declared under this symbol. */
	forSymbol(symbol: SymbolEntry): FunctionInfo | undefined {
		return this.bySymbol.get(symbol)
	}

	count(): number {
		return this.byKey.size
	}

	*[Symbol.iterator](): Generator<FunctionInfo> {
		yield* this.byKey.values()
	}

	private add(info: FunctionInfo): void {
		this.byKey.set(info.key, info)
		this.bySymbol.set(info.symbol, info)
	}
}
