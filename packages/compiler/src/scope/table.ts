/**
 * Nested lexical scopes.
 *
 * A flat table maps each block key to that block's symbols; an explicit
 * stack lists the blocks that are currently open. Lookups walk the stack
 * innermost-first, so a declaration in an inner block shadows outer ones
 * without touching them.
 */

import { InternalCompilerError } from '../core/errors.ts'
import type { Identifier } from '../core/identifiers.ts'
import type { Node, SourcePos } from '../core/position.ts'
import { type BlockKey, ROOT_BLOCK, type Type } from './types.ts'

export interface SymbolEntry {
	/** Blocks that were open when the symbol was declared, outermost first */
	readonly scope: readonly BlockKey[]
	readonly ident: Identifier
	readonly pos: SourcePos
	/** Unset until the parser or the checker resolves it */
	type: Type | undefined
}

export interface SymbolLookup {
	readonly symbol: SymbolEntry
	/** Levels crossed to find the symbol; 0 means the innermost open block */
	readonly depth: number
}

export class TypeTable {
	private readonly symbols: Map<BlockKey, Map<Identifier, SymbolEntry>> = new Map()
	/** Every entry ever declared, replaced ones included, in declaration order */
	private readonly declared: SymbolEntry[] = []
	private readonly scope: BlockKey[] = [ROOT_BLOCK]
	/** How many keys each enter call pushed, and whether it opened a frame */
	private readonly scopeLengths: { count: number; frame: boolean }[] = [
		{ count: 1, frame: false },
	]
	/** Stack index where each open lexical frame starts */
	private readonly frames: number[] = [0]

	constructor() {
		this.symbols.set(ROOT_BLOCK, new Map())
	}

	/** Open a single block. */
	enterBlock(key: BlockKey): void {
		this.scope.push(key)
		this.scopeLengths.push({ count: 1, frame: false })
		this.ensureBlock(key)
	}

	/**
	 * Open a whole chain of blocks at once, e.g. the lexical context a
	 * function was declared in. The chain starts a new lexical frame: lookups
	 * stop at its outermost key instead of falling through to the blocks that
	 * were open before. The matching leaveBlock pops all of them.
	 */
	enterScope(chain: readonly BlockKey[]): void {
		this.frames.push(this.scope.length)
		for (const key of chain) {
			this.scope.push(key)
			this.ensureBlock(key)
		}
		this.scopeLengths.push({ count: chain.length, frame: true })
	}

	/** Close whatever the most recent enterBlock/enterScope opened. */
	leaveBlock(): void {
		const entry = this.scopeLengths.length > 1 ? this.scopeLengths.pop() : undefined
		if (entry === undefined) {
			throw new InternalCompilerError('tried to leave the outermost scope')
		}
		if (entry.frame) this.frames.pop()
		this.scope.length -= entry.count
	}

	/** Whether a block is already open anywhere on the stack, i.e. we are inside it. */
	hasScopeCycle(key: BlockKey): boolean {
		return this.scope.includes(key)
	}

	/** The lexical chain visible from here, outermost first. */
	getScope(): readonly BlockKey[] {
		return this.scope.slice(this.frameStart())
	}

	/** Number of enter calls still open, not counting the root. */
	depth(): number {
		return this.scopeLengths.length - 1
	}

	/**
	 * Declare a symbol in the innermost open block.
	 * A redeclaration takes over the name from here on; the entry it replaces,
	 * and code already bound to it, keep their own type.
	 */
	setType(ident: Node<Identifier>, type: Type | undefined): SymbolEntry {
		const block = this.ensureBlock(this.innermost())
		const symbol: SymbolEntry = {
			ident: ident.item,
			pos: ident.pos,
			scope: this.getScope(),
			type,
		}
		block.set(ident.item, symbol)
		this.declared.push(symbol)
		return symbol
	}

	/** Overwrite the type of a symbol wherever it was declared. */
	resolve(symbol: SymbolEntry, type: Type): void {
		symbol.type = type
	}

	getSymbol(ident: Identifier): SymbolLookup | undefined {
		return this.getSymbolWithin(this.getScope(), ident)
	}

	/** Look a symbol up along an explicit scope chain instead of the open one. */
	getSymbolWithin(scope: readonly BlockKey[], ident: Identifier): SymbolLookup | undefined {
		for (let depth = 0; depth < scope.length; depth++) {
			const key = scope[scope.length - 1 - depth]
			if (key === undefined) continue
			const symbol = this.symbols.get(key)?.get(ident)
			if (symbol) return { depth, symbol }
		}
		return undefined
	}

	/** Symbols declared directly in one block. */
	symbolsIn(key: BlockKey): SymbolEntry[] {
		return [...(this.symbols.get(key)?.values() ?? [])]
	}

	*[Symbol.iterator](): Generator<SymbolEntry> {
		yield* this.declared
	}

	private frameStart(): number {
		return this.frames[this.frames.length - 1] ?? 0
	}

	private innermost(): BlockKey {
		return this.scope[this.scope.length - 1] ?? ROOT_BLOCK
	}

	private ensureBlock(key: BlockKey): Map<Identifier, SymbolEntry> {
		let block = this.symbols.get(key)
		if (!block) {
			block = new Map()
			this.symbols.set(key, block)
		}
		return block
	}
}
