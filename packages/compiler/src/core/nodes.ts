/**
 * Abstract syntax tree.
 * Closed tagged unions; every node carries the position it starts at.
 */

import type { SymbolEntry } from '../scope/table.ts'
import type { BlockKey } from '../scope/types.ts'
import type { Identifier } from './identifiers.ts'
import type { Node, SourcePos } from './position.ts'
import type { Operator } from './tokens.ts'

export type Expression =
	| { readonly kind: 'Constant'; readonly value: number; readonly pos: SourcePos }
	| { readonly kind: 'Boolean'; readonly value: boolean; readonly pos: SourcePos }
	| {
			readonly kind: 'Infix'
			readonly op: Node<Operator>
			readonly left: Expression
			readonly right: Expression
			readonly pos: SourcePos
	  }
	| {
			readonly kind: 'Prefix'
			readonly op: Node<Operator>
			readonly operand: Expression
			readonly pos: SourcePos
	  }
	| {
			readonly kind: 'Variable'
			readonly ident: Identifier
			/** The declaration the name resolved to where it was written */
			readonly symbol: SymbolEntry
			readonly pos: SourcePos
	  }
	| { readonly kind: 'Block'; readonly block: Block; readonly pos: SourcePos }
	| { readonly kind: 'FunctionCall'; readonly call: FunctionCall; readonly pos: SourcePos }
	| {
			readonly kind: 'Conditional'
			readonly cond: Expression
			readonly then: Expression
			readonly else: Expression
			readonly pos: SourcePos
	  }
	| { readonly kind: 'Closure'; readonly def: FunctionDef; readonly pos: SourcePos }

export type ExpressionKind = Expression['kind']

export const CallStyle = {
	Named: 'Named',
	Ordered: 'Ordered',
} as const

export type CallStyle = (typeof CallStyle)[keyof typeof CallStyle]

/**
 * One argument of a call. Generic over the expression representation so the
 * expression engine can reuse the shape for its compiled calls.
 * `Ident` and `OpAssign` read a variable; `symbol` is the one they read.
 */
export type Argument<E = Expression> =
	| { readonly kind: 'Ident'; readonly ident: Node<Identifier>; readonly symbol: SymbolEntry }
	| { readonly kind: 'Assign'; readonly ident: Node<Identifier>; readonly expr: E }
	| {
			readonly kind: 'OpAssign'
			readonly ident: Node<Identifier>
			readonly symbol: SymbolEntry
			readonly op: Node<Operator>
			readonly expr: E
	  }
	| { readonly kind: 'Expr'; readonly expr: E }

export interface Call<E> {
	readonly callee: Node<Identifier>
	/** The function declaration the callee resolved to at the call site */
	readonly symbol: SymbolEntry
	readonly args: readonly Argument<E>[]
	readonly style: CallStyle
}

export type FunctionCall = Call<Expression>

export interface Parameter {
	readonly ident: Node<Identifier>
	readonly default?: number
}

export interface FunctionDef {
	readonly ident: Node<Identifier>
	/** Offset of the `[` that opens the definition; keys the parameter block */
	readonly key: BlockKey
	readonly args: readonly Parameter[]
	readonly body: Statement
	readonly pos: SourcePos
}

/**
 * `<op> <body> (? <guard>)? ;` inside a block.
 * The guard decides whether the entry contributes.
 */
export interface BlockEntry {
	readonly op: Node<Operator>
	readonly body: Statement
	readonly guard?: Expression
}

export interface Block {
	/** Offset of the opening `{` */
	readonly key: BlockKey
	readonly entries: readonly BlockEntry[]
}

export type Statement =
	| { readonly kind: 'Block'; readonly block: Block; readonly pos: SourcePos }
	| { readonly kind: 'Expr'; readonly expr: Expression; readonly pos: SourcePos }

export interface Assignment {
	readonly ident: Node<Identifier>
	/** Declared after `expr` is parsed, so `expr` cannot see it */
	readonly symbol: SymbolEntry
	readonly expr: Expression
}

export type Item =
	| { readonly kind: 'Assignment'; readonly assignment: Node<Assignment> }
	| { readonly kind: 'FunctionDef'; readonly def: Node<FunctionDef> }

export interface Program {
	readonly items: readonly Item[]
}

/** Argument identifier, present for every variant except Expr. */
export function argumentIdent<E>(arg: Argument<E>): Node<Identifier> | undefined {
	return arg.kind === 'Expr' ? undefined : arg.ident
}
