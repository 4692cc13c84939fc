/**
 * Transient token form used while one expression is compiled.
 * Generic over the call payload so the parser and the compiled expressions
 * can share the infix and postfix passes.
 */

import type { Identifier } from '../core/identifiers.ts'
import type { SourcePos } from '../core/position.ts'
import type { Operator } from '../core/tokens.ts'
import type { SymbolEntry } from '../scope/table.ts'

export type ExprToken<C> =
	| { readonly kind: 'Op'; readonly op: Operator; readonly pos: SourcePos }
	| { readonly kind: 'Value'; readonly value: number | boolean; readonly pos: SourcePos }
	| {
			readonly kind: 'Var'
			readonly ident: Identifier
			readonly name: string
			readonly symbol: SymbolEntry
			readonly pos: SourcePos
	  }
	| { readonly kind: 'LParen'; readonly pos: SourcePos }
	| { readonly kind: 'RParen'; readonly pos: SourcePos }
	| { readonly kind: 'Fn'; readonly call: C; readonly pos: SourcePos }

export type ExprTokenKind = ExprToken<unknown>['kind']

/** Tokens that may appear in postfix output. */
export type PostfixToken<C> = Exclude<ExprToken<C>, { kind: 'LParen' } | { kind: 'RParen' }>
