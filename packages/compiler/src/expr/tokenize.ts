/**
 * First pass of the expression engine: lexer tokens to expression tokens.
 * Identifiers become calls or variables here, so every name an expression
 * uses is checked against the scope while it is compiled.
 */

import type { CompilationContext } from '../core/context.ts'
import type { Identifier } from '../core/identifiers.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import { type Node, node } from '../core/position.ts'
import {
	isSymbol,
	Operator,
	SymbolKind,
	TokenKind,
	type TokenStream,
	tokenText,
} from '../core/tokens.ts'
import type { SymbolEntry } from '../scope/table.ts'
import type { NameResolver } from './resolve.ts'
import type { ExprToken } from './tokens.ts'

/**
 * Builds the payload of a call once the callee has resolved to `symbol`.
 * `inner` spans the tokens between the parens.
 */
export type CallBuilder<C> = (
	callee: Node<Identifier>,
	symbol: SymbolEntry,
	inner: TokenStream
) => Outcome<C>

const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
	['false', false],
	['true', true],
])

/**
 * Index of the `)` matching the `(` at the cursor, or undefined when the
 * span ends first.
 */
function findClosingParen(stream: TokenStream): number | undefined {
	const scan = stream.clone()
	let depth = 0
	for (let token = scan.next(); token !== undefined; token = scan.next()) {
		if (isSymbol(token.item, SymbolKind.LeftRound)) depth++
		else if (isSymbol(token.item, SymbolKind.RightRound)) depth--
		if (depth === 0) return scan.position() - 1
	}
	return undefined
}

/** `-` is negation at the start, after another operator, or after `(`. */
function markNegations<C>(tokens: ExprToken<C>[]): ExprToken<C>[] {
	return tokens.map((token, index) => {
		if (token.kind !== 'Op' || token.op !== Operator.Sub) return token
		const previous = tokens[index - 1]
		if (previous === undefined || previous.kind === 'Op' || previous.kind === 'LParen') {
			return { ...token, op: Operator.Neg }
		}
		return token
	})
}

export function toExprTokens<C>(
	context: CompilationContext,
	stream: TokenStream,
	resolver: NameResolver,
	buildCall: CallBuilder<C>
): Outcome<ExprToken<C>[]> {
	const tokens: ExprToken<C>[] = []

	for (let current = stream.peek(); current !== undefined; current = stream.peek()) {
		const { item: token, pos } = current

		switch (token.kind) {
			case TokenKind.Constant:
				tokens.push({ kind: 'Value', pos, value: token.value })
				stream.next()
				break

			case TokenKind.Operator:
				tokens.push({ kind: 'Op', op: token.op, pos })
				stream.next()
				break

			case TokenKind.Symbol:
				if (token.symbol === SymbolKind.LeftRound) {
					tokens.push({ kind: 'LParen', pos })
				} else if (token.symbol === SymbolKind.RightRound) {
					tokens.push({ kind: 'RParen', pos })
				} else {
					return failure('SWPARSE008', pos, {
						found: tokenText(token, context.identifiers),
					})
				}
				stream.next()
				break

			case TokenKind.Identifier: {
				const ident = node(token.ident, pos)
				const name = context.name(token.ident)
				const literal = BOOLEAN_LITERALS.get(name)
				if (literal !== undefined) {
					tokens.push({ kind: 'Value', pos, value: literal })
					stream.next()
					break
				}

				if (isSymbol(stream.peek(1)?.item, SymbolKind.LeftRound)) {
					stream.next()
					const open = stream.position()
					const close = findClosingParen(stream)
					if (close === undefined) return failure('SWPARSE006', stream.endPos())

					const callee = resolver.resolveCallee(ident)
					if (!callee.succeeded) return callee
					const call = buildCall(ident, callee.value.symbol, stream.slice(open + 1, close))
					if (!call.succeeded) return call
					tokens.push({ call: call.value, kind: 'Fn', pos })
					stream.seek(close + 1)
					break
				}

				const variable = resolver.resolveVariable(ident)
				if (!variable.succeeded) return variable
				tokens.push({
					ident: token.ident,
					kind: 'Var',
					name,
					pos,
					symbol: variable.value.symbol,
				})
				stream.next()
				break
			}
		}
	}

	return success(markNegations(tokens))
}
