/**
 * Call argument lists: splitting at top-level commas and deciding between
 * named and ordered style. Argument expressions are handed to a caller
 * supplied parser, so the AST parser and the compiled expression engine
 * share this code.
 */

import type { CompilationContext } from '../core/context.ts'
import { expectedIn } from '../core/expect.ts'
import type { Identifier } from '../core/identifiers.ts'
import { type Argument, type Call, CallStyle } from '../core/nodes.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import type { Node } from '../core/position.ts'
import {
	depthDelta,
	identifierToken,
	isSymbol,
	Operator,
	operatorToken,
	SymbolKind,
	type TokenStream,
} from '../core/tokens.ts'
import type { SymbolEntry } from '../scope/table.ts'
import type { NameResolver } from './resolve.ts'

export type ArgumentParser<E> = (span: TokenStream) => Outcome<E>

/** Split the inside of a call's parens at commas outside nested brackets. */
export function splitArguments(
	context: CompilationContext,
	stream: TokenStream
): Outcome<TokenStream[]> {
	const spans: TokenStream[] = []
	if (stream.isEmpty()) return success(spans)

	const scan = stream.clone()
	let start = scan.position()
	let depth = 0
	for (let token = scan.peek(); token !== undefined; token = scan.peek()) {
		if (depth === 0 && isSymbol(token.item, SymbolKind.Comma)) {
			const span = stream.slice(start, scan.position())
			if (span.isEmpty()) return expectedIn(context, span, 'argument')
			spans.push(span)
			scan.next()
			start = scan.position()
			continue
		}
		depth += depthDelta(token.item)
		scan.next()
	}

	const last = stream.slice(start, scan.position())
	if (last.isEmpty()) return expectedIn(context, last, 'argument')
	spans.push(last)
	return success(spans)
}

type Candidate =
	| { readonly kind: 'Ident'; readonly ident: Node<Identifier>; readonly span: TokenStream }
	| { readonly kind: 'Assign'; readonly ident: Node<Identifier>; readonly span: TokenStream }
	| {
			readonly kind: 'OpAssign'
			readonly ident: Node<Identifier>
			readonly op: Node<Operator>
			readonly span: TokenStream
	  }
	| { readonly kind: 'Expr'; readonly span: TokenStream }

function classify(span: TokenStream): Candidate {
	const ident = identifierToken(span.peek())
	if (!ident) return { kind: 'Expr', span }
	const second = span.peek(1)

	if (second === undefined) return { ident, kind: 'Ident', span }
	if (isSymbol(second.item, SymbolKind.Equals)) {
		return { ident, kind: 'Assign', span: span.slice(span.position() + 2, Infinity) }
	}
	const op = operatorToken(second)
	if (op && op.item !== Operator.Not && isSymbol(span.peek(2)?.item, SymbolKind.Equals)) {
		return { ident, kind: 'OpAssign', op, span: span.slice(span.position() + 3, Infinity) }
	}
	return { kind: 'Expr', span }
}

/**
 * Build a call from the token span between its parens.
 * A call is named as soon as one argument is `name = value` or
 * `name op= value`; lone identifiers then pass the variable of that name.
 */
export function parseCall<E>(
	context: CompilationContext,
	callee: Node<Identifier>,
	symbol: SymbolEntry,
	inner: TokenStream,
	resolver: NameResolver,
	parseArgument: ArgumentParser<E>
): Outcome<Call<E>> {
	const spans = splitArguments(context, inner)
	if (!spans.succeeded) return spans

	const candidates = spans.value.map(classify)
	const named = candidates.some((c) => c.kind === 'Assign' || c.kind === 'OpAssign')
	const args: Argument<E>[] = []

	for (const candidate of candidates) {
		if (!named || candidate.kind === 'Expr') {
			if (named) {
				return failure('SWPARSE009', candidate.span.currentPos(), {
					name: context.name(callee.item),
				})
			}
			const expr = parseArgument(candidate.span)
			if (!expr.succeeded) return expr
			args.push({ expr: expr.value, kind: 'Expr' })
			continue
		}

		if (candidate.kind === 'Ident') {
			const resolved = resolver.resolveVariable(candidate.ident)
			if (!resolved.succeeded) return resolved
			args.push({
				ident: candidate.ident,
				kind: 'Ident',
				symbol: resolved.value.symbol,
			})
			continue
		}

		if (candidate.span.isEmpty()) return expectedIn(context, candidate.span, 'expression')
		const expr = parseArgument(candidate.span)
		if (!expr.succeeded) return expr

		if (candidate.kind === 'Assign') {
			args.push({ expr: expr.value, ident: candidate.ident, kind: 'Assign' })
		} else {
			const resolved = resolver.resolveVariable(candidate.ident)
			if (!resolved.succeeded) return resolved
			args.push({
				expr: expr.value,
				ident: candidate.ident,
				kind: 'OpAssign',
				op: candidate.op,
				symbol: resolved.value.symbol,
			})
		}
	}

	return success({
		args,
		callee,
		style: named ? CallStyle.Named : CallStyle.Ordered,
		symbol,
	})
}
