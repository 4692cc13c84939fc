/**
 * Expressions: conditionals, closures and blocks by recursive descent,
 * everything else through the expression engine's infix passes.
 */

import type { CompilationContext } from '../core/context.ts'
import { expectedIn, unexpected } from '../core/expect.ts'
import type { Expression, FunctionCall } from '../core/nodes.ts'
import { type Outcome, success } from '../core/outcome.ts'
import { isSymbol, SymbolKind, type TokenStream } from '../core/tokens.ts'
import { parseCall } from '../expr/calls.ts'
import { toPostfix } from '../expr/postfix.ts'
import { scopeResolver } from '../expr/resolve.ts'
import { toExprTokens } from '../expr/tokenize.ts'
import { parseFunctionDef } from './function-def.ts'
import { scanFor } from './scan.ts'
import { parseBlock } from './statement.ts'
import { buildTree } from './tree.ts'

/** Fails unless the span has been read to its end. */
export function expectEnd<T>(
	context: CompilationContext,
	stream: TokenStream,
	result: T,
	expected: string
): Outcome<T> {
	return stream.isEmpty() ? success(result) : expectedIn(context, stream, expected)
}

function parseInfix(context: CompilationContext, stream: TokenStream): Outcome<Expression> {
	const start = stream.currentPos()
	const resolver = scopeResolver(context)
	const tokens = toExprTokens<FunctionCall>(context, stream, resolver, (callee, symbol, inner) =>
		parseCall(context, callee, symbol, inner, resolver, (span) => parseExpression(context, span))
	)
	if (!tokens.succeeded) return tokens

	const postfix = toPostfix(tokens.value)
	if (!postfix.succeeded) return postfix
	return buildTree(postfix.value, start)
}

/**
 * `if <cond> { ... } else { ... }`, with `else if` chains.
 * Reads only the conditional itself; the caller checks what follows.
 */
function parseConditional(context: CompilationContext, stream: TokenStream): Outcome<Expression> {
	const keyword = stream.next()
	if (!keyword) return expectedIn(context, stream, '`if`')

	const brace = scanFor(stream, SymbolKind.LeftCurly)
	const condSpan = stream.slice(stream.position(), brace.index)
	if (!brace.matched) {
		stream.seek(brace.index)
		return expectedIn(context, stream, '`{`')
	}
	if (condSpan.isEmpty()) return expectedIn(context, condSpan, 'condition')

	const cond = parseExpression(context, condSpan)
	if (!cond.succeeded) return cond

	stream.seek(brace.index)
	const thenStart = stream.currentPos()
	const then = parseBlock(context, stream)
	if (!then.succeeded) return then

	if (!isSymbol(stream.peek()?.item, SymbolKind.Else)) {
		return expectedIn(context, stream, '`else`')
	}
	stream.next()

	const next = stream.peek()
	let otherwise: Expression
	if (isSymbol(next?.item, SymbolKind.If)) {
		const nested = parseConditional(context, stream)
		if (!nested.succeeded) return nested
		otherwise = nested.value
	} else if (next && isSymbol(next.item, SymbolKind.LeftCurly)) {
		const block = parseBlock(context, stream)
		if (!block.succeeded) return block
		otherwise = { block: block.value, kind: 'Block', pos: next.pos }
	} else {
		return unexpected(context, next ?? stream.terminator(), stream.endPos(), '`{` or `if`')
	}

	return success({
		cond: cond.value,
		else: otherwise,
		kind: 'Conditional',
		pos: keyword.pos,
		then: { block: then.value, kind: 'Block', pos: thenStart },
	})
}

/** Parse a whole span as one expression. */
export function parseExpression(
	context: CompilationContext,
	stream: TokenStream
): Outcome<Expression> {
	const first = stream.peek()
	if (!first) return expectedIn(context, stream, 'expression')

	if (isSymbol(first.item, SymbolKind.If)) {
		const conditional = parseConditional(context, stream)
		if (!conditional.succeeded) return conditional
		return expectEnd(context, stream, conditional.value, 'end of expression')
	}

	if (isSymbol(first.item, SymbolKind.Backslash)) {
		stream.next()
		const def = parseFunctionDef(context, stream)
		if (!def.succeeded) return def
		return success({ def: def.value, kind: 'Closure', pos: first.pos })
	}

	if (isSymbol(first.item, SymbolKind.LeftCurly)) {
		const block = parseBlock(context, stream)
		if (!block.succeeded) return block
		return expectEnd<Expression>(
			context,
			stream,
			{ block: block.value, kind: 'Block', pos: first.pos },
			'end of expression'
		)
	}

	return parseInfix(context, stream)
}
