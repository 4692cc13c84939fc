/**
 * Top-level items.
 *
 * The token stream is cut into items first: a definition whose body is a
 * block ends at the closing `}`, everything else at the next top-level `;`.
 * Each item is parsed on its own span and a failure costs only that item,
 * so one run reports one error per broken item.
 */

import type { CompilationContext } from '../core/context.ts'
import { expectedIn } from '../core/expect.ts'
import type { Item, Program } from '../core/nodes.ts'
import { type Outcome, success } from '../core/outcome.ts'
import { node } from '../core/position.ts'
import {
	depthDelta,
	identifierToken,
	isSymbol,
	SymbolKind,
	type TokenStream,
} from '../core/tokens.ts'
import { functionType } from '../scope/types.ts'
import { declare } from './declare.ts'
import { expectEnd, parseExpression } from './expression.ts'
import { parseFunctionDef } from './function-def.ts'
import { matchingBracket, spanEnd } from './scan.ts'

export interface ParseResult {
	readonly succeeded: boolean
	readonly program: Program
}

/** Absolute index one past the item starting at the cursor. */
function itemEnd(stream: TokenStream): number {
	const end = spanEnd(stream)
	const scan = stream.clone()

	if (isSymbol(scan.peek()?.item, SymbolKind.LeftSquare)) {
		const params = matchingBracket(scan)
		if (params === undefined) return end
		scan.seek(params + 1)
		if (isSymbol(scan.peek()?.item, SymbolKind.LeftCurly)) {
			const body = matchingBracket(scan)
			return body === undefined ? end : body + 1
		}
	}

	let depth = 0
	for (let token = scan.next(); token !== undefined; token = scan.next()) {
		if (depth <= 0 && isSymbol(token.item, SymbolKind.Semicolon)) return scan.position() - 1
		depth += depthDelta(token.item)
	}
	return end
}

function parseItem(context: CompilationContext, stream: TokenStream): Outcome<Item> {
	const first = stream.peek()

	if (first && isSymbol(first.item, SymbolKind.LeftSquare)) {
		const def = parseFunctionDef(context, stream)
		if (!def.succeeded) return def
		return expectEnd<Item>(
			context,
			stream,
			{ def: node(def.value, def.value.pos), kind: 'FunctionDef' },
			'`;`'
		)
	}

	const ident = identifierToken(first)
	if (ident && isSymbol(stream.peek(1)?.item, SymbolKind.Equals)) {
		stream.next()
		stream.next()
		const expr = parseExpression(context, stream)
		if (!expr.succeeded) return expr

		const value = expr.value
		const symbol = declare(
			context,
			ident,
			value.kind === 'Closure' ? functionType(value.def.ident.item, value.def.key) : undefined
		)
		return success({
			assignment: node({ expr: value, ident, symbol }, ident.pos),
			kind: 'Assignment',
		})
	}

	return expectedIn(context, stream, 'function definition or assignment')
}

/**
 * Parse every item, reporting failures into the context.
 * Succeeds when no item failed.
 */
export function parse(context: CompilationContext): ParseResult {
	const stream = context.tokens.stream(context.endPos)
	const errorsBefore = context.getErrorCount()
	const items: Item[] = []

	while (!stream.isEmpty()) {
		if (isSymbol(stream.peek()?.item, SymbolKind.Semicolon)) {
			stream.next()
			continue
		}

		const end = itemEnd(stream)
		const result = parseItem(context, stream.slice(stream.position(), end))
		if (result.succeeded) items.push(result.value)
		else context.report(result.failure)
		stream.seek(end)
	}

	return {
		program: { items },
		succeeded: context.getErrorCount() === errorsBefore,
	}
}
