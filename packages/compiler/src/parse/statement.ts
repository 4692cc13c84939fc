/**
 * Statements and `{ ... }` blocks.
 *
 * A block is a list of entries `<op> <body> (? <guard>)? ;`. Each entry is
 * cut out at its top-level `;` and parsed on its own span.
 */

import type { CompilationContext } from '../core/context.ts'
import { expectedIn } from '../core/expect.ts'
import type { Block, BlockEntry, Expression, Statement } from '../core/nodes.ts'
import { type Outcome, success } from '../core/outcome.ts'
import { isSymbol, operatorToken, SymbolKind, type TokenStream } from '../core/tokens.ts'
import type { BlockKey } from '../scope/types.ts'
import { expectEnd, parseExpression } from './expression.ts'
import { scanFor } from './scan.ts'

function parseEntry(
	context: CompilationContext,
	stream: TokenStream
): Outcome<BlockEntry> | undefined {
	const op = operatorToken(stream.peek())
	if (!op) return undefined
	stream.next()

	const end = scanFor(stream, SymbolKind.Semicolon)
	if (!end.matched) {
		stream.seek(end.index)
		return expectedIn(context, stream, '`;`')
	}

	const entry = stream.slice(stream.position(), end.index)
	const question = scanFor(entry, SymbolKind.QuestionMark)
	const bodySpan = entry.slice(entry.position(), question.index)
	if (bodySpan.isEmpty()) return expectedIn(context, bodySpan, 'expression')

	const body = parseStatement(context, bodySpan)
	if (!body.succeeded) return body

	let guard: Expression | undefined
	if (question.matched) {
		const guardSpan = entry.slice(question.index + 1, end.index)
		if (guardSpan.isEmpty()) return expectedIn(context, guardSpan, 'guard expression')
		const parsed = parseExpression(context, guardSpan)
		if (!parsed.succeeded) return parsed
		guard = parsed.value
	}

	stream.seek(end.index + 1)
	return success({
		body: body.value,
		op,
		...(guard ? { guard } : {}),
	})
}

function parseEntries(
	context: CompilationContext,
	stream: TokenStream,
	key: BlockKey
): Outcome<Block> {
	const entries: BlockEntry[] = []

	for (;;) {
		const token = stream.peek()
		if (!token) return expectedIn(context, stream, '`}`')

		if (isSymbol(token.item, SymbolKind.RightCurly)) {
			stream.next()
			return success({ entries, key })
		}
		if (isSymbol(token.item, SymbolKind.Semicolon)) {
			stream.next()
			continue
		}

		const entry = parseEntry(context, stream)
		if (!entry) return expectedIn(context, stream, 'operator or `}`')
		if (!entry.succeeded) return entry
		entries.push(entry.value)
	}
}

/** Parse `{ ... }` at the cursor inside its own scope block. */
export function parseBlock(context: CompilationContext, stream: TokenStream): Outcome<Block> {
	const open = stream.peek()
	if (!open || !isSymbol(open.item, SymbolKind.LeftCurly)) {
		return expectedIn(context, stream, '`{`')
	}
	stream.next()

	const key = open.pos.index
	context.types.enterBlock(key)
	try {
		return parseEntries(context, stream, key)
	} finally {
		context.types.leaveBlock()
	}
}

/** A block or a single expression, filling the whole span. */
export function parseStatement(
	context: CompilationContext,
	stream: TokenStream
): Outcome<Statement> {
	const first = stream.peek()
	if (first && isSymbol(first.item, SymbolKind.LeftCurly)) {
		const block = parseBlock(context, stream)
		if (!block.succeeded) return block
		return expectEnd<Statement>(
			context,
			stream,
			{ block: block.value, kind: 'Block', pos: first.pos },
			'end of statement'
		)
	}

	const expr = parseExpression(context, stream)
	if (!expr.succeeded) return expr
	return success({ expr: expr.value, kind: 'Expr', pos: expr.value.pos })
}
