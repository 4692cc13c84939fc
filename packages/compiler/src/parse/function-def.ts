/**
 * `[name arg (= default)?, ...] body`
 *
 * The name is declared before the body is read so the body can call itself.
 * Parameters live in their own block, keyed by the offset of the `[`.
 */

import type { CompilationContext } from '../core/context.ts'
import { expectedIn } from '../core/expect.ts'
import type { Identifier } from '../core/identifiers.ts'
import type { FunctionDef, Parameter } from '../core/nodes.ts'
import { failure, type Outcome, success } from '../core/outcome.ts'
import {
	identifierToken,
	isSymbol,
	Operator,
	operatorToken,
	SymbolKind,
	TokenKind,
	type TokenStream,
} from '../core/tokens.ts'
import { functionType, NumberType } from '../scope/types.ts'
import { declare } from './declare.ts'
import { parseStatement } from './statement.ts'

/** `= -?NUMBER` after a parameter name; undefined when there is no default. */
function parseDefault(
	context: CompilationContext,
	stream: TokenStream
): Outcome<number | undefined> {
	if (!isSymbol(stream.peek()?.item, SymbolKind.Equals)) return success(undefined)
	stream.next()

	let sign = 1
	if (operatorToken(stream.peek())?.item === Operator.Sub) {
		sign = -1
		stream.next()
	}

	const constant = stream.peek()?.item
	if (constant?.kind !== TokenKind.Constant) return expectedIn(context, stream, 'default value')
	stream.next()
	return success(sign * constant.value)
}

function parseParameters(
	context: CompilationContext,
	stream: TokenStream
): Outcome<Parameter[]> {
	const params: Parameter[] = []
	const seen = new Set<Identifier>()

	if (isSymbol(stream.peek()?.item, SymbolKind.RightSquare)) {
		stream.next()
		return success(params)
	}

	for (;;) {
		const ident = identifierToken(stream.peek())
		if (!ident) return expectedIn(context, stream, 'argument name')
		stream.next()

		if (seen.has(ident.item)) {
			return failure('SWPARSE003', ident.pos, { name: context.name(ident.item) })
		}
		seen.add(ident.item)

		const value = parseDefault(context, stream)
		if (!value.succeeded) return value
		declare(context, ident, NumberType)
		params.push(value.value === undefined ? { ident } : { default: value.value, ident })

		const separator = stream.peek()?.item
		if (isSymbol(separator, SymbolKind.Comma)) {
			stream.next()
		} else if (isSymbol(separator, SymbolKind.RightSquare)) {
			stream.next()
			return success(params)
		} else {
			return expectedIn(context, stream, '`,` or `]`')
		}
	}
}

/** Parse a definition filling the rest of the span; registers it with the context. */
export function parseFunctionDef(
	context: CompilationContext,
	stream: TokenStream
): Outcome<FunctionDef> {
	const open = stream.peek()
	if (!open || !isSymbol(open.item, SymbolKind.LeftSquare)) {
		return expectedIn(context, stream, '`[`')
	}
	stream.next()

	const ident = identifierToken(stream.peek())
	if (!ident) return expectedIn(context, stream, 'function name')
	stream.next()

	const key = open.pos.index
	const symbol = declare(context, ident, functionType(ident.item, key))
	context.functions.declare(key, symbol)

	context.types.enterBlock(key)
	try {
		const args = parseParameters(context, stream)
		if (!args.succeeded) return args
		if (stream.isEmpty()) return expectedIn(context, stream, 'function body')

		const body = parseStatement(context, stream)
		if (!body.succeeded) return body

		const def: FunctionDef = { args: args.value, body: body.value, ident, key, pos: open.pos }
		context.functions.define(def)
		return success(def)
	} finally {
		context.types.leaveBlock()
	}
}
