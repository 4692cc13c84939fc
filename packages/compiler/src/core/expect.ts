import type { CompilationContext } from './context.ts'
import { failure, type Outcome } from './outcome.ts'
import type { Node, SourcePos } from './position.ts'
import { type Token, type TokenStream, tokenText } from './tokens.ts'

/**
 * "expected X, got Y" at the offending token, or "expected X, got EOF" at the
 * end position when input ran out.
 */
export function unexpected(
	context: CompilationContext,
	found: Node<Token> | undefined,
	endPos: SourcePos,
	expected: string
): Outcome<never> {
	if (!found) return failure('SWPARSE002', endPos, { expected })
	return failure('SWPARSE001', found.pos, {
		expected,
		found: tokenText(found.item, context.identifiers),
	})
}

/** Failure for the next token of a span, or for whatever ends the span. */
export function expectedIn(
	context: CompilationContext,
	stream: TokenStream,
	expected: string
): Outcome<never> {
	return unexpected(context, stream.peek() ?? stream.terminator(), stream.endPos(), expected)
}
