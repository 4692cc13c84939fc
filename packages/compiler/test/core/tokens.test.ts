import assert from 'node:assert'
import { describe, it } from 'node:test'
import { CompilationContext } from '../../src/core/context.ts'
import { InternalCompilerError } from '../../src/core/errors.ts'
import {
	Bracket,
	bracketOf,
	depthDelta,
	identifierToken,
	isSymbol,
	OPERATOR_LEXEMES,
	Operator,
	operatorText,
	operatorToken,
	SYMBOL_LEXEMES,
	SymbolKind,
	type TokenStream,
	TokenKind,
	tokenId,
	tokenText,
} from '../../src/core/tokens.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'

function streamOf(source: string): { ctx: CompilationContext; stream: TokenStream } {
	const ctx = new CompilationContext(source)
	tokenize(ctx)
	return { ctx, stream: ctx.tokens.stream(ctx.endPos) }
}

describe('core/tokens', () => {
	describe('lexeme tables', () => {
		it('should map `-` to subtraction only', () => {
			assert.strictEqual(OPERATOR_LEXEMES.get('-'), Operator.Sub)
			assert.strictEqual([...OPERATOR_LEXEMES.values()].includes(Operator.Neg), false)
		})

		it('should render negation as a minus sign', () => {
			assert.strictEqual(operatorText(Operator.Neg), '-')
			assert.strictEqual(operatorText(Operator.Xor), '^^')
		})

		it('should treat keywords as symbols', () => {
			assert.strictEqual(SYMBOL_LEXEMES.get('if'), SymbolKind.If)
			assert.strictEqual(SYMBOL_LEXEMES.get('else'), SymbolKind.Else)
			assert.strictEqual(SYMBOL_LEXEMES.get('\\'), SymbolKind.Backslash)
		})
	})

	describe('brackets', () => {
		it('should classify brackets and their direction', () => {
			assert.deepStrictEqual(bracketOf(SymbolKind.LeftSquare), { bracket: Bracket.Square, opening: true })
			assert.deepStrictEqual(bracketOf(SymbolKind.RightCurly), { bracket: Bracket.Curly, opening: false })
			assert.strictEqual(bracketOf(SymbolKind.Comma), undefined)
		})

		it('should report depth changes', () => {
			assert.strictEqual(depthDelta({ kind: TokenKind.Symbol, symbol: SymbolKind.LeftRound }), 1)
			assert.strictEqual(depthDelta({ kind: TokenKind.Symbol, symbol: SymbolKind.RightRound }), -1)
			assert.strictEqual(depthDelta({ kind: TokenKind.Symbol, symbol: SymbolKind.Comma }), 0)
			assert.strictEqual(depthDelta({ kind: TokenKind.Constant, value: 1 }), 0)
		})
	})

	describe('token helpers', () => {
		it('should extract identifiers and operators with their position', () => {
			const { ctx, stream } = streamOf('a + 1')
			const first = identifierToken(stream.next())
			assert.strictEqual(first && ctx.name(first.item), 'a')
			assert.deepStrictEqual(operatorToken(stream.peek()), {
				item: Operator.Add,
				pos: { column: 3, index: 2, line: 1, lineIndex: 0 },
			})
			assert.strictEqual(identifierToken(stream.peek()), undefined)
			assert.strictEqual(operatorToken(undefined), undefined)
		})

		it('should render tokens as source text', () => {
			const { ctx, stream } = streamOf('osc ( 2.5 ) >=')
			const texts: string[] = []
			for (let token = stream.next(); token; token = stream.next()) {
				texts.push(tokenText(token.item, ctx.identifiers))
			}
			assert.deepStrictEqual(texts, ['osc', '(', '2.5', ')', '>='])
		})

		it('should match symbols', () => {
			const { stream } = streamOf(';')
			assert.strictEqual(isSymbol(stream.peek()?.item, SymbolKind.Semicolon), true)
			assert.strictEqual(isSymbol(stream.peek()?.item, SymbolKind.Comma), false)
			assert.strictEqual(isSymbol(undefined, SymbolKind.Comma), false)
		})
	})

	describe('TokenStore', () => {
		it('should throw on an unknown id', () => {
			const { ctx } = streamOf('a')
			assert.strictEqual(ctx.tokens.isValid(tokenId(0)), true)
			assert.strictEqual(ctx.tokens.isValid(tokenId(1)), false)
			assert.throws(() => ctx.tokens.get(tokenId(1)), InternalCompilerError)
		})
	})

	describe('TokenStream', () => {
		it('should walk the span in order', () => {
			const { stream } = streamOf('a , b')
			assert.strictEqual(stream.remaining(), 3)
			stream.next()
			assert.strictEqual(stream.position(), 1)
			assert.strictEqual(stream.peek(1)?.item.kind, TokenKind.Identifier)
			assert.strictEqual(stream.peek(2), undefined)
		})

		it('should end a slice at the next token', () => {
			const { stream } = streamOf('a , b')
			const head = stream.slice(0, 1)
			assert.strictEqual(head.remaining(), 1)
			assert.strictEqual(head.endPos().index, 2)
			assert.strictEqual(isSymbol(head.terminator()?.item, SymbolKind.Comma), true)
		})

		it('should end the whole stream at the end of source', () => {
			const { ctx, stream } = streamOf('a , b')
			assert.deepStrictEqual(stream.endPos(), ctx.endPos)
			assert.strictEqual(stream.endPos().index, 5)
			assert.strictEqual(stream.terminator(), undefined)
		})

		it('should clamp slices and seeks to the span', () => {
			const { stream } = streamOf('a , b')
			const tail = stream.slice(1, 10)
			assert.strictEqual(tail.remaining(), 2)
			tail.seek(10)
			assert.strictEqual(tail.position(), 3)
			assert.strictEqual(tail.isEmpty(), true)
			tail.seek(0)
			assert.strictEqual(tail.position(), 1)
		})

		it('should clone an independent cursor', () => {
			const { stream } = streamOf('a , b')
			stream.next()
			const copy = stream.clone()
			copy.next()
			copy.next()
			assert.strictEqual(stream.position(), 1)
			assert.strictEqual(copy.position(), 3)
		})

		it('should slice the unread rest', () => {
			const { stream } = streamOf('a , b')
			stream.next()
			const rest = stream.rest()
			assert.strictEqual(rest.position(), 1)
			assert.strictEqual(rest.remaining(), 2)
		})

		it('should report the current position or the end', () => {
			const { stream } = streamOf('a , b')
			assert.strictEqual(stream.currentPos().index, 0)
			stream.seek(3)
			assert.strictEqual(stream.currentPos().index, 5)
		})
	})
})
