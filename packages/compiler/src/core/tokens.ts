/**
 * Token model and storage.
 * Tokens live in a dense append-only array; parsers walk bounded spans of it
 * through TokenStream cursors.
 */

import { InternalCompilerError } from './errors.ts'
import type { Identifier, IdentifierTable } from './identifiers.ts'
import type { Node, SourcePos } from './position.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Constant: 1,
	Identifier: 0,
	Operator: 2,
	Symbol: 3,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Operator kinds shared by the lexer, the AST and the expression engine. */
export const Operator = {
	Add: 0,
	And: 15,
	ApproxEqu: 13,
	Div: 3,
	Equ: 11,
	Exp: 4,
	Greater: 8,
	GreaterEqual: 10,
	Less: 7,
	LessEqual: 9,
	Mod: 5,
	Mul: 2,
	Neg: 6,
	Not: 14,
	NotEqu: 12,
	Or: 16,
	Sub: 1,
	Xor: 17,
} as const

export type Operator = (typeof Operator)[keyof typeof Operator]

/** Punctuation, brackets and the `if`/`else` keywords. */
export const SymbolKind = {
	Backslash: 6,
	Colon: 3,
	Comma: 1,
	Else: 8,
	Equals: 2,
	If: 7,
	LeftCurly: 12,
	LeftRound: 10,
	LeftSquare: 14,
	Period: 0,
	QuestionMark: 5,
	RightCurly: 13,
	RightRound: 11,
	RightSquare: 15,
	Semicolon: 4,
} as const

export type SymbolKind = (typeof SymbolKind)[keyof typeof SymbolKind]

export const Bracket = {
	Curly: 2,
	Round: 0,
	Square: 1,
} as const

export type Bracket = (typeof Bracket)[keyof typeof Bracket]

export type Token =
	| { readonly kind: typeof TokenKind.Identifier; readonly ident: Identifier }
	| { readonly kind: typeof TokenKind.Constant; readonly value: number }
	| { readonly kind: typeof TokenKind.Operator; readonly op: Operator }
	| { readonly kind: typeof TokenKind.Symbol; readonly symbol: SymbolKind }

const OPERATOR_TEXT: Record<Operator, string> = {
	[Operator.Add]: '+',
	[Operator.Sub]: '-',
	[Operator.Mul]: '*',
	[Operator.Div]: '/',
	[Operator.Exp]: '^',
	[Operator.Mod]: '%',
	[Operator.Neg]: '-',
	[Operator.Less]: '<',
	[Operator.Greater]: '>',
	[Operator.LessEqual]: '<=',
	[Operator.GreaterEqual]: '>=',
	[Operator.Equ]: '==',
	[Operator.NotEqu]: '!=',
	[Operator.ApproxEqu]: '~=',
	[Operator.Not]: '!',
	[Operator.And]: '&&',
	[Operator.Or]: '||',
	[Operator.Xor]: '^^',
}

const SYMBOL_TEXT: Record<SymbolKind, string> = {
	[SymbolKind.Period]: '.',
	[SymbolKind.Comma]: ',',
	[SymbolKind.Equals]: '=',
	[SymbolKind.Colon]: ':',
	[SymbolKind.Semicolon]: ';',
	[SymbolKind.QuestionMark]: '?',
	[SymbolKind.Backslash]: '\\',
	[SymbolKind.If]: 'if',
	[SymbolKind.Else]: 'else',
	[SymbolKind.LeftRound]: '(',
	[SymbolKind.RightRound]: ')',
	[SymbolKind.LeftCurly]: '{',
	[SymbolKind.RightCurly]: '}',
	[SymbolKind.LeftSquare]: '[',
	[SymbolKind.RightSquare]: ']',
}

/** Lexeme → operator. `-` always lexes as Sub; Neg only exists after reinterpretation. */
export const OPERATOR_LEXEMES: ReadonlyMap<string, Operator> = new Map(
	Object.values(Operator)
		.filter((op) => op !== Operator.Neg)
		.map((op): [string, Operator] => [OPERATOR_TEXT[op], op])
)

export const SYMBOL_LEXEMES: ReadonlyMap<string, SymbolKind> = new Map(
	Object.values(SymbolKind).map((symbol): [string, SymbolKind] => [SYMBOL_TEXT[symbol], symbol])
)

export function operatorText(op: Operator): string {
	return OPERATOR_TEXT[op]
}

export function symbolText(symbol: SymbolKind): string {
	return SYMBOL_TEXT[symbol]
}

/** Bracket type and direction of a symbol, if it is a bracket. */
export function bracketOf(symbol: SymbolKind): { bracket: Bracket; opening: boolean } | undefined {
	switch (symbol) {
		case SymbolKind.LeftRound:
			return { bracket: Bracket.Round, opening: true }
		case SymbolKind.RightRound:
			return { bracket: Bracket.Round, opening: false }
		case SymbolKind.LeftSquare:
			return { bracket: Bracket.Square, opening: true }
		case SymbolKind.RightSquare:
			return { bracket: Bracket.Square, opening: false }
		case SymbolKind.LeftCurly:
			return { bracket: Bracket.Curly, opening: true }
		case SymbolKind.RightCurly:
			return { bracket: Bracket.Curly, opening: false }
		default:
			return undefined
	}
}

export function isSymbol(token: Token | undefined, symbol: SymbolKind): boolean {
	return token?.kind === TokenKind.Symbol && token.symbol === symbol
}

/** The identifier a token names, positioned, if it is an identifier. */
export function identifierToken(token: Node<Token> | undefined): Node<Identifier> | undefined {
	if (token === undefined) return undefined
	const { item, pos } = token
	return item.kind === TokenKind.Identifier ? { item: item.ident, pos } : undefined
}

/** The operator a token carries, positioned, if it is an operator. */
export function operatorToken(token: Node<Token> | undefined): Node<Operator> | undefined {
	if (token === undefined) return undefined
	const { item, pos } = token
	return item.kind === TokenKind.Operator ? { item: item.op, pos } : undefined
}

/** Change in bracket depth caused by a token: +1 opening, -1 closing, 0 otherwise. */
export function depthDelta(token: Token): number {
	if (token.kind !== TokenKind.Symbol) return 0
	const bracket = bracketOf(token.symbol)
	if (!bracket) return 0
	return bracket.opening ? 1 : -1
}

/** Source-like rendering of a token for diagnostics. */
export function tokenText(token: Token, identifiers: IdentifierTable): string {
	switch (token.kind) {
		case TokenKind.Identifier:
			return identifiers.get(token.ident)
		case TokenKind.Constant:
			return String(token.value)
		case TokenKind.Operator:
			return operatorText(token.op)
		case TokenKind.Symbol:
			return symbolText(token.symbol)
	}
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * Dense array storage for positioned tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Node<Token>[] = []

	add(token: Node<Token>): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Node<Token> {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new InternalCompilerError(`invalid token id ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	/** A cursor over every stored token. */
	stream(endOfSource: SourcePos): TokenStream {
		return new TokenStream(this.tokens, 0, this.tokens.length, endOfSource)
	}
}

/**
 * Cursor over the token span [start, end).
 * Positions are absolute indices into the backing token array, so spans
 * found by scanning one stream can be sliced out of another.
 */
export class TokenStream {
	private readonly tokens: readonly Node<Token>[]
	private readonly start: number
	private readonly end: number
	private readonly endOfSource: SourcePos
	private cursor: number

	constructor(tokens: readonly Node<Token>[], start: number, end: number, endOfSource: SourcePos) {
		this.tokens = tokens
		this.start = start
		this.end = Math.max(start, Math.min(end, tokens.length))
		this.endOfSource = endOfSource
		this.cursor = start
	}

	peek(offset = 0): Node<Token> | undefined {
		const index = this.cursor + offset
		if (index >= this.end) return undefined
		return this.tokens[index]
	}

	next(): Node<Token> | undefined {
		const token = this.peek()
		if (token !== undefined) this.cursor++
		return token
	}

	/** Absolute index of the next token. */
	position(): number {
		return this.cursor
	}

	/** Move the cursor to an absolute index inside the span. */
	seek(position: number): void {
		this.cursor = Math.max(this.start, Math.min(position, this.end))
	}

	isEmpty(): boolean {
		return this.cursor >= this.end
	}

	remaining(): number {
		return this.end - this.cursor
	}

	/** Stream over the absolute span [from, to), clamped to this span. */
	slice(from: number, to: number): TokenStream {
		const start = Math.max(this.start, from)
		const end = Math.min(this.end, to)
		return new TokenStream(this.tokens, start, end, this.positionAfter(end))
	}

	/** The unread part of this stream. */
	rest(): TokenStream {
		return this.slice(this.cursor, this.end)
	}

	/** Independent cursor at the same position. */
	clone(): TokenStream {
		const copy = new TokenStream(this.tokens, this.start, this.end, this.endOfSource)
		copy.cursor = this.cursor
		return copy
	}

	/** The token just past this span, if the source continues. */
	terminator(): Node<Token> | undefined {
		return this.tokens[this.end]
	}

	/** Where "end of input" is reported for this span. */
	endPos(): SourcePos {
		return this.endOfSource
	}

	/** Position of the first unread token, or the end position when exhausted. */
	currentPos(): SourcePos {
		return this.peek()?.pos ?? this.endOfSource
	}

	private positionAfter(end: number): SourcePos {
		if (end >= this.end) return this.endOfSource
		return this.tokens[end]?.pos ?? this.endOfSource
	}
}
