import type { CompilationContext } from '../core/context.ts'
import { InternalCompilerError } from '../core/errors.ts'
import { addChars, addLine, node, type SourcePos, startPos } from '../core/position.ts'
import { OPERATOR_LEXEMES, SYMBOL_LEXEMES, type Token, TokenKind } from '../core/tokens.ts'

export interface TokenizeResult {
	succeeded: boolean
}

/**
 * What a rule does with the text it matched.
 * Rules are tried in order at each offset; the first match wins.
 */
type RuleAction =
	| { kind: 'skip' }
	| { kind: 'newline' }
	| { kind: 'emit'; build: (text: string, context: CompilationContext) => Token }

interface LexRule {
	readonly name: string
	readonly pattern: RegExp
	readonly action: RuleAction
}

const IDENT_CHAR = "[A-Za-z0-9_']|~(?!=)"

const RULES: readonly LexRule[] = [
	{ action: { kind: 'skip' }, name: 'comment', pattern: /\/\/[^\r\n]*/y },
	{ action: { kind: 'skip' }, name: 'whitespace', pattern: /[ \t]+/y },
	{ action: { kind: 'newline' }, name: 'newline', pattern: /\r\n|[\n\r]/y },
	{
		action: { build: buildSymbol, kind: 'emit' },
		name: 'symbol',
		pattern: new RegExp(`(?:if|else)(?!${IDENT_CHAR})|=(?!=)|\\.(?![0-9])|[,:;?(){}\\[\\]\\\\]`, 'y'),
	},
	{
		action: { build: buildIdentifier, kind: 'emit' },
		name: 'identifier',
		pattern: new RegExp(`(?:[A-Za-z_']|~(?!=))(?:${IDENT_CHAR})*`, 'y'),
	},
	{
		action: { build: buildOperator, kind: 'emit' },
		name: 'operator',
		pattern: /\^\^|>=|<=|~=|&&|\|\||==|!=|[+*/^><!%-]/y,
	},
	{
		action: { build: buildConstant, kind: 'emit' },
		name: 'constant',
		pattern: /(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?/y,
	},
]

function buildSymbol(text: string): Token {
	const symbol = SYMBOL_LEXEMES.get(text)
	if (symbol === undefined) throw new InternalCompilerError(`symbol rule matched unknown lexeme: ${text}`)
	return { kind: TokenKind.Symbol, symbol }
}

function buildIdentifier(text: string, context: CompilationContext): Token {
	return { ident: context.identifiers.intern(text), kind: TokenKind.Identifier }
}

function buildOperator(text: string): Token {
	const op = OPERATOR_LEXEMES.get(text)
	if (op === undefined) throw new InternalCompilerError(`operator rule matched unknown lexeme: ${text}`)
	return { kind: TokenKind.Operator, op }
}

function buildConstant(text: string): Token {
	return { kind: TokenKind.Constant, value: Number(text) }
}

function matchAt(rule: LexRule, source: string, offset: number): string | null {
	rule.pattern.lastIndex = offset
	const match = rule.pattern.exec(source)
	if (!match || match[0].length === 0) return null
	return match[0]
}

/**
 * Apply the first matching rule at `pos`.
 * Returns the advanced position, or null when no rule matches.
 */
function applyFirstRule(pos: SourcePos, context: CompilationContext): SourcePos | null {
	for (const rule of RULES) {
		const text = matchAt(rule, context.source, pos.index)
		if (text === null) continue

		switch (rule.action.kind) {
			case 'skip':
				return addChars(pos, text.length)
			case 'newline':
				return addLine(pos, text.length)
			case 'emit':
				context.tokens.add(node(rule.action.build(text, context), pos))
				return addChars(pos, text.length)
		}
	}
	return null
}

/** Width of the character at `index`, so surrogate pairs are skipped whole. */
function charWidth(source: string, index: number): number {
	const code = source.codePointAt(index)
	return code !== undefined && code > 0xffff ? 2 : 1
}

/**
 * Tokenizes source code, populating context.tokens.
 * Never stops early: an unrecognized character is reported and skipped.
 */
export function tokenize(context: CompilationContext): TokenizeResult {
	const { source } = context
	let pos = startPos()
	let failed = false

	while (pos.index < source.length) {
		const next = applyFirstRule(pos, context)
		if (next !== null) {
			pos = next
			continue
		}

		context.emit('SWLEX001', pos)
		failed = true
		pos = addChars(pos, charWidth(source, pos.index))
	}

	context.endPos = pos
	return { succeeded: !failed }
}
