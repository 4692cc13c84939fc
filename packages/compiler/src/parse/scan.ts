/**
 * Bracket-aware lookahead over a token span. Scans run on a clone, so the
 * caller's cursor never moves.
 */

import { depthDelta, isSymbol, type SymbolKind, type TokenStream } from '../core/tokens.ts'

export interface ScanResult {
	/** Absolute index of the match, or of the token where the scan stopped */
	readonly index: number
	readonly matched: boolean
}

/**
 * Find `symbol` outside nested brackets, starting at the cursor.
 * Stops unmatched at a closing bracket that leaves the current level, or
 * at the end of the span.
 */
export function scanFor(stream: TokenStream, symbol: SymbolKind): ScanResult {
	const scan = stream.clone()
	let depth = 0
	for (let token = scan.peek(); token !== undefined; token = scan.peek()) {
		if (depth === 0 && isSymbol(token.item, symbol)) {
			return { index: scan.position(), matched: true }
		}
		depth += depthDelta(token.item)
		if (depth < 0) return { index: scan.position(), matched: false }
		scan.next()
	}
	return { index: scan.position(), matched: false }
}

/** Index of the bracket closing the one at the cursor, if the span holds it. */
export function matchingBracket(stream: TokenStream): number | undefined {
	const scan = stream.clone()
	let depth = 0
	for (let token = scan.next(); token !== undefined; token = scan.next()) {
		depth += depthDelta(token.item)
		if (depth === 0) return scan.position() - 1
	}
	return undefined
}

/** Absolute index one past the last token of the span. */
export function spanEnd(stream: TokenStream): number {
	return stream.position() + stream.remaining()
}
