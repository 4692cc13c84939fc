/**
 * Source positions tracked while lexing.
 * Every token and AST node carries one so diagnostics can cite an exact location.
 */

export interface SourcePos {
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Offset of this position in the source (UTF-16 code units) */
	readonly index: number
	/** Offset of the first character of the current line */
	readonly lineIndex: number
}

export function startPos(): SourcePos {
	return { column: 1, index: 0, line: 1, lineIndex: 0 }
}

/** Advance past `count` characters on the current line. */
export function addChars(pos: SourcePos, count: number): SourcePos {
	return {
		column: pos.column + count,
		index: pos.index + count,
		line: pos.line,
		lineIndex: pos.lineIndex,
	}
}

/** Advance past a line break of `width` characters (1 for `\n`, 2 for `\r\n`). */
export function addLine(pos: SourcePos, width = 1): SourcePos {
	const index = pos.index + width
	return { column: 1, index, line: pos.line + 1, lineIndex: index }
}

/**
 * A payload paired with the position it came from.
 * Used for tokens and for the AST leaves that diagnostics point at.
 */
export interface Node<T> {
	readonly item: T
	readonly pos: SourcePos
}

export function node<T>(item: T, pos: SourcePos): Node<T> {
	return { item, pos }
}
