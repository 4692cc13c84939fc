/**
 * Unified compilation context that flows through all phases.
 * Owns the identifier table, the token store, the scope/type table and the
 * diagnostic list of exactly one compilation.
 */

import { FunctionStore } from '../scope/functions.ts'
import { TypeTable } from '../scope/table.ts'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { type Identifier, IdentifierTable } from './identifiers.ts'
import type { Failure } from './outcome.ts'
import { type SourcePos, startPos } from './position.ts'
import { TokenStore } from './tokens.ts'

export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * A diagnostic message with optional location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Where the problem is; absent when no location is meaningful */
	readonly pos?: SourcePos
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * The unified compilation context.
 * Built fresh for every compilation and passed explicitly to each phase.
 */
export class CompilationContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Interned identifier names (populated by the lexer) */
	readonly identifiers: IdentifierTable

	/** Token storage (populated by the lexer) */
	readonly tokens: TokenStore

	/** Nested scopes and symbol types (populated by parser and checker) */
	readonly types: TypeTable

	/** Function definitions and intrinsics (populated by parser) */
	readonly functions: FunctionStore

	/** Position just past the last character, set by the lexer */
	endPos: SourcePos

	/** Collected diagnostics, in arrival order */
	private readonly diagnostics: Diagnostic[] = []

	/** Track if any errors have been reported */
	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.identifiers = new IdentifierTable()
		this.tokens = new TokenStore()
		this.types = new TypeTable()
		this.functions = new FunctionStore()
		this.endPos = startPos()
	}

	/**
	 * Emit a diagnostic by code, optionally at a source position.
	 */
	emit(code: DiagnosticCode, pos?: SourcePos, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.diagnostics.push({
			def,
			message,
			...(pos ? { pos } : {}),
			...(args ? { args } : {}),
		})
		if (def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	/** Record a structured failure returned by the parser or expression engine. */
	report(failure: Failure): void {
		this.emit(failure.code, failure.pos, failure.args)
	}

	/** Name of an interned identifier. */
	name(id: Identifier): string {
		return this.identifiers.get(id)
	}

	// ===========================================================================
	// QUERY METHODS
	// ===========================================================================

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getWarnings(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Warning)
	}

	getSourceLine(line: number): string | undefined {
		const lines = this.source.split(/\r\n|\n|\r/)
		return lines[line - 1]
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
		}
		return labels[severity]
	}

	private buildSourceContext(
		pos: SourcePos,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(pos.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${pos.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(pos.column - 1)}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[SWPARSE003]: argument `a` defined twice
	 *   --> patch.sw:1:7
	 *    |
	 *  1 | [f a, a] a
	 *    |       ^
	 *    |
	 *    = help: Rename one of the `a` arguments.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def, pos } = diagnostic
		const severityLabel = this.getSeverityLabel(def.severity)
		const header = `${severityLabel}[${def.code}]: ${diagnostic.message}`
		if (!pos) {
			return `${header}\n  --> ${this.filename}`
		}

		const location = `  --> ${this.filename}:${pos.line}:${pos.column}`
		const sourceLine = this.getSourceLine(pos.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(pos, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
